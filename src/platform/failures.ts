// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Maps a failed platform call onto the workflow failure taxonomy.

import type { Failure, NotFoundEntity } from "../lib/outcome.js";
import type { PlatformFailure } from "./types.js";

export interface PlatformCallContext {
  /** Short verb phrase, e.g. "create the ticket channel" */
  action: string;
  /** What an administrator has to change when Discord answers Forbidden */
  remediation: string;
  entity: NotFoundEntity;
  id: string;
}

export function failureFromPlatform(failure: PlatformFailure, call: PlatformCallContext): Failure {
  switch (failure.kind) {
    case "not_found":
      return {
        kind: "not_found",
        entity: call.entity,
        id: call.id,
        message: `That ${call.entity} no longer exists on Discord.`,
      };
    case "forbidden":
      return {
        kind: "external_forbidden",
        action: call.action,
        remediation: call.remediation,
        message: `I don't have permission to ${call.action}.`,
      };
    case "failed":
      return {
        kind: "transient_io",
        retryable: true,
        message: `Discord rejected the request to ${call.action}.`,
      };
  }
}
