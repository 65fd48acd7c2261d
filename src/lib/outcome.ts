/**
 * ModDesk — src/lib/outcome.ts
 * WHAT: Result type returned by every workflow operation, plus the failure taxonomy.
 * WHY: Workflows never throw to the dispatcher or command layer; callers switch on `kind`.
 * FLOWS:
 *  - ok(value) / fail(failure) → Outcome<T>
 *  - runGuarded(op, ids, fn) → catches anything thrown, logs it, returns transient_io
 *  - userMessageFor(failure) → ephemeral reply text
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { classifyError, errorContext, isRecoverable, userFriendlyMessage } from "./errors.js";
import { logFields, runWithCtx } from "./reqctx.js";

export type NotFoundEntity = "suggestion" | "message" | "ticket" | "strikes" | "member" | "role" | "channel";

export type Failure =
  | { kind: "permission"; message: string }
  | { kind: "not_found"; entity: NotFoundEntity; id: string; message: string }
  | { kind: "already_resolved"; id: string; status: string; message: string }
  | { kind: "external_forbidden"; action: string; remediation: string; message: string }
  | { kind: "transient_io"; retryable: boolean; message: string }
  | { kind: "validation"; field: string; message: string }
  | { kind: "not_ticket_channel"; channelId: string; message: string };

export type FailureKind = Failure["kind"];

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: Failure };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail(error: Failure): { ok: false; error: Failure } {
  return { ok: false, error };
}

export function permissionDenied(action: string): { ok: false; error: Failure } {
  return fail({
    kind: "permission",
    message: `You need a staff role to ${action}.`,
  });
}

/**
 * Text shown to the invoking user. Forbidden responses carry the fix an
 * administrator has to make, so it goes on its own line.
 */
export function userMessageFor(failure: Failure): string {
  switch (failure.kind) {
    case "external_forbidden":
      return `❌ ${failure.message}\n${failure.remediation}`;
    case "transient_io":
      return failure.retryable ? `❌ ${failure.message} Please try again.` : `❌ ${failure.message}`;
    default:
      return `❌ ${failure.message}`;
  }
}

/**
 * Workflow boundary: `fn` runs with `op` in the trace context; anything it throws is
 * classified, logged with the ids the caller passes, and turned into a transient_io failure.
 */
export async function runGuarded<T>(
  op: string,
  ids: Record<string, unknown>,
  fn: () => Promise<Outcome<T>>
): Promise<Outcome<T>> {
  try {
    return await runWithCtx({ op }, fn);
  } catch (err) {
    const classified = classifyError(err);
    logger.error(
      { evt: "workflow_error", ...logFields(), op, ...errorContext(classified, ids), err },
      `[${op}] failed: ${classified.message}`
    );
    return fail({
      kind: "transient_io",
      retryable: isRecoverable(classified),
      message: userFriendlyMessage(classified),
    });
  }
}
