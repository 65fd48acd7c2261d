/**
 * ModDesk — src/lib/deferred.ts
 * WHAT: Run a platform action after a delay (warning cleanup, ticket channel teardown).
 * HOW: setTimeout, unref'd, run under the trace context of whoever scheduled it.
 *      Not persisted: a restart drops pending actions.
 *      Failures are logged once and never retried.
 * DOCS:
 *  - Timeout.unref: https://nodejs.org/api/timers.html#timeoutunref
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { bindCtx, logFields } from "./reqctx.js";
import type { PlatformResult } from "../platform/types.js";

export type DeferFn = (
  label: string,
  delayMs: number,
  action: () => Promise<PlatformResult<unknown>>,
  context?: Record<string, unknown>
) => () => void;

/**
 * Schedule `action` to run after `delayMs`. Returns a cancel function.
 *
 * @example
 * scheduleDeferred("delete_warning", 10_000, () => platform.deleteMessage(channelId, messageId));
 */
export const scheduleDeferred: DeferFn = (label, delayMs, action, context = {}) => {
  const fire = bindCtx(() => {
    const fields = { ...logFields(), ...context };
    action().then(
      (result) => {
        if (result.ok) {
          logger.debug({ evt: "deferred_done", label, ...fields }, `[deferred] ${label} done`);
          return;
        }
        logger.warn(
          { evt: "deferred_failed", label, failure: result.kind, detail: result.message, ...fields },
          `[deferred] ${label} failed`
        );
      },
      (err: unknown) => {
        logger.warn({ evt: "deferred_failed", label, err, ...fields }, `[deferred] ${label} threw`);
      }
    );
  });
  const timer = setTimeout(fire, delayMs);
  // Pending cleanup should never hold the process open on shutdown
  if (typeof timer.unref === "function") timer.unref();
  return () => clearTimeout(timer);
};
