/**
 * ModDesk — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers
 * WHY: An event handler must never crash the bot; every failure is logged with error classification
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches errors and times out slow handlers
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  client.on(Events.GuildMemberAdd, wrapEvent("guildMemberAdd", async (member) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, readProp, shouldReportToSentry } from "./errors.js";
import { runWithCtx } from "./reqctx.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Events should finish quickly. A ticket close fetches full channel history, which is
 * the slowest thing we do, and still fits well inside this.
 */
export const DEFAULT_EVENT_TIMEOUT_MS = 10_000;

/**
 * Wrap an event handler with error protection.
 *
 * @example
 * client.on(Events.MessageCreate, wrapEvent("messageCreate", (message) => engine.handleMessage(...)));
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    const contextIds = extractEventContext(args);
    let timer: NodeJS.Timeout | undefined;
    try {
      await runWithCtx({ kind: "event", cmd: eventName }, () =>
        Promise.race([
          Promise.resolve(handler(...args)),
          new Promise<void>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)), timeoutMs);
          }),
        ])
      );
    } catch (err) {
      const classified = classifyError(err);
      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err, { event: eventName, errorKind: classified.kind, ...contextIds });
      }
      // Never re-throw: one failing handler must not take the process down
    } finally {
      clearTimeout(timer);
    }
  };
}

/**
 * Probe discord.js event payloads (Message, GuildMember, ...) for guild, user and
 * channel ids to attach to error logs.
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const guildId = readProp(arg, "guildId");
    if (typeof guildId === "string") {
      context.guildId = guildId;
    }
    const guild = readProp(arg, "guild");
    const nestedGuildId = readProp(guild, "id");
    if (typeof nestedGuildId === "string") {
      context.guildId = nestedGuildId;
    }
    const id = readProp(arg, "id");
    if (typeof id === "string" && !context.entityId) {
      context.entityId = id;
    }
    const userId = readProp(readProp(arg, "user"), "id") ?? readProp(readProp(arg, "author"), "id");
    if (typeof userId === "string") {
      context.userId = userId;
    }
    const channelId = readProp(arg, "channelId");
    if (typeof channelId === "string") {
      context.channelId = channelId;
    }
  }

  return context;
}
