/**
 * ModDesk — src/lib/reqctx.ts
 * WHAT: Async-local trace context for slash commands, gateway events and deferred actions.
 * WHY: Workflow logs deep inside a queue callback still carry the trace id of the
 *      interaction or event that started them.
 * FLOWS:
 *  - runWithCtx(meta, fn) → ctx() / logFields() anywhere below
 *  - bindCtx(fn) → same context when fn runs later from a timer
 * DOCS:
 *  - Node AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export type TraceSource = "slash" | "event" | "deferred";

export interface ReqContext {
  traceId: string;
  kind?: TraceSource;
  /** Slash command or gateway event name */
  cmd?: string;
  /** Workflow operation currently running, e.g. "tickets.close" */
  op?: string;
  userId?: string;
  guildId?: string | null;
  channelId?: string | null;
}

const storage = new AsyncLocalStorage<ReqContext>();

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const TRACE_ID_LENGTH = 11;

/** Short base62 id for log correlation; modulo bias does not matter here. */
export function newTraceId(): string {
  return Array.from(randomBytes(TRACE_ID_LENGTH), (byte) => BASE62.charAt(byte % BASE62.length)).join("");
}

/**
 * Runs fn with the parent context merged under meta. A nested run keeps the
 * parent's trace id unless meta names a new one.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  const next: ReqContext = {
    traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
    kind: meta.kind ?? parent?.kind,
    cmd: meta.cmd ?? parent?.cmd,
    op: meta.op ?? parent?.op,
    userId: meta.userId ?? parent?.userId,
    guildId: meta.guildId ?? parent?.guildId ?? null,
    channelId: meta.channelId ?? parent?.channelId ?? null,
  };
  return storage.run(next, fn);
}

export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}

/** Trace fields worth stamping on a log line; empty outside any context. */
export function logFields(): { traceId?: string; cmd?: string; op?: string } {
  const current = storage.getStore();
  if (!current) return {};
  const fields: { traceId?: string; cmd?: string; op?: string } = { traceId: current.traceId };
  if (current.cmd) fields.cmd = current.cmd;
  if (current.op) fields.op = current.op;
  return fields;
}

/** Captures the current context so fn sees it when called later, tagged as deferred. */
export function bindCtx<A extends unknown[], R>(fn: (...args: A) => R): (...args: A) => R {
  const captured = storage.getStore();
  if (!captured) return fn;
  return (...args: A) => storage.run({ ...captured, kind: "deferred" }, () => fn(...args));
}
