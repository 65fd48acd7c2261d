/**
 * ModDesk — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Centralizes structured logging to keep other modules clean.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io/#/docs/api
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Redaction patterns for secrets that might leak into logs.
 *
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * DSN pattern: Sentry DSNs embed auth tokens in URLs. We keep the host, redact the secret.
 * Mention pattern: @everyone/@here in a log line means user content leaked through.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

// Only warn once per process if the Sentry module fails to load
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data
 * (suggestion text, strike reasons, ticket reasons).
 * Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

/**
 * Log level defaults to "info" but can be overridden via LOG_LEVEL.
 *
 * Pretty printing enabled for: test runs (always) and TTY dev environments
 * (when LOG_PRETTY=true). Production writes newline-delimited JSON, optionally
 * to LOG_FILE.
 */
const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

function serializeError(e: unknown) {
  if (!(e instanceof Error)) {
    return { message: String(e) };
  }
  return {
    name: e.name,
    code: "code" in e ? e.code : undefined,
    message: e.message,
    stack: e.stack,
  };
}

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : process.env.LOG_FILE
      ? {
          transport: {
            target: "pino/file",
            options: { destination: process.env.LOG_FILE, mkdir: true },
          },
        }
      : {}),
  base: undefined,
  // discord.js errors carry request bodies and circular refs; keep the useful bits
  serializers: {
    err: serializeError,
  },
  /**
   * Intercepts error-level logs and forwards the attached `err` to Sentry,
   * so callers just use logger.error({ err }, "...") and never call
   * captureException themselves for the common case.
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object" && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import avoids a logger ↔ sentry import cycle.
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", String(importErr));
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
