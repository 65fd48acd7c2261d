/**
 * ModDesk — src/lib/sentry.ts
 * WHAT: Sentry bootstrap plus capture helpers that stamp the current trace onto each event.
 * WHY: A failed ticket close in Sentry should point at the same traceId as the log lines.
 * FLOWS: initializeSentry() → captureException(err, extra) → flushSentry() on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { env, type Env } from "./env.js";
import { logger, redact } from "./logger.js";
import { logFields } from "./reqctx.js";

/** Discord API noise and socket resets are logged with better context than Sentry gets. */
export const IGNORED_ERRORS = ["DiscordAPIError", "AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"];

let sentryEnabled = false;

/** https://{key}@{host}/{project}; structure only, the SDK does the rest. */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

function readRelease(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(process.cwd(), "package.json"), "utf-8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return `moddesk@${pkg.version}`;
    }
  } catch (err) {
    logger.debug({ err }, "[sentry] package.json unreadable");
  }
  return "moddesk@unknown";
}

export function buildSentryOptions(settings: Env, release: string): Sentry.NodeOptions {
  return {
    dsn: settings.SENTRY_DSN,
    environment: settings.SENTRY_ENVIRONMENT ?? settings.NODE_ENV,
    release,
    tracesSampleRate: settings.SENTRY_TRACES_SAMPLE_RATE,
    integrations: [Sentry.onUnhandledRejectionIntegration({ mode: "warn" })],
    ignoreErrors: IGNORED_ERRORS,
    // Suggestion text and strike reasons end up in messages; scrub them like log lines
    beforeSend(event) {
      if (event.message) event.message = redact(event.message);
      for (const exception of event.exception?.values ?? []) {
        if (exception.value) exception.value = redact(exception.value);
      }
      return event;
    },
  };
}

/** No-op under Vitest or without a usable SENTRY_DSN. */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("[sentry] DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init(buildSentryOptions(env, readRelease()));
    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV }, "[sentry] initialized");
  } catch (err) {
    sentryEnabled = false;
    logger.error({ err }, "[sentry] init failed");
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/** Returns the Sentry event id, or null while disabled. */
export function captureException(error: unknown, extra?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  const { traceId, cmd, op } = logFields();
  return Sentry.captureException(error, {
    tags: {
      ...(traceId ? { traceId } : {}),
      ...(cmd ? { cmd } : {}),
      ...(op ? { op } : {}),
    },
    contexts: extra ? { moddesk: extra } : undefined,
  });
}

export function addBreadcrumb(breadcrumb: Sentry.Breadcrumb): void {
  if (sentryEnabled) Sentry.addBreadcrumb(breadcrumb);
}

export function setTag(key: string, value: string): void {
  if (sentryEnabled) Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>): void {
  if (sentryEnabled) Sentry.setContext(name, context);
}

export function setUser(user: { id: string; username?: string } | null): void {
  if (sentryEnabled) Sentry.setUser(user);
}

export async function flushSentry(timeoutMs = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;
  try {
    return await Sentry.close(timeoutMs);
  } catch (err) {
    logger.error({ err }, "[sentry] flush failed");
    return false;
  }
}
