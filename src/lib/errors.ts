/**
 * ModDesk — src/lib/errors.ts
 * WHAT: Classifies anything thrown (store corruption, SQLite, Discord API, network) into a tagged union
 * WHY: runGuarded, wrapCommand and wrapEvent pick the reply text, the retry flag and
 *      whether Sentry hears about it from the kind
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, errorContext } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10062) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

/**
 * Base error interface for the discriminated union pattern.
 * The `kind` field is the discriminator.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Database errors (SQLite).
 * - SQLITE_BUSY/SQLITE_LOCKED: transient, can retry
 * - SQLITE_CORRUPT/SQLITE_NOTADB: fatal
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
}

/**
 * A record set whose stored payload no longer parses or validates.
 * The stored bytes are left alone; an operator has to look at it.
 */
export interface StoreError extends AppError {
  kind: "store";
  recordSet: string;
}

/**
 * Discord API errors. Discord uses numeric codes to identify specific errors:
 * - 10062: Unknown Interaction (3s timeout expired)
 * - 40060: Already acknowledged
 * - 50013: Missing Permissions
 *
 * See: https://discord.com/developers/docs/topics/opcodes-and-status-codes
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/** Permission errors (Discord permissions) */
export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/** Network errors (transient). Node system errors, not HTTP errors. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

/** Configuration errors */
export interface ConfigError extends AppError {
  kind: "config";
  key: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DbError
  | StoreError
  | DiscordApiError
  | PermissionError
  | NetworkError
  | ConfigError
  | UnknownError;

// ===== Error Classification =====

export function readProp(value: unknown, key: string): unknown {
  if (value && typeof value === "object" && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

function readString(value: unknown, key: string): string | undefined {
  const prop = readProp(value, key);
  return typeof prop === "string" ? prop : undefined;
}

function readNumber(value: unknown, key: string): number | undefined {
  const prop = readProp(value, key);
  return typeof prop === "number" ? prop : undefined;
}

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

/**
 * Classify any caught error into a discriminated union.
 *
 * Ordered from most specific to least: our own named errors, SQLite,
 * Discord, network, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const message = readString(err, "message") ?? String(err);
  const name = readString(err, "name");
  const code = readProp(err, "code");
  const cause = err instanceof Error ? err : undefined;

  if (name === "StoreCorruptError") {
    return { kind: "store", recordSet: readString(err, "recordSet") ?? "unknown", message, cause };
  }

  if (name === "ConfigurationError") {
    return { kind: "config", key: readString(err, "key") ?? "unknown", message, cause };
  }

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return {
      kind: "db_error",
      code: typeof code === "string" ? code : "UNKNOWN",
      message,
      cause,
    };
  }

  // Discord permission errors first; they are DiscordAPIErrors too
  if (code === 50013) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  if (name?.includes("Discord") && typeof code === "number") {
    return {
      kind: "discord_api",
      code,
      httpStatus: readNumber(err, "status") ?? readNumber(err, "httpStatus"),
      method: readString(err, "method"),
      path: readString(err, "url") ?? readString(err, "path"),
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: readString(err, "hostname") ?? readString(err, "host"),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Check if error is recoverable (worth the user retrying).
 * Discord rate limits (429) are handled by discord.js internally.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;

    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";

    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }

    default:
      return false;
  }
}

/**
 * Sentry alerts should mean "something is actually broken", not
 * "Discord had a hiccup" or "a moderator clicked twice".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Interaction already acknowledged
        10008, // Unknown message
        10003, // Unknown channel
      ];
      return !ignoredCodes.includes(err.code);
    }

    case "network":
    case "permission":
      return false;

    default:
      return true;
  }
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code };

    case "store":
      return { ...base, recordSet: err.recordSet };

    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };

    case "network":
      return { ...base, networkCode: err.code, host: err.host };

    case "permission":
      return { ...base, neededPerms: err.needed };

    case "config":
      return { ...base, configKey: err.key };

    default:
      return base;
  }
}

/**
 * Get a user-friendly error message for display
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "db_error":
      if (err.code === "SQLITE_BUSY") {
        return "Storage is temporarily busy. Please try again.";
      }
      return "A storage error occurred.";

    case "store":
      return `Stored ${err.recordSet} data could not be read. An administrator needs to check it.`;

    case "discord_api":
      if (err.code === 10062) {
        return "This interaction has expired. Please try the command again.";
      }
      return "Discord API error occurred.";

    case "network":
      return "Network error. Please try again in a moment.";

    case "permission":
      return `I'm missing permissions: ${err.needed.join(", ")}`;

    case "config":
      return `Configuration error: ${err.key} is not set correctly.`;

    default:
      return "An unexpected error occurred.";
  }
}
