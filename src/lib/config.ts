/**
 * ModDesk — src/lib/config.ts
 * WHAT: Engine settings (channels, thresholds, privileged roles, timings, storage) parsed with zod.
 * WHY: One typed object the engine is built from; a bad threshold stops startup instead of
 *      silently never firing.
 * FLOWS: loadEngineConfig(process.env) → EngineConfig | throws ConfigurationError
 *
 * Pure: takes the source map as an argument so tests never mutate process.env.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import type { PrivilegedRoleConfig } from "./roles.js";

export const DEFAULT_REMINDER_MESSAGE =
  "💬 __***Got an idea?***__\n" +
  "Suggestions about in-character play, out-of-character topics or the Discord itself are all welcome.\n" +
  "Use 👉 `/suggest create` to send yours.";

export const DEFAULT_HELP_MESSAGE =
  "🆘 __***Need a hand right now?***__\n" +
  "Ask here and everyone will chip in. For anything private, open a ticket with `/ticket create`. 👇";

export class ConfigurationError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConfigurationError";
    this.key = key;
  }
}

export interface CounterThresholds {
  channelMessages: number;
  help: number;
  suggestionReminder: number;
}

export interface EngineConfig {
  suggestionChannelId: string;
  suggestionResultsChannelId: string | null;
  welcomeChannelId: string | null;
  transcriptChannelId: string | null;
  transcriptChannelName: string;
  thresholds: CounterThresholds;
  roles: PrivilegedRoleConfig;
  commandPrefix: string;
  reminderMessage: string;
  helpMessage: string;
  warningTtlMs: number;
  ticketDeleteDelayMs: number;
  store: {
    backend: "sqlite" | "json";
    dbPath: string;
    dataDir: string;
  };
}

const optionalId = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : null));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const schema = z.object({
  SUGGESTION_CHANNEL_ID: z.string().trim().min(1, "SUGGESTION_CHANNEL_ID is required"),
  SUGGESTION_RESULTS_CHANNEL_ID: optionalId,
  WELCOME_CHANNEL_ID: optionalId,
  TRANSCRIPT_CHANNEL_ID: optionalId,
  TRANSCRIPT_CHANNEL_NAME: z.string().trim().min(1).default("transcript"),

  MESSAGE_THRESHOLD: positiveInt(5),
  HELP_MESSAGE_THRESHOLD: positiveInt(10),
  SUGGESTION_REMINDER_THRESHOLD: positiveInt(5),

  PRIVILEGED_ROLE_NAMES: z
    .string()
    .default("Manager,Assistant Manager")
    .transform((v) =>
      v
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    )
    .pipe(z.array(z.string()).min(1, "at least one privileged role name is required")),
  // Not trimmed: the decoration usually ends in a space ("👑 ")
  PRIVILEGED_ROLE_DECORATION: z.string().default("👑 "),

  REMINDER_MESSAGE: z.string().min(1).default(DEFAULT_REMINDER_MESSAGE),
  HELP_MESSAGE: z.string().min(1).default(DEFAULT_HELP_MESSAGE),

  WARNING_TTL_MS: z.coerce.number().int().nonnegative().default(10_000),
  TICKET_DELETE_DELAY_MS: z.coerce.number().int().nonnegative().default(3_000),

  STORE_BACKEND: z.enum(["sqlite", "json"]).default("sqlite"),
  DB_PATH: z.string().trim().min(1).default("data/moddesk.db"),
  DATA_DIR: z.string().trim().min(1).default("data"),
});

/**
 * Parse engine settings from an env-like map. Empty strings count as unset so a
 * blank line in .env falls back to the default.
 */
export function loadEngineConfig(source: Record<string, string | undefined>): EngineConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== "") {
      cleaned[key] = value;
    }
  }

  const parsed = schema.safeParse(cleaned);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const key = first?.path.join(".") || "(root)";
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(key, `Invalid engine configuration: ${details}`);
  }

  const c = parsed.data;
  return {
    suggestionChannelId: c.SUGGESTION_CHANNEL_ID,
    suggestionResultsChannelId: c.SUGGESTION_RESULTS_CHANNEL_ID,
    welcomeChannelId: c.WELCOME_CHANNEL_ID,
    transcriptChannelId: c.TRANSCRIPT_CHANNEL_ID,
    transcriptChannelName: c.TRANSCRIPT_CHANNEL_NAME,
    thresholds: {
      channelMessages: c.MESSAGE_THRESHOLD,
      help: c.HELP_MESSAGE_THRESHOLD,
      suggestionReminder: c.SUGGESTION_REMINDER_THRESHOLD,
    },
    roles: {
      names: c.PRIVILEGED_ROLE_NAMES,
      decoration: c.PRIVILEGED_ROLE_DECORATION,
    },
    commandPrefix: "/",
    reminderMessage: c.REMINDER_MESSAGE,
    helpMessage: c.HELP_MESSAGE,
    warningTtlMs: c.WARNING_TTL_MS,
    ticketDeleteDelayMs: c.TICKET_DELETE_DELAY_MS,
    store: {
      backend: c.STORE_BACKEND,
      dbPath: c.DB_PATH,
      dataDir: c.DATA_DIR,
    },
  };
}
