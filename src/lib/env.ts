/**
 * ModDesk — src/lib/env.ts
 * WHAT: Process environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access for credentials centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 *
 * Engine settings (channels, thresholds, timings) live in src/lib/config.ts so they
 * can be parsed from any source in tests without touching the process.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: false in tests lets test env vars set before import win
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim() || undefined,
  NODE_ENV: process.env.NODE_ENV?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim() || undefined,
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim() || undefined,
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim() || undefined,
  LOG_LEVEL: process.env.LOG_LEVEL?.trim() || undefined,
};

const schema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  // Only needed for guild-scoped command deployment
  GUILD_ID: z.string().optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  LOG_LEVEL: z.string().optional(),
});

export type Env = z.infer<typeof schema>;

const parsed = schema.safeParse(raw);

if (!parsed.success) {
  // Print every issue at once so a fresh deploy doesn't take five restarts to fix.
  console.error("Environment validation failed:");
  for (const issue of parsed.error.issues) {
    console.error(` - ${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }
  process.exit(1);
}

export const env: Env = parsed.data;
