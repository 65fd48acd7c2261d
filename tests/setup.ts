/**
 * ModDesk — tests/setup.ts
 * WHAT: Global Vitest setup for deterministic tests.
 * WHY: Gives src/lib/env.ts the secrets it requires and keeps fake timers from leaking.
 *
 * This file runs before EVERY test file via the setupFiles config in vitest.config.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

// Top-level on purpose: env.ts validates at import time, and test files import it
// (through sentry.ts) before any beforeAll hook would run.
process.env.NODE_ENV = "test";
process.env.DISCORD_TOKEN ??= "test-token";
process.env.CLIENT_ID ??= "test-client";

afterEach(() => {
  // A test using vi.useFakeTimers() would otherwise leak into the next one.
  vi.clearAllTimers();
  vi.useRealTimers();
});
