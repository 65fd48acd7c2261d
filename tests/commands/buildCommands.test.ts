/**
 * ModDesk — tests/commands/buildCommands.test.ts
 * WHAT: The registered command set and the counters status card.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

vi.mock("../../src/lib/sentry.js", () => ({
  captureException: vi.fn(),
  addBreadcrumb: vi.fn(),
  setTag: vi.fn(),
  setContext: vi.fn(),
}));

import { buildCommands } from "../../src/commands/buildCommands.js";
import { buildCounterStatusEmbed } from "../../src/commands/counters.js";

describe("buildCommands", () => {
  it("registers every command once", () => {
    expect(buildCommands().map((c) => c.name)).toEqual(["suggest", "ticket", "strike", "applicant", "counters"]);
  });

  it("exposes the expected subcommands", () => {
    const subcommands = Object.fromEntries(
      buildCommands().map((c) => [c.name, (c.options ?? []).map((o) => o.name)])
    );
    expect(subcommands).toEqual({
      suggest: ["create", "accept", "deny", "pending"],
      ticket: ["create", "close", "add"],
      strike: ["add", "check", "remove"],
      applicant: ["accept", "deny"],
      counters: ["status", "reset"],
    });
  });
});

describe("buildCounterStatusEmbed", () => {
  it("shows each count against its threshold", () => {
    const embed = buildCounterStatusEmbed({
      channels: { "chan-1": 2 },
      globals: { help: 7, suggestionReminder: 1 },
      thresholds: { channelMessages: 5, help: 10, suggestionReminder: 5 },
    });

    expect(embed.fields).toEqual([
      { name: "Channels", value: "<#chan-1>: 2/5" },
      { name: "Help message", value: "7/10", inline: true },
      { name: "Suggestion reminder", value: "1/5", inline: true },
    ]);
  });

  it("says so when nothing was counted", () => {
    const embed = buildCounterStatusEmbed({
      channels: {},
      globals: { help: 0, suggestionReminder: 0 },
      thresholds: { channelMessages: 5, help: 10, suggestionReminder: 5 },
    });
    expect(embed.fields?.[0]).toEqual({ name: "Channels", value: "No messages counted yet." });
  });
});
