/**
 * ModDesk — tests/features/engine/engine.test.ts
 * WHAT: The assembled engine end to end over the fake platform and an in-memory store.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import { createEngine } from "../../../src/features/engine/engine.js";
import { ConfigurationError } from "../../../src/lib/config.js";
import { FakePlatform } from "../../utils/fakePlatform.js";
import {
  GUILD_ID,
  SUGGESTIONS_CHANNEL,
  WELCOME_CHANNEL,
  createMemoryStore,
  member,
  staff,
  testConfig,
} from "../../utils/fixtures.js";

function build(env: Record<string, string> = {}) {
  const platform = new FakePlatform();
  const defer = vi.fn(() => () => {});
  const engine = createEngine({ config: testConfig(env), store: createMemoryStore(), platform, defer });
  return { engine, platform, defer };
}

describe("createEngine", () => {
  it("applies the effects of a gated message", async () => {
    const { engine, platform, defer } = build();

    const report = await engine.handleMessage({
      id: "in-1",
      channelId: SUGGESTIONS_CHANNEL,
      guildId: GUILD_ID,
      content: "first!",
      author: member(),
      authorIsBot: false,
    });

    // The inbound message is unknown to the fake, so the delete answers not_found, which counts as done
    expect(report).toEqual({ applied: 2, failed: 0 });
    expect(platform.deletedMessages).toEqual([{ channelId: SUGGESTIONS_CHANNEL, messageId: "in-1" }]);
    expect(defer).toHaveBeenCalledWith("delete_warning", 10_000, expect.any(Function), {
      channelId: SUGGESTIONS_CHANNEL,
      messageId: "msg-1",
    });
  });

  it("shares one store between workflows", async () => {
    const { engine } = build({ SUGGESTION_REMINDER_THRESHOLD: "1" });

    const created = await engine.suggestions.create(member(), "More emoji slots", SUGGESTIONS_CHANNEL);
    if (!created.ok) throw new Error("suggestion not created");

    expect(engine.counters.snapshot().globals.suggestionReminder).toBe(0);
    expect(created.value.effects).toHaveLength(1);
    expect(engine.suggestions.listPending(10).total).toBe(1);
  });

  it("closes a ticket and hands its deletion to the deferred runner", async () => {
    const { engine, defer } = build({ TICKET_DELETE_DELAY_MS: "1500" });
    const opened = await engine.tickets.create(GUILD_ID, member());
    if (!opened.ok) throw new Error("ticket not created");

    const closed = await engine.tickets.close(GUILD_ID, opened.value.channelId, staff());
    if (!closed.ok) throw new Error("ticket not closed");
    await engine.applyEffects(closed.value.effects);

    expect(defer).toHaveBeenCalledWith("delete_channel", 1_500, expect.any(Function), {
      channelId: opened.value.channelId,
    });
  });

  it("greets in the configured welcome channel", async () => {
    const { engine, platform } = build();
    await engine.greet("join", { id: "user-4", displayName: "Ari", guildId: GUILD_ID });
    expect(platform.sent[0]?.channelId).toBe(WELCOME_CHANNEL);
  });

  it("refuses to start with an invalid threshold", () => {
    const config = testConfig();
    expect(() =>
      createEngine({
        config: { ...config, thresholds: { ...config.thresholds, channelMessages: 0 } },
        store: createMemoryStore(),
        platform: new FakePlatform(),
      })
    ).toThrow(ConfigurationError);
  });
});
