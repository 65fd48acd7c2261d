/**
 * ModDesk — tests/features/engine/effects.test.ts
 * WHAT: The effect executor: order, failure isolation and deferred cleanup.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { runEffects } from "../../../src/features/engine/effects.js";
import type { DeferFn } from "../../../src/lib/deferred.js";
import type { PlatformResult } from "../../../src/platform/types.js";
import { FakePlatform } from "../../utils/fakePlatform.js";

interface Deferred {
  label: string;
  delayMs: number;
  action: () => Promise<PlatformResult<unknown>>;
}

function capturingDefer(): { defer: DeferFn; scheduled: Deferred[] } {
  const scheduled: Deferred[] = [];
  const defer: DeferFn = (label, delayMs, action) => {
    scheduled.push({ label, delayMs, action });
    return () => {};
  };
  return { defer, scheduled };
}

describe("runEffects", () => {
  it("sends a transient warning and schedules its removal", async () => {
    const platform = new FakePlatform();
    const { defer, scheduled } = capturingDefer();

    const report = await runEffects(
      platform,
      [{ type: "sendTransientWarning", channelId: "c1", ttlMs: 10_000, payload: { content: "no chatter here" } }],
      defer
    );

    expect(report).toEqual({ applied: 1, failed: 0 });
    expect(platform.sent).toEqual([{ channelId: "c1", messageId: "msg-1", payload: { content: "no chatter here" } }]);
    expect(scheduled.map((d) => [d.label, d.delayMs])).toEqual([["delete_warning", 10_000]]);

    await scheduled[0]?.action();
    expect(platform.deletedMessages).toEqual([{ channelId: "c1", messageId: "msg-1" }]);
  });

  it("treats an already deleted message as success", async () => {
    const platform = new FakePlatform();
    const report = await runEffects(platform, [{ type: "deleteMessage", channelId: "c1", messageId: "gone" }]);
    expect(report).toEqual({ applied: 1, failed: 0 });
  });

  it("keeps going after a failed effect", async () => {
    const platform = new FakePlatform();
    platform.failWith("deleteMessage", "forbidden");

    const report = await runEffects(platform, [
      { type: "deleteMessage", channelId: "c1", messageId: "m1" },
      { type: "sendMessage", channelId: "c1", payload: { content: "reminder" } },
    ]);

    expect(report).toEqual({ applied: 1, failed: 1 });
    expect(platform.sent).toHaveLength(1);
  });

  it("does not schedule cleanup for a warning that was never posted", async () => {
    const platform = new FakePlatform();
    platform.failWith("sendMessage", "failed");
    const { defer, scheduled } = capturingDefer();

    const report = await runEffects(
      platform,
      [{ type: "sendTransientWarning", channelId: "c1", ttlMs: 5_000, payload: { content: "x" } }],
      defer
    );

    expect(report).toEqual({ applied: 0, failed: 1 });
    expect(scheduled).toEqual([]);
  });

  it("defers channel deletion with the given reason", async () => {
    const platform = new FakePlatform();
    const { defer, scheduled } = capturingDefer();

    await runEffects(
      platform,
      [{ type: "deleteChannelLater", channelId: "chan-7", delayMs: 3_000, reason: "Ticket #0007 closed by Morgan" }],
      defer
    );

    expect(platform.deletedChannels).toEqual([]);
    await scheduled[0]?.action();
    expect(platform.deletedChannels).toEqual([{ channelId: "chan-7", reason: "Ticket #0007 closed by Morgan" }]);
  });
});
