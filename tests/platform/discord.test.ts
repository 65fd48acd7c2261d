/**
 * ModDesk — tests/platform/discord.test.ts
 * WHAT: DiscordAPIError → platform failure mapping and payload conversion.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { DiscordAPIError } from "discord.js";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { mapDiscordError } from "../../src/platform/discord.js";
import { allowedMentionsFor, toMessageOptions } from "../../src/platform/embeds.js";
import { failureFromPlatform } from "../../src/platform/failures.js";

function apiError(code: number, message: string, status: number): DiscordAPIError {
  return new DiscordAPIError({ code, message }, code, status, "POST", "/channels/1/messages", {});
}

describe("mapDiscordError", () => {
  it.each([
    [10003, "Unknown Channel", "not_found"],
    [10008, "Unknown Message", "not_found"],
    [10007, "Unknown Member", "not_found"],
    [50001, "Missing Access", "forbidden"],
    [50013, "Missing Permissions", "forbidden"],
    [50007, "Cannot send messages to this user", "forbidden"],
    [50035, "Invalid Form Body", "failed"],
  ])("code %i → %s", (code, message, kind) => {
    expect(mapDiscordError(apiError(code, message, 400))).toEqual({ ok: false, kind, message, code });
  });

  it("maps anything else to failed with its message", () => {
    expect(mapDiscordError(new Error("socket hang up"))).toEqual({ ok: false, kind: "failed", message: "socket hang up" });
    expect(mapDiscordError("weird")).toEqual({ ok: false, kind: "failed", message: "weird" });
  });
});

describe("failureFromPlatform", () => {
  const call = { action: "delete the channel", remediation: "Give me Manage Channels.", entity: "channel" as const, id: "c1" };

  it("keeps not_found as not_found", () => {
    expect(failureFromPlatform({ ok: false, kind: "not_found", message: "x" }, call)).toEqual({
      kind: "not_found",
      entity: "channel",
      id: "c1",
      message: "That channel no longer exists on Discord.",
    });
  });

  it("turns anything else into a retryable transient failure", () => {
    expect(failureFromPlatform({ ok: false, kind: "failed", message: "x" }, call)).toEqual({
      kind: "transient_io",
      retryable: true,
      message: "Discord rejected the request to delete the channel.",
    });
  });
});

describe("toMessageOptions", () => {
  it("converts embeds and files and suppresses mentions by default", () => {
    const options = toMessageOptions({
      content: "<@user-1> hi",
      embeds: [{ title: "Card", color: 0x2ecc71, fields: [{ name: "A", value: "1" }], footer: "f" }],
      files: [{ name: "log.txt", content: "line" }],
    });

    expect(options.content).toBe("<@user-1> hi");
    expect(options.allowedMentions).toEqual({ parse: [] });
    expect(options.embeds[0]?.toJSON()).toEqual({
      title: "Card",
      color: 0x2ecc71,
      fields: [{ name: "A", value: "1", inline: false }],
      footer: { text: "f" },
    });
    expect(options.files[0]?.name).toBe("log.txt");
  });

  it("omits empty content and lets user mentions ping when asked", () => {
    const options = toMessageOptions({ embeds: [] });
    expect("content" in options).toBe(false);
    expect(allowedMentionsFor({ content: "hi", mentions: "users" })).toEqual({ parse: ["users"] });
  });
});
