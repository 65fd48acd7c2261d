/**
 * ModDesk — tests/features/tickets/workflow.test.ts
 * WHAT: Ticket create → add → close against the fake platform.
 * WHY: Covers sequence numbering, channel permissions, transcript archiving and the
 *      delayed-deletion effect.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import { TicketWorkflow, ticketChannelName } from "../../../src/features/tickets/workflow.js";
import { KeyedQueue } from "../../../src/lib/keyedQueue.js";
import type { HistoryMessage } from "../../../src/platform/types.js";
import { JsonFileRecordStore } from "../../../src/store/jsonFileRecordStore.js";
import type { RecordStore } from "../../../src/store/recordStore.js";
import { ticketsRecordSet } from "../../../src/store/schemas.js";
import { FakePlatform } from "../../utils/fakePlatform.js";
import {
  GUILD_ID,
  createMemoryStore,
  createTempJsonStore,
  failingUpdates,
  member,
  staff,
} from "../../utils/fixtures.js";

const roles = { names: ["Manager"], decoration: "👑 " };
const now = () => new Date("2025-02-14T10:00:00.000Z");

function setup(transcriptChannelId: string | null = null, store: RecordStore = createMemoryStore()) {
  const platform = new FakePlatform();
  platform.roles = [
    { id: "role-manager", name: "👑 Manager" },
    { id: "role-member", name: "Member" },
  ];
  platform.channelsByName = { transcript: "chan-archive" };
  const workflow = new TicketWorkflow({
    store,
    queue: new KeyedQueue(),
    platform,
    config: { roles, transcriptChannelId, transcriptChannelName: "transcript", ticketDeleteDelayMs: 3_000 },
    now,
  });
  return { store, platform, workflow };
}

function historyMessage(overrides: Partial<HistoryMessage>): HistoryMessage {
  return {
    id: "h",
    authorId: "user-1",
    authorName: "Robin",
    authorIsBot: false,
    content: "",
    hasEmbeds: false,
    hasAttachments: false,
    createdAt: new Date("2025-02-14T10:01:02.000Z"),
    ...overrides,
  };
}

describe("TicketWorkflow.create", () => {
  let store: RecordStore;
  let platform: FakePlatform;
  let workflow: TicketWorkflow;

  beforeEach(() => {
    ({ store, platform, workflow } = setup());
  });

  it("opens a private channel and stores an open record", async () => {
    const result = await workflow.create(GUILD_ID, member(), "Can't see the rules channel");

    expect(result).toEqual({
      ok: true,
      value: {
        channelId: "chan-1",
        sequenceNumber: 1,
        creatorId: "user-1",
        creatorName: "Robin",
        reason: "Can't see the rules channel",
        status: "open",
        createdAt: "2025-02-14T10:00:00.000Z",
        participantIds: [],
      },
    });

    const channel = platform.createdChannels[0];
    expect(channel?.name).toBe("🎟️-ticket-0001");
    expect(channel?.topic).toBe("Ticket #0001 - opened by Robin");
    expect(channel?.overwrites).toEqual([
      { targetId: GUILD_ID, targetType: "role", allow: [], deny: ["view"] },
      { targetId: "user-1", targetType: "member", allow: ["view", "send", "readHistory"], deny: [] },
      { targetId: "bot-1", targetType: "member", allow: ["view", "send", "readHistory"], deny: [] },
      { targetId: "role-manager", targetType: "role", allow: ["view", "send", "readHistory"], deny: [] },
    ]);
    expect(platform.sent[0]?.channelId).toBe("chan-1");
    expect(platform.sent[0]?.payload.embeds?.[0]?.title).toBe("🎟️ Ticket #0001");
    expect(store.load(ticketsRecordSet).counter).toBe(1);
  });

  it("hands out strictly increasing numbers to concurrent requests", async () => {
    const results = await Promise.all([
      workflow.create(GUILD_ID, member({ id: "u1" })),
      workflow.create(GUILD_ID, member({ id: "u2" })),
      workflow.create(GUILD_ID, member({ id: "u3" })),
    ]);

    const numbers = results.map((r) => (r.ok ? r.value.sequenceNumber : 0)).sort();
    expect(numbers).toEqual([1, 2, 3]);
    expect(Object.keys(store.load(ticketsRecordSet).tickets)).toHaveLength(3);
  });

  it("keeps numbering after a restart reloads the store from disk", async () => {
    const temp = createTempJsonStore();
    try {
      const before = setup(null, temp.store);
      const first = await before.workflow.create(GUILD_ID, member({ id: "u1" }));
      const second = await before.workflow.create(GUILD_ID, member({ id: "u2" }));
      temp.store.close();

      const after = setup(null, new JsonFileRecordStore(temp.dir));
      const third = await after.workflow.create(GUILD_ID, member({ id: "u3" }));

      expect([first, second, third].map((r) => (r.ok ? r.value.sequenceNumber : 0))).toEqual([1, 2, 3]);
      expect(after.platform.createdChannels[0]?.name).toBe("🎟️-ticket-0003");
    } finally {
      temp.cleanup();
    }
  });

  it("removes the new channel when the ticket record cannot be saved", async () => {
    const inner = createMemoryStore();
    // 1st tickets write draws the number, 2nd stores the record
    const { platform, workflow } = setup(null, failingUpdates(inner, "tickets", 2));

    const result = await workflow.create(GUILD_ID, member());

    expect(result).toEqual({
      ok: false,
      error: { kind: "transient_io", retryable: false, message: "A storage error occurred." },
    });
    expect(platform.createdChannels.map((c) => c.channelId)).toEqual(["chan-1"]);
    expect(platform.deletedChannels).toEqual([{ channelId: "chan-1", reason: "Ticket record could not be saved" }]);
    expect(platform.sent).toEqual([]);
    expect(inner.load(ticketsRecordSet)).toEqual({ counter: 1, tickets: {} });
  });

  it("uses the default reason when none is given", async () => {
    const result = await workflow.create(GUILD_ID, member(), "   ");
    expect(result.ok && result.value.reason).toBe("No reason given");
  });

  it("rejects an oversized reason", async () => {
    const result = await workflow.create(GUILD_ID, member(), "r".repeat(513));
    expect(result).toEqual({
      ok: false,
      error: { kind: "validation", field: "reason", message: "Keep the reason under 512 characters." },
    });
    expect(store.load(ticketsRecordSet).counter).toBe(0);
  });

  it("burns the number when the channel cannot be created", async () => {
    platform.failWith("createChannel", "forbidden");
    const failed = await workflow.create(GUILD_ID, member());
    expect(!failed.ok && failed.error).toEqual({
      kind: "external_forbidden",
      action: "create the ticket channel",
      remediation: "Give me Manage Channels and Manage Roles.",
      message: "I don't have permission to create the ticket channel.",
    });

    platform.clearFailure("createChannel");
    const next = await workflow.create(GUILD_ID, member());
    expect(next.ok && next.value.sequenceNumber).toBe(2);
    expect(Object.keys(store.load(ticketsRecordSet).tickets)).toHaveLength(1);
  });

  it("still opens the ticket when roles cannot be listed", async () => {
    platform.failWith("listRoles", "failed");
    const result = await workflow.create(GUILD_ID, member());
    expect(result.ok).toBe(true);
    expect(platform.createdChannels[0]?.overwrites).toHaveLength(3);
  });
});

describe("TicketWorkflow.addParticipant", () => {
  it("grants access, records the participant and posts a notice", async () => {
    const { store, platform, workflow } = setup();
    await workflow.create(GUILD_ID, member());

    const result = await workflow.addParticipant("chan-1", staff(), { id: "user-7", displayName: "Jules" });

    expect(result.ok && result.value.participantIds).toEqual(["user-7"]);
    expect(platform.grants).toEqual([
      {
        channelId: "chan-1",
        grant: { targetId: "user-7", targetType: "member", allow: ["view", "send", "readHistory"], deny: [] },
      },
    ]);
    expect(platform.sent.at(-1)?.payload.embeds?.[0]?.description).toBe("<@user-7> was added to this ticket by Morgan.");
    expect(store.load(ticketsRecordSet).tickets["chan-1"]?.participantIds).toEqual(["user-7"]);
  });

  it("does not list a participant twice", async () => {
    const { workflow } = setup();
    await workflow.create(GUILD_ID, member());
    await workflow.addParticipant("chan-1", staff(), { id: "user-7", displayName: "Jules" });
    const again = await workflow.addParticipant("chan-1", staff(), { id: "user-7", displayName: "Jules" });
    expect(again.ok && again.value.participantIds).toEqual(["user-7"]);
  });

  it("only works inside an open ticket", async () => {
    const { workflow } = setup();
    const result = await workflow.addParticipant("chan-general", staff(), { id: "user-7", displayName: "Jules" });
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "not_ticket_channel",
        channelId: "chan-general",
        message: "This command only works inside an open ticket channel.",
      },
    });
  });

  it("is staff only", async () => {
    const { workflow } = setup();
    const result = await workflow.addParticipant("chan-1", member(), { id: "user-7", displayName: "Jules" });
    expect(!result.ok && result.error.kind).toBe("permission");
  });
});

describe("TicketWorkflow.close", () => {
  it("marks the ticket closed, archives the transcript and schedules deletion", async () => {
    const { store, platform, workflow } = setup();
    await workflow.create(GUILD_ID, member(), "Lost my role");
    platform.history["chan-1"] = [
      historyMessage({ authorName: "ModDesk", authorIsBot: true, hasEmbeds: true }),
      historyMessage({ content: "I lost my role after the update" }),
      historyMessage({ authorName: "ModDesk", authorIsBot: true, content: "typing..." }),
      historyMessage({ authorId: "staff-1", authorName: "Morgan", content: "Fixed, try now" }),
    ];

    const result = await workflow.close(GUILD_ID, "chan-1", staff());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.record).toMatchObject({
      status: "closed",
      closedBy: "staff-1",
      closedAt: "2025-02-14T10:00:00.000Z",
    });
    expect(result.value.transcript).toEqual({ archived: true, messageCount: 3 });
    expect(result.value.effects).toEqual([
      { type: "deleteChannelLater", channelId: "chan-1", delayMs: 3_000, reason: "Ticket #0001 closed by Morgan" },
    ]);
    expect(store.load(ticketsRecordSet).tickets["chan-1"]?.status).toBe("closed");

    const archived = platform.sent.filter((m) => m.channelId === "chan-archive");
    expect(archived).toHaveLength(2);
    expect(archived[0]?.payload.embeds?.[0]?.fields).toContainEqual({ name: "Total messages", value: "3", inline: true });
    const file = archived[1]?.payload.files?.[0];
    expect(file?.name).toBe("ticket-0001-transcript.txt");
    expect(file?.content.split("\n").slice(-3)).toEqual([
      "[14/02/2025 10:01:02] ModDesk: [embed/attachment]",
      "[14/02/2025 10:01:02] Robin: I lost my role after the update",
      "[14/02/2025 10:01:02] Morgan: Fixed, try now",
    ]);
    // Deletion is the caller's job
    expect(platform.deletedChannels).toEqual([]);
  });

  it("uses the configured archive channel id over the name lookup", async () => {
    const { platform, workflow } = setup("chan-configured");
    await workflow.create(GUILD_ID, member());

    await workflow.close(GUILD_ID, "chan-1", staff());

    expect(platform.callsTo("findChannelByName")).toEqual([]);
    expect(platform.sent.at(-1)?.channelId).toBe("chan-configured");
  });

  it("posts only the summary when the ticket had no messages", async () => {
    const { platform, workflow } = setup();
    await workflow.create(GUILD_ID, member());

    const result = await workflow.close(GUILD_ID, "chan-1", staff());

    expect(result.ok && result.value.transcript).toEqual({ archived: true, messageCount: 0 });
    expect(platform.sent.filter((m) => m.channelId === "chan-archive")).toHaveLength(1);
  });

  it("closes anyway when the archive channel is missing", async () => {
    const { platform, workflow } = setup();
    platform.channelsByName = {};
    await workflow.create(GUILD_ID, member());

    const result = await workflow.close(GUILD_ID, "chan-1", staff());

    expect(result.ok && result.value.transcript).toEqual({ archived: false, messageCount: 0 });
    expect(result.ok && result.value.effects).toHaveLength(1);
  });

  it("reports an unknown channel with no effects", async () => {
    const { platform, workflow } = setup();
    const result = await workflow.close(GUILD_ID, "chan-unknown", staff());
    expect(result).toEqual({
      ok: false,
      error: { kind: "not_found", entity: "ticket", id: "chan-unknown", message: "There is no ticket stored for this channel." },
    });
    expect(platform.callsTo("fetchHistory")).toEqual([]);
    expect(platform.sent).toEqual([]);
    expect(platform.deletedChannels).toEqual([]);
  });

  it("refuses to close twice", async () => {
    const { workflow } = setup();
    await workflow.create(GUILD_ID, member());
    await workflow.close(GUILD_ID, "chan-1", staff());

    const again = await workflow.close(GUILD_ID, "chan-1", staff());

    expect(!again.ok && again.error).toEqual({
      kind: "already_resolved",
      id: "chan-1",
      status: "closed",
      message: "Ticket #0001 is already closed.",
    });
  });

  it("is staff only", async () => {
    const { workflow } = setup();
    await workflow.create(GUILD_ID, member());
    const result = await workflow.close(GUILD_ID, "chan-1", member());
    expect(result).toEqual({ ok: false, error: { kind: "permission", message: "You need a staff role to close tickets." } });
  });
});

describe("ticketChannelName", () => {
  it("pads the number", () => {
    expect(ticketChannelName(42)).toBe("🎟️-ticket-0042");
  });
});

describe("findByChannel", () => {
  it("returns null for channels that were never tickets", () => {
    const { workflow } = setup();
    expect(workflow.findByChannel("chan-general")).toBeNull();
  });
});
