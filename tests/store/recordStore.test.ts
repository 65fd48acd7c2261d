/**
 * ModDesk — tests/store/recordStore.test.ts
 * WHAT: Both RecordStore backends: defaults, overwrite, persistence across reopen, corruption.
 * PATTERN: SQLite runs against a temp file so reopening reads what the first handle wrote.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, afterEach } from "vitest";
import fs, { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { openDatabase } from "../../src/db/db.js";
import { JsonFileRecordStore } from "../../src/store/jsonFileRecordStore.js";
import { StoreCorruptError, type RecordStore } from "../../src/store/recordStore.js";
import { SqliteRecordStore } from "../../src/store/sqliteRecordStore.js";
import {
  countersRecordSet,
  strikesRecordSet,
  suggestionsRecordSet,
  ticketsRecordSet,
  type SuggestionsState,
  type TicketsState,
} from "../../src/store/schemas.js";
import { createRecordStore } from "../../src/store/index.js";

const dirs: string[] = [];

function tempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "moddesk-store-"));
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

interface Backend {
  name: string;
  open: (dir: string) => RecordStore;
  corrupt: (dir: string, setName: string, payload: string) => void;
}

const backends: Backend[] = [
  {
    name: "sqlite",
    open: (dir) => new SqliteRecordStore(openDatabase(join(dir, "moddesk.db"))),
    corrupt: (dir, setName, payload) => {
      const db = openDatabase(join(dir, "moddesk.db"));
      db.prepare("INSERT OR REPLACE INTO record_set (name, payload, updated_at) VALUES (?, ?, ?)").run(
        setName,
        payload,
        "2025-01-01T00:00:00.000Z"
      );
      db.close();
    },
  },
  {
    name: "json",
    open: (dir) => new JsonFileRecordStore(dir),
    corrupt: (dir, setName, payload) => writeFileSync(join(dir, `${setName}.json`), payload, "utf8"),
  },
];

const suggestions: SuggestionsState = {
  "msg-10": {
    messageId: "msg-10",
    authorId: "user-1",
    authorName: "Robin",
    text: "Weekly art prompt",
    status: "pending",
    createdAt: "2025-03-01T09:00:00.000Z",
    channelId: "chan-suggestions",
  },
  "msg-11": {
    messageId: "msg-11",
    authorId: "user-2",
    authorName: "Sam",
    text: "Quiet voice channel",
    status: "denied",
    createdAt: "2025-03-02T09:00:00.000Z",
    channelId: "chan-suggestions",
    reviewedBy: "staff-1",
    reviewedAt: "2025-03-03T10:00:00.000Z",
    finalTally: { upvotes: 2, downvotes: 5 },
    movedToResults: true,
  },
};

const tickets: TicketsState = {
  counter: 7,
  tickets: {
    "chan-70": {
      channelId: "chan-70",
      sequenceNumber: 7,
      creatorId: "user-1",
      creatorName: "Robin",
      reason: "Lost my role",
      status: "closed",
      createdAt: "2025-03-04T08:00:00.000Z",
      participantIds: ["user-3"],
      closedBy: "staff-1",
      closedAt: "2025-03-04T09:30:00.000Z",
    },
  },
};

describe.each(backends)("$name record store", (backend) => {
  it("reloads suggestion and ticket records unchanged after a reopen", () => {
    const dir = tempDir();
    const first = backend.open(dir);
    first.save(suggestionsRecordSet, suggestions);
    first.save(ticketsRecordSet, tickets);
    first.close();

    const reopened = backend.open(dir);
    expect(reopened.load(suggestionsRecordSet)).toEqual(suggestions);
    expect(reopened.load(ticketsRecordSet)).toEqual(tickets);
    reopened.close();
  });

  it("returns the empty default for a set that was never written", () => {
    const store = backend.open(tempDir());
    expect(store.load(countersRecordSet)).toEqual({ channels: {}, globals: { help: 0, suggestionReminder: 0 } });
    expect(store.load(ticketsRecordSet)).toEqual({ counter: 0, tickets: {} });
    store.close();
  });

  it("overwrites the whole set on save", () => {
    const store = backend.open(tempDir());
    store.save(strikesRecordSet, {
      "user-1": [{ severity: "minor", reason: "spam", date: "2025-01-02", issuer: "Morgan" }],
    });
    store.save(strikesRecordSet, { "user-2": [] });
    expect(store.load(strikesRecordSet)).toEqual({ "user-2": [] });
    store.close();
  });

  it("update applies the mutation to the current value and persists it", () => {
    const store = backend.open(tempDir());
    const first = store.update(ticketsRecordSet, (s) => ({ ...s, counter: s.counter + 1 }));
    const second = store.update(ticketsRecordSet, (s) => ({ ...s, counter: s.counter + 1 }));
    expect(first.counter).toBe(1);
    expect(second.counter).toBe(2);
    expect(store.load(ticketsRecordSet).counter).toBe(2);
    store.close();
  });

  it("survives a reopen", () => {
    const dir = tempDir();
    const first = backend.open(dir);
    first.save(countersRecordSet, { channels: { "chan-1": 3 }, globals: { help: 7, suggestionReminder: 1 } });
    first.close();

    const reopened = backend.open(dir);
    expect(reopened.load(countersRecordSet)).toEqual({
      channels: { "chan-1": 3 },
      globals: { help: 7, suggestionReminder: 1 },
    });
    reopened.close();
  });

  it("throws StoreCorruptError for unparsable payloads", () => {
    const dir = tempDir();
    backend.corrupt(dir, "tickets", "{ not json");
    const store = backend.open(dir);
    expect(() => store.load(ticketsRecordSet)).toThrow(StoreCorruptError);
    store.close();
  });

  it("names the failing path when the payload has the wrong shape", () => {
    const dir = tempDir();
    backend.corrupt(dir, "tickets", JSON.stringify({ counter: -1, tickets: {} }));
    const store = backend.open(dir);
    expect(() => store.load(ticketsRecordSet)).toThrow(/record set "tickets" is unreadable: counter:/);
    store.close();
  });
});

describe("JsonFileRecordStore", () => {
  it("writes pretty JSON and leaves no temp file behind", () => {
    const dir = tempDir();
    const store = new JsonFileRecordStore(dir);
    store.save(strikesRecordSet, {});

    expect(readFileSync(join(dir, "strikes.json"), "utf8")).toBe("{}");
    expect(existsSync(join(dir, `strikes.json.${process.pid}.tmp`))).toBe(false);
  });

  it("keeps the previous snapshot when a write fails before the swap", () => {
    const dir = tempDir();
    const store = new JsonFileRecordStore(dir);
    store.save(ticketsRecordSet, tickets);
    vi.spyOn(fs, "renameSync").mockImplementationOnce(() => {
      throw Object.assign(new Error("no space left on device"), { code: "ENOSPC" });
    });

    expect(() => store.save(ticketsRecordSet, { counter: 8, tickets: {} })).toThrow("no space left on device");

    expect(new JsonFileRecordStore(dir).load(ticketsRecordSet)).toEqual(tickets);
    expect(existsSync(join(dir, `tickets.json.${process.pid}.tmp`))).toBe(false);
  });

  it("rejects record set names that could escape the directory", () => {
    const store = new JsonFileRecordStore(tempDir());
    expect(() => store.load({ ...strikesRecordSet, name: "../strikes" })).toThrow("invalid record set name: ../strikes");
  });
});

describe("createRecordStore", () => {
  it("opens the backend named in the config", () => {
    const dir = tempDir();
    const store = createRecordStore({ backend: "json", dbPath: join(dir, "unused.db"), dataDir: dir });
    expect(store).toBeInstanceOf(JsonFileRecordStore);
    store.close();
  });
});
