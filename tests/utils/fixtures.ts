/**
 * ModDesk — tests/utils/fixtures.ts
 * WHAT: Actors, engine config and isolated stores for tests.
 * USAGE:
 *  import { staff, member, testConfig, createMemoryStore } from "../utils/fixtures.js";
 *  const store = createMemoryStore();
 *  const flaky = failingUpdates(store, "tickets", 2); // second tickets write throws
 *
 * PATTERN: Every test gets its own in-memory SQLite database or temp directory, so
 * files can run in parallel without sharing state.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openDatabase } from "../../src/db/db.js";
import { loadEngineConfig, type EngineConfig } from "../../src/lib/config.js";
import type { Actor } from "../../src/lib/roles.js";
import { JsonFileRecordStore } from "../../src/store/jsonFileRecordStore.js";
import type { RecordSetDefinition, RecordStore } from "../../src/store/recordStore.js";
import { SqliteRecordStore } from "../../src/store/sqliteRecordStore.js";

export const GUILD_ID = "guild-1";
export const SUGGESTIONS_CHANNEL = "chan-suggestions";
export const RESULTS_CHANNEL = "chan-results";
export const WELCOME_CHANNEL = "chan-welcome";

export function staff(overrides: Partial<Actor> = {}): Actor {
  return { id: "staff-1", displayName: "Morgan", roleNames: ["Manager"], ...overrides };
}

export function member(overrides: Partial<Actor> = {}): Actor {
  return { id: "user-1", displayName: "Robin", roleNames: ["Member"], ...overrides };
}

/** Engine config over a minimal env map; pass keys to override. */
export function testConfig(env: Record<string, string | undefined> = {}): EngineConfig {
  return loadEngineConfig({
    SUGGESTION_CHANNEL_ID: SUGGESTIONS_CHANNEL,
    SUGGESTION_RESULTS_CHANNEL_ID: RESULTS_CHANNEL,
    WELCOME_CHANNEL_ID: WELCOME_CHANNEL,
    STORE_BACKEND: "sqlite",
    DB_PATH: ":memory:",
    ...env,
  });
}

export function createMemoryStore(): SqliteRecordStore {
  return new SqliteRecordStore(openDatabase(":memory:"));
}

export interface TempDirStore {
  store: JsonFileRecordStore;
  dir: string;
  cleanup: () => void;
}

export function createTempJsonStore(): TempDirStore {
  const dir = mkdtempSync(join(tmpdir(), "moddesk-test-"));
  return {
    store: new JsonFileRecordStore(dir),
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/**
 * Delegates to `inner`, except that the `failOn`-th update of record set `setName`
 * throws the way better-sqlite3 reports a disk failure.
 */
export function failingUpdates(inner: RecordStore, setName: string, failOn: number): RecordStore {
  let seen = 0;
  return {
    load<T>(def: RecordSetDefinition<T>): T {
      return inner.load(def);
    },
    save<T>(def: RecordSetDefinition<T>, value: T): void {
      inner.save(def, value);
    },
    update<T>(def: RecordSetDefinition<T>, mutate: (current: T) => T): T {
      if (def.name === setName) {
        seen += 1;
        if (seen === failOn) {
          throw Object.assign(new Error("disk I/O error"), { code: "SQLITE_IOERR" });
        }
      }
      return inner.update(def, mutate);
    },
    close: () => inner.close(),
  };
}
