/**
 * ModDesk — src/store/sqliteRecordStore.ts
 * WHAT: RecordStore backed by the `record_set` table (default backend).
 * WHY: A write is a single upsert inside a transaction; readers see either the old
 *      payload or the new one, never a torn document.
 * DOCS:
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import type { SqliteHandle } from "../db/db.js";
import { BaseRecordStore } from "./recordStore.js";

type PayloadRow = { payload: string };

export class SqliteRecordStore extends BaseRecordStore {
  private readonly selectStmt: Database.Statement<[string], PayloadRow>;
  private readonly upsertStmt: Database.Statement<[string, string, string]>;
  private readonly writeTx: (name: string, payload: string) => void;

  constructor(private readonly db: SqliteHandle) {
    super();
    this.selectStmt = db.prepare<[string], PayloadRow>("SELECT payload FROM record_set WHERE name = ?");
    this.upsertStmt = db.prepare<[string, string, string]>(
      `INSERT INTO record_set (name, payload, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at`
    );
    this.writeTx = db.transaction((name: string, payload: string) => {
      this.upsertStmt.run(name, payload, new Date().toISOString());
    });
  }

  protected readRaw(name: string): string | null {
    const row = this.selectStmt.get(name);
    return row ? row.payload : null;
  }

  protected writeRaw(name: string, payload: string): void {
    this.writeTx(name, payload);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
