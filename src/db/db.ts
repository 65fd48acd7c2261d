/**
 * ModDesk — src/db/db.ts
 * WHAT: SQLite connection bootstrap and schema creation for the record-set store.
 * WHY: Centralizes better‑sqlite3 setup and PRAGMAs so the store just receives a ready handle.
 * FLOWS:
 *  - openDatabase(path) → set PRAGMAs → ensureSchema → handle
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 *
 * NOTE: better‑sqlite3 is synchronous by design; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";

const DB_BUSY_TIMEOUT_MS = 5000;

export type SqliteHandle = Database.Database;

/**
 * Open (or create) the database file. Pass ":memory:" for an in-process database.
 */
export function openDatabase(dbPath: string): SqliteHandle {
  const inMemory = dbPath === ":memory:";
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath, { fileMustExist: false });

  if (!inMemory) {
    // WAL: a commit becomes visible atomically; a crash mid-write leaves the last commit intact
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
  }
  // Busy timeout to fail-soft during brief contention rather than throwing immediately
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);

  ensureSchema(db);
  logger.info({ dbPath }, "SQLite opened");
  return db;
}

export function ensureSchema(db: SqliteHandle): void {
  // record_set: one row per named record set, payload is the full JSON document
  db.prepare(
    `
    CREATE TABLE IF NOT EXISTS record_set (
      name TEXT PRIMARY KEY,
      payload TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `
  ).run();
}
