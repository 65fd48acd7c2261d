// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Picks the record store backend from engine config.

import { openDatabase } from "../db/db.js";
import type { EngineConfig } from "../lib/config.js";
import { logger } from "../lib/logger.js";
import { JsonFileRecordStore } from "./jsonFileRecordStore.js";
import type { RecordStore } from "./recordStore.js";
import { SqliteRecordStore } from "./sqliteRecordStore.js";

export function createRecordStore(config: EngineConfig["store"]): RecordStore {
  if (config.backend === "json") {
    logger.info({ dataDir: config.dataDir }, "[store] using JSON files");
    return new JsonFileRecordStore(config.dataDir);
  }
  return new SqliteRecordStore(openDatabase(config.dbPath));
}
