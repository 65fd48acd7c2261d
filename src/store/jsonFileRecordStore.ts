/**
 * ModDesk — src/store/jsonFileRecordStore.ts
 * WHAT: RecordStore backed by one `<name>.json` file per record set.
 * HOW: Write to a sibling temp file, then rename over the target. rename() within one
 *      directory is atomic, so a crash mid-write leaves the previous complete file.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import path from "node:path";
import { BaseRecordStore } from "./recordStore.js";

const SAFE_NAME_RE = /^[a-z][a-z0-9_-]*$/i;

export class JsonFileRecordStore extends BaseRecordStore {
  constructor(private readonly dataDir: string) {
    super();
    fs.mkdirSync(dataDir, { recursive: true });
  }

  private fileFor(name: string): string {
    if (!SAFE_NAME_RE.test(name)) {
      throw new Error(`invalid record set name: ${name}`);
    }
    return path.join(this.dataDir, `${name}.json`);
  }

  protected readRaw(name: string): string | null {
    const file = this.fileFor(name);
    if (!fs.existsSync(file)) {
      return null;
    }
    return fs.readFileSync(file, "utf8");
  }

  protected writeRaw(name: string, payload: string): void {
    const file = this.fileFor(name);
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmp, payload, "utf8");
      fs.renameSync(tmp, file);
    } catch (err) {
      fs.rmSync(tmp, { force: true });
      throw err;
    }
  }

  close(): void {
    // Nothing held open between calls
  }
}
