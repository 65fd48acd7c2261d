/**
 * ModDesk — src/store/recordStore.ts
 * WHAT: Named record sets persisted as whole JSON documents (counters, strikes, suggestions, tickets).
 * WHY: Every read is a full load and every write a full overwrite of one set; the backends only
 *      differ in where the bytes live.
 * FLOWS:
 *  - load(def)          → stored value, or def.empty() when the set was never written
 *  - save(def, value)   → overwrite
 *  - update(def, fn)    → load → fn → save, synchronously, so nothing can interleave
 *
 * A stored payload that fails to parse or validate throws StoreCorruptError and is left untouched.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { z } from "zod";

export interface RecordSetDefinition<T> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  empty: () => T;
}

export interface RecordStore {
  load<T>(def: RecordSetDefinition<T>): T;
  save<T>(def: RecordSetDefinition<T>, value: T): void;
  update<T>(def: RecordSetDefinition<T>, mutate: (current: T) => T): T;
  close(): void;
}

export class StoreCorruptError extends Error {
  readonly recordSet: string;

  constructor(recordSet: string, detail: string) {
    super(`record set "${recordSet}" is unreadable: ${detail}`);
    this.name = "StoreCorruptError";
    this.recordSet = recordSet;
  }
}

/**
 * Shared parse/validate/serialize logic. Subclasses move raw JSON text in and out.
 */
export abstract class BaseRecordStore implements RecordStore {
  /** Raw payload, or null when the set has never been written. */
  protected abstract readRaw(name: string): string | null;
  /** Must replace the previous payload atomically. */
  protected abstract writeRaw(name: string, payload: string): void;
  abstract close(): void;

  load<T>(def: RecordSetDefinition<T>): T {
    const raw = this.readRaw(def.name);
    if (raw === null) {
      return def.empty();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreCorruptError(def.name, err instanceof Error ? err.message : String(err));
    }

    const parsed = def.schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "(root)";
      throw new StoreCorruptError(def.name, `${where}: ${issue?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  save<T>(def: RecordSetDefinition<T>, value: T): void {
    this.writeRaw(def.name, JSON.stringify(value, null, 2));
  }

  update<T>(def: RecordSetDefinition<T>, mutate: (current: T) => T): T {
    const next = mutate(this.load(def));
    this.save(def, next);
    return next;
  }
}
