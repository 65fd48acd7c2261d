/**
 * ModDesk — src/features/strikes/ledger.ts
 * WHAT: Per-user disciplinary strike ledger (append, remove most recent, summarize).
 * WHY: Staff track minor/moderate/severe infractions; every change re-evaluates escalation
 *      so the issuing moderator sees immediately when someone crosses a line.
 * FLOWS:
 *  - addStrike(target, severity, reason, issuer) → entry + counts + escalation
 *  - removeLastStrike(target) → removed entry | not_found when the ledger is empty
 *  - summarize(target) → counts, escalation, last 5 entries newest first
 *
 * Mutations for one user run under the `strikes:<userId>` queue key.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { RECENT_STRIKES_SHOWN, MAX_REASON_LENGTH } from "../../lib/constants.js";
import { isoDate } from "../../lib/dt.js";
import type { KeyedQueue } from "../../lib/keyedQueue.js";
import { logger, redact } from "../../lib/logger.js";
import { fail, ok, runGuarded, type Outcome } from "../../lib/outcome.js";
import type { RecordStore } from "../../store/recordStore.js";
import { strikesRecordSet, type StrikeEntry } from "../../store/schemas.js";
import {
  classifyEscalation,
  countStrikes,
  type Escalation,
  type StrikeCounts,
  type StrikeSeverity,
} from "./escalation.js";

export interface StrikeTarget {
  id: string;
  displayName: string;
}

export interface StrikeAdded {
  entry: StrikeEntry;
  counts: StrikeCounts;
  escalation: Escalation;
  total: number;
}

export interface StrikeRemoved {
  removed: StrikeEntry;
  counts: StrikeCounts;
  escalation: Escalation;
  remaining: number;
}

export interface StrikeSummary {
  counts: StrikeCounts;
  escalation: Escalation;
  /** Most recent first */
  recent: StrikeEntry[];
  total: number;
}

export interface StrikeLedgerDeps {
  store: RecordStore;
  queue: KeyedQueue;
  now?: () => Date;
}

export class StrikeLedger {
  private readonly store: RecordStore;
  private readonly queue: KeyedQueue;
  private readonly now: () => Date;

  constructor(deps: StrikeLedgerDeps) {
    this.store = deps.store;
    this.queue = deps.queue;
    this.now = deps.now ?? (() => new Date());
  }

  addStrike(
    target: StrikeTarget,
    severity: StrikeSeverity,
    reason: string,
    issuerName: string
  ): Promise<Outcome<StrikeAdded>> {
    const trimmed = reason.trim();
    if (!trimmed) {
      return Promise.resolve(fail({ kind: "validation", field: "reason", message: "A strike needs a reason." }));
    }
    if (trimmed.length > MAX_REASON_LENGTH) {
      return Promise.resolve(
        fail({
          kind: "validation",
          field: "reason",
          message: `Keep the reason under ${MAX_REASON_LENGTH} characters.`,
        })
      );
    }

    return runGuarded<StrikeAdded>("strikes.add", { targetId: target.id, severity }, () =>
      this.queue.run(`strikes:${target.id}`, async () => {
        const entry: StrikeEntry = {
          severity,
          reason: trimmed,
          date: isoDate(this.now()),
          issuer: issuerName,
        };
        const state = this.store.update(strikesRecordSet, (current) => ({
          ...current,
          [target.id]: [...(current[target.id] ?? []), entry],
        }));
        const entries = state[target.id] ?? [];
        const counts = countStrikes(entries);
        const escalation = classifyEscalation(counts);

        logger.info(
          {
            evt: "strike_added",
            targetId: target.id,
            severity,
            issuer: issuerName,
            reason: redact(trimmed),
            level: escalation.level,
          },
          "[strikes] strike added"
        );

        return ok<StrikeAdded>({ entry, counts, escalation, total: entries.length });
      })
    );
  }

  removeLastStrike(target: StrikeTarget): Promise<Outcome<StrikeRemoved>> {
    return runGuarded<StrikeRemoved>("strikes.remove", { targetId: target.id }, () =>
      this.queue.run(`strikes:${target.id}`, async () => {
        const state = this.store.load(strikesRecordSet);
        const entries = state[target.id] ?? [];
        const removed = entries[entries.length - 1];
        if (!removed) {
          return fail({
            kind: "not_found",
            entity: "strikes",
            id: target.id,
            message: `${target.displayName} has no strikes to remove.`,
          });
        }

        const remainingEntries = entries.slice(0, -1);
        this.store.save(strikesRecordSet, { ...state, [target.id]: remainingEntries });
        const counts = countStrikes(remainingEntries);

        logger.info(
          { evt: "strike_removed", targetId: target.id, severity: removed.severity },
          "[strikes] most recent strike removed"
        );

        return ok<StrikeRemoved>({
          removed,
          counts,
          escalation: classifyEscalation(counts),
          remaining: remainingEntries.length,
        });
      })
    );
  }

  summarize(targetId: string): Promise<Outcome<StrikeSummary>> {
    return runGuarded<StrikeSummary>("strikes.summarize", { targetId }, async () => {
      const entries = this.store.load(strikesRecordSet)[targetId] ?? [];
      const counts = countStrikes(entries);
      return ok({
        counts,
        escalation: classifyEscalation(counts),
        recent: entries.slice(-RECENT_STRIKES_SHOWN).reverse(),
        total: entries.length,
      });
    });
  }
}
