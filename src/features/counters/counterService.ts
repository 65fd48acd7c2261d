/**
 * ModDesk — src/features/counters/counterService.ts
 * WHAT: Threshold counters behind the periodic reminders.
 *  - per channel: messages allowed into the suggestions channel → suggestion reminder there
 *  - global "help": ordinary guild messages anywhere else → help message in that channel
 *  - global "suggestionReminder": suggestions created → reminder in the suggestions channel
 * WHY: Reaching the threshold resets the count in the same persisted write that records the
 *      increment, so a count never rests at or above its threshold and every fire is counted once.
 * FLOWS:
 *  - recordMessage(channelId) / recordHelpMessage() / recordSuggestionCreated() → CounterFire | null
 *  - reset(channelId?) → previous counts
 *  - snapshot() → current counts + thresholds
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ConfigurationError, type CounterThresholds } from "../../lib/config.js";
import type { KeyedQueue } from "../../lib/keyedQueue.js";
import { logger } from "../../lib/logger.js";
import type { RecordStore } from "../../store/recordStore.js";
import { countersRecordSet, type CounterState } from "../../store/schemas.js";

export type GlobalCounterName = keyof CounterState["globals"];

export type CounterFire =
  | { counter: "channel"; channelId: string; threshold: number }
  | { counter: GlobalCounterName; threshold: number };

export interface CounterSnapshot {
  channels: Record<string, number>;
  globals: Record<GlobalCounterName, number>;
  thresholds: CounterThresholds;
}

export interface CounterServiceDeps {
  store: RecordStore;
  queue: KeyedQueue;
  thresholds: CounterThresholds;
}

const THRESHOLD_KEYS: Record<keyof CounterThresholds, string> = {
  channelMessages: "MESSAGE_THRESHOLD",
  help: "HELP_MESSAGE_THRESHOLD",
  suggestionReminder: "SUGGESTION_REMINDER_THRESHOLD",
};

export class CounterService {
  private readonly store: RecordStore;
  private readonly queue: KeyedQueue;
  private readonly thresholds: CounterThresholds;

  constructor(deps: CounterServiceDeps) {
    const names: Array<keyof CounterThresholds> = ["channelMessages", "help", "suggestionReminder"];
    for (const name of names) {
      const value = deps.thresholds[name];
      if (!Number.isInteger(value) || value <= 0) {
        const key = THRESHOLD_KEYS[name];
        throw new ConfigurationError(key, `${key} must be a positive integer (got ${value})`);
      }
    }
    this.store = deps.store;
    this.queue = deps.queue;
    this.thresholds = { ...deps.thresholds };
  }

  recordMessage(channelId: string): Promise<CounterFire | null> {
    const threshold = this.thresholds.channelMessages;
    return this.queue.run<CounterFire | null>(`counter:channel:${channelId}`, () => {
      const after = this.store.update(countersRecordSet, (state) => {
        const next = (state.channels[channelId] ?? 0) + 1;
        return { ...state, channels: { ...state.channels, [channelId]: next >= threshold ? 0 : next } };
      });
      // An increment only lands on zero when it reached the threshold
      if (after.channels[channelId] !== 0) return null;
      logger.info({ evt: "counter_fire", counter: "channel", channelId, threshold }, "[counters] channel threshold reached");
      return { counter: "channel", channelId, threshold };
    });
  }

  recordHelpMessage(): Promise<CounterFire | null> {
    return this.bumpGlobal("help", this.thresholds.help);
  }

  recordSuggestionCreated(): Promise<CounterFire | null> {
    return this.bumpGlobal("suggestionReminder", this.thresholds.suggestionReminder);
  }

  /**
   * Operator reset. With a channel id, resets that channel; without, every channel
   * counter. Global counters are left alone.
   */
  reset(channelId?: string): Promise<Record<string, number>> {
    const key = channelId ? `counter:channel:${channelId}` : "counter:channels:all";
    return this.queue.run(key, () => {
      // load and save with nothing awaited in between
      const state = this.store.load(countersRecordSet);
      const previous = channelId ? { [channelId]: state.channels[channelId] ?? 0 } : { ...state.channels };
      const channels = channelId ? { ...state.channels, [channelId]: 0 } : {};
      this.store.save(countersRecordSet, { ...state, channels });
      logger.info({ evt: "counter_reset", channelId: channelId ?? "all", previous }, "[counters] reset");
      return previous;
    });
  }

  snapshot(): CounterSnapshot {
    const state = this.store.load(countersRecordSet);
    return {
      channels: { ...state.channels },
      globals: { ...state.globals },
      thresholds: { ...this.thresholds },
    };
  }

  private bumpGlobal(name: GlobalCounterName, threshold: number): Promise<CounterFire | null> {
    return this.queue.run<CounterFire | null>(`counter:global:${name}`, () => {
      const after = this.store.update(countersRecordSet, (state) => {
        const next = state.globals[name] + 1;
        return { ...state, globals: { ...state.globals, [name]: next >= threshold ? 0 : next } };
      });
      if (after.globals[name] !== 0) return null;
      logger.info({ evt: "counter_fire", counter: name, threshold }, `[counters] ${name} threshold reached`);
      return { counter: name, threshold };
    });
  }
}
