/**
 * ModDesk — src/features/engine/engine.ts
 * WHAT: Wires the store, the per-key queue and the platform port into every workflow.
 * WHY: One object handed to listeners and commands; tests build it over an in-memory store
 *      and a fake platform.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { EngineConfig } from "../../lib/config.js";
import { scheduleDeferred, type DeferFn } from "../../lib/deferred.js";
import { KeyedQueue } from "../../lib/keyedQueue.js";
import type { Platform } from "../../platform/types.js";
import type { RecordStore } from "../../store/recordStore.js";
import { ApplicationDecisions } from "../applications/decisions.js";
import { CounterService } from "../counters/counterService.js";
import { StrikeLedger } from "../strikes/ledger.js";
import { SuggestionWorkflow } from "../suggestions/workflow.js";
import { TicketWorkflow } from "../tickets/workflow.js";
import { postGreeting, type GreetingKind, type GreetingMember } from "../welcome.js";
import { MessageDispatcher, type InboundMessage } from "./dispatcher.js";
import { runEffects, type EffectReport, type SideEffect } from "./effects.js";

export interface EngineDeps {
  config: EngineConfig;
  store: RecordStore;
  platform: Platform;
  queue?: KeyedQueue;
  defer?: DeferFn;
  now?: () => Date;
}

export interface Engine {
  readonly config: EngineConfig;
  readonly store: RecordStore;
  readonly platform: Platform;
  readonly queue: KeyedQueue;
  readonly counters: CounterService;
  readonly strikes: StrikeLedger;
  readonly suggestions: SuggestionWorkflow;
  readonly tickets: TicketWorkflow;
  readonly applications: ApplicationDecisions;
  readonly dispatcher: MessageDispatcher;
  /** Dispatch a posted message and apply the resulting effects. */
  handleMessage(message: InboundMessage): Promise<EffectReport>;
  applyEffects(effects: readonly SideEffect[]): Promise<EffectReport>;
  greet(kind: GreetingKind, member: GreetingMember): Promise<boolean>;
}

/** Throws ConfigurationError when a counter threshold is invalid. */
export function createEngine(deps: EngineDeps): Engine {
  const { config, store, platform } = deps;
  const queue = deps.queue ?? new KeyedQueue();
  const defer = deps.defer ?? scheduleDeferred;

  const counters = new CounterService({ store, queue, thresholds: config.thresholds });
  const strikes = new StrikeLedger({ store, queue, now: deps.now });
  const suggestions = new SuggestionWorkflow({
    store,
    queue,
    platform,
    counters,
    config: {
      suggestionChannelId: config.suggestionChannelId,
      suggestionResultsChannelId: config.suggestionResultsChannelId,
      reminderMessage: config.reminderMessage,
      roles: config.roles,
    },
    now: deps.now,
  });
  const tickets = new TicketWorkflow({
    store,
    queue,
    platform,
    config: {
      roles: config.roles,
      transcriptChannelId: config.transcriptChannelId,
      transcriptChannelName: config.transcriptChannelName,
      ticketDeleteDelayMs: config.ticketDeleteDelayMs,
    },
    now: deps.now,
  });
  const applications = new ApplicationDecisions({ platform, roles: config.roles });
  const dispatcher = new MessageDispatcher({ counters, tickets, config });

  const applyEffects = (effects: readonly SideEffect[]) => runEffects(platform, effects, defer);

  return {
    config,
    store,
    platform,
    queue,
    counters,
    strikes,
    suggestions,
    tickets,
    applications,
    dispatcher,
    applyEffects,
    async handleMessage(message) {
      const effects = await dispatcher.handleMessage(message);
      return applyEffects(effects);
    },
    greet(kind, member) {
      return postGreeting(platform, config.welcomeChannelId, kind, member);
    },
  };
}
