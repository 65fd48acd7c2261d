/**
 * ModDesk — src/features/suggestions/workflow.ts
 * WHAT: Suggestion lifecycle: create → pending → accepted | denied (exactly one transition).
 * WHY: Members propose ideas and vote with 👍/👎; staff resolve them and the final tally is
 *      frozen on the record and the results card.
 * FLOWS:
 *  - create(author, text, channelId): post card → add vote reactions → store pending record
 *    → bump the suggestion-reminder counter (fire ⇒ reminder effect for the suggestions channel)
 *  - resolve(messageId, decision, reviewer): staff only → [queue suggestion:<id>] load → fetch live
 *    message → tally → relocate to results channel (best effort) → persist transition once
 *  - listPending(): oldest first
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { DOWNVOTE_EMOJI, MAX_SUGGESTION_LENGTH, UPVOTE_EMOJI } from "../../lib/constants.js";
import type { KeyedQueue } from "../../lib/keyedQueue.js";
import { logger, redact } from "../../lib/logger.js";
import { fail, ok, permissionDenied, runGuarded, type Outcome } from "../../lib/outcome.js";
import { hasRequiredRole, type Actor, type PrivilegedRoleConfig } from "../../lib/roles.js";
import { failureFromPlatform } from "../../platform/failures.js";
import type { FetchedMessage, Platform } from "../../platform/types.js";
import type { RecordStore } from "../../store/recordStore.js";
import { suggestionsRecordSet, type SuggestionRecord, type VoteTally } from "../../store/schemas.js";
import type { CounterService } from "../counters/counterService.js";
import type { SideEffect } from "../engine/effects.js";
import { buildResolvedSuggestionEmbed, buildSuggestionEmbed } from "./embeds.js";

export type SuggestionDecision = "accept" | "deny";

export interface SuggestionCreated {
  record: SuggestionRecord;
  effects: SideEffect[];
}

export interface SuggestionResolved {
  record: SuggestionRecord;
  /** True when the card now lives in the results channel */
  relocated: boolean;
}

export interface SuggestionWorkflowConfig {
  suggestionChannelId: string;
  suggestionResultsChannelId: string | null;
  reminderMessage: string;
  roles: PrivilegedRoleConfig;
}

export interface SuggestionWorkflowDeps {
  store: RecordStore;
  queue: KeyedQueue;
  platform: Platform;
  counters: CounterService;
  config: SuggestionWorkflowConfig;
  now?: () => Date;
}

/**
 * Reaction counts minus the bot's own seed reaction, never below zero.
 */
export function tallyVotes(message: FetchedMessage): VoteTally {
  const up = message.reactionCounts[UPVOTE_EMOJI] ?? 0;
  const down = message.reactionCounts[DOWNVOTE_EMOJI] ?? 0;
  return {
    upvotes: Math.max(0, up - 1),
    downvotes: Math.max(0, down - 1),
  };
}

export class SuggestionWorkflow {
  private readonly deps: SuggestionWorkflowDeps;
  private readonly now: () => Date;

  constructor(deps: SuggestionWorkflowDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  async create(author: Actor, text: string, channelId: string): Promise<Outcome<SuggestionCreated>> {
    const trimmed = text.trim();
    if (!trimmed) {
      return fail({ kind: "validation", field: "suggestion", message: "Your suggestion is empty." });
    }
    if (trimmed.length > MAX_SUGGESTION_LENGTH) {
      return fail({
        kind: "validation",
        field: "suggestion",
        message: `Suggestions are limited to ${MAX_SUGGESTION_LENGTH} characters.`,
      });
    }

    const { platform, store, queue, counters, config } = this.deps;

    return runGuarded<SuggestionCreated>("suggestions.create", { authorId: author.id, channelId }, async () => {
      const createdAt = this.now().toISOString();
      const card = buildSuggestionEmbed({ authorName: author.displayName, text: trimmed, createdAt });

      const posted = await platform.sendMessage(channelId, { embeds: [card] });
      if (!posted.ok) {
        return fail(
          failureFromPlatform(posted, {
            action: "post in this channel",
            remediation: "Give me Send Messages and Embed Links here.",
            entity: "channel",
            id: channelId,
          })
        );
      }
      const messageId = posted.value.messageId;

      for (const emoji of [UPVOTE_EMOJI, DOWNVOTE_EMOJI]) {
        const reacted = await platform.addReaction(channelId, messageId, emoji);
        if (!reacted.ok) {
          logger.warn(
            { evt: "suggestion_reaction_failed", messageId, emoji, failure: reacted.kind },
            "[suggestions] could not add vote reaction"
          );
        }
      }

      const record: SuggestionRecord = {
        messageId,
        authorId: author.id,
        authorName: author.displayName,
        text: trimmed,
        status: "pending",
        createdAt,
        channelId,
      };
      try {
        await queue.run(`suggestion:${messageId}`, () =>
          store.update(suggestionsRecordSet, (all) => ({ ...all, [messageId]: record }))
        );
      } catch (err) {
        // A card without a record could never be resolved
        const removed = await platform.deleteMessage(channelId, messageId);
        if (!removed.ok) {
          logger.warn(
            { evt: "suggestion_orphan_card", messageId, failure: removed.kind },
            "[suggestions] record write failed and the card could not be removed"
          );
        }
        throw err;
      }

      logger.info(
        { evt: "suggestion_created", messageId, authorId: author.id, text: redact(trimmed) },
        "[suggestions] created"
      );

      const effects: SideEffect[] = [];
      const fire = await counters.recordSuggestionCreated();
      if (fire) {
        effects.push({
          type: "sendMessage",
          channelId: config.suggestionChannelId,
          payload: { content: config.reminderMessage },
        });
      }

      return ok({ record, effects });
    });
  }

  resolve(messageId: string, decision: SuggestionDecision, reviewer: Actor): Promise<Outcome<SuggestionResolved>> {
    const { store, queue, config } = this.deps;

    if (!hasRequiredRole(reviewer, config.roles)) {
      return Promise.resolve(permissionDenied(`${decision} suggestions`));
    }

    return runGuarded<SuggestionResolved>(
      "suggestions.resolve",
      { messageId, decision, reviewerId: reviewer.id },
      () =>
        queue.run(`suggestion:${messageId}`, async (): Promise<Outcome<SuggestionResolved>> => {
          const existing = store.load(suggestionsRecordSet)[messageId];
          if (!existing) {
            return fail({
              kind: "not_found",
              entity: "suggestion",
              id: messageId,
              message: `No suggestion is stored for message ${messageId}.`,
            });
          }
          if (existing.status !== "pending") {
            return fail({
              kind: "already_resolved",
              id: messageId,
              status: existing.status,
              message: `That suggestion was already ${existing.status}.`,
            });
          }

          const live = await this.deps.platform.fetchMessage(existing.channelId, messageId);
          if (!live.ok) {
            return fail(
              failureFromPlatform(live, {
                action: "read the suggestion message",
                remediation: "Give me View Channel and Read Message History in the suggestion's channel.",
                entity: "message",
                id: messageId,
              })
            );
          }

          const resolved: SuggestionRecord = {
            ...existing,
            status: decision === "accept" ? "accepted" : "denied",
            reviewedBy: reviewer.id,
            reviewedAt: this.now().toISOString(),
            finalTally: tallyVotes(live.value),
          };

          // The transition is persisted once, with the card's final location
          const relocated = await this.relocate(resolved);
          const record: SuggestionRecord = { ...resolved, movedToResults: relocated };
          try {
            store.update(suggestionsRecordSet, (all) => ({ ...all, [messageId]: record }));
          } catch (err) {
            logger.warn(
              { evt: "suggestion_transition_unsaved", messageId, relocated },
              "[suggestions] card updated but the resolution was not saved"
            );
            throw err;
          }

          logger.info(
            {
              evt: "suggestion_resolved",
              messageId,
              status: record.status,
              reviewerId: reviewer.id,
              relocated,
              ...record.finalTally,
            },
            "[suggestions] resolved"
          );

          return ok({ record, relocated });
        })
    );
  }

  /**
   * Oldest pending suggestions first. Returns the slice and the total pending count.
   */
  listPending(limit: number): { pending: SuggestionRecord[]; total: number } {
    const all = Object.values(this.deps.store.load(suggestionsRecordSet))
      .filter((s) => s.status === "pending")
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return { pending: all.slice(0, limit), total: all.length };
  }

  /**
   * Post the resolved card to the results channel and remove the original. When there is
   * no results channel, or posting there fails, edit the original in place instead.
   */
  private async relocate(record: SuggestionRecord): Promise<boolean> {
    const { platform, config } = this.deps;
    const card = buildResolvedSuggestionEmbed(record);

    if (config.suggestionResultsChannelId) {
      const posted = await platform.sendMessage(config.suggestionResultsChannelId, { embeds: [card] });
      if (posted.ok) {
        const removed = await platform.deleteMessage(record.channelId, record.messageId);
        if (!removed.ok && removed.kind !== "not_found") {
          logger.warn(
            { evt: "suggestion_original_delete_failed", messageId: record.messageId, failure: removed.kind },
            "[suggestions] results card posted but original could not be deleted"
          );
        }
        return true;
      }
      logger.warn(
        {
          evt: "suggestion_results_post_failed",
          messageId: record.messageId,
          resultsChannelId: config.suggestionResultsChannelId,
          failure: posted.kind,
        },
        "[suggestions] results channel unavailable, editing original in place"
      );
    } else {
      logger.warn(
        { evt: "suggestion_results_unconfigured", messageId: record.messageId },
        "[suggestions] no results channel configured, editing original in place"
      );
    }

    const edited = await platform.editMessage(record.channelId, record.messageId, { embeds: [card] });
    if (!edited.ok) {
      logger.warn(
        { evt: "suggestion_edit_failed", messageId: record.messageId, failure: edited.kind },
        "[suggestions] could not edit original card; record is resolved regardless"
      );
    }
    return false;
  }
}
