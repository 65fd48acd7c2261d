// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/features/suggestions/embeds.ts
 * WHAT: Card builders for the suggestion pipeline
 * WHY: Centralized rendering so the pending card and the resolved card stay consistent
 */

import { COLOR_DANGER, COLOR_INFO, COLOR_SUCCESS, DOWNVOTE_EMOJI, UPVOTE_EMOJI } from "../../lib/constants.js";
import { dayMonthYearTime } from "../../lib/dt.js";
import type { EmbedSpec } from "../../platform/types.js";
import type { SuggestionRecord, SuggestionStatus } from "../../store/schemas.js";

// ============================================================================
// Constants
// ============================================================================

const STATUS_COLOR: Record<SuggestionStatus, number> = {
  pending: COLOR_INFO,
  accepted: COLOR_SUCCESS,
  denied: COLOR_DANGER,
};

const STATUS_LABEL: Record<SuggestionStatus, string> = {
  pending: "⏳ Pending",
  accepted: "✅ Accepted",
  denied: "❌ Denied",
};

// ============================================================================
// Embed Builders
// ============================================================================

/**
 * buildSuggestionEmbed
 * WHAT: The card posted when a suggestion is created. Members vote with reactions.
 */
export function buildSuggestionEmbed(
  suggestion: Pick<SuggestionRecord, "authorName" | "text" | "createdAt">
): EmbedSpec {
  return {
    title: "💡 New suggestion",
    description: suggestion.text,
    color: STATUS_COLOR.pending,
    author: suggestion.authorName,
    footer: `React with ${UPVOTE_EMOJI} or ${DOWNVOTE_EMOJI} to vote • Status: Pending`,
    timestamp: suggestion.createdAt,
  };
}

/**
 * buildResolvedSuggestionEmbed
 * WHAT: Card for an accepted/denied suggestion, with reviewer and final tally.
 * Used both for the results channel and for editing the original in place.
 */
export function buildResolvedSuggestionEmbed(suggestion: SuggestionRecord): EmbedSpec {
  const tally = suggestion.finalTally ?? { upvotes: 0, downvotes: 0 };
  const reviewedAt = suggestion.reviewedAt ? dayMonthYearTime(new Date(suggestion.reviewedAt)) : "unknown";

  return {
    title: `💡 Suggestion ${suggestion.status === "accepted" ? "accepted" : "denied"}`,
    description: suggestion.text,
    color: STATUS_COLOR[suggestion.status],
    author: suggestion.authorName,
    fields: [
      { name: "Status", value: STATUS_LABEL[suggestion.status], inline: true },
      { name: "Reviewed by", value: suggestion.reviewedBy ? `<@${suggestion.reviewedBy}>` : "unknown", inline: true },
      { name: "Reviewed", value: `${reviewedAt} UTC`, inline: true },
      {
        name: "Final votes",
        value: `${UPVOTE_EMOJI} ${tally.upvotes}  ${DOWNVOTE_EMOJI} ${tally.downvotes}`,
        inline: false,
      },
    ],
    footer: `Suggested by ${suggestion.authorName}`,
    timestamp: suggestion.createdAt,
  };
}

/**
 * buildPendingListEmbed
 * WHAT: Staff overview of suggestions still waiting for a decision, oldest first.
 */
export function buildPendingListEmbed(pending: SuggestionRecord[], totalPending: number): EmbedSpec {
  if (pending.length === 0) {
    return {
      title: "📝 Pending suggestions",
      color: COLOR_INFO,
      description: "Nothing waiting for review.",
    };
  }

  return {
    title: "📝 Pending suggestions",
    color: COLOR_INFO,
    fields: pending.map((s) => ({
      name: `${s.messageId} · ${s.authorName}`,
      value: s.text.length > 100 ? `${s.text.slice(0, 97)}...` : s.text,
    })),
    footer: `Showing ${pending.length} of ${totalPending} · resolve with /suggest accept or /suggest deny`,
  };
}
