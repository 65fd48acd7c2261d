/**
 * ModDesk — src/lib/constants.ts
 * WHAT: Centralized application constants for limits, emojis, colors and delays
 * WHY: Single source of truth for magic numbers
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions in messages (users, roles, everyone/here)
 * USE CASE: cards that quote user content (suggestions, strike reasons, transcripts)
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Limits =====

/** Suggestions longer than this are rejected (Discord embed descriptions cap at 4096) */
export const MAX_SUGGESTION_LENGTH = 1000;

/** Maximum reason length for strikes, tickets and bans */
export const MAX_REASON_LENGTH = 512;

/** How many entries the strike check shows */
export const RECENT_STRIKES_SHOWN = 5;

/** How many pending suggestions the staff list shows */
export const PENDING_SUGGESTIONS_SHOWN = 10;

// ===== Emojis =====

export const UPVOTE_EMOJI = "👍";
export const DOWNVOTE_EMOJI = "👎";

/** Ticket channels are named `${TICKET_CHANNEL_PREFIX}0001` */
export const TICKET_CHANNEL_PREFIX = "🎟️-ticket-";

// ===== Colors =====

export const COLOR_INFO = 0x3498db;
export const COLOR_SUCCESS = 0x2ecc71;
export const COLOR_DANGER = 0xe74c3c;
export const COLOR_WARNING = 0xff9900;
export const COLOR_NEUTRAL = 0x2f3136;

// ===== Timeouts & Delays =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;
