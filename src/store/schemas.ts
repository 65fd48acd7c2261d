// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/store/schemas.ts
 * WHAT: zod schemas and empty defaults for the four record sets.
 * Identifiers are Discord snowflakes kept as strings; timestamps are ISO-8601 strings.
 */

import { z } from "zod";
import type { RecordSetDefinition } from "./recordStore.js";

const count = z.number().int().nonnegative();

// ===== counters =====

export const counterStateSchema = z.object({
  channels: z.record(z.string(), count),
  globals: z.object({
    help: count,
    suggestionReminder: count,
  }),
});

export type CounterState = z.infer<typeof counterStateSchema>;

export const countersRecordSet: RecordSetDefinition<CounterState> = {
  name: "counters",
  schema: counterStateSchema,
  empty: () => ({ channels: {}, globals: { help: 0, suggestionReminder: 0 } }),
};

// ===== strikes =====

export const strikeSeveritySchema = z.enum(["minor", "moderate", "severe"]);

export const strikeEntrySchema = z.object({
  severity: strikeSeveritySchema,
  reason: z.string(),
  /** YYYY-MM-DD */
  date: z.string(),
  /** Display name of the staff member who issued it */
  issuer: z.string(),
});

export type StrikeEntry = z.infer<typeof strikeEntrySchema>;

/** userId → entries, oldest first */
export const strikesSchema = z.record(z.string(), z.array(strikeEntrySchema));

export type StrikesState = z.infer<typeof strikesSchema>;

export const strikesRecordSet: RecordSetDefinition<StrikesState> = {
  name: "strikes",
  schema: strikesSchema,
  empty: () => ({}),
};

// ===== suggestions =====

export const suggestionStatusSchema = z.enum(["pending", "accepted", "denied"]);

export const voteTallySchema = z.object({
  upvotes: count,
  downvotes: count,
});

export type VoteTally = z.infer<typeof voteTallySchema>;

export const suggestionRecordSchema = z.object({
  messageId: z.string(),
  authorId: z.string(),
  authorName: z.string(),
  text: z.string(),
  status: suggestionStatusSchema,
  createdAt: z.string(),
  channelId: z.string(),
  reviewedBy: z.string().optional(),
  reviewedAt: z.string().optional(),
  finalTally: voteTallySchema.optional(),
  movedToResults: z.boolean().optional(),
});

export type SuggestionRecord = z.infer<typeof suggestionRecordSchema>;
export type SuggestionStatus = z.infer<typeof suggestionStatusSchema>;

/** messageId → record */
export const suggestionsSchema = z.record(z.string(), suggestionRecordSchema);

export type SuggestionsState = z.infer<typeof suggestionsSchema>;

export const suggestionsRecordSet: RecordSetDefinition<SuggestionsState> = {
  name: "suggestions",
  schema: suggestionsSchema,
  empty: () => ({}),
};

// ===== tickets =====

export const ticketRecordSchema = z.object({
  channelId: z.string(),
  sequenceNumber: z.number().int().positive(),
  creatorId: z.string(),
  creatorName: z.string(),
  reason: z.string(),
  status: z.enum(["open", "closed"]),
  createdAt: z.string(),
  /** Users granted access with /ticket add */
  participantIds: z.array(z.string()),
  closedBy: z.string().optional(),
  closedAt: z.string().optional(),
});

export type TicketRecord = z.infer<typeof ticketRecordSchema>;

/**
 * The sequence counter lives in the same document as the tickets so a restart
 * can never hand out a number twice.
 */
export const ticketsSchema = z.object({
  counter: count,
  tickets: z.record(z.string(), ticketRecordSchema),
});

export type TicketsState = z.infer<typeof ticketsSchema>;

export const ticketsRecordSet: RecordSetDefinition<TicketsState> = {
  name: "tickets",
  schema: ticketsSchema,
  empty: () => ({ counter: 0, tickets: {} }),
};
