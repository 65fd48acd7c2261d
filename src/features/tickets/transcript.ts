/**
 * ModDesk -- src/features/tickets/transcript.ts
 * WHAT: Renders a closed ticket's channel history into a plain-text export.
 * WHY: The channel is deleted a few seconds after closing; the transcript is the audit trail.
 * FORMAT: [19/10/2025 00:02:15] Alice: I can't join voice
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { dayMonthYearTimeSeconds, padSequence } from "../../lib/dt.js";
import type { HistoryMessage } from "../../platform/types.js";
import type { TicketRecord } from "../../store/schemas.js";

export const EMPTY_CONTENT_PLACEHOLDER = "[embed/attachment]";

/**
 * Bot chatter is skipped unless it carried an embed (the welcome card, "user added" notices).
 * History must already be oldest first.
 */
export function transcriptLines(history: readonly HistoryMessage[]): string[] {
  return history
    .filter((m) => !m.authorIsBot || m.hasEmbeds)
    .map((m) => {
      const content = m.content ? m.content : EMPTY_CONTENT_PLACEHOLDER;
      return `[${dayMonthYearTimeSeconds(m.createdAt)}] ${m.authorName}: ${content}`;
    });
}

export function transcriptFileName(sequenceNumber: number): string {
  return `ticket-${padSequence(sequenceNumber)}-transcript.txt`;
}

export function renderTranscript(ticket: TicketRecord, lines: readonly string[]): string {
  const header = [
    `TRANSCRIPT TICKET #${padSequence(ticket.sequenceNumber)}`,
    `Creator: ${ticket.creatorName}`,
    `Reason: ${ticket.reason}`,
    `Created: ${ticket.createdAt}`,
    `Closed: ${ticket.closedAt ?? "open"}`,
    "=".repeat(50),
    "",
  ];
  return [...header, ...lines].join("\n");
}
