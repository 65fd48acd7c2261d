// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Cards posted inside ticket channels and to the transcript archive.

import { COLOR_INFO, COLOR_NEUTRAL, COLOR_SUCCESS } from "../../lib/constants.js";
import { dayMonthYearTime, padSequence } from "../../lib/dt.js";
import type { EmbedSpec } from "../../platform/types.js";
import type { TicketRecord } from "../../store/schemas.js";

export function buildTicketWelcomeEmbed(ticket: TicketRecord): EmbedSpec {
  return {
    title: `🎟️ Ticket #${padSequence(ticket.sequenceNumber)}`,
    description:
      `Hi <@${ticket.creatorId}>, thanks for reaching out.\n\n` +
      "Describe your problem in as much detail as you can and a staff member will answer here soon.",
    color: COLOR_INFO,
    fields: [
      { name: "Reason", value: ticket.reason },
      {
        name: "How this works",
        value:
          "• Only you, staff and people staff add can write here\n" +
          "• Staff close the ticket with `/ticket close` once it's resolved\n" +
          "• A transcript is archived when the ticket closes",
      },
    ],
    footer: `Opened by ${ticket.creatorName}`,
    timestamp: ticket.createdAt,
  };
}

export function buildParticipantAddedEmbed(userId: string, addedBy: string): EmbedSpec {
  return {
    title: "➕ Member added",
    description: `<@${userId}> was added to this ticket by ${addedBy}.`,
    color: COLOR_SUCCESS,
  };
}

export function buildTranscriptSummaryEmbed(ticket: TicketRecord, messageCount: number, closedAt: Date): EmbedSpec {
  return {
    title: `📄 Transcript ticket #${padSequence(ticket.sequenceNumber)}`,
    color: COLOR_NEUTRAL,
    fields: [
      { name: "Creator", value: `<@${ticket.creatorId}>`, inline: true },
      { name: "Reason", value: ticket.reason, inline: true },
      { name: "Closed by", value: ticket.closedBy ? `<@${ticket.closedBy}>` : "unknown", inline: true },
      { name: "Created", value: dayMonthYearTime(new Date(ticket.createdAt)), inline: true },
      { name: "Closed", value: dayMonthYearTime(closedAt), inline: true },
      { name: "Total messages", value: String(messageCount), inline: true },
    ],
    timestamp: closedAt.toISOString(),
  };
}
