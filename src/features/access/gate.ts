// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/features/access/gate.ts
 * WHAT: Decides whether a posted message may stay, before any counter or record is touched.
 * WHY: The suggestions channel only takes slash commands from regular members, and a ticket
 *      channel only takes messages from staff, the ticket's creator and users added to it.
 * FLOWS:
 *  - contentAllowed(ctx, message) → { allowed: true } | { allowed: false, reason, warning }
 *
 * Pure. A denial is a value; the dispatcher turns it into delete + transient warning.
 */

import { hasRequiredRole, type Actor, type PrivilegedRoleConfig } from "../../lib/roles.js";
import type { TicketRecord } from "../../store/schemas.js";

export type GateDenialReason = "restricted_channel" | "ticket_channel";

export type GateDecision =
  | { allowed: true }
  | { allowed: false; reason: GateDenialReason; warningTitle: string; warning: string };

export interface GatedMessage {
  channelId: string;
  content: string;
  author: Actor;
  authorIsBot: boolean;
}

export interface GateContext {
  /** The suggestions channel */
  restrictedChannelId: string;
  /** Ticket record for the message's channel, if the channel is a ticket */
  ticket: TicketRecord | null;
  roles: PrivilegedRoleConfig;
  commandPrefix: string;
}

const ALLOWED: GateDecision = { allowed: true };

export function contentAllowed(ctx: GateContext, message: GatedMessage): GateDecision {
  if (message.authorIsBot) {
    return ALLOWED;
  }

  if (message.channelId === ctx.restrictedChannelId) {
    if (message.content.startsWith(ctx.commandPrefix) || hasRequiredRole(message.author, ctx.roles)) {
      return ALLOWED;
    }
    return {
      allowed: false,
      reason: "restricted_channel",
      warningTitle: "⚠️ Message not allowed",
      warning:
        `<@${message.author.id}>, only commands can be used in this channel.\n\n` +
        "Use `/suggest create` to post a suggestion.",
    };
  }

  if (ctx.ticket && ctx.ticket.channelId === message.channelId) {
    const ticket = ctx.ticket;
    if (
      hasRequiredRole(message.author, ctx.roles) ||
      message.author.id === ticket.creatorId ||
      ticket.participantIds.includes(message.author.id)
    ) {
      return ALLOWED;
    }
    return {
      allowed: false,
      reason: "ticket_channel",
      warningTitle: "⚠️ Only staff can reply here",
      warning: `<@${message.author.id}>, only staff and the ticket's members can write in this ticket.`,
    };
  }

  return ALLOWED;
}
