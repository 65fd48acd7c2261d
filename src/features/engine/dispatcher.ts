/**
 * ModDesk — src/features/engine/dispatcher.ts
 * WHAT: The message-posted path: gate first, then exactly one counter.
 * WHY: Every guild message goes through here; the outcome is a list of side effects so the
 *      routing rules can be tested without a Discord client.
 * FLOWS:
 *  - bot author or DM → []
 *  - suggestions channel → gate (deny ⇒ delete + transient warning) → channel counter (fire ⇒ reminder)
 *  - open ticket channel → gate (deny ⇒ delete + transient warning) → falls through
 *  - anything not starting with the command prefix → help counter (fire ⇒ help text in that channel)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { COLOR_WARNING } from "../../lib/constants.js";
import { logger } from "../../lib/logger.js";
import type { Actor, PrivilegedRoleConfig } from "../../lib/roles.js";
import { contentAllowed, type GateDecision } from "../access/gate.js";
import type { CounterService } from "../counters/counterService.js";
import type { TicketWorkflow } from "../tickets/workflow.js";
import type { SideEffect } from "./effects.js";

export interface InboundMessage {
  id: string;
  channelId: string;
  /** null for DMs */
  guildId: string | null;
  content: string;
  author: Actor;
  authorIsBot: boolean;
}

export interface DispatcherConfig {
  suggestionChannelId: string;
  roles: PrivilegedRoleConfig;
  commandPrefix: string;
  reminderMessage: string;
  helpMessage: string;
  warningTtlMs: number;
}

export interface DispatcherDeps {
  counters: CounterService;
  tickets: TicketWorkflow;
  config: DispatcherConfig;
}

export class MessageDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async handleMessage(message: InboundMessage): Promise<SideEffect[]> {
    if (message.authorIsBot || !message.guildId) {
      return [];
    }

    const { counters, config } = this.deps;

    try {
      const decision = this.gate(message);
      if (!decision.allowed) {
        return this.denial(message, decision);
      }

      // Suggestions channel traffic feeds its own counter and never the help counter
      if (message.channelId === config.suggestionChannelId) {
        const fire = await counters.recordMessage(message.channelId);
        return fire ? [reply(message.channelId, config.reminderMessage)] : [];
      }

      if (message.content.startsWith(config.commandPrefix)) {
        return [];
      }

      const fire = await counters.recordHelpMessage();
      return fire ? [reply(message.channelId, config.helpMessage)] : [];
    } catch (err) {
      logger.error(
        { evt: "dispatch_failed", messageId: message.id, channelId: message.channelId, authorId: message.author.id, err },
        "[dispatcher] message handling failed"
      );
      return [];
    }
  }

  private gate(message: InboundMessage): GateDecision {
    const { tickets, config } = this.deps;
    const ticket = tickets.findByChannel(message.channelId);
    return contentAllowed(
      {
        restrictedChannelId: config.suggestionChannelId,
        ticket: ticket && ticket.status === "open" ? ticket : null,
        roles: config.roles,
        commandPrefix: config.commandPrefix,
      },
      message
    );
  }

  private denial(message: InboundMessage, decision: Extract<GateDecision, { allowed: false }>): SideEffect[] {
    logger.info(
      { evt: "message_gated", reason: decision.reason, channelId: message.channelId, authorId: message.author.id },
      "[dispatcher] message removed by gate"
    );
    return [
      { type: "deleteMessage", channelId: message.channelId, messageId: message.id },
      {
        type: "sendTransientWarning",
        channelId: message.channelId,
        ttlMs: this.deps.config.warningTtlMs,
        payload: {
          embeds: [{ title: decision.warningTitle, description: decision.warning, color: COLOR_WARNING }],
        },
      },
    ];
  }
}

function reply(channelId: string, content: string): SideEffect {
  return { type: "sendMessage", channelId, payload: { content } };
}
