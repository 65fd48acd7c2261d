/**
 * ModDesk — src/features/tickets/workflow.ts
 * WHAT: Support-ticket lifecycle: create (provision private channel) → add participants → close
 *       (transcript to the archive, delayed channel deletion).
 * WHY: Members get a private line to staff; staff get an archived record once it's over.
 * FLOWS:
 *  - create(guildId, creator, reason): [queue tickets:sequence] draw + persist number → create channel
 *    → store open record → post welcome card
 *  - addParticipant(channelId, actor, user): staff only → [queue ticket:<id>] grant access → record
 *  - close(guildId, channelId, closer): staff only → [queue ticket:<id>] mark closed → transcript
 *    → deleteChannelLater effect
 * DOCS:
 *  - Discord permission overwrites: https://discord.com/developers/docs/topics/permissions#permission-overwrites
 *
 * The sequence number is persisted before the channel exists. If channel creation fails the
 * number is burned, never reused.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MAX_REASON_LENGTH, TICKET_CHANNEL_PREFIX } from "../../lib/constants.js";
import { padSequence } from "../../lib/dt.js";
import type { KeyedQueue } from "../../lib/keyedQueue.js";
import { logger, redact } from "../../lib/logger.js";
import { fail, ok, permissionDenied, runGuarded, type Outcome } from "../../lib/outcome.js";
import { hasRequiredRole, isPrivilegedRoleName, type Actor, type PrivilegedRoleConfig } from "../../lib/roles.js";
import { failureFromPlatform } from "../../platform/failures.js";
import { TICKET_MEMBER_PERMISSIONS, type PermissionGrant, type Platform } from "../../platform/types.js";
import type { RecordStore } from "../../store/recordStore.js";
import { ticketsRecordSet, type TicketRecord } from "../../store/schemas.js";
import type { SideEffect } from "../engine/effects.js";
import { buildParticipantAddedEmbed, buildTicketWelcomeEmbed, buildTranscriptSummaryEmbed } from "./embeds.js";
import { renderTranscript, transcriptFileName, transcriptLines } from "./transcript.js";

export const DEFAULT_TICKET_REASON = "No reason given";

export interface TicketWorkflowConfig {
  roles: PrivilegedRoleConfig;
  transcriptChannelId: string | null;
  transcriptChannelName: string;
  ticketDeleteDelayMs: number;
}

export interface TicketWorkflowDeps {
  store: RecordStore;
  queue: KeyedQueue;
  platform: Platform;
  config: TicketWorkflowConfig;
  now?: () => Date;
}

export interface TranscriptReport {
  /** False when the archive channel was missing or a post failed */
  archived: boolean;
  messageCount: number;
}

export interface TicketClosed {
  record: TicketRecord;
  transcript: TranscriptReport;
  effects: SideEffect[];
}

export function ticketChannelName(sequenceNumber: number): string {
  return `${TICKET_CHANNEL_PREFIX}${padSequence(sequenceNumber)}`;
}

export class TicketWorkflow {
  private readonly deps: TicketWorkflowDeps;
  private readonly now: () => Date;

  constructor(deps: TicketWorkflowDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  /** Open or closed record for a channel, if the channel is (or was) a ticket. */
  findByChannel(channelId: string): TicketRecord | null {
    return this.deps.store.load(ticketsRecordSet).tickets[channelId] ?? null;
  }

  async create(guildId: string, creator: Actor, reason?: string | null): Promise<Outcome<TicketRecord>> {
    const cleanReason = reason?.trim() || DEFAULT_TICKET_REASON;
    if (cleanReason.length > MAX_REASON_LENGTH) {
      return fail({
        kind: "validation",
        field: "reason",
        message: `Keep the reason under ${MAX_REASON_LENGTH} characters.`,
      });
    }

    const { store, queue, platform, config } = this.deps;

    return runGuarded<TicketRecord>("tickets.create", { guildId, creatorId: creator.id }, async () => {
      const sequenceNumber = await queue.run(
        "tickets:sequence",
        () => store.update(ticketsRecordSet, (state) => ({ ...state, counter: state.counter + 1 })).counter
      );

      const overwrites: PermissionGrant[] = [
        // @everyone's role id is the guild id
        { targetId: guildId, targetType: "role", allow: [], deny: ["view"] },
        { targetId: creator.id, targetType: "member", allow: TICKET_MEMBER_PERMISSIONS, deny: [] },
        { targetId: platform.botUserId, targetType: "member", allow: TICKET_MEMBER_PERMISSIONS, deny: [] },
      ];

      const roles = await platform.listRoles(guildId);
      if (roles.ok) {
        for (const role of roles.value) {
          if (isPrivilegedRoleName(role.name, config.roles)) {
            overwrites.push({ targetId: role.id, targetType: "role", allow: TICKET_MEMBER_PERMISSIONS, deny: [] });
          }
        }
      } else {
        logger.warn(
          { evt: "ticket_roles_unavailable", guildId, failure: roles.kind },
          "[tickets] could not list roles; staff roles will not be granted access"
        );
      }

      const created = await platform.createChannel({
        guildId,
        name: ticketChannelName(sequenceNumber),
        topic: `Ticket #${padSequence(sequenceNumber)} - opened by ${creator.displayName}`,
        position: 0,
        overwrites,
      });
      if (!created.ok) {
        logger.warn(
          { evt: "ticket_channel_failed", guildId, sequenceNumber, failure: created.kind },
          "[tickets] channel creation failed; sequence number burned"
        );
        return fail(
          failureFromPlatform(created, {
            action: "create the ticket channel",
            remediation: "Give me Manage Channels and Manage Roles.",
            entity: "channel",
            id: ticketChannelName(sequenceNumber),
          })
        );
      }

      const record: TicketRecord = {
        channelId: created.value.channelId,
        sequenceNumber,
        creatorId: creator.id,
        creatorName: creator.displayName,
        reason: cleanReason,
        status: "open",
        createdAt: this.now().toISOString(),
        participantIds: [],
      };
      try {
        await queue.run(`ticket:${record.channelId}`, () =>
          store.update(ticketsRecordSet, (state) => ({
            ...state,
            tickets: { ...state.tickets, [record.channelId]: record },
          }))
        );
      } catch (err) {
        // No record means no gate and no /ticket close, so the channel must not outlive this call
        const removed = await platform.deleteChannel(record.channelId, "Ticket record could not be saved");
        if (!removed.ok) {
          logger.warn(
            { evt: "ticket_orphan_channel", channelId: record.channelId, sequenceNumber, failure: removed.kind },
            "[tickets] record write failed and the channel could not be removed"
          );
        }
        throw err;
      }

      const welcome = await platform.sendMessage(record.channelId, { embeds: [buildTicketWelcomeEmbed(record)] });
      if (!welcome.ok) {
        logger.warn(
          { evt: "ticket_welcome_failed", channelId: record.channelId, failure: welcome.kind },
          "[tickets] welcome card not posted"
        );
      }

      logger.info(
        {
          evt: "ticket_created",
          guildId,
          channelId: record.channelId,
          sequenceNumber,
          creatorId: creator.id,
          reason: redact(cleanReason),
        },
        "[tickets] created"
      );
      return ok(record);
    });
  }

  addParticipant(channelId: string, actor: Actor, user: { id: string; displayName: string }): Promise<Outcome<TicketRecord>> {
    const { store, queue, platform, config } = this.deps;
    if (!hasRequiredRole(actor, config.roles)) {
      return Promise.resolve(permissionDenied("add people to tickets"));
    }

    return runGuarded<TicketRecord>("tickets.addParticipant", { channelId, userId: user.id }, () =>
      queue.run(`ticket:${channelId}`, async (): Promise<Outcome<TicketRecord>> => {
        const ticket = store.load(ticketsRecordSet).tickets[channelId];
        if (!ticket || ticket.status !== "open") {
          return fail({
            kind: "not_ticket_channel",
            channelId,
            message: "This command only works inside an open ticket channel.",
          });
        }

        const granted = await platform.setChannelPermissions(channelId, {
          targetId: user.id,
          targetType: "member",
          allow: TICKET_MEMBER_PERMISSIONS,
          deny: [],
        });
        if (!granted.ok) {
          return fail(
            failureFromPlatform(granted, {
              action: "change this channel's permissions",
              remediation: "Give me Manage Roles (Manage Permissions) on this channel.",
              entity: "member",
              id: user.id,
            })
          );
        }

        const record: TicketRecord = ticket.participantIds.includes(user.id)
          ? ticket
          : { ...ticket, participantIds: [...ticket.participantIds, user.id] };
        store.update(ticketsRecordSet, (state) => ({
          ...state,
          tickets: { ...state.tickets, [channelId]: record },
        }));

        const notice = await platform.sendMessage(channelId, {
          embeds: [buildParticipantAddedEmbed(user.id, actor.displayName)],
        });
        if (!notice.ok) {
          logger.warn({ evt: "ticket_notice_failed", channelId, failure: notice.kind }, "[tickets] add notice not posted");
        }

        logger.info({ evt: "ticket_participant_added", channelId, userId: user.id, by: actor.id }, "[tickets] participant added");
        return ok(record);
      })
    );
  }

  close(guildId: string, channelId: string, closer: Actor): Promise<Outcome<TicketClosed>> {
    const { store, queue, config } = this.deps;
    if (!hasRequiredRole(closer, config.roles)) {
      return Promise.resolve(permissionDenied("close tickets"));
    }

    return runGuarded<TicketClosed>("tickets.close", { guildId, channelId, closerId: closer.id }, () =>
      queue.run(`ticket:${channelId}`, async (): Promise<Outcome<TicketClosed>> => {
        const ticket = store.load(ticketsRecordSet).tickets[channelId];
        if (!ticket) {
          return fail({
            kind: "not_found",
            entity: "ticket",
            id: channelId,
            message: "There is no ticket stored for this channel.",
          });
        }
        if (ticket.status === "closed") {
          return fail({
            kind: "already_resolved",
            id: channelId,
            status: "closed",
            message: `Ticket #${padSequence(ticket.sequenceNumber)} is already closed.`,
          });
        }

        const closedAt = this.now();
        const record: TicketRecord = {
          ...ticket,
          status: "closed",
          closedBy: closer.id,
          closedAt: closedAt.toISOString(),
        };
        store.update(ticketsRecordSet, (state) => ({
          ...state,
          tickets: { ...state.tickets, [channelId]: record },
        }));

        const transcript = await this.archiveTranscript(guildId, record, closedAt);

        logger.info(
          {
            evt: "ticket_closed",
            channelId,
            sequenceNumber: record.sequenceNumber,
            closerId: closer.id,
            archived: transcript.archived,
          },
          "[tickets] closed"
        );

        return ok({
          record,
          transcript,
          effects: [
            {
              type: "deleteChannelLater",
              channelId,
              delayMs: config.ticketDeleteDelayMs,
              reason: `Ticket #${padSequence(record.sequenceNumber)} closed by ${closer.displayName}`,
            },
          ],
        });
      })
    );
  }

  /**
   * Best effort: any failure here is logged and reported as archived=false; the
   * closure itself stands.
   */
  private async archiveTranscript(guildId: string, ticket: TicketRecord, closedAt: Date): Promise<TranscriptReport> {
    const { platform, config } = this.deps;
    const ids = { channelId: ticket.channelId, sequenceNumber: ticket.sequenceNumber };

    let archiveChannelId = config.transcriptChannelId;
    if (!archiveChannelId) {
      const found = await platform.findChannelByName(guildId, config.transcriptChannelName);
      if (!found.ok) {
        logger.error(
          { evt: "transcript_channel_missing", ...ids, name: config.transcriptChannelName, failure: found.kind },
          "[tickets] transcript channel not found"
        );
        return { archived: false, messageCount: 0 };
      }
      archiveChannelId = found.value.channelId;
    }

    const history = await platform.fetchHistory(ticket.channelId);
    if (!history.ok) {
      logger.error({ evt: "transcript_history_failed", ...ids, failure: history.kind }, "[tickets] could not read history");
      return { archived: false, messageCount: 0 };
    }

    const lines = transcriptLines(history.value);
    const summary = await platform.sendMessage(archiveChannelId, {
      embeds: [buildTranscriptSummaryEmbed(ticket, lines.length, closedAt)],
    });
    if (!summary.ok) {
      logger.error({ evt: "transcript_summary_failed", ...ids, failure: summary.kind }, "[tickets] summary not posted");
      return { archived: false, messageCount: lines.length };
    }

    if (lines.length > 0) {
      const file = await platform.sendMessage(archiveChannelId, {
        files: [{ name: transcriptFileName(ticket.sequenceNumber), content: renderTranscript(ticket, lines) }],
      });
      if (!file.ok) {
        logger.error({ evt: "transcript_file_failed", ...ids, failure: file.kind }, "[tickets] transcript file not posted");
        return { archived: false, messageCount: lines.length };
      }
    }

    return { archived: true, messageCount: lines.length };
  }
}
