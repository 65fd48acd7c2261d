/**
 * ModDesk — src/platform/discord.ts
 * WHAT: discord.js implementation of the Platform port, plus helpers that turn gateway
 *       objects (messages, members, interactions) into the engine's plain shapes.
 * WHY: Workflows only see PlatformResult values; every DiscordAPIError is mapped here.
 * FLOWS:
 *  - DiscordPlatform(client).sendMessage(...) → fetch channel → send → { ok, value } | failure
 *  - mapDiscordError(err) → not_found | forbidden | failed
 * DOCS:
 *  - JSON error codes: https://discord.com/developers/docs/topics/opcodes-and-status-codes#json-json-error-codes
 *  - GuildChannelManager.create: https://discord.js.org/docs/packages/discord.js/main/GuildChannelManager:Class#create
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ChannelType,
  DiscordAPIError,
  GuildMember,
  OverwriteType,
  PermissionFlagsBits,
  TextChannel,
  type ChatInputCommandInteraction,
  type Client,
  type Message,
  type OverwriteResolvable,
  type PermissionResolvable,
  type TextBasedChannel,
} from "discord.js";
import { logger } from "../lib/logger.js";
import type { Actor } from "../lib/roles.js";
import type { InboundMessage } from "../features/engine/dispatcher.js";
import { toMessageOptions } from "./embeds.js";
import type {
  ChannelPermission,
  ChannelSpec,
  FetchedMessage,
  HistoryMessage,
  MessagePayload,
  PermissionGrant,
  Platform,
  PlatformFailure,
  PlatformResult,
  RoleInfo,
} from "./types.js";

// Unknown Channel, Unknown Message, Unknown User, Unknown Member
const NOT_FOUND_CODES = new Set<number | string>([10003, 10008, 10013, 10007]);
// Missing Access, Missing Permissions, Cannot send messages to this user
const FORBIDDEN_CODES = new Set<number | string>([50001, 50013, 50007]);

const HISTORY_PAGE_SIZE = 100;

const PERMISSION_FLAGS: Record<ChannelPermission, bigint> = {
  view: PermissionFlagsBits.ViewChannel,
  send: PermissionFlagsBits.SendMessages,
  readHistory: PermissionFlagsBits.ReadMessageHistory,
};

const PERMISSION_NAMES = {
  view: "ViewChannel",
  send: "SendMessages",
  readHistory: "ReadMessageHistory",
} as const satisfies Record<ChannelPermission, string>;

export function mapDiscordError(err: unknown): PlatformFailure {
  if (err instanceof DiscordAPIError) {
    const code = typeof err.code === "number" ? err.code : undefined;
    if (NOT_FOUND_CODES.has(err.code)) {
      return { ok: false, kind: "not_found", message: err.message, code };
    }
    if (FORBIDDEN_CODES.has(err.code)) {
      return { ok: false, kind: "forbidden", message: err.message, code };
    }
    return { ok: false, kind: "failed", message: err.message, code };
  }
  return { ok: false, kind: "failed", message: err instanceof Error ? err.message : String(err) };
}

function success<T>(value: T): PlatformResult<T> {
  return { ok: true, value };
}

function missing(message: string): PlatformFailure {
  return { ok: false, kind: "not_found", message };
}

function overwriteFor(grant: PermissionGrant): OverwriteResolvable {
  const bits = (perms: ChannelPermission[]): PermissionResolvable[] => perms.map((p) => PERMISSION_FLAGS[p]);
  return {
    id: grant.targetId,
    type: grant.targetType === "role" ? OverwriteType.Role : OverwriteType.Member,
    allow: bits(grant.allow),
    deny: bits(grant.deny),
  };
}

function toHistoryMessage(message: Message): HistoryMessage {
  return {
    id: message.id,
    authorId: message.author.id,
    authorName: message.member?.displayName ?? message.author.displayName,
    authorIsBot: message.author.bot,
    content: message.content,
    hasEmbeds: message.embeds.length > 0,
    hasAttachments: message.attachments.size > 0,
    createdAt: message.createdAt,
  };
}

export class DiscordPlatform implements Platform {
  constructor(private readonly client: Client) {}

  get botUserId(): string {
    return this.client.user?.id ?? "";
  }

  sendMessage(channelId: string, payload: MessagePayload): Promise<PlatformResult<{ messageId: string }>> {
    return this.attempt("sendMessage", { channelId }, async () => {
      const channel = await this.client.channels.fetch(channelId);
      if (!channel || !channel.isSendable()) {
        return missing(`channel ${channelId} is not a text channel`);
      }
      const sent = await channel.send(toMessageOptions(payload));
      return success({ messageId: sent.id });
    });
  }

  editMessage(channelId: string, messageId: string, payload: MessagePayload): Promise<PlatformResult<void>> {
    return this.attempt("editMessage", { channelId, messageId }, async () => {
      const message = await this.fetchRaw(channelId, messageId);
      if (!message) return missing(`message ${messageId} not found`);
      await message.edit(toMessageOptions(payload));
      return success(undefined);
    });
  }

  deleteMessage(channelId: string, messageId: string): Promise<PlatformResult<void>> {
    return this.attempt("deleteMessage", { channelId, messageId }, async () => {
      const message = await this.fetchRaw(channelId, messageId);
      if (!message) return missing(`message ${messageId} not found`);
      await message.delete();
      return success(undefined);
    });
  }

  fetchMessage(channelId: string, messageId: string): Promise<PlatformResult<FetchedMessage>> {
    return this.attempt("fetchMessage", { channelId, messageId }, async () => {
      const message = await this.fetchRaw(channelId, messageId);
      if (!message) return missing(`message ${messageId} not found`);

      const reactionCounts: Record<string, number> = {};
      for (const reaction of message.reactions.cache.values()) {
        const key = reaction.emoji.name ?? reaction.emoji.id;
        if (key) reactionCounts[key] = reaction.count;
      }
      return success({ id: message.id, channelId, reactionCounts });
    });
  }

  fetchHistory(channelId: string): Promise<PlatformResult<HistoryMessage[]>> {
    return this.attempt("fetchHistory", { channelId }, async () => {
      const channel = await this.textChannel(channelId);
      if (!channel) return missing(`channel ${channelId} is not a text channel`);

      const collected: HistoryMessage[] = [];
      let before: string | undefined;
      for (;;) {
        const page = await channel.messages.fetch({ limit: HISTORY_PAGE_SIZE, before });
        if (page.size === 0) break;
        for (const message of page.values()) {
          collected.push(toHistoryMessage(message));
        }
        before = page.lastKey();
        if (page.size < HISTORY_PAGE_SIZE) break;
      }

      collected.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
      return success(collected);
    });
  }

  addReaction(channelId: string, messageId: string, emoji: string): Promise<PlatformResult<void>> {
    return this.attempt("addReaction", { channelId, messageId, emoji }, async () => {
      const message = await this.fetchRaw(channelId, messageId);
      if (!message) return missing(`message ${messageId} not found`);
      await message.react(emoji);
      return success(undefined);
    });
  }

  createChannel(spec: ChannelSpec): Promise<PlatformResult<{ channelId: string }>> {
    return this.attempt("createChannel", { guildId: spec.guildId, name: spec.name }, async () => {
      const guild = await this.client.guilds.fetch(spec.guildId);
      const channel = await guild.channels.create({
        name: spec.name,
        type: ChannelType.GuildText,
        topic: spec.topic,
        position: spec.position,
        permissionOverwrites: spec.overwrites.map(overwriteFor),
      });
      return success({ channelId: channel.id });
    });
  }

  deleteChannel(channelId: string, reason?: string): Promise<PlatformResult<void>> {
    return this.attempt("deleteChannel", { channelId }, async () => {
      const channel = await this.client.channels.fetch(channelId);
      if (!channel || channel.isDMBased()) return missing(`channel ${channelId} not found`);
      await channel.delete(reason);
      return success(undefined);
    });
  }

  setChannelPermissions(channelId: string, grant: PermissionGrant): Promise<PlatformResult<void>> {
    return this.attempt("setChannelPermissions", { channelId, targetId: grant.targetId }, async () => {
      const channel = await this.client.channels.fetch(channelId);
      if (!(channel instanceof TextChannel)) return missing(`channel ${channelId} is not a text channel`);

      const options: Partial<Record<(typeof PERMISSION_NAMES)[ChannelPermission], boolean>> = {};
      for (const p of grant.allow) options[PERMISSION_NAMES[p]] = true;
      for (const p of grant.deny) options[PERMISSION_NAMES[p]] = false;

      await channel.permissionOverwrites.edit(grant.targetId, options, {
        type: grant.targetType === "role" ? OverwriteType.Role : OverwriteType.Member,
      });
      return success(undefined);
    });
  }

  findChannelByName(guildId: string, name: string): Promise<PlatformResult<{ channelId: string }>> {
    return this.attempt("findChannelByName", { guildId, name }, async () => {
      const guild = await this.client.guilds.fetch(guildId);
      const channels = await guild.channels.fetch();
      const match = channels.find((c) => c !== null && c.name === name && c.isTextBased());
      return match ? success({ channelId: match.id }) : missing(`no text channel named ${name}`);
    });
  }

  listRoles(guildId: string): Promise<PlatformResult<RoleInfo[]>> {
    return this.attempt("listRoles", { guildId }, async () => {
      const guild = await this.client.guilds.fetch(guildId);
      const roles = await guild.roles.fetch();
      return success(roles.map((role) => ({ id: role.id, name: role.name })));
    });
  }

  assignRole(guildId: string, userId: string, roleId: string, reason?: string): Promise<PlatformResult<void>> {
    return this.attempt("assignRole", { guildId, userId, roleId }, async () => {
      const guild = await this.client.guilds.fetch(guildId);
      const member = await guild.members.fetch(userId);
      await member.roles.add(roleId, reason);
      return success(undefined);
    });
  }

  banUser(guildId: string, userId: string, reason: string): Promise<PlatformResult<void>> {
    return this.attempt("banUser", { guildId, userId }, async () => {
      const guild = await this.client.guilds.fetch(guildId);
      await guild.members.ban(userId, { reason });
      return success(undefined);
    });
  }

  sendDirectMessage(userId: string, payload: MessagePayload): Promise<PlatformResult<void>> {
    return this.attempt("sendDirectMessage", { userId }, async () => {
      const user = await this.client.users.fetch(userId);
      await user.send(toMessageOptions(payload));
      return success(undefined);
    });
  }

  private async textChannel(channelId: string): Promise<TextBasedChannel | null> {
    const channel = await this.client.channels.fetch(channelId);
    return channel && channel.isTextBased() ? channel : null;
  }

  private async fetchRaw(channelId: string, messageId: string): Promise<Message | null> {
    const channel = await this.textChannel(channelId);
    if (!channel) return null;
    return channel.messages.fetch(messageId);
  }

  private async attempt<T>(
    op: string,
    ids: Record<string, unknown>,
    fn: () => Promise<PlatformResult<T>>
  ): Promise<PlatformResult<T>> {
    try {
      return await fn();
    } catch (err) {
      const failure = mapDiscordError(err);
      logger.debug({ evt: "platform_call_failed", op, ...ids, failure: failure.kind, code: failure.code, err }, `[platform] ${op} failed`);
      return failure;
    }
  }
}

// ===== Gateway object adapters =====

export function actorFromMember(member: GuildMember): Actor {
  return {
    id: member.id,
    displayName: member.displayName,
    roleNames: member.roles.cache.map((role) => role.name),
  };
}

/**
 * The invoking member with live role names. Falls back to a role-less actor outside
 * guilds or when the member cannot be fetched, which denies every privileged action.
 */
export async function resolveActor(interaction: ChatInputCommandInteraction): Promise<Actor> {
  if (interaction.member instanceof GuildMember) {
    return actorFromMember(interaction.member);
  }
  if (interaction.guild) {
    try {
      return actorFromMember(await interaction.guild.members.fetch(interaction.user.id));
    } catch (err) {
      logger.warn({ evt: "actor_fetch_failed", userId: interaction.user.id, err }, "[platform] could not fetch invoking member");
    }
  }
  return { id: interaction.user.id, displayName: interaction.user.displayName, roleNames: [] };
}

export function toInboundMessage(message: Message): InboundMessage {
  return {
    id: message.id,
    channelId: message.channelId,
    guildId: message.guildId,
    content: message.content,
    author: message.member
      ? actorFromMember(message.member)
      : { id: message.author.id, displayName: message.author.displayName, roleNames: [] },
    authorIsBot: message.author.bot,
  };
}
