/**
 * ModDesk — src/platform/types.ts
 * WHAT: The outbound port the workflows talk to, and the plain payload shapes it accepts.
 * WHY: Workflows stay free of discord.js objects; src/platform/discord.ts adapts this to a
 *      live Client and tests use an in-process fake.
 *
 * Every call resolves to a PlatformResult and never rejects: "not_found" (unknown message,
 * channel, member), "forbidden" (missing access or permissions, closed DMs), "failed"
 * (anything else).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type PlatformFailureKind = "not_found" | "forbidden" | "failed";

export type PlatformResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: PlatformFailureKind; message: string; code?: number };

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface EmbedSpec {
  title?: string;
  description?: string;
  color?: number;
  author?: string;
  fields?: EmbedField[];
  footer?: string;
  /** ISO-8601 */
  timestamp?: string;
}

export interface FileSpec {
  name: string;
  content: string;
}

export interface MessagePayload {
  content?: string;
  /** Which mentions in `content` actually ping. Defaults to "none". */
  mentions?: "none" | "users";
  embeds?: EmbedSpec[];
  files?: FileSpec[];
}

export interface FetchedMessage {
  id: string;
  channelId: string;
  /** Raw reaction counts by emoji, including the bot's own reaction. */
  reactionCounts: Record<string, number>;
}

export interface HistoryMessage {
  id: string;
  authorId: string;
  authorName: string;
  authorIsBot: boolean;
  content: string;
  hasEmbeds: boolean;
  hasAttachments: boolean;
  createdAt: Date;
}

export type ChannelPermission = "view" | "send" | "readHistory";

export interface PermissionGrant {
  targetId: string;
  targetType: "role" | "member";
  allow: ChannelPermission[];
  deny: ChannelPermission[];
}

export interface ChannelSpec {
  guildId: string;
  name: string;
  topic?: string;
  position?: number;
  overwrites: PermissionGrant[];
}

export interface RoleInfo {
  id: string;
  name: string;
}

export interface Platform {
  /** The bot's own user id; ticket channels grant it access explicitly. */
  readonly botUserId: string;

  sendMessage(channelId: string, payload: MessagePayload): Promise<PlatformResult<{ messageId: string }>>;
  editMessage(channelId: string, messageId: string, payload: MessagePayload): Promise<PlatformResult<void>>;
  deleteMessage(channelId: string, messageId: string): Promise<PlatformResult<void>>;
  fetchMessage(channelId: string, messageId: string): Promise<PlatformResult<FetchedMessage>>;
  /** Full channel history, oldest first. */
  fetchHistory(channelId: string): Promise<PlatformResult<HistoryMessage[]>>;
  addReaction(channelId: string, messageId: string, emoji: string): Promise<PlatformResult<void>>;

  createChannel(spec: ChannelSpec): Promise<PlatformResult<{ channelId: string }>>;
  deleteChannel(channelId: string, reason?: string): Promise<PlatformResult<void>>;
  setChannelPermissions(channelId: string, grant: PermissionGrant): Promise<PlatformResult<void>>;
  findChannelByName(guildId: string, name: string): Promise<PlatformResult<{ channelId: string }>>;

  listRoles(guildId: string): Promise<PlatformResult<RoleInfo[]>>;
  assignRole(guildId: string, userId: string, roleId: string, reason?: string): Promise<PlatformResult<void>>;
  banUser(guildId: string, userId: string, reason: string): Promise<PlatformResult<void>>;
  sendDirectMessage(userId: string, payload: MessagePayload): Promise<PlatformResult<void>>;
}

/** Shorthand for the failure arm, used when forwarding a failure under a new value type. */
export type PlatformFailure = Extract<PlatformResult<never>, { ok: false }>;

export const TICKET_MEMBER_PERMISSIONS: ChannelPermission[] = ["view", "send", "readHistory"];
