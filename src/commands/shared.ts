/**
 * ModDesk — src/commands/shared.ts
 * WHAT: Helpers every slash command uses: guild guard, failure replies, public announcements.
 * WHY: Interaction replies stay ephemeral; anything the channel should see is posted through
 *      the platform port, so a failed public post never loses the moderator's feedback.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { GuildMember, type ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { userMessageFor, type Failure } from "../lib/outcome.js";
import type { EmbedSpec, Platform } from "../platform/types.js";

/** The guild id, or null after telling the user the command is guild-only. */
export async function requireGuild(interaction: ChatInputCommandInteraction): Promise<string | null> {
  if (interaction.guildId) {
    return interaction.guildId;
  }
  await replyOrEdit(interaction, { content: "This command can only be used in a server." });
  return null;
}

export async function replyFailure(interaction: ChatInputCommandInteraction, failure: Failure): Promise<void> {
  logger.info({ evt: "cmd_failure", cmd: interaction.commandName, failure: failure.kind }, "[cmd] replied with failure");
  await replyOrEdit(interaction, { content: userMessageFor(failure) });
}

/** Post a card to the channel for everyone. Returns false (and logs) when the post fails. */
export async function announce(platform: Platform, channelId: string, embed: EmbedSpec): Promise<boolean> {
  const posted = await platform.sendMessage(channelId, { embeds: [embed] });
  if (!posted.ok) {
    logger.warn({ evt: "announce_failed", channelId, failure: posted.kind }, "[cmd] public card not posted");
  }
  return posted.ok;
}

/** A user option as id + the name to show on cards (server nickname when available). */
export function userOption(
  interaction: ChatInputCommandInteraction,
  name: string
): { id: string; displayName: string } {
  const user = interaction.options.getUser(name, true);
  const member = interaction.options.getMember(name);
  return {
    id: user.id,
    displayName: member instanceof GuildMember ? member.displayName : user.displayName,
  };
}
