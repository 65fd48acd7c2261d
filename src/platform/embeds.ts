// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Converts plain payload specs into discord.js builders.

import { AttachmentBuilder, EmbedBuilder, type MessageMentionOptions } from "discord.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import type { EmbedSpec, MessagePayload } from "./types.js";

export function toEmbedBuilder(spec: EmbedSpec): EmbedBuilder {
  const embed = new EmbedBuilder();
  if (spec.title) embed.setTitle(spec.title);
  if (spec.description) embed.setDescription(spec.description);
  if (spec.color !== undefined) embed.setColor(spec.color);
  if (spec.author) embed.setAuthor({ name: spec.author });
  if (spec.fields && spec.fields.length > 0) {
    embed.addFields(spec.fields.map((f) => ({ name: f.name, value: f.value, inline: f.inline ?? false })));
  }
  if (spec.footer) embed.setFooter({ text: spec.footer });
  if (spec.timestamp) embed.setTimestamp(new Date(spec.timestamp));
  return embed;
}

export function allowedMentionsFor(payload: MessagePayload): MessageMentionOptions {
  return payload.mentions === "users" ? { parse: ["users"] } : SAFE_ALLOWED_MENTIONS;
}

export interface DiscordMessageOptions {
  content?: string;
  embeds: EmbedBuilder[];
  files: AttachmentBuilder[];
  allowedMentions: MessageMentionOptions;
}

export function toMessageOptions(payload: MessagePayload): DiscordMessageOptions {
  return {
    ...(payload.content ? { content: payload.content } : {}),
    embeds: (payload.embeds ?? []).map(toEmbedBuilder),
    files: (payload.files ?? []).map(
      (file) => new AttachmentBuilder(Buffer.from(file.content, "utf-8"), { name: file.name })
    ),
    allowedMentions: allowedMentionsFor(payload),
  };
}
