// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/commands/ticket.ts
 * WHAT: /ticket create | close | add
 * FLOWS:
 *  - create [reason] → tickets.create → ephemeral link to the new channel
 *  - close (inside the ticket) → tickets.close → notice → deleteChannelLater effect
 *  - add <user> (inside the ticket) → tickets.addParticipant
 */

import { SlashCommandBuilder } from "discord.js";
import type { Engine } from "../features/engine/engine.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { COLOR_DANGER, MAX_REASON_LENGTH } from "../lib/constants.js";
import { padSequence } from "../lib/dt.js";
import { resolveActor } from "../platform/discord.js";
import { announce, replyFailure, requireGuild, userOption } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("ticket")
  .setDescription("Private support tickets")
  .addSubcommand((sub) =>
    sub
      .setName("create")
      .setDescription("Open a private ticket with staff")
      .addStringOption((opt) =>
        opt.setName("reason").setDescription("What do you need help with?").setMaxLength(MAX_REASON_LENGTH)
      )
  )
  .addSubcommand((sub) => sub.setName("close").setDescription("Close this ticket and archive its transcript (staff)"))
  .addSubcommand((sub) =>
    sub
      .setName("add")
      .setDescription("Give someone access to this ticket (staff)")
      .addUserOption((opt) => opt.setName("user").setDescription("Who to add").setRequired(true))
  );

export async function execute(ctx: CommandContext, engine: Engine): Promise<void> {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;

  const sub = interaction.options.getSubcommand();
  ctx.step("resolve_actor");
  const actor = await resolveActor(interaction);
  await ensureDeferred(interaction);

  if (sub === "create") {
    ctx.step("create");
    const result = await engine.tickets.create(guildId, actor, interaction.options.getString("reason"));
    if (!result.ok) {
      await replyFailure(interaction, result.error);
      return;
    }
    await replyOrEdit(interaction, {
      content: `✅ Ticket #${padSequence(result.value.sequenceNumber)} created: <#${result.value.channelId}>`,
    });
    return;
  }

  if (sub === "add") {
    const user = userOption(interaction, "user");
    ctx.step("add_participant");
    const result = await engine.tickets.addParticipant(interaction.channelId, actor, user);
    if (!result.ok) {
      await replyFailure(interaction, result.error);
      return;
    }
    await replyOrEdit(interaction, { content: `✅ ${user.displayName} can now see this ticket.` });
    return;
  }

  ctx.step("close");
  const result = await engine.tickets.close(guildId, interaction.channelId, actor);
  if (!result.ok) {
    await replyFailure(interaction, result.error);
    return;
  }

  const { record, transcript, effects } = result.value;
  const seconds = Math.round(engine.config.ticketDeleteDelayMs / 1000);
  await announce(engine.platform, interaction.channelId, {
    title: "🔒 Closing ticket",
    description: `Closed by ${actor.displayName}. This channel will be deleted in ${seconds} seconds.`,
    color: COLOR_DANGER,
  });
  await replyOrEdit(interaction, {
    content: transcript.archived
      ? `✅ Ticket #${padSequence(record.sequenceNumber)} closed; transcript archived (${transcript.messageCount} messages).`
      : `⚠️ Ticket #${padSequence(record.sequenceNumber)} closed, but the transcript could not be archived.`,
  });

  ctx.step("schedule_delete");
  await engine.applyEffects(effects);
}
