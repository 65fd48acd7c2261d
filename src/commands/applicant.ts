// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/commands/applicant.ts
 * WHAT: /applicant accept <user> <role> and /applicant deny <user>
 * WHY: Staff answer join applications; accept grants the role, deny notifies and bans.
 */

import { SlashCommandBuilder } from "discord.js";
import { buildAcceptedEmbed, buildDeniedEmbed } from "../features/applications/embeds.js";
import type { Engine } from "../features/engine/engine.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { resolveActor } from "../platform/discord.js";
import { announce, replyFailure, requireGuild, userOption } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("applicant")
  .setDescription("Answer join applications (staff)")
  .addSubcommand((sub) =>
    sub
      .setName("accept")
      .setDescription("Accept an application and grant a role")
      .addUserOption((opt) => opt.setName("user").setDescription("The applicant").setRequired(true))
      .addRoleOption((opt) => opt.setName("role").setDescription("Role to grant").setRequired(true))
  )
  .addSubcommand((sub) =>
    sub
      .setName("deny")
      .setDescription("Deny an application; the applicant is notified by DM and banned")
      .addUserOption((opt) => opt.setName("user").setDescription("The applicant").setRequired(true))
  );

export async function execute(ctx: CommandContext, engine: Engine): Promise<void> {
  const { interaction } = ctx;
  const guildId = await requireGuild(interaction);
  if (!guildId) return;

  ctx.step("resolve_actor");
  const moderator = await resolveActor(interaction);
  const applicant = userOption(interaction, "user");
  await ensureDeferred(interaction);

  if (interaction.options.getSubcommand() === "accept") {
    const role = interaction.options.getRole("role", true);
    ctx.step("accept");
    const result = await engine.applications.acceptApplicant(
      guildId,
      applicant,
      { id: role.id, name: role.name },
      moderator
    );
    if (!result.ok) {
      await replyFailure(interaction, result.error);
      return;
    }
    await announce(engine.platform, interaction.channelId, buildAcceptedEmbed(result.value));
    await replyOrEdit(interaction, { content: `✅ ${applicant.displayName} now has ${role.name}.` });
    return;
  }

  ctx.step("deny");
  const result = await engine.applications.denyApplicant(guildId, applicant, moderator);
  if (!result.ok) {
    await replyFailure(interaction, result.error);
    return;
  }
  await announce(engine.platform, interaction.channelId, buildDeniedEmbed(result.value));
  await replyOrEdit(interaction, {
    content: result.value.notified
      ? `✅ ${applicant.displayName} was notified and banned.`
      : `✅ ${applicant.displayName} was banned (their DMs are closed, so no notice was delivered).`,
  });
}
