// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/commands/strike.ts
 * WHAT: /strike add | check | remove for the staff disciplinary ladder.
 * FLOWS:
 *  - add: staff check → ledger.addStrike → public card in channel → ephemeral ack
 *  - check: staff check → ledger.summarize → ephemeral card
 *  - remove: staff check → ledger.removeLastStrike → public card → ephemeral ack
 */

import { SlashCommandBuilder } from "discord.js";
import type { Engine } from "../features/engine/engine.js";
import { SEVERITIES } from "../features/strikes/escalation.js";
import {
  buildStrikeAddedEmbed,
  buildStrikeRemovedEmbed,
  buildStrikeSummaryEmbed,
} from "../features/strikes/embeds.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { MAX_REASON_LENGTH } from "../lib/constants.js";
import { permissionDenied } from "../lib/outcome.js";
import { hasRequiredRole } from "../lib/roles.js";
import { resolveActor } from "../platform/discord.js";
import { toEmbedBuilder } from "../platform/embeds.js";
import { announce, replyFailure, requireGuild, userOption } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("strike")
  .setDescription("Staff strike ledger")
  .addSubcommand((sub) =>
    sub
      .setName("add")
      .setDescription("Give a staff member a strike")
      .addUserOption((opt) => opt.setName("user").setDescription("Who receives the strike").setRequired(true))
      .addStringOption((opt) =>
        opt
          .setName("severity")
          .setDescription("How serious it was")
          .setRequired(true)
          .addChoices(
            { name: "Minor", value: "minor" },
            { name: "Moderate", value: "moderate" },
            { name: "Severe", value: "severe" }
          )
      )
      .addStringOption((opt) =>
        opt.setName("reason").setDescription("What happened").setRequired(true).setMaxLength(MAX_REASON_LENGTH)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("check")
      .setDescription("Show someone's strikes")
      .addUserOption((opt) => opt.setName("user").setDescription("Whose strikes to show").setRequired(true))
  )
  .addSubcommand((sub) =>
    sub
      .setName("remove")
      .setDescription("Remove someone's most recent strike")
      .addUserOption((opt) => opt.setName("user").setDescription("Whose strike to remove").setRequired(true))
  );

export async function execute(ctx: CommandContext, engine: Engine): Promise<void> {
  const { interaction } = ctx;
  if (!(await requireGuild(interaction))) return;

  ctx.step("resolve_actor");
  const actor = await resolveActor(interaction);
  if (!hasRequiredRole(actor, engine.config.roles)) {
    await replyFailure(interaction, permissionDenied("manage strikes").error);
    return;
  }

  const sub = interaction.options.getSubcommand();
  const target = userOption(interaction, "user");
  await ensureDeferred(interaction);

  if (sub === "add") {
    const rawSeverity = interaction.options.getString("severity", true);
    const severity = SEVERITIES.find((s) => s === rawSeverity);
    if (!severity) {
      await replyFailure(interaction, { kind: "validation", field: "severity", message: "Pick a severity." });
      return;
    }

    ctx.step("add_strike");
    const result = await engine.strikes.addStrike(
      target,
      severity,
      interaction.options.getString("reason", true),
      actor.displayName
    );
    if (!result.ok) {
      await replyFailure(interaction, result.error);
      return;
    }

    ctx.step("announce");
    const posted = await announce(engine.platform, interaction.channelId, buildStrikeAddedEmbed(target, result.value));
    await replyOrEdit(interaction, {
      content: posted
        ? `✅ Strike recorded for ${target.displayName}.`
        : `✅ Strike recorded for ${target.displayName}, but I couldn't post the card here.`,
    });
    return;
  }

  if (sub === "check") {
    ctx.step("summarize");
    const result = await engine.strikes.summarize(target.id);
    if (!result.ok) {
      await replyFailure(interaction, result.error);
      return;
    }
    await replyOrEdit(interaction, { embeds: [toEmbedBuilder(buildStrikeSummaryEmbed(target, result.value))] });
    return;
  }

  ctx.step("remove_strike");
  const result = await engine.strikes.removeLastStrike(target);
  if (!result.ok) {
    await replyFailure(interaction, result.error);
    return;
  }
  await announce(engine.platform, interaction.channelId, buildStrikeRemovedEmbed(target, result.value));
  await replyOrEdit(interaction, { content: `✅ Removed the latest strike from ${target.displayName}.` });
}
