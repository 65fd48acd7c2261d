// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/commands/suggest.ts
 * WHAT: /suggest create | accept | deny | pending
 * WHY: Members post ideas as vote cards; staff resolve them by message id.
 * FLOWS:
 *  - create <text> → suggestions.create (card in this channel) → reminder effect if the counter fired
 *  - accept|deny <message_id> → suggestions.resolve → ephemeral result
 *  - pending → oldest pending suggestions (staff)
 * DOCS:
 *  - SlashCommandBuilder: https://discord.js.org/docs/packages/builders/main/SlashCommandBuilder:Class
 */

import { SlashCommandBuilder } from "discord.js";
import type { Engine } from "../features/engine/engine.js";
import { buildPendingListEmbed } from "../features/suggestions/embeds.js";
import type { SuggestionDecision } from "../features/suggestions/workflow.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { MAX_SUGGESTION_LENGTH, PENDING_SUGGESTIONS_SHOWN } from "../lib/constants.js";
import { permissionDenied } from "../lib/outcome.js";
import { hasRequiredRole } from "../lib/roles.js";
import { resolveActor } from "../platform/discord.js";
import { toEmbedBuilder } from "../platform/embeds.js";
import { replyFailure, requireGuild } from "./shared.js";

export const data = new SlashCommandBuilder()
  .setName("suggest")
  .setDescription("Suggestions and voting")
  .addSubcommand((sub) =>
    sub
      .setName("create")
      .setDescription("Post a suggestion for everyone to vote on")
      .addStringOption((opt) =>
        opt
          .setName("suggestion")
          .setDescription(`Your idea (max ${MAX_SUGGESTION_LENGTH} characters)`)
          .setRequired(true)
          .setMaxLength(MAX_SUGGESTION_LENGTH)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("accept")
      .setDescription("Accept a suggestion (staff)")
      .addStringOption((opt) =>
        opt.setName("message_id").setDescription("Message id of the suggestion card").setRequired(true)
      )
  )
  .addSubcommand((sub) =>
    sub
      .setName("deny")
      .setDescription("Deny a suggestion (staff)")
      .addStringOption((opt) =>
        opt.setName("message_id").setDescription("Message id of the suggestion card").setRequired(true)
      )
  )
  .addSubcommand((sub) => sub.setName("pending").setDescription("List suggestions waiting for review (staff)"));

export async function execute(ctx: CommandContext, engine: Engine): Promise<void> {
  const { interaction } = ctx;
  if (!(await requireGuild(interaction))) return;

  const sub = interaction.options.getSubcommand();
  ctx.step("resolve_actor");
  const actor = await resolveActor(interaction);

  if (sub === "create") {
    await ensureDeferred(interaction);
    ctx.step("create");
    const result = await engine.suggestions.create(
      actor,
      interaction.options.getString("suggestion", true),
      interaction.channelId
    );
    if (!result.ok) {
      await replyFailure(interaction, result.error);
      return;
    }
    await engine.applyEffects(result.value.effects);
    await replyOrEdit(interaction, { content: "✅ Your suggestion was posted. Thanks!" });
    return;
  }

  if (sub === "pending") {
    if (!hasRequiredRole(actor, engine.config.roles)) {
      await replyFailure(interaction, permissionDenied("list pending suggestions").error);
      return;
    }
    ctx.step("list_pending");
    const { pending, total } = engine.suggestions.listPending(PENDING_SUGGESTIONS_SHOWN);
    await replyOrEdit(interaction, { embeds: [toEmbedBuilder(buildPendingListEmbed(pending, total))] });
    return;
  }

  const decision: SuggestionDecision = sub === "accept" ? "accept" : "deny";
  const messageId = interaction.options.getString("message_id", true).trim();
  await ensureDeferred(interaction);

  ctx.step("resolve");
  const result = await engine.suggestions.resolve(messageId, decision, actor);
  if (!result.ok) {
    await replyFailure(interaction, result.error);
    return;
  }

  const { record, relocated } = result.value;
  const where = relocated ? "moved to the results channel" : "updated in place";
  await replyOrEdit(interaction, {
    content: `✅ Suggestion ${record.status} (👍 ${record.finalTally?.upvotes ?? 0} · 👎 ${record.finalTally?.downvotes ?? 0}) and ${where}.`,
  });
}
