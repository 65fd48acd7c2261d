// SPDX-License-Identifier: LicenseRef-ANW-1.0
// /counters status | reset [channel]: operator view of the reminder counters (staff).

import { ChannelType, SlashCommandBuilder } from "discord.js";
import type { Engine } from "../features/engine/engine.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { COLOR_INFO } from "../lib/constants.js";
import { permissionDenied } from "../lib/outcome.js";
import { hasRequiredRole } from "../lib/roles.js";
import { resolveActor } from "../platform/discord.js";
import { toEmbedBuilder } from "../platform/embeds.js";
import { replyFailure, requireGuild } from "./shared.js";
import type { CounterSnapshot } from "../features/counters/counterService.js";
import type { EmbedSpec } from "../platform/types.js";

export const data = new SlashCommandBuilder()
  .setName("counters")
  .setDescription("Reminder counters (staff)")
  .addSubcommand((sub) => sub.setName("status").setDescription("Show current counts and thresholds"))
  .addSubcommand((sub) =>
    sub
      .setName("reset")
      .setDescription("Reset channel message counters")
      .addChannelOption((opt) =>
        opt
          .setName("channel")
          .setDescription("Only this channel (default: all channels)")
          .addChannelTypes(ChannelType.GuildText)
      )
  );

export function buildCounterStatusEmbed(snapshot: CounterSnapshot): EmbedSpec {
  const channelLines = Object.entries(snapshot.channels).map(
    ([channelId, count]) => `<#${channelId}>: ${count}/${snapshot.thresholds.channelMessages}`
  );
  return {
    title: "📊 Reminder counters",
    color: COLOR_INFO,
    fields: [
      { name: "Channels", value: channelLines.length > 0 ? channelLines.join("\n") : "No messages counted yet." },
      { name: "Help message", value: `${snapshot.globals.help}/${snapshot.thresholds.help}`, inline: true },
      {
        name: "Suggestion reminder",
        value: `${snapshot.globals.suggestionReminder}/${snapshot.thresholds.suggestionReminder}`,
        inline: true,
      },
    ],
  };
}

export async function execute(ctx: CommandContext, engine: Engine): Promise<void> {
  const { interaction } = ctx;
  if (!(await requireGuild(interaction))) return;

  const actor = await resolveActor(interaction);
  if (!hasRequiredRole(actor, engine.config.roles)) {
    await replyFailure(interaction, permissionDenied("manage counters").error);
    return;
  }

  if (interaction.options.getSubcommand() === "status") {
    await replyOrEdit(interaction, { embeds: [toEmbedBuilder(buildCounterStatusEmbed(engine.counters.snapshot()))] });
    return;
  }

  const channel = interaction.options.getChannel("channel");
  ctx.step("reset");
  const previous = await engine.counters.reset(channel?.id);
  const total = Object.values(previous).reduce((sum, n) => sum + n, 0);
  await replyOrEdit(interaction, {
    content: channel
      ? `✅ Reset <#${channel.id}> (was ${previous[channel.id] ?? 0}).`
      : `✅ Reset ${Object.keys(previous).length} channel counter(s) (${total} messages counted).`,
  });
}
