/**
 * ModDesk — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite slash commands and verify they all landed.
 * WHY: Guild-scoped deploys (GUILD_ID set) update instantly; global ones take up to an hour.
 * FLOWS: build commands → REST PUT (guild or global) → GET → compare names
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/docs/packages/rest/main/REST:Class
 *  - Bulk overwrite commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 * USAGE: npm run deploy:cmds
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { buildCommands } from "../src/commands/buildCommands.js";
import { env } from "../src/lib/env.js";
import { readProp } from "../src/lib/errors.js";

function commandNames(result: unknown): string[] {
  if (!Array.isArray(result)) return [];
  return result.map((cmd: unknown) => readProp(cmd, "name")).filter((name): name is string => typeof name === "string");
}

async function deploy(): Promise<void> {
  const rest = new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
  const commands = buildCommands();
  const expected = commands.map((c) => c.name);
  const route = env.GUILD_ID
    ? Routes.applicationGuildCommands(env.CLIENT_ID, env.GUILD_ID)
    : Routes.applicationCommands(env.CLIENT_ID);

  console.log(`[deploy] putting ${commands.length} commands ${env.GUILD_ID ? `to guild ${env.GUILD_ID}` : "globally"}`);
  await rest.put(route, { body: commands });

  const deployed = commandNames(await rest.get(route));
  const missing = expected.filter((name) => !deployed.includes(name));
  if (missing.length > 0) {
    console.error(`[deploy] missing after PUT: ${missing.join(", ")}`);
    process.exit(1);
  }
  console.log(`[deploy] ok: ${deployed.join(", ")}`);
}

deploy().catch((err: unknown) => {
  console.error("[deploy] failed", err);
  process.exit(1);
});
