/**
 * ModDesk — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, builds the engine and routes
 *       gateway events and slash commands into it.
 * WHY: Startup and the hot path in one place.
 * FLOWS:
 *  - Startup: env → Sentry → engine config → record store → client login
 *  - messageCreate: toInboundMessage → engine.handleMessage (gate → counters → effects)
 *  - guildMemberAdd/Remove: engine.greet
 *  - interactionCreate: slash command → wrapped executor
 * DOCS:
 *  - discord.js v14 (events): https://discord.js.org/docs/packages/discord.js/main/Events:Enum
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { env } from "./lib/env.js";
import { captureException, flushSentry, initializeSentry, setUser } from "./lib/sentry.js";
initializeSentry();

import {
  Client,
  Collection,
  Events,
  GatewayIntentBits,
  Options,
  Partials,
  type ChatInputCommandInteraction,
} from "discord.js";
import * as applicant from "./commands/applicant.js";
import * as counters from "./commands/counters.js";
import * as strike from "./commands/strike.js";
import * as suggest from "./commands/suggest.js";
import * as ticket from "./commands/ticket.js";
import { createEngine, type Engine } from "./features/engine/engine.js";
import { replyOrEdit, wrapCommand, type CommandContext } from "./lib/cmdWrap.js";
import { loadEngineConfig } from "./lib/config.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { logger } from "./lib/logger.js";
import { newTraceId, runWithCtx } from "./lib/reqctx.js";
import { DiscordPlatform, toInboundMessage } from "./platform/discord.js";
import { createRecordStore } from "./store/index.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  logger.error({ evt: "unhandled_rejection", err: reason }, "[process] Unhandled promise rejection");
  captureException(reason, { context: "unhandledRejection" });
  // Don't exit - discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers, // join/leave greetings, live role names
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent, // gate needs the text to spot the command prefix
    GatewayIntentBits.GuildMessageReactions,
  ],
  partials: [Partials.GuildMember],
  // See: https://discordjs.guide/popular-topics/caching.html#limiting-cache-size
  makeCache: Options.cacheWithLimits({
    ...Options.DefaultMakeCacheSettings,
    MessageManager: 200,
    GuildMemberManager: 500,
    UserManager: 500,
    PresenceManager: 0,
    VoiceStateManager: 0,
  }),
});

type CommandModule = {
  data: { name: string };
  execute: (ctx: CommandContext, engine: Engine) => Promise<void>;
};

const COMMAND_MODULES: CommandModule[] = [suggest, ticket, strike, applicant, counters];

function buildCommandMap(engine: Engine) {
  const commands = new Collection<string, (interaction: ChatInputCommandInteraction) => Promise<void>>();
  for (const mod of COMMAND_MODULES) {
    commands.set(mod.data.name, wrapCommand(mod.data.name, (ctx) => mod.execute(ctx, engine)));
  }
  return commands;
}

function registerListeners(engine: Engine) {
  const commands = buildCommandMap(engine);

  client.once(
    Events.ClientReady,
    wrapEvent("ready", (ready) => {
      logger.info(
        { evt: "ready", tag: ready.user.tag, id: ready.user.id, guilds: ready.guilds.cache.size },
        "Bot ready"
      );
    })
  );

  client.on(
    Events.MessageCreate,
    wrapEvent("messageCreate", async (message) => {
      await engine.handleMessage(toInboundMessage(message));
    })
  );

  client.on(
    Events.GuildMemberAdd,
    wrapEvent("guildMemberAdd", async (member) => {
      await engine.greet("join", { id: member.id, displayName: member.displayName, guildId: member.guild.id });
    })
  );

  client.on(
    Events.GuildMemberRemove,
    wrapEvent("guildMemberRemove", async (member) => {
      await engine.greet("leave", { id: member.id, displayName: member.displayName, guildId: member.guild.id });
    })
  );

  client.on(
    Events.InteractionCreate,
    wrapEvent("interactionCreate", async (interaction) => {
      if (!interaction.isChatInputCommand()) return;

      await runWithCtx(
        {
          traceId: newTraceId(),
          kind: "slash",
          cmd: interaction.commandName,
          userId: interaction.user.id,
          guildId: interaction.guildId,
          channelId: interaction.channelId,
        },
        async () => {
          setUser({ id: interaction.user.id, username: interaction.user.username });

          const executor = commands.get(interaction.commandName);
          if (!executor) {
            logger.warn({ evt: "unknown_command", cmd: interaction.commandName }, "[router] unknown command");
            await replyOrEdit(interaction, { content: "That command isn't available anymore." });
            return;
          }
          await executor(interaction);
        }
      );
    })
  );
}

async function main() {
  const config = loadEngineConfig(process.env);
  const store = createRecordStore(config.store);
  const engine = createEngine({ config, store, platform: new DiscordPlatform(client) });

  registerListeners(engine);

  // ===== Graceful Shutdown =====
  // ORDER: 1) Remove listeners, 2) Destroy client, 3) Close store, 4) Flush Sentry
  let isShuttingDown = false;
  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    isShuttingDown = true;
    logger.info({ signal, pendingKeys: engine.queue.activeKeys }, "[shutdown] Graceful shutdown initiated");

    try {
      client.removeAllListeners();
      await client.destroy();
      store.close();
      await flushSentry();
      logger.info("[shutdown] Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "[shutdown] Error during graceful shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  if (!env.GUILD_ID) {
    logger.info("[startup] GUILD_ID not set - deploy commands globally with npm run deploy:cmds");
  }
  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot if not running in test environment
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
