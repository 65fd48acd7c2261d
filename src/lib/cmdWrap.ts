/**
 * ModDesk — src/lib/cmdWrap.ts
 * WHAT: Helpers that standardize the slash-command lifecycle: tracing, step logging,
 *       a last-resort error reply and safe defers/replies.
 * WHY: Discord wants a first response within 3 seconds; every command goes through the
 *      same defer/reply rules so we stop seeing 10062 and 40060.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → ephemeral error reply on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral by default)
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - Interaction response rules (3-second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 *  - InteractionReplyOptions: https://discord.js.org/docs/packages/discord.js/main/InteractionReplyOptions:Interface
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  DiscordAPIError,
  MessageFlags,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
} from "discord.js";
import { logger, redact } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId, runWithCtx } from "./reqctx.js";
import { classifyError, errorContext, shouldReportToSentry, userFriendlyMessage } from "./errors.js";

/** Label for where we are in a command ("resolve_actor", "workflow", "reply") */
type Phase = string;

/**
 * Passed to every wrapped command. Call step() to mark progress; the phase shows up
 * in logs, breadcrumbs and the error log if the command throws.
 */
export type CommandContext = {
  interaction: ChatInputCommandInteraction;
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

type CommandExecutor = (ctx: CommandContext) => Promise<void>;

const MAX_BODY_SNIPPET = 120;

/**
 * REST metadata from a DiscordAPIError for logs. The request body is redacted and
 * truncated; file uploads are only counted.
 */
function discordRestMeta(err: unknown) {
  if (!(err instanceof DiscordAPIError)) return null;
  let bodySnippet: string | undefined;
  const body = err.requestBody;
  if (body.json !== undefined) {
    bodySnippet = redact(JSON.stringify(body.json));
  } else if (body.files?.length) {
    bodySnippet = `[files:${body.files.length}]`;
  }
  if (bodySnippet && bodySnippet.length > MAX_BODY_SNIPPET) {
    bodySnippet = `${bodySnippet.slice(0, MAX_BODY_SNIPPET)}...`;
  }
  return {
    status: err.status,
    code: err.code,
    method: err.method,
    url: err.url,
    bodySnippet,
  };
}

function errorCode(err: unknown): unknown {
  return err instanceof DiscordAPIError ? err.code : undefined;
}

export function wrapCommand(name: string, fn: CommandExecutor) {
  /**
   * wrapCommand
   * WHAT: Decorates a command handler with tracing, step logging and a last-resort error reply.
   * RETURNS: A handler for ChatInputCommandInteraction that never rejects.
   * PITFALLS:
   *  - Workflow failures come back as Outcome values and are replied to by the command
   *    itself; only unexpected throws land in the catch here.
   */
  return async (interaction: ChatInputCommandInteraction) => {
    const store = reqCtx();
    const traceId = store.traceId ?? newTraceId();
    const cmdName = store.cmd ?? name;
    const startedAt = Date.now();
    let phase: Phase = "enter";

    const commandCtx: CommandContext = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.info({ evt: "cmd_step", traceId, cmd: cmdName, phase });
        addBreadcrumb({
          category: "cmd",
          message: cmdName,
          data: { phase, traceId },
          level: "info",
        });
        setTag("phase", phase);
      },
      currentPhase: () => phase,
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: cmdName,
        sub: interaction.options.getSubcommand(false),
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );

    setTag("cmd", cmdName);
    setTag("traceId", traceId);
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId,
    });

    try {
      // Workflow logs and deferred actions started by the command inherit its trace
      await runWithCtx({ traceId, cmd: cmdName, kind: "slash" }, () => fn(commandCtx));
      logger.info({ evt: "cmd_ok", traceId, cmd: cmdName, ms: Date.now() - startedAt }, "command ok");
    } catch (error) {
      const classified = classifyError(error);
      logger.error(
        {
          evt: "cmd_error",
          traceId,
          cmd: cmdName,
          phase,
          ...errorContext(classified),
          err: error,
        },
        `command error: ${classified.message}`
      );
      setTag("errorKind", classified.kind);

      if (shouldReportToSentry(classified)) {
        captureException(error, { cmd: cmdName, phase, traceId, errorKind: classified.kind });
      }

      try {
        await replyOrEdit(interaction, { content: `❌ ${userFriendlyMessage(classified)} (trace \`${traceId}\`)` });
      } catch (replyErr) {
        logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "Failed to send error reply");
      }
    }
  };
}

export async function ensureDeferred(
  interaction: ChatInputCommandInteraction,
  options: { ephemeral?: boolean } = {}
) {
  /**
   * ensureDeferred
   * WHAT: First-time acknowledgement with deferReply if we haven't replied yet.
   * THROWS: Re-throws anything but 10062 (interaction expired), which is logged.
   */
  if (interaction.deferred || interaction.replied) {
    return;
  }
  const ephemeral = options.ephemeral ?? true;
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
    logger.debug({ evt: "cmd_deferred", traceId: reqCtx().traceId, ephemeral }, "[cmd] deferred reply");
  } catch (err) {
    const code = errorCode(err);
    const logPayload = {
      evt: "cmd_defer_fail",
      traceId: reqCtx().traceId,
      code,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (code === 10062) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Reply with the right API for the interaction's state. Replies are ephemeral unless
 * the caller passes `ephemeral: false`. After a defer, visibility was fixed by the defer.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: Omit<InteractionReplyOptions, "flags">,
  options: { ephemeral?: boolean } = {}
) {
  const ephemeral = options.ephemeral ?? true;
  const withFlags: InteractionReplyOptions = ephemeral ? { ...payload, flags: MessageFlags.Ephemeral } : payload;
  try {
    if (interaction.deferred) {
      await interaction.editReply(payload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const code = errorCode(err);
    const logPayload = {
      evt: "cmd_reply_fail",
      traceId: reqCtx().traceId,
      code,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (code === 10062) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (code === 40060) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
