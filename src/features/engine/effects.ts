/**
 * ModDesk — src/features/engine/effects.ts
 * WHAT: Side-effect commands produced by the engine and the executor that applies them.
 * WHY: Message handling decides *what* should happen (delete, warn, remind) as data; this
 *      module is the only place that turns those decisions into platform calls.
 * FLOWS:
 *  - runEffects(platform, effects) → executes in order; a failing effect is logged and the rest still run
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { scheduleDeferred, type DeferFn } from "../../lib/deferred.js";
import { logger } from "../../lib/logger.js";
import type { MessagePayload, Platform } from "../../platform/types.js";

export type SideEffect =
  | { type: "sendMessage"; channelId: string; payload: MessagePayload }
  | { type: "deleteMessage"; channelId: string; messageId: string }
  /** Posted now, deleted after ttlMs */
  | { type: "sendTransientWarning"; channelId: string; payload: MessagePayload; ttlMs: number }
  | { type: "deleteChannelLater"; channelId: string; delayMs: number; reason: string };

export interface EffectReport {
  applied: number;
  failed: number;
}

export async function runEffects(
  platform: Platform,
  effects: readonly SideEffect[],
  defer: DeferFn = scheduleDeferred
): Promise<EffectReport> {
  const report: EffectReport = { applied: 0, failed: 0 };

  for (const effect of effects) {
    try {
      const okay = await applyEffect(platform, effect, defer);
      if (okay) {
        report.applied += 1;
      } else {
        report.failed += 1;
      }
    } catch (err) {
      report.failed += 1;
      logger.warn({ evt: "effect_threw", effect: effect.type, channelId: effect.channelId, err }, "[effects] effect threw");
    }
  }

  return report;
}

async function applyEffect(platform: Platform, effect: SideEffect, defer: DeferFn): Promise<boolean> {
  switch (effect.type) {
    case "sendMessage": {
      const result = await platform.sendMessage(effect.channelId, effect.payload);
      if (!result.ok) {
        logFailure(effect, result.kind, result.message);
      }
      return result.ok;
    }

    case "deleteMessage": {
      const result = await platform.deleteMessage(effect.channelId, effect.messageId);
      // Already gone is as good as deleted
      if (!result.ok && result.kind !== "not_found") {
        logFailure(effect, result.kind, result.message);
        return false;
      }
      return true;
    }

    case "sendTransientWarning": {
      const result = await platform.sendMessage(effect.channelId, effect.payload);
      if (!result.ok) {
        logFailure(effect, result.kind, result.message);
        return false;
      }
      const { messageId } = result.value;
      defer("delete_warning", effect.ttlMs, () => platform.deleteMessage(effect.channelId, messageId), {
        channelId: effect.channelId,
        messageId,
      });
      return true;
    }

    case "deleteChannelLater": {
      defer("delete_channel", effect.delayMs, () => platform.deleteChannel(effect.channelId, effect.reason), {
        channelId: effect.channelId,
      });
      return true;
    }
  }
}

function logFailure(effect: SideEffect, kind: string, detail: string) {
  logger.warn(
    { evt: "effect_failed", effect: effect.type, channelId: effect.channelId, failure: kind, detail },
    `[effects] ${effect.type} failed`
  );
}
