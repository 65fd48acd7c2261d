// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Greeting lines posted to the welcome channel when members join or leave.

import { logger } from "../lib/logger.js";
import type { Platform } from "../platform/types.js";

export interface GreetingMember {
  id: string;
  displayName: string;
  guildId: string;
}

export type GreetingKind = "join" | "leave";

export function welcomeLine(member: GreetingMember): string {
  return `👋 Welcome, <@${member.id}>! Thanks for joining our server.`;
}

// The member is gone by now, so the name is used instead of a mention
export function goodbyeLine(member: GreetingMember): string {
  return `👋 ${member.displayName} has left the server. See you soon!`;
}

/**
 * postGreeting
 * WHAT: Sends the join or leave line to the welcome channel.
 * RETURNS: true when posted. A missing channel or a failed post is logged, never thrown.
 */
export async function postGreeting(
  platform: Platform,
  welcomeChannelId: string | null,
  kind: GreetingKind,
  member: GreetingMember
): Promise<boolean> {
  if (!welcomeChannelId) {
    logger.debug({ evt: "greeting_skipped", kind, guildId: member.guildId }, "[welcome] no welcome channel configured");
    return false;
  }

  const content = kind === "join" ? welcomeLine(member) : goodbyeLine(member);
  const result = await platform.sendMessage(welcomeChannelId, {
    content,
    mentions: kind === "join" ? "users" : "none",
  });
  if (!result.ok) {
    logger.error(
      {
        evt: "greeting_failed",
        kind,
        guildId: member.guildId,
        userId: member.id,
        channelId: welcomeChannelId,
        failure: result.kind,
      },
      `[welcome] ${kind} message not posted`
    );
    return false;
  }

  logger.info({ evt: "greeting_sent", kind, guildId: member.guildId, userId: member.id }, `[welcome] ${kind} message sent`);
  return true;
}
