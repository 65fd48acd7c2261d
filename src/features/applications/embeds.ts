// SPDX-License-Identifier: LicenseRef-ANW-1.0
// Public confirmation cards for /applicant accept and deny.

import { COLOR_DANGER, COLOR_SUCCESS } from "../../lib/constants.js";
import type { EmbedSpec } from "../../platform/types.js";
import { denialNotice, type ApplicantAccepted, type ApplicantDenied } from "./decisions.js";

export function buildAcceptedEmbed(result: ApplicantAccepted): EmbedSpec {
  return {
    title: "✅ Application accepted",
    description:
      `✨ <@${result.applicant.id}>, your application has been accepted.\n` +
      `From now on you're part of the team as <@&${result.role.id}>. Welcome! 🎉`,
    color: COLOR_SUCCESS,
    fields: [
      { name: "Member", value: `<@${result.applicant.id}>`, inline: true },
      { name: "Role", value: `<@&${result.role.id}>`, inline: true },
      { name: "Accepted by", value: `<@${result.moderatorId}>`, inline: true },
    ],
  };
}

export function buildDeniedEmbed(result: ApplicantDenied): EmbedSpec {
  return {
    title: "❌ Application denied",
    description: denialNotice(result.applicant.id),
    color: COLOR_DANGER,
    fields: [
      { name: "Member", value: `<@${result.applicant.id}>`, inline: true },
      { name: "Denied by", value: `<@${result.moderatorId}>`, inline: true },
      {
        name: "Notification",
        value: result.notified ? "✅ Notified by DM" : "⚠️ Could not send a DM (closed)",
        inline: true,
      },
      { name: "Status", value: "🔨 Banned from the server", inline: false },
    ],
  };
}
