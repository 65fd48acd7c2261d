// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/features/strikes/embeds.ts
 * WHAT: Card builders for /strike add, check and remove.
 */

import { COLOR_DANGER, COLOR_INFO, COLOR_SUCCESS, COLOR_WARNING } from "../../lib/constants.js";
import type { EmbedSpec } from "../../platform/types.js";
import type { StrikeEntry } from "../../store/schemas.js";
import type { Escalation, EscalationLevel, StrikeCounts, StrikeSeverity } from "./escalation.js";
import type { StrikeAdded, StrikeRemoved, StrikeSummary, StrikeTarget } from "./ledger.js";

const SEVERITY_LABEL: Record<StrikeSeverity, string> = {
  minor: "🟡 Minor",
  moderate: "🟠 Moderate",
  severe: "🔴 Severe",
};

const LEVEL_LABEL: Record<EscalationLevel, string> = {
  none: "✅ Good standing",
  warning: "⚠️ Warning",
  termination_risk: "🚨 At risk of dismissal",
  direct_termination_risk: "⛔ Direct dismissal risk",
};

const LEVEL_COLOR: Record<EscalationLevel, number> = {
  none: COLOR_SUCCESS,
  warning: COLOR_WARNING,
  termination_risk: COLOR_DANGER,
  direct_termination_risk: COLOR_DANGER,
};

export function formatCounts(counts: StrikeCounts): string {
  return `Minor: ${counts.minor} · Moderate: ${counts.moderate} · Severe: ${counts.severe}`;
}

export function formatEscalation(escalation: Escalation): string {
  const label = LEVEL_LABEL[escalation.level];
  return escalation.rule ? `${label} (${escalation.rule})` : label;
}

function formatEntry(entry: StrikeEntry): string {
  return `${SEVERITY_LABEL[entry.severity]} · ${entry.date} · by ${entry.issuer}\n${entry.reason}`;
}

export function buildStrikeAddedEmbed(target: StrikeTarget, added: StrikeAdded): EmbedSpec {
  return {
    title: "⚖️ Strike issued",
    color: LEVEL_COLOR[added.escalation.level],
    fields: [
      { name: "Member", value: `<@${target.id}>`, inline: true },
      { name: "Severity", value: SEVERITY_LABEL[added.entry.severity], inline: true },
      { name: "Issued by", value: added.entry.issuer, inline: true },
      { name: "Reason", value: added.entry.reason },
      { name: "Tally", value: formatCounts(added.counts) },
      { name: "Status", value: formatEscalation(added.escalation) },
    ],
    footer: `Total strikes: ${added.total}`,
  };
}

export function buildStrikeSummaryEmbed(target: StrikeTarget, summary: StrikeSummary): EmbedSpec {
  const fields = [
    { name: "Tally", value: formatCounts(summary.counts) },
    { name: "Status", value: formatEscalation(summary.escalation) },
  ];
  if (summary.recent.length === 0) {
    fields.push({ name: "History", value: "No strikes on record." });
  } else {
    summary.recent.forEach((entry, i) => {
      fields.push({ name: `#${summary.total - i}`, value: formatEntry(entry) });
    });
  }

  return {
    title: `📋 Strikes for ${target.displayName}`,
    color: summary.total === 0 ? COLOR_INFO : LEVEL_COLOR[summary.escalation.level],
    fields,
    footer: `Total strikes: ${summary.total}`,
  };
}

export function buildStrikeRemovedEmbed(target: StrikeTarget, removed: StrikeRemoved): EmbedSpec {
  return {
    title: "🧹 Strike removed",
    color: COLOR_SUCCESS,
    description: `Removed the most recent strike from <@${target.id}>.`,
    fields: [
      { name: "Removed", value: formatEntry(removed.removed) },
      { name: "Tally", value: formatCounts(removed.counts) },
      { name: "Status", value: formatEscalation(removed.escalation) },
    ],
    footer: `Remaining strikes: ${removed.remaining}`,
  };
}
