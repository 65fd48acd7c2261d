// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * ModDesk — src/features/strikes/escalation.ts
 * WHAT: Maps a strike tally to exactly one escalation level.
 * Rules are checked most severe first; the first match wins.
 */

import type { StrikeEntry } from "../../store/schemas.js";

export type StrikeSeverity = StrikeEntry["severity"];

export type StrikeCounts = Record<StrikeSeverity, number>;

export type EscalationLevel = "none" | "warning" | "termination_risk" | "direct_termination_risk";

export interface Escalation {
  level: EscalationLevel;
  /** Human-readable rule that triggered the level, null for "none" */
  rule: string | null;
}

interface EscalationRule {
  level: Exclude<EscalationLevel, "none">;
  severity: StrikeSeverity;
  atLeast: number;
}

export const SEVERITIES: readonly StrikeSeverity[] = ["minor", "moderate", "severe"];

export const ESCALATION_RULES: readonly EscalationRule[] = [
  { level: "direct_termination_risk", severity: "severe", atLeast: 1 },
  { level: "termination_risk", severity: "minor", atLeast: 5 },
  { level: "termination_risk", severity: "moderate", atLeast: 3 },
  { level: "warning", severity: "minor", atLeast: 3 },
  { level: "warning", severity: "moderate", atLeast: 2 },
];

export function countStrikes(entries: readonly StrikeEntry[]): StrikeCounts {
  const counts: StrikeCounts = { minor: 0, moderate: 0, severe: 0 };
  for (const entry of entries) {
    counts[entry.severity] += 1;
  }
  return counts;
}

function describeRule(rule: EscalationRule): string {
  return `${rule.atLeast}+ ${rule.severity} strike${rule.atLeast === 1 ? "" : "s"}`;
}

export function classifyEscalation(counts: Partial<StrikeCounts>): Escalation {
  for (const rule of ESCALATION_RULES) {
    if ((counts[rule.severity] ?? 0) >= rule.atLeast) {
      return { level: rule.level, rule: describeRule(rule) };
    }
  }
  return { level: "none", rule: null };
}
