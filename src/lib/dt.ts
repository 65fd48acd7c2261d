/**
 * ModDesk — src/lib/dt.ts
 * WHAT: Tiny date formatting helpers for strike dates, transcripts and Discord timestamps.
 * All wall-clock formats are rendered in UTC so stored values and exports don't depend
 * on the host's timezone.
 * DOCS:
 *  - Discord timestamps: https://discord.com/developers/docs/reference#message-formatting-timestamp-styles
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

/**
 * Convert Date or milliseconds to Unix timestamp (seconds).
 *
 * GOTCHA: Passing seconds instead of milliseconds here is a common mistake.
 * If your dates are showing as 1970, you probably passed Unix seconds.
 */
export const toUnix = (date: Date | number): number =>
  Math.floor((date instanceof Date ? date.getTime() : date) / 1000);

/**
 * Format timestamp for Discord display.
 * @param style - 'f' = Short date/time, 'R' = Relative
 */
export const ts = (d: Date | number, style: "f" | "R" = "f"): string => `<t:${toUnix(d)}:${style}>`;

/** YYYY-MM-DD */
export function isoDate(d: Date): string {
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

/** DD/MM/YYYY HH:MM */
export function dayMonthYearTime(d: Date): string {
  return (
    `${pad(d.getUTCDate())}/${pad(d.getUTCMonth() + 1)}/${d.getUTCFullYear()} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`
  );
}

/** DD/MM/YYYY HH:MM:SS, the transcript line stamp */
export function dayMonthYearTimeSeconds(d: Date): string {
  return `${dayMonthYearTime(d)}:${pad(d.getUTCSeconds())}`;
}

/** Zero-padded ticket number: 7 → "0007" */
export function padSequence(n: number): string {
  return pad(n, 4);
}
