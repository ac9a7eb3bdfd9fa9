/**
 * @almanac/core -- DURATION values (RFC 5545 Section 3.3.6).
 *
 * Weeks and days are nominal: they move the wall clock by whole days,
 * so a one-day duration across a DST change keeps the time of day.
 * Hours, minutes and seconds are exact.
 */

import { MS_PER_DAY, MS_PER_HOUR, MS_PER_MINUTE, MS_PER_SECOND } from "./time";

export interface Duration {
  readonly kind: "duration";
  readonly sign: 1 | -1;
  readonly weeks: number;
  readonly days: number;
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

/** A duration split into the part applied on the wall clock and the exact part. */
export interface Span {
  readonly wallMs: number;
  readonly exactMs: number;
}

export const ZERO_SPAN: Span = { wallMs: 0, exactMs: 0 };

const DURATION_PATTERN =
  /^([+-])?P(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;

/**
 * Parse `[+-]P(nW | nD | [nD]T[nH][nM][nS])`.
 * Weeks combined with days are accepted. Returns null for anything else,
 * including a bare "P" or a "T" with no time fields after it.
 */
export function parseDuration(text: string): Duration | null {
  const trimmed = text.trim().toUpperCase();
  const match = DURATION_PATTERN.exec(trimmed);
  if (!match) return null;

  const [, sign, weeks, days, hours, minutes, seconds] = match;
  if (
    weeks === undefined &&
    days === undefined &&
    hours === undefined &&
    minutes === undefined &&
    seconds === undefined
  ) {
    return null;
  }
  if (trimmed.endsWith("T")) return null;

  return {
    kind: "duration",
    sign: sign === "-" ? -1 : 1,
    weeks: weeks ? parseInt(weeks, 10) : 0,
    days: days ? parseInt(days, 10) : 0,
    hours: hours ? parseInt(hours, 10) : 0,
    minutes: minutes ? parseInt(minutes, 10) : 0,
    seconds: seconds ? parseInt(seconds, 10) : 0,
  };
}

export function durationSpan(duration: Duration): Span {
  const wallMs = (duration.weeks * 7 + duration.days) * MS_PER_DAY;
  const exactMs =
    duration.hours * MS_PER_HOUR + duration.minutes * MS_PER_MINUTE + duration.seconds * MS_PER_SECOND;
  return { wallMs: duration.sign * wallMs, exactMs: duration.sign * exactMs };
}

/** Total length in milliseconds, counting a day as 24 hours. */
export function durationToMs(duration: Duration): number {
  const span = durationSpan(duration);
  return span.wallMs + span.exactMs;
}

export function formatDuration(duration: Duration): string {
  const sign = duration.sign === -1 ? "-" : "";
  if (duration.weeks > 0 && duration.days === 0 && duration.hours === 0 && duration.minutes === 0 && duration.seconds === 0) {
    return `${sign}P${duration.weeks}W`;
  }
  const days = duration.weeks * 7 + duration.days;
  let text = `${sign}P${days > 0 ? `${days}D` : ""}`;
  if (duration.hours > 0 || duration.minutes > 0 || duration.seconds > 0) {
    text += "T";
    if (duration.hours > 0) text += `${duration.hours}H`;
    if (duration.minutes > 0) text += `${duration.minutes}M`;
    if (duration.seconds > 0) text += `${duration.seconds}S`;
  }
  return days === 0 && text.endsWith("P") ? `${text}T0S` : text;
}
