/**
 * @almanac/core -- DATE and DATE-TIME values.
 *
 * Every value is held as a "wall" timestamp: the wall-clock reading
 * encoded through Date.UTC, whatever zone it belongs to. Recurrence
 * expansion works on wall timestamps only; zones.ts turns them into
 * absolute instants when a timeline needs to compare across zones.
 */

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Zone =
  | { readonly type: "utc" }
  | { readonly type: "floating" }
  | { readonly type: "tzid"; readonly tzid: string };

/** An all-day value (VALUE=DATE). `wall` is midnight of that day. */
export interface CalendarDate {
  readonly kind: "date";
  readonly wall: number;
}

/** A date with a time of day, in UTC, floating, or a named zone. */
export interface CalendarDateTime {
  readonly kind: "date-time";
  readonly wall: number;
  readonly zone: Zone;
}

export type TimeValue = CalendarDate | CalendarDateTime;

export interface WallParts {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

export const UTC_ZONE: Zone = { type: "utc" };
export const FLOATING_ZONE: Zone = { type: "floating" };

// ---------------------------------------------------------------------------
// Wall clock arithmetic
// ---------------------------------------------------------------------------

export function wallFromParts(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
): number {
  const wall = Date.UTC(year, month - 1, day, hour, minute, second);
  if (year >= 0 && year < 100) {
    // Date.UTC maps years 0-99 onto 1900-1999.
    const date = new Date(wall);
    date.setUTCFullYear(date.getUTCFullYear() - 1900);
    return date.getTime();
  }
  return wall;
}

export function wallParts(wall: number): WallParts {
  const date = new Date(wall);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
  };
}

/** Whole days since 1970-01-01 (negative before it). */
export function dayNumber(wall: number): number {
  return Math.floor(wall / MS_PER_DAY);
}

export function startOfDay(wall: number): number {
  return dayNumber(wall) * MS_PER_DAY;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;
const DATE_TIME_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z?)$/;

function validParts(parts: WallParts): boolean {
  return (
    parts.month >= 1 &&
    parts.month <= 12 &&
    parts.day >= 1 &&
    parts.day <= daysInMonth(parts.year, parts.month) &&
    parts.hour <= 23 &&
    parts.minute <= 59 &&
    // 60 is a leap second; it is folded into the next minute.
    parts.second <= 60
  );
}

/** Parse `YYYYMMDD`. Returns null when the text is not a real date. */
export function parseDate(text: string): CalendarDate | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) return null;
  const parts: WallParts = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: 0,
    minute: 0,
    second: 0,
  };
  if (!validParts(parts)) return null;
  return { kind: "date", wall: wallFromParts(parts.year, parts.month, parts.day) };
}

/**
 * Parse `YYYYMMDDTHHMMSS[Z]`.
 *
 * A trailing Z makes the value UTC and wins over any TZID; otherwise the
 * TZID names the zone, and without one the value is floating.
 */
export function parseDateTime(text: string, tzid?: string): CalendarDateTime | null {
  const match = DATE_TIME_PATTERN.exec(text.trim());
  if (!match) return null;
  const parts: WallParts = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: Number(match[6]),
  };
  if (!validParts(parts)) return null;

  let zone: Zone;
  if (match[7] === "Z") {
    zone = UTC_ZONE;
  } else if (tzid) {
    zone = { type: "tzid", tzid };
  } else {
    zone = FLOATING_ZONE;
  }

  return {
    kind: "date-time",
    wall: wallFromParts(parts.year, parts.month, parts.day, parts.hour, parts.minute, parts.second),
    zone,
  };
}

/** Parse either form, letting the shape of the text decide. */
export function parseTimeValue(text: string, tzid?: string): TimeValue | null {
  return text.includes("T") ? parseDateTime(text, tzid) : parseDate(text);
}

// ---------------------------------------------------------------------------
// Construction and formatting
// ---------------------------------------------------------------------------

/** A value of the same kind and zone as `template`, at another wall time. */
export function withWall(template: TimeValue, wall: number): TimeValue {
  if (template.kind === "date") {
    return { kind: "date", wall: startOfDay(wall) };
  }
  return { kind: "date-time", wall, zone: template.zone };
}

export function zoneLabel(zone: Zone): string {
  switch (zone.type) {
    case "utc":
      return "Z";
    case "floating":
      return "";
    case "tzid":
      return `[${zone.tzid}]`;
  }
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * ISO-8601 style rendering used in messages and tests:
 * `2024-01-01`, `2024-01-01T09:00:00Z`, `2024-01-01T09:00:00[Europe/Paris]`.
 */
export function formatTimeValue(value: TimeValue): string {
  const p = wallParts(value.wall);
  const date = `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}`;
  if (value.kind === "date") return date;
  return `${date}T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}${zoneLabel(value.zone)}`;
}

/** Render a wall timestamp without zone information. */
export function formatWall(wall: number): string {
  return formatTimeValue({ kind: "date-time", wall, zone: FLOATING_ZONE });
}
