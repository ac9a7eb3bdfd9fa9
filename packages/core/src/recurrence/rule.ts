/**
 * @almanac/core -- RECUR values (RFC 5545 Section 3.3.10).
 *
 * Parsing happens in two passes. The lexical pass turns `KEY=VALUE;...`
 * into numbers, weekday tokens and an UNTIL value; anything it cannot
 * read is a PropertyConversionError. The zod schema then checks what the
 * rule means (ranges, COUNT vs UNTIL, BYWEEKNO outside YEARLY, ...) and
 * reports every violation at once as a RecurrenceDefinitionError.
 */

import { z } from "zod/v4";
import { PropertyConversionError, RecurrenceDefinitionError } from "../errors";
import { parseTimeValue, wallParts, type TimeValue } from "../time";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const FREQUENCIES = [
  "SECONDLY",
  "MINUTELY",
  "HOURLY",
  "DAILY",
  "WEEKLY",
  "MONTHLY",
  "YEARLY",
] as const;

export type Frequency = (typeof FREQUENCIES)[number];

/** Weekday codes in ISO order: index 0 is Monday. */
export const WEEKDAYS = ["MO", "TU", "WE", "TH", "FR", "SA", "SU"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** A BYDAY entry: `MO`, `1MO` (first Monday), `-1FR` (last Friday). */
export interface WeekdayNum {
  readonly weekday: Weekday;
  readonly ordinal?: number;
}

export interface RecurrenceRule {
  readonly kind: "recur";
  readonly freq: Frequency;
  readonly interval: number;
  readonly count?: number;
  /** Inclusive end. A DATE value covers the whole day. */
  readonly until?: TimeValue;
  readonly bySecond: readonly number[];
  readonly byMinute: readonly number[];
  readonly byHour: readonly number[];
  readonly byDay: readonly WeekdayNum[];
  readonly byMonthDay: readonly number[];
  readonly byYearDay: readonly number[];
  readonly byWeekNo: readonly number[];
  readonly byMonth: readonly number[];
  readonly bySetPos: readonly number[];
  readonly weekStart: Weekday;
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

function rangeList(field: string, min: number, max: number, allowNegative: boolean) {
  const message = allowNegative
    ? `${field} values must be between -${max} and -${min} or ${min} and ${max}`
    : `${field} values must be between ${min} and ${max}`;
  return z.array(
    z
      .number()
      .int(message)
      .min(allowNegative ? -max : min, message)
      .max(max, message)
      .refine((n) => !allowNegative || n !== 0, message),
  );
}

const WeekdayNumSchema = z.object({
  weekday: z.enum(WEEKDAYS),
  ordinal: z
    .number()
    .int()
    .min(-53, "BYDAY ordinals must be between -53 and 53, excluding 0")
    .max(53, "BYDAY ordinals must be between -53 and 53, excluding 0")
    .refine((n) => n !== 0, "BYDAY ordinals must be between -53 and 53, excluding 0")
    .optional(),
});

export const RecurrenceRuleSchema = z
  .object({
    freq: z.enum(FREQUENCIES, "FREQ must be one of " + FREQUENCIES.join(", ")),
    interval: z.number().int().min(1, "INTERVAL must be a positive integer"),
    count: z.number().int().min(1, "COUNT must be a positive integer").optional(),
    hasUntil: z.boolean(),
    bySecond: rangeList("BYSECOND", 0, 60, false),
    byMinute: rangeList("BYMINUTE", 0, 59, false),
    byHour: rangeList("BYHOUR", 0, 23, false),
    byDay: z.array(WeekdayNumSchema),
    byMonthDay: rangeList("BYMONTHDAY", 1, 31, true),
    byYearDay: rangeList("BYYEARDAY", 1, 366, true),
    byWeekNo: rangeList("BYWEEKNO", 1, 53, true),
    byMonth: rangeList("BYMONTH", 1, 12, false),
    bySetPos: rangeList("BYSETPOS", 1, 366, true),
    weekStart: z.enum(WEEKDAYS, "WKST must be a weekday code"),
  })
  .superRefine((rule, ctx) => {
    if (rule.count !== undefined && rule.hasUntil) {
      ctx.addIssue({ code: "custom", message: "COUNT and UNTIL are mutually exclusive", path: ["count"] });
    }
    if (rule.byWeekNo.length > 0 && rule.freq !== "YEARLY") {
      ctx.addIssue({ code: "custom", message: "BYWEEKNO is only valid with FREQ=YEARLY", path: ["byWeekNo"] });
    }
    if (rule.byYearDay.length > 0 && ["DAILY", "WEEKLY", "MONTHLY"].includes(rule.freq)) {
      ctx.addIssue({
        code: "custom",
        message: `BYYEARDAY is not valid with FREQ=${rule.freq}`,
        path: ["byYearDay"],
      });
    }
    if (rule.byMonthDay.length > 0 && rule.freq === "WEEKLY") {
      ctx.addIssue({ code: "custom", message: "BYMONTHDAY is not valid with FREQ=WEEKLY", path: ["byMonthDay"] });
    }
    const otherByParts =
      rule.bySecond.length +
      rule.byMinute.length +
      rule.byHour.length +
      rule.byDay.length +
      rule.byMonthDay.length +
      rule.byYearDay.length +
      rule.byWeekNo.length +
      rule.byMonth.length;
    if (rule.bySetPos.length > 0 && otherByParts === 0) {
      ctx.addIssue({ code: "custom", message: "BYSETPOS requires another BYxxx rule part", path: ["bySetPos"] });
    }
  });

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const INTEGER_PATTERN = /^[+-]?\d+$/;
const BYDAY_PATTERN = /^([+-]?\d{1,2})?(MO|TU|WE|TH|FR|SA|SU)$/;

function parseIntegerList(propertyName: string, raw: string, key: string, value: string): number[] {
  return value.split(",").map((item) => {
    const trimmed = item.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      throw new PropertyConversionError(propertyName, raw, `${key} contains non-integer "${item}"`);
    }
    return parseInt(trimmed, 10);
  });
}

function parseInteger(propertyName: string, raw: string, key: string, value: string): number {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new PropertyConversionError(propertyName, raw, `${key} must be an integer, got "${value}"`);
  }
  return parseInt(trimmed, 10);
}

function parseByDay(propertyName: string, raw: string, value: string): Array<{ weekday: string; ordinal?: number }> {
  return value.split(",").map((item) => {
    const match = BYDAY_PATTERN.exec(item.trim().toUpperCase());
    if (!match) {
      throw new PropertyConversionError(propertyName, raw, `BYDAY contains invalid entry "${item}"`);
    }
    return match[1] === undefined
      ? { weekday: match[2] }
      : { weekday: match[2], ordinal: parseInt(match[1], 10) };
  });
}

/**
 * Parse a recurrence rule such as `FREQ=MONTHLY;BYDAY=1MO;COUNT=3`.
 *
 * Keys are case-insensitive and may appear in any order; `X-` keys are
 * ignored. A repeated key is a definition error.
 *
 * @param text - the raw RRULE / EXRULE value
 * @param propertyName - used in error messages (default "RRULE")
 */
export function parseRecurrenceRule(text: string, propertyName = "RRULE"): RecurrenceRule {
  const parts = new Map<string, string>();
  const issues: string[] = [];

  for (const segment of text.trim().split(";")) {
    if (segment.trim() === "") continue;
    const eqIdx = segment.indexOf("=");
    if (eqIdx === -1) {
      throw new PropertyConversionError(propertyName, text, `rule part "${segment}" has no "="`);
    }
    const key = segment.slice(0, eqIdx).trim().toUpperCase();
    if (key.startsWith("X-")) continue;
    if (parts.has(key)) {
      issues.push(`${key} appears more than once`);
    }
    parts.set(key, segment.slice(eqIdx + 1).trim());
  }

  const known = new Set([
    "FREQ", "INTERVAL", "COUNT", "UNTIL", "BYSECOND", "BYMINUTE", "BYHOUR", "BYDAY",
    "BYMONTHDAY", "BYYEARDAY", "BYWEEKNO", "BYMONTH", "BYSETPOS", "WKST",
  ]);
  for (const key of parts.keys()) {
    if (!known.has(key)) {
      throw new PropertyConversionError(propertyName, text, `unknown rule part "${key}"`);
    }
  }

  const list = (key: string): number[] => {
    const value = parts.get(key);
    return value === undefined ? [] : parseIntegerList(propertyName, text, key, value);
  };

  let until: TimeValue | undefined;
  const untilText = parts.get("UNTIL");
  if (untilText !== undefined) {
    until = parseTimeValue(untilText) ?? undefined;
    if (!until) {
      throw new PropertyConversionError(propertyName, text, `UNTIL "${untilText}" is not a DATE or DATE-TIME`);
    }
  }

  const intervalText = parts.get("INTERVAL");
  const countText = parts.get("COUNT");
  const byDayText = parts.get("BYDAY");

  const candidate = {
    freq: parts.get("FREQ")?.toUpperCase(),
    interval: intervalText === undefined ? 1 : parseInteger(propertyName, text, "INTERVAL", intervalText),
    count: countText === undefined ? undefined : parseInteger(propertyName, text, "COUNT", countText),
    hasUntil: until !== undefined,
    bySecond: list("BYSECOND"),
    byMinute: list("BYMINUTE"),
    byHour: list("BYHOUR"),
    byDay: byDayText === undefined ? [] : parseByDay(propertyName, text, byDayText),
    byMonthDay: list("BYMONTHDAY"),
    byYearDay: list("BYYEARDAY"),
    byWeekNo: list("BYWEEKNO"),
    byMonth: list("BYMONTH"),
    bySetPos: list("BYSETPOS"),
    weekStart: parts.get("WKST")?.toUpperCase() ?? "MO",
  };

  const result = RecurrenceRuleSchema.safeParse(candidate);
  if (!result.success) {
    for (const issue of result.error.issues) {
      if (!issues.includes(issue.message)) issues.push(issue.message);
    }
  }
  if (issues.length > 0 || !result.success) {
    throw new RecurrenceDefinitionError(propertyName, text, issues);
  }

  const rule = result.data;
  return {
    kind: "recur",
    freq: rule.freq,
    interval: rule.interval,
    ...(rule.count !== undefined ? { count: rule.count } : {}),
    ...(until !== undefined ? { until } : {}),
    bySecond: rule.bySecond,
    byMinute: rule.byMinute,
    byHour: rule.byHour,
    byDay: rule.byDay,
    byMonthDay: rule.byMonthDay,
    byYearDay: rule.byYearDay,
    byWeekNo: rule.byWeekNo,
    byMonth: rule.byMonth,
    bySetPos: rule.bySetPos,
    weekStart: rule.weekStart,
  };
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatUntil(value: TimeValue): string {
  const p = wallParts(value.wall);
  const date = `${pad(p.year, 4)}${pad(p.month)}${pad(p.day)}`;
  if (value.kind === "date") return date;
  const utc = value.zone.type === "utc" ? "Z" : "";
  return `${date}T${pad(p.hour)}${pad(p.minute)}${pad(p.second)}${utc}`;
}

/**
 * Canonical text of a rule, with parts in a fixed order. Used in
 * diagnostics and as a stable key; not a general iCalendar writer.
 */
export function formatRecurrenceRule(rule: RecurrenceRule): string {
  const parts = [`FREQ=${rule.freq}`];
  if (rule.interval !== 1) parts.push(`INTERVAL=${rule.interval}`);
  if (rule.count !== undefined) parts.push(`COUNT=${rule.count}`);
  if (rule.until !== undefined) parts.push(`UNTIL=${formatUntil(rule.until)}`);
  const lists: Array<[string, readonly number[]]> = [
    ["BYSECOND", rule.bySecond],
    ["BYMINUTE", rule.byMinute],
    ["BYHOUR", rule.byHour],
  ];
  for (const [key, values] of lists) {
    if (values.length > 0) parts.push(`${key}=${values.join(",")}`);
  }
  if (rule.byDay.length > 0) {
    parts.push(`BYDAY=${rule.byDay.map((d) => `${d.ordinal ?? ""}${d.weekday}`).join(",")}`);
  }
  const dayLists: Array<[string, readonly number[]]> = [
    ["BYMONTHDAY", rule.byMonthDay],
    ["BYYEARDAY", rule.byYearDay],
    ["BYWEEKNO", rule.byWeekNo],
    ["BYMONTH", rule.byMonth],
    ["BYSETPOS", rule.bySetPos],
  ];
  for (const [key, values] of dayLists) {
    if (values.length > 0) parts.push(`${key}=${values.join(",")}`);
  }
  if (rule.weekStart !== "MO") parts.push(`WKST=${rule.weekStart}`);
  return parts.join(";");
}
