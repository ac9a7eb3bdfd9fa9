/**
 * @almanac/core -- typed property values.
 *
 * Maps a raw property value to its typed form. The value type comes
 * from the VALUE parameter when present, otherwise from the property's
 * default type:
 *
 * | Property                                           | Default type      |
 * |----------------------------------------------------|-------------------|
 * | DTSTART DTEND DUE RECURRENCE-ID DTSTAMP CREATED    | DATE-TIME         |
 * | LAST-MODIFIED COMPLETED                            | DATE-TIME         |
 * | EXDATE RDATE                                       | DATE-TIME list    |
 * | DURATION TRIGGER                                   | DURATION          |
 * | RRULE EXRULE                                       | RECUR             |
 * | FREEBUSY                                           | PERIOD list       |
 * | TZOFFSETFROM TZOFFSETTO                            | UTC-OFFSET        |
 * | SEQUENCE PRIORITY PERCENT-COMPLETE REPEAT          | INTEGER           |
 * | GEO                                                | FLOAT list (";")  |
 * | CATEGORIES RESOURCES                               | TEXT list         |
 * | anything else                                      | TEXT              |
 */

import { PropertyConversionError } from "./errors";
import { parseDuration, type Duration } from "./duration";
import type { ParameterMap } from "./parameters";
import { parseRecurrenceRule, type RecurrenceRule } from "./recurrence/rule";
import { parseDate, parseDateTime, type CalendarDate, type CalendarDateTime, type TimeValue } from "./time";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A PERIOD value: an explicit end or a duration from the start. */
export interface Period {
  readonly kind: "period";
  readonly start: CalendarDateTime;
  readonly end?: CalendarDateTime;
  readonly duration?: Duration;
}

export interface TimeListValue {
  readonly kind: "time-list";
  readonly values: ReadonlyArray<TimeValue | Period>;
}

export interface PeriodListValue {
  readonly kind: "period-list";
  readonly values: readonly Period[];
}

export interface UtcOffsetValue {
  readonly kind: "utc-offset";
  /** Minutes east of UTC; seconds show up as a fraction. */
  readonly minutes: number;
}

export interface IntegerValue {
  readonly kind: "integer";
  readonly value: number;
}

export interface FloatListValue {
  readonly kind: "float-list";
  readonly values: readonly number[];
}

export interface TextValue {
  readonly kind: "text";
  readonly value: string;
}

export interface TextListValue {
  readonly kind: "text-list";
  readonly values: readonly string[];
}

export interface BooleanValue {
  readonly kind: "boolean";
  readonly value: boolean;
}

export type PropertyValue =
  | CalendarDate
  | CalendarDateTime
  | TimeListValue
  | Duration
  | PeriodListValue
  | RecurrenceRule
  | UtcOffsetValue
  | IntegerValue
  | FloatListValue
  | TextValue
  | TextListValue
  | BooleanValue;

export type ValueType =
  | "DATE"
  | "DATE-TIME"
  | "DATE-TIME-LIST"
  | "DURATION"
  | "PERIOD-LIST"
  | "RECUR"
  | "UTC-OFFSET"
  | "INTEGER"
  | "FLOAT-LIST"
  | "TEXT"
  | "TEXT-LIST"
  | "BOOLEAN";

const DEFAULT_TYPES: Readonly<Record<string, ValueType>> = {
  DTSTART: "DATE-TIME",
  DTEND: "DATE-TIME",
  DUE: "DATE-TIME",
  "RECURRENCE-ID": "DATE-TIME",
  DTSTAMP: "DATE-TIME",
  CREATED: "DATE-TIME",
  "LAST-MODIFIED": "DATE-TIME",
  COMPLETED: "DATE-TIME",
  EXDATE: "DATE-TIME-LIST",
  RDATE: "DATE-TIME-LIST",
  DURATION: "DURATION",
  TRIGGER: "DURATION",
  RRULE: "RECUR",
  EXRULE: "RECUR",
  FREEBUSY: "PERIOD-LIST",
  TZOFFSETFROM: "UTC-OFFSET",
  TZOFFSETTO: "UTC-OFFSET",
  SEQUENCE: "INTEGER",
  PRIORITY: "INTEGER",
  "PERCENT-COMPLETE": "INTEGER",
  REPEAT: "INTEGER",
  GEO: "FLOAT-LIST",
  CATEGORIES: "TEXT-LIST",
  RESOURCES: "TEXT-LIST",
};

/** Properties whose value is a comma-separated list of the VALUE type. */
const LIST_PROPERTIES = new Set(["EXDATE", "RDATE", "FREEBUSY", "CATEGORIES", "RESOURCES"]);

/**
 * Decide the value type of a property from its name and VALUE parameter.
 * An unrecognized VALUE falls back to the default type.
 */
export function valueTypeFor(name: string, params: ParameterMap): ValueType {
  const upper = name.toUpperCase();
  const fallback = DEFAULT_TYPES[upper] ?? "TEXT";
  const declared = params.get("VALUE")?.toUpperCase();
  if (declared === undefined) return fallback;

  const isList = LIST_PROPERTIES.has(upper);
  switch (declared) {
    case "DATE":
      return isList ? "DATE-TIME-LIST" : "DATE";
    case "DATE-TIME":
      return isList ? "DATE-TIME-LIST" : "DATE-TIME";
    case "PERIOD":
      return upper === "RDATE" ? "DATE-TIME-LIST" : "PERIOD-LIST";
    case "DURATION":
      return "DURATION";
    case "RECUR":
      return "RECUR";
    case "UTC-OFFSET":
      return "UTC-OFFSET";
    case "INTEGER":
      return "INTEGER";
    case "FLOAT":
      return "FLOAT-LIST";
    case "BOOLEAN":
      return "BOOLEAN";
    case "TEXT":
      return isList ? "TEXT-LIST" : "TEXT";
    default:
      return fallback;
  }
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

/** Unescape a TEXT value (RFC 5545 Section 3.3.11). */
export function unescapeText(text: string): string {
  return text.replace(/\\([nN\\,;])/g, (_, ch: string) => (ch === "n" || ch === "N" ? "\n" : ch));
}

/** Split a TEXT list on commas that are not escaped, unescaping each item. */
export function splitTextList(text: string): string[] {
  const items: string[] = [];
  let current = "";
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\\" && i + 1 < text.length) {
      current += ch + text[i + 1];
      i++;
    } else if (ch === ",") {
      items.push(unescapeText(current));
      current = "";
    } else {
      current += ch;
    }
  }
  items.push(unescapeText(current));
  return items;
}

// ---------------------------------------------------------------------------
// Scalar codecs
// ---------------------------------------------------------------------------

const UTC_OFFSET_PATTERN = /^([+-])(\d{2})(\d{2})(\d{2})?$/;

/** Parse `+HHMM[SS]` / `-HHMM[SS]` into minutes east of UTC. */
export function parseUtcOffset(text: string): number | null {
  const match = UTC_OFFSET_PATTERN.exec(text.trim());
  if (!match) return null;
  const hours = Number(match[2]);
  const minutes = Number(match[3]);
  const seconds = match[4] ? Number(match[4]) : 0;
  if (minutes > 59 || seconds > 59) return null;
  const total = hours * 60 + minutes + seconds / 60;
  if (match[1] === "-") {
    // "-0000" is not a valid offset.
    return total === 0 ? null : -total;
  }
  return total;
}

/** Parse `start/end` or `start/duration`. The start must be a DATE-TIME. */
export function parsePeriod(text: string, tzid?: string): Period | null {
  const slash = text.indexOf("/");
  if (slash === -1) return null;
  const start = parseDateTime(text.slice(0, slash), tzid);
  if (!start) return null;
  const rest = text.slice(slash + 1).trim();

  if (/^[+-]?P/i.test(rest)) {
    const duration = parseDuration(rest);
    if (!duration || duration.sign === -1) return null;
    return { kind: "period", start, duration };
  }
  const end = parseDateTime(rest, tzid);
  if (!end || end.wall < start.wall) return null;
  return { kind: "period", start, end };
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

export interface RawProperty {
  readonly name: string;
  readonly params: ParameterMap;
  readonly raw: string;
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Convert a raw property to its typed value.
 * @throws PropertyConversionError naming the property and raw value
 */
export function convertProperty(property: RawProperty): PropertyValue {
  const { name, params, raw } = property;
  const type = valueTypeFor(name, params);
  const tzid = params.get("TZID");
  const declared = params.get("VALUE")?.toUpperCase();
  const fail = (detail: string): never => {
    throw new PropertyConversionError(name, raw, detail);
  };

  switch (type) {
    case "DATE": {
      return parseDate(raw) ?? fail("expected a DATE (YYYYMMDD)");
    }
    case "DATE-TIME": {
      // Permissive: an 8-digit value without VALUE=DATE is read as a date.
      if (declared === undefined && /^\s*\d{8}\s*$/.test(raw)) {
        return parseDate(raw) ?? fail("expected a DATE (YYYYMMDD)");
      }
      return parseDateTime(raw, tzid) ?? fail("expected a DATE-TIME (YYYYMMDDTHHMMSS[Z])");
    }
    case "DATE-TIME-LIST": {
      const values = splitList(raw).map((item): TimeValue | Period => {
        if (declared === "PERIOD" || item.includes("/")) {
          return parsePeriod(item, tzid) ?? fail(`"${item}" is not a PERIOD`);
        }
        if (declared === "DATE" || (declared === undefined && /^\d{8}$/.test(item))) {
          return parseDate(item) ?? fail(`"${item}" is not a DATE`);
        }
        return parseDateTime(item, tzid) ?? fail(`"${item}" is not a DATE-TIME`);
      });
      if (values.length === 0) fail("empty list");
      return { kind: "time-list", values };
    }
    case "DURATION": {
      return parseDuration(raw) ?? fail("expected a DURATION such as PT1H30M");
    }
    case "PERIOD-LIST": {
      const values = splitList(raw).map((item) => parsePeriod(item, tzid) ?? fail(`"${item}" is not a PERIOD`));
      if (values.length === 0) fail("empty list");
      return { kind: "period-list", values };
    }
    case "RECUR": {
      return parseRecurrenceRule(raw, name);
    }
    case "UTC-OFFSET": {
      const minutes = parseUtcOffset(raw);
      return minutes === null ? fail("expected a UTC offset such as +0130") : { kind: "utc-offset", minutes };
    }
    case "INTEGER": {
      const trimmed = raw.trim();
      if (!/^[+-]?\d+$/.test(trimmed)) fail("expected an INTEGER");
      return { kind: "integer", value: parseInt(trimmed, 10) };
    }
    case "FLOAT-LIST": {
      const separator = name.toUpperCase() === "GEO" ? ";" : ",";
      const values = raw.split(separator).map((item) => {
        const trimmed = item.trim();
        if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(trimmed)) fail(`"${item}" is not a FLOAT`);
        return parseFloat(trimmed);
      });
      return { kind: "float-list", values };
    }
    case "BOOLEAN": {
      const upper = raw.trim().toUpperCase();
      if (upper !== "TRUE" && upper !== "FALSE") fail("expected TRUE or FALSE");
      return { kind: "boolean", value: upper === "TRUE" };
    }
    case "TEXT-LIST": {
      return { kind: "text-list", values: splitTextList(raw) };
    }
    case "TEXT": {
      return { kind: "text", value: unescapeText(raw) };
    }
  }
}

export function isTimeValue(value: PropertyValue | Period): value is TimeValue {
  return value.kind === "date" || value.kind === "date-time";
}
