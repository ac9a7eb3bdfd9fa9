/**
 * @almanac/core -- recurrence rule evaluator (RFC 5545 Section 3.3.10).
 *
 * Expands a RecurrenceRule from an anchor (DTSTART) into an ascending,
 * duplicate-free sequence of wall timestamps. No zones are involved at
 * this layer; the resolver moves values in and out of wall time.
 *
 * Expansion is organised in cadence periods: period k is the year,
 * month, week (aligned on WKST), day, hour, minute or second that lies
 * k * INTERVAL units after the anchor's. Within a period the BYxxx parts
 * either expand the period into candidates or limit them, following the
 * RFC table in the order BYMONTH, BYWEEKNO, BYYEARDAY, BYMONTHDAY,
 * BYDAY, BYHOUR, BYMINUTE, BYSECOND. BYSETPOS then picks from the sorted
 * candidates of the period, and candidates before the anchor are dropped.
 *
 * advanceRule() is a pure function of (rule, anchor, cursor): it returns
 * the instants of the next non-empty period and the cursor to continue
 * from. expandRule() wraps it as a lazy iterable; every iteration starts
 * from scratch, so iterating twice (or from several places at once)
 * yields the same sequence.
 */

import {
  MS_PER_DAY,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND,
  dayNumber,
  daysInMonth,
  daysInYear,
  wallFromParts,
  wallParts,
  type WallParts,
} from "../time";
import { WEEKDAYS, type Frequency, type RecurrenceRule } from "./rule";

/** Consecutive periods without an instant after which a rule is treated as exhausted. */
export const MAX_EMPTY_PERIODS = 10_000;

/** No instant is generated after this year. */
export const MAX_YEAR = 9999;

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** Where a previous advanceRule() call stopped. Plain data. */
export interface RuleCursor {
  /** Index of the next cadence period to evaluate. */
  readonly period: number;
  /** Instants produced so far (counts toward COUNT). */
  readonly emitted: number;
}

export const INITIAL_CURSOR: RuleCursor = { period: 0, emitted: 0 };

export interface ExpandOptions {
  /**
   * Begin at the cadence period holding this wall time instead of the
   * anchor's. Ignored when the rule has a COUNT. Instants of that first
   * period may lie before it; callers clip.
   */
  readonly windowStart?: number;
  /**
   * Stop once a cadence period starts after this wall time. Instants of
   * the last period may lie beyond it; callers clip.
   */
  readonly windowEnd?: number;
  /**
   * Inclusive end in wall time, replacing the rule's own UNTIL (used when
   * UNTIL is UTC but the anchor is in a named zone).
   */
  readonly until?: number;
}

export interface RuleStep {
  readonly instants: readonly number[];
  readonly cursor: RuleCursor;
  /** No further instants exist (COUNT, UNTIL, window hint or exhaustion). */
  readonly done: boolean;
}

// ---------------------------------------------------------------------------
// Calendar helpers
// ---------------------------------------------------------------------------

/** Monday = 0 ... Sunday = 6. Day 0 (1970-01-01) was a Thursday. */
function weekdayOf(day: number): number {
  return (((day + 3) % 7) + 7) % 7;
}

function dayOf(year: number, month: number, day: number): number {
  return dayNumber(wallFromParts(year, month, day));
}

/** First day of the WKST-aligned week containing `day`. */
function weekStartOf(day: number, weekStart: number): number {
  return day - ((weekdayOf(day) - weekStart + 7) % 7);
}

/** Week 1 of a year is the first week with at least four days in it, i.e. the one holding January 4. */
function firstWeekStart(year: number, weekStart: number): number {
  return weekStartOf(dayOf(year, 1, 4), weekStart);
}

interface DayInfo {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly weekday: number;
  readonly yearDay: number;
  readonly daysInYear: number;
  readonly daysInMonth: number;
}

function dayInfo(day: number): DayInfo {
  const parts = wallParts(day * MS_PER_DAY);
  return {
    year: parts.year,
    month: parts.month,
    day: parts.day,
    weekday: weekdayOf(day),
    yearDay: day - dayOf(parts.year, 1, 1) + 1,
    daysInYear: daysInYear(parts.year),
    daysInMonth: daysInMonth(parts.year, parts.month),
  };
}

/** Matches a positive or negative (from the end) 1-based position. */
function matchesPosition(values: readonly number[], position: number, length: number): boolean {
  return values.includes(position) || values.includes(position - length - 1);
}

// ---------------------------------------------------------------------------
// Plan: the rule with anchor defaults filled in
// ---------------------------------------------------------------------------

interface NthWeekday {
  readonly weekday: number;
  readonly ordinal: number;
}

interface Plan {
  readonly freq: Frequency;
  /** BYSECOND named only leap seconds, so nothing can match. */
  readonly empty: boolean;
  readonly interval: number;
  readonly anchor: number;
  readonly anchorParts: WallParts;
  readonly anchorDay: number;
  readonly count?: number;
  readonly until: number;
  readonly weekStart: number;
  readonly byMonth: readonly number[];
  readonly byWeekNo: readonly number[];
  readonly byYearDay: readonly number[];
  readonly byMonthDay: readonly number[];
  /** Plain weekdays (no ordinal). */
  readonly weekdays: readonly number[];
  /** Ordinal weekdays, only for MONTHLY and YEARLY. */
  readonly nthWeekdays: readonly NthWeekday[];
  /** Whether ordinals count within the month (else within the year). */
  readonly nthInMonth: boolean;
  /** Expansion values for coarse frequencies (sorted). */
  readonly hours: readonly number[];
  readonly minutes: readonly number[];
  readonly seconds: readonly number[];
  /** Limits for sub-daily frequencies (empty = no limit). */
  readonly hourLimit: readonly number[];
  readonly minuteLimit: readonly number[];
  readonly secondLimit: readonly number[];
  readonly bySetPos: readonly number[];
}

const FREQ_RANK: Readonly<Record<Frequency, number>> = {
  SECONDLY: 0,
  MINUTELY: 1,
  HOURLY: 2,
  DAILY: 3,
  WEEKLY: 4,
  MONTHLY: 5,
  YEARLY: 6,
};

function sortedUnique(values: readonly number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

function untilWall(rule: RecurrenceRule): number {
  if (!rule.until) return Number.POSITIVE_INFINITY;
  // A DATE-valued UNTIL covers the whole of that day.
  return rule.until.kind === "date" ? rule.until.wall + MS_PER_DAY - 1 : rule.until.wall;
}

// Holds the plan for the most recent anchor of each rule.
const planCache = new WeakMap<RecurrenceRule, Plan>();

function planFor(rule: RecurrenceRule, anchor: number): Plan {
  const cached = planCache.get(rule);
  if (cached && cached.anchor === anchor) return cached;
  const plan = buildPlan(rule, anchor);
  planCache.set(rule, plan);
  return plan;
}

function buildPlan(rule: RecurrenceRule, anchor: number): Plan {
  const anchorParts = wallParts(anchor);
  const anchorDay = dayNumber(anchor);
  const rank = FREQ_RANK[rule.freq];

  let byMonth = rule.byMonth;
  let byMonthDay = rule.byMonthDay;
  let byDay = rule.byDay.map((d) => ({ weekday: WEEKDAYS.indexOf(d.weekday), ordinal: d.ordinal }));

  const noDayParts =
    rule.byWeekNo.length === 0 && rule.byYearDay.length === 0 && byMonthDay.length === 0 && byDay.length === 0;
  if (noDayParts) {
    if (rule.freq === "YEARLY") {
      if (byMonth.length === 0) byMonth = [anchorParts.month];
      byMonthDay = [anchorParts.day];
    } else if (rule.freq === "MONTHLY") {
      byMonthDay = [anchorParts.day];
    } else if (rule.freq === "WEEKLY") {
      byDay = [{ weekday: weekdayOf(anchorDay), ordinal: undefined }];
    }
  }

  const ordinalsApply = rule.freq === "MONTHLY" || (rule.freq === "YEARLY" && rule.byWeekNo.length === 0);
  const weekdays: number[] = [];
  const nthWeekdays: NthWeekday[] = [];
  for (const entry of byDay) {
    if (entry.ordinal !== undefined && ordinalsApply) {
      nthWeekdays.push({ weekday: entry.weekday, ordinal: entry.ordinal });
    } else {
      weekdays.push(entry.weekday);
    }
  }

  const bySecond = rule.bySecond.filter((s) => s < 60);
  const expand = (values: readonly number[], fallback: number): number[] =>
    values.length > 0 ? sortedUnique(values) : [fallback];

  return {
    freq: rule.freq,
    empty: rule.bySecond.length > 0 && bySecond.length === 0,
    interval: rule.interval,
    anchor,
    anchorParts,
    anchorDay,
    ...(rule.count !== undefined ? { count: rule.count } : {}),
    until: untilWall(rule),
    weekStart: WEEKDAYS.indexOf(rule.weekStart),
    byMonth: sortedUnique(byMonth),
    byWeekNo: rule.byWeekNo,
    byYearDay: rule.byYearDay,
    byMonthDay,
    weekdays: sortedUnique(weekdays),
    nthWeekdays,
    nthInMonth: rule.freq === "MONTHLY" || byMonth.length > 0,
    hours: rank > FREQ_RANK.HOURLY ? expand(rule.byHour, anchorParts.hour) : [],
    minutes: rank > FREQ_RANK.MINUTELY ? expand(rule.byMinute, anchorParts.minute) : [],
    seconds: rank > FREQ_RANK.SECONDLY ? expand(bySecond, anchorParts.second) : [],
    hourLimit: rank <= FREQ_RANK.HOURLY ? sortedUnique(rule.byHour) : [],
    minuteLimit: rank <= FREQ_RANK.MINUTELY ? sortedUnique(rule.byMinute) : [],
    secondLimit: rank <= FREQ_RANK.SECONDLY ? sortedUnique(bySecond) : [],
    bySetPos: rule.bySetPos,
  };
}

// ---------------------------------------------------------------------------
// Day filters
// ---------------------------------------------------------------------------

function weekNumberMatches(plan: Plan, day: number, year: number): boolean {
  let weekYear = year;
  if (day < firstWeekStart(year, plan.weekStart)) {
    weekYear = year - 1;
  } else if (day >= firstWeekStart(year + 1, plan.weekStart)) {
    weekYear = year + 1;
  }
  const start = firstWeekStart(weekYear, plan.weekStart);
  const weeks = (firstWeekStart(weekYear + 1, plan.weekStart) - start) / 7;
  const weekNo = Math.floor((day - start) / 7) + 1;
  return matchesPosition(plan.byWeekNo, weekNo, weeks);
}

function weekdayMatches(plan: Plan, info: DayInfo): boolean {
  if (plan.weekdays.length === 0 && plan.nthWeekdays.length === 0) return true;
  if (plan.weekdays.includes(info.weekday)) return true;

  for (const nth of plan.nthWeekdays) {
    if (nth.weekday !== info.weekday) continue;
    const position = plan.nthInMonth ? info.day : info.yearDay;
    const length = plan.nthInMonth ? info.daysInMonth : info.daysInYear;
    const fromStart = Math.floor((position - 1) / 7) + 1;
    const fromEnd = -(Math.floor((length - position) / 7) + 1);
    if (nth.ordinal === fromStart || nth.ordinal === fromEnd) return true;
  }
  return false;
}

function dayMatches(plan: Plan, day: number): boolean {
  const info = dayInfo(day);
  if (plan.byMonth.length > 0 && !plan.byMonth.includes(info.month)) return false;
  if (plan.byWeekNo.length > 0 && !weekNumberMatches(plan, day, info.year)) return false;
  if (plan.byYearDay.length > 0 && !matchesPosition(plan.byYearDay, info.yearDay, info.daysInYear)) return false;
  if (plan.byMonthDay.length > 0 && !matchesPosition(plan.byMonthDay, info.day, info.daysInMonth)) return false;
  return weekdayMatches(plan, info);
}

// ---------------------------------------------------------------------------
// Periods
// ---------------------------------------------------------------------------

interface PeriodResult {
  /** Wall time the period begins at. */
  readonly start: number;
  /** Sorted candidates before BYSETPOS. */
  readonly candidates: readonly number[];
  /** Index of the next period worth evaluating. */
  readonly next: number;
}

function timesOfDay(plan: Plan): number[] {
  const times: number[] = [];
  for (const h of plan.hours) {
    for (const m of plan.minutes) {
      for (const s of plan.seconds) {
        times.push(h * MS_PER_HOUR + m * MS_PER_MINUTE + s * MS_PER_SECOND);
      }
    }
  }
  return times;
}

function expandDays(plan: Plan, days: readonly number[]): number[] {
  const times = timesOfDay(plan);
  const candidates: number[] = [];
  for (const day of days) {
    if (!dayMatches(plan, day)) continue;
    for (const time of times) {
      candidates.push(day * MS_PER_DAY + time);
    }
  }
  return candidates;
}

function range(first: number, length: number): number[] {
  return Array.from({ length }, (_, i) => first + i);
}

function coarsePeriod(plan: Plan, k: number): PeriodResult | null {
  const step = k * plan.interval;
  switch (plan.freq) {
    case "YEARLY": {
      const year = plan.anchorParts.year + step;
      if (year > MAX_YEAR) return null;
      const months = plan.byMonth.length > 0 ? plan.byMonth : range(1, 12);
      const days = months.flatMap((month) => range(dayOf(year, month, 1), daysInMonth(year, month)));
      return { start: dayOf(year, 1, 1) * MS_PER_DAY, candidates: expandDays(plan, days), next: k + 1 };
    }
    case "MONTHLY": {
      const index = plan.anchorParts.year * 12 + (plan.anchorParts.month - 1) + step;
      const year = Math.floor(index / 12);
      const month = index - year * 12 + 1;
      if (year > MAX_YEAR) return null;
      const first = dayOf(year, month, 1);
      const days = plan.byMonth.length > 0 && !plan.byMonth.includes(month) ? [] : range(first, daysInMonth(year, month));
      return { start: first * MS_PER_DAY, candidates: expandDays(plan, days), next: k + 1 };
    }
    case "WEEKLY": {
      const first = weekStartOf(plan.anchorDay, plan.weekStart) + step * 7;
      return { start: first * MS_PER_DAY, candidates: expandDays(plan, range(first, 7)), next: k + 1 };
    }
    default: {
      const day = plan.anchorDay + step;
      return { start: day * MS_PER_DAY, candidates: expandDays(plan, [day]), next: k + 1 };
    }
  }
}

const UNIT_MS: Readonly<Record<"HOURLY" | "MINUTELY" | "SECONDLY", number>> = {
  HOURLY: MS_PER_HOUR,
  MINUTELY: MS_PER_MINUTE,
  SECONDLY: MS_PER_SECOND,
};

function floorTo(value: number, unit: number): number {
  return value - (((value % unit) + unit) % unit);
}

function subDailyPeriod(plan: Plan, freq: "HOURLY" | "MINUTELY" | "SECONDLY", k: number): PeriodResult | null {
  const unit = UNIT_MS[freq];
  const stepMs = plan.interval * unit;
  const base = floorTo(plan.anchor, unit);
  const start = base + k * stepMs;
  if (wallParts(start).year > MAX_YEAR) return null;

  // Jump to the first period at or after `boundary`.
  const skipTo = (boundary: number): PeriodResult => ({
    start,
    candidates: [],
    next: Math.max(k + 1, Math.ceil((boundary - base) / stepMs)),
  });

  const day = dayNumber(start);
  if (!dayMatches(plan, day)) return skipTo((day + 1) * MS_PER_DAY);

  const parts = wallParts(start);
  if (plan.hourLimit.length > 0 && !plan.hourLimit.includes(parts.hour)) {
    return skipTo(floorTo(start, MS_PER_HOUR) + MS_PER_HOUR);
  }
  if (plan.minuteLimit.length > 0 && !plan.minuteLimit.includes(parts.minute)) {
    return skipTo(floorTo(start, MS_PER_MINUTE) + MS_PER_MINUTE);
  }

  const candidates: number[] = [];
  if (freq === "HOURLY") {
    for (const m of plan.minutes) {
      for (const s of plan.seconds) {
        candidates.push(start + m * MS_PER_MINUTE + s * MS_PER_SECOND);
      }
    }
  } else if (freq === "MINUTELY") {
    for (const s of plan.seconds) {
      candidates.push(start + s * MS_PER_SECOND);
    }
  } else if (plan.secondLimit.length === 0 || plan.secondLimit.includes(parts.second)) {
    candidates.push(start);
  }
  return { start, candidates, next: k + 1 };
}

function periodAt(plan: Plan, k: number): PeriodResult | null {
  switch (plan.freq) {
    case "HOURLY":
    case "MINUTELY":
    case "SECONDLY":
      return subDailyPeriod(plan, plan.freq, k);
    default:
      return coarsePeriod(plan, k);
  }
}

/** Index of the cadence period holding `wall`, or 0 when it precedes the anchor's. */
function periodHolding(plan: Plan, wall: number): number {
  if (wall <= plan.anchor) return 0;
  let units: number;
  switch (plan.freq) {
    case "YEARLY":
      units = wallParts(wall).year - plan.anchorParts.year;
      break;
    case "MONTHLY": {
      const parts = wallParts(wall);
      units = (parts.year - plan.anchorParts.year) * 12 + (parts.month - plan.anchorParts.month);
      break;
    }
    case "WEEKLY":
      units = (weekStartOf(dayNumber(wall), plan.weekStart) - weekStartOf(plan.anchorDay, plan.weekStart)) / 7;
      break;
    case "DAILY":
      units = dayNumber(wall) - plan.anchorDay;
      break;
    default: {
      const unit = UNIT_MS[plan.freq];
      units = Math.floor((wall - floorTo(plan.anchor, unit)) / unit);
    }
  }
  return Math.max(0, Math.floor(units / plan.interval));
}

function applySetPos(candidates: readonly number[], bySetPos: readonly number[]): number[] {
  if (bySetPos.length === 0) return [...candidates];
  const picked: number[] = [];
  for (const pos of bySetPos) {
    const index = pos > 0 ? pos - 1 : candidates.length + pos;
    if (index >= 0 && index < candidates.length) picked.push(candidates[index]);
  }
  return sortedUnique(picked);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Produce the instants of the next non-empty cadence period.
 *
 * @param rule - parsed recurrence rule
 * @param anchor - DTSTART as a wall timestamp
 * @param cursor - where the previous step stopped (INITIAL_CURSOR to begin)
 */
export function advanceRule(
  rule: RecurrenceRule,
  anchor: number,
  cursor: RuleCursor = INITIAL_CURSOR,
  options: ExpandOptions = {},
): RuleStep {
  const plan = planFor(rule, anchor);
  const until = options.until ?? plan.until;
  const finish = (instants: readonly number[], next: RuleCursor): RuleStep => ({
    instants,
    cursor: next,
    done: true,
  });

  if (plan.empty) return finish([], cursor);
  if (plan.count !== undefined && cursor.emitted >= plan.count) return finish([], cursor);

  let k = cursor.period;
  for (let empty = 0; empty < MAX_EMPTY_PERIODS; empty++) {
    const period = periodAt(plan, k);
    if (!period) return finish([], { period: k, emitted: cursor.emitted });
    if (period.start > until) return finish([], { period: k, emitted: cursor.emitted });
    if (options.windowEnd !== undefined && period.start > options.windowEnd) {
      return finish([], { period: k, emitted: cursor.emitted });
    }

    const instants: number[] = [];
    let done = false;
    for (const candidate of applySetPos(period.candidates, plan.bySetPos)) {
      if (candidate < anchor) continue;
      if (candidate > until) {
        done = true;
        break;
      }
      instants.push(candidate);
      if (plan.count !== undefined && cursor.emitted + instants.length >= plan.count) {
        done = true;
        break;
      }
    }

    const next: RuleCursor = { period: period.next, emitted: cursor.emitted + instants.length };
    if (instants.length > 0 || done) return { instants, cursor: next, done };
    k = period.next;
  }

  return finish([], { period: k, emitted: cursor.emitted });
}

/**
 * The cursor to start expanding from: the period holding
 * `options.windowStart`, or the anchor's when there is none or the rule
 * counts its instances.
 */
export function startCursor(rule: RecurrenceRule, anchor: number, options: ExpandOptions = {}): RuleCursor {
  if (options.windowStart === undefined) return INITIAL_CURSOR;
  const plan = planFor(rule, anchor);
  if (plan.count !== undefined) return INITIAL_CURSOR;
  return { period: periodHolding(plan, options.windowStart), emitted: 0 };
}

/**
 * Lazily expand a rule from `anchor`.
 *
 * Without COUNT, UNTIL or `windowEnd` the sequence is infinite; pull only
 * what is needed (see takeInstants).
 */
export function* expandRule(
  rule: RecurrenceRule,
  anchor: number,
  options: ExpandOptions = {},
): Generator<number, void, undefined> {
  let cursor = startCursor(rule, anchor, options);
  for (;;) {
    const step = advanceRule(rule, anchor, cursor, options);
    yield* step.instants;
    if (step.done) return;
    cursor = step.cursor;
  }
}

/** `expand(rule, anchorStart, windowEndHint)`: expandRule with only a window hint. */
export function expand(rule: RecurrenceRule, anchorStart: number, windowEndHint?: number): Generator<number, void, undefined> {
  return expandRule(rule, anchorStart, windowEndHint === undefined ? {} : { windowEnd: windowEndHint });
}

/** The first `n` values of an iterable (stops pulling after that). */
export function takeInstants(source: Iterable<number>, n: number): number[] {
  const taken: number[] = [];
  if (n <= 0) return taken;
  for (const value of source) {
    taken.push(value);
    if (taken.length >= n) break;
  }
  return taken;
}
