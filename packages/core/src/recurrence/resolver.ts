/**
 * @almanac/core -- occurrence-set resolver (RFC 5545 Section 3.8.5).
 *
 * Combines a master component's RRULEs, RDATEs and DTSTART, removes the
 * EXRULE and EXDATE instants, and substitutes RECURRENCE-ID overrides.
 *
 * All set arithmetic happens in DTSTART's wall frame: RDATE, EXDATE and
 * UTC-valued UNTIL are first converted into it. Each surviving wall time
 * is then mapped to an absolute instant, which is what overrides are
 * keyed on and what the window is compared against.
 *
 * A broken RRULE or RDATE never aborts resolution. It is reported to the
 * diagnostic sink and the rest of the set still resolves.
 */

import type { Component } from "../component";
import { silentDiagnosticSink, type DiagnosticCode, type DiagnosticSink } from "../diagnostics";
import { MissingPropertyError, PropertyConversionError } from "../errors";
import type { Property } from "../property";
import { ascending, dedupeSorted, mergeSorted } from "../sorted";
import { MS_PER_DAY, dayNumber, withWall, type TimeValue, type Zone } from "../time";
import { isTimeValue, type Period, type PropertyValue } from "../values";
import { ALL_TIME, afterWindow, beforeWindow, inWindow, validateWindow, type TimeWindow } from "../window";
import { toInstant, wallInFrameOf, type InstantOptions } from "../zones";
import { expandRule, type ExpandOptions } from "./evaluator";
import type { RecurrenceRule } from "./rule";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RecurrenceSetOptions extends InstantOptions {
  /** Where broken RRULE/RDATE/EXDATE properties are reported. Silent by default. */
  readonly diagnostics?: DiagnosticSink;
}

export interface ResolvedInstant {
  /** Start of this instance: the override's own DTSTART when overridden. */
  readonly start: TimeValue;
  /** Absolute instant of `start`, in ms since the epoch. */
  readonly instant: number;
  /** The instance's identity within the series (what a RECURRENCE-ID names). */
  readonly recurrenceId: TimeValue;
  readonly overridden: boolean;
  /** The component replacing this instance, when overridden. */
  readonly override?: Component;
  /** Present when the instance came from an RDATE PERIOD; carries its end. */
  readonly period?: Period;
}

interface OverrideEntry {
  readonly component: Component;
  readonly recurrenceId: TimeValue;
  readonly key: number;
  readonly start: TimeValue;
  readonly instant: number;
  readonly sequence: number;
}

function sameZone(a: Zone, b: Zone): boolean {
  if (a.type === "tzid" && b.type === "tzid") return a.tzid === b.tzid;
  return a.type === b.type;
}

// ---------------------------------------------------------------------------
// RecurrenceSet
// ---------------------------------------------------------------------------

export class RecurrenceSet {
  private readonly rules: RecurrenceRule[] = [];
  private readonly exceptionRules: RecurrenceRule[] = [];
  /** RDATE wall times in the anchor's frame, ascending and unique. */
  private readonly dates: number[];
  private readonly periods = new Map<number, Period>();
  /** EXDATE wall times in the anchor's frame, ascending and unique. */
  private readonly exceptionDates: number[];
  /** Calendar days fully excluded by DATE-valued EXDATEs (date-time anchors only). */
  private readonly excludedDays = new Set<number>();
  private readonly overrides = new Map<number, OverrideEntry>();

  private constructor(
    readonly master: Component,
    readonly anchor: TimeValue,
    private readonly options: RecurrenceSetOptions,
  ) {
    const dates: number[] = [];
    const exceptionDates: number[] = [];

    for (const property of master.properties) {
      switch (property.name) {
        case "RRULE":
        case "EXRULE": {
          const rule = this.readRule(property);
          if (rule) (property.name === "RRULE" ? this.rules : this.exceptionRules).push(rule);
          break;
        }
        case "RDATE":
          for (const value of this.readDates(property)) {
            if (isTimeValue(value)) {
              dates.push(this.toFrame(value));
            } else {
              const wall = this.toFrame(value.start);
              dates.push(wall);
              if (!this.periods.has(wall)) this.periods.set(wall, value);
            }
          }
          break;
        case "EXDATE":
          for (const value of this.readDates(property)) {
            const excluded = isTimeValue(value) ? value : value.start;
            if (excluded.kind === "date" && anchor.kind === "date-time") {
              this.excludedDays.add(dayNumber(excluded.wall));
            } else {
              exceptionDates.push(this.toFrame(excluded));
            }
          }
          break;
      }
    }

    this.dates = [...new Set(dates)].sort(ascending);
    this.exceptionDates = [...new Set(exceptionDates)].sort(ascending);
  }

  /**
   * Build the set for `master` and the components overriding its instances.
   *
   * @throws MissingPropertyError when the master has no DTSTART
   * @throws PropertyConversionError when the master's DTSTART does not convert
   */
  static fromComponent(
    master: Component,
    overrides: readonly Component[] = [],
    options: RecurrenceSetOptions = {},
  ): RecurrenceSet {
    const anchor = master.start();
    if (!anchor) throw new MissingPropertyError(master.name, "DTSTART");

    const set = new RecurrenceSet(master, anchor, options);
    for (const override of overrides) set.addOverride(override);
    return set;
  }

  /** Whether any RRULE survived validation or any RDATE was given. */
  get isRecurring(): boolean {
    return this.rules.length > 0 || this.dates.length > 0;
  }

  get overrideCount(): number {
    return this.overrides.size;
  }

  /**
   * The instances whose start lies in `window`, ascending by instant.
   * Lazy and restartable: each call starts a fresh, independent pass.
   *
   * @throws InvalidWindowError when the window's start lies after its end
   */
  resolve(window: TimeWindow = ALL_TIME): Generator<ResolvedInstant, void, undefined> {
    validateWindow(window);
    const overrides = [...this.overrides.values()]
      .filter((entry) => inWindow(window, entry.instant))
      .sort((a, b) => a.instant - b.instant)
      .map((entry): ResolvedInstant => ({
        start: entry.start,
        instant: entry.instant,
        recurrenceId: entry.recurrenceId,
        overridden: true,
        override: entry.component,
      }));

    return mergeSorted([this.baseInstances(window), overrides], (a, b) => a.instant - b.instant);
  }

  // -------------------------------------------------------------------------
  // Generation
  // -------------------------------------------------------------------------

  private *baseInstances(window: TimeWindow): Generator<ResolvedInstant, void, undefined> {
    const expandOptions = this.expandOptionsFor(window);
    const skipBefore = expandOptions.windowStart ?? Number.NEGATIVE_INFINITY;
    const included = dedupeSorted(
      mergeSorted(
        [
          [this.anchor.wall],
          this.dates,
          ...this.rules.map((rule) => expandRule(rule, this.anchor.wall, this.withUntil(rule, expandOptions))),
        ],
        ascending,
      ),
      ascending,
    );
    const excluded = mergeSorted(
      [
        this.exceptionDates,
        ...this.exceptionRules.map((rule) => expandRule(rule, this.anchor.wall, this.withUntil(rule, expandOptions))),
      ],
      ascending,
    );

    let nextExcluded = excluded.next();
    for (const wall of included) {
      if (wall < skipBefore) continue;
      while (!nextExcluded.done && nextExcluded.value < wall) nextExcluded = excluded.next();
      if (!nextExcluded.done && nextExcluded.value === wall) continue;
      if (this.excludedDays.has(dayNumber(wall))) continue;

      const start = withWall(this.anchor, wall);
      const instant = toInstant(start, this.options);
      if (afterWindow(window, instant)) return;
      if (beforeWindow(window, instant) || this.overrides.has(instant)) continue;

      const period = this.periods.get(wall);
      yield period
        ? { start, instant, recurrenceId: start, overridden: false, period }
        : { start, instant, recurrenceId: start, overridden: false };
    }
  }

  // A day of slack on each side absorbs any zone offset between the frame and the window.
  private expandOptionsFor(window: TimeWindow): ExpandOptions {
    return {
      ...(window.start !== undefined
        ? { windowStart: wallInFrameOf(this.anchor, window.start, this.options) - MS_PER_DAY }
        : {}),
      ...(window.end !== undefined
        ? { windowEnd: wallInFrameOf(this.anchor, window.end, this.options) + MS_PER_DAY }
        : {}),
    };
  }

  /** UNTIL in another frame than DTSTART (typically UTC) is moved into DTSTART's frame. */
  private withUntil(rule: RecurrenceRule, options: ExpandOptions): ExpandOptions {
    const until = rule.until;
    if (!until || until.kind === "date") return options;
    if (this.anchor.kind === "date-time" && sameZone(this.anchor.zone, until.zone)) return options;
    return { ...options, until: this.toFrame(until) };
  }

  /** Wall time of `value` in the anchor's frame. A DATE names the same day in any frame. */
  private toFrame(value: TimeValue): number {
    if (value.kind === "date") return value.wall;
    if (this.anchor.kind === "date-time" && sameZone(this.anchor.zone, value.zone)) return value.wall;
    return wallInFrameOf(this.anchor, toInstant(value, this.options), this.options);
  }

  // -------------------------------------------------------------------------
  // Reading properties
  // -------------------------------------------------------------------------

  private readRule(property: Property): RecurrenceRule | undefined {
    const value = this.convert(property, "invalid-recurrence");
    if (!value) return undefined;
    if (value.kind !== "recur") {
      this.report("invalid-recurrence", property, `${property.name} is not a recurrence rule and was ignored`);
      return undefined;
    }
    return value;
  }

  private readDates(property: Property): ReadonlyArray<TimeValue | Period> {
    const value = this.convert(property, "invalid-property");
    if (!value) return [];
    if (value.kind === "time-list") return value.values;
    if (isTimeValue(value)) return [value];
    this.report("invalid-property", property, `${property.name} does not hold dates and was ignored`);
    return [];
  }

  private convert(property: Property, code: DiagnosticCode): PropertyValue | undefined {
    try {
      return property.typed();
    } catch (err) {
      if (!(err instanceof PropertyConversionError)) throw err;
      this.report(code, property, `${err.message}; ${property.name} ignored`);
      return undefined;
    }
  }

  private report(code: DiagnosticCode, property: Property, message: string): void {
    (this.options.diagnostics ?? silentDiagnosticSink).report({
      severity: "error",
      code,
      message: `${this.master.toString()}: ${message}`,
      line: property.lineNumber > 0 ? property.lineNumber : undefined,
    });
  }

  // -------------------------------------------------------------------------
  // Overrides
  // -------------------------------------------------------------------------

  /**
   * Register a component replacing one instance. When several claim the
   * same instance, the highest SEQUENCE wins, then the later one.
   */
  private addOverride(component: Component): void {
    const idProperty = component.property("RECURRENCE-ID");
    let recurrenceId: TimeValue | undefined;
    let start: TimeValue | undefined;
    let sequence = 0;
    try {
      recurrenceId = component.recurrenceId();
      start = component.start();
      sequence = component.sequence() ?? 0;
    } catch (err) {
      if (!(err instanceof PropertyConversionError)) throw err;
      if (idProperty) this.report("invalid-property", idProperty, `override ignored: ${err.message}`);
      return;
    }
    if (!recurrenceId || !idProperty) return;

    const key = toInstant(recurrenceId, this.options);
    const begins = start ?? recurrenceId;
    const entry: OverrideEntry = {
      component,
      recurrenceId,
      key,
      start: begins,
      instant: toInstant(begins, this.options),
      sequence,
    };
    const existing = this.overrides.get(key);
    if (!existing || existing.sequence <= sequence) this.overrides.set(key, entry);
  }
}
