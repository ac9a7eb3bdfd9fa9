/**
 * @almanac/core -- timeline: occurrences of many components in time order.
 *
 * Input components are flattened (calendars contribute their children),
 * grouped by kind and UID into a master plus its RECURRENCE-ID overrides,
 * and each group is resolved into an ascending occurrence sequence. The
 * groups are then merged lazily; ties keep input order, then the group's
 * own order.
 *
 * Only events, to-dos, journals and free-busy blocks occur in time.
 * Timezones, observances, alarms and unrecognized components never do.
 */

import { Component } from "./component";
import { silentDiagnosticSink, type DiagnosticSink } from "./diagnostics";
import { durationSpan, ZERO_SPAN, type Span } from "./duration";
import { PropertyConversionError } from "./errors";
import { RecurrenceSet, type ResolvedInstant } from "./recurrence/resolver";
import { mergeSorted } from "./sorted";
import { FLOATING_ZONE, MS_PER_DAY, withWall, type TimeValue } from "./time";
import type { Period } from "./values";
import { ALL_TIME, inWindow, validateWindow, type TimeWindow } from "./window";
import { toInstant, wallInFrameOf, type InstantOptions, type ZoneResolver } from "./zones";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TimelineOptions {
  /** Resolves TZIDs to offsets. Without one, every zoned time reads as floating. */
  readonly zoneResolver?: ZoneResolver;
  /** Zone floating times and dates are read in (UTC when unset). */
  readonly floatingZone?: string;
  /** Default for windows that do not say whether their end is inclusive. */
  readonly inclusiveEnd?: boolean;
  readonly diagnostics?: DiagnosticSink;
}

export interface Occurrence {
  /** The component this occurrence is of: the override when overridden. */
  readonly component: Component;
  readonly start: TimeValue;
  readonly end: TimeValue;
  readonly startInstant: number;
  readonly endInstant: number;
  readonly durationMs: number;
  readonly overridden: boolean;
  /** Identity within a recurring series; absent for one-off components. */
  readonly recurrenceId?: TimeValue;
  /** FBTYPE of the FREEBUSY period an occurrence of a VFREEBUSY came from. */
  readonly freeBusyType?: string;
}

/** How long an occurrence lasts: a wall-clock span, or an exact length. */
type Length = { readonly kind: "span"; readonly span: Span } | { readonly kind: "exact"; readonly ms: number };

const ZERO_LENGTH: Length = { kind: "span", span: ZERO_SPAN };
const ONE_DAY: Length = { kind: "span", span: { wallMs: MS_PER_DAY, exactMs: 0 } };

interface Group {
  readonly master?: Component;
  readonly overrides: Component[];
}

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

/**
 * Occurrences whose start lies in `window`, in ascending start order.
 *
 * The window is checked immediately; everything else happens as the
 * result is iterated.
 *
 * @throws InvalidWindowError when the window's start lies after its end
 */
export function queryTimeline(
  components: readonly Component[],
  window: TimeWindow = ALL_TIME,
  options: TimelineOptions = {},
): Generator<Occurrence, void, undefined> {
  const effective: TimeWindow = validateWindow({
    ...window,
    inclusiveEnd: window.inclusiveEnd ?? options.inclusiveEnd ?? false,
  });
  const context = new QueryContext(options);
  const groups = groupComponents(flatten(components));
  return mergeSorted(
    groups.map((group) => context.occurrencesOf(group, effective)),
    (a, b) => a.startInstant - b.startInstant,
  );
}

function flatten(components: readonly Component[]): Component[] {
  const flat: Component[] = [];
  for (const component of components) {
    if (component.tag === "calendar") {
      flat.push(...flatten(component.children));
    } else if (
      component.tag === "event" ||
      component.tag === "todo" ||
      component.tag === "journal" ||
      component.tag === "free-busy"
    ) {
      flat.push(component);
    }
  }
  return flat;
}

/**
 * Group by kind and UID. A component with RECURRENCE-ID joins the group of
 * its master; one with no master in the input forms a group of its own.
 */
function groupComponents(components: readonly Component[]): Group[] {
  const groups: Group[] = [];
  const byKey = new Map<string, { master?: Component; overrides: Component[] }>();

  const keyOf = (component: Component): string | undefined => {
    const uid = component.property("UID")?.raw.trim();
    return uid ? `${component.tag}\u0000${uid}` : undefined;
  };

  // Ordered slots: a group's position is that of its first member.
  const slots: Array<{ key: string } | { single: Component }> = [];
  for (const component of components) {
    const key = keyOf(component);
    if (key === undefined) {
      slots.push({ single: component });
      continue;
    }
    let entry = byKey.get(key);
    if (!entry) {
      entry = { overrides: [] };
      byKey.set(key, entry);
      slots.push({ key });
    }
    if (component.hasProperty("RECURRENCE-ID")) {
      entry.overrides.push(component);
    } else if (!entry.master) {
      entry.master = component;
    } else {
      // A second master with the same UID is kept as a separate series.
      slots.push({ single: component });
    }
  }

  for (const slot of slots) {
    if ("single" in slot) {
      groups.push(
        slot.single.hasProperty("RECURRENCE-ID")
          ? { overrides: [slot.single] }
          : { master: slot.single, overrides: [] },
      );
      continue;
    }
    const entry = byKey.get(slot.key);
    if (!entry) continue;
    if (entry.master) {
      groups.push({ master: entry.master, overrides: entry.overrides });
    } else {
      for (const override of entry.overrides) groups.push({ overrides: [override] });
    }
  }

  return groups;
}

// ---------------------------------------------------------------------------
// Per-group resolution
// ---------------------------------------------------------------------------

class QueryContext {
  private readonly instantOptions: InstantOptions;
  private readonly diagnostics: DiagnosticSink;

  constructor(options: TimelineOptions) {
    this.instantOptions = { resolver: options.zoneResolver, floatingZone: options.floatingZone };
    this.diagnostics = options.diagnostics ?? silentDiagnosticSink;
  }

  *occurrencesOf(group: Group, window: TimeWindow): Generator<Occurrence, void, undefined> {
    const master = group.master;
    if (!master) {
      for (const override of group.overrides) yield* this.standaloneOverride(override, window);
      return;
    }
    if (master.tag === "free-busy") {
      yield* this.freeBusy(master, window);
      return;
    }

    const start = this.guard(master, () => master.start());
    if (start === null) return;
    if (!start) {
      yield* this.withoutStart(master, window);
      return;
    }

    const length = this.lengthOf(master, start);
    const set = this.guard(master, () =>
      RecurrenceSet.fromComponent(master, group.overrides, {
        ...this.instantOptions,
        diagnostics: this.diagnostics,
      }),
    );
    if (!set) return;

    for (const resolved of set.resolve(window)) {
      yield this.fromResolved(master, resolved, length, set.isRecurring || group.overrides.length > 0);
    }
  }

  private fromResolved(master: Component, resolved: ResolvedInstant, masterLength: Length, recurring: boolean): Occurrence {
    const recurrenceId = recurring ? resolved.recurrenceId : undefined;
    if (resolved.override) {
      const length = this.ownLength(resolved.override, resolved.start) ?? masterLength;
      return this.build(resolved.override, resolved.start, resolved.instant, length, true, recurrenceId);
    }
    const length = resolved.period ? this.periodLength(resolved.period) : masterLength;
    return this.build(master, resolved.start, resolved.instant, length, false, recurrenceId);
  }

  /** An override whose master is not in the input. */
  private *standaloneOverride(component: Component, window: TimeWindow): Generator<Occurrence, void, undefined> {
    const recurrenceId = this.guard(component, () => component.recurrenceId());
    const start = this.guard(component, () => component.start()) ?? recurrenceId;
    if (!start) return;
    const instant = toInstant(start, this.instantOptions);
    if (!inWindow(window, instant)) return;
    yield this.build(component, start, instant, this.lengthOf(component, start), true, recurrenceId ?? undefined);
  }

  /** A to-do with only a DUE occurs at its due time; anything else without DTSTART is skipped. */
  private *withoutStart(component: Component, window: TimeWindow): Generator<Occurrence, void, undefined> {
    const due = component.tag === "todo" ? this.guard(component, () => component.end()) : undefined;
    if (!due) {
      this.diagnostics.report({
        severity: "warning",
        code: "missing-start",
        message: `${component.toString()} has no DTSTART and was skipped`,
      });
      return;
    }
    const instant = toInstant(due, this.instantOptions);
    if (inWindow(window, instant)) yield this.build(component, due, instant, ZERO_LENGTH, false, undefined);
  }

  private *freeBusy(component: Component, window: TimeWindow): Generator<Occurrence, void, undefined> {
    const periods: Array<{ period: Period; type?: string }> = [];
    for (const property of component.propertiesNamed("FREEBUSY")) {
      const value = this.guard(component, () => property.typed());
      if (!value || value.kind !== "period-list") continue;
      const type = property.params.get("FBTYPE")?.toUpperCase() ?? "BUSY";
      for (const period of value.values) periods.push({ period, type });
    }

    if (periods.length === 0) {
      const start = this.guard(component, () => component.start());
      if (!start) return;
      const instant = toInstant(start, this.instantOptions);
      if (inWindow(window, instant)) {
        yield this.build(component, start, instant, this.lengthOf(component, start), false, undefined);
      }
      return;
    }

    const occurrences = periods
      .map(({ period, type }) => {
        const instant = toInstant(period.start, this.instantOptions);
        return { ...this.build(component, period.start, instant, this.periodLength(period), false, undefined), freeBusyType: type };
      })
      .filter((occurrence) => inWindow(window, occurrence.startInstant))
      .sort((a, b) => a.startInstant - b.startInstant);
    yield* occurrences;
  }

  // -------------------------------------------------------------------------
  // Lengths
  // -------------------------------------------------------------------------

  /**
   * DURATION, else DTEND (DUE for to-dos) minus DTSTART, else one day for
   * a DATE start and nothing for a DATE-TIME start. Journals never last.
   */
  private lengthOf(component: Component, start: TimeValue): Length {
    if (component.tag === "journal") return ZERO_LENGTH;
    return this.ownLength(component, start) ?? (start.kind === "date" ? ONE_DAY : ZERO_LENGTH);
  }

  /** Length from the component's own DURATION or DTEND/DUE, if it has either. */
  private ownLength(component: Component, start: TimeValue): Length | undefined {
    if (component.tag === "journal") return ZERO_LENGTH;
    const duration = this.guard(component, () => component.duration());
    if (duration) return { kind: "span", span: durationSpan(duration) };

    const end = this.guard(component, () => component.end());
    if (!end) return undefined;
    if (sameFrame(start, end)) {
      return { kind: "span", span: { wallMs: Math.max(0, end.wall - start.wall), exactMs: 0 } };
    }
    const ms = toInstant(end, this.instantOptions) - toInstant(start, this.instantOptions);
    return { kind: "exact", ms: Math.max(0, ms) };
  }

  private periodLength(period: Period): Length {
    if (period.duration) return { kind: "span", span: durationSpan(period.duration) };
    if (period.end) {
      if (sameFrame(period.start, period.end)) {
        return { kind: "span", span: { wallMs: period.end.wall - period.start.wall, exactMs: 0 } };
      }
      return {
        kind: "exact",
        ms: toInstant(period.end, this.instantOptions) - toInstant(period.start, this.instantOptions),
      };
    }
    return ZERO_LENGTH;
  }

  // -------------------------------------------------------------------------
  // Building
  // -------------------------------------------------------------------------

  private build(
    component: Component,
    start: TimeValue,
    startInstant: number,
    length: Length,
    overridden: boolean,
    recurrenceId: TimeValue | undefined,
  ): Occurrence {
    let end: TimeValue;
    let endInstant: number;

    if (length.kind === "span" && length.span.exactMs === 0) {
      end = start.kind === "date" ? { kind: "date", wall: start.wall + length.span.wallMs } : withWall(start, start.wall + length.span.wallMs);
      endInstant = length.span.wallMs === 0 ? startInstant : toInstant(end, this.instantOptions);
    } else {
      endInstant =
        length.kind === "span"
          ? toInstant(withWall(start, start.wall + length.span.wallMs), this.instantOptions) + length.span.exactMs
          : startInstant + length.ms;
      end = this.valueInFrame(start, endInstant);
    }

    const base = {
      component,
      start,
      end,
      startInstant,
      endInstant,
      durationMs: endInstant - startInstant,
      overridden,
    };
    return recurrenceId ? { ...base, recurrenceId } : base;
  }

  /** `instant` as a DATE-TIME in the frame of `template` (floating for dates). */
  private valueInFrame(template: TimeValue, instant: number): TimeValue {
    if (template.kind === "date-time") {
      return { kind: "date-time", wall: wallInFrameOf(template, instant, this.instantOptions), zone: template.zone };
    }
    const floating: TimeValue = { kind: "date-time", wall: 0, zone: FLOATING_ZONE };
    return { kind: "date-time", wall: wallInFrameOf(floating, instant, this.instantOptions), zone: FLOATING_ZONE };
  }

  /**
   * Run a property accessor; a conversion failure is reported and
   * becomes `null` so the caller can skip or fall back.
   */
  private guard<T>(component: Component, read: () => T): T | null {
    try {
      return read();
    } catch (err) {
      if (!(err instanceof PropertyConversionError)) throw err;
      this.diagnostics.report({
        severity: "warning",
        code: "invalid-property",
        message: `${component.toString()}: ${err.message}`,
      });
      return null;
    }
  }
}

function sameFrame(a: TimeValue, b: TimeValue): boolean {
  if (a.kind === "date" || b.kind === "date") return a.kind === b.kind;
  if (a.zone.type === "tzid" && b.zone.type === "tzid") return a.zone.tzid === b.zone.tzid;
  return a.zone.type === b.zone.type;
}

// ---------------------------------------------------------------------------
// Timeline
// ---------------------------------------------------------------------------

/** A fixed set of components with query helpers over their occurrences. */
export class Timeline {
  constructor(
    readonly components: readonly Component[],
    private readonly options: TimelineOptions = {},
  ) {}

  /** Every component of a calendar (or of several, e.g. ParseResult.calendars). */
  static fromCalendar(root: Component | readonly Component[], options: TimelineOptions = {}): Timeline {
    return new Timeline(root instanceof Component ? [root] : root, options);
  }

  /** @throws InvalidWindowError when the window's start lies after its end */
  query(window: TimeWindow = ALL_TIME): Generator<Occurrence, void, undefined> {
    return queryTimeline(this.components, window, this.options);
  }

  /** Every occurrence, in order. Infinite for unbounded rules. */
  iterate(): Generator<Occurrence, void, undefined> {
    return this.query(ALL_TIME);
  }

  /** Occurrences lying entirely within [start, end]. */
  includes(start: number, end: number): Generator<Occurrence, void, undefined> {
    return filter(this.query({ start, end, inclusiveEnd: true }), (o) => o.endInstant <= end);
  }

  /** Occurrences sharing any time with [start, end). Zero-length ones count when they start inside. */
  overlapping(start: number, end: number): Generator<Occurrence, void, undefined> {
    validateWindow({ start, end });
    return filter(this.query({ end, inclusiveEnd: false }), (o) => o.endInstant > start || o.startInstant >= start);
  }

  /** Occurrences starting strictly after `instant`. */
  startingAfter(instant: number): Generator<Occurrence, void, undefined> {
    return filter(this.query({ start: instant }), (o) => o.startInstant > instant);
  }

  /** Occurrences in progress at `instant` (start inclusive, end exclusive; zero-length ones at their start). */
  at(instant: number): Generator<Occurrence, void, undefined> {
    return filter(
      this.query({ end: instant, inclusiveEnd: true }),
      (o) => o.endInstant > instant || o.startInstant === instant,
    );
  }
}

function* filter(
  source: Iterable<Occurrence>,
  keep: (occurrence: Occurrence) => boolean,
): Generator<Occurrence, void, undefined> {
  for (const occurrence of source) {
    if (keep(occurrence)) yield occurrence;
  }
}
