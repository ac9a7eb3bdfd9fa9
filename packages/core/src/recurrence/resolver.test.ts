/**
 * Tests for the occurrence-set resolver: RRULE/RDATE union, EXDATE and
 * EXRULE subtraction, RECURRENCE-ID overrides, frame conversion.
 */

import { describe, it, expect } from "vitest";
import type { Component } from "../component";
import { MemoryDiagnosticSink } from "../diagnostics";
import { InvalidWindowError, MissingPropertyError } from "../errors";
import { parse } from "../parser";
import { fixedOffsetResolver, intlZoneResolver } from "../zones";
import { RecurrenceSet } from "./resolver";

const at = (y: number, m: number, d: number, h = 0, mi = 0): number => Date.UTC(y, m - 1, d, h, mi);

function events(...bodies: string[][]): Component[] {
  const text = [
    "BEGIN:VCALENDAR",
    ...bodies.flatMap((body) => ["BEGIN:VEVENT", ...body, "END:VEVENT"]),
    "END:VCALENDAR",
  ].join("\r\n");
  return parse(text).root.childrenOfType("event");
}

const DAILY = ["UID:daily", "DTSTART:20240101T090000Z", "RRULE:FREQ=DAILY;COUNT=5"];

// ---------------------------------------------------------------------------
// Union and subtraction
// ---------------------------------------------------------------------------

describe("RecurrenceSet: union and exclusion", () => {
  it("removes an EXDATE from a daily series", () => {
    const [master] = events([...DAILY, "EXDATE:20240103T090000Z"]);
    const instants = [...RecurrenceSet.fromComponent(master).resolve()].map((r) => r.instant);

    expect(instants).toEqual([at(2024, 1, 1, 9), at(2024, 1, 2, 9), at(2024, 1, 4, 9), at(2024, 1, 5, 9)]);
  });

  it("lets a DATE EXDATE exclude the whole day", () => {
    const [master] = events([...DAILY, "EXDATE;VALUE=DATE:20240102,20240104"]);
    const instants = [...RecurrenceSet.fromComponent(master).resolve()].map((r) => r.instant);

    expect(instants).toEqual([at(2024, 1, 1, 9), at(2024, 1, 3, 9), at(2024, 1, 5, 9)]);
  });

  it("subtracts EXRULE instants", () => {
    const [master] = events([...DAILY, "EXRULE:FREQ=DAILY;INTERVAL=2;COUNT=3"]);
    const instants = [...RecurrenceSet.fromComponent(master).resolve()].map((r) => r.instant);

    expect(instants).toEqual([at(2024, 1, 2, 9), at(2024, 1, 4, 9)]);
  });

  it("adds RDATEs and collapses duplicates", () => {
    const [master] = events([...DAILY, "RDATE:20240110T090000Z,20240102T090000Z"]);
    const instants = [...RecurrenceSet.fromComponent(master).resolve()].map((r) => r.instant);

    expect(instants).toEqual([
      at(2024, 1, 1, 9),
      at(2024, 1, 2, 9),
      at(2024, 1, 3, 9),
      at(2024, 1, 4, 9),
      at(2024, 1, 5, 9),
      at(2024, 1, 10, 9),
    ]);
  });

  it("keeps the period of an RDATE PERIOD", () => {
    const [master] = events(["UID:p", "DTSTART:20240101T090000Z", "RDATE;VALUE=PERIOD:20240110T090000Z/PT2H"]);
    const resolved = [...RecurrenceSet.fromComponent(master).resolve()];

    expect(resolved.map((r) => r.instant)).toEqual([at(2024, 1, 1, 9), at(2024, 1, 10, 9)]);
    expect(resolved[0].period).toBeUndefined();
    expect(resolved[1].period?.duration?.hours).toBe(2);
  });

  it("includes DTSTART even when the rule does not match it", () => {
    const [master] = events(["UID:m", "DTSTART:20240102T090000Z", "RRULE:FREQ=WEEKLY;BYDAY=MO;COUNT=2"]);
    const instants = [...RecurrenceSet.fromComponent(master).resolve()].map((r) => r.instant);

    expect(instants).toEqual([at(2024, 1, 2, 9), at(2024, 1, 8, 9), at(2024, 1, 15, 9)]);
  });

  it("resolves a one-off component to its start", () => {
    const [master] = events(["UID:once", "DTSTART:20240101T090000Z"]);
    const set = RecurrenceSet.fromComponent(master);

    expect(set.isRecurring).toBe(false);
    expect([...set.resolve()].map((r) => r.instant)).toEqual([at(2024, 1, 1, 9)]);
  });
});

// ---------------------------------------------------------------------------
// Overrides
// ---------------------------------------------------------------------------

describe("RecurrenceSet: overrides", () => {
  it("replaces the overridden instance with the override's start", () => {
    const [master, moved] = events(DAILY, [
      "UID:daily",
      "RECURRENCE-ID:20240103T090000Z",
      "DTSTART:20240103T150000Z",
      "SUMMARY:Moved",
    ]);
    const resolved = [...RecurrenceSet.fromComponent(master, [moved]).resolve()];

    expect(resolved.map((r) => r.instant)).toEqual([
      at(2024, 1, 1, 9),
      at(2024, 1, 2, 9),
      at(2024, 1, 3, 15),
      at(2024, 1, 4, 9),
      at(2024, 1, 5, 9),
    ]);
    expect(resolved.map((r) => r.overridden)).toEqual([false, false, true, false, false]);
    expect(resolved[2].override).toBe(moved);
    expect(resolved[2].recurrenceId).toEqual({ kind: "date-time", wall: at(2024, 1, 3, 9), zone: { type: "utc" } });
  });

  it("emits an override that matches no generated instance", () => {
    const [master, extra] = events(DAILY, ["UID:daily", "RECURRENCE-ID:20240120T090000Z", "DTSTART:20240120T100000Z"]);
    const resolved = [...RecurrenceSet.fromComponent(master, [extra]).resolve()];

    expect(resolved).toHaveLength(6);
    expect(resolved[5]).toMatchObject({ instant: at(2024, 1, 20, 10), overridden: true });
  });

  it("prefers the override with the higher SEQUENCE", () => {
    const [master, first, second] = events(
      DAILY,
      ["UID:daily", "RECURRENCE-ID:20240102T090000Z", "DTSTART:20240102T110000Z", "SEQUENCE:2"],
      ["UID:daily", "RECURRENCE-ID:20240102T090000Z", "DTSTART:20240102T120000Z", "SEQUENCE:1"],
    );
    const set = RecurrenceSet.fromComponent(master, [first, second]);
    const overridden = [...set.resolve()].filter((r) => r.overridden);

    expect(set.overrideCount).toBe(1);
    expect(overridden.map((r) => r.instant)).toEqual([at(2024, 1, 2, 11)]);
  });

  it("emits an override moved into the window from outside it", () => {
    const [master, moved] = events(DAILY, ["UID:daily", "RECURRENCE-ID:20240101T090000Z", "DTSTART:20240104T100000Z"]);
    const resolved = [...RecurrenceSet.fromComponent(master, [moved]).resolve({ start: at(2024, 1, 4), end: at(2024, 1, 5) })];

    expect(resolved.map((r) => [r.instant, r.overridden])).toEqual([
      [at(2024, 1, 4, 9), false],
      [at(2024, 1, 4, 10), true],
    ]);
  });
});

// ---------------------------------------------------------------------------
// Windows, frames and errors
// ---------------------------------------------------------------------------

describe("RecurrenceSet: windows and frames", () => {
  it("restricts to the window with an exclusive end", () => {
    const [master] = events(DAILY);
    const instants = [...RecurrenceSet.fromComponent(master).resolve({ start: at(2024, 1, 2, 9), end: at(2024, 1, 4, 9) })].map(
      (r) => r.instant,
    );

    expect(instants).toEqual([at(2024, 1, 2, 9), at(2024, 1, 3, 9)]);
  });

  it("resolves an unbounded rule lazily", () => {
    const [master] = events(["UID:forever", "DTSTART:20240101T090000Z", "RRULE:FREQ=DAILY"]);
    const iterator = RecurrenceSet.fromComponent(master).resolve();
    const first = iterator.next();
    const second = iterator.next();

    expect(first.done ? null : first.value.instant).toBe(at(2024, 1, 1, 9));
    expect(second.done ? null : second.value.instant).toBe(at(2024, 1, 2, 9));
  });

  it("rejects a window whose start is after its end", () => {
    const [master] = events(DAILY);
    expect(() => RecurrenceSet.fromComponent(master).resolve({ start: 10, end: 5 })).toThrow(InvalidWindowError);
  });

  it("moves a UTC UNTIL into the zone of DTSTART", () => {
    const [master] = events([
      "UID:ny",
      "DTSTART;TZID=America/New_York:20240101T090000",
      "RRULE:FREQ=DAILY;UNTIL=20240103T135959Z",
    ]);
    const set = RecurrenceSet.fromComponent(master, [], { resolver: fixedOffsetResolver({ "America/New_York": -300 }) });

    expect([...set.resolve()].map((r) => r.instant)).toEqual([at(2024, 1, 1, 14), at(2024, 1, 2, 14)]);
  });

  it("matches a UTC EXDATE against a zoned series", () => {
    const [master] = events([
      "UID:ny",
      "DTSTART;TZID=America/New_York:20240101T090000",
      "RRULE:FREQ=DAILY;COUNT=3",
      "EXDATE:20240102T140000Z",
    ]);
    const set = RecurrenceSet.fromComponent(master, [], { resolver: fixedOffsetResolver({ "America/New_York": -300 }) });

    expect([...set.resolve()].map((r) => r.instant)).toEqual([at(2024, 1, 1, 14), at(2024, 1, 3, 14)]);
  });

  it("requires DTSTART", () => {
    const [master] = events(["UID:nostart", "RRULE:FREQ=DAILY"]);
    expect(() => RecurrenceSet.fromComponent(master)).toThrow(MissingPropertyError);
  });

  it("reports a broken rule and still resolves the rest", () => {
    const [master] = events([
      "UID:broken",
      "DTSTART:20240101T090000Z",
      "RRULE:FREQ=DAILY;COUNT=2;UNTIL=20240105T000000Z",
      "RDATE:20240110T090000Z",
    ]);
    const sink = new MemoryDiagnosticSink();
    const set = RecurrenceSet.fromComponent(master, [], { diagnostics: sink });

    expect([...set.resolve()].map((r) => r.instant)).toEqual([at(2024, 1, 1, 9), at(2024, 1, 10, 9)]);
    expect(sink.diagnostics).toHaveLength(1);
    expect(sink.diagnostics[0]).toMatchObject({ severity: "error", code: "invalid-recurrence", line: 5 });
    expect(sink.diagnostics[0].message).toContain("COUNT and UNTIL are mutually exclusive");
  });

  it("reports an unreadable EXDATE as an invalid property", () => {
    const [master] = events([...DAILY, "EXDATE:yesterday"]);
    const sink = new MemoryDiagnosticSink();
    const set = RecurrenceSet.fromComponent(master, [], { diagnostics: sink });

    expect([...set.resolve()]).toHaveLength(5);
    expect(sink.diagnostics.map((d) => d.code)).toEqual(["invalid-property"]);
  });

  it("resolves a window years after DTSTART without walking the years before it", () => {
    const masters = events(
      ...Array.from({ length: 200 }, (_, i) => [
        `UID:old-${i}`,
        "DTSTART;TZID=America/New_York:20150105T090000",
        "RRULE:FREQ=DAILY",
      ]),
    );
    const options = { resolver: intlZoneResolver() };
    const window = { start: at(2024, 6, 3), end: at(2024, 6, 10) };

    const began = performance.now();
    const resolved = masters.map((master) => [...RecurrenceSet.fromComponent(master, [], options).resolve(window)]);
    const elapsed = performance.now() - began;

    expect(resolved[0].map((r) => r.instant)).toEqual([3, 4, 5, 6, 7, 8, 9].map((d) => at(2024, 6, d, 13)));
    expect(resolved.every((instances) => instances.length === 7)).toBe(true);
    expect(elapsed).toBeLessThan(1500);
  });

  it("reaches a late window of a minutely series at once", () => {
    const [master] = events(["UID:ticks", "DTSTART:20200101T000000Z", "RRULE:FREQ=MINUTELY"]);

    const began = performance.now();
    const instants = [...RecurrenceSet.fromComponent(master).resolve({ start: at(2024, 6, 3, 12), end: at(2024, 6, 3, 12, 5) })];
    const elapsed = performance.now() - began;

    expect(instants.map((r) => r.instant)).toEqual([0, 1, 2, 3, 4].map((mi) => at(2024, 6, 3, 12, mi)));
    expect(elapsed).toBeLessThan(500);
  });

  it("still counts a COUNT rule from DTSTART when the window starts later", () => {
    const [master] = events(["UID:counted", "DTSTART:20240101T090000Z", "RRULE:FREQ=WEEKLY;COUNT=10"]);
    const instants = [...RecurrenceSet.fromComponent(master).resolve({ start: at(2024, 2, 20) })].map((r) => r.instant);

    expect(instants).toEqual([at(2024, 2, 26, 9), at(2024, 3, 4, 9)]);
  });
});
