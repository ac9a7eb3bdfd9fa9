/**
 * Tests for timeline queries: grouping, windows, lengths and the
 * interval helpers.
 */

import { describe, it, expect } from "vitest";
import { MemoryDiagnosticSink } from "./diagnostics";
import { InvalidWindowError } from "./errors";
import { parse } from "./parser";
import { MS_PER_DAY, MS_PER_HOUR } from "./time";
import { Timeline, queryTimeline, type Occurrence, type TimelineOptions } from "./timeline";
import { fixedOffsetResolver, intlZoneResolver } from "./zones";

const at = (y: number, m: number, d: number, h = 0, mi = 0): number => Date.UTC(y, m - 1, d, h, mi);

function calendar(...blocks: string[][]): string {
  return ["BEGIN:VCALENDAR", "VERSION:2.0", ...blocks.flat(), "END:VCALENDAR"].join("\r\n");
}

const event = (...body: string[]): string[] => ["BEGIN:VEVENT", ...body, "END:VEVENT"];

function timeline(text: string, options: TimelineOptions = {}): Timeline {
  return Timeline.fromCalendar(parse(text).calendars, options);
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

describe("queryTimeline", () => {
  const series = calendar(event("UID:standup", "DTSTART:20240101T090000Z", "DURATION:PT15M", "RRULE:FREQ=DAILY;COUNT=5"));

  it("returns occurrences starting in a half-open window", () => {
    const starts = [...timeline(series).query({ start: at(2024, 1, 2), end: at(2024, 1, 4) })].map((o) => o.startInstant);
    expect(starts).toEqual([at(2024, 1, 2, 9), at(2024, 1, 3, 9)]);
  });

  it("includes the end instant when the timeline is configured to", () => {
    const starts = [...timeline(series, { inclusiveEnd: true }).query({ start: at(2024, 1, 2, 9), end: at(2024, 1, 4, 9) })].map(
      (o) => o.startInstant,
    );
    expect(starts).toEqual([at(2024, 1, 2, 9), at(2024, 1, 3, 9), at(2024, 1, 4, 9)]);
  });

  it("lets the window override the configured end handling", () => {
    const window = { start: at(2024, 1, 2, 9), end: at(2024, 1, 4, 9), inclusiveEnd: false };
    expect([...timeline(series, { inclusiveEnd: true }).query(window)]).toHaveLength(2);
  });

  it("computes the end of each instance from DURATION", () => {
    const [first] = timeline(series).query();

    expect(first.endInstant).toBe(at(2024, 1, 1, 9, 15));
    expect(first.durationMs).toBe(15 * 60 * 1000);
    expect(first.recurrenceId).toEqual(first.start);
    expect(first.overridden).toBe(false);
  });

  it("merges several components by start time", () => {
    const text = calendar(
      event("UID:a", "DTSTART:20240101T120000Z", "SUMMARY:Lunch"),
      event("UID:b", "DTSTART:20240101T080000Z", "SUMMARY:Breakfast", "RRULE:FREQ=DAILY;COUNT=2"),
    );
    const summaries = [...timeline(text).iterate()].map((o) => `${o.component.summary}@${o.startInstant}`);

    expect(summaries).toEqual([
      `Breakfast@${at(2024, 1, 1, 8)}`,
      `Lunch@${at(2024, 1, 1, 12)}`,
      `Breakfast@${at(2024, 1, 2, 8)}`,
    ]);
  });

  it("throws on an inverted window before iteration starts", () => {
    expect(() => timeline(series).query({ start: at(2024, 2, 1), end: at(2024, 1, 1) })).toThrow(InvalidWindowError);
  });

  it("accepts bare components as well as calendars", () => {
    const [vevent] = parse(series).root.childrenOfType("event");
    expect([...queryTimeline([vevent], { end: at(2024, 1, 3) })]).toHaveLength(2);
  });
});

// ---------------------------------------------------------------------------
// Overrides and grouping
// ---------------------------------------------------------------------------

describe("queryTimeline: overrides", () => {
  it("substitutes an override with its own DTEND", () => {
    const text = calendar(
      event("UID:s", "DTSTART:20240101T090000Z", "DTEND:20240101T100000Z", "RRULE:FREQ=DAILY;COUNT=3"),
      event("UID:s", "RECURRENCE-ID:20240102T090000Z", "DTSTART:20240102T130000Z", "DTEND:20240102T133000Z", "SUMMARY:Short"),
    );
    const occurrences = [...timeline(text).iterate()];

    expect(occurrences.map((o) => o.startInstant)).toEqual([at(2024, 1, 1, 9), at(2024, 1, 2, 13), at(2024, 1, 3, 9)]);
    expect(occurrences[1].overridden).toBe(true);
    expect(occurrences[1].component.summary).toBe("Short");
    expect(occurrences[1].durationMs).toBe(30 * 60 * 1000);
    expect(occurrences[1].recurrenceId?.wall).toBe(at(2024, 1, 2, 9));
  });

  it("keeps the master's length for an override without an end", () => {
    const text = calendar(
      event("UID:s", "DTSTART:20240101T090000Z", "DTEND:20240101T100000Z", "RRULE:FREQ=DAILY;COUNT=2"),
      event("UID:s", "RECURRENCE-ID:20240102T090000Z", "DTSTART:20240102T110000Z"),
    );
    const moved = [...timeline(text).iterate()][1];

    expect(moved.endInstant).toBe(at(2024, 1, 2, 12));
  });

  it("yields an override whose master is missing on its own", () => {
    const text = calendar(
      event("UID:orphan", "RECURRENCE-ID:20240105T090000Z", "DTSTART:20240105T100000Z", "DTEND:20240105T110000Z"),
    );
    const [occurrence] = timeline(text).iterate();

    expect(occurrence.overridden).toBe(true);
    expect(occurrence.startInstant).toBe(at(2024, 1, 5, 10));
    expect(occurrence.durationMs).toBe(MS_PER_HOUR);
    expect(occurrence.recurrenceId?.wall).toBe(at(2024, 1, 5, 9));
  });

  it("leaves recurrenceId off one-off events", () => {
    const [occurrence] = timeline(calendar(event("UID:once", "DTSTART:20240101T090000Z"))).iterate();
    expect(occurrence.recurrenceId).toBeUndefined();
  });

  it("keeps two masters with the same UID as separate series", () => {
    const text = calendar(
      event("UID:dup", "DTSTART:20240101T090000Z"),
      event("UID:dup", "DTSTART:20240102T090000Z"),
    );
    expect([...timeline(text).iterate()].map((o) => o.startInstant)).toEqual([at(2024, 1, 1, 9), at(2024, 1, 2, 9)]);
  });

  it("does not group an event with a to-do of the same UID", () => {
    const text = calendar(
      event("UID:shared", "DTSTART:20240101T090000Z"),
      ["BEGIN:VTODO", "UID:shared", "RECURRENCE-ID:20240101T090000Z", "DTSTART:20240101T100000Z", "END:VTODO"],
    );
    const occurrences = [...timeline(text).iterate()];

    expect(occurrences.map((o) => o.component.tag)).toEqual(["event", "todo"]);
    expect(occurrences[0].overridden).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Lengths and component kinds
// ---------------------------------------------------------------------------

describe("queryTimeline: lengths and kinds", () => {
  it("gives an all-day event one day ending on a DATE", () => {
    const [occurrence] = timeline(calendar(event("UID:day", "DTSTART;VALUE=DATE:20240101"))).iterate();

    expect(occurrence.end).toEqual({ kind: "date", wall: at(2024, 1, 2) });
    expect(occurrence.durationMs).toBe(MS_PER_DAY);
  });

  it("gives a journal no length", () => {
    const text = calendar(["BEGIN:VJOURNAL", "UID:j", "DTSTART:20240101T090000Z", "DTEND:20240101T100000Z", "END:VJOURNAL"]);
    const [entry] = timeline(text).iterate();

    expect(entry.durationMs).toBe(0);
    expect(entry.end).toEqual(entry.start);
  });

  it("places a to-do without DTSTART at its DUE", () => {
    const text = calendar(["BEGIN:VTODO", "UID:t", "DUE:20240110T170000Z", "END:VTODO"]);
    const [todo] = timeline(text).iterate();

    expect(todo.startInstant).toBe(at(2024, 1, 10, 17));
    expect(todo.durationMs).toBe(0);
  });

  it("yields one occurrence per FREEBUSY period", () => {
    const text = calendar([
      "BEGIN:VFREEBUSY",
      "UID:fb",
      "DTSTART:20240101T000000Z",
      "DTEND:20240102T000000Z",
      "FREEBUSY;FBTYPE=BUSY-TENTATIVE:20240101T140000Z/PT1H,20240101T090000Z/PT1H",
      "FREEBUSY:20240101T160000Z/20240101T163000Z",
      "END:VFREEBUSY",
    ]);
    const blocks = [...timeline(text).iterate()];

    expect(blocks.map((b) => [b.startInstant, b.durationMs, b.freeBusyType])).toEqual([
      [at(2024, 1, 1, 9), MS_PER_HOUR, "BUSY-TENTATIVE"],
      [at(2024, 1, 1, 14), MS_PER_HOUR, "BUSY-TENTATIVE"],
      [at(2024, 1, 1, 16), 30 * 60 * 1000, "BUSY"],
    ]);
  });

  it("never yields timezones or alarms", () => {
    const text = calendar(
      ["BEGIN:VTIMEZONE", "TZID:Custom/Zone", "BEGIN:STANDARD", "DTSTART:19700101T000000", "TZOFFSETFROM:+0100", "TZOFFSETTO:+0100", "END:STANDARD", "END:VTIMEZONE"],
      event("UID:e", "DTSTART:20240101T090000Z", "BEGIN:VALARM", "TRIGGER:-PT5M", "END:VALARM"),
    );
    expect([...timeline(text).iterate()].map((o) => o.component.tag)).toEqual(["event"]);
  });

  it("reads a floating time in the configured zone", () => {
    const text = calendar(event("UID:f", "DTSTART:20240101T090000"));
    const [occurrence] = timeline(text, { zoneResolver: intlZoneResolver(), floatingZone: "Europe/Paris" }).iterate();

    expect(occurrence.startInstant).toBe(at(2024, 1, 1, 8));
  });

  it("measures an end in another zone exactly", () => {
    const text = calendar(event("UID:z", "DTSTART;TZID=Test/Plus2:20240101T120000", "DTEND:20240101T110000Z"));
    const [occurrence] = timeline(text, { zoneResolver: fixedOffsetResolver({ "Test/Plus2": 120 }) }).iterate();

    expect(occurrence.startInstant).toBe(at(2024, 1, 1, 10));
    expect(occurrence.durationMs).toBe(MS_PER_HOUR);
    expect(occurrence.end).toEqual({ kind: "date-time", wall: at(2024, 1, 1, 13), zone: { type: "tzid", tzid: "Test/Plus2" } });
  });
});

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

describe("queryTimeline: diagnostics", () => {
  it("reports and skips an event without DTSTART", () => {
    const sink = new MemoryDiagnosticSink();
    const text = calendar(event("UID:n", "SUMMARY:Nowhere"), event("UID:y", "DTSTART:20240101T090000Z"));
    const occurrences = [...timeline(text, { diagnostics: sink }).iterate()];

    expect(occurrences.map((o) => o.component.uid)).toEqual(["y"]);
    expect(sink.diagnostics).toEqual([
      { severity: "warning", code: "missing-start", message: "VEVENT(n) has no DTSTART and was skipped" },
    ]);
  });

  it("reports and skips an event whose DTSTART does not convert", () => {
    const sink = new MemoryDiagnosticSink();
    const text = calendar(event("UID:bad", "DTSTART:soon"));

    expect([...timeline(text, { diagnostics: sink }).iterate()]).toEqual([]);
    expect(sink.diagnostics.map((d) => d.code)).toEqual(["invalid-property"]);
  });
});

// ---------------------------------------------------------------------------
// Interval helpers
// ---------------------------------------------------------------------------

describe("Timeline helpers", () => {
  const text = calendar(
    event("UID:a", "SUMMARY:A", "DTSTART:20240101T090000Z", "DTEND:20240101T100000Z"),
    event("UID:b", "SUMMARY:B", "DTSTART:20240101T093000Z", "DTEND:20240101T110000Z"),
    event("UID:c", "SUMMARY:C", "DTSTART:20240101T120000Z"),
  );
  const names = (occurrences: Iterable<Occurrence>): Array<string | undefined> =>
    [...occurrences].map((o) => o.component.summary);

  it("at() finds occurrences in progress", () => {
    expect(names(timeline(text).at(at(2024, 1, 1, 9, 45)))).toEqual(["A", "B"]);
    expect(names(timeline(text).at(at(2024, 1, 1, 12)))).toEqual(["C"]);
  });

  it("overlapping() finds occurrences sharing time with a half-open range", () => {
    expect(names(timeline(text).overlapping(at(2024, 1, 1, 10, 30), at(2024, 1, 1, 12)))).toEqual(["B"]);
  });

  it("includes() finds occurrences contained in a closed range", () => {
    expect(names(timeline(text).includes(at(2024, 1, 1, 9), at(2024, 1, 1, 10, 30)))).toEqual(["A"]);
  });

  it("startingAfter() excludes an occurrence starting at the instant", () => {
    expect(names(timeline(text).startingAfter(at(2024, 1, 1, 9)))).toEqual(["B", "C"]);
  });

  it("overlapping() rejects an inverted range", () => {
    expect(() => timeline(text).overlapping(at(2024, 1, 2), at(2024, 1, 1))).toThrow(InvalidWindowError);
  });
});
