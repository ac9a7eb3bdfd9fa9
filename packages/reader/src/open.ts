/**
 * @almanac/reader -- parse a calendar and get a ready-to-query timeline.
 *
 * TZIDs are resolved against the calendar's own VTIMEZONE blocks first,
 * then against the runtime's IANA database. Floating times and all-day
 * dates are read in the configured default timezone.
 */

import {
  ConsoleDiagnosticSink,
  Timeline,
  chainZoneResolvers,
  intlZoneResolver,
  parse,
  silentDiagnosticSink,
  vtimezoneResolver,
  type DiagnosticSink,
  type ParseResult,
  type ZoneResolver,
} from "@almanac/core";
import { resolveReaderConfig, type ReaderConfig } from "./config";
import { readCalendarFile } from "./read";

export interface OpenedCalendar {
  readonly result: ParseResult;
  readonly timeline: Timeline;
  readonly zoneResolver: ZoneResolver;
}

export interface OpenOptions {
  /** Receives diagnostics instead of the console sink chosen by `logDiagnostics`. */
  readonly diagnostics?: DiagnosticSink;
}

function sinkFor(config: ReaderConfig, options: OpenOptions): DiagnosticSink {
  if (options.diagnostics) return options.diagnostics;
  return config.logDiagnostics ? new ConsoleDiagnosticSink("almanac-reader") : silentDiagnosticSink;
}

/** Parse calendar text already in memory. */
export function parseCalendarText(
  text: string,
  config: ReaderConfig = resolveReaderConfig(),
  options: OpenOptions = {},
): OpenedCalendar {
  const diagnostics = sinkFor(config, options);
  const result = parse(text, { diagnostics });
  const zoneResolver = chainZoneResolvers(
    ...result.calendars.map((calendar) => vtimezoneResolver(calendar, { diagnostics })),
    intlZoneResolver(),
  );
  const timeline = Timeline.fromCalendar(result.calendars, {
    zoneResolver,
    floatingZone: config.defaultTimezone,
    inclusiveEnd: config.inclusiveEnd,
    diagnostics,
  });
  return { result, timeline, zoneResolver };
}

/**
 * Read and parse a calendar file.
 * @throws CalendarReadError when the file cannot be read
 */
export async function openCalendar(
  path: string,
  config: ReaderConfig = resolveReaderConfig(),
  options: OpenOptions = {},
): Promise<OpenedCalendar> {
  const text = await readCalendarFile(path, { maxBytes: config.maxFileBytes });
  return parseCalendarText(text, config, options);
}
