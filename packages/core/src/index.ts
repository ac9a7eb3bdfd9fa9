/**
 * @almanac/core -- iCalendar parsing, lazy typed properties, recurrence
 * expansion and timelines. No I/O; see @almanac/reader for files and config.
 */

// Errors and diagnostics
export {
  AlmanacError,
  PropertyConversionError,
  RecurrenceDefinitionError,
  MissingPropertyError,
  MissingRequiredPropertyError,
  InvalidWindowError,
} from "./errors";
export {
  ConsoleDiagnosticSink,
  MemoryDiagnosticSink,
  CompositeDiagnosticSink,
  silentDiagnosticSink,
} from "./diagnostics";
export type { Diagnostic, DiagnosticCode, DiagnosticSeverity, DiagnosticSink } from "./diagnostics";

// Parsing
export { unfoldLines, tokenizeLine, tokenizeLines, decodeParameterValue, encodeParameterValue } from "./lexer";
export type { LogicalLine, ContentLine, TokenizeResult } from "./lexer";
export { ParameterMap } from "./parameters";
export { parse } from "./parser";
export type { ParseResult, ParseOptions } from "./parser";

// Component tree and properties
export { Component, ComponentArena, componentKindFor, componentName } from "./component";
export type { ComponentKind, ComponentTag } from "./component";
export { Property } from "./property";
export {
  convertProperty,
  valueTypeFor,
  unescapeText,
  splitTextList,
  parseUtcOffset,
  parsePeriod,
  isTimeValue,
} from "./values";
export type {
  PropertyValue,
  ValueType,
  Period,
  TimeListValue,
  PeriodListValue,
  UtcOffsetValue,
  IntegerValue,
  FloatListValue,
  TextValue,
  TextListValue,
  BooleanValue,
  RawProperty,
} from "./values";

// Time
export {
  MS_PER_SECOND,
  MS_PER_MINUTE,
  MS_PER_HOUR,
  MS_PER_DAY,
  UTC_ZONE,
  FLOATING_ZONE,
  wallFromParts,
  wallParts,
  parseDate,
  parseDateTime,
  parseTimeValue,
  withWall,
  formatTimeValue,
  formatWall,
} from "./time";
export type { Zone, CalendarDate, CalendarDateTime, TimeValue, WallParts } from "./time";
export { parseDuration, durationSpan, durationToMs, formatDuration, ZERO_SPAN } from "./duration";
export type { Duration, Span } from "./duration";
export {
  nullZoneResolver,
  intlZoneResolver,
  fixedOffsetResolver,
  chainZoneResolvers,
  toInstant,
  wallToInstant,
  instantToWall,
  wallInFrameOf,
} from "./zones";
export type { ZoneResolver, InstantOptions } from "./zones";
export { vtimezoneResolver } from "./vtimezone";
export type { VTimezoneResolverOptions } from "./vtimezone";

// Recurrence
export {
  FREQUENCIES,
  WEEKDAYS,
  RecurrenceRuleSchema,
  parseRecurrenceRule,
  formatRecurrenceRule,
} from "./recurrence/rule";
export type { Frequency, Weekday, WeekdayNum, RecurrenceRule } from "./recurrence/rule";
export {
  INITIAL_CURSOR,
  MAX_EMPTY_PERIODS,
  advanceRule,
  expandRule,
  expand,
  startCursor,
  takeInstants,
} from "./recurrence/evaluator";
export type { RuleCursor, RuleStep, ExpandOptions } from "./recurrence/evaluator";
export { RecurrenceSet } from "./recurrence/resolver";
export type { RecurrenceSetOptions, ResolvedInstant } from "./recurrence/resolver";

// Timeline
export { ALL_TIME, validateWindow, inWindow } from "./window";
export type { TimeWindow } from "./window";
export { mergeSorted } from "./sorted";
export { Timeline, queryTimeline } from "./timeline";
export type { Occurrence, TimelineOptions } from "./timeline";
