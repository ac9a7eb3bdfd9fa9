/**
 * @almanac/reader -- file loading and configuration around @almanac/core.
 */

export { CalendarReadError, ConfigError } from "./errors";
export {
  DEFAULT_MAX_FILE_BYTES,
  ReaderConfigSchema,
  loadReaderConfig,
  resolveReaderConfig,
} from "./config";
export type { ReaderConfig, LoadReaderConfigOptions } from "./config";
export { readCalendarFile } from "./read";
export type { ReadCalendarFileOptions } from "./read";
export { openCalendar, parseCalendarText } from "./open";
export type { OpenedCalendar, OpenOptions } from "./open";
