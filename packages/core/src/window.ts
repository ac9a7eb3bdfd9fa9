/**
 * @almanac/core -- query windows.
 *
 * A window bounds occurrence starts, in absolute milliseconds. The start
 * is inclusive; the end is exclusive unless `inclusiveEnd` is set. Either
 * bound may be left open.
 */

import { InvalidWindowError } from "./errors";

export interface TimeWindow {
  readonly start?: number;
  readonly end?: number;
  readonly inclusiveEnd?: boolean;
}

/** The unbounded window. */
export const ALL_TIME: TimeWindow = {};

/**
 * Check a window and return it.
 * @throws InvalidWindowError when start lies after end
 */
export function validateWindow(window: TimeWindow): TimeWindow {
  if (window.start !== undefined && window.end !== undefined && window.start > window.end) {
    throw new InvalidWindowError(window.start, window.end);
  }
  return window;
}

/** The instant lies before the window's start. */
export function beforeWindow(window: TimeWindow, instant: number): boolean {
  return window.start !== undefined && instant < window.start;
}

/** The instant lies at or after the window's end (only after it when the end is inclusive). */
export function afterWindow(window: TimeWindow, instant: number): boolean {
  if (window.end === undefined) return false;
  return window.inclusiveEnd ? instant > window.end : instant >= window.end;
}

export function inWindow(window: TimeWindow, instant: number): boolean {
  return !beforeWindow(window, instant) && !afterWindow(window, instant);
}
