/**
 * @almanac/reader -- errors raised while loading files and configuration.
 */

import { AlmanacError } from "@almanac/core";

/** A calendar file could not be read. The underlying failure is the `cause`. */
export class CalendarReadError extends AlmanacError {
  readonly path: string;

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super(`Cannot read calendar ${path}: ${detail}`, options);
    this.name = "CalendarReadError";
    this.path = path;
  }
}

/** Reader configuration failed validation. Each problem is one entry of `issues`. */
export class ConfigError extends AlmanacError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: { cause?: unknown }) {
    super(`Invalid reader configuration: ${issues.join("; ")}`, options);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
