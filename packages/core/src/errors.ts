/**
 * @almanac/core -- error types.
 *
 * Structural problems in a document never throw (see diagnostics.ts).
 * These errors are scoped to a single accessor or call: a property that
 * fails to convert, a recurrence rule that contradicts itself, or a
 * caller that asked for an impossible window.
 */

/** Base class for all errors raised by @almanac packages. */
export class AlmanacError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AlmanacError";
  }
}

/** A raw property value could not be converted to its typed form. */
export class PropertyConversionError extends AlmanacError {
  readonly propertyName: string;
  readonly rawValue: string;

  constructor(propertyName: string, rawValue: string, detail: string) {
    super(`Cannot convert ${propertyName} value "${rawValue}": ${detail}`);
    this.name = "PropertyConversionError";
    this.propertyName = propertyName;
    this.rawValue = rawValue;
  }
}

/**
 * A recurrence rule parsed but describes something invalid
 * (COUNT together with UNTIL, BYMONTH=13, ...). Every problem found is
 * listed in `issues`.
 */
export class RecurrenceDefinitionError extends PropertyConversionError {
  readonly issues: readonly string[];

  constructor(propertyName: string, rawValue: string, issues: readonly string[]) {
    super(propertyName, rawValue, issues.join("; "));
    this.name = "RecurrenceDefinitionError";
    this.issues = issues;
  }
}

/** Typed access to a property the component does not carry. */
export class MissingPropertyError extends AlmanacError {
  readonly componentName: string;
  readonly propertyName: string;
  readonly index: number;

  constructor(componentName: string, propertyName: string, index = 0) {
    super(
      index === 0
        ? `${componentName} has no ${propertyName} property`
        : `${componentName} has no ${propertyName} property at index ${index}`,
    );
    this.name = "MissingPropertyError";
    this.componentName = componentName;
    this.propertyName = propertyName;
    this.index = index;
  }
}

/** A property RFC 5545 marks as required (UID, DTSTAMP) is absent. */
export class MissingRequiredPropertyError extends MissingPropertyError {
  constructor(componentName: string, propertyName: string) {
    super(componentName, propertyName);
    this.message = `${componentName} is missing required property ${propertyName}`;
    this.name = "MissingRequiredPropertyError";
  }
}

/** A query window whose start lies after its end. */
export class InvalidWindowError extends AlmanacError {
  readonly start: number;
  readonly end: number;

  constructor(start: number, end: number) {
    super(
      `Invalid window: start ${new Date(start).toISOString()} is after end ${new Date(end).toISOString()}`,
    );
    this.name = "InvalidWindowError";
    this.start = start;
    this.end = end;
  }
}
