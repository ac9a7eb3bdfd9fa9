/**
 * @almanac/core -- properties with lazily converted values.
 *
 * A Property keeps the raw text it was parsed from. The typed value is
 * computed on the first call to typed() and memoized in the property's
 * own cell; a failed conversion is memoized too and re-thrown from the
 * cell. Conversion is deterministic, so the memo never goes stale.
 */

import { encodeParameterValue } from "./lexer";
import type { ParameterMap } from "./parameters";
import { convertProperty, type PropertyValue } from "./values";

type Memo =
  | { readonly state: "empty" }
  | { readonly state: "value"; readonly value: PropertyValue }
  | { readonly state: "error"; readonly error: unknown };

export class Property {
  readonly name: string;
  readonly params: ParameterMap;
  readonly raw: string;
  readonly lineNumber: number;

  private memo: Memo = { state: "empty" };
  private conversionCount = 0;

  constructor(name: string, params: ParameterMap, raw: string, lineNumber = 0) {
    this.name = name.toUpperCase();
    this.params = params;
    this.raw = raw;
    this.lineNumber = lineNumber;
  }

  /**
   * The typed value, converted on first access.
   * @throws PropertyConversionError (or RecurrenceDefinitionError for RRULE/EXRULE)
   */
  typed(): PropertyValue {
    let memo = this.memo;
    if (memo.state === "empty") {
      this.conversionCount++;
      try {
        memo = { state: "value", value: convertProperty(this) };
      } catch (err) {
        memo = { state: "error", error: err };
      }
      this.memo = memo;
    }
    if (memo.state === "error") throw memo.error;
    return memo.value;
  }

  /** Whether typed() has run, successfully or not. */
  get isConverted(): boolean {
    return this.memo.state !== "empty";
  }

  /** How many times the value was actually converted (0 or 1). */
  get conversions(): number {
    return this.conversionCount;
  }

  /** The content line this property came from, minus any folding. */
  toOriginalString(): string {
    let text = this.name;
    for (const [name, values] of this.params) {
      const rendered = values.map((v) => {
        const encoded = encodeParameterValue(v);
        return /[;:,]/.test(encoded) ? `"${encoded}"` : encoded;
      });
      text += `;${name}=${rendered.join(",")}`;
    }
    return `${text}:${this.raw}`;
  }
}
