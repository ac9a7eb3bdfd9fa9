/**
 * @almanac/core -- line unfolding and content-line tokenizing.
 *
 * RFC 5545 Section 3.1: a physical line that starts with a single space
 * or horizontal tab continues the previous line. Once unfolded, each
 * logical line has the shape
 *
 *   NAME *(";" PARAM-NAME "=" PARAM-VALUE *("," PARAM-VALUE)) ":" VALUE
 *
 * Both stages are lazy generators; nothing is read ahead of what the
 * consumer pulls.
 */

import { ParameterMap } from "./parameters";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LogicalLine {
  readonly text: string;
  /** 1-based physical line the logical line starts on. */
  readonly lineNumber: number;
}

export interface ContentLine {
  /** Upper-cased property or keyword name (DTSTART, BEGIN, X-FOO, ...). */
  readonly name: string;
  readonly params: ParameterMap;
  /** Raw value, exactly as it appeared after the separating colon. */
  readonly value: string;
  readonly lineNumber: number;
}

export type TokenizeResult =
  | { readonly ok: true; readonly line: ContentLine }
  | { readonly ok: false; readonly lineNumber: number; readonly text: string; readonly reason: string };

// ---------------------------------------------------------------------------
// Unfolding
// ---------------------------------------------------------------------------

/**
 * Split text into logical lines, joining folded continuations.
 * Accepts CRLF and bare LF. A leading byte-order mark is dropped.
 * A continuation with nothing before it starts a line of its own.
 */
export function* unfoldLines(text: string): Generator<LogicalLine> {
  let start = text.charCodeAt(0) === 0xfeff ? 1 : 0;
  let physical = 0;
  let current: string | null = null;
  let currentLine = 0;

  while (start < text.length) {
    let end = text.indexOf("\n", start);
    if (end === -1) end = text.length;
    let line = text.slice(start, end);
    if (line.endsWith("\r")) line = line.slice(0, -1);
    physical++;

    if (current !== null && (line.startsWith(" ") || line.startsWith("\t"))) {
      current += line.slice(1);
    } else {
      if (current !== null) {
        yield { text: current, lineNumber: currentLine };
      }
      current = line;
      currentLine = physical;
    }
    start = end + 1;
  }

  if (current !== null) {
    yield { text: current, lineNumber: currentLine };
  }
}

// ---------------------------------------------------------------------------
// Tokenizing
// ---------------------------------------------------------------------------

const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** RFC 6868 parameter value decoding: ^n, ^^ and ^' . */
export function decodeParameterValue(value: string): string {
  if (!value.includes("^")) return value;
  return value.replace(/\^(n|\^|')/gi, (_, code: string) => {
    switch (code) {
      case "n":
      case "N":
        return "\n";
      case "^":
        return "^";
      default:
        return '"';
    }
  });
}

/** RFC 6868 parameter value encoding, the inverse of decodeParameterValue. */
export function encodeParameterValue(value: string): string {
  return value.replace(/[\^\n"]/g, (char) => (char === "^" ? "^^" : char === "\n" ? "^n" : "^'"));
}

function fail(line: LogicalLine, reason: string): TokenizeResult {
  return { ok: false, lineNumber: line.lineNumber, text: line.text, reason };
}

/**
 * Split one logical line into name, parameters and raw value.
 *
 * Quoted parameter values may contain ",", ";" and ":"; the quotes are
 * removed. Unquoted values are accepted everywhere. The value itself is
 * everything after the first colon that is not inside a parameter.
 */
export function tokenizeLine(input: LogicalLine | string): TokenizeResult {
  const line: LogicalLine = typeof input === "string" ? { text: input, lineNumber: 0 } : input;
  const text = line.text;
  let i = 0;

  while (i < text.length && text[i] !== ";" && text[i] !== ":") i++;
  if (i === text.length) return fail(line, "missing ':' separator");

  const name = text.slice(0, i);
  if (name.length === 0) return fail(line, "missing property name");
  if (!NAME_PATTERN.test(name)) return fail(line, `invalid property name "${name}"`);

  const params = new ParameterMap();

  while (text[i] === ";") {
    i++;
    const nameStart = i;
    while (i < text.length && text[i] !== "=" && text[i] !== ";" && text[i] !== ":") i++;
    const paramName = text.slice(nameStart, i);
    if (text[i] !== "=" || paramName.length === 0) {
      return fail(line, `parameter "${paramName}" has no value`);
    }
    i++;

    const values: string[] = [];
    for (;;) {
      if (text[i] === '"') {
        const close = text.indexOf('"', i + 1);
        if (close === -1) return fail(line, `unterminated quoted value in parameter "${paramName}"`);
        values.push(decodeParameterValue(text.slice(i + 1, close)));
        i = close + 1;
      } else {
        const valueStart = i;
        while (i < text.length && text[i] !== "," && text[i] !== ";" && text[i] !== ":") i++;
        values.push(decodeParameterValue(text.slice(valueStart, i)));
      }
      if (text[i] !== ",") break;
      i++;
    }
    params.set(paramName, values);
  }

  if (text[i] !== ":") return fail(line, "missing ':' separator");

  return {
    ok: true,
    line: {
      name: name.toUpperCase(),
      params,
      value: text.slice(i + 1),
      lineNumber: line.lineNumber,
    },
  };
}

/** Tokenize every logical line, skipping blank ones. */
export function* tokenizeLines(lines: Iterable<LogicalLine>): Generator<TokenizeResult> {
  for (const line of lines) {
    if (line.text.trim().length === 0) continue;
    yield tokenizeLine(line);
  }
}
