/**
 * Tests for line unfolding and content-line tokenizing.
 */

import { describe, it, expect } from "vitest";
import { decodeParameterValue, encodeParameterValue, tokenizeLine, tokenizeLines, unfoldLines } from "./lexer";

// ---------------------------------------------------------------------------
// unfoldLines
// ---------------------------------------------------------------------------

describe("unfoldLines", () => {
  it("joins continuation lines and keeps the starting line number", () => {
    const text = "BEGIN:VCALENDAR\r\nSUMMARY:Hello\r\n  World\r\nEND:VCALENDAR\r\n";

    expect([...unfoldLines(text)]).toEqual([
      { text: "BEGIN:VCALENDAR", lineNumber: 1 },
      { text: "SUMMARY:Hello World", lineNumber: 2 },
      { text: "END:VCALENDAR", lineNumber: 4 },
    ]);
  });

  it("accepts bare LF and tab continuations", () => {
    const text = "DESCRIPTION:one\n\ttwo\nUID:x";

    expect([...unfoldLines(text)].map((l) => l.text)).toEqual(["DESCRIPTION:onetwo", "UID:x"]);
  });

  it("drops a leading byte-order mark", () => {
    const [first] = unfoldLines("\uFEFFBEGIN:VCALENDAR\n");
    expect(first.text).toBe("BEGIN:VCALENDAR");
  });

  it("keeps a continuation with no line before it as its own line", () => {
    expect([...unfoldLines(" orphan\nUID:x")].map((l) => l.text)).toEqual([" orphan", "UID:x"]);
  });

  it("yields nothing for empty input", () => {
    expect([...unfoldLines("")]).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// tokenizeLine
// ---------------------------------------------------------------------------

describe("tokenizeLine", () => {
  it("splits name, parameters and value", () => {
    const result = tokenizeLine('ATTENDEE;CN="Doe, Jane";ROLE=REQ-PARTICIPANT:mailto:jane@example.com');
    if (!result.ok) throw new Error(result.reason);

    expect(result.line.name).toBe("ATTENDEE");
    expect(result.line.params.get("cn")).toBe("Doe, Jane");
    expect(result.line.params.get("ROLE")).toBe("REQ-PARTICIPANT");
    expect(result.line.value).toBe("mailto:jane@example.com");
  });

  it("upper-cases the property name", () => {
    const result = tokenizeLine("summary:hi");
    expect(result.ok && result.line.name).toBe("SUMMARY");
  });

  it("reads comma-separated parameter values", () => {
    const result = tokenizeLine('X-TAGS;MEMBER="a:1",b:value');
    if (!result.ok) throw new Error(result.reason);

    expect(result.line.params.getAll("MEMBER")).toEqual(["a:1", "b"]);
    expect(result.line.value).toBe("value");
  });

  it("decodes RFC 6868 escapes in parameter values", () => {
    const result = tokenizeLine("X-NOTE;LABEL=say ^'hi^' ^^ ok^nline:v");
    if (!result.ok) throw new Error(result.reason);

    expect(result.line.params.get("LABEL")).toBe('say "hi" ^ ok\nline');
  });

  it("keeps an empty value", () => {
    const result = tokenizeLine("DESCRIPTION:");
    expect(result.ok && result.line.value).toBe("");
  });

  it.each([
    ["NOCOLON", "missing ':' separator"],
    [":value", "missing property name"],
    ["BAD NAME:x", 'invalid property name "BAD NAME"'],
    ["DTSTART;TZID:20240101", 'parameter "TZID" has no value'],
    ['X-A;P="abc:v', 'unterminated quoted value in parameter "P"'],
  ])("rejects %s", (text, reason) => {
    const result = tokenizeLine(text);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe(reason);
  });
});

describe("tokenizeLines", () => {
  it("skips blank lines", () => {
    const results = [...tokenizeLines(unfoldLines("UID:a\n\n   \nUID:b"))];
    expect(results).toHaveLength(2);
  });
});

describe("decodeParameterValue", () => {
  it("leaves a value without carets untouched", () => {
    expect(decodeParameterValue("Europe/Paris")).toBe("Europe/Paris");
  });

  it("keeps an unknown caret sequence as written", () => {
    expect(decodeParameterValue("a^b")).toBe("a^b");
  });
});

describe("encodeParameterValue", () => {
  it("escapes carets, quotes and newlines", () => {
    expect(encodeParameterValue('Jane "JJ" Doe\nSales^2')).toBe("Jane ^'JJ^' Doe^nSales^^2");
  });

  it("undoes decodeParameterValue", () => {
    expect(decodeParameterValue(encodeParameterValue('a^b "c"\nd'))).toBe('a^b "c"\nd');
  });
});
