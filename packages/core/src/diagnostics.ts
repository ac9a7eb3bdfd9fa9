/**
 * @almanac/core -- diagnostics and diagnostic sinks.
 *
 * The parser collects diagnostics into the list it returns. Later stages
 * (recurrence resolution, timeline queries) keep going past a broken
 * property and report it to a DiagnosticSink instead.
 */

export type DiagnosticSeverity = "warning" | "error";

export type DiagnosticCode =
  | "malformed-line"
  | "orphan-end"
  | "unterminated-component"
  | "content-outside-component"
  | "missing-calendar"
  | "empty-document"
  | "invalid-property"
  | "invalid-recurrence"
  | "missing-start";

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  /** 1-based physical line the problem was found on, when known. */
  readonly line?: number;
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

/** Console sink -- writes each diagnostic with console.warn / console.error. */
export class ConsoleDiagnosticSink implements DiagnosticSink {
  constructor(private readonly source = "almanac") {}

  report(diagnostic: Diagnostic): void {
    const where = diagnostic.line !== undefined ? ` (line ${diagnostic.line})` : "";
    const text = `${this.source}: [${diagnostic.code}] ${diagnostic.message}${where}`;
    if (diagnostic.severity === "error") {
      console.error(text);
    } else {
      console.warn(text);
    }
  }
}

/**
 * In-memory sink -- accumulates diagnostics in an array.
 * Useful for testing and for callers that inspect problems after a query.
 */
export class MemoryDiagnosticSink implements DiagnosticSink {
  public diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  clear(): void {
    this.diagnostics = [];
  }
}

/** Composite sink -- forwards to every wrapped sink in order. */
export class CompositeDiagnosticSink implements DiagnosticSink {
  constructor(private readonly sinks: readonly DiagnosticSink[]) {}

  report(diagnostic: Diagnostic): void {
    for (const sink of this.sinks) {
      sink.report(diagnostic);
    }
  }
}

/** Drops everything. The default for core APIs. */
export const silentDiagnosticSink: DiagnosticSink = {
  report(): void {},
};
