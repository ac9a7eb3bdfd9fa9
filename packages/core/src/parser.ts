/**
 * @almanac/core -- document parser (tree builder).
 *
 * Consumes tokenized content lines and builds the component tree:
 * BEGIN pushes a component onto the stack as a child of the current top,
 * END pops it, any other line becomes a property of the top component.
 *
 * Parsing is permissive. Nothing in the input makes parse() throw;
 * problems become diagnostics next to a best-effort tree:
 * - malformed line           -> skipped, "malformed-line"
 * - END for a deeper BEGIN   -> intervening components closed, "unterminated-component" each
 * - END with no open BEGIN   -> ignored, "orphan-end"
 * - property outside a block -> ignored, "content-outside-component"
 * - top level not VCALENDAR  -> wrapped in a synthetic VCALENDAR, "missing-calendar"
 * - nothing parsed at all    -> empty synthetic VCALENDAR, "empty-document"
 * - input ends inside blocks -> blocks closed, "unterminated-component" each
 */

import { ComponentArena, componentKindFor, componentName, type Component, type ComponentKind } from "./component";
import type { Diagnostic, DiagnosticSink } from "./diagnostics";
import { tokenizeLines, unfoldLines } from "./lexer";
import { Property } from "./property";

export interface ParseResult {
  /** The first top-level VCALENDAR (synthetic when the input had none). */
  readonly root: Component;
  /** Every top-level VCALENDAR, in document order. */
  readonly calendars: readonly Component[];
  readonly diagnostics: readonly Diagnostic[];
  readonly arena: ComponentArena;
}

export interface ParseOptions {
  /** Also forward each diagnostic here as it is found. */
  readonly diagnostics?: DiagnosticSink;
}

interface OpenComponent {
  readonly component: Component;
  readonly line: number;
}

/**
 * Parse calendar text into a component tree plus diagnostics.
 *
 * @param text - Raw iCalendar text (one or more VCALENDAR documents)
 */
export function parse(text: string, options: ParseOptions = {}): ParseResult {
  const arena = new ComponentArena();
  const diagnostics: Diagnostic[] = [];
  const calendars: Component[] = [];
  const stack: OpenComponent[] = [];
  let synthetic: Component | null = null;

  const report = (diagnostic: Diagnostic): void => {
    diagnostics.push(diagnostic);
    options.diagnostics?.report(diagnostic);
  };

  const syntheticRoot = (line: number): Component => {
    if (!synthetic) {
      synthetic = arena.create({ tag: "calendar" });
      calendars.push(synthetic);
      report({
        severity: "warning",
        code: "missing-calendar",
        message: "content found outside a VCALENDAR; wrapped in a synthetic calendar",
        line,
      });
    }
    return synthetic;
  };

  const close = (open: OpenComponent, reason: string, line: number): void => {
    report({
      severity: "warning",
      code: "unterminated-component",
      message: `${open.component.name} begun on line ${open.line} was never ended (${reason})`,
      line,
    });
  };

  for (const token of tokenizeLines(unfoldLines(text))) {
    if (!token.ok) {
      report({
        severity: "warning",
        code: "malformed-line",
        message: `skipped malformed line: ${token.reason}`,
        line: token.lineNumber,
      });
      continue;
    }

    const { line } = token;

    if (line.name === "BEGIN") {
      const kind = componentKindFor(line.value);
      let parent: Component | null = stack.length > 0 ? stack[stack.length - 1].component : null;
      if (!parent && kind.tag !== "calendar") {
        parent = syntheticRoot(line.lineNumber);
      }
      const component = arena.create(kind, parent);
      if (!parent) calendars.push(component);
      stack.push({ component, line: line.lineNumber });
      continue;
    }

    if (line.name === "END") {
      const name = componentKindFor(line.value);
      let depth = stack.length - 1;
      while (depth >= 0 && !sameKind(stack[depth].component, name)) depth--;

      if (depth < 0) {
        report({
          severity: "warning",
          code: "orphan-end",
          message: `END:${line.value.trim().toUpperCase()} has no matching BEGIN`,
          line: line.lineNumber,
        });
        continue;
      }
      while (stack.length - 1 > depth) {
        const open = stack.pop();
        if (open) close(open, `closed by END:${line.value.trim().toUpperCase()}`, line.lineNumber);
      }
      stack.pop();
      continue;
    }

    const top = stack[stack.length - 1];
    if (!top) {
      report({
        severity: "warning",
        code: "content-outside-component",
        message: `${line.name} property outside any component was ignored`,
        line: line.lineNumber,
      });
      continue;
    }
    top.component.appendProperty(new Property(line.name, line.params, line.value, line.lineNumber));
  }

  for (let open = stack.pop(); open; open = stack.pop()) {
    close(open, "end of input", open.line);
  }

  if (calendars.length === 0) {
    report({
      severity: "warning",
      code: "empty-document",
      message: "no components found",
    });
    calendars.push(arena.create({ tag: "calendar" }));
  }

  return { root: calendars[0], calendars, diagnostics, arena };
}

function sameKind(component: Component, kind: ComponentKind): boolean {
  return component.name === componentName(kind);
}
