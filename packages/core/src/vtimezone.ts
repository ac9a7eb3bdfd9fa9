/**
 * @almanac/core -- zone resolver built from a calendar's VTIMEZONE blocks.
 *
 * Each STANDARD/DAYLIGHT observance names a local DTSTART (read in the
 * offset in force before it, TZOFFSETFROM), the offset it switches to
 * (TZOFFSETTO) and optionally an RRULE/RDATEs repeating the switch.
 * The offset at an instant is the TZOFFSETTO of the latest transition at
 * or before it; before the first transition, that transition's
 * TZOFFSETFROM applies.
 *
 * Transitions are expanded with the core evaluator on demand and cached
 * per zone up to a horizon that grows as later instants are asked for.
 */

import type { Component } from "./component";
import { silentDiagnosticSink, type DiagnosticSink } from "./diagnostics";
import { PropertyConversionError } from "./errors";
import { expandRule } from "./recurrence/evaluator";
import { MS_PER_DAY, MS_PER_MINUTE, type TimeValue } from "./time";
import { isTimeValue } from "./values";
import type { ZoneResolver } from "./zones";

interface Observance {
  readonly start: TimeValue;
  readonly offsetFrom: number;
  readonly offsetTo: number;
  readonly component: Component;
}

interface Transition {
  /** Absolute instant of the switch. */
  readonly at: number;
  readonly offsetFrom: number;
  readonly offsetTo: number;
}

interface ZoneTable {
  readonly observances: readonly Observance[];
  transitions: Transition[];
  /** Transitions are complete up to this instant. */
  horizon: number;
}

/** How far past the requested instant a cache refill reaches. */
const HORIZON_STEP = 400 * MS_PER_DAY;

export interface VTimezoneResolverOptions {
  readonly diagnostics?: DiagnosticSink;
}

/**
 * A ZoneResolver answering for every TZID defined by a VTIMEZONE anywhere
 * under `root` (a calendar, or any component containing them).
 */
export function vtimezoneResolver(root: Component, options: VTimezoneResolverOptions = {}): ZoneResolver {
  const diagnostics = options.diagnostics ?? silentDiagnosticSink;
  const zones = new Map<string, ZoneTable>();

  const candidates = root.tag === "timezone" ? [root] : [...root.descendants()].filter((c) => c.tag === "timezone");
  for (const timezone of candidates) {
    const tzid = timezone.property("TZID")?.raw.trim();
    if (!tzid || zones.has(tzid)) continue;
    const observances = timezone
      .childrenOfType("timezone-rule")
      .flatMap((component) => readObservance(component, diagnostics) ?? []);
    if (observances.length > 0) {
      zones.set(tzid, { observances, transitions: [], horizon: Number.NEGATIVE_INFINITY });
    }
  }

  return {
    offsetAt(zoneId: string, instant: number): number | undefined {
      const table = zones.get(zoneId);
      if (!table) return undefined;
      if (instant > table.horizon) {
        table.horizon = instant + HORIZON_STEP;
        table.transitions = expandTransitions(table.observances, table.horizon, diagnostics);
      }
      return offsetIn(table.transitions, instant);
    },
  };
}

function readObservance(component: Component, diagnostics: DiagnosticSink): Observance | undefined {
  try {
    const start = component.start();
    const from = component.property("TZOFFSETFROM")?.typed();
    const to = component.property("TZOFFSETTO")?.typed();
    if (!start || from?.kind !== "utc-offset" || to?.kind !== "utc-offset") return undefined;
    return { start, offsetFrom: from.minutes, offsetTo: to.minutes, component };
  } catch (err) {
    if (!(err instanceof PropertyConversionError)) throw err;
    diagnostics.report({
      severity: "warning",
      code: "invalid-property",
      message: `${component.name} observance ignored: ${err.message}`,
    });
    return undefined;
  }
}

/** Every transition up to `horizon`, ascending. */
function expandTransitions(
  observances: readonly Observance[],
  horizon: number,
  diagnostics: DiagnosticSink,
): Transition[] {
  const transitions: Transition[] = [];

  for (const observance of observances) {
    const shift = observance.offsetFrom * MS_PER_MINUTE;
    const push = (wall: number): void => {
      transitions.push({ at: wall - shift, offsetFrom: observance.offsetFrom, offsetTo: observance.offsetTo });
    };
    const wallHorizon = horizon + shift;

    push(observance.start.wall);

    for (const property of observance.component.properties) {
      try {
        if (property.name === "RRULE") {
          const rule = property.typed();
          if (rule.kind !== "recur") continue;
          // UNTIL is given in UTC; move it to local time before the offset changes.
          const until = rule.until?.kind === "date-time" && rule.until.zone.type === "utc" ? rule.until.wall + shift : undefined;
          for (const wall of expandRule(rule, observance.start.wall, { windowEnd: wallHorizon, until })) {
            if (wall > wallHorizon) break;
            push(wall);
          }
        } else if (property.name === "RDATE") {
          const value = property.typed();
          if (value.kind !== "time-list") continue;
          for (const item of value.values) push(isTimeValue(item) ? item.wall : item.start.wall);
        }
      } catch (err) {
        if (!(err instanceof PropertyConversionError)) throw err;
        diagnostics.report({
          severity: "warning",
          code: "invalid-recurrence",
          message: `${observance.component.name} ${property.name} ignored: ${err.message}`,
          line: property.lineNumber > 0 ? property.lineNumber : undefined,
        });
      }
    }
  }

  return transitions.sort((a, b) => a.at - b.at);
}

function offsetIn(transitions: readonly Transition[], instant: number): number | undefined {
  const first = transitions[0];
  if (!first) return undefined;
  if (instant < first.at) return first.offsetFrom;

  // Latest transition at or before the instant.
  let lo = 0;
  let hi = transitions.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (transitions[mid].at <= instant) lo = mid;
    else hi = mid - 1;
  }
  return transitions[lo].offsetTo;
}
