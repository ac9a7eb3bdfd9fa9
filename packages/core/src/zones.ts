/**
 * @almanac/core -- zone resolution.
 *
 * The core never looks up a timezone database itself. It consumes a
 * ZoneResolver ("what is the UTC offset of zone X at instant T") and
 * uses it to move between wall time and absolute instants.
 *
 * Supplied resolvers:
 * - intlZoneResolver: IANA zones through Intl.DateTimeFormat
 * - fixedOffsetResolver: a static zone -> offset table
 * - chainZoneResolvers: first resolver that knows the zone wins
 * (vtimezone.ts builds one from a calendar's own VTIMEZONE blocks)
 */

import { MS_PER_MINUTE, MS_PER_SECOND, startOfDay, wallFromParts, type TimeValue } from "./time";

export interface ZoneResolver {
  /**
   * Offset of `zoneId` from UTC at `instant`, in minutes east of UTC
   * (Europe/Paris in winter: 60). `undefined` when the zone is unknown.
   */
  offsetAt(zoneId: string, instant: number): number | undefined;
}

/** Knows no zones: every named zone is read as floating. */
export const nullZoneResolver: ZoneResolver = {
  offsetAt(): number | undefined {
    return undefined;
  },
};

// ---------------------------------------------------------------------------
// Wall <-> instant
// ---------------------------------------------------------------------------

/**
 * Convert a wall reading in `zoneId` to an absolute instant.
 *
 * Guess with the offset at the wall time read as UTC, then correct once
 * with the offset at the guessed instant. A wall time inside a DST gap
 * or overlap resolves to whichever reading the second lookup lands on.
 */
export function wallToInstant(wall: number, zoneId: string, resolver: ZoneResolver): number | undefined {
  const first = resolver.offsetAt(zoneId, wall);
  if (first === undefined) return undefined;

  const guess = wall - first * MS_PER_MINUTE;
  const second = resolver.offsetAt(zoneId, guess);
  if (second === undefined || second === first) return guess;
  return wall - second * MS_PER_MINUTE;
}

/** Wall reading of `instant` in `zoneId`, or undefined for an unknown zone. */
export function instantToWall(instant: number, zoneId: string, resolver: ZoneResolver): number | undefined {
  const offset = resolver.offsetAt(zoneId, instant);
  if (offset === undefined) return undefined;
  return instant + offset * MS_PER_MINUTE;
}

export interface InstantOptions {
  readonly resolver?: ZoneResolver;
  /** Zone floating values and dates are read in. Without one they are read as UTC. */
  readonly floatingZone?: string;
}

function floatingToInstant(wall: number, options: InstantOptions): number {
  if (options.floatingZone && options.resolver) {
    return wallToInstant(wall, options.floatingZone, options.resolver) ?? wall;
  }
  return wall;
}

/**
 * Absolute instant (ms since the epoch) of a DATE or DATE-TIME value.
 * A TZID the resolver does not know is read as floating.
 */
export function toInstant(value: TimeValue, options: InstantOptions = {}): number {
  if (value.kind === "date") {
    return floatingToInstant(value.wall, options);
  }
  switch (value.zone.type) {
    case "utc":
      return value.wall;
    case "floating":
      return floatingToInstant(value.wall, options);
    case "tzid": {
      const instant = options.resolver
        ? wallToInstant(value.wall, value.zone.tzid, options.resolver)
        : undefined;
      return instant ?? floatingToInstant(value.wall, options);
    }
  }
}

/**
 * Wall reading of `instant` in the frame of `template` (its zone, or
 * the floating zone for floating values and dates). Dates are truncated
 * to midnight.
 */
export function wallInFrameOf(template: TimeValue, instant: number, options: InstantOptions = {}): number {
  const floating = (): number => {
    if (options.floatingZone && options.resolver) {
      return instantToWall(instant, options.floatingZone, options.resolver) ?? instant;
    }
    return instant;
  };

  if (template.kind === "date") {
    return startOfDay(floating());
  }
  switch (template.zone.type) {
    case "utc":
      return instant;
    case "floating":
      return floating();
    case "tzid": {
      const wall = options.resolver
        ? instantToWall(instant, template.zone.tzid, options.resolver)
        : undefined;
      return wall ?? floating();
    }
  }
}

// ---------------------------------------------------------------------------
// Resolvers
// ---------------------------------------------------------------------------

/**
 * IANA zones via Intl.DateTimeFormat. Formatters are cached per zone;
 * a zone the runtime rejects is remembered as unknown.
 */
export function intlZoneResolver(): ZoneResolver {
  const formatters = new Map<string, Intl.DateTimeFormat | null>();

  const formatterFor = (zoneId: string): Intl.DateTimeFormat | null => {
    const cached = formatters.get(zoneId);
    if (cached !== undefined) return cached;

    let formatter: Intl.DateTimeFormat | null;
    try {
      formatter = new Intl.DateTimeFormat("en-US", {
        timeZone: zoneId,
        hourCycle: "h23",
        year: "numeric",
        month: "numeric",
        day: "numeric",
        hour: "numeric",
        minute: "numeric",
        second: "numeric",
      });
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      formatter = null;
    }
    formatters.set(zoneId, formatter);
    return formatter;
  };

  return {
    offsetAt(zoneId: string, instant: number): number | undefined {
      const formatter = formatterFor(zoneId);
      if (!formatter) return undefined;

      const fields: Record<string, number> = {};
      for (const part of formatter.formatToParts(new Date(instant))) {
        if (part.type !== "literal") {
          fields[part.type] = parseInt(part.value, 10);
        }
      }
      // Some runtimes still render midnight as hour 24.
      const hour = fields["hour"] === 24 ? 0 : (fields["hour"] ?? 0);
      const wall = wallFromParts(
        fields["year"] ?? 1970,
        fields["month"] ?? 1,
        fields["day"] ?? 1,
        hour,
        fields["minute"] ?? 0,
        fields["second"] ?? 0,
      );
      const wholeSeconds = Math.floor(instant / MS_PER_SECOND) * MS_PER_SECOND;
      return Math.round((wall - wholeSeconds) / MS_PER_MINUTE);
    },
  };
}

/** Static offsets, e.g. `{ "Asia/Kolkata": 330 }`. */
export function fixedOffsetResolver(offsets: Readonly<Record<string, number>>): ZoneResolver {
  const table = new Map(Object.entries(offsets));
  return {
    offsetAt(zoneId: string): number | undefined {
      return table.get(zoneId);
    },
  };
}

/** Ask each resolver in turn; the first one that knows the zone answers. */
export function chainZoneResolvers(...resolvers: readonly ZoneResolver[]): ZoneResolver {
  return {
    offsetAt(zoneId: string, instant: number): number | undefined {
      for (const resolver of resolvers) {
        const offset = resolver.offsetAt(zoneId, instant);
        if (offset !== undefined) return offset;
      }
      return undefined;
    },
  };
}
