/**
 * @almanac/core -- property parameters (`;TZID=Europe/Paris;MEMBER="a","b"`).
 *
 * Names are case-insensitive and stored upper-cased. Each parameter holds
 * its ordered list of values; most parameters have exactly one.
 */
export class ParameterMap implements Iterable<[string, readonly string[]]> {
  private readonly entries = new Map<string, readonly string[]>();

  constructor(init?: Iterable<readonly [string, readonly string[]]>) {
    if (init) {
      for (const [name, values] of init) {
        this.set(name, values);
      }
    }
  }

  /** Replaces any earlier values for the same name. */
  set(name: string, values: readonly string[]): void {
    this.entries.set(name.toUpperCase(), [...values]);
  }

  has(name: string): boolean {
    return this.entries.has(name.toUpperCase());
  }

  /** First value of the parameter, or undefined. */
  get(name: string): string | undefined {
    return this.entries.get(name.toUpperCase())?.[0];
  }

  getAll(name: string): readonly string[] {
    return this.entries.get(name.toUpperCase()) ?? [];
  }

  get size(): number {
    return this.entries.size;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  toRecord(): Record<string, readonly string[]> {
    return Object.fromEntries(this.entries);
  }

  [Symbol.iterator](): Iterator<[string, readonly string[]]> {
    return this.entries.entries();
  }
}
