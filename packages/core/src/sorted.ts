/**
 * @almanac/core -- lazy merging of ascending sequences.
 *
 * Both the occurrence-set resolver (RRULEs + RDATEs + DTSTART) and the
 * timeline (one sequence per component) combine several already sorted,
 * possibly infinite iterables. A small binary heap keyed on each
 * source's current head keeps the merge lazy: nothing is pulled from a
 * source until its previous value has been emitted.
 */

export type Compare<T> = (a: T, b: T) => number;

interface Head<T> {
  readonly value: T;
  readonly source: number;
  readonly iterator: Iterator<T>;
}

// ---------------------------------------------------------------------------
// Heap
// ---------------------------------------------------------------------------

/** Min-heap on (compare, source index); equal values pop in source order. */
class HeadHeap<T> {
  private readonly items: Head<T>[] = [];

  constructor(private readonly compare: Compare<T>) {}

  get size(): number {
    return this.items.length;
  }

  push(head: Head<T>): void {
    const items = this.items;
    items.push(head);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(items[i], items[parent])) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  pop(): Head<T> | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (top === undefined || last === undefined || items.length === 0) return top;

    items[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < items.length && this.less(items[left], items[smallest])) smallest = left;
      if (right < items.length && this.less(items[right], items[smallest])) smallest = right;
      if (smallest === i) break;
      [items[i], items[smallest]] = [items[smallest], items[i]];
      i = smallest;
    }
    return top;
  }

  private less(a: Head<T>, b: Head<T>): boolean {
    const order = this.compare(a.value, b.value);
    return order < 0 || (order === 0 && a.source < b.source);
  }
}

// ---------------------------------------------------------------------------
// Merging
// ---------------------------------------------------------------------------

/**
 * Merge ascending iterables into one ascending sequence. Ties keep the
 * order of `sources`; within one source, its own order.
 */
export function* mergeSorted<T>(sources: readonly Iterable<T>[], compare: Compare<T>): Generator<T, void, undefined> {
  const heap = new HeadHeap(compare);
  const pull = (iterator: Iterator<T>, source: number): void => {
    const next = iterator.next();
    if (!next.done) heap.push({ value: next.value, source, iterator });
  };

  sources.forEach((source, index) => pull(source[Symbol.iterator](), index));

  for (let head = heap.pop(); head; head = heap.pop()) {
    yield head.value;
    pull(head.iterator, head.source);
  }
}

/** Drop values equal (by `compare`) to the one emitted just before. */
export function* dedupeSorted<T>(source: Iterable<T>, compare: Compare<T>): Generator<T, void, undefined> {
  let hasPrevious = false;
  let previous: T | undefined;
  for (const value of source) {
    if (hasPrevious && previous !== undefined && compare(previous, value) === 0) continue;
    hasPrevious = true;
    previous = value;
    yield value;
  }
}

export const ascending: Compare<number> = (a, b) => a - b;
