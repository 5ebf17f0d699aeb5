export type CountEntry = [item: string, count: number];

/**
 * Item -> occurrence count. Iteration follows first-seen order, which the
 * sorted output relies on to break ties.
 *
 * Counts are plain numbers, exact up to Number.MAX_SAFE_INTEGER.
 */
export class FrequencyTable {
  private readonly counts = new Map<string, number>();
  private sum = 0;

  static from(entries: Iterable<CountEntry>): FrequencyTable {
    const table = new FrequencyTable();
    for (const [item, count] of entries) table.add(item, count);
    return table;
  }

  increment(item: string): void {
    this.add(item, 1);
  }

  add(item: string, by: number): void {
    this.counts.set(item, (this.counts.get(item) ?? 0) + by);
    this.sum += by;
  }

  get(item: string): number {
    return this.counts.get(item) ?? 0;
  }

  has(item: string): boolean {
    return this.counts.has(item);
  }

  get size(): number {
    return this.counts.size;
  }

  /** Sum of all counts. */
  get total(): number {
    return this.sum;
  }

  *entries(): IterableIterator<CountEntry> {
    for (const [item, count] of this.counts) yield [item, count];
  }

  [Symbol.iterator](): IterableIterator<CountEntry> {
    return this.entries();
  }
}

export function countItems(items: Iterable<string>): FrequencyTable {
  const table = new FrequencyTable();
  for (const item of items) table.increment(item);
  return table;
}
