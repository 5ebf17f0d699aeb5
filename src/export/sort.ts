import type { FrequencyTable } from "../nlp/frequency";

export type SortedCount = {
  item: string;
  count: number;
};

export type TieBreak = "first-seen" | "lexical";

function compareCodePoints(a: string, b: string): number {
  const ca = Array.from(a);
  const cb = Array.from(b);
  const len = Math.min(ca.length, cb.length);
  for (let i = 0; i < len; i++) {
    const d = (ca[i].codePointAt(0) ?? 0) - (cb[i].codePointAt(0) ?? 0);
    if (d !== 0) return d;
  }
  return ca.length - cb.length;
}

/**
 * Count descending. Array#sort is stable, so with "first-seen" equal counts
 * keep the table's insertion order.
 */
export function sortCounts(table: FrequencyTable, tieBreak: TieBreak = "first-seen"): SortedCount[] {
  const rows: SortedCount[] = Array.from(table.entries(), ([item, count]) => ({ item, count }));
  return rows.sort((a, b) => {
    if (b.count !== a.count) return b.count - a.count;
    if (tieBreak === "lexical") return compareCodePoints(a.item, b.item);
    return 0;
  });
}
