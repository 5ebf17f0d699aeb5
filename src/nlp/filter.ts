import { FrequencyTable } from "./frequency";

/**
 * Keeps entries whose count is at least `min`. A threshold of 0 or 1
 * (or none) cannot drop anything, so the table comes back as is.
 */
export function filterByMinCount(table: FrequencyTable, min?: number): FrequencyTable {
  if (min === undefined || min <= 1) return table;

  const kept = new FrequencyTable();
  for (const [item, count] of table.entries()) {
    if (count >= min) kept.add(item, count);
  }
  return kept;
}
