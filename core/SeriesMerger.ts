// Filename: core/SeriesMerger.ts

import type { FetchBatch, Observation, Series } from "./PriceSource.js";

/**
 * Combines the persisted series with freshly fetched batches.
 *
 * The union is keyed by timestamp. On a collision the existing entry wins, and
 * within the incoming batches the first occurrence wins. The result is sorted
 * ascending. Pure: neither input is mutated, so merging the same batches twice
 * gives the same series as merging once.
 */
export function mergeSeries(existing: readonly Observation[], incoming: readonly FetchBatch[]): Series {
  const byTimestamp = new Map<number, number>();

  for (const [timestamp, price] of existing) {
    if (!byTimestamp.has(timestamp)) {
      byTimestamp.set(timestamp, price);
    }
  }

  for (const batch of incoming) {
    for (const [timestamp, price] of batch.observations) {
      if (!byTimestamp.has(timestamp)) {
        byTimestamp.set(timestamp, price);
      }
    }
  }

  const merged: Series = [];
  for (const [timestamp, price] of byTimestamp) {
    merged.push([timestamp, price]);
  }
  return merged.sort((a, b) => a[0] - b[0]);
}

export interface MergeSummary {
  /** Observations received across all batches, duplicates included. */
  fetched: number;
  /** Entries in the merged series that were not in the existing one. */
  added: number;
  total: number;
}

export function summarizeMerge(
  existing: readonly Observation[],
  incoming: readonly FetchBatch[],
  merged: Series
): MergeSummary {
  const known = new Set(existing.map(([timestamp]) => timestamp));
  return {
    fetched: incoming.reduce((count, batch) => count + batch.observations.length, 0),
    added: merged.filter(([timestamp]) => !known.has(timestamp)).length,
    total: merged.length,
  };
}
