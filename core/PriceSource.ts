// Filename: core/PriceSource.ts

import type { SourceName } from "../constants/SourceNames.js";

/** A single price point: integer epoch seconds and a finite price. */
export type Observation = [timestampSeconds: number, price: number];

/** Ascending by timestamp, no two entries share a timestamp. */
export type Series = Observation[];

/**
 * Position in an upstream source's history.
 * - `since`: request only points strictly newer than this timestamp.
 * - `before`: request the newest page ending before this timestamp (null = now).
 */
export type Cursor =
  | { kind: "since"; since: number }
  | { kind: "before"; before: number | null };

/** One upstream response, normalized. `next` is null when nothing more should be requested. */
export interface FetchBatch {
  observations: Observation[];
  next: Cursor | null;
}

export interface SourceCapabilities {
  /** Whether the source accepts `before` cursors and can page backward through history. */
  backfill: boolean;
  /** Largest window the source serves for a `since` request. */
  maxWindowDays: number;
  /** Number of points requested per page. */
  pageSize: number;
}

/**
 * Interface implemented once per upstream API.
 * Implementations normalize timestamps and decode the vendor shape; they never
 * retry and never touch persisted state.
 */
export interface PriceSource {
  readonly name: SourceName;
  readonly asset: string;
  readonly capabilities: SourceCapabilities;
  fetchBatch(cursor: Cursor): Promise<FetchBatch>;
}

/**
 * Cursor for the next backward page: one second before the oldest point received,
 * or null when the page was empty and history is exhausted.
 */
export function nextBeforeCursor(observations: readonly Observation[]): Cursor | null {
  if (observations.length === 0) {
    return null;
  }
  let oldest = observations[0][0];
  for (const [timestamp] of observations) {
    if (timestamp < oldest) {
      oldest = timestamp;
    }
  }
  return { kind: "before", before: oldest - 1 };
}

/** Construction options shared by every source implementation. */
export interface SourceOptions {
  asset: string;
  vsCurrency: string;
  apiKey?: string;
  timeoutMs: number;
  capabilities: SourceCapabilities;
  /** Clock in epoch seconds; injectable for tests. */
  now?: () => number;
}
