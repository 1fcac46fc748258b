// Filename: core/HistoryUpdater.ts

import type { RunConfig } from "../config/loadRunConfig.js";
import { log, INFO, LOG } from "../utils/log.js";
import { nowInSeconds, SECONDS_PER_DAY, toIsoDate } from "../utils/timestamps.js";
import { fetchHistory } from "./HistoryFetcher.js";
import type { Cursor, PriceSource, Series } from "./PriceSource.js";
import { mergeSeries, summarizeMerge } from "./SeriesMerger.js";
import { loadSeriesOrEmpty, type SeriesStore } from "./SeriesStore.js";

// History Updater specific emoji
const LOG_EMOJI = "🔄";

export interface HistoryUpdateDeps {
  source: PriceSource;
  store: SeriesStore;
  config: Pick<RunConfig, "ratePauseMs" | "maxBackfillPages" | "fullHistoryDays">;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunSummary {
  existing: number;
  fetched: number;
  added: number;
  total: number;
  firstTimestamp: number | null;
  lastTimestamp: number | null;
  /** False when nothing new arrived and the store was left as is. */
  saved: boolean;
}

/**
 * Where the run starts: after the newest stored point, or a full-history
 * request when the series is empty (backward pagination if the source supports
 * it, otherwise a `since` cursor `fullHistoryDays` back).
 */
export function initialCursor(
  series: Series,
  source: PriceSource,
  fullHistoryDays: number,
  now: number
): Cursor {
  const last = series[series.length - 1];
  if (last) {
    return { kind: "since", since: last[0] };
  }
  if (source.capabilities.backfill) {
    return { kind: "before", before: null };
  }
  return { kind: "since", since: now - fullHistoryDays * SECONDS_PER_DAY };
}

/**
 * One complete update: load, fetch, merge, save.
 * The store is written at most once, after every fetch has succeeded.
 */
export async function runHistoryUpdate(deps: HistoryUpdateDeps): Promise<RunSummary> {
  const { source, store, config } = deps;
  const now = deps.now ?? nowInSeconds;

  const existing = await loadSeriesOrEmpty(store);
  const cursor = initialCursor(existing, source, config.fullHistoryDays, now());

  if (cursor.kind === "before") {
    log(`${LOG_EMOJI} No stored series at ${store.describe()}; backfilling full ${source.asset} history from ${source.name}`, LOG);
  } else if (existing.length === 0) {
    log(`${LOG_EMOJI} No stored series at ${store.describe()}; fetching ${config.fullHistoryDays} days of ${source.asset} history from ${source.name}`, LOG);
  } else {
    log(`${LOG_EMOJI} Stored series has ${existing.length} points through ${toIsoDate(cursor.since)}; topping up from ${source.name}`, LOG);
  }

  const batches = await fetchHistory(source, cursor, {
    ratePauseMs: config.ratePauseMs,
    maxBackfillPages: config.maxBackfillPages,
    now,
    sleep: deps.sleep,
  });

  const merged = mergeSeries(existing, batches);
  const { fetched, added, total } = summarizeMerge(existing, batches, merged);
  const first = merged[0];
  const last = merged[merged.length - 1];

  const summary: RunSummary = {
    existing: existing.length,
    fetched,
    added,
    total,
    firstTimestamp: first ? first[0] : null,
    lastTimestamp: last ? last[0] : null,
    saved: false,
  };

  if (added === 0) {
    log(`${LOG_EMOJI} No new points (${fetched} fetched); leaving ${store.describe()} unchanged`, INFO);
    return summary;
  }

  await store.save(merged);
  log(`${LOG_EMOJI} Saved ${total} points (+${added}) to ${store.describe()}`, LOG);
  return { ...summary, saved: true };
}
