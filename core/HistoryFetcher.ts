// Filename: core/HistoryFetcher.ts

import { ConfigError } from "../config/loadRunConfig.js";
import { log, LOG, TMI, WARN } from "../utils/log.js";
import { nowInSeconds, SECONDS_PER_DAY, toIsoDate } from "../utils/timestamps.js";
import { sleep as defaultSleep } from "../utils/timeout.js";
import type { Cursor, FetchBatch, PriceSource } from "./PriceSource.js";

// History Fetcher specific emoji
const LOG_EMOJI = "📡";

type BeforeCursor = Extract<Cursor, { kind: "before" }>;

export interface FetchHistoryOptions {
  /** Pause between successive backfill requests. */
  ratePauseMs: number;
  /** Upper bound on backfill requests in one run. */
  maxBackfillPages: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Moves `since` forward so the requested window fits the source's maximum.
 */
export function clampSince(since: number, now: number, maxWindowDays: number): number {
  const earliest = now - maxWindowDays * SECONDS_PER_DAY;
  return since < earliest ? earliest : since;
}

/**
 * Fetches everything the cursor asks for.
 * A `since` cursor issues one request; a `before` cursor pages backward until the
 * source returns an empty page, the cursor stops moving, or the page cap is hit.
 * Any failure propagates and the batches gathered so far are dropped with it.
 */
export async function fetchHistory(
  source: PriceSource,
  cursor: Cursor,
  options: FetchHistoryOptions
): Promise<FetchBatch[]> {
  if (cursor.kind === "since") {
    return [await fetchIncremental(source, cursor.since, options)];
  }
  return fetchBackfill(source, cursor, options);
}

async function fetchIncremental(
  source: PriceSource,
  since: number,
  options: FetchHistoryOptions
): Promise<FetchBatch> {
  const now = (options.now ?? nowInSeconds)();
  const { maxWindowDays } = source.capabilities;
  const effectiveSince = clampSince(since, now, maxWindowDays);

  if (effectiveSince > since) {
    log(
      `${LOG_EMOJI} Requested start ${toIsoDate(since)} is outside the ${maxWindowDays}-day window ${source.name} serves; requesting from ${toIsoDate(effectiveSince)}`,
      WARN
    );
  }

  log(`${LOG_EMOJI} Top-up: requesting ${source.asset} prices newer than ${toIsoDate(effectiveSince)}`, LOG);
  const batch = await source.fetchBatch({ kind: "since", since: effectiveSince });
  const observations = batch.observations.filter(([timestamp]) => timestamp > effectiveSince);

  if (observations.length < batch.observations.length) {
    log(`${LOG_EMOJI} Dropped ${batch.observations.length - observations.length} point(s) not newer than the cursor`, TMI);
  }
  return { observations, next: null };
}

async function fetchBackfill(
  source: PriceSource,
  start: BeforeCursor,
  options: FetchHistoryOptions
): Promise<FetchBatch[]> {
  if (!source.capabilities.backfill) {
    throw new ConfigError(`Source '${source.name}' cannot page backward through history`);
  }

  const sleep = options.sleep ?? defaultSleep;
  const batches: FetchBatch[] = [];
  let cursor = start;

  for (let page = 1; page <= options.maxBackfillPages; page++) {
    if (page > 1) {
      await sleep(options.ratePauseMs);
    }

    const batch = await source.fetchBatch(cursor);
    if (batch.observations.length === 0) {
      log(`${LOG_EMOJI} Backfill: page ${page} was empty, history exhausted`, LOG);
      return batches;
    }

    batches.push(batch);
    const next = batch.next;
    log(
      `${LOG_EMOJI} Backfill: page ${page} returned ${batch.observations.length} points` +
        (next?.kind === "before" && next.before !== null ? ` (continuing before ${toIsoDate(next.before + 1)})` : ""),
      LOG
    );

    if (next === null || next.kind !== "before") {
      return batches;
    }
    if (next.before === null || (cursor.before !== null && next.before >= cursor.before)) {
      log(`${LOG_EMOJI} Backfill: cursor did not move backward after page ${page}; stopping`, WARN);
      return batches;
    }
    cursor = next;
  }

  log(`${LOG_EMOJI} Backfill: stopped at the ${options.maxBackfillPages}-page limit; older history was not requested`, WARN);
  return batches;
}
