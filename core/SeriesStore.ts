// Filename: core/SeriesStore.ts

import { log, WARN } from "../utils/log.js";
import type { Series } from "./PriceSource.js";

const LOG_EMOJI = "💾";

/**
 * Raised when no usable series exists at the storage location (missing or corrupt).
 * Callers treat it as "no prior data"; any other storage error is fatal.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public location: string,
    public details?: string
  ) {
    super(message);
    this.name = "PersistenceError";
  }
}

/**
 * Abstract persistence for a single series. Implementations read and write the
 * JSON array of `[timestamp_seconds, price]` pairs.
 */
export interface SeriesStore {
  /** Location shown in logs (file path, blob prefix). */
  describe(): string;
  /** @throws PersistenceError when the series is missing or unreadable */
  load(): Promise<Series>;
  /** Replaces the stored series in a single write. */
  save(series: Series): Promise<void>;
}

/**
 * Loads the stored series, downgrading a PersistenceError to an empty series.
 */
export async function loadSeriesOrEmpty(store: SeriesStore): Promise<Series> {
  try {
    return await store.load();
  } catch (error) {
    if (error instanceof PersistenceError) {
      log(`${LOG_EMOJI} No usable series at ${error.location} (${error.message}); starting from an empty series`, WARN);
      return [];
    }
    throw error;
  }
}
