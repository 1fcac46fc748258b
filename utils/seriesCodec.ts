// Filename: utils/seriesCodec.ts

import { z } from "zod";
import type { Series } from "../core/PriceSource.js";
import { mergeSeries } from "../core/SeriesMerger.js";
import { PersistenceError } from "../core/SeriesStore.js";
import { log, WARN } from "./log.js";

const seriesSchema = z.array(z.tuple([z.number().int().nonnegative(), z.number().finite()]));

/**
 * Decodes a persisted series. Out-of-order or duplicated entries are repaired
 * (first occurrence wins) rather than rejected.
 * @throws PersistenceError if the text is not a JSON array of `[timestamp, price]` pairs
 */
export function parseSeries(text: string, location: string): Series {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : "Unknown error";
    throw new PersistenceError(`Stored series is not valid JSON: ${errorMessage}`, location, text.substring(0, 200));
  }

  const parsed = seriesSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unknown issue";
    throw new PersistenceError(`Stored series has an unexpected shape (${where})`, location, text.substring(0, 200));
  }

  const series = mergeSeries(parsed.data, []);
  if (series.length !== parsed.data.length) {
    log(`Stored series at ${location} had ${parsed.data.length - series.length} duplicate timestamp(s); keeping the first of each`, WARN);
  }
  return series;
}

/** Compact JSON, the exact shape the chart front end reads. */
export function serializeSeries(series: Series): string {
  return JSON.stringify(series);
}
