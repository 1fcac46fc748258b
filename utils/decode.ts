// Filename: utils/decode.ts

import { z } from "zod";
import type { Observation } from "../core/PriceSource.js";
import { FetchFailure } from "./httpClient.js";
import { log, ERR } from "./log.js";
import { toEpochSeconds } from "./timestamps.js";

/**
 * Validates an upstream JSON body against the expected shape.
 * @throws FetchFailure (`decode`) carrying the offending body
 */
export function decodeResponse<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  url: string,
  context: string
): z.infer<S> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unknown issue";
  const body = JSON.stringify(data) ?? String(data);
  log(`[${context}] ❌ Unexpected data format (${where}): ${body.substring(0, 200)}`, ERR);
  throw new FetchFailure("decode", `${context} returned an unexpected data format (${where})`, url, 0, body);
}

/**
 * Converts one raw upstream point into an Observation.
 * @throws FetchFailure (`decode`) when the timestamp or price is unreadable
 */
export function toObservation(
  rawTimestamp: number | string,
  rawPrice: number | string,
  url: string,
  context: string
): Observation {
  const timestamp = toEpochSeconds(rawTimestamp);
  // Number("") is 0, so blank strings are rejected explicitly
  const price = typeof rawPrice === "string"
    ? (rawPrice.trim() === "" ? Number.NaN : Number(rawPrice))
    : rawPrice;

  if (timestamp === null || !Number.isFinite(price)) {
    const point = JSON.stringify([rawTimestamp, rawPrice]);
    throw new FetchFailure("decode", `${context} returned an unreadable price point ${point}`, url, 0, point);
  }
  return [timestamp, price];
}
