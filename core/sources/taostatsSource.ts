// Filename: core/sources/taostatsSource.ts

import { z } from "zod";
import { TAOSTATS_BASE_URL } from "../../constants/api.js";
import { fetchJson } from "../../utils/httpClient.js";
import { decodeResponse, toObservation } from "../../utils/decode.js";
import { log, LOG, TMI } from "../../utils/log.js";
import { nextBeforeCursor } from "../PriceSource.js";
import type { Cursor, FetchBatch, PriceSource, SourceOptions } from "../PriceSource.js";

const LOG_EMOJI = "τ";
const CONTEXT = "Taostats API";

const priceHistorySchema = z.object({
  data: z.array(
    z.object({
      created_at: z.string(),
      price: z.union([z.string(), z.number()]),
    })
  ),
});

/**
 * Taostats `/price/history/v1`, daily frequency.
 * Authenticated with the raw key in the `Authorization` header.
 * `before` cursors page newest-first through `timestamp_end`; `since` cursors
 * read oldest-first from `timestamp_start`.
 */
export function createTaostatsSource(options: SourceOptions): PriceSource {
  const { pageSize } = options.capabilities;

  async function fetchBatch(cursor: Cursor): Promise<FetchBatch> {
    const params = new URLSearchParams({
      asset: options.asset,
      frequency: "by_day",
      limit: String(pageSize),
    });

    if (cursor.kind === "before") {
      params.set("order", "timestamp_desc");
      if (cursor.before !== null) {
        params.set("timestamp_end", String(cursor.before));
      }
    } else {
      params.set("order", "timestamp_asc");
      params.set("timestamp_start", String(cursor.since + 1));
    }

    const headers: Record<string, string> = {};
    if (options.apiKey) {
      headers["Authorization"] = options.apiKey;
    }

    const url = `${TAOSTATS_BASE_URL}/price/history/v1?${params.toString()}`;
    log(`${LOG_EMOJI} Taostats: fetching page (${cursor.kind})`, TMI);
    const body = await fetchJson(url, { context: CONTEXT, headers, timeoutMs: options.timeoutMs });
    const { data } = decodeResponse(priceHistorySchema, body, url, CONTEXT);

    const observations = data.map((entry) => toObservation(entry.created_at, entry.price, url, CONTEXT));
    log(`${LOG_EMOJI} Taostats: received ${observations.length} price points`, LOG);

    return {
      observations,
      next: cursor.kind === "before" ? nextBeforeCursor(observations) : null,
    };
  }

  return {
    name: "taostats",
    asset: options.asset,
    capabilities: options.capabilities,
    fetchBatch,
  };
}
