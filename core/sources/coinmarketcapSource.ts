// Filename: core/sources/coinmarketcapSource.ts

import { z } from "zod";
import { COINMARKETCAP_BASE_URL } from "../../constants/api.js";
import { FetchFailure, fetchJson } from "../../utils/httpClient.js";
import { decodeResponse, toObservation } from "../../utils/decode.js";
import { log, LOG } from "../../utils/log.js";
import { nowInSeconds, SECONDS_PER_DAY } from "../../utils/timestamps.js";
import type { Cursor, FetchBatch, PriceSource, SourceOptions } from "../PriceSource.js";

const LOG_EMOJI = "Ⓜ️";
const CONTEXT = "CoinMarketCap API";

const historicalQuotesSchema = z.object({
  data: z.object({
    quotes: z.array(
      z.object({
        timestamp: z.string(),
        quote: z.record(z.object({ price: z.number() })),
      })
    ),
  }),
});

/**
 * CoinMarketCap `/v2/cryptocurrency/quotes/historical`, daily interval.
 * The key is sent in the `X-CMC_PRO_API_KEY` header; the asset is a CMC numeric id.
 */
export function createCoinMarketCapSource(options: SourceOptions): PriceSource {
  const now = options.now ?? nowInSeconds;
  const convert = options.vsCurrency.toUpperCase();

  async function fetchBatch(cursor: Cursor): Promise<FetchBatch> {
    if (cursor.kind !== "since") {
      throw new Error("coinmarketcap source cannot page backward through history");
    }

    const end = now();
    const days = Math.max(1, Math.ceil((end - cursor.since) / SECONDS_PER_DAY));
    const params = new URLSearchParams({
      id: options.asset,
      time_start: new Date((cursor.since + 1) * 1000).toISOString(),
      time_end: new Date(end * 1000).toISOString(),
      interval: "daily",
      count: String(Math.min(days, options.capabilities.pageSize)),
      convert,
    });

    const headers: Record<string, string> = {};
    if (options.apiKey) {
      headers["X-CMC_PRO_API_KEY"] = options.apiKey;
    }

    const url = `${COINMARKETCAP_BASE_URL}/v2/cryptocurrency/quotes/historical?${params.toString()}`;
    const body = await fetchJson(url, { context: CONTEXT, headers, timeoutMs: options.timeoutMs });
    const { data } = decodeResponse(historicalQuotesSchema, body, url, CONTEXT);

    const observations = data.quotes.map((entry) => {
      const quote = entry.quote[convert];
      if (!quote) {
        throw new FetchFailure("decode", `${CONTEXT} quote has no ${convert} price`, url, 0, JSON.stringify(entry));
      }
      return toObservation(entry.timestamp, quote.price, url, CONTEXT);
    });
    log(`${LOG_EMOJI} CoinMarketCap: received ${observations.length} price points`, LOG);
    return { observations, next: null };
  }

  return {
    name: "coinmarketcap",
    asset: options.asset,
    capabilities: options.capabilities,
    fetchBatch,
  };
}
