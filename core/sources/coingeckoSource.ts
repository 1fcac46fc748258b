// Filename: core/sources/coingeckoSource.ts

import { z } from "zod";
import { COINGECKO_BASE_URL } from "../../constants/api.js";
import { fetchJson } from "../../utils/httpClient.js";
import { decodeResponse, toObservation } from "../../utils/decode.js";
import { log, LOG, TMI } from "../../utils/log.js";
import { nowInSeconds, SECONDS_PER_DAY, toIsoDate } from "../../utils/timestamps.js";
import type { Cursor, FetchBatch, PriceSource, SourceOptions } from "../PriceSource.js";

const LOG_EMOJI = "🦎";
const CONTEXT = "CoinGecko API";

const marketChartSchema = z.object({
  prices: z.array(z.tuple([z.number(), z.number()])),
});

/**
 * CoinGecko `/coins/{id}/market_chart` with daily interval.
 * The demo key travels as the `x_cg_demo_api_key` query parameter.
 * Only `since` cursors are served: the endpoint is addressed by a day count back from now.
 */
export function createCoinGeckoSource(options: SourceOptions): PriceSource {
  const now = options.now ?? nowInSeconds;

  async function fetchBatch(cursor: Cursor): Promise<FetchBatch> {
    if (cursor.kind !== "since") {
      throw new Error("coingecko source cannot page backward through history");
    }

    const days = Math.max(1, Math.ceil((now() - cursor.since) / SECONDS_PER_DAY));
    const params = new URLSearchParams({
      vs_currency: options.vsCurrency,
      days: String(days),
      interval: "daily",
    });
    if (options.apiKey) {
      params.append("x_cg_demo_api_key", options.apiKey);
    }

    log(`${LOG_EMOJI} CoinGecko: requesting ${days} day(s) of ${options.asset} since ${toIsoDate(cursor.since)}`, TMI);
    const url = `${COINGECKO_BASE_URL}/coins/${encodeURIComponent(options.asset)}/market_chart?${params.toString()}`;
    const data = await fetchJson(url, { context: CONTEXT, timeoutMs: options.timeoutMs });
    const { prices } = decodeResponse(marketChartSchema, data, url, CONTEXT);

    const observations = prices.map(([timestampMs, price]) => toObservation(timestampMs, price, url, CONTEXT));
    log(`${LOG_EMOJI} CoinGecko: received ${observations.length} price points`, LOG);
    return { observations, next: null };
  }

  return {
    name: "coingecko",
    asset: options.asset,
    capabilities: options.capabilities,
    fetchBatch,
  };
}
