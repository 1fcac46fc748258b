// Filename: core/sources/binanceSource.ts

import { z } from "zod";
import { BINANCE_BASE_URL } from "../../constants/api.js";
import { fetchJson } from "../../utils/httpClient.js";
import { decodeResponse, toObservation } from "../../utils/decode.js";
import { log, LOG, TMI } from "../../utils/log.js";
import { nextBeforeCursor } from "../PriceSource.js";
import type { Cursor, FetchBatch, PriceSource, SourceOptions } from "../PriceSource.js";

const LOG_EMOJI = "🔶";
const CONTEXT = "Binance API";

// [openTime, open, high, low, close, volume, closeTime, ...]
const klinesSchema = z.array(
  z.tuple([z.number(), z.string(), z.string(), z.string(), z.string()]).rest(z.unknown())
);

/**
 * Binance `/api/v3/klines` with 1d candles; the close price of each candle is
 * recorded at its open time. Klines are public, the key header is sent only if set.
 */
export function createBinanceSource(options: SourceOptions): PriceSource {
  const { pageSize } = options.capabilities;

  async function fetchBatch(cursor: Cursor): Promise<FetchBatch> {
    const params = new URLSearchParams({
      symbol: options.asset,
      interval: "1d",
      limit: String(pageSize),
    });

    if (cursor.kind === "before") {
      if (cursor.before !== null) {
        params.set("endTime", String(cursor.before * 1000));
      }
    } else {
      params.set("startTime", String((cursor.since + 1) * 1000));
    }

    const headers: Record<string, string> = {};
    if (options.apiKey) {
      headers["X-MBX-APIKEY"] = options.apiKey;
    }

    const url = `${BINANCE_BASE_URL}/api/v3/klines?${params.toString()}`;
    log(`${LOG_EMOJI} Binance: fetching ${options.asset} klines (${cursor.kind})`, TMI);
    const body = await fetchJson(url, { context: CONTEXT, headers, timeoutMs: options.timeoutMs });
    const klines = decodeResponse(klinesSchema, body, url, CONTEXT);

    const observations = klines.map((kline) => toObservation(kline[0], kline[4], url, CONTEXT));
    log(`${LOG_EMOJI} Binance: received ${observations.length} klines`, LOG);

    return {
      observations,
      next: cursor.kind === "before" ? nextBeforeCursor(observations) : null,
    };
  }

  return {
    name: "binance",
    asset: options.asset,
    capabilities: options.capabilities,
    fetchBatch,
  };
}
