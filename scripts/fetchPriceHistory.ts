// Filename: scripts/fetchPriceHistory.ts
/**
 * Price History Sync
 *
 * Keeps a local (or Vercel Blob) JSON series of daily prices for one asset up to
 * date, for the chart front end to read.
 *
 * How it works:
 * 1. Loads configuration from .env.local / the environment (see config/loadRunConfig.ts)
 * 2. Reads the stored series; a missing or corrupt one counts as empty
 * 3. Empty series: pages backward through full history (Taostats, Binance) or
 *    requests FULL_HISTORY_DAYS days (CoinGecko, CoinMarketCap)
 *    Existing series: requests only points newer than the last stored one
 * 4. Merges by timestamp (stored values win), sorts, and writes once
 * 5. Any failure leaves the stored series untouched and exits with status 1
 *
 * Output: JSON array of [timestamp_seconds, price] pairs, ascending
 *
 * Usage: PRICE_SOURCE=binance npx tsx scripts/fetchPriceHistory.ts
 */

import { ConfigError, loadEnvFile, loadRunConfig } from '../config/loadRunConfig.js';
import { createPriceSource } from '../core/PriceSources.js';
import { createSeriesStore } from '../core/SeriesStores.js';
import { runHistoryUpdate, type RunSummary } from '../core/HistoryUpdater.js';
import { FetchFailure } from '../utils/httpClient.js';
import { log, ERR, LOG } from '../utils/log.js';
import { toIsoDate } from '../utils/timestamps.js';

/**
 * Logs a failure with enough context to diagnose it.
 */
export function reportFailure(error: unknown): void {
  if (error instanceof ConfigError) {
    log(`Configuration error: ${error.message}`, ERR);
  } else if (error instanceof FetchFailure) {
    log(`Fetch failed (${error.kind}): ${error.message}`, ERR);
    if (error.status) {
      log(`  Status: ${error.status}`, ERR);
    }
    if (error.body) {
      log(`  Response body: ${error.bodyExcerpt}`, ERR);
    }
  } else {
    const errorMessage = error instanceof Error ? error.message : String(error);
    log(`Price history update failed: ${errorMessage}`, ERR);
  }
  log('Stored series left unchanged.', ERR);
}

function describeSummary(summary: RunSummary): string {
  const range = summary.firstTimestamp !== null && summary.lastTimestamp !== null
    ? `${toIsoDate(summary.firstTimestamp)} to ${toIsoDate(summary.lastTimestamp)}`
    : 'empty';
  return `${summary.total} points (${range}), ${summary.added} new of ${summary.fetched} fetched`;
}

/**
 * Runs one update and returns the process exit code.
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const config = loadRunConfig(env);
    const source = createPriceSource(config);
    const store = createSeriesStore(config);

    const summary = await runHistoryUpdate({ source, store, config });
    log(`✅ ${config.source}/${config.asset}: ${describeSummary(summary)}`, LOG);
    return 0;
  } catch (error) {
    reportFailure(error);
    return 1;
  }
}

// Only run main() if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.endsWith('fetchPriceHistory.ts')) {
  loadEnvFile();
  void main().then((code) => process.exit(code));
}
