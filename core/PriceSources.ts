// Filename: core/PriceSources.ts

import type { SourceName } from "../constants/SourceNames.js";
import { sourceConfig } from "../config/configSources.js";
import type { RunConfig } from "../config/loadRunConfig.js";
import { log, TMI } from "../utils/log.js";
import type { PriceSource, SourceOptions } from "./PriceSource.js";
import { createCoinGeckoSource } from "./sources/coingeckoSource.js";
import { createTaostatsSource } from "./sources/taostatsSource.js";
import { createCoinMarketCapSource } from "./sources/coinmarketcapSource.js";
import { createBinanceSource } from "./sources/binanceSource.js";

const LOG_EMOJI = "🌐";

/** Factory for one upstream implementation. */
type SourceFactory = (options: SourceOptions) => PriceSource;

export const sourceFactories: Record<SourceName, SourceFactory> = {
  coingecko: createCoinGeckoSource,
  taostats: createTaostatsSource,
  coinmarketcap: createCoinMarketCapSource,
  binance: createBinanceSource,
};

/**
 * Builds the PriceSource selected by the run configuration.
 */
export function createPriceSource(config: RunConfig, now?: () => number): PriceSource {
  const { capabilities } = sourceConfig[config.source];
  log(`${LOG_EMOJI} Using source '${config.source}' for asset '${config.asset}'`, TMI);

  return sourceFactories[config.source]({
    asset: config.asset,
    vsCurrency: config.vsCurrency,
    apiKey: config.credential,
    timeoutMs: config.requestTimeoutMs,
    capabilities,
    now,
  });
}
