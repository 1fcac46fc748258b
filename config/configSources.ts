// Filename: config/configSources.ts

import type { SourceName } from "../constants/SourceNames.js";
import type { SourceCapabilities } from "../core/PriceSource.js";

/**
 * Static, per-source settings. Values that vary per deployment (asset, keys,
 * pauses) can be overridden through the environment; see loadRunConfig.
 */
export interface SourceConfig {
  /** Environment variable holding the API credential. */
  credentialEnvVar: string;
  /** If false, requests are sent unauthenticated when no key is set. */
  credentialRequired: boolean;
  /** Asset identifier in the source's own namespace. */
  defaultAsset: string;
  /** Pause between successive requests of a backfill. */
  defaultPauseMs: number;
  capabilities: SourceCapabilities;
}

export const sourceConfig: Record<SourceName, SourceConfig> = {
  coingecko: {
    credentialEnvVar: "COINGECKO_API_KEY",
    credentialRequired: true,
    defaultAsset: "bittensor",
    defaultPauseMs: 4000,
    // Demo keys are limited to the past 365 days of history
    capabilities: { backfill: false, maxWindowDays: 365, pageSize: 365 },
  },
  taostats: {
    credentialEnvVar: "TAOSTATS_API_KEY",
    credentialRequired: true,
    defaultAsset: "tao",
    defaultPauseMs: 12000,
    capabilities: { backfill: true, maxWindowDays: 200, pageSize: 200 },
  },
  coinmarketcap: {
    credentialEnvVar: "COINMARKETCAP_API_KEY",
    credentialRequired: true,
    defaultAsset: "22974",
    defaultPauseMs: 2000,
    capabilities: { backfill: false, maxWindowDays: 365, pageSize: 365 },
  },
  binance: {
    credentialEnvVar: "BINANCE_API_KEY",
    credentialRequired: false,
    defaultAsset: "TAOUSDT",
    defaultPauseMs: 500,
    // One daily kline per point, 1000 klines per request
    capabilities: { backfill: true, maxWindowDays: 1000, pageSize: 1000 },
  },
};
