// Filename: constants/SourceNames.ts

/**
 * --- SOURCES ---
 * Upstream market-data APIs a price history can be pulled from.
 */
export const ALL_SOURCE_NAMES = [
  "coingecko", // Demo key as query parameter, market_chart endpoint.
  "taostats", // Key in Authorization header, paginated price history.
  "coinmarketcap", // Key in X-CMC_PRO_API_KEY header, historical quotes.
  "binance", // Public klines, key optional.
] as const;

export type SourceName = (typeof ALL_SOURCE_NAMES)[number];
