// Filename: constants/api.ts

export const COINGECKO_BASE_URL = "https://api.coingecko.com/api/v3";
export const TAOSTATS_BASE_URL = "https://api.taostats.io/api";
export const COINMARKETCAP_BASE_URL = "https://pro-api.coinmarketcap.com";
export const BINANCE_BASE_URL = "https://api.binance.com";
