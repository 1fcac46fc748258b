import { describe, it, expect, vi, beforeEach } from 'vitest';
import { resolve } from 'path';
import { ConfigError, loadRunConfig } from '../config/loadRunConfig.js';
import { log } from '../utils/log.js';

vi.mock('../utils/log.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../utils/log.js')>()),
  log: vi.fn(),
}));

describe('loadRunConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should default to CoinGecko, bittensor, usd and the local file', () => {
    const config = loadRunConfig({ COINGECKO_API_KEY: 'test-key' });

    expect(config).toEqual({
      source: 'coingecko',
      asset: 'bittensor',
      vsCurrency: 'usd',
      credential: 'test-key',
      storage: 'file',
      outputPath: resolve(process.cwd(), 'data', 'price_data.json'),
      blobKey: 'price-history/coingecko-bittensor',
      requestTimeoutMs: 30_000,
      ratePauseMs: 4000,
      fullHistoryDays: 365,
      maxBackfillPages: 500,
    });
  });

  it('should apply per-source defaults', () => {
    const config = loadRunConfig({ PRICE_SOURCE: 'taostats', TAOSTATS_API_KEY: 'test-key' });

    expect(config.asset).toBe('tao');
    expect(config.ratePauseMs).toBe(12000);
    expect(config.blobKey).toBe('price-history/taostats-tao');
  });

  it('should read overrides and normalize the currency', () => {
    const config = loadRunConfig({
      PRICE_SOURCE: 'coinmarketcap',
      COINMARKETCAP_API_KEY: 'test-key',
      PRICE_ASSET: '1',
      VS_CURRENCY: 'EUR',
      PRICE_OUTPUT_PATH: '/tmp/prices/btc.json',
      REQUEST_TIMEOUT_MS: '5000',
      RATE_LIMIT_PAUSE_MS: '0',
      FULL_HISTORY_DAYS: '30',
      MAX_BACKFILL_PAGES: '10',
    });

    expect(config).toMatchObject({
      source: 'coinmarketcap',
      asset: '1',
      vsCurrency: 'eur',
      outputPath: '/tmp/prices/btc.json',
      requestTimeoutMs: 5000,
      ratePauseMs: 0,
      fullHistoryDays: 30,
      maxBackfillPages: 10,
    });
  });

  it('should refuse to run without a required credential', () => {
    expect(() => loadRunConfig({ PRICE_SOURCE: 'taostats' })).toThrow(ConfigError);
    expect(() => loadRunConfig({ PRICE_SOURCE: 'taostats' })).toThrow(
      "TAOSTATS_API_KEY is not set. Add it to .env.local or the environment before running the 'taostats' source."
    );
  });

  it('should treat an empty credential as missing', () => {
    expect(() => loadRunConfig({ COINGECKO_API_KEY: '   ' })).toThrow('COINGECKO_API_KEY is not set');
  });

  it('should allow Binance without a credential', () => {
    const config = loadRunConfig({ PRICE_SOURCE: 'binance' });

    expect(config.credential).toBeUndefined();
    expect(config.asset).toBe('TAOUSDT');
    expect(config.blobKey).toBe('price-history/binance-taousdt');
  });

  it('should log only a masked credential', () => {
    loadRunConfig({ COINGECKO_API_KEY: 'test-key-123' });

    const messages = vi.mocked(log).mock.calls.map(([message]) => message);
    expect(messages).toContain("⚙️ Loaded COINGECKO_API_KEY ('test-...')");
  });

  it('should reject an unknown source', () => {
    expect(() => loadRunConfig({ PRICE_SOURCE: 'kraken' })).toThrow(/^Invalid configuration: PRICE_SOURCE: /);
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => loadRunConfig({ COINGECKO_API_KEY: 'test-key', REQUEST_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
  });

  it('should require a blob token for blob storage', () => {
    expect(() => loadRunConfig({ COINGECKO_API_KEY: 'test-key', PRICE_STORAGE: 'blob' })).toThrow(
      'BLOB_READ_WRITE_TOKEN is not set. It is required when PRICE_STORAGE=blob.'
    );

    const config = loadRunConfig({
      COINGECKO_API_KEY: 'test-key',
      PRICE_STORAGE: 'blob',
      BLOB_READ_WRITE_TOKEN: 'test-token',
      PRICE_BLOB_KEY: 'charts/tao',
    });
    expect(config.storage).toBe('blob');
    expect(config.blobKey).toBe('charts/tao');
  });
});
