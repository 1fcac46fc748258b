import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createCoinGeckoSource } from '../../core/sources/coingeckoSource.js';
import type { SourceOptions } from '../../core/PriceSource.js';
import { FetchFailure } from '../../utils/httpClient.js';
import { jsonResponse, requestedUrl, stubFetch } from './helpers.js';

vi.mock('../../utils/log.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../utils/log.js')>()),
  log: vi.fn(),
}));

const DAY = 86_400;
const NOW = 1_700_000_000;

function options(overrides: Partial<SourceOptions> = {}): SourceOptions {
  return {
    asset: 'bittensor',
    vsCurrency: 'usd',
    apiKey: 'test-key',
    timeoutMs: 1000,
    capabilities: { backfill: false, maxWindowDays: 365, pageSize: 365 },
    now: () => NOW,
    ...overrides,
  };
}

describe('coingeckoSource', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should request the market chart with the day count and demo key', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ prices: [] }));

    await createCoinGeckoSource(options()).fetchBatch({ kind: 'since', since: NOW - 10 * DAY });

    const url = requestedUrl(fetchMock);
    expect(`${url.origin}${url.pathname}`).toBe('https://api.coingecko.com/api/v3/coins/bittensor/market_chart');
    expect(url.searchParams.get('vs_currency')).toBe('usd');
    expect(url.searchParams.get('days')).toBe('10');
    expect(url.searchParams.get('interval')).toBe('daily');
    expect(url.searchParams.get('x_cg_demo_api_key')).toBe('test-key');
  });

  it('should round a partial day up and ask for at least one day', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ prices: [] }));
    const source = createCoinGeckoSource(options());

    await source.fetchBatch({ kind: 'since', since: NOW - 2 * DAY - 60 });
    await source.fetchBatch({ kind: 'since', since: NOW - 5 });

    expect(requestedUrl(fetchMock, 0).searchParams.get('days')).toBe('3');
    expect(requestedUrl(fetchMock, 1).searchParams.get('days')).toBe('1');
  });

  it('should omit the key parameter when no key is configured', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ prices: [] }));

    await createCoinGeckoSource(options({ apiKey: undefined })).fetchBatch({ kind: 'since', since: NOW - DAY });

    expect(requestedUrl(fetchMock).searchParams.has('x_cg_demo_api_key')).toBe(false);
  });

  it('should convert millisecond timestamps to seconds', async () => {
    stubFetch(() => jsonResponse({
      prices: [[1699920000000, 10.5], [1700000000123, 11]],
      market_caps: [],
      total_volumes: [],
    }));

    const batch = await createCoinGeckoSource(options()).fetchBatch({ kind: 'since', since: NOW - 2 * DAY });

    expect(batch).toEqual({ observations: [[1699920000, 10.5], [1700000000, 11]], next: null });
  });

  it('should fail with a decode error when prices are missing', async () => {
    stubFetch(() => jsonResponse({ error: 'coin not found' }));

    const result = createCoinGeckoSource(options()).fetchBatch({ kind: 'since', since: NOW - DAY });

    await expect(result).rejects.toBeInstanceOf(FetchFailure);
    await expect(result).rejects.toMatchObject({ kind: 'decode', body: '{"error":"coin not found"}' });
  });

  it('should report the status of a failed request', async () => {
    stubFetch(() => new Response('{"status":{"error_code":429}}', { status: 429, statusText: 'Too Many Requests' }));

    await expect(
      createCoinGeckoSource(options()).fetchBatch({ kind: 'since', since: NOW - DAY })
    ).rejects.toMatchObject({ kind: 'http-status', status: 429, body: '{"status":{"error_code":429}}' });
  });

  it('should refuse backward pagination', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ prices: [] }));

    await expect(
      createCoinGeckoSource(options()).fetchBatch({ kind: 'before', before: null })
    ).rejects.toThrow('cannot page backward');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
