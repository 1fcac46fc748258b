import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createTaostatsSource } from '../../core/sources/taostatsSource.js';
import type { SourceOptions } from '../../core/PriceSource.js';
import { jsonResponse, requestedHeaders, requestedUrl, stubFetch } from './helpers.js';

vi.mock('../../utils/log.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../utils/log.js')>()),
  log: vi.fn(),
}));

const JAN_2 = 1704153600; // 2024-01-02T00:00:00Z
const JAN_3 = 1704240000; // 2024-01-03T00:00:00Z

function options(overrides: Partial<SourceOptions> = {}): SourceOptions {
  return {
    asset: 'tao',
    vsCurrency: 'usd',
    apiKey: 'test-key',
    timeoutMs: 1000,
    capabilities: { backfill: true, maxWindowDays: 200, pageSize: 200 },
    ...overrides,
  };
}

describe('taostatsSource', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should request the newest page first with the key in the Authorization header', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ data: [] }));

    await createTaostatsSource(options()).fetchBatch({ kind: 'before', before: null });

    const url = requestedUrl(fetchMock);
    expect(`${url.origin}${url.pathname}`).toBe('https://api.taostats.io/api/price/history/v1');
    expect(url.searchParams.get('asset')).toBe('tao');
    expect(url.searchParams.get('frequency')).toBe('by_day');
    expect(url.searchParams.get('limit')).toBe('200');
    expect(url.searchParams.get('order')).toBe('timestamp_desc');
    expect(url.searchParams.has('timestamp_end')).toBe(false);
    expect(requestedHeaders(fetchMock).authorization).toBe('test-key');
  });

  it('should parse ISO timestamps and string prices and step the cursor before the oldest point', async () => {
    stubFetch(() => jsonResponse({
      data: [
        { created_at: '2024-01-03T00:00:00Z', price: '3.5' },
        { created_at: '2024-01-02T00:00:00Z', price: 3.25 },
      ],
      pagination: { current_page: 1, total_pages: 9 },
    }));

    const batch = await createTaostatsSource(options()).fetchBatch({ kind: 'before', before: null });

    expect(batch).toEqual({
      observations: [[JAN_3, 3.5], [JAN_2, 3.25]],
      next: { kind: 'before', before: JAN_2 - 1 },
    });
  });

  it('should pass the before cursor as timestamp_end', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ data: [] }));

    await createTaostatsSource(options()).fetchBatch({ kind: 'before', before: JAN_2 - 1 });

    expect(requestedUrl(fetchMock).searchParams.get('timestamp_end')).toBe(String(JAN_2 - 1));
  });

  it('should signal exhaustion on an empty page', async () => {
    stubFetch(() => jsonResponse({ data: [] }));

    const batch = await createTaostatsSource(options()).fetchBatch({ kind: 'before', before: 1000 });

    expect(batch).toEqual({ observations: [], next: null });
  });

  it('should read forward from just after a since cursor', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ data: [{ created_at: '2024-01-03T00:00:00Z', price: '4' }] }));

    const batch = await createTaostatsSource(options()).fetchBatch({ kind: 'since', since: JAN_2 });

    const url = requestedUrl(fetchMock);
    expect(url.searchParams.get('order')).toBe('timestamp_asc');
    expect(url.searchParams.get('timestamp_start')).toBe(String(JAN_2 + 1));
    expect(batch).toEqual({ observations: [[JAN_3, 4]], next: null });
  });

  it('should fail with a decode error on an unreadable price', async () => {
    stubFetch(() => jsonResponse({ data: [{ created_at: '2024-01-03T00:00:00Z', price: 'n/a' }] }));

    await expect(
      createTaostatsSource(options()).fetchBatch({ kind: 'before', before: null })
    ).rejects.toMatchObject({ kind: 'decode', body: '["2024-01-03T00:00:00Z","n/a"]' });
  });

  it('should fail with a decode error on an unreadable timestamp', async () => {
    stubFetch(() => jsonResponse({ data: [{ created_at: 'yesterday', price: '1.0' }] }));

    await expect(
      createTaostatsSource(options()).fetchBatch({ kind: 'before', before: null })
    ).rejects.toMatchObject({ kind: 'decode' });
  });
});
