import { vi } from 'vitest';

export type FetchMock = ReturnType<typeof stubFetch>;

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Replaces global fetch with a mock answering every call with `response()`.
 */
export function stubFetch(response: () => Response) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function requestedUrl(fetchMock: FetchMock, call = 0): URL {
  return new URL(fetchMock.mock.calls[call][0]);
}

export function requestedHeaders(fetchMock: FetchMock, call = 0): Record<string, string> {
  const init = fetchMock.mock.calls[call][1];
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}
