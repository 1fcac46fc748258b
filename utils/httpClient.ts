// utils/httpClient.ts
/**
 * Generic HTTP Client
 *
 * Centralized fetch utility with consistent error handling, logging, timeouts and
 * rate limit detection. Every upstream request goes through this module.
 */

import { log, ERR, LOG, TMI, WARN } from './log.js';

export type FetchFailureKind = 'network' | 'http-status' | 'decode';

/**
 * Tagged failure for any upstream call.
 * `status` is 0 when no response status applies (network and decode failures).
 */
export class FetchFailure extends Error {
  constructor(
    public kind: FetchFailureKind,
    message: string,
    public url: string,
    public status: number = 0,
    public body?: string
  ) {
    super(message);
    this.name = 'FetchFailure';
  }

  /** First characters of the response body, for operator diagnostics. */
  get bodyExcerpt(): string {
    return (this.body ?? '').substring(0, 200);
  }
}

/**
 * Options for HTTP requests
 */
export interface HttpRequestOptions {
  /** Custom headers to include in the request */
  headers?: Record<string, string>;
  /** Context for logging (e.g., 'CoinGecko API', 'Vercel Blob') */
  context?: string;
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Fetches a URL and returns the parsed JSON body without assuming its shape.
 * Callers validate the result.
 *
 * @throws FetchFailure with kind `network`, `http-status` or `decode`
 */
export async function fetchJson(
  url: string,
  options: HttpRequestOptions = {}
): Promise<unknown> {
  const context = options.context || 'HTTP';
  const text = await fetchText(url, options);

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    log(`[${context}] Failed to parse JSON response: ${errorMessage}`, ERR);
    throw new FetchFailure(
      'decode',
      `Failed to parse JSON response: ${errorMessage}`,
      url,
      0,
      text
    );
  }
}

/**
 * Fetches a URL and returns the response as text
 *
 * @throws FetchFailure if the request fails or the response is not OK
 */
export async function fetchText(
  url: string,
  options: HttpRequestOptions = {}
): Promise<string> {
  const context = options.context || 'HTTP';
  const response = await fetchHttp(url, options);
  try {
    return await response.text();
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    log(`[${context}] Failed to read text response from ${maskSensitiveUrl(url)}: ${errorMessage}`, ERR);
    throw new FetchFailure('network', `Failed to read text response: ${errorMessage}`, url, response.status);
  }
}

/**
 * Core HTTP fetch function with error handling and rate limit detection
 *
 * @throws FetchFailure if the request fails, times out, or the response is not OK
 */
async function fetchHttp(
  url: string,
  options: HttpRequestOptions = {}
): Promise<Response> {
  const context = options.context || 'HTTP';
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const headers: Record<string, string> = {
    'Accept': 'application/json',
    ...options.headers,
  };

  const urlForLogging = maskSensitiveUrl(url);
  log(`[${context}] GET ${urlForLogging}`, LOG);

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    const timedOut = error instanceof Error && error.name === 'TimeoutError';
    const reason = timedOut ? `timed out after ${timeoutMs}ms` : errorMessage;
    log(`[${context}] Network/Request Error: ${reason}`, ERR);
    throw new FetchFailure('network', `Failed to fetch from ${context}: ${reason}`, url);
  }

  log(`[${context}] Response: ${response.status} ${response.statusText}`, LOG);
  checkRateLimits(response, context);

  if (!response.ok) {
    const errorText = await response.text().catch(() => 'Unable to read error response');
    log(`[${context}] ❌ Error Response: ${errorText.substring(0, 200)}`, ERR);
    throw new FetchFailure(
      'http-status',
      `${context} responded with status ${response.status}: ${response.statusText}`,
      url,
      response.status,
      errorText
    );
  }

  return response;
}

/**
 * Checks response headers for rate limit information and logs warnings
 */
function checkRateLimits(response: Response, context: string): void {
  const rateLimitRemaining = response.headers.get('x-ratelimit-remaining') ||
                             response.headers.get('ratelimit-remaining') ||
                             response.headers.get('x-ratelimit-remaining-requests');

  const rateLimitReset = response.headers.get('x-ratelimit-reset') ||
                         response.headers.get('ratelimit-reset') ||
                         response.headers.get('x-ratelimit-reset-seconds');

  // Binance reports consumed weight instead of a remaining count
  const usedWeight = response.headers.get('x-mbx-used-weight-1m');

  if (rateLimitRemaining !== null) {
    const remaining = parseInt(rateLimitRemaining, 10);
    log(`[${context}] Rate limit remaining: ${remaining}`, TMI);

    if (remaining < 10) {
      log(`[${context}] ⚠️ Rate limit is low (${remaining} remaining)`, WARN);
    }
  }

  if (rateLimitReset !== null) {
    const resetTime = parseInt(rateLimitReset, 10);
    // Handle both Unix timestamp (seconds) and milliseconds
    const resetDate = resetTime < 1e12
      ? new Date(resetTime * 1000)
      : new Date(resetTime);
    if (!Number.isNaN(resetDate.getTime())) {
      log(`[${context}] Rate limit resets at: ${resetDate.toISOString()}`, TMI);
    }
  }

  if (usedWeight !== null) {
    log(`[${context}] Request weight used (1m): ${usedWeight}`, TMI);
  }

  if (response.status === 429) {
    log(`[${context}] ⚠️ Rate limit exceeded (429)`, WARN);
  }
}

/**
 * Masks sensitive information in URLs (API keys, tokens, etc.)
 */
export function maskSensitiveUrl(url: string): string {
  const sensitiveParams = [
    'x_cg_demo_api_key',
    'x_cg_pro_api_key',
    'api_key',
    'apikey',
    'token',
    'access_token',
    'authorization',
  ];

  let maskedUrl = url;
  for (const param of sensitiveParams) {
    const regex = new RegExp(`([?&])${param}=[^&]+`, 'gi');
    maskedUrl = maskedUrl.replace(regex, `$1${param}=***MASKED***`);
  }

  return maskedUrl;
}
