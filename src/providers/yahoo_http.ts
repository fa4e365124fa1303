/**
 * Shared request helpers for the Yahoo Finance pages and chart endpoint.
 */

import { FetchUnavailable, describeError } from '@/core/errors';
import { fetchWithTimeout } from '@/utils/http';

export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_0) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0.6668.101 Safari/537.36';

export function buildUrl(urlTemplate: string, stockId: string): string {
  return urlTemplate.replace(/\{id\}/g, encodeURIComponent(stockId));
}

export function parseNumber(text: string | null | undefined): number | null {
  if (!text) return null;
  const parsed = Number(text.replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * GETs `url` and reads the body with `read`, all under `timeoutMs`.
 * Every failure surfaces as FetchUnavailable prefixed with `what`.
 */
export async function fetchYahoo<T>(
  what: string,
  url: string,
  stockId: string,
  timeoutMs: number,
  accept: string,
  read: (response: Response) => Promise<T>
): Promise<T> {
  try {
    return await fetchWithTimeout(
      url,
      { headers: { 'user-agent': USER_AGENT, accept } },
      timeoutMs,
      async (response) => {
        if (!response.ok) {
          throw new FetchUnavailable(`${what} returned ${response.status} ${response.statusText}`, stockId, url);
        }
        return read(response);
      }
    );
  } catch (error) {
    if (error instanceof FetchUnavailable) throw error;
    throw new FetchUnavailable(`${what} request failed: ${describeError(error)}`, stockId, url, error);
  }
}

export function fetchYahooPage(what: string, url: string, stockId: string, timeoutMs: number): Promise<string> {
  return fetchYahoo(what, url, stockId, timeoutMs, 'text/html', (response) => response.text());
}
