/**
 * Twelve months of daily closes from the Yahoo Finance chart endpoint.
 */

import { FetchUnavailable } from '@/core/errors';
import { DEFAULT_HISTORY_URL_TEMPLATE } from '@/core/config';
import { createChildLogger } from '@/utils/logger';
import { DEFAULT_TIMEOUT_MS } from '@/utils/http';
import { buildUrl, fetchYahoo } from './yahoo_http';
import type { PriceHistory, PriceHistoryFetcher, PricePoint } from './types';

const logger = createChildLogger('yahoo_price_history');

/** A chart needs at least a start and an end. */
const MIN_POINTS = 2;

export interface YahooPriceHistoryOptions {
  urlTemplate?: string;
  timeoutMs?: number;
}

export interface ParsedChart {
  currency: string | null;
  points: PricePoint[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function firstRecord(value: unknown): Record<string, unknown> | null {
  if (!Array.isArray(value)) return null;
  const first: unknown = value[0];
  return isRecord(first) ? first : null;
}

/**
 * Pairs `timestamp[i]` with `indicators.quote[0].close[i]`. Days without a
 * close (trading halts, the current session) are skipped.
 */
export function parseChartResponse(body: unknown): ParsedChart | null {
  if (!isRecord(body)) return null;
  const chart = body.chart;
  if (!isRecord(chart)) return null;

  const result = firstRecord(chart.result);
  const indicators = result?.indicators;
  if (!result || !isRecord(indicators)) return null;

  const quote = firstRecord(indicators.quote);
  const timestamps = result.timestamp;
  const closes = quote?.close;
  if (!Array.isArray(timestamps) || !Array.isArray(closes)) return null;

  const points: PricePoint[] = [];
  timestamps.forEach((rawT: unknown, index: number) => {
    const t = toNumberOrNull(rawT);
    const close = toNumberOrNull(closes[index]);
    if (t !== null && close !== null) {
      points.push({ t, close });
    }
  });
  points.sort((a, b) => a.t - b.t);

  const meta = result.meta;
  const currency = isRecord(meta) && typeof meta.currency === 'string' ? meta.currency : null;
  return {
    currency,
    points,
  };
}

export class YahooPriceHistoryFetcher implements PriceHistoryFetcher {
  readonly name = 'yahoo-finance-chart';
  private readonly urlTemplate: string;
  private readonly timeoutMs: number;

  constructor(options: YahooPriceHistoryOptions = {}) {
    this.urlTemplate = options.urlTemplate ?? DEFAULT_HISTORY_URL_TEMPLATE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetch(stockId: string): Promise<PriceHistory> {
    const url = buildUrl(this.urlTemplate, stockId);
    const body = await fetchYahoo('Price history', url, stockId, this.timeoutMs, 'application/json', async (response) => {
      try {
        const parsed: unknown = await response.json();
        return parsed;
      } catch (error) {
        throw new FetchUnavailable('Price history response is not valid JSON', stockId, url, error);
      }
    });

    const chart = parseChartResponse(body);
    if (!chart) {
      throw new FetchUnavailable('Price history structure not recognised', stockId, url);
    }
    if (chart.points.length < MIN_POINTS) {
      throw new FetchUnavailable(`Price history has ${chart.points.length} closing prices`, stockId, url);
    }

    logger.info({ stockId, points: chart.points.length }, 'Price history fetched');
    return { source: this.name, ...chart };
  }
}
