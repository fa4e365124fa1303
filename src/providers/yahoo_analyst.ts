/**
 * Analyst consensus from the Yahoo Finance quote page: recommendation,
 * mean rating, number of analysts and the mean price target.
 */

import { FetchUnavailable } from '@/core/errors';
import { DEFAULT_ANALYST_URL_TEMPLATE } from '@/core/config';
import { createChildLogger } from '@/utils/logger';
import { DEFAULT_TIMEOUT_MS } from '@/utils/http';
import { extractEmbeddedNumber, extractEmbeddedString, extractFirst } from './html';
import { buildUrl, fetchYahooPage, parseNumber } from './yahoo_http';
import type { AnalystFetcher, AnalystInsights } from './types';

const logger = createChildLogger('yahoo_analyst');

export interface YahooAnalystOptions {
  urlTemplate?: string;
  timeoutMs?: number;
}

export type ParsedAnalystView = Omit<AnalystInsights, 'source'>;

/** Summary list entries: <li><span>1y Target Est</span><span>250.00</span></li> */
function summaryValue(html: string, label: string): number | null {
  const pattern = new RegExp(`<li[^>]*>\\s*<span[^>]*>\\s*${label}\\s*</span>\\s*<span[^>]*>([\\s\\S]*?)</span>`, 'i');
  return parseNumber(extractFirst(html, pattern));
}

/** Implied move to the mean target, as a fraction of the current price. */
export function impliedUpside(view: Pick<AnalystInsights, 'targetMeanPrice' | 'currentPrice'>): number | null {
  const { targetMeanPrice, currentPrice } = view;
  if (targetMeanPrice === null || currentPrice === null || currentPrice <= 0) return null;
  return targetMeanPrice / currentPrice - 1;
}

export function parseAnalystPage(html: string): ParsedAnalystView {
  const recommendation = extractEmbeddedString(html, 'recommendationKey');
  return {
    recommendation: recommendation && recommendation !== 'none' ? recommendation.replace(/_/g, ' ') : null,
    recommendationMean: extractEmbeddedNumber(html, 'recommendationMean'),
    analystCount: extractEmbeddedNumber(html, 'numberOfAnalystOpinions'),
    targetMeanPrice: extractEmbeddedNumber(html, 'targetMeanPrice') ?? summaryValue(html, '1y Target Est'),
    currentPrice: extractEmbeddedNumber(html, 'currentPrice') ?? extractEmbeddedNumber(html, 'regularMarketPrice'),
  };
}

export class YahooAnalystFetcher implements AnalystFetcher {
  readonly name = 'yahoo-finance-analysts';
  private readonly urlTemplate: string;
  private readonly timeoutMs: number;

  constructor(options: YahooAnalystOptions = {}) {
    this.urlTemplate = options.urlTemplate ?? DEFAULT_ANALYST_URL_TEMPLATE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetch(stockId: string): Promise<AnalystInsights> {
    const url = buildUrl(this.urlTemplate, stockId);
    const html = await fetchYahooPage('Analyst page', url, stockId, this.timeoutMs);

    const parsed = parseAnalystPage(html);
    if (parsed.recommendation === null && parsed.recommendationMean === null && parsed.targetMeanPrice === null) {
      throw new FetchUnavailable('Analyst page structure not recognised: no rating or price target', stockId, url);
    }

    logger.info(
      { stockId, recommendation: parsed.recommendation, targetMeanPrice: parsed.targetMeanPrice },
      'Analyst view extracted'
    );
    return { source: this.name, ...parsed };
  }
}
