/**
 * Yahoo Finance quote page scraper
 *
 * Reads the key-statistics page of a ticker and pulls the live price plus
 * two configured sets of labelled table rows: the valuation figures for the
 * header and the balance-sheet figures for the financial health block. The
 * page layout is outside our control: anything that no longer matches
 * surfaces as FetchUnavailable.
 */

import { FetchUnavailable } from '@/core/errors';
import { DEFAULT_HEALTH_FIGURES, DEFAULT_MARKET_FIGURES, DEFAULT_URL_TEMPLATE } from '@/core/config';
import { createChildLogger } from '@/utils/logger';
import { DEFAULT_TIMEOUT_MS } from '@/utils/http';
import { extractFirst, extractTableRows } from './html';
import { buildUrl, fetchYahooPage, parseNumber } from './yahoo_http';
import type { FigureEntry, MarketDataFetcher, SupplementaryFigures } from './types';

const logger = createChildLogger('yahoo_quote_page');

const MISSING_VALUES = new Set(['', '--', 'N/A', '-']);

export interface YahooQuotePageOptions {
  urlTemplate?: string;
  figures?: string[];
  healthFigures?: string[];
  timeoutMs?: number;
}

export interface ParsedQuotePage {
  companyName: string | null;
  price: number | null;
  currency: string | null;
  figures: FigureEntry[];
  health: FigureEntry[];
}

export { buildUrl as buildQuoteUrl } from './yahoo_http';

/** Row labels carry footnote markers ("Forward Annual Dividend Yield 4"). */
function normalizeLabel(label: string): string {
  return label.replace(/\s+\d+$/, '').trim().toLowerCase();
}

function extractPrice(html: string): number | null {
  const streamerTag = html.match(/<fin-streamer[^>]*data-field="regularMarketPrice"[^>]*>([\s\S]*?)<\/fin-streamer>/i);
  if (streamerTag) {
    const fromAttribute = parseNumber(streamerTag[0].match(/data-value="([^"]+)"/i)?.[1]);
    if (fromAttribute !== null) return fromAttribute;
    const fromText = parseNumber(extractFirst(streamerTag[0], /<fin-streamer[^>]*>([\s\S]*?)<\/fin-streamer>/i));
    if (fromText !== null) return fromText;
  }
  return parseNumber(extractFirst(html, /<[^>]*data-testid="qsp-price"[^>]*>([\s\S]*?)<\//i));
}

function pickFigures(rows: string[][], wanted: readonly string[]): FigureEntry[] {
  const figures: FigureEntry[] = [];
  for (const label of wanted) {
    const target = label.toLowerCase();
    const row = rows.find(
      (cells) => normalizeLabel(cells[0]).startsWith(target) && !MISSING_VALUES.has(cells[1])
    );
    if (row) {
      figures.push({ label, value: row[1] });
    }
  }
  return figures;
}

export function parseQuotePage(
  html: string,
  stockId: string,
  wanted: readonly string[],
  healthWanted: readonly string[] = []
): ParsedQuotePage {
  const heading = extractFirst(html, /<h1[^>]*>([\s\S]*?)<\/h1>/i);
  const suffix = ` (${stockId.toUpperCase()})`;
  const companyName = heading && heading.endsWith(suffix) ? heading.slice(0, -suffix.length) : heading;

  const currencyMatch = html.match(/Currency in ([A-Z]{3})/);
  const rows = extractTableRows(html);

  return {
    companyName: companyName || null,
    price: extractPrice(html),
    currency: currencyMatch?.[1] ?? null,
    figures: pickFigures(rows, wanted),
    health: pickFigures(rows, healthWanted),
  };
}

export class YahooQuotePageFetcher implements MarketDataFetcher {
  readonly name = 'yahoo-finance-page';
  private readonly urlTemplate: string;
  private readonly wanted: string[];
  private readonly healthWanted: string[];
  private readonly timeoutMs: number;

  constructor(options: YahooQuotePageOptions = {}) {
    this.urlTemplate = options.urlTemplate ?? DEFAULT_URL_TEMPLATE;
    this.wanted = options.figures ?? DEFAULT_MARKET_FIGURES;
    this.healthWanted = options.healthFigures ?? DEFAULT_HEALTH_FIGURES;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetch(stockId: string): Promise<SupplementaryFigures> {
    const url = buildUrl(this.urlTemplate, stockId);
    const html = await fetchYahooPage('Quote page', url, stockId, this.timeoutMs);

    const parsed = parseQuotePage(html, stockId, this.wanted, this.healthWanted);
    if (parsed.price === null && parsed.figures.length === 0 && parsed.health.length === 0) {
      throw new FetchUnavailable('Quote page structure not recognised: no price or figures found', stockId, url);
    }

    logger.info(
      { stockId, price: parsed.price, figures: parsed.figures.length, health: parsed.health.length },
      'Market figures extracted'
    );

    return {
      source: this.name,
      url,
      fetchedAt: new Date().toISOString(),
      ...parsed,
    };
  }
}
