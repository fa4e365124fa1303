/**
 * Company overview from the Yahoo Finance profile page: sector, industry
 * and the opening sentences of the business description.
 */

import { FetchUnavailable } from '@/core/errors';
import { DEFAULT_PROFILE_URL_TEMPLATE } from '@/core/config';
import { createChildLogger } from '@/utils/logger';
import { DEFAULT_TIMEOUT_MS } from '@/utils/http';
import { extractEmbeddedString, extractFirst } from './html';
import { buildUrl, fetchYahooPage } from './yahoo_http';
import type { CompanyProfile, ProfileFetcher } from './types';

const logger = createChildLogger('yahoo_profile');

export const SUMMARY_SENTENCES = 3;

export interface YahooProfileOptions {
  urlTemplate?: string;
  timeoutMs?: number;
}

export type ParsedProfile = Omit<CompanyProfile, 'source'>;

/** First `count` sentences; a period followed by whitespace ends a sentence. */
export function firstSentences(text: string, count: number = SUMMARY_SENTENCES): string {
  const sentences = text.trim().split(/(?<=[.!?])\s+/);
  return sentences.slice(0, count).join(' ');
}

function labelledValue(html: string, label: string): string | null {
  const pattern = new RegExp(`<dt[^>]*>\\s*${label}:?\\s*</dt>\\s*<dd[^>]*>([\\s\\S]*?)</dd>`, 'i');
  return extractFirst(html, pattern);
}

export function parseProfilePage(html: string): ParsedProfile {
  const sector = extractEmbeddedString(html, 'sector') ?? labelledValue(html, 'Sector');
  const industry = extractEmbeddedString(html, 'industry') ?? labelledValue(html, 'Industry');
  const description =
    extractEmbeddedString(html, 'longBusinessSummary') ??
    extractFirst(html, /<section[^>]*data-testid="description"[^>]*>[\s\S]*?<p[^>]*>([\s\S]*?)<\/p>/i);

  return {
    sector,
    industry,
    summary: description ? firstSentences(description) : null,
  };
}

export class YahooProfileFetcher implements ProfileFetcher {
  readonly name = 'yahoo-finance-profile';
  private readonly urlTemplate: string;
  private readonly timeoutMs: number;

  constructor(options: YahooProfileOptions = {}) {
    this.urlTemplate = options.urlTemplate ?? DEFAULT_PROFILE_URL_TEMPLATE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetch(stockId: string): Promise<CompanyProfile> {
    const url = buildUrl(this.urlTemplate, stockId);
    const html = await fetchYahooPage('Profile page', url, stockId, this.timeoutMs);

    const parsed = parseProfilePage(html);
    if (!parsed.sector && !parsed.industry && !parsed.summary) {
      throw new FetchUnavailable('Profile page structure not recognised: no sector, industry or description', stockId, url);
    }

    logger.info({ stockId, sector: parsed.sector, industry: parsed.industry }, 'Company profile extracted');
    return { source: this.name, ...parsed };
  }
}
