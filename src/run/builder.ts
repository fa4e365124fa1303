/**
 * Report Builder
 * Composes verdicts, narrative and the fetched market blocks into the report model
 */

import { verdictTone, type Verdict, type VerdictTone } from '@/scoring/comparator';
import { formatMetricValue, percentMetricSet } from '@/lib/format';
import type { Narrative } from '@/llm/adapter';
import {
  unavailable,
  type AnalystInsights,
  type CompanyProfile,
  type MarketFigures,
  type PriceHistory,
  type Section,
} from '@/providers/types';

export interface ReportRow {
  metricName: string;
  stockValue: number;
  peerMean: number | null;
  peerCount: number;
  tone: VerdictTone;
  displayValue: string;
  displayPeerMean: string;
}

export interface Report {
  stockId: string;
  generatedAt: Date;
  rows: ReportRow[];
  narrative: Narrative;
  market: MarketFigures;
  profile: Section<CompanyProfile>;
  analyst: Section<AnalystInsights>;
  priceHistory: Section<PriceHistory>;
}

export interface BuildReportOptions {
  percentMetrics?: Iterable<string>;
  generatedAt?: Date;
  profile?: Section<CompanyProfile>;
  analyst?: Section<AnalystInsights>;
  priceHistory?: Section<PriceHistory>;
}

const NOT_REQUESTED = 'not requested for this run';

export function buildReportRows(
  verdicts: readonly Verdict[],
  percentMetrics: Iterable<string> = []
): ReportRow[] {
  const percent = percentMetricSet(percentMetrics);
  return verdicts.map((verdict) => ({
    metricName: verdict.metricName,
    stockValue: verdict.stockValue,
    peerMean: verdict.peerMean,
    peerCount: verdict.peerCount,
    tone: verdictTone(verdict),
    displayValue: formatMetricValue(verdict.metricName, verdict.stockValue, percent),
    displayPeerMean: formatMetricValue(verdict.metricName, verdict.peerMean, percent),
  }));
}

export function buildReport(
  stockId: string,
  verdicts: readonly Verdict[],
  narrative: Narrative,
  market: MarketFigures,
  options: BuildReportOptions = {}
): Report {
  return {
    stockId,
    generatedAt: options.generatedAt ?? new Date(),
    rows: buildReportRows(verdicts, options.percentMetrics),
    narrative,
    market,
    profile: options.profile ?? unavailable(NOT_REQUESTED),
    analyst: options.analyst ?? unavailable(NOT_REQUESTED),
    priceHistory: options.priceHistory ?? unavailable(NOT_REQUESTED),
  };
}

export function reportFilename(template: string, stockId: string, date: string): string {
  const safeId = stockId.replace(/[^A-Za-z0-9._-]/g, '_');
  return template.replace(/\{stock\}/g, safeId).replace(/\{date\}/g, date);
}
