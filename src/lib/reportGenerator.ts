/**
 * Report Renderer
 * Turns the report model into the single-page PDF and writes it to disk
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { RenderError, describeError } from '@/core/errors';
import type { NarrativeSource } from '@/llm/adapter';
import {
  isUnavailable,
  type AnalystInsights,
  type CompanyProfile,
  type FigureEntry,
  type PriceHistory,
  type Section,
} from '@/providers/types';
import { impliedUpside } from '@/providers/yahoo_analyst';
import { buildPriceTrend, LONG_WINDOW, SHORT_WINDOW } from '@/scoring/technical';
import type { Report } from '@/run/builder';
import { createChildLogger } from '@/utils/logger';
import { formatNumber, formatTimestamp, money, EMPTY_VALUE } from './format';
import {
  renderStockPage,
  type ChartData,
  type NarrativeBlock,
  type PanelData,
  type StockPageDocumentData,
} from './reportGeneratorDocument';

const logger = createChildLogger('report_renderer');

export interface ReportRenderer {
  /** Rejects with RenderError when the document could not be written. */
  render(report: Report, outputPath: string): Promise<void>;
}

export const CHART_WIDTH = 500;
export const CHART_HEIGHT = 120;

const VERDICT_LABELS = {
  favorable: 'Favourable',
  unfavorable: 'Unfavourable',
  undetermined: 'No peer data',
} as const;

const NARRATIVE_SOURCE_LABELS: Record<NarrativeSource, string> = {
  llm: 'Generated by a language model; verify before relying on it.',
  template: 'Generated from the metric comparison.',
  placeholder: 'Commentary could not be generated for this run.',
};

/** Short lines without a bullet or closing punctuation are section titles. */
export function parseNarrativeBlocks(text: string): NarrativeBlock[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line): NarrativeBlock => {
      if (/^[-•]\s+/.test(line)) {
        return { kind: 'bullet', text: line.replace(/^[-•]\s+/, '') };
      }
      if (line.length <= 40 && !/[.!?)]$/.test(line)) {
        return { kind: 'heading', text: line.replace(/:$/, '') };
      }
      return { kind: 'text', text: line };
    });
}

function signedPercent(fraction: number): string {
  const percent = fraction * 100;
  return `${percent >= 0 ? '+' : ''}${percent.toFixed(1)}%`;
}

function priceText(value: number | null, currency: string | null): string {
  if (value === null) return EMPTY_VALUE;
  return currency ? money(value, currency) : value.toFixed(2);
}

function unavailablePanel(what: string, reason: string): PanelData {
  return { available: false, note: `${what} unavailable: ${reason}`, entries: [], text: null };
}

export function buildOverviewPanel(profile: Section<CompanyProfile>): PanelData {
  if (isUnavailable(profile)) return unavailablePanel('Company profile', profile.reason);
  return {
    available: true,
    note: null,
    entries: [
      { label: 'Sector', value: profile.sector ?? EMPTY_VALUE },
      { label: 'Industry', value: profile.industry ?? EMPTY_VALUE },
    ],
    text: profile.summary,
  };
}

export function buildHealthPanel(market: Report['market']): PanelData {
  if (isUnavailable(market)) return unavailablePanel('Financial health', market.reason);
  if (market.health.length === 0) {
    return { available: false, note: 'Financial health unavailable: no balance-sheet figures on the page', entries: [], text: null };
  }
  return { available: true, note: null, entries: market.health, text: null };
}

export function buildAnalystPanel(analyst: Section<AnalystInsights>, currency: string | null): PanelData {
  if (isUnavailable(analyst)) return unavailablePanel('Analyst insights', analyst.reason);

  const upside = impliedUpside(analyst);
  const entries: FigureEntry[] = [
    { label: 'Recommendation', value: analyst.recommendation?.toUpperCase() ?? EMPTY_VALUE },
    { label: 'Rating (1 buy - 5 sell)', value: formatNumber(analyst.recommendationMean, 1) },
    { label: 'Analysts', value: analyst.analystCount === null ? EMPTY_VALUE : String(analyst.analystCount) },
    { label: 'Mean target', value: priceText(analyst.targetMeanPrice, currency) },
    { label: 'Implied upside', value: upside === null ? EMPTY_VALUE : signedPercent(upside) },
  ];
  return { available: true, note: null, entries, text: null };
}

function scalePoints(values: ReadonlyArray<number | null>, total: number, low: number, high: number): string {
  const span = high - low;
  const step = total > 1 ? CHART_WIDTH / (total - 1) : 0;
  return values
    .flatMap((value, index) => {
      if (value === null) return [];
      const y = span === 0 ? CHART_HEIGHT / 2 : CHART_HEIGHT - ((value - low) / span) * CHART_HEIGHT;
      return [`${(index * step).toFixed(1)},${y.toFixed(1)}`];
    })
    .join(' ');
}

/** Polyline coordinates for the close and its moving averages, scaled to the chart box. */
export function buildChartData(history: Section<PriceHistory>): ChartData {
  const trend = isUnavailable(history) ? null : buildPriceTrend(history.points);
  if (isUnavailable(history) || !trend) {
    const reason = isUnavailable(history) ? history.reason : 'not enough closing prices';
    return { available: false, note: `Price chart unavailable: ${reason}` };
  }

  const total = trend.points.length;
  const closes = trend.points.map((point) => point.close);
  return {
    available: true,
    width: CHART_WIDTH,
    height: CHART_HEIGHT,
    close: scalePoints(closes, total, trend.low, trend.high),
    shortAverage: scalePoints(trend.shortAverage, total, trend.low, trend.high),
    longAverage: scalePoints(trend.longAverage, total, trend.low, trend.high),
    shortLabel: `${SHORT_WINDOW}-day MA`,
    longLabel: `${LONG_WINDOW}-day MA`,
    caption: [
      `${priceText(trend.first.close, history.currency)} to ${priceText(trend.last.close, history.currency)}`,
      `(${signedPercent(trend.change)})`,
      `range ${priceText(trend.low, history.currency)} - ${priceText(trend.high, history.currency)}`,
    ].join(' '),
  };
}

export function buildStockPageData(report: Report): StockPageDocumentData {
  const market = report.market;
  const favorable = report.rows.filter((row) => row.tone === 'favorable').length;
  const compared = report.rows.filter((row) => row.tone !== 'undetermined').length;

  const marketFields = isUnavailable(market)
    ? {
        companyName: null,
        priceLabel: 'Unavailable',
        marketAvailable: false,
        marketNote: `Market data unavailable: ${market.reason}`,
        figures: [],
      }
    : {
        companyName: market.companyName,
        priceLabel: priceText(market.price, market.currency),
        marketAvailable: true,
        marketNote: `Source: ${market.source}, fetched ${formatTimestamp(new Date(market.fetchedAt))}`,
        figures: market.figures,
      };

  return {
    stockId: report.stockId,
    generatedAt: formatTimestamp(report.generatedAt),
    ...marketFields,
    overview: buildOverviewPanel(report.profile),
    health: buildHealthPanel(market),
    analyst: buildAnalystPanel(report.analyst, isUnavailable(market) ? null : market.currency),
    chart: buildChartData(report.priceHistory),
    rows: report.rows.map((row) => ({
      metricName: row.metricName,
      value: row.displayValue,
      peerMean: row.displayPeerMean,
      peers: String(row.peerCount),
      verdictLabel: VERDICT_LABELS[row.tone],
      tone: row.tone,
    })),
    summaryLine: `${favorable} of ${compared} compared metrics favourable against the peer average.`,
    narrativeBlocks: parseNarrativeBlocks(report.narrative.text),
    narrativeSourceLabel: NARRATIVE_SOURCE_LABELS[report.narrative.source],
  };
}

export async function writeReportFile(outputPath: string, content: Buffer): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content);
  } catch (error) {
    throw new RenderError(`Cannot write ${outputPath}: ${describeError(error)}`, outputPath, error);
  }
}

export async function renderReportToFile(report: Report, outputPath: string): Promise<void> {
  let pdf: Buffer;
  try {
    pdf = await renderStockPage(buildStockPageData(report));
  } catch (error) {
    throw new RenderError(`PDF rendering failed: ${describeError(error)}`, outputPath, error);
  }

  await writeReportFile(outputPath, pdf);
  logger.info({ stockId: report.stockId, outputPath, bytes: pdf.length }, 'Report written');
}

export class PdfReportRenderer implements ReportRenderer {
  async render(report: Report, outputPath: string): Promise<void> {
    await renderReportToFile(report, outputPath);
  }
}
