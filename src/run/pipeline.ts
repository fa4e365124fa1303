/**
 * Report pipeline
 *
 * Metric store -> comparator -> (narrative || market blocks) -> renderer.
 * The external calls run side by side and each one degrades to a
 * placeholder on its own recoverable error. Data-load and PDF render
 * failures abort the run; the companion workbook is best effort.
 */

import { join } from 'path';
import { FetchUnavailable, NarrativeUnavailable, RenderError } from '@/core/errors';
import type { AppConfig } from '@/core/config';
import type { MetricStore } from '@/data/metric_store';
import { normalizeStockId } from '@/data/metric_store';
import { compareStock, type Verdict } from '@/scoring/comparator';
import type { Narrative, NarrativeGenerator } from '@/llm/adapter';
import { placeholderNarrative } from '@/llm/templates';
import {
  unavailable,
  type AnalystFetcher,
  type MarketDataFetcher,
  type PriceHistoryFetcher,
  type ProfileFetcher,
  type Section,
  type SectionFetcher,
} from '@/providers/types';
import { writeReportFile, type ReportRenderer } from '@/lib/reportGenerator';
import { generateReportWorkbook } from '@/lib/excelExport';
import { filenameDate } from '@/lib/format';
import { createChildLogger } from '@/utils/logger';
import { buildReport, reportFilename, type Report } from './builder';

const logger = createChildLogger('pipeline');

export interface PipelineDependencies {
  store: MetricStore;
  narrativeGenerator: NarrativeGenerator;
  marketDataFetcher: MarketDataFetcher;
  /** Blocks without a fetcher are shown as not requested. */
  profileFetcher?: ProfileFetcher;
  analystFetcher?: AnalystFetcher;
  priceHistoryFetcher?: PriceHistoryFetcher;
  renderer: ReportRenderer;
}

export interface PipelineOptions {
  metrics?: readonly string[];
  higherIsBetter?: readonly string[];
  percentMetrics?: readonly string[];
  outputPath: string;
  workbookPath?: string | null;
  now?: () => Date;
}

export interface PipelineResult {
  report: Report;
  verdicts: Verdict[];
  outputPath: string;
  workbookPath: string | null;
}

export async function narrativeOrPlaceholder(
  generator: NarrativeGenerator,
  stockId: string,
  verdicts: readonly Verdict[]
): Promise<Narrative> {
  try {
    return await generator.generate(stockId, verdicts);
  } catch (error) {
    if (!(error instanceof NarrativeUnavailable)) throw error;
    logger.warn({ stockId, generator: generator.name, reason: error.message }, 'Narrative unavailable, using placeholder');
    return { text: placeholderNarrative(error.message), source: 'placeholder', model: null };
  }
}

export async function sectionOrUnavailable<T extends object>(
  fetcher: SectionFetcher<T> | undefined,
  stockId: string,
  what: string
): Promise<Section<T>> {
  if (!fetcher) return unavailable('not requested for this run');
  try {
    return await fetcher.fetch(stockId);
  } catch (error) {
    if (!(error instanceof FetchUnavailable)) throw error;
    logger.warn({ stockId, fetcher: fetcher.name, reason: error.message }, `${what} unavailable`);
    return unavailable(error.message);
  }
}

async function writeWorkbook(report: Report, workbookPath: string): Promise<string | null> {
  try {
    await writeReportFile(workbookPath, await generateReportWorkbook(report));
  } catch (error) {
    if (!(error instanceof RenderError)) throw error;
    logger.warn({ stockId: report.stockId, workbookPath, reason: error.message }, 'Workbook not written');
    return null;
  }
  logger.info({ stockId: report.stockId, workbookPath }, 'Workbook written');
  return workbookPath;
}

export async function generateStockReport(
  rawStockId: string,
  deps: PipelineDependencies,
  options: PipelineOptions
): Promise<PipelineResult> {
  const stockId = normalizeStockId(rawStockId);
  const verdicts = compareStock(deps.store, stockId, {
    metrics: options.metrics,
    higherIsBetter: options.higherIsBetter,
  });

  const [narrative, market, profile, analyst, priceHistory] = await Promise.all([
    narrativeOrPlaceholder(deps.narrativeGenerator, stockId, verdicts),
    sectionOrUnavailable(deps.marketDataFetcher, stockId, 'Market data'),
    sectionOrUnavailable(deps.profileFetcher, stockId, 'Company profile'),
    sectionOrUnavailable(deps.analystFetcher, stockId, 'Analyst view'),
    sectionOrUnavailable(deps.priceHistoryFetcher, stockId, 'Price history'),
  ]);

  const report = buildReport(stockId, verdicts, narrative, market, {
    percentMetrics: options.percentMetrics,
    generatedAt: options.now?.(),
    profile,
    analyst,
    priceHistory,
  });

  await deps.renderer.render(report, options.outputPath);

  const workbookPath = options.workbookPath ? await writeWorkbook(report, options.workbookPath) : null;

  return { report, verdicts, outputPath: options.outputPath, workbookPath };
}

export function resolveOutputPaths(
  config: Pick<AppConfig, 'output'>,
  stockId: string,
  withWorkbook: boolean,
  date: Date = new Date()
): { outputPath: string; workbookPath: string | null } {
  const name = reportFilename(config.output.filenameTemplate, normalizeStockId(stockId), filenameDate(date));
  const outputPath = join(config.output.directory, name);
  const workbookPath =
    withWorkbook || config.output.workbook ? outputPath.replace(/\.pdf$/i, '') + '.xlsx' : null;
  return { outputPath, workbookPath };
}
