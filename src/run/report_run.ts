/**
 * One report run: load config-driven collaborators, run the pipeline and
 * translate the outcome into an exit code.
 */

import { ReportPipelineError } from '@/core/errors';
import type { AppConfig } from '@/core/config';
import type { EnvConfig } from '@/core/env';
import { loadMetricStore } from '@/data/metric_store';
import { createNarrativeGenerator, type NarrativeGenerator } from '@/llm/adapter';
import { YahooQuotePageFetcher } from '@/providers/yahoo_quote_page';
import { YahooProfileFetcher } from '@/providers/yahoo_profile';
import { YahooAnalystFetcher } from '@/providers/yahoo_analyst';
import { YahooPriceHistoryFetcher } from '@/providers/yahoo_price_history';
import type {
  AnalystFetcher,
  MarketDataFetcher,
  PriceHistoryFetcher,
  ProfileFetcher,
} from '@/providers/types';
import { PdfReportRenderer, type ReportRenderer } from '@/lib/reportGenerator';
import { createChildLogger } from '@/utils/logger';
import { generateStockReport, resolveOutputPaths, type PipelineResult } from './pipeline';

const logger = createChildLogger('report_run');

export interface RunReportOptions {
  config: AppConfig;
  env: EnvConfig;
  withWorkbook?: boolean;
  narrativeGenerator?: NarrativeGenerator;
  marketDataFetcher?: MarketDataFetcher;
  profileFetcher?: ProfileFetcher;
  analystFetcher?: AnalystFetcher;
  priceHistoryFetcher?: PriceHistoryFetcher;
  renderer?: ReportRenderer;
  now?: () => Date;
}

export interface RunReportOutcome {
  exitCode: number;
  result: PipelineResult | null;
  error: ReportPipelineError | null;
}

export async function runReport(stockId: string, options: RunReportOptions): Promise<RunReportOutcome> {
  const { config, env } = options;
  const now = options.now ?? (() => new Date());

  try {
    const store = await loadMetricStore(config.primary, config.peers, {
      idColumn: config.idColumn,
      peerColumn: config.peerColumn,
    });

    const { outputPath, workbookPath } = resolveOutputPaths(
      config,
      stockId,
      options.withWorkbook ?? false,
      now()
    );

    const { market, timeoutMs } = config;
    const result = await generateStockReport(
      stockId,
      {
        store,
        narrativeGenerator:
          options.narrativeGenerator ?? createNarrativeGenerator(env, config.llm, timeoutMs),
        marketDataFetcher:
          options.marketDataFetcher ??
          new YahooQuotePageFetcher({
            urlTemplate: market.urlTemplate,
            figures: market.figures,
            healthFigures: market.healthFigures,
            timeoutMs,
          }),
        profileFetcher:
          options.profileFetcher ?? new YahooProfileFetcher({ urlTemplate: market.profileUrlTemplate, timeoutMs }),
        analystFetcher:
          options.analystFetcher ?? new YahooAnalystFetcher({ urlTemplate: market.analystUrlTemplate, timeoutMs }),
        priceHistoryFetcher:
          options.priceHistoryFetcher ??
          new YahooPriceHistoryFetcher({ urlTemplate: market.historyUrlTemplate, timeoutMs }),
        renderer: options.renderer ?? new PdfReportRenderer(),
      },
      {
        metrics: config.metrics,
        higherIsBetter: config.higherIsBetter,
        percentMetrics: config.percentMetrics,
        outputPath,
        workbookPath,
        now,
      }
    );

    logger.info({ stockId: result.report.stockId, outputPath: result.outputPath }, 'Report complete');
    return { exitCode: 0, result, error: null };
  } catch (error) {
    if (error instanceof ReportPipelineError && error.fatal) {
      logger.error({ stockId, error: error.name, reason: error.message }, 'Report generation failed');
      return { exitCode: 1, result: null, error };
    }
    throw error;
  }
}
