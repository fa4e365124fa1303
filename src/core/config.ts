/**
 * Report configuration loaded from config/report.json
 *
 * File paths, the metric list and the higher-is-better subset live here so
 * that adding a metric to the spreadsheets never requires a code change.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { ConfigError, describeError } from './errors';
import { getEnvConfig } from './env';
import { validateReportConfig } from '@/validation/ajv_instance';
import { DEFAULT_HIGHER_IS_BETTER } from '@/scoring/comparator';

export type SheetOrientation = 'rows' | 'columns';

export interface SpreadsheetSource {
  path: string;
  sheet?: string;
  orientation?: SheetOrientation;
}

/** Shape of config/report.json as validated by schemas/report_config.v1.schema.json */
export interface ReportConfigFile {
  primary: SpreadsheetSource;
  peers: SpreadsheetSource;
  idColumn?: string;
  peerColumn?: string;
  metrics?: string[];
  higherIsBetter?: string[];
  percentMetrics?: string[];
  market?: {
    urlTemplate?: string;
    figures?: string[];
    healthFigures?: string[];
    profileUrlTemplate?: string;
    analystUrlTemplate?: string;
    historyUrlTemplate?: string;
  };
  llm?: {
    model?: string;
    maxTokens?: number;
    temperature?: number;
  };
  http?: {
    timeoutMs?: number;
  };
  output?: {
    directory?: string;
    filenameTemplate?: string;
    workbook?: boolean;
  };
}

export interface MarketConfig {
  /** Key-statistics page: header figures and financial health rows */
  urlTemplate: string;
  figures: string[];
  healthFigures: string[];
  profileUrlTemplate: string;
  analystUrlTemplate: string;
  historyUrlTemplate: string;
}

export interface LlmSettings {
  /** null selects the provider's default model */
  model: string | null;
  maxTokens: number;
  temperature: number;
}

export interface OutputConfig {
  directory: string;
  filenameTemplate: string;
  workbook: boolean;
}

export interface AppConfig {
  primary: SpreadsheetSource;
  peers: SpreadsheetSource;
  idColumn: string;
  peerColumn: string;
  metrics: string[];
  higherIsBetter: string[];
  percentMetrics: string[];
  market: MarketConfig;
  llm: LlmSettings;
  timeoutMs: number;
  output: OutputConfig;
  projectRoot: string;
  configPath: string;
}

export const DEFAULT_MARKET_FIGURES = [
  'Market Cap',
  'Trailing P/E',
  'Forward P/E',
  'Price/Sales',
  'Price/Book',
  'Enterprise Value/EBITDA',
  'Forward Annual Dividend Yield',
];

export const DEFAULT_HEALTH_FIGURES = [
  'Total Cash (mrq)',
  'Total Debt (mrq)',
  'Total Debt/Equity (mrq)',
  'Current Ratio (mrq)',
];

export const DEFAULT_URL_TEMPLATE = 'https://finance.yahoo.com/quote/{id}/key-statistics/';
export const DEFAULT_PROFILE_URL_TEMPLATE = 'https://finance.yahoo.com/quote/{id}/profile/';
export const DEFAULT_ANALYST_URL_TEMPLATE = 'https://finance.yahoo.com/quote/{id}/';
export const DEFAULT_HISTORY_URL_TEMPLATE =
  'https://query1.finance.yahoo.com/v8/finance/chart/{id}?range=1y&interval=1d';

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function resolveFromRoot(projectRoot: string, path: string): string {
  return isAbsolute(path) ? path : join(projectRoot, path);
}

function resolveConfigPath(projectRoot: string, override?: string): string {
  const requested = override ?? getEnvConfig().configFile;
  if (requested) {
    return resolveFromRoot(projectRoot, requested);
  }
  return join(projectRoot, 'config', 'report.json');
}

function readConfigFile(configPath: string): ReportConfigFile {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${configPath} (${describeError(error)})`, error);
  }

  const result = validateReportConfig(raw);
  if (!result.valid) {
    throw new ConfigError(`Invalid config ${configPath}: ${result.errors.join('; ')}`);
  }
  return result.data;
}

export function normalizeConfig(
  file: ReportConfigFile,
  projectRoot: string,
  configPath: string
): AppConfig {
  const env = getEnvConfig();

  const withPath = (source: SpreadsheetSource, override: string | null): SpreadsheetSource => ({
    ...source,
    path: resolveFromRoot(projectRoot, override ?? source.path),
  });

  return {
    primary: withPath(file.primary, env.primaryMetricsFile),
    peers: withPath(file.peers, env.peerMetricsFile),
    idColumn: file.idColumn ?? 'Stock',
    peerColumn: file.peerColumn ?? 'Peer',
    metrics: file.metrics ?? [],
    higherIsBetter: file.higherIsBetter ?? [...DEFAULT_HIGHER_IS_BETTER],
    percentMetrics: file.percentMetrics ?? [],
    market: {
      urlTemplate: file.market?.urlTemplate ?? DEFAULT_URL_TEMPLATE,
      figures: file.market?.figures ?? [...DEFAULT_MARKET_FIGURES],
      healthFigures: file.market?.healthFigures ?? [...DEFAULT_HEALTH_FIGURES],
      profileUrlTemplate: file.market?.profileUrlTemplate ?? DEFAULT_PROFILE_URL_TEMPLATE,
      analystUrlTemplate: file.market?.analystUrlTemplate ?? DEFAULT_ANALYST_URL_TEMPLATE,
      historyUrlTemplate: file.market?.historyUrlTemplate ?? DEFAULT_HISTORY_URL_TEMPLATE,
    },
    llm: {
      model: env.llmModel ?? file.llm?.model ?? null,
      maxTokens: file.llm?.maxTokens ?? 700,
      temperature: file.llm?.temperature ?? 0.2,
    },
    timeoutMs: file.http?.timeoutMs ?? 15000,
    output: {
      directory: resolveFromRoot(
        projectRoot,
        env.reportOutputDir ?? file.output?.directory ?? 'reports'
      ),
      filenameTemplate: file.output?.filenameTemplate ?? '{stock}_Analysis_{date}.pdf',
      workbook: file.output?.workbook ?? false,
    },
    projectRoot,
    configPath,
  };
}

export function loadConfig(configFile?: string): AppConfig {
  const projectRoot = getProjectRoot();
  const configPath = resolveConfigPath(projectRoot, configFile);
  return normalizeConfig(readConfigFile(configPath), projectRoot, configPath);
}

export function getConfig(configFile?: string): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(configFile);
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
