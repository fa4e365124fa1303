/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

export type LlmProvider = 'openai' | 'anthropic';

export interface EnvConfig {
  enableLlm: boolean;
  llmProvider: LlmProvider | null;
  llmModel: string | null;
  openaiApiKey: string | null;
  anthropicApiKey: string | null;
  primaryMetricsFile: string | null;
  peerMetricsFile: string | null;
  reportOutputDir: string | null;
  configFile: string | null;
}

function getEnvVar(name: string): string | null {
  const value = process.env[name]?.trim();
  return value ? value : null;
}

export function loadEnvConfig(): EnvConfig {
  const enableLlm = getEnvVar('ENABLE_LLM') === 'true';
  const llmProviderRaw = getEnvVar('LLM_PROVIDER');
  const llmProvider: LlmProvider | null =
    llmProviderRaw === 'openai' || llmProviderRaw === 'anthropic' ? llmProviderRaw : null;

  return {
    enableLlm,
    llmProvider,
    llmModel: getEnvVar('LLM_MODEL'),
    // A missing key is not fatal: the narrative generator reports it and the report uses a placeholder.
    openaiApiKey: enableLlm && llmProvider === 'openai' ? getEnvVar('OPENAI_API_KEY') : null,
    anthropicApiKey: enableLlm && llmProvider === 'anthropic' ? getEnvVar('ANTHROPIC_API_KEY') : null,
    primaryMetricsFile: getEnvVar('PRIMARY_METRICS_FILE'),
    peerMetricsFile: getEnvVar('PEER_METRICS_FILE'),
    reportOutputDir: getEnvVar('REPORT_OUTPUT_DIR'),
    configFile: getEnvVar('CONFIG_FILE'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
