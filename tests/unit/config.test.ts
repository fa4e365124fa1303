import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { getConfig, loadConfig, resetConfig } from '@/core/config';
import { loadEnvConfig, resetEnvConfig } from '@/core/env';
import { ConfigError } from '@/core/errors';

let tempDir: string;

function writeConfig(content: unknown): string {
  const path = join(tempDir, 'report.json');
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
  return path;
}

const minimal = {
  primary: { path: 'data/primary.xlsx' },
  peers: { path: 'data/peers.xlsx', sheet: 'Peers', orientation: 'columns' },
};

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'report-config-'));
  for (const name of ['CONFIG_FILE', 'PRIMARY_METRICS_FILE', 'PEER_METRICS_FILE', 'REPORT_OUTPUT_DIR', 'LLM_MODEL', 'ENABLE_LLM', 'LLM_PROVIDER']) {
    vi.stubEnv(name, '');
  }
  resetConfig();
  resetEnvConfig();
});

afterEach(() => {
  vi.unstubAllEnvs();
  resetConfig();
  resetEnvConfig();
  rmSync(tempDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('fills defaults and resolves paths from the working directory', () => {
    const config = loadConfig(writeConfig(minimal));

    expect(config.primary).toEqual({ path: join(process.cwd(), 'data/primary.xlsx') });
    expect(config.peers).toEqual({
      path: join(process.cwd(), 'data/peers.xlsx'),
      sheet: 'Peers',
      orientation: 'columns',
    });
    expect(config.idColumn).toBe('Stock');
    expect(config.peerColumn).toBe('Peer');
    expect(config.higherIsBetter).toEqual(['Dividend Yield']);
    expect(config.llm).toEqual({ model: null, maxTokens: 700, temperature: 0.2 });
    expect(config.timeoutMs).toBe(15000);
    expect(config.output).toEqual({
      directory: join(process.cwd(), 'reports'),
      filenameTemplate: '{stock}_Analysis_{date}.pdf',
      workbook: false,
    });
  });

  it('accepts the bundled configuration', () => {
    const config = loadConfig(join(process.cwd(), 'config', 'report.json'));

    expect(config.metrics).toEqual(['P/E TTM', 'EV/EBITDA', 'P/S TTM', 'P/NAV', 'Dividend Yield']);
    expect(config.market.urlTemplate).toBe('https://finance.yahoo.com/quote/{id}/key-statistics/');
    expect(config.market.healthFigures).toEqual([
      'Total Cash (mrq)',
      'Total Debt (mrq)',
      'Total Debt/Equity (mrq)',
      'Current Ratio (mrq)',
    ]);
    expect(config.market.historyUrlTemplate).toBe(
      'https://query1.finance.yahoo.com/v8/finance/chart/{id}?range=1y&interval=1d'
    );
  });

  it('rejects a profile URL without the identifier placeholder', () => {
    const path = writeConfig({ ...minimal, market: { profileUrlTemplate: 'https://quotes.example.test/profile' } });
    expect(() => loadConfig(path)).toThrow('/market/profileUrlTemplate: must match pattern');
  });

  it('applies environment overrides', () => {
    vi.stubEnv('PRIMARY_METRICS_FILE', '/srv/data/alt.xlsx');
    vi.stubEnv('REPORT_OUTPUT_DIR', 'out');
    vi.stubEnv('LLM_MODEL', 'test-model');

    const config = loadConfig(writeConfig(minimal));

    expect(config.primary.path).toBe('/srv/data/alt.xlsx');
    expect(config.output.directory).toBe(join(process.cwd(), 'out'));
    expect(config.llm.model).toBe('test-model');
  });

  it('reads the config path from CONFIG_FILE', () => {
    const path = writeConfig({ ...minimal, idColumn: 'Ticker' });
    vi.stubEnv('CONFIG_FILE', path);

    expect(loadConfig().idColumn).toBe('Ticker');
  });

  it('rejects a config without peers', () => {
    const path = writeConfig({ primary: minimal.primary });

    expect(() => loadConfig(path)).toThrow(ConfigError);
    expect(() => loadConfig(path)).toThrow("root: must have required property 'peers'");
  });

  it('rejects unknown keys', () => {
    const path = writeConfig({ ...minimal, colour: 'green' });
    expect(() => loadConfig(path)).toThrow('root: must NOT have additional properties');
  });

  it('rejects a quote URL without the identifier placeholder', () => {
    const path = writeConfig({ ...minimal, market: { urlTemplate: 'https://quotes.example.test/key-stats' } });
    expect(() => loadConfig(path)).toThrow('/market/urlTemplate: must match pattern');
  });

  it('rejects malformed JSON', () => {
    const path = writeConfig('{ "primary": ');
    expect(() => loadConfig(path)).toThrow(`Config file is not valid JSON: ${path}`);
  });

  it('rejects a missing file', () => {
    const path = join(tempDir, 'absent.json');
    expect(() => loadConfig(path)).toThrow(`Config file not found: ${path}`);
  });

  it('caches until reset', () => {
    const path = writeConfig(minimal);
    const first = getConfig(path);

    expect(getConfig(path)).toBe(first);
    resetConfig();
    expect(getConfig(path)).not.toBe(first);
  });
});

describe('loadEnvConfig', () => {
  it('leaves a missing key of an enabled provider unset', () => {
    vi.stubEnv('ENABLE_LLM', 'true');
    vi.stubEnv('LLM_PROVIDER', 'openai');
    vi.stubEnv('OPENAI_API_KEY', '');

    const env = loadEnvConfig();
    expect(env.enableLlm).toBe(true);
    expect(env.openaiApiKey).toBeNull();
  });

  it('loads the report config when the LLM key is missing', () => {
    vi.stubEnv('ENABLE_LLM', 'true');
    vi.stubEnv('LLM_PROVIDER', 'anthropic');
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    expect(loadConfig(writeConfig(minimal)).idColumn).toBe('Stock');
  });

  it('reads the provider key when present', () => {
    vi.stubEnv('ENABLE_LLM', 'true');
    vi.stubEnv('LLM_PROVIDER', 'anthropic');
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-key');

    const env = loadEnvConfig();
    expect(env.llmProvider).toBe('anthropic');
    expect(env.anthropicApiKey).toBe('test-key');
    expect(env.openaiApiKey).toBeNull();
  });

  it('disables the LLM by default', () => {
    vi.stubEnv('ENABLE_LLM', '');
    expect(loadEnvConfig().enableLlm).toBe(false);
  });
});
