/**
 * Generate the one-page report for a stock
 *
 * Usage: npx tsx scripts/generate_report.ts <STOCK_ID> [--xlsx] [--config=path]
 */

import './load_env';
import { ConfigError, describeError } from '../src/core/errors';
import { getConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { runReport } from '../src/run/report_run';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('generate_report');

interface CliArgs {
  stockId: string | null;
  withWorkbook: boolean;
  configFile: string | undefined;
}

function parseArgs(argv: string[]): CliArgs {
  const configArg = argv.find((arg) => arg.startsWith('--config='));
  const positional = argv.filter((arg) => !arg.startsWith('--'));
  return {
    stockId: positional[0]?.trim() || null,
    withWorkbook: argv.includes('--xlsx'),
    configFile: configArg ? configArg.slice('--config='.length) : undefined,
  };
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.stockId) {
    logger.error('Usage: generate_report <STOCK_ID> [--xlsx] [--config=path]');
    return 1;
  }

  try {
    const config = getConfig(args.configFile);
    const env = getEnvConfig();
    const outcome = await runReport(args.stockId, { config, env, withWorkbook: args.withWorkbook });
    if (outcome.result) {
      logger.info({ pdf: outcome.result.outputPath, workbook: outcome.result.workbookPath }, 'Done');
    }
    return outcome.exitCode;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error({ reason: error.message }, 'Configuration error');
      return 1;
    }
    logger.error({ error: describeError(error) }, 'Unexpected failure');
    return 1;
  }
}

main().then((code) => {
  process.exitCode = code;
});
