/**
 * Logging with Pino - API keys are redacted
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'openaiApiKey',
  'anthropicApiKey',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
];

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** LOG_LEVEL when it names a pino level; otherwise silent under Vitest and info elsewhere. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === requested);
  return match ?? (env.VITEST ? 'silent' : 'info');
}

/** Pretty output for interactive runs; JSON lines in production and tests. */
export function wantsPrettyOutput(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test' && !env.VITEST;
}

export const logger = pino({
  level: resolveLogLevel(),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: wantsPrettyOutput()
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
