/**
 * LLM Adapter
 * Feature-flagged narrative generation with a template fallback
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import { NarrativeUnavailable, describeError } from '@/core/errors';
import type { EnvConfig, LlmProvider } from '@/core/env';
import type { LlmSettings } from '@/core/config';
import type { Verdict } from '@/scoring/comparator';
import { createChildLogger } from '@/utils/logger';
import { DEFAULT_TIMEOUT_MS, RequestTimeoutError, withTimeout } from '@/utils/http';
import { buildNarrativePrompt, generateTemplateNarrative } from './templates';
import { sanitizeNarrative } from './guardrails';

const logger = createChildLogger('llm_adapter');

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: 'gpt-4o',
  anthropic: 'claude-3-5-sonnet-latest',
};

export type NarrativeSource = 'llm' | 'template' | 'placeholder';

export interface Narrative {
  text: string;
  source: NarrativeSource;
  model: string | null;
}

export interface NarrativeGenerator {
  readonly name: string;
  /** Rejects with NarrativeUnavailable when no commentary could be produced. */
  generate(stockId: string, snapshot: readonly Verdict[]): Promise<Narrative>;
}

export interface CompletionRequest {
  model: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * One provider SDK behind a single-prompt call. `describeFailure` turns the
 * SDK's own error classes into the reason shown in the placeholder.
 */
export interface CompletionClient {
  readonly provider: LlmProvider;
  /** Resolves with the completion text, or null when the response carries none. */
  complete(request: CompletionRequest): Promise<string | null>;
  describeFailure(error: unknown): string;
}

export interface LlmConfig {
  provider: LlmProvider | null;
  apiKey: string | null;
  model: string | null;
  maxTokens: number;
  temperature: number;
  timeoutMs?: number;
  /** Overrides the SDK client built from provider and key (tests, proxies). */
  client?: CompletionClient;
}

/** Transport options shared by both SDK clients. */
export interface SdkClientOptions {
  fetch?: typeof fetch;
  baseURL?: string;
}

function describeStatus(status: number | undefined): string {
  if (status === 401 || status === 403) return `authentication failed (${status})`;
  if (status === 429) return 'quota or rate limit exceeded (429)';
  return status === undefined ? 'no HTTP status' : `HTTP ${status}`;
}

export class OpenAiCompletionClient implements CompletionClient {
  readonly provider = 'openai';
  private readonly client: OpenAI;

  constructor(apiKey: string, options: SdkClientOptions = {}) {
    // Retries are left to whoever reruns the report.
    this.client = new OpenAI({ apiKey, maxRetries: 0, ...options });
  }

  async complete(request: CompletionRequest): Promise<string | null> {
    const completion = await this.client.chat.completions.create(
      {
        model: request.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { timeout: request.timeoutMs, signal: request.signal }
    );
    return completion.choices[0]?.message.content ?? null;
  }

  describeFailure(error: unknown): string {
    if (error instanceof OpenAI.APIConnectionTimeoutError) return 'request timed out';
    if (error instanceof OpenAI.APIConnectionError) return `connection failed: ${error.message}`;
    if (error instanceof OpenAI.APIError) return `rejected: ${describeStatus(error.status)}`;
    return describeError(error);
  }
}

export class AnthropicCompletionClient implements CompletionClient {
  readonly provider = 'anthropic';
  private readonly client: Anthropic;

  constructor(apiKey: string, options: SdkClientOptions = {}) {
    this.client = new Anthropic({ apiKey, maxRetries: 0, ...options });
  }

  async complete(request: CompletionRequest): Promise<string | null> {
    const message = await this.client.messages.create(
      {
        model: request.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { timeout: request.timeoutMs, signal: request.signal }
    );
    const texts = message.content.flatMap((block) => (block.type === 'text' ? [block.text] : []));
    return texts.length > 0 ? texts.join('\n') : null;
  }

  describeFailure(error: unknown): string {
    if (error instanceof Anthropic.APIConnectionTimeoutError) return 'request timed out';
    if (error instanceof Anthropic.APIConnectionError) return `connection failed: ${error.message}`;
    if (error instanceof Anthropic.APIError) return `rejected: ${describeStatus(error.status)}`;
    return describeError(error);
  }
}

export function createCompletionClient(
  provider: LlmProvider,
  apiKey: string,
  options: SdkClientOptions = {}
): CompletionClient {
  return provider === 'openai'
    ? new OpenAiCompletionClient(apiKey, options)
    : new AnthropicCompletionClient(apiKey, options);
}

export class TemplateNarrativeGenerator implements NarrativeGenerator {
  readonly name = 'template';

  async generate(stockId: string, snapshot: readonly Verdict[]): Promise<Narrative> {
    return { text: generateTemplateNarrative(stockId, snapshot), source: 'template', model: null };
  }
}

export class LlmNarrativeGenerator implements NarrativeGenerator {
  readonly name: string;

  constructor(private readonly config: LlmConfig) {
    this.name = `llm:${config.client?.provider ?? config.provider ?? 'unconfigured'}`;
  }

  private resolveClient(): CompletionClient {
    if (this.config.client) return this.config.client;
    const { provider, apiKey } = this.config;
    if (!provider || !apiKey) {
      throw new NarrativeUnavailable('LLM provider or API key not configured', this.name);
    }
    return createCompletionClient(provider, apiKey);
  }

  async generate(stockId: string, snapshot: readonly Verdict[]): Promise<Narrative> {
    const client = this.resolveClient();
    const model = this.config.model ?? DEFAULT_MODELS[client.provider];
    const timeoutMs = this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const prompt = buildNarrativePrompt(stockId, snapshot);
    logger.info({ provider: client.provider, model, stockId }, 'Generating narrative');

    let raw: string | null;
    try {
      raw = await withTimeout(`${client.provider} ${model}`, timeoutMs, (signal) =>
        client.complete({
          model,
          prompt,
          maxTokens: this.config.maxTokens,
          temperature: this.config.temperature,
          timeoutMs,
          signal,
        })
      );
    } catch (error) {
      const reason =
        error instanceof RequestTimeoutError ? `timed out after ${timeoutMs}ms` : client.describeFailure(error);
      throw new NarrativeUnavailable(`LLM request failed: ${reason}`, this.name, error);
    }

    if (raw === null) {
      throw new NarrativeUnavailable('LLM response has no text content', this.name);
    }
    const text = sanitizeNarrative(raw);
    if (!text) {
      throw new NarrativeUnavailable('Model returned an empty completion', this.name);
    }
    return { text, source: 'llm', model };
  }
}

export function createNarrativeGenerator(
  env: Pick<EnvConfig, 'enableLlm' | 'llmProvider' | 'openaiApiKey' | 'anthropicApiKey'>,
  settings: LlmSettings,
  timeoutMs?: number
): NarrativeGenerator {
  if (!env.enableLlm) {
    logger.info('LLM disabled, using template narrative');
    return new TemplateNarrativeGenerator();
  }

  const apiKey =
    env.llmProvider === 'openai'
      ? env.openaiApiKey
      : env.llmProvider === 'anthropic'
        ? env.anthropicApiKey
        : null;

  return new LlmNarrativeGenerator({
    provider: env.llmProvider,
    apiKey,
    model: settings.model,
    maxTokens: settings.maxTokens,
    temperature: settings.temperature,
    timeoutMs,
  });
}
