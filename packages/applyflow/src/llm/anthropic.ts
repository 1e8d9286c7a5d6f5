import Anthropic from '@anthropic-ai/sdk';
import type { CompletionOptions, LLMCapability, ModelHint } from '../workers/stageExecutors/types.js';

export interface AnthropicModels {
  analysis: string;
  generation: string;
}

export interface AnthropicLLMOptions {
  apiKey?: string;
  models: AnthropicModels;
  /** Pre-built client, e.g. one with a custom base URL */
  client?: Anthropic;
  defaultMaxTokens?: number;
}

/** Thrown on HTTP 429 so the scheduler can honour the server's retry hint. */
export class LLMRateLimitError extends Error {
  readonly status = 429;

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'LLMRateLimitError';
  }
}

function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.ceil(seconds * 1000) : undefined;
}

/**
 * Extract the text content from the first text block in an Anthropic API response.
 * Returns an empty string if no text block is found.
 */
export function extractResponseText(response: Anthropic.Message): string {
  const firstBlock = response.content[0];
  return firstBlock?.type === 'text' ? firstBlock.text : '';
}

export class AnthropicLLMCapability implements LLMCapability {
  readonly provider = 'anthropic';
  private readonly client: Anthropic;
  private readonly models: AnthropicModels;
  private readonly defaultMaxTokens: number;

  constructor(opts: AnthropicLLMOptions) {
    if (!opts.client && !opts.apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required for the Anthropic LLM capability');
    }
    this.client = opts.client ?? new Anthropic({ apiKey: opts.apiKey });
    this.models = opts.models;
    this.defaultMaxTokens = opts.defaultMaxTokens ?? 4096;
  }

  async complete(prompt: string, modelHint: ModelHint, opts: CompletionOptions = {}): Promise<string> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.models[modelHint],
          max_tokens: opts.maxTokens ?? this.defaultMaxTokens,
          ...(opts.system ? { system: opts.system } : {}),
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: opts.signal },
      );
      return extractResponseText(response);
    } catch (err) {
      if (err instanceof Anthropic.RateLimitError) {
        throw new LLMRateLimitError(err.message, parseRetryAfter(err.headers?.['retry-after']));
      }
      throw err;
    }
  }
}
