/**
 * Claude completions for dream forecasts
 *
 * `complete` never throws: callers get `success: false` and fall back to
 * template text.
 */

import Anthropic from '@anthropic-ai/sdk';

import { errorMessage } from '../errors.js';
import { withLinearRetry } from '../transport/retry.js';
import type {
  CompletionOptions,
  CompletionRetry,
  LlmConfig,
  LlmResponse,
  TextCompleter,
  TokenUsage,
} from './types.js';

export const HAIKU_MODEL = 'claude-3-5-haiku-20241022';

/** USD per million tokens */
const HAIKU_PRICE = { input: 0.8, output: 4.0 } as const;

const RETRYABLE_STATUS: ReadonlySet<number> = new Set([429, 500, 502, 503, 504, 529]);

const DEFAULT_RETRY: CompletionRetry = { attempts: 3, delayMs: 1000 };

const NO_USAGE: TokenUsage = { inputTokens: 0, outputTokens: 0, costUsd: 0 };

export function isRetryableApiError(error: unknown): boolean {
  return error instanceof Anthropic.APIError && error.status !== undefined && RETRYABLE_STATUS.has(error.status);
}

function describeFailure(error: unknown): string {
  if (error instanceof Anthropic.AuthenticationError) {
    return 'Claude API authentication failed';
  }
  if (error instanceof Anthropic.APIError) {
    return `Claude API error: ${error.message} (status: ${String(error.status)})`;
  }
  return errorMessage(error);
}

export function haikuUsage(usage: Pick<Anthropic.Usage, 'input_tokens' | 'output_tokens'>): TokenUsage {
  return {
    inputTokens: usage.input_tokens,
    outputTokens: usage.output_tokens,
    costUsd: (usage.input_tokens * HAIKU_PRICE.input + usage.output_tokens * HAIKU_PRICE.output) / 1_000_000,
  };
}

export class ClaudeClient implements TextCompleter {
  private readonly anthropic: Anthropic;

  constructor(
    private readonly config: LlmConfig,
    private readonly retry: CompletionRetry = DEFAULT_RETRY
  ) {
    // Retries are ours; the SDK makes one attempt
    this.anthropic = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
  }

  getModel(): string {
    return this.config.model;
  }

  async complete(
    systemPrompt: string,
    userMessage: string,
    options: CompletionOptions = {}
  ): Promise<LlmResponse<string>> {
    const startedAt = Date.now();
    let retriesUsed = 0;

    try {
      const message = await withLinearRetry(
        () =>
          this.anthropic.messages.create(
            {
              model: this.config.model,
              max_tokens: options.maxTokens ?? this.config.maxTokens ?? 1024,
              temperature: options.temperature ?? this.config.temperature ?? 0,
              system: systemPrompt,
              messages: [{ role: 'user', content: userMessage }],
            },
            options.timeoutMs === undefined ? undefined : { timeout: options.timeoutMs }
          ),
        {
          attempts: this.retry.attempts,
          delayMs: this.retry.delayMs,
          isRetryable: isRetryableApiError,
          onRetry: (attempt) => {
            retriesUsed = attempt;
          },
          sleep: this.retry.sleep,
        }
      );

      const text = message.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('\n')
        .trim();

      return {
        success: true,
        data: text,
        usage: haikuUsage(message.usage),
        durationMs: Date.now() - startedAt,
        stopReason: message.stop_reason,
        retriesUsed,
      };
    } catch (error) {
      return {
        success: false,
        error: describeFailure(error),
        usage: NO_USAGE,
        durationMs: Date.now() - startedAt,
        retryable: isRetryableApiError(error),
        retriesUsed,
      };
    }
  }
}

/**
 * Short, slightly varied narratives
 */
export function createHaikuClient(apiKey: string, retry?: CompletionRetry): ClaudeClient {
  return new ClaudeClient({ apiKey, model: HAIKU_MODEL, maxTokens: 256, temperature: 0.4 }, retry);
}
