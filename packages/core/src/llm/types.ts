/**
 * Text completion contracts
 */

export interface LlmConfig {
  apiKey: string;
  model: string;
  maxTokens?: number;
  temperature?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
}

/**
 * Outcome of one completion. Failures are values, not exceptions.
 */
export interface LlmResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  usage: TokenUsage;
  durationMs?: number;
  stopReason?: string | null;
  retryable?: boolean;
  retriesUsed?: number;
}

/** Attempts in total, with linear backoff between them */
export interface CompletionRetry {
  attempts: number;
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  /** The request is abandoned, not retried, when this expires */
  timeoutMs?: number;
}

export interface TextCompleter {
  complete(
    systemPrompt: string,
    userMessage: string,
    options?: CompletionOptions
  ): Promise<LlmResponse<string>>;
}
