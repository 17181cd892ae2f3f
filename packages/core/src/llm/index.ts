export { ClaudeClient, HAIKU_MODEL, createHaikuClient, haikuUsage, isRetryableApiError } from './client.js';
export type {
  CompletionOptions,
  CompletionRetry,
  LlmConfig,
  LlmResponse,
  TextCompleter,
  TokenUsage,
} from './types.js';
