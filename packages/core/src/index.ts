/**
 * @sprint-garden/core
 *
 * Tracker webhooks in, garden triggers out. Holds the ticket model,
 * provider adapters, event classifiers, the event processor and the
 * dreaming engine shared by the server and the scripts.
 */

// Types, schemas and errors
export * from './types/index.js';
export * from './schemas/index.js';
export * from './constants.js';
export * from './errors.js';
export { Logger, logger, parseLogLevel, silentLogger, type LogLevel, type LogSink, type LoggerOptions } from './logger.js';
export { isRecord, ownString } from './guards.js';

// Tickets
export {
  blockedBy,
  blocking,
  createTicket,
  dedupeRelations,
  detectProvider,
  isBlocked,
  parseTimestamp,
  ticketToJSON,
  type TicketInit,
} from './tickets/ticket.js';

// Transport
export { RateLimiter, type RateLimiterOptions } from './transport/rate-limiter.js';
export {
  CircuitBreaker,
  CircuitBreakerOpenError,
  type CircuitBreakerOptions,
  type CircuitBreakerState,
} from './transport/circuit-breaker.js';
export { HttpClient, type HttpClientOptions, type HttpRequestOptions } from './transport/http-client.js';
export {
  isRetryableTransportError,
  retryDelay,
  sleep,
  withLinearRetry,
  type LinearRetryOptions,
} from './transport/retry.js';

// Providers and classification
export * from './providers/index.js';
export * from './classify/index.js';

// Garden, processing and queue
export * from './garden/index.js';
export * from './processor/index.js';
export * from './queue/index.js';

// Dreaming and persistence
export * from './dreaming/index.js';
export { DynamoDBClient, DynamoDBError, DreamRepository } from './db/index.js';
export type { DynamoDBItem, QueryOptions, QueryResult } from './db/index.js';

// LLM
export * from './llm/index.js';
