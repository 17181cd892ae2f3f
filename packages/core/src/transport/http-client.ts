/**
 * JSON-over-HTTP helper shared by the provider adapters
 *
 * Each call waits for a rate-limit slot, retries transport failures with
 * linear backoff (honouring Retry-After on 429) and runs behind a circuit
 * breaker. Client errors (4xx other than 429) are not retried and do not
 * count against the breaker.
 */

import { errorMessage, TransportError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { RateLimiter } from './rate-limiter.js';
import { sleep as defaultSleep, withLinearRetry } from './retry.js';

export interface HttpClientOptions {
  serviceName: string;
  baseUrl: string;
  headers?: () => Record<string, string>;
  rateLimiter?: RateLimiter;
  circuitBreaker?: CircuitBreaker;
  retryAttempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface HttpRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  query?: Record<string, string | number | undefined>;
  body?: unknown;
}

type Outcome = { value: unknown } | { clientError: TransportError };

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = parseInt(header, 10);
  return Number.isNaN(seconds) || seconds < 0 ? undefined : seconds * 1000;
}

function isClientError(error: unknown): error is TransportError {
  return (
    error instanceof TransportError &&
    error.status !== undefined &&
    error.status >= 400 &&
    error.status < 500 &&
    error.status !== 429
  );
}

export class HttpClient {
  private readonly rateLimiter: RateLimiter;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(private readonly options: HttpClientOptions) {
    this.rateLimiter = options.rateLimiter ?? new RateLimiter({ sleep: options.sleep });
    this.breaker = options.circuitBreaker ?? new CircuitBreaker({ serviceName: options.serviceName });
    this.logger = (options.logger ?? defaultLogger).child({ service: options.serviceName });
  }

  /**
   * Perform a request and return the decoded JSON body (null when empty)
   *
   * @throws {TransportError} on network failure, timeout or non-2xx status
   */
  async request(path: string, options: HttpRequestOptions = {}): Promise<unknown> {
    const outcome = await this.breaker.execute(async (): Promise<Outcome> => {
      try {
        const value = await withLinearRetry(() => this.send(path, options), {
          attempts: this.options.retryAttempts ?? 3,
          delayMs: this.options.retryDelayMs ?? 1000,
          sleep: this.options.sleep ?? defaultSleep,
          onRetry: (attempt, error, delayMs) =>
            this.logger.warn('Retrying request', {
              path,
              attempt,
              delayMs,
              error: errorMessage(error),
            }),
        });
        return { value };
      } catch (error) {
        if (isClientError(error)) {
          return { clientError: error };
        }
        throw error;
      }
    });

    if ('clientError' in outcome) {
      throw outcome.clientError;
    }
    return outcome.value;
  }

  private async send(path: string, options: HttpRequestOptions): Promise<unknown> {
    await this.rateLimiter.acquire();

    const url = this.buildUrl(path, options.query);
    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method ?? 'GET',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          ...this.options.headers?.(),
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
      });
    } catch (error) {
      throw new TransportError(`${this.options.serviceName} request failed: ${errorMessage(error)}`);
    }

    const text = await response.text();

    if (!response.ok) {
      const status = response.status;
      throw new TransportError(
        `${this.options.serviceName} API error: ${status} ${response.statusText} - ${text.slice(0, 500)}`,
        status,
        status === 429 || status >= 500,
        status === 429 ? parseRetryAfter(response.headers.get('Retry-After')) : undefined
      );
    }

    if (!text) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new TransportError(
        `${this.options.serviceName} returned invalid JSON`,
        response.status,
        false
      );
    }
  }

  private buildUrl(path: string, query?: HttpRequestOptions['query']): string {
    const url = new URL(path, this.options.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }
}
