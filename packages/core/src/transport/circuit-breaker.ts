/**
 * Per-provider circuit breaker
 *
 * Closed counts consecutive failures. Once the threshold is reached the
 * breaker opens and rejects calls until `resetTimeoutMs` has passed, then
 * lets a single probe through (half-open).
 */

import { PROVIDER_CIRCUIT_BREAKER } from '../constants.js';
import { TransportError } from '../errors.js';

export type CircuitBreakerState = 'closed' | 'open' | 'half-open';

/** Not retryable: the caller should wait out `retryAfterMs` */
export class CircuitBreakerOpenError extends TransportError {
  constructor(
    public readonly serviceName: string,
    retryAfterMs: number
  ) {
    super(`${serviceName} is unavailable, retry in ${Math.ceil(retryAfterMs / 1000)}s`, undefined, false, retryAfterMs);
    this.name = 'CircuitBreakerOpenError';
  }
}

export interface CircuitBreakerOptions {
  serviceName?: string;
  failureThreshold?: number;
  resetTimeoutMs?: number;
  now?: () => number;
}

export class CircuitBreaker {
  readonly serviceName: string;
  private readonly threshold: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;

  private consecutiveFailures = 0;
  /** Set while open; the breaker half-opens at this time */
  private probeAt: number | null = null;

  constructor(options: CircuitBreakerOptions = {}) {
    this.serviceName = options.serviceName ?? 'unknown';
    this.threshold = options.failureThreshold ?? PROVIDER_CIRCUIT_BREAKER.FAILURE_THRESHOLD;
    this.resetTimeoutMs = options.resetTimeoutMs ?? PROVIDER_CIRCUIT_BREAKER.RESET_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  getState(): CircuitBreakerState {
    if (this.probeAt === null) {
      return 'closed';
    }
    return this.now() >= this.probeAt ? 'half-open' : 'open';
  }

  getFailureCount(): number {
    return this.consecutiveFailures;
  }

  /**
   * @throws {CircuitBreakerOpenError} without calling `operation` while open
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const state = this.getState();
    if (state === 'open' && this.probeAt !== null) {
      throw new CircuitBreakerOpenError(this.serviceName, this.probeAt - this.now());
    }

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      this.recordFailure(state === 'half-open');
      throw error;
    }
    this.reset();
    return result;
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.probeAt = null;
  }

  private recordFailure(probing: boolean): void {
    this.consecutiveFailures++;
    if (probing || this.consecutiveFailures >= this.threshold) {
      this.probeAt = this.now() + this.resetTimeoutMs;
    }
  }
}
