/**
 * Error taxonomy shared by adapters, the processor and the HTTP layer
 */

/**
 * Malformed or missing required webhook fields. Never retried.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Operator-fixable setup problem: missing credentials, unconfigured
 * board or team, no matching workflow transition.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Network failure, timeout or non-2xx response from a remote API
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryable: boolean = true,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof TransportError && error.status === 404;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
