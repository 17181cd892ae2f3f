/**
 * JSON response values returned by route handlers
 *
 * Every failure body is `{ error, code, details? }`; the code fixes the
 * HTTP status.
 */

export interface HttpResponse {
  status: number;
  body: unknown;
}

const ERROR_STATUS = {
  BAD_REQUEST: 400,
  VALIDATION_ERROR: 400,
  // operator-fixable setup problem, e.g. a missing board id
  CONFIGURATION_ERROR: 400,
  UNAUTHORISED: 401,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  UPSTREAM_ERROR: 500,
  INTERNAL_ERROR: 500,
} as const;

export type ErrorCode = keyof typeof ERROR_STATUS;

export interface ApiError {
  error: string;
  code: ErrorCode;
  details?: unknown;
}

export function json(status: number, body: unknown): HttpResponse {
  return { status, body };
}

export function ok(body: unknown): HttpResponse {
  return json(200, body);
}

export function apiError(code: ErrorCode, error: string, details?: unknown): HttpResponse {
  const body: ApiError = details === undefined ? { error, code } : { error, code, details };
  return json(ERROR_STATUS[code], body);
}

export const badRequest = (error: string, details?: unknown) => apiError('BAD_REQUEST', error, details);

export const validationError = (error: string, details?: unknown) => apiError('VALIDATION_ERROR', error, details);

export const configurationError = (error: string) => apiError('CONFIGURATION_ERROR', error);

export const unauthorised = (error = 'Unauthorised') => apiError('UNAUTHORISED', error);

export const notFound = (error: string) => apiError('NOT_FOUND', error);

export const payloadTooLarge = (limit: number) =>
  apiError('PAYLOAD_TOO_LARGE', `Request body exceeds ${limit} bytes`);

/** A tracker or other remote API failed */
export const upstreamError = (error: string, details?: unknown) => apiError('UPSTREAM_ERROR', error, details);

export const internalError = (error = 'Internal server error') => apiError('INTERNAL_ERROR', error);
