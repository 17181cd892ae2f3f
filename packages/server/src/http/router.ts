/**
 * Method and path routing over plain request records
 *
 * Routes are matched without a socket so handlers can be exercised
 * directly in tests.
 */

import type { IncomingHttpHeaders } from 'node:http';

import {
  ConfigurationError,
  TransportError,
  ValidationError,
  errorMessage,
  toError,
  type Logger,
} from '@sprint-garden/core';

import {
  configurationError,
  internalError,
  notFound,
  upstreamError,
  validationError,
  type HttpResponse,
} from './responses.js';

export type HttpMethod = 'GET' | 'POST';

export interface ApiRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  /** Named path segments, e.g. `:id` */
  params: Record<string, string>;
  /** Lower-cased names, as node:http delivers them */
  headers: IncomingHttpHeaders;
  /** Raw bytes, kept for signature checks */
  body: Buffer;
}

export type RouteHandler = (request: ApiRequest) => Promise<HttpResponse>;

export interface Route {
  method: HttpMethod;
  path: string;
  handler: RouteHandler;
}

export interface RouteMatch {
  route: Route;
  params: Record<string, string>;
}

export function matchRoute(routes: readonly Route[], method: string, path: string): RouteMatch | null {
  const segments = splitPath(path);

  for (const route of routes) {
    if (route.method !== method) {
      continue;
    }
    const pattern = splitPath(route.path);
    if (pattern.length !== segments.length) {
      continue;
    }

    const params: Record<string, string> = {};
    const matched = pattern.every((part, index) => {
      const segment = segments[index] ?? '';
      if (part.startsWith(':')) {
        params[part.slice(1)] = decodeSegment(segment);
        return true;
      }
      return part === segment;
    });

    if (matched) {
      return { route, params };
    }
  }
  return null;
}

function splitPath(path: string): string[] {
  return path.split('/').filter(Boolean);
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Route a request and map thrown errors onto JSON error responses
 */
export async function dispatch(
  routes: readonly Route[],
  request: Omit<ApiRequest, 'params'>,
  logger: Logger
): Promise<HttpResponse> {
  const match = matchRoute(routes, request.method, request.path);
  if (!match) {
    return notFound(`Not found: ${request.method} ${request.path}`);
  }

  try {
    return await match.route.handler({ ...request, params: match.params });
  } catch (error) {
    if (error instanceof ValidationError) {
      return validationError(error.message, error.issues.length > 0 ? error.issues : undefined);
    }
    if (error instanceof ConfigurationError) {
      logger.warn('Configuration error', { path: request.path, error: error.message });
      return configurationError(error.message);
    }
    if (error instanceof TransportError) {
      logger.error('Upstream request failed', error, { path: request.path });
      return upstreamError(error.message, error.status === undefined ? undefined : { status: error.status });
    }
    logger.error('Request handler failed', toError(error), { path: request.path });
    return internalError(errorMessage(error));
  }
}

/**
 * First value of a header that may repeat
 */
export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
