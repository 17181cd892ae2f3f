/**
 * node:http listener around the route table
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';

import { MAX_BODY_SIZE, toError, type Logger } from '@sprint-garden/core';

import { internalError, payloadTooLarge, type HttpResponse } from './responses.js';
import { dispatch, headerValue, type Route } from './router.js';

export class PayloadTooLargeError extends Error {
  constructor(public readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * Collect a request body, failing once it passes the limit
 */
export async function readBody(
  stream: AsyncIterable<Buffer | string>,
  limit: number = MAX_BODY_SIZE
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of stream) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > limit) {
      throw new PayloadTooLargeError(limit);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
}

export function sendJson(res: ServerResponse, response: HttpResponse): void {
  res.writeHead(response.status, {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, X-Hub-Signature, Linear-Signature',
  });
  res.end(response.body === null ? undefined : JSON.stringify(response.body));
}

export interface HttpServerOptions {
  routes: readonly Route[];
  logger: Logger;
  maxBodySize?: number;
}

export function createHttpServer(options: HttpServerOptions): Server {
  const { routes, logger } = options;
  const limit = options.maxBodySize ?? MAX_BODY_SIZE;

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');

    // CORS preflight
    if (method === 'OPTIONS') {
      sendJson(res, { status: 204, body: null });
      return;
    }

    const declaredLength = Number(headerValue(req.headers, 'content-length') ?? 0);
    if (declaredLength > limit) {
      sendJson(res, payloadTooLarge(limit));
      return;
    }

    let body: Buffer;
    try {
      body = await readBody(req, limit);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        sendJson(res, payloadTooLarge(limit));
        return;
      }
      throw error;
    }

    const started = Date.now();
    const response = await dispatch(
      routes,
      { method, path: url.pathname, query: url.searchParams, headers: req.headers, body },
      logger
    );
    logger.debug('Request handled', {
      method,
      path: url.pathname,
      status: response.status,
      durationMs: Date.now() - started,
    });
    sendJson(res, response);
  }

  return createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      logger.error('Unhandled request failure', toError(error), { url: req.url });
      if (!res.headersSent) {
        sendJson(res, internalError());
      } else {
        res.end();
      }
    });
  });
}
