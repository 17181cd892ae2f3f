/**
 * @sprint-garden/server
 *
 * HTTP surface over the core: tracker webhooks, garden host API routes
 * and dream simulation.
 */

export { createApp, type App, type AppOverrides } from './app.js';
export { EnvSchema, loadConfig, type AppConfig, type DreamingConfig, type GardenConfig } from './config.js';
export { createApiHandlers, providerFromQuery, type ApiDeps } from './handlers/api.js';
export { createDreamHandlers, type DreamDeps } from './handlers/dreams.js';
export { SIGNATURE_HEADERS, createWebhookHandler, type WebhookDeps } from './handlers/webhooks.js';
export { parseJsonBody } from './http/body.js';
export * from './http/responses.js';
export {
  dispatch,
  headerValue,
  matchRoute,
  type ApiRequest,
  type HttpMethod,
  type Route,
  type RouteHandler,
  type RouteMatch,
} from './http/router.js';
export { PayloadTooLargeError, createHttpServer, readBody, sendJson, type HttpServerOptions } from './http/server.js';
export { createTicketEventHandler, type TicketEventTask } from './worker.js';
