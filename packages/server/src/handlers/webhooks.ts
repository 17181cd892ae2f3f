/**
 * Tracker webhook receivers
 *
 * The only synchronous work is verify, parse, classify and enqueue; the
 * 200 is a receipt, not a promise that the garden changed.
 */

import {
  classify,
  isLinearIssueWebhook,
  type Logger,
  type ProviderName,
  type ProviderRegistry,
  type TaskQueue,
} from '@sprint-garden/core';

import { parseJsonBody } from '../http/body.js';
import { ok, unauthorised, type HttpResponse } from '../http/responses.js';
import { headerValue, type ApiRequest, type RouteHandler } from '../http/router.js';
import type { TicketEventTask } from '../worker.js';

export const SIGNATURE_HEADERS: Record<ProviderName, string> = {
  jira: 'x-hub-signature',
  linear: 'linear-signature',
};

export interface WebhookDeps {
  registry: ProviderRegistry;
  queue: Pick<TaskQueue<TicketEventTask>, 'enqueue'>;
  blockerStatuses: readonly string[];
  logger: Logger;
}

export function createWebhookHandler(providerName: ProviderName, deps: WebhookDeps): RouteHandler {
  const log = deps.logger.child({ webhook: providerName });

  return async (request: ApiRequest): Promise<HttpResponse> => {
    const provider = deps.registry.get(providerName);

    const signature = headerValue(request.headers, SIGNATURE_HEADERS[providerName]);
    if (!provider.verifyWebhookSignature(request.body, signature)) {
      log.warn('Rejected webhook with invalid signature');
      return unauthorised('Invalid signature');
    }

    const payload = parseJsonBody(request.body);

    if (providerName === 'linear' && !isLinearIssueWebhook(payload)) {
      log.debug('Ignoring non-issue webhook');
      return ok({ status: 'ignored' });
    }

    const ticket = provider.parseWebhook(payload);
    const event = classify(providerName, payload, {
      jira: { blockerStatuses: deps.blockerStatuses },
    });
    const taskId = deps.queue.enqueue({ provider: providerName, ticket, event });

    log.info('Webhook accepted', { issue: ticket.id, eventType: event.eventType, taskId });
    return ok({ status: 'accepted', issue: ticket.id, event_type: event.eventType, task_id: taskId });
  };
}
