/**
 * Background consumer for accepted webhook events
 */

import type {
  ClassifiedEvent,
  EventProcessor,
  Logger,
  ProcessResult,
  ProviderName,
  ProviderRegistry,
  TaskHandler,
  UnifiedTicket,
} from '@sprint-garden/core';

export interface TicketEventTask {
  provider: ProviderName;
  ticket: UnifiedTicket;
  event: ClassifiedEvent;
}

export function createTicketEventHandler(
  processor: EventProcessor,
  registry: ProviderRegistry,
  logger: Logger
): TaskHandler<TicketEventTask> {
  return async (task): Promise<ProcessResult> => {
    const { provider, ticket, event } = task.payload;
    const result = await processor.processTicketEvent(ticket, event, registry.get(provider));
    logger.info('Task processed', {
      taskId: task.id,
      issue: ticket.id,
      eventType: event.eventType,
      status: result.status,
    });
    return result;
  };
}
