/**
 * Core event processor
 *
 * Fans a classified ticket event out to garden triggers. Runs on the
 * background queue, so every outcome is reported as a ProcessResult
 * and the environment is refreshed whether or not the action succeeded.
 */

import { errorMessage, toError } from '../errors.js';
import type { GardenTriggers } from '../garden/types.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { IssueProvider } from '../providers/types.js';
import type {
  ClassifiedEvent,
  DreamResult,
  GrowthType,
  ProcessResult,
  UnifiedTicket,
} from '../types/index.js';
import { updateEnvironment } from './environment.js';
import { colorFor, growthModifierFor, growthTypeFor } from './growth.js';

/**
 * Runs a what-if dream for a newly created or reshaped ticket.
 * Resolves null when the provider has no active sprint.
 */
export interface DreamTrigger {
  dreamForTicket(ticket: UnifiedTicket, provider: IssueProvider): Promise<DreamResult | null>;
}

export interface EventProcessorOptions {
  garden: GardenTriggers;
  dreamTrigger?: DreamTrigger;
  logger?: Logger;
}

/** Growth types large enough that an update re-runs the dreaming pipeline */
const DREAMING_GROWTH_TYPES: ReadonlySet<GrowthType> = new Set(['branch', 'trunk']);

export class EventProcessor {
  private readonly garden: GardenTriggers;
  private readonly dreamTrigger: DreamTrigger | undefined;
  private readonly logger: Logger;

  constructor(options: EventProcessorOptions) {
    this.garden = options.garden;
    this.dreamTrigger = options.dreamTrigger;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'processor' });
  }

  /**
   * Dispatch one event. Never rejects.
   */
  async processTicketEvent(
    ticket: UnifiedTicket,
    event: ClassifiedEvent,
    provider: IssueProvider
  ): Promise<ProcessResult> {
    this.logger.info('Processing ticket event', {
      issue: ticket.id,
      provider: provider.name,
      eventType: event.eventType,
    });

    try {
      return await this.dispatch(ticket, event, provider);
    } catch (error) {
      this.logger.error('Visualization trigger failed', toError(error), {
        issue: ticket.id,
        eventType: event.eventType,
      });
      return { status: 'visualization_error', issue: ticket.id, error: errorMessage(error) };
    } finally {
      await updateEnvironment(provider, this.garden, this.logger);
    }
  }

  private async dispatch(
    ticket: UnifiedTicket,
    event: ClassifiedEvent,
    provider: IssueProvider
  ): Promise<ProcessResult> {
    const growthType = growthTypeFor(ticket.issueType);

    switch (event.eventType) {
      case 'completed':
        await this.garden.grow({
          branchId: ticket.id,
          growthType,
          growthModifier: growthModifierFor(ticket.priority),
          color: colorFor(ticket.priority),
          epicId: ticket.parentId,
        });
        return { status: 'growth_triggered', issue: ticket.id, growth_type: growthType };

      case 'reopened':
        await this.garden.shrink(ticket.id);
        return { status: 'shrink_triggered', issue: ticket.id };

      case 'blocked':
        await this.garden.addThorns(ticket.id, ticket.parentId);
        await this.spawnVines(ticket);
        return { status: 'thorns_triggered', issue: ticket.id };

      case 'unblocked':
        await this.garden.removeThorns(ticket.id);
        return { status: 'thorns_removed', issue: ticket.id };

      case 'created':
        await this.spawnVines(ticket);
        return this.dream(ticket, provider);

      case 'updated':
        if (DREAMING_GROWTH_TYPES.has(growthType)) {
          return this.dream(ticket, provider);
        }
        return { status: 'received', issue: ticket.id, action: 'processed' };

      default: {
        const unhandled: never = event.eventType;
        throw new Error(`Unhandled event type: ${String(unhandled)}`);
      }
    }
  }

  private async dream(ticket: UnifiedTicket, provider: IssueProvider): Promise<ProcessResult> {
    if (!this.dreamTrigger) {
      return { status: 'received', issue: ticket.id, action: 'processed' };
    }

    try {
      const result = await this.dreamTrigger.dreamForTicket(ticket, provider);
      if (!result) {
        return { status: 'received', issue: ticket.id, action: 'no_active_sprint' };
      }
      return { status: 'dream_triggered', issue: ticket.id, dream_id: result.dream_id };
    } catch (error) {
      this.logger.error('Dreaming pipeline failed', toError(error), { issue: ticket.id });
      return { status: 'dream_error', issue: ticket.id, error: errorMessage(error) };
    }
  }

  /**
   * One vine per relation; failures are logged and skipped
   */
  private async spawnVines(ticket: UnifiedTicket): Promise<void> {
    for (const relation of ticket.relations) {
      try {
        await this.garden.spawnVine(ticket.id, relation.targetId, relation.relationType);
      } catch (error) {
        this.logger.warn('Vine spawn failed', {
          issue: ticket.id,
          target: relation.targetId,
          relationType: relation.relationType,
          error: errorMessage(error),
        });
      }
    }
  }
}
