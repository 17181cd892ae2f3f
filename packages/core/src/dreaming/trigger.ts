/**
 * Event-triggered dreaming: what happens to the sprint if this ticket
 * lands as unplanned work
 */

import type { GardenTriggers } from '../garden/types.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { DreamTrigger } from '../processor/processor.js';
import type { IssueProvider } from '../providers/types.js';
import type { DreamResult, UnifiedTicket } from '../types/index.js';
import type { DreamingEngine } from './engine.js';
import { buildSprintSnapshot } from './snapshot.js';
import { visualizeDream } from './visualize.js';

/**
 * Unified priority (5 highest) to scope-creep priority (1 most urgent)
 */
export function scopePriorityFor(priority: number): number {
  return Math.min(4, Math.max(1, 6 - Math.round(priority)));
}

export class TicketDreamTrigger implements DreamTrigger {
  private readonly logger: Logger;

  constructor(
    private readonly engine: DreamingEngine,
    private readonly garden: GardenTriggers,
    logger?: Logger
  ) {
    this.logger = (logger ?? defaultLogger).child({ component: 'dream-trigger' });
  }

  async dreamForTicket(ticket: UnifiedTicket, provider: IssueProvider): Promise<DreamResult | null> {
    const snapshot = await buildSprintSnapshot(provider);
    if (!snapshot) {
      this.logger.info('No active sprint, skipping dream', { issue: ticket.id, provider: provider.name });
      return null;
    }

    const result = await this.engine.dream('scope_creep', snapshot, {
      additional_issues: 1,
      priority: scopePriorityFor(ticket.priority),
    });
    await visualizeDream(result, this.garden, this.logger);
    return result;
  }
}
