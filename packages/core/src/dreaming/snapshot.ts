/**
 * Sprint snapshots built from a live provider
 */

import { DEFAULT_DAYS_REMAINING } from '../constants.js';
import type { IssueProvider } from '../providers/types.js';
import type { SnapshotIssue, SprintInfo, SprintSnapshot, UnifiedTicket } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SnapshotOptions {
  /** Issues per sprint; defaults to the sprint's done count */
  velocity?: number;
  daysRemaining?: number;
  now?: () => Date;
}

/**
 * Whole days until the sprint ends, never negative
 */
export function daysUntil(endDate: string | null, now: Date): number {
  if (!endDate) {
    return DEFAULT_DAYS_REMAINING;
  }
  const end = Date.parse(endDate);
  if (Number.isNaN(end)) {
    return DEFAULT_DAYS_REMAINING;
  }
  return Math.max(0, Math.ceil((end - now.getTime()) / DAY_MS));
}

export function ticketToSnapshotIssue(ticket: UnifiedTicket): SnapshotIssue {
  return {
    id: ticket.id,
    status: ticket.status,
    assignee: ticket.assigneeName,
    priority: ticket.priority,
    epic: ticket.parentId ?? 'no_epic',
  };
}

/**
 * Snapshot from a sprint and its tickets
 */
export function snapshotFromTickets(
  sprint: SprintInfo,
  tickets: UnifiedTicket[],
  options: SnapshotOptions = {}
): SprintSnapshot {
  const team: string[] = [];
  for (const ticket of tickets) {
    if (ticket.assigneeName && !team.includes(ticket.assigneeName)) {
      team.push(ticket.assigneeName);
    }
  }

  const done = tickets.filter((ticket) => ticket.status === 'done').length;
  const now = options.now ?? (() => new Date());

  return {
    issues: tickets.map(ticketToSnapshotIssue),
    team_members: team,
    velocity: options.velocity ?? done,
    days_remaining: options.daysRemaining ?? daysUntil(sprint.endDate, now()),
  };
}

/**
 * Snapshot of the provider's active sprint, or null when none is active
 */
export async function buildSprintSnapshot(
  provider: Pick<IssueProvider, 'getActiveSprintOrCycle' | 'getSprintIssues'>,
  options: SnapshotOptions = {}
): Promise<SprintSnapshot | null> {
  const sprint = await provider.getActiveSprintOrCycle();
  if (!sprint) {
    return null;
  }
  const tickets = await provider.getSprintIssues(sprint.id);
  return snapshotFromTickets(sprint, tickets, options);
}
