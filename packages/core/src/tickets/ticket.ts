/**
 * UnifiedTicket construction and derived views
 */

import type {
  ProviderName,
  Relation,
  TicketJSON,
  UnifiedTicket,
} from '../types/index.js';

export type TicketInit = Pick<UnifiedTicket, 'id' | 'provider'> & Partial<UnifiedTicket>;

/**
 * Build a ticket, filling every absent optional field with its empty value
 */
export function createTicket(init: TicketInit): UnifiedTicket {
  const parentIssueId = init.parentIssueId ?? null;
  const containingProjectId = init.containingProjectId ?? null;

  return {
    id: init.id,
    provider: init.provider,
    title: init.title ?? '',
    description: init.description ?? null,
    status: init.status ?? 'todo',
    issueType: init.issueType ?? 'task',
    priority: init.priority ?? 3,
    assigneeId: init.assigneeId ?? null,
    assigneeName: init.assigneeName ?? null,
    assigneeAvatar: init.assigneeAvatar ?? null,
    parentId: init.parentId ?? parentIssueId ?? containingProjectId,
    parentIssueId,
    containingProjectId,
    relations: dedupeRelations(init.relations ?? []),
    labels: init.labels ?? [],
    sprintId: init.sprintId ?? null,
    sprintName: init.sprintName ?? null,
    createdAt: init.createdAt ?? null,
    updatedAt: init.updatedAt ?? null,
    rawData: init.rawData ?? {},
  };
}

/**
 * Drop repeated (target, type) pairs, keeping first-seen order
 */
export function dedupeRelations(relations: Relation[]): Relation[] {
  const seen = new Set<string>();
  const result: Relation[] = [];
  for (const relation of relations) {
    const key = `${relation.targetId}\u0000${relation.relationType}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(relation);
  }
  return result;
}

export function blockedBy(ticket: UnifiedTicket): string[] {
  return ticket.relations
    .filter((relation) => relation.relationType === 'blocked_by')
    .map((relation) => relation.targetId);
}

export function blocking(ticket: UnifiedTicket): string[] {
  return ticket.relations
    .filter((relation) => relation.relationType === 'blocks')
    .map((relation) => relation.targetId);
}

export function isBlocked(ticket: UnifiedTicket): boolean {
  return ticket.status === 'blocked' || blockedBy(ticket).length > 0;
}

export function ticketToJSON(ticket: UnifiedTicket): TicketJSON {
  const hasAssignee = ticket.assigneeId !== null || ticket.assigneeName !== null;

  return {
    id: ticket.id,
    provider: ticket.provider,
    title: ticket.title,
    description: ticket.description,
    status: ticket.status,
    issue_type: ticket.issueType,
    priority: ticket.priority,
    assignee: hasAssignee
      ? { id: ticket.assigneeId, name: ticket.assigneeName, avatar: ticket.assigneeAvatar }
      : null,
    parent_issue_id: ticket.parentIssueId,
    containing_project_id: ticket.containingProjectId,
    parent_id: ticket.parentId,
    relations: ticket.relations.map((relation) => ({
      target_id: relation.targetId,
      type: relation.relationType,
      target_provider: relation.targetProvider ?? null,
    })),
    labels: ticket.labels,
    sprint: ticket.sprintId ? { id: ticket.sprintId, name: ticket.sprintName } : null,
    created_at: ticket.createdAt?.toISOString() ?? null,
    updated_at: ticket.updatedAt?.toISOString() ?? null,
  };
}

/**
 * Parse an ISO timestamp; invalid or absent input yields null
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Jira keys carry an upper-case project prefix (KAN-123); anything else is Linear
 */
export function detectProvider(issueId: string): ProviderName {
  if (!issueId.includes('-')) {
    return 'linear';
  }
  const prefix = issueId.split('-')[0] ?? '';
  const isUpper = prefix === prefix.toUpperCase() && prefix !== prefix.toLowerCase();
  return isUpper ? 'jira' : 'linear';
}
