/**
 * Linear provider adapter (GraphQL API)
 *
 * Linear has no built-in issue types; the first label that names one wins.
 */

import type { z } from 'zod';

import { ConfigurationError, TransportError, ValidationError, toError } from '../errors.js';
import { isRecord } from '../guards.js';
import type { Logger } from '../logger.js';
import {
  LinearActiveCycleDataSchema,
  LinearCycleIssuesDataSchema,
  LinearGraphQLResponseSchema,
  LinearIssueDataSchema,
  LinearIssueSchema,
  LinearIssueUpdateDataSchema,
  LinearTeamStatesDataSchema,
  LinearWebhookSchema,
  parseOrThrow,
  type LinearIssue,
  type LinearRelation,
} from '../schemas/index.js';
import { createTicket, parseTimestamp } from '../tickets/ticket.js';
import { HttpClient, type HttpClientOptions } from '../transport/http-client.js';
import type {
  IssueType,
  Relation,
  RelationType,
  SprintInfo,
  TicketStatus,
  UnifiedTicket,
} from '../types/index.js';
import { BaseIssueProvider, decodeResponse } from './base.js';

export const LINEAR_GRAPHQL_URL = 'https://api.linear.app/graphql';

// ============================================================================
// Mapping tables
// ============================================================================

export const LINEAR_LABEL_TYPE_MAP: Record<string, IssueType> = {
  epic: 'epic',
  feature: 'feature',
  bug: 'bug',
  task: 'task',
  chore: 'chore',
  improvement: 'feature',
  refactor: 'chore',
};

/** Linear: 0 none, 1 urgent, 2 high, 3 medium, 4 low */
export const LINEAR_PRIORITY_MAP: Record<number, number> = {
  0: 3,
  1: 5,
  2: 4,
  3: 3,
  4: 2,
};

export const LINEAR_STATE_MAP: Record<string, TicketStatus> = {
  backlog: 'todo',
  unstarted: 'todo',
  started: 'in_progress',
  completed: 'done',
  canceled: 'done',
};

export const LINEAR_RELATION_MAP: Record<string, RelationType> = {
  blocks: 'blocks',
  blockedby: 'blocked_by',
  blocked_by: 'blocked_by',
  duplicate: 'duplicates',
  related: 'relates_to',
};

/** Relation seen from the other issue (inverseRelations) */
const LINEAR_INVERSE_RELATION_MAP: Record<string, RelationType> = {
  blocks: 'blocked_by',
  duplicate: 'duplicates',
  related: 'relates_to',
};

// ============================================================================
// GraphQL documents
// ============================================================================

const ISSUE_FIELDS = `
  id
  identifier
  title
  description
  priority
  state { id name type }
  assignee { id name avatarUrl }
  parent { id identifier }
  project { id name }
  cycle { id name }
  labels { nodes { id name } }
  relations { nodes { type relatedIssue { id identifier } } }
  inverseRelations { nodes { type issue { id identifier } } }
  children { nodes { id identifier } }
  createdAt
  updatedAt
`;

const GET_ISSUE_QUERY = `
  query GetIssue($identifier: String!) {
    issue(id: $identifier) { ${ISSUE_FIELDS} }
  }
`;

const ACTIVE_CYCLE_QUERY = `
  query GetActiveCycle($teamId: String!) {
    team(id: $teamId) {
      activeCycle { id name number startsAt endsAt progress }
    }
  }
`;

const CYCLE_ISSUES_QUERY = `
  query GetCycleIssues($cycleId: String!) {
    cycle(id: $cycleId) {
      issues(first: 250) { nodes { ${ISSUE_FIELDS} } }
    }
  }
`;

const TEAM_STATES_QUERY = `
  query GetTeamStates($teamId: String!) {
    team(id: $teamId) {
      states { nodes { id name type } }
    }
  }
`;

const UPDATE_STATE_MUTATION = `
  mutation UpdateIssueState($issueId: String!, $stateId: String!) {
    issueUpdate(id: $issueId, input: { stateId: $stateId }) { success }
  }
`;

// ============================================================================
// Normalisation helpers
// ============================================================================

export function normalizeLinearType(labelNames: string[]): IssueType {
  for (const label of labelNames) {
    const issueType = LINEAR_LABEL_TYPE_MAP[label.toLowerCase()];
    if (issueType) {
      return issueType;
    }
  }
  return 'feature';
}

export function normalizeLinearPriority(priority: number | null | undefined): number {
  return LINEAR_PRIORITY_MAP[priority ?? 0] ?? 3;
}

export function normalizeLinearStatus(stateType: string | null | undefined): TicketStatus {
  return LINEAR_STATE_MAP[(stateType ?? '').toLowerCase()] ?? 'todo';
}

function labelNames(issue: LinearIssue): string[] {
  const labels = issue.labels;
  if (!labels) {
    return [];
  }
  const nodes = Array.isArray(labels) ? labels : labels.nodes;
  return nodes.map((label) => label.name ?? '').filter((name) => name.length > 0);
}

function relationTarget(ref: LinearRelation['relatedIssue']): string | null {
  return ref?.identifier ?? ref?.id ?? null;
}

function extractLinearRelations(issue: LinearIssue): Relation[] {
  const relations: Relation[] = [];

  for (const node of issue.relations?.nodes ?? []) {
    const targetId = relationTarget(node.relatedIssue);
    if (targetId) {
      const relationType = LINEAR_RELATION_MAP[(node.type ?? '').toLowerCase()] ?? 'relates_to';
      relations.push({ targetId, relationType, targetProvider: 'linear' });
    }
  }

  for (const node of issue.inverseRelations?.nodes ?? []) {
    const targetId = relationTarget(node.issue);
    if (targetId) {
      const relationType = LINEAR_INVERSE_RELATION_MAP[(node.type ?? '').toLowerCase()] ?? 'relates_to';
      relations.push({ targetId, relationType, targetProvider: 'linear' });
    }
  }

  for (const child of issue.children?.nodes ?? []) {
    const targetId = relationTarget(child);
    if (targetId) {
      relations.push({ targetId, relationType: 'child', targetProvider: 'linear' });
    }
  }

  return relations;
}

export function linearIssueToTicket(issue: LinearIssue): UnifiedTicket {
  const labels = labelNames(issue);

  return createTicket({
    id: issue.identifier ?? issue.id ?? '',
    provider: 'linear',
    title: issue.title ?? '',
    description: issue.description ?? null,
    status: normalizeLinearStatus(issue.state?.type),
    issueType: normalizeLinearType(labels),
    priority: normalizeLinearPriority(issue.priority),
    assigneeId: issue.assignee?.id ?? null,
    assigneeName: issue.assignee?.name ?? null,
    assigneeAvatar: issue.assignee?.avatarUrl ?? null,
    parentIssueId: issue.parent?.identifier ?? issue.parent?.id ?? null,
    containingProjectId: issue.project?.id ?? null,
    relations: extractLinearRelations(issue),
    labels,
    sprintId: issue.cycle?.id ?? null,
    sprintName: issue.cycle?.name ?? null,
    createdAt: parseTimestamp(issue.createdAt),
    updatedAt: parseTimestamp(issue.updatedAt),
    rawData: issue,
  });
}

// ============================================================================
// Provider
// ============================================================================

export interface LinearProviderConfig {
  apiKey?: string;
  webhookSecret?: string;
  teamId?: string;
  http?: Partial<Omit<HttpClientOptions, 'serviceName' | 'baseUrl' | 'headers'>>;
  logger?: Logger;
}

export class LinearProvider extends BaseIssueProvider {
  readonly name = 'linear' as const;
  private readonly http: HttpClient;

  constructor(private readonly config: LinearProviderConfig) {
    super(config.webhookSecret, config.logger);
    this.http = new HttpClient({
      serviceName: 'linear',
      baseUrl: LINEAR_GRAPHQL_URL,
      headers: () => ({ Authorization: config.apiKey ?? '' }),
      logger: this.logger,
      ...config.http,
    });

    if (!this.isConfigured()) {
      this.logger.warn('Linear API key not configured');
    }
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  /**
   * Issue webhooks carry the issue in `data`; comment and reaction
   * webhooks nest it under `data.issue`.
   */
  parseWebhook(payload: unknown): UnifiedTicket {
    const webhook = parseOrThrow(LinearWebhookSchema, payload, 'Linear webhook');
    const issueData = isRecord(webhook.data.issue) ? webhook.data.issue : webhook.data;
    const issue = parseOrThrow(LinearIssueSchema, issueData, 'Linear webhook data');

    if (!issue.identifier && !issue.id) {
      throw new ValidationError('Invalid Linear webhook data: id or identifier is required', [
        'data.id: Required',
      ]);
    }
    return linearIssueToTicket(issue);
  }

  async getIssue(issueId: string): Promise<UnifiedTicket | null> {
    const data = await this.execute(GET_ISSUE_QUERY, { identifier: issueId }, LinearIssueDataSchema);
    if (!data.issue) {
      this.logger.warn('Linear issue not found', { issueId });
      return null;
    }
    return linearIssueToTicket(data.issue);
  }

  async getActiveSprintOrCycle(): Promise<SprintInfo | null> {
    const teamId = this.requireTeamId();
    const data = await this.execute(ACTIVE_CYCLE_QUERY, { teamId }, LinearActiveCycleDataSchema);
    const cycle = data.team?.activeCycle;
    if (!cycle) {
      return null;
    }

    return {
      id: cycle.id,
      name: cycle.name ?? (cycle.number != null ? `Cycle ${cycle.number}` : 'Active cycle'),
      state: 'active',
      startDate: cycle.startsAt ?? null,
      endDate: cycle.endsAt ?? null,
      progress: cycle.progress ?? null,
    };
  }

  async getSprintIssues(sprintId: string): Promise<UnifiedTicket[]> {
    try {
      const data = await this.execute(CYCLE_ISSUES_QUERY, { cycleId: sprintId }, LinearCycleIssuesDataSchema);
      return (data.cycle?.issues.nodes ?? []).map(linearIssueToTicket);
    } catch (error) {
      this.logger.error('Failed to fetch Linear cycle issues', toError(error), { sprintId });
      return [];
    }
  }

  async transitionToDone(issueId: string): Promise<boolean> {
    const teamId = this.requireTeamId();

    const statesData = await this.execute(TEAM_STATES_QUERY, { teamId }, LinearTeamStatesDataSchema);
    const doneState = (statesData.team?.states.nodes ?? []).find((state) => state.type === 'completed');
    if (!doneState) {
      throw new ConfigurationError('No completed workflow state found for Linear team');
    }

    const ticket = await this.getIssue(issueId);
    const issueUuid = ticket?.rawData.id;
    if (typeof issueUuid !== 'string' || !issueUuid) {
      return false;
    }

    const result = await this.execute(
      UPDATE_STATE_MUTATION,
      { issueId: issueUuid, stateId: doneState.id },
      LinearIssueUpdateDataSchema
    );
    const success = result.issueUpdate?.success ?? false;
    if (success) {
      this.logger.info('Transitioned Linear issue to Done', { issueId });
    }
    return success;
  }

  private requireTeamId(): string {
    if (!this.config.teamId) {
      throw new ConfigurationError('LINEAR_TEAM_ID not configured');
    }
    return this.config.teamId;
  }

  /**
   * Run a GraphQL document and validate its `data`. "Not found" errors
   * come back as absent data so lookups can return null.
   */
  private async execute<T extends z.ZodTypeAny>(
    query: string,
    variables: Record<string, unknown>,
    schema: T
  ): Promise<z.infer<T>> {
    if (!this.isConfigured()) {
      throw new ConfigurationError('Linear API key not configured (LINEAR_API_KEY)');
    }

    const body = await this.http.request('', { method: 'POST', body: { query, variables } });
    const response = decodeResponse(LinearGraphQLResponseSchema, body, 'Linear GraphQL');
    const errors = response.errors ?? [];

    if (errors.length > 0) {
      const messages = errors.map((error) => error.message);
      if (messages.some((message) => /not found/i.test(message))) {
        return decodeResponse(schema, {}, 'Linear GraphQL');
      }
      if (!response.data) {
        throw new TransportError(`Linear GraphQL error: ${messages.join('; ')}`, undefined, false);
      }
      this.logger.warn('Linear GraphQL returned partial data', { errors: messages });
    }

    return decodeResponse(schema, response.data ?? {}, 'Linear GraphQL');
  }
}
