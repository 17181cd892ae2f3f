/**
 * Jira Cloud provider adapter
 *
 * REST API v3 for issues and transitions, Agile API 1.0 for boards and
 * sprints. Classic projects link epics through a custom field; next-gen
 * projects use `parent`.
 */

import { ConfigurationError, isNotFound, toError } from '../errors.js';
import { isRecord } from '../guards.js';
import type { Logger } from '../logger.js';
import {
  JiraBoardSprintsResponseSchema,
  JiraIssueSchema,
  JiraSprintIssuesResponseSchema,
  JiraTransitionsResponseSchema,
  JiraWebhookSchema,
  parseOrThrow,
  type JiraIssue,
  type JiraIssueFields,
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

// ============================================================================
// Mapping tables
// ============================================================================

export const JIRA_TYPE_MAP: Record<string, IssueType> = {
  Epic: 'epic',
  Story: 'feature',
  Feature: 'feature',
  Improvement: 'feature',
  Bug: 'bug',
  Task: 'task',
  Spike: 'task',
  'Sub-task': 'chore',
  'Technical Debt': 'chore',
};

export const JIRA_PRIORITY_MAP: Record<string, number> = {
  Highest: 5,
  High: 4,
  Medium: 3,
  Low: 2,
  Lowest: 1,
};

export const JIRA_STATUS_MAP: Record<string, TicketStatus> = {
  'To Do': 'todo',
  Open: 'todo',
  Backlog: 'todo',
  'In Progress': 'in_progress',
  'In Review': 'in_progress',
  Blocked: 'blocked',
  Impediment: 'blocked',
  'On Hold': 'blocked',
  Waiting: 'blocked',
  Done: 'done',
  Closed: 'done',
  Resolved: 'done',
};

export const JIRA_LINK_MAP: Record<string, RelationType> = {
  Blocks: 'blocks',
  blocks: 'blocks',
  'is blocked by': 'blocked_by',
  Duplicate: 'duplicates',
  duplicates: 'duplicates',
  'is duplicated by': 'duplicates',
  Relates: 'relates_to',
  'relates to': 'relates_to',
};

const ISSUE_FIELDS = [
  'summary',
  'description',
  'status',
  'issuetype',
  'priority',
  'assignee',
  'parent',
  'labels',
  'issuelinks',
  'subtasks',
  'created',
  'updated',
];

const SPRINT_PAGE_SIZE = 50;
const SPRINT_ISSUE_LIMIT = 500;

// ============================================================================
// Normalisation helpers
// ============================================================================

export function normalizeJiraType(name: string | null | undefined): IssueType {
  return JIRA_TYPE_MAP[name ?? 'Task'] ?? 'task';
}

export function normalizeJiraPriority(name: string | null | undefined): number {
  if (!name) {
    return 3;
  }
  return JIRA_PRIORITY_MAP[name] ?? 3;
}

export function normalizeJiraStatus(name: string | null | undefined): TicketStatus {
  return JIRA_STATUS_MAP[name ?? 'To Do'] ?? 'todo';
}

/**
 * Flatten an Atlassian document (or plain string) to text
 */
export function adfToText(node: unknown): string {
  if (typeof node === 'string') {
    return node;
  }
  if (!isRecord(node)) {
    return '';
  }
  if (typeof node.text === 'string') {
    return node.text;
  }
  const content = Array.isArray(node.content) ? node.content : [];
  const separator = node.type === 'doc' ? '\n' : '';
  return content.map(adfToText).join(separator);
}

/**
 * Most recent entry of the sprint custom field. Older instances send
 * strings like `com.atlassian.greenhopper...Sprint@1[id=7,name=Sprint 7,...]`.
 */
export function extractJiraSprint(value: unknown): { id: string; name: string | null } | null {
  if (!Array.isArray(value) || value.length === 0) {
    return null;
  }
  const latest: unknown = value[value.length - 1];

  if (isRecord(latest)) {
    const id = latest.id;
    if (typeof id !== 'number' && typeof id !== 'string') {
      return null;
    }
    return { id: String(id), name: typeof latest.name === 'string' ? latest.name : null };
  }

  if (typeof latest === 'string') {
    const id = /\bid=(\d+)/.exec(latest)?.[1];
    if (!id) {
      return null;
    }
    const name = /\bname=([^,\]]+)/.exec(latest)?.[1] ?? null;
    return { id, name };
  }

  return null;
}

function extractJiraRelations(fields: JiraIssueFields): Relation[] {
  const relations: Relation[] = [];

  for (const link of fields.issuelinks ?? []) {
    const outwardKey = link.outwardIssue?.key;
    if (outwardKey) {
      relations.push({
        targetId: outwardKey,
        relationType: JIRA_LINK_MAP[link.type?.outward ?? ''] ?? 'relates_to',
        targetProvider: 'jira',
      });
    }

    const inwardKey = link.inwardIssue?.key;
    if (inwardKey) {
      relations.push({
        targetId: inwardKey,
        relationType: JIRA_LINK_MAP[link.type?.inward ?? ''] ?? 'relates_to',
        targetProvider: 'jira',
      });
    }
  }

  for (const subtask of fields.subtasks ?? []) {
    if (subtask.key) {
      relations.push({ targetId: subtask.key, relationType: 'child', targetProvider: 'jira' });
    }
  }

  return relations;
}

// ============================================================================
// Provider
// ============================================================================

export interface JiraProviderConfig {
  /** e.g. `acme.atlassian.net` */
  domain?: string;
  email?: string;
  apiToken?: string;
  boardId?: string;
  webhookSecret?: string;
  epicLinkField?: string;
  sprintField?: string;
  http?: Partial<Omit<HttpClientOptions, 'serviceName' | 'baseUrl' | 'headers'>>;
  logger?: Logger;
}

export class JiraProvider extends BaseIssueProvider {
  readonly name = 'jira' as const;
  private readonly http: HttpClient;
  private readonly epicLinkField: string;
  private readonly sprintField: string;

  constructor(private readonly config: JiraProviderConfig) {
    super(config.webhookSecret, config.logger);
    this.epicLinkField = config.epicLinkField ?? 'customfield_10014';
    this.sprintField = config.sprintField ?? 'customfield_10020';
    this.http = new HttpClient({
      serviceName: 'jira',
      baseUrl: `https://${config.domain ?? 'jira.invalid'}`,
      headers: () => ({
        Authorization: `Basic ${Buffer.from(`${config.email ?? ''}:${config.apiToken ?? ''}`).toString('base64')}`,
      }),
      logger: this.logger,
      ...config.http,
    });

    if (!this.isConfigured()) {
      this.logger.warn('Jira credentials not fully configured');
    }
  }

  isConfigured(): boolean {
    return Boolean(this.config.domain && this.config.email && this.config.apiToken);
  }

  parseWebhook(payload: unknown): UnifiedTicket {
    const webhook = parseOrThrow(JiraWebhookSchema, payload, 'Jira webhook');
    return this.issueToTicket(webhook.issue);
  }

  async getIssue(issueId: string): Promise<UnifiedTicket | null> {
    this.requireCredentials();
    try {
      const data = await this.http.request(`/rest/api/3/issue/${encodeURIComponent(issueId)}`, {
        query: { fields: [...ISSUE_FIELDS, this.epicLinkField, this.sprintField].join(',') },
      });
      return this.issueToTicket(decodeResponse(JiraIssueSchema, data, 'Jira issue'));
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.warn('Jira issue not found', { issueId });
        return null;
      }
      throw error;
    }
  }

  async getActiveSprintOrCycle(): Promise<SprintInfo | null> {
    this.requireCredentials();
    if (!this.config.boardId) {
      throw new ConfigurationError('JIRA_BOARD_ID not configured');
    }

    const data = await this.http.request(`/rest/agile/1.0/board/${this.config.boardId}/sprint`, {
      query: { state: 'active' },
    });
    const sprint = decodeResponse(JiraBoardSprintsResponseSchema, data, 'Jira board sprints').values[0];
    if (!sprint) {
      return null;
    }

    return {
      id: String(sprint.id),
      name: sprint.name ?? `Sprint ${sprint.id}`,
      state: sprint.state ?? null,
      startDate: sprint.startDate ?? null,
      endDate: sprint.endDate ?? null,
      progress: null,
    };
  }

  async getSprintIssues(sprintId: string): Promise<UnifiedTicket[]> {
    const tickets: UnifiedTicket[] = [];
    let startAt = 0;

    try {
      this.requireCredentials();
      while (tickets.length < SPRINT_ISSUE_LIMIT) {
        const data = await this.http.request(`/rest/agile/1.0/sprint/${encodeURIComponent(sprintId)}/issue`, {
          query: {
            startAt,
            maxResults: SPRINT_PAGE_SIZE,
            fields: [...ISSUE_FIELDS, this.epicLinkField, this.sprintField].join(','),
          },
        });
        const page = decodeResponse(JiraSprintIssuesResponseSchema, data, 'Jira sprint issues');
        tickets.push(...page.issues.map((issue) => this.issueToTicket(issue)));

        startAt += page.issues.length;
        const total = page.total ?? startAt;
        if (page.issues.length < SPRINT_PAGE_SIZE || startAt >= total) {
          break;
        }
      }
    } catch (error) {
      this.logger.error('Failed to fetch Jira sprint issues', toError(error), {
        sprintId,
      });
      return [];
    }

    return tickets;
  }

  async transitionToDone(issueId: string): Promise<boolean> {
    this.requireCredentials();
    const path = `/rest/api/3/issue/${encodeURIComponent(issueId)}/transitions`;

    const transitions = await this.fetchTransitions(issueId, path);
    if (!transitions) {
      return false;
    }

    const done = transitions.find(
      (transition) =>
        transition.name?.toLowerCase() === 'done' || transition.to?.name?.toLowerCase() === 'done'
    );
    if (!done) {
      throw new ConfigurationError(`No 'Done' transition available for ${issueId}`);
    }

    await this.http.request(path, { method: 'POST', body: { transition: { id: done.id } } });
    this.logger.info('Transitioned Jira issue to Done', { issueId, transitionId: done.id });
    return true;
  }

  private async fetchTransitions(issueId: string, path: string) {
    try {
      const data = await this.http.request(path);
      return decodeResponse(JiraTransitionsResponseSchema, data, 'Jira transitions').transitions;
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.warn('Jira issue not found for transition', { issueId });
        return null;
      }
      throw error;
    }
  }

  private requireCredentials(): void {
    if (!this.isConfigured()) {
      throw new ConfigurationError('Jira credentials not configured (JIRA_DOMAIN, JIRA_EMAIL, JIRA_API_TOKEN)');
    }
  }

  private issueToTicket(issue: JiraIssue): UnifiedTicket {
    const fields: JiraIssueFields = issue.fields ?? {};
    const epicLink = fields[this.epicLinkField];
    const sprint = extractJiraSprint(fields[this.sprintField]);
    const description = adfToText(fields.description);

    return createTicket({
      id: issue.key,
      provider: 'jira',
      title: fields.summary ?? '',
      description: description || null,
      status: normalizeJiraStatus(fields.status?.name),
      issueType: normalizeJiraType(fields.issuetype?.name),
      priority: normalizeJiraPriority(fields.priority?.name),
      assigneeId: fields.assignee?.accountId ?? null,
      assigneeName: fields.assignee?.displayName ?? null,
      assigneeAvatar: fields.assignee?.avatarUrls?.['48x48'] ?? null,
      parentIssueId: fields.parent?.key ?? (typeof epicLink === 'string' && epicLink ? epicLink : null),
      relations: extractJiraRelations(fields),
      labels: fields.labels ?? [],
      sprintId: sprint?.id ?? null,
      sprintName: sprint?.name ?? null,
      createdAt: parseTimestamp(fields.created),
      updatedAt: parseTimestamp(fields.updated),
      rawData: issue,
    });
  }
}
