/**
 * Linear provider tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  LinearProvider,
  type LinearProviderConfig,
  linearIssueToTicket,
  normalizeLinearPriority,
  normalizeLinearStatus,
  normalizeLinearType,
} from '../linear.js';
import { ConfigurationError, TransportError, ValidationError } from '../../errors.js';
import { silentLogger } from '../../logger.js';

const mockFetch = vi.fn();
global.fetch = mockFetch;

function graphql(data: unknown, errors?: Array<{ message: string }>): Response {
  return new Response(JSON.stringify({ data, errors }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createProvider(overrides: Partial<LinearProviderConfig> = {}) {
  return new LinearProvider({
    apiKey: 'test-secret',
    teamId: 'team-1',
    logger: silentLogger,
    http: { sleep: vi.fn().mockResolvedValue(undefined) },
    ...overrides,
  });
}

function requestBody(call: number): unknown {
  const init: unknown = mockFetch.mock.calls[call]?.[1];
  if (typeof init !== 'object' || init === null || !('body' in init) || typeof init.body !== 'string') {
    throw new Error(`no body for call ${call}`);
  }
  return JSON.parse(init.body);
}

const sampleIssue = {
  id: 'uuid-42',
  identifier: 'ENG-42',
  title: 'Cache avatars',
  description: 'Avoid refetching on every render',
  priority: 2,
  state: { id: 's-2', name: 'In Progress', type: 'started' },
  assignee: { id: 'u-1', name: 'Bob', avatarUrl: 'https://avatars.example.com/bob.png' },
  parent: { id: 'uuid-1', identifier: 'ENG-1' },
  project: { id: 'proj-1', name: 'Web' },
  cycle: { id: 'cycle-3', name: 'Cycle 3' },
  labels: { nodes: [{ id: 'l-1', name: 'Improvement' }, { id: 'l-2', name: 'Bug' }] },
  relations: { nodes: [{ type: 'blocks', relatedIssue: { id: 'uuid-43', identifier: 'ENG-43' } }] },
  inverseRelations: { nodes: [{ type: 'blocks', issue: { id: 'uuid-40', identifier: 'ENG-40' } }] },
  children: { nodes: [{ id: 'uuid-44', identifier: 'ENG-44' }] },
  createdAt: '2026-06-01T10:00:00.000Z',
  updatedAt: '2026-06-02T10:00:00.000Z',
};

describe('Linear normalisation', () => {
  it('should take the first label that names a type', () => {
    expect(normalizeLinearType(['frontend', 'Refactor', 'Bug'])).toBe('chore');
    expect(normalizeLinearType(['frontend'])).toBe('feature');
    expect(normalizeLinearType([])).toBe('feature');
  });

  it('should invert the Linear priority scale', () => {
    expect(normalizeLinearPriority(1)).toBe(5);
    expect(normalizeLinearPriority(4)).toBe(2);
    expect(normalizeLinearPriority(0)).toBe(3);
    expect(normalizeLinearPriority(null)).toBe(3);
    expect(normalizeLinearPriority(9)).toBe(3);
  });

  it('should map state types', () => {
    expect(normalizeLinearStatus('canceled')).toBe('done');
    expect(normalizeLinearStatus('Started')).toBe('in_progress');
    expect(normalizeLinearStatus('triage')).toBe('todo');
    expect(normalizeLinearStatus(undefined)).toBe('todo');
  });

  it('should build a ticket with relations from both directions', () => {
    const ticket = linearIssueToTicket(sampleIssue);

    expect(ticket).toMatchObject({
      id: 'ENG-42',
      provider: 'linear',
      title: 'Cache avatars',
      status: 'in_progress',
      issueType: 'feature',
      priority: 4,
      assigneeName: 'Bob',
      parentIssueId: 'ENG-1',
      containingProjectId: 'proj-1',
      parentId: 'ENG-1',
      labels: ['Improvement', 'Bug'],
      sprintId: 'cycle-3',
      sprintName: 'Cycle 3',
    });
    expect(ticket.relations).toEqual([
      { targetId: 'ENG-43', relationType: 'blocks', targetProvider: 'linear' },
      { targetId: 'ENG-40', relationType: 'blocked_by', targetProvider: 'linear' },
      { targetId: 'ENG-44', relationType: 'child', targetProvider: 'linear' },
    ]);
  });
});

describe('LinearProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  describe('parseWebhook', () => {
    it('should read the issue from data', () => {
      const ticket = createProvider().parseWebhook({
        action: 'update',
        type: 'Issue',
        data: { id: 'uuid-7', identifier: 'ENG-7', title: 'Ship', labels: [{ name: 'Bug' }] },
      });

      expect(ticket).toMatchObject({ id: 'ENG-7', title: 'Ship', issueType: 'bug', labels: ['Bug'] });
    });

    it('should read the issue nested under data.issue', () => {
      const ticket = createProvider().parseWebhook({
        action: 'create',
        type: 'Comment',
        data: { id: 'comment-1', issue: { id: 'uuid-8', identifier: 'ENG-8' } },
      });

      expect(ticket.id).toBe('ENG-8');
    });

    it('should fall back to the uuid when there is no identifier', () => {
      const ticket = createProvider().parseWebhook({ action: 'update', type: 'Issue', data: { id: 'uuid-9' } });
      expect(ticket.id).toBe('uuid-9');
    });

    it('should reject an issue without any id', () => {
      expect(() =>
        createProvider().parseWebhook({ action: 'update', type: 'Issue', data: { title: 'orphan' } })
      ).toThrow(ValidationError);
    });
  });

  describe('getIssue', () => {
    it('should post the GraphQL query with the API key', async () => {
      mockFetch.mockResolvedValueOnce(graphql({ issue: sampleIssue }));

      const ticket = await createProvider().getIssue('ENG-42');

      expect(ticket?.id).toBe('ENG-42');
      const [url, init] = mockFetch.mock.calls[0] ?? [];
      expect(url).toBe('https://api.linear.app/graphql');
      expect(init).toMatchObject({ method: 'POST', headers: { Authorization: 'test-secret' } });
      expect(requestBody(0)).toMatchObject({ variables: { identifier: 'ENG-42' } });
    });

    it('should return null when Linear reports the issue as not found', async () => {
      mockFetch.mockResolvedValueOnce(graphql(null, [{ message: 'Entity not found: Issue' }]));
      await expect(createProvider().getIssue('ENG-999')).resolves.toBeNull();
    });

    it('should raise other GraphQL errors without data', async () => {
      mockFetch.mockResolvedValueOnce(graphql(null, [{ message: 'Argument Validation Error' }]));

      const error = await createProvider().getIssue('ENG-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'Linear GraphQL error: Argument Validation Error', retryable: false });
    });

    it('should refuse to call the API without a key', async () => {
      await expect(createProvider({ apiKey: undefined }).getIssue('ENG-1')).rejects.toThrow(ConfigurationError);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('getActiveSprintOrCycle', () => {
    it('should map the active cycle', async () => {
      mockFetch.mockResolvedValueOnce(
        graphql({
          team: {
            activeCycle: { id: 'cycle-3', number: 3, startsAt: '2026-06-01', endsAt: '2026-06-14', progress: 0.4 },
          },
        })
      );

      await expect(createProvider().getActiveSprintOrCycle()).resolves.toEqual({
        id: 'cycle-3',
        name: 'Cycle 3',
        state: 'active',
        startDate: '2026-06-01',
        endDate: '2026-06-14',
        progress: 0.4,
      });
    });

    it('should return null without an active cycle', async () => {
      mockFetch.mockResolvedValueOnce(graphql({ team: { activeCycle: null } }));
      await expect(createProvider().getActiveSprintOrCycle()).resolves.toBeNull();
    });

    it('should require a team id', async () => {
      await expect(createProvider({ teamId: undefined }).getActiveSprintOrCycle()).rejects.toThrow(
        'LINEAR_TEAM_ID not configured'
      );
    });
  });

  describe('getSprintIssues', () => {
    it('should map the cycle issues', async () => {
      mockFetch.mockResolvedValueOnce(graphql({ cycle: { issues: { nodes: [sampleIssue] } } }));
      const tickets = await createProvider().getSprintIssues('cycle-3');
      expect(tickets.map((ticket) => ticket.id)).toEqual(['ENG-42']);
    });

    it('should return an empty list on failure', async () => {
      mockFetch.mockResolvedValueOnce(new Response('unauthorized', { status: 401 }));
      await expect(createProvider().getSprintIssues('cycle-3')).resolves.toEqual([]);
    });
  });

  describe('transitionToDone', () => {
    it('should move the issue to the completed state by uuid', async () => {
      mockFetch
        .mockResolvedValueOnce(
          graphql({
            team: {
              states: {
                nodes: [
                  { id: 's-1', name: 'Todo', type: 'unstarted' },
                  { id: 's-9', name: 'Done', type: 'completed' },
                ],
              },
            },
          })
        )
        .mockResolvedValueOnce(graphql({ issue: sampleIssue }))
        .mockResolvedValueOnce(graphql({ issueUpdate: { success: true } }));

      await expect(createProvider().transitionToDone('ENG-42')).resolves.toBe(true);
      expect(requestBody(2)).toMatchObject({ variables: { issueId: 'uuid-42', stateId: 's-9' } });
    });

    it('should fail when the team has no completed state', async () => {
      mockFetch.mockResolvedValueOnce(graphql({ team: { states: { nodes: [{ id: 's-1', type: 'started' }] } } }));
      await expect(createProvider().transitionToDone('ENG-42')).rejects.toThrow(
        'No completed workflow state found for Linear team'
      );
    });

    it('should return false for an unknown issue', async () => {
      mockFetch
        .mockResolvedValueOnce(graphql({ team: { states: { nodes: [{ id: 's-9', type: 'completed' }] } } }))
        .mockResolvedValueOnce(graphql(null, [{ message: 'Entity not found' }]));

      await expect(createProvider().transitionToDone('ENG-999')).resolves.toBe(false);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });
  });
});
