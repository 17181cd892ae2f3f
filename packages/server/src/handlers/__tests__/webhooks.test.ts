import { createHmac } from 'node:crypto';

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createProviderRegistry, silentLogger } from '@sprint-garden/core';

import { jsonRequest } from '../../__tests__/fixtures.js';
import { dispatch, type Route } from '../../http/router.js';
import { createWebhookHandler, type WebhookDeps } from '../webhooks.js';

const SECRET = 'test-secret';

function sign(body: Buffer): string {
  return createHmac('sha256', SECRET).update(body).digest('hex');
}

const jiraPayload = {
  webhookEvent: 'jira:issue_updated',
  issue: {
    key: 'KAN-42',
    fields: {
      summary: 'Add login form',
      status: { name: 'Done' },
      issuetype: { name: 'Story' },
      priority: { name: 'High' },
    },
  },
  changelog: { items: [{ field: 'status', fromString: 'In Progress', toString: 'Done' }] },
};

const linearPayload = {
  action: 'create',
  type: 'Issue',
  data: {
    id: 'uuid-7',
    identifier: 'ENG-7',
    title: 'Cache cycle lookups',
    priority: 2,
    state: { name: 'Todo', type: 'unstarted' },
  },
};

describe('createWebhookHandler', () => {
  let deps: WebhookDeps & { queue: { enqueue: ReturnType<typeof vi.fn> } };
  let routes: Route[];

  beforeEach(() => {
    deps = {
      registry: createProviderRegistry(
        { jira: { webhookSecret: SECRET }, linear: { webhookSecret: SECRET } },
        silentLogger
      ),
      queue: { enqueue: vi.fn().mockReturnValue('task-1') },
      blockerStatuses: ['Blocked', 'Needs Info'],
      logger: silentLogger,
    };
    routes = [
      { method: 'POST', path: '/webhooks/jira', handler: createWebhookHandler('jira', deps) },
      { method: 'POST', path: '/webhooks/linear', handler: createWebhookHandler('linear', deps) },
    ];
  });

  function post(path: string, payload: unknown, signature?: (body: Buffer) => string) {
    const request = jsonRequest(path, payload);
    const header = path.endsWith('jira') ? 'x-hub-signature' : 'linear-signature';
    if (signature) {
      request.headers[header] = signature(request.body);
    }
    return dispatch(routes, request, silentLogger);
  }

  it('should enqueue a signed Jira event and acknowledge it', async () => {
    const response = await post('/webhooks/jira', jiraPayload, (body) => `sha256=${sign(body)}`);

    expect(response).toEqual({
      status: 200,
      body: { status: 'accepted', issue: 'KAN-42', event_type: 'completed', task_id: 'task-1' },
    });
    expect(deps.queue.enqueue).toHaveBeenCalledWith({
      provider: 'jira',
      ticket: expect.objectContaining({ id: 'KAN-42', status: 'done', issueType: 'feature', priority: 4 }),
      event: { eventType: 'completed', fromStatus: 'In Progress', toStatus: 'Done' },
    });
  });

  it('should classify with the configured blocker statuses', async () => {
    const payload = {
      ...jiraPayload,
      changelog: { items: [{ field: 'status', fromString: 'In Progress', toString: 'Needs Info' }] },
    };

    const response = await post('/webhooks/jira', payload, sign);

    expect(response.body).toMatchObject({ status: 'accepted', event_type: 'blocked' });
  });

  it('should reject a bad or missing signature before parsing', async () => {
    const wrong = await post('/webhooks/jira', jiraPayload, () => 'sha256=deadbeef');
    const missing = await post('/webhooks/linear', linearPayload);

    expect(wrong).toEqual({ status: 401, body: { error: 'Invalid signature', code: 'UNAUTHORISED' } });
    expect(missing.status).toBe(401);
    expect(deps.queue.enqueue).not.toHaveBeenCalled();
  });

  it('should answer 400 for a payload that is not JSON', async () => {
    const request = jsonRequest('/webhooks/jira', {});
    const body = Buffer.from('{not json');

    const response = await dispatch(
      routes,
      { ...request, body, headers: { 'x-hub-signature': sign(body) } },
      silentLogger
    );

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ code: 'VALIDATION_ERROR' });
    expect(JSON.stringify(response.body)).toContain('Invalid JSON payload');
  });

  it('should answer 400 when the issue key is missing', async () => {
    const response = await post('/webhooks/jira', { webhookEvent: 'jira:issue_updated', issue: {} }, sign);

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ code: 'VALIDATION_ERROR' });
    expect(deps.queue.enqueue).not.toHaveBeenCalled();
  });

  it('should enqueue a created Linear issue', async () => {
    const response = await post('/webhooks/linear', linearPayload, sign);

    expect(response.body).toEqual({
      status: 'accepted',
      issue: 'ENG-7',
      event_type: 'created',
      task_id: 'task-1',
    });
    expect(deps.queue.enqueue).toHaveBeenCalledWith(
      expect.objectContaining({ provider: 'linear', event: { eventType: 'created' } })
    );
  });

  it('should ignore Linear webhooks about other entities', async () => {
    const response = await post('/webhooks/linear', { action: 'create', type: 'Comment', data: { id: 'c-1' } }, sign);

    expect(response).toEqual({ status: 200, body: { status: 'ignored' } });
    expect(deps.queue.enqueue).not.toHaveBeenCalled();
  });
});
