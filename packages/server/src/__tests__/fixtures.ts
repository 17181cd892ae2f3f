/**
 * Shared request and provider fakes for server tests
 */

import { vi } from 'vitest';
import type { IssueProvider, ProviderName, SprintInfo, UnifiedTicket } from '@sprint-garden/core';

import type { ApiRequest } from '../http/router.js';

export function apiRequest(overrides: Partial<ApiRequest> = {}): ApiRequest {
  return {
    method: 'GET',
    path: '/',
    query: new URLSearchParams(),
    params: {},
    headers: {},
    body: Buffer.alloc(0),
    ...overrides,
  };
}

export function jsonRequest(path: string, body: unknown, overrides: Partial<ApiRequest> = {}): ApiRequest {
  return apiRequest({ method: 'POST', path, body: Buffer.from(JSON.stringify(body)), ...overrides });
}

export function fakeProvider(
  name: ProviderName,
  options: { sprint?: SprintInfo | null; tickets?: UnifiedTicket[]; configured?: boolean } = {}
) {
  return {
    name,
    isConfigured: vi.fn().mockReturnValue(options.configured ?? true),
    parseWebhook: vi.fn(),
    getIssue: vi.fn().mockResolvedValue(null),
    getActiveSprintOrCycle: vi.fn().mockResolvedValue(options.sprint ?? null),
    getSprintIssues: vi.fn().mockResolvedValue(options.tickets ?? []),
    transitionToDone: vi.fn().mockResolvedValue(true),
    getIssueDependencies: vi.fn().mockResolvedValue({ blocks: [], blocked_by: [], relates_to: [] }),
    verifyWebhookSignature: vi.fn().mockReturnValue(true),
  } satisfies IssueProvider;
}

export const activeSprint: SprintInfo = {
  id: '12',
  name: 'Sprint 12',
  state: 'active',
  startDate: '2026-06-01T00:00:00.000Z',
  endDate: '2026-06-14T00:00:00.000Z',
  progress: null,
};
