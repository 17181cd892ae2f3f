/**
 * Read and write-back routes used by the garden host
 */

import { z } from 'zod';
import {
  ProviderNameSchema,
  computeSprintHealth,
  detectProvider,
  parseOrThrow,
  type Logger,
  type ProviderName,
  type ProviderRegistry,
  type QueueStatus,
} from '@sprint-garden/core';

import { parseJsonBody } from '../http/body.js';
import { badRequest, ok, type HttpResponse } from '../http/responses.js';
import type { ApiRequest, RouteHandler } from '../http/router.js';

export interface ApiDeps {
  registry: ProviderRegistry;
  queueStatus: () => QueueStatus;
  gardenMode: 'http' | 'log';
  logger: Logger;
}

const CompleteTaskSchema = z
  .object({
    issue_id: z.string().min(1).optional(),
    issue_key: z.string().min(1).optional(),
    provider: ProviderNameSchema.optional(),
  })
  .refine((body) => body.issue_id !== undefined || body.issue_key !== undefined, {
    message: 'Missing issue_id',
    path: ['issue_id'],
  });

interface TeamMember {
  account_id: string;
  display_name: string | null;
  avatar_url: string | null;
  active_tasks: string[];
  completed: number;
}

/**
 * `?provider=` with Jira as the default
 *
 * @throws {ValidationError} for an unknown provider name
 */
export function providerFromQuery(query: URLSearchParams): ProviderName {
  return parseOrThrow(ProviderNameSchema.default('jira'), query.get('provider') ?? undefined, 'provider');
}

function sprintWord(provider: ProviderName): string {
  return provider === 'linear' ? 'cycle' : 'sprint';
}

export function createApiHandlers(deps: ApiDeps): Record<
  'health' | 'sprintStatus' | 'completeTask' | 'teamMembers' | 'dependencies',
  RouteHandler
> {
  const { registry } = deps;
  const log = deps.logger.child({ component: 'api' });

  async function health(): Promise<HttpResponse> {
    const providers = Object.fromEntries(
      registry.list().map((provider) => [provider.name, { configured: provider.isConfigured() }])
    );
    return ok({
      status: 'healthy',
      service: 'sprint-garden',
      providers,
      garden: deps.gardenMode,
      queue: deps.queueStatus(),
    });
  }

  async function sprintStatus(request: ApiRequest): Promise<HttpResponse> {
    const provider = registry.get(providerFromQuery(request.query));
    const sprint = await provider.getActiveSprintOrCycle();

    if (!sprint) {
      return ok({
        status: 'no_sprint',
        provider: provider.name,
        weather: 'sunny',
        progress: 0.5,
        message: `No active ${sprintWord(provider.name)} found`,
      });
    }

    const health = computeSprintHealth(await provider.getSprintIssues(sprint.id));
    return ok({
      status: 'ok',
      provider: provider.name,
      sprint_name: sprint.name,
      weather: health.weather,
      progress: sprint.progress ?? health.doneRatio,
      issues_total: health.total,
      issues_done: health.done,
      issues_blocked: health.blocked,
    });
  }

  async function completeTask(request: ApiRequest): Promise<HttpResponse> {
    const body = parseOrThrow(CompleteTaskSchema, parseJsonBody(request.body), 'complete_task request');
    const issueId = body.issue_id ?? body.issue_key ?? '';
    const provider = registry.get(body.provider ?? detectProvider(issueId));

    log.info('Completion requested', { issue: issueId, provider: provider.name });

    const transitioned = await provider.transitionToDone(issueId);
    if (!transitioned) {
      return badRequest(`Failed to transition ${issueId}`);
    }
    return ok({ status: 'success', issue: issueId, provider: provider.name });
  }

  async function teamMembers(request: ApiRequest): Promise<HttpResponse> {
    const provider = registry.get(providerFromQuery(request.query));
    const sprint = await provider.getActiveSprintOrCycle();
    if (!sprint) {
      return ok({ status: 'ok', provider: provider.name, members: [] });
    }

    const members = new Map<string, TeamMember>();
    for (const ticket of await provider.getSprintIssues(sprint.id)) {
      if (!ticket.assigneeId) {
        continue;
      }
      let member = members.get(ticket.assigneeId);
      if (!member) {
        member = {
          account_id: ticket.assigneeId,
          display_name: ticket.assigneeName,
          avatar_url: ticket.assigneeAvatar,
          active_tasks: [],
          completed: 0,
        };
        members.set(ticket.assigneeId, member);
      }
      if (ticket.status === 'done') {
        member.completed++;
      } else {
        member.active_tasks.push(ticket.id);
      }
    }

    return ok({ status: 'ok', provider: provider.name, members: [...members.values()] });
  }

  async function dependencies(request: ApiRequest): Promise<HttpResponse> {
    const provider = registry.get(providerFromQuery(request.query));
    const issueId = request.params.id ?? '';
    return ok({
      status: 'ok',
      issue_id: issueId,
      provider: provider.name,
      dependencies: await provider.getIssueDependencies(issueId),
    });
  }

  return { health, sprintStatus, completeTask, teamMembers, dependencies };
}
