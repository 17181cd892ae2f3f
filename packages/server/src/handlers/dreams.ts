/**
 * What-if simulation routes
 */

import {
  DreamRequestSchema,
  SCENARIO_TYPES,
  buildSprintSnapshot,
  isScenarioType,
  parseOrThrow,
  visualizeDream,
  type DreamingEngine,
  type GardenTriggers,
  type Logger,
  type ProviderRegistry,
  type SprintSnapshot,
} from '@sprint-garden/core';

import { parseJsonBody } from '../http/body.js';
import { badRequest, json, notFound, ok, type HttpResponse } from '../http/responses.js';
import type { ApiRequest, RouteHandler } from '../http/router.js';

export interface DreamDeps {
  engine: Pick<DreamingEngine, 'dream' | 'listDreams' | 'loadDream'>;
  registry: ProviderRegistry;
  garden: GardenTriggers;
  logger: Logger;
}

export function createDreamHandlers(deps: DreamDeps): Record<'create' | 'list' | 'get', RouteHandler> {
  const log = deps.logger.child({ component: 'dreams-api' });

  async function create(request: ApiRequest): Promise<HttpResponse> {
    const body = parseOrThrow(DreamRequestSchema, parseJsonBody(request.body), 'dream request');

    if (!isScenarioType(body.scenario_type)) {
      return badRequest(`Unknown scenario type: ${body.scenario_type}`, { valid_scenarios: SCENARIO_TYPES });
    }

    let snapshot: SprintSnapshot | null = body.sprint_data ?? null;
    if (!snapshot) {
      const provider = deps.registry.get(body.provider ?? 'jira');
      snapshot = await buildSprintSnapshot(provider);
      if (!snapshot) {
        return badRequest(`No active ${provider.name === 'linear' ? 'cycle' : 'sprint'} to dream about`);
      }
    }

    const result = await deps.engine.dream(body.scenario_type, snapshot, body.params);

    if (!body.visualize) {
      return json(201, result);
    }
    const visualization = await visualizeDream(result, deps.garden, log);
    return json(201, { ...result, visualization });
  }

  async function list(): Promise<HttpResponse> {
    const dreams = await deps.engine.listDreams();
    return ok({ dreams, count: dreams.length });
  }

  async function get(request: ApiRequest): Promise<HttpResponse> {
    const dreamId = request.params.id ?? '';
    const result = await deps.engine.loadDream(dreamId);
    return result ? ok(result) : notFound(`Dream not found: ${dreamId}`);
  }

  return { create, list, get };
}
