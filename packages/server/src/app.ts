/**
 * Application wiring: providers, garden, dreaming and the task worker
 */

import {
  BUILTIN_SCENARIOS_PATH,
  ClaudeNarrativeGenerator,
  DreamRepository,
  DreamingEngine,
  DynamoDBClient,
  EventProcessor,
  FileDreamStore,
  HttpGarden,
  Logger,
  LoggingGarden,
  TaskQueue,
  TicketDreamTrigger,
  createHaikuClient,
  createProviderRegistry,
  loadScenarioDefaults,
  type DreamStore,
  type GardenTriggers,
  type NarrativeGenerator,
  type ProviderRegistry,
} from '@sprint-garden/core';

import type { AppConfig } from './config.js';
import { createApiHandlers } from './handlers/api.js';
import { createDreamHandlers } from './handlers/dreams.js';
import { createWebhookHandler } from './handlers/webhooks.js';
import type { Route } from './http/router.js';
import { createTicketEventHandler, type TicketEventTask } from './worker.js';

export interface App {
  config: AppConfig;
  logger: Logger;
  registry: ProviderRegistry;
  garden: GardenTriggers;
  engine: DreamingEngine;
  processor: EventProcessor;
  queue: TaskQueue<TicketEventTask>;
  routes: Route[];
}

/** Collaborators a caller may supply instead of the configured ones */
export interface AppOverrides {
  logger?: Logger;
  registry?: ProviderRegistry;
  garden?: GardenTriggers;
  store?: DreamStore;
  narrator?: NarrativeGenerator;
}

function createGarden(config: AppConfig, logger: Logger): GardenTriggers {
  const { url, retryAttempts, retryDelayMs, timeoutMs } = config.garden;
  if (!url) {
    return new LoggingGarden(logger);
  }
  return new HttpGarden({ url, retryAttempts, retryDelayMs, timeoutMs, logger });
}

function createStore(config: AppConfig, logger: Logger): DreamStore {
  const { store, dynamodbEndpoint, dreamsTable, dreamsDir } = config.dreaming;
  if (store === 'dynamodb') {
    const clientConfig = dynamodbEndpoint ? { endpoint: dynamodbEndpoint } : undefined;
    return new DreamRepository(new DynamoDBClient(clientConfig, dreamsTable));
  }
  return new FileDreamStore(dreamsDir, logger);
}

function createNarrator(config: AppConfig, logger: Logger): NarrativeGenerator | undefined {
  const { anthropicApiKey, forecastTimeoutMs } = config.dreaming;
  if (!anthropicApiKey) {
    return undefined;
  }
  return new ClaudeNarrativeGenerator({
    completer: createHaikuClient(anthropicApiKey),
    timeoutMs: forecastTimeoutMs,
    logger,
  });
}

export async function createApp(config: AppConfig, overrides: AppOverrides = {}): Promise<App> {
  const logger = overrides.logger ?? new Logger({ level: config.logLevel, context: { service: 'sprint-garden' } });

  const registry = overrides.registry ?? createProviderRegistry(config.providers, logger);

  const garden = overrides.garden ?? createGarden(config, logger);

  const engine = new DreamingEngine({
    store: overrides.store ?? createStore(config, logger),
    narrator: overrides.narrator ?? createNarrator(config, logger),
    scenarioDefaults: await loadScenarioDefaults(config.dreaming.scenariosPath ?? BUILTIN_SCENARIOS_PATH, logger),
    logger,
  });

  const processor = new EventProcessor({
    garden,
    dreamTrigger: new TicketDreamTrigger(engine, garden, logger),
    logger,
  });

  const queue = new TaskQueue<TicketEventTask>(
    createTicketEventHandler(processor, registry, logger.child({ component: 'worker' })),
    logger
  );

  const webhookDeps = { registry, queue, blockerStatuses: config.blockerStatuses, logger };
  const api = createApiHandlers({
    registry,
    queueStatus: () => queue.status(),
    gardenMode: config.garden.url ? 'http' : 'log',
    logger,
  });
  const dreams = createDreamHandlers({ engine, registry, garden, logger });

  const routes: Route[] = [
    { method: 'GET', path: '/health', handler: api.health },
    { method: 'GET', path: '/sprint_status', handler: api.sprintStatus },
    { method: 'POST', path: '/complete_task', handler: api.completeTask },
    { method: 'GET', path: '/team_members', handler: api.teamMembers },
    { method: 'GET', path: '/dependencies/:id', handler: api.dependencies },
    { method: 'POST', path: '/webhooks/jira', handler: createWebhookHandler('jira', webhookDeps) },
    { method: 'POST', path: '/webhooks/linear', handler: createWebhookHandler('linear', webhookDeps) },
    // Legacy single-tracker endpoint
    { method: 'POST', path: '/webhook', handler: createWebhookHandler('jira', webhookDeps) },
    { method: 'POST', path: '/dreams', handler: dreams.create },
    { method: 'GET', path: '/dreams', handler: dreams.list },
    { method: 'GET', path: '/dreams/:id', handler: dreams.get },
  ];

  return { config, logger, registry, garden, engine, processor, queue, routes };
}
