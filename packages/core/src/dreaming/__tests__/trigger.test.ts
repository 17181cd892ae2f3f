import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BUILTIN_SCENARIOS_PATH, loadScenarioDefaults, mergeScenarioParams, readScenarioDefaults } from '../config.js';
import { DreamingEngine } from '../engine.js';
import { TicketDreamTrigger, scopePriorityFor } from '../trigger.js';
import { ValidationError } from '../../errors.js';
import type { GardenTriggers } from '../../garden/types.js';
import { silentLogger } from '../../logger.js';
import type { IssueProvider } from '../../providers/types.js';
import { createTicket } from '../../tickets/ticket.js';
import type { SprintInfo } from '../../types/index.js';

function createGarden() {
  return {
    grow: vi.fn().mockResolvedValue(undefined),
    shrink: vi.fn().mockResolvedValue(undefined),
    addThorns: vi.fn().mockResolvedValue(undefined),
    removeThorns: vi.fn().mockResolvedValue(undefined),
    setWeather: vi.fn().mockResolvedValue(undefined),
    setTime: vi.fn().mockResolvedValue(undefined),
    spawnGhostOverlay: vi.fn().mockResolvedValue(undefined),
    clearGhosts: vi.fn().mockResolvedValue(undefined),
    spawnGhostGrowth: vi.fn().mockResolvedValue(undefined),
    spawnVine: vi.fn().mockResolvedValue(undefined),
  } satisfies GardenTriggers;
}

const sprint: SprintInfo = {
  id: '12',
  name: 'Sprint 12',
  state: 'active',
  startDate: null,
  endDate: null,
  progress: null,
};

function createProvider(active: SprintInfo | null) {
  return {
    name: 'jira',
    isConfigured: vi.fn().mockReturnValue(true),
    parseWebhook: vi.fn(),
    getIssue: vi.fn().mockResolvedValue(null),
    getActiveSprintOrCycle: vi.fn().mockResolvedValue(active),
    getSprintIssues: vi.fn().mockResolvedValue([
      createTicket({ id: 'KAN-1', provider: 'jira', status: 'done', assigneeName: 'Alice' }),
      createTicket({ id: 'KAN-2', provider: 'jira', status: 'todo', assigneeName: 'Bob' }),
    ]),
    transitionToDone: vi.fn().mockResolvedValue(true),
    getIssueDependencies: vi.fn(),
    verifyWebhookSignature: vi.fn().mockReturnValue(true),
  } satisfies IssueProvider;
}

describe('scopePriorityFor', () => {
  it('should invert unified priority onto the 1-4 scale', () => {
    expect(scopePriorityFor(5)).toBe(1);
    expect(scopePriorityFor(4)).toBe(2);
    expect(scopePriorityFor(3)).toBe(3);
    expect(scopePriorityFor(2)).toBe(4);
    expect(scopePriorityFor(1)).toBe(4);
  });
});

describe('TicketDreamTrigger', () => {
  let garden: ReturnType<typeof createGarden>;
  let engine: DreamingEngine;
  const store = {
    save: vi.fn().mockResolvedValue(undefined),
    load: vi.fn().mockResolvedValue(null),
    list: vi.fn().mockResolvedValue([]),
  };

  beforeEach(() => {
    garden = createGarden();
    engine = new DreamingEngine({ store, logger: silentLogger, now: () => 1_780_000_000_000 });
  });

  it('should dream one unplanned issue and overlay the garden', async () => {
    const trigger = new TicketDreamTrigger(engine, garden, silentLogger);
    const ticket = createTicket({ id: 'KAN-9', provider: 'jira', priority: 4 });

    const result = await trigger.dreamForTicket(ticket, createProvider(sprint));

    expect(result).toMatchObject({
      scenario_type: 'scope_creep',
      scenario_params: { additional_issues: 1, priority: 2 },
      dream_id: 'dream_scope_creep_1780000000',
      affected_issues: ['DREAM-1'],
    });
    expect(garden.spawnGhostOverlay).toHaveBeenCalledWith('dream_scope_creep_1780000000', result?.ghost_intensity);
  });

  it('should skip when no sprint is active', async () => {
    const trigger = new TicketDreamTrigger(engine, garden, silentLogger);

    const result = await trigger.dreamForTicket(createTicket({ id: 'KAN-9', provider: 'jira' }), createProvider(null));

    expect(result).toBeNull();
    expect(garden.spawnGhostOverlay).not.toHaveBeenCalled();
  });
});

describe('scenario defaults', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'scenarios-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should ship defaults for every scenario', async () => {
    const defaults = await readScenarioDefaults(BUILTIN_SCENARIOS_PATH);

    expect(defaults.resource_stress?.default_params).toEqual({ remove_count: 1 });
    expect(defaults.scope_creep?.default_params).toEqual({ additional_issues: 5, priority: 3 });
    expect(defaults.priority_shift?.default_params).toEqual({ shift_percentage: 30 });
  });

  it('should reject a file that does not match the schema', async () => {
    const path = join(directory, 'bad.json');
    await writeFile(path, JSON.stringify({ scope_creep: { default_params: 'lots' } }), 'utf-8');

    await expect(readScenarioDefaults(path)).rejects.toThrow(ValidationError);
    await expect(loadScenarioDefaults(path, silentLogger)).resolves.toEqual({});
  });

  it('should degrade to no defaults when the file is missing', async () => {
    await expect(loadScenarioDefaults(join(directory, 'missing.json'), silentLogger)).resolves.toEqual({});
  });

  it('should let caller params win over defaults', () => {
    const defaults = { scope_creep: { default_params: { additional_issues: 5, priority: 3 } } };

    expect(mergeScenarioParams(defaults, 'scope_creep', { priority: 1 })).toEqual({
      additional_issues: 5,
      priority: 1,
    });
    expect(mergeScenarioParams(defaults, 'priority_shift')).toEqual({});
  });
});
