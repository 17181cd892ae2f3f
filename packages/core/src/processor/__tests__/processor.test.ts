/**
 * Event Processor Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventProcessor, type DreamTrigger } from '../processor.js';
import { updateEnvironment } from '../environment.js';
import type { GardenTriggers } from '../../garden/types.js';
import type { IssueProvider } from '../../providers/types.js';
import { silentLogger } from '../../logger.js';
import { createTicket } from '../../tickets/ticket.js';
import type { DreamResult, SprintInfo, UnifiedTicket } from '../../types/index.js';

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

const activeSprint: SprintInfo = {
  id: '12',
  name: 'Sprint 12',
  state: 'active',
  startDate: null,
  endDate: null,
  progress: null,
};

function createProvider(sprint: SprintInfo | null = activeSprint, issues: UnifiedTicket[] = []) {
  return {
    name: 'jira',
    isConfigured: vi.fn().mockReturnValue(true),
    parseWebhook: vi.fn(),
    getIssue: vi.fn().mockResolvedValue(null),
    getActiveSprintOrCycle: vi.fn().mockResolvedValue(sprint),
    getSprintIssues: vi.fn().mockResolvedValue(issues),
    transitionToDone: vi.fn().mockResolvedValue(true),
    getIssueDependencies: vi.fn(),
    verifyWebhookSignature: vi.fn().mockReturnValue(true),
  } satisfies IssueProvider;
}

function dreamResult(dreamId: string): DreamResult {
  return {
    scenario_type: 'scope_creep',
    scenario_params: { additional_issues: 1, priority: 2 },
    timestamp: 1_780_000_000,
    dream_id: dreamId,
    original_velocity: 3,
    projected_velocity: 2,
    risk_score: 0.4,
    impact_summary: 'summary',
    affected_issues: ['DREAM-1'],
    ghost_intensity: 0.56,
    visual_effects: [],
  };
}

const feature = createTicket({
  id: 'KAN-7',
  provider: 'jira',
  issueType: 'feature',
  priority: 4,
  parentIssueId: 'KAN-1',
  relations: [
    { targetId: 'KAN-8', relationType: 'blocks' },
    { targetId: 'KAN-9', relationType: 'relates_to' },
  ],
});

const bug = createTicket({ id: 'KAN-20', provider: 'jira', issueType: 'bug', priority: 2 });

describe('EventProcessor', () => {
  let garden: ReturnType<typeof createGarden>;
  let provider: ReturnType<typeof createProvider>;

  beforeEach(() => {
    garden = createGarden();
    provider = createProvider();
  });

  function createProcessor(dreamTrigger?: DreamTrigger) {
    return new EventProcessor({ garden, dreamTrigger, logger: silentLogger });
  }

  it('should grow a branch for a completed feature', async () => {
    const result = await createProcessor().processTicketEvent(feature, { eventType: 'completed' }, provider);

    expect(result).toEqual({ status: 'growth_triggered', issue: 'KAN-7', growth_type: 'branch' });
    expect(garden.grow).toHaveBeenCalledWith({
      branchId: 'KAN-7',
      growthType: 'branch',
      growthModifier: 1.5,
      color: [1.0, 0.6, 0.1],
      epicId: 'KAN-1',
    });
  });

  it('should shrink a reopened ticket', async () => {
    const result = await createProcessor().processTicketEvent(bug, { eventType: 'reopened' }, provider);

    expect(result).toEqual({ status: 'shrink_triggered', issue: 'KAN-20' });
    expect(garden.shrink).toHaveBeenCalledWith('KAN-20');
  });

  it('should add thorns and vines for a blocked ticket', async () => {
    const result = await createProcessor().processTicketEvent(feature, { eventType: 'blocked' }, provider);

    expect(result).toEqual({ status: 'thorns_triggered', issue: 'KAN-7' });
    expect(garden.addThorns).toHaveBeenCalledWith('KAN-7', 'KAN-1');
    expect(garden.spawnVine.mock.calls).toEqual([
      ['KAN-7', 'KAN-8', 'blocks'],
      ['KAN-7', 'KAN-9', 'relates_to'],
    ]);
  });

  it('should remove thorns for an unblocked ticket', async () => {
    const result = await createProcessor().processTicketEvent(bug, { eventType: 'unblocked' }, provider);

    expect(result).toEqual({ status: 'thorns_removed', issue: 'KAN-20' });
    expect(garden.removeThorns).toHaveBeenCalledWith('KAN-20');
  });

  it('should keep spawning vines after one fails', async () => {
    garden.spawnVine.mockRejectedValueOnce(new Error('garden offline'));

    const result = await createProcessor().processTicketEvent(feature, { eventType: 'blocked' }, provider);

    expect(result.status).toBe('thorns_triggered');
    expect(garden.spawnVine).toHaveBeenCalledTimes(2);
  });

  it('should report a failed trigger as a visualization error', async () => {
    garden.grow.mockRejectedValueOnce(new Error('garden offline'));

    const result = await createProcessor().processTicketEvent(feature, { eventType: 'completed' }, provider);

    expect(result).toEqual({ status: 'visualization_error', issue: 'KAN-7', error: 'garden offline' });
    expect(garden.setWeather).toHaveBeenCalled();
  });

  describe('dreaming', () => {
    it('should spawn vines and dream for a created ticket', async () => {
      const dreamTrigger = { dreamForTicket: vi.fn().mockResolvedValue(dreamResult('dream_scope_creep_1')) };

      const result = await createProcessor(dreamTrigger).processTicketEvent(
        feature,
        { eventType: 'created' },
        provider
      );

      expect(result).toEqual({ status: 'dream_triggered', issue: 'KAN-7', dream_id: 'dream_scope_creep_1' });
      expect(dreamTrigger.dreamForTicket).toHaveBeenCalledWith(feature, provider);
      expect(garden.spawnVine).toHaveBeenCalledTimes(2);
    });

    it('should dream on updates to branch-sized tickets only', async () => {
      const dreamTrigger = { dreamForTicket: vi.fn().mockResolvedValue(dreamResult('dream_scope_creep_2')) };
      const processor = createProcessor(dreamTrigger);

      const featureResult = await processor.processTicketEvent(feature, { eventType: 'updated' }, provider);
      const bugResult = await processor.processTicketEvent(bug, { eventType: 'updated' }, provider);

      expect(featureResult.status).toBe('dream_triggered');
      expect(bugResult).toEqual({ status: 'received', issue: 'KAN-20', action: 'processed' });
      expect(dreamTrigger.dreamForTicket).toHaveBeenCalledTimes(1);
    });

    it('should report when no sprint is active', async () => {
      const dreamTrigger = { dreamForTicket: vi.fn().mockResolvedValue(null) };

      const result = await createProcessor(dreamTrigger).processTicketEvent(bug, { eventType: 'created' }, provider);

      expect(result).toEqual({ status: 'received', issue: 'KAN-20', action: 'no_active_sprint' });
    });

    it('should report a failed dream without throwing', async () => {
      const dreamTrigger = { dreamForTicket: vi.fn().mockRejectedValue(new Error('provider down')) };

      const result = await createProcessor(dreamTrigger).processTicketEvent(bug, { eventType: 'created' }, provider);

      expect(result).toEqual({ status: 'dream_error', issue: 'KAN-20', error: 'provider down' });
    });

    it('should only acknowledge when no dream trigger is wired', async () => {
      const result = await createProcessor().processTicketEvent(bug, { eventType: 'created' }, provider);
      expect(result).toEqual({ status: 'received', issue: 'KAN-20', action: 'processed' });
    });
  });

  it('should refresh the environment after every event', async () => {
    await createProcessor().processTicketEvent(bug, { eventType: 'reopened' }, provider);

    expect(provider.getActiveSprintOrCycle).toHaveBeenCalledTimes(1);
    expect(provider.getSprintIssues).toHaveBeenCalledWith('12');
    expect(garden.setWeather).toHaveBeenCalledWith('sunny');
    expect(garden.setTime).toHaveBeenCalledWith(0);
  });
});

describe('updateEnvironment', () => {
  it('should push weather and the done ratio as progress', async () => {
    const garden = createGarden();
    const provider = createProvider(activeSprint, [
      createTicket({ id: 'KAN-1', provider: 'jira', status: 'done' }),
      createTicket({ id: 'KAN-2', provider: 'jira', status: 'todo' }),
    ]);

    const update = await updateEnvironment(provider, garden, silentLogger);

    expect(update).toMatchObject({ sprintId: '12', progress: 0.5 });
    expect(update?.health.weather).toBe('cloudy');
    expect(garden.setWeather).toHaveBeenCalledWith('cloudy');
    expect(garden.setTime).toHaveBeenCalledWith(0.5);
  });

  it('should prefer the progress reported by the provider', async () => {
    const garden = createGarden();
    const provider = createProvider({ ...activeSprint, progress: 0.8 });

    await updateEnvironment(provider, garden, silentLogger);

    expect(garden.setTime).toHaveBeenCalledWith(0.8);
  });

  it('should skip when no sprint is active', async () => {
    const garden = createGarden();

    await expect(updateEnvironment(createProvider(null), garden, silentLogger)).resolves.toBeNull();
    expect(garden.setWeather).not.toHaveBeenCalled();
  });

  it('should skip when the sprint lookup fails', async () => {
    const garden = createGarden();
    const provider = createProvider();
    provider.getActiveSprintOrCycle.mockRejectedValueOnce(new Error('timeout'));

    await expect(updateEnvironment(provider, garden, silentLogger)).resolves.toBeNull();
  });

  it('should still set the time when setting the weather fails', async () => {
    const garden = createGarden();
    garden.setWeather.mockRejectedValueOnce(new Error('garden offline'));

    const update = await updateEnvironment(createProvider(), garden, silentLogger);

    expect(update).not.toBeNull();
    expect(garden.setTime).toHaveBeenCalledWith(0);
  });
});
