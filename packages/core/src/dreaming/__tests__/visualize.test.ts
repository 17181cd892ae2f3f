import { describe, it, expect, vi } from 'vitest';
import { visualizeDream } from '../visualize.js';
import type { GardenTriggers } from '../../garden/types.js';
import { silentLogger } from '../../logger.js';
import type { DreamResult } from '../../types/index.js';

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

function createResult(overrides: Partial<DreamResult> = {}): DreamResult {
  return {
    scenario_type: 'resource_stress',
    scenario_params: { remove_count: 1 },
    timestamp: 1_780_000_000,
    dream_id: 'dream_resource_stress_1780000000',
    original_velocity: 4,
    projected_velocity: 2,
    risk_score: 0.5,
    impact_summary: 'Removing 1 team member(s) orphans 2 issues.',
    affected_issues: ['KAN-1', 'KAN-2'],
    ghost_intensity: 0.6,
    visual_effects: [
      { type: 'wilting_trees', count: 2 },
      { type: 'wilted_leaves', issue_ids: ['KAN-1', 'KAN-2'] },
    ],
    ...overrides,
  };
}

describe('visualizeDream', () => {
  it('should clear old ghosts before the overlay and grow a ghost leaf per issue', async () => {
    const garden = createGarden();
    const order: string[] = [];
    garden.clearGhosts.mockImplementation(async () => {
      order.push('clear');
    });
    garden.spawnGhostOverlay.mockImplementation(async () => {
      order.push('overlay');
    });
    garden.spawnGhostGrowth.mockImplementation(async (branchId: string) => {
      order.push(branchId);
    });

    const report = await visualizeDream(createResult(), garden, silentLogger);

    expect(report).toEqual({ clear: 'ok', overlay: 'ok', 'ghost_KAN-1': 'ok', 'ghost_KAN-2': 'ok' });
    expect(order).toEqual(['clear', 'overlay', 'KAN-1', 'KAN-2']);
    expect(garden.spawnGhostOverlay).toHaveBeenCalledWith('dream_resource_stress_1780000000', 0.6);
    expect(garden.spawnGhostGrowth.mock.calls).toEqual([
      ['KAN-1', 'leaf', 0.6],
      ['KAN-2', 'leaf', 0.6],
    ]);
  });

  it('should record each failure and keep going', async () => {
    const garden = createGarden();
    garden.clearGhosts.mockRejectedValueOnce(new Error('garden offline'));
    garden.spawnGhostGrowth.mockImplementation(async (branchId: string) => {
      if (branchId === 'KAN-1') throw new Error('no such branch');
    });

    const report = await visualizeDream(createResult(), garden, silentLogger);

    expect(report).toEqual({
      clear: 'error: garden offline',
      overlay: 'ok',
      'ghost_KAN-1': 'error: no such branch',
      'ghost_KAN-2': 'ok',
    });
  });

  it('should skip effects without an issue list', async () => {
    const garden = createGarden();
    const result = createResult({
      visual_effects: [
        { type: 'overburdened_trees', load_factor: 1.5 },
        { type: 'ghost_issues', issue_ids: 'DREAM-1' },
        { type: 'stalled_growth', issue_ids: ['KAN-3', 7] },
      ],
    });

    const report = await visualizeDream(result, garden, silentLogger);

    expect(report).toEqual({ clear: 'ok', overlay: 'ok', 'ghost_KAN-3': 'ok' });
    expect(garden.spawnGhostGrowth).toHaveBeenCalledTimes(1);
  });

  it('should report overlay failures instead of throwing', async () => {
    const garden = createGarden();
    garden.spawnGhostOverlay.mockRejectedValueOnce(new Error('garden offline'));
    const result = createResult({ visual_effects: [] });

    await expect(visualizeDream(result, garden, silentLogger)).resolves.toEqual({
      clear: 'ok',
      overlay: 'error: garden offline',
    });
    await expect(visualizeDream(result, garden, silentLogger)).resolves.toEqual({ clear: 'ok', overlay: 'ok' });
  });
});
