/**
 * Scope creep: unplanned issues land mid-sprint
 */

import { SCOPE_PRIORITY_WEIGHT } from '../../constants.js';
import type { ScopeCreepParams } from '../../schemas/dream.js';
import type { SprintSnapshot } from '../../types/index.js';
import { clamp01, clampCount, isOpen, type ScenarioOutcome } from './types.js';

export function simulateScopeCreep(snapshot: SprintSnapshot, params: ScopeCreepParams): ScenarioOutcome {
  const { issues, velocity, days_remaining: daysRemaining } = snapshot;
  const additional = clampCount(params.additional_issues);

  const currentOpen = issues.filter(isOpen).length;
  const totalAfter = currentOpen + additional;

  const dailyThroughput = velocity / Math.max(daysRemaining, 1);
  const projectedCompletion = dailyThroughput * daysRemaining;
  const overloadRatio = totalAfter / Math.max(projectedCompletion, 1);

  const priorityWeight = SCOPE_PRIORITY_WEIGHT[params.priority] ?? 1.0;
  const riskScore = clamp01((overloadRatio - 1.0) * 0.5 * priorityWeight);

  const syntheticIds = Array.from({ length: additional }, (_, i) => `DREAM-${i + 1}`);

  return {
    original_velocity: velocity,
    projected_velocity: velocity / Math.max(overloadRatio, 1.0),
    risk_score: riskScore,
    affected_issues: syntheticIds,
    ghost_intensity: 0.4 + riskScore * 0.4,
    visual_effects: [
      { type: 'overburdened_trees', load_factor: overloadRatio },
      { type: 'drooping_branches', count: additional },
      { type: 'ghost_issues', issue_ids: syntheticIds },
    ],
  };
}
