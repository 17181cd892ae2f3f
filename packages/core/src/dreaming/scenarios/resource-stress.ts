/**
 * Resource stress: lose the most load-bearing team members
 */

import type { ResourceStressParams } from '../../schemas/dream.js';
import type { SprintSnapshot } from '../../types/index.js';
import { clamp01, clampCount, isOpen, type ScenarioOutcome } from './types.js';

const UNASSIGNED = 'unassigned';

export function simulateResourceStress(
  snapshot: SprintSnapshot,
  { remove_count }: ResourceStressParams
): ScenarioOutcome {
  const { team_members: team, issues, velocity } = snapshot;

  if (team.length === 0) {
    return {
      original_velocity: velocity,
      projected_velocity: velocity,
      risk_score: 0,
      affected_issues: [],
      ghost_intensity: 0.3,
      visual_effects: [],
    };
  }

  const removeCount = clampCount(remove_count, team.length);

  const workload = new Map<string, number>();
  for (const issue of issues) {
    const assignee = issue.assignee ?? UNASSIGNED;
    workload.set(assignee, (workload.get(assignee) ?? 0) + 1);
  }

  // Array sort is stable, so equal workloads keep team order
  const ranked = [...team].sort((a, b) => (workload.get(b) ?? 0) - (workload.get(a) ?? 0));
  const removed = new Set(ranked.slice(0, removeCount));

  const orphaned = issues
    .filter((issue) => isOpen(issue) && issue.assignee != null && removed.has(issue.assignee))
    .map((issue) => issue.id);

  const capacityRatio = (team.length - removeCount) / team.length;
  const orphanRatio = orphaned.length / Math.max(issues.length, 1);
  const riskScore = clamp01((1 - capacityRatio) * 0.6 + orphanRatio * 0.4);

  return {
    original_velocity: velocity,
    projected_velocity: velocity * capacityRatio,
    risk_score: riskScore,
    affected_issues: orphaned,
    ghost_intensity: 0.3 + riskScore * 0.5,
    visual_effects: [
      { type: 'narrow_paths', intensity: riskScore },
      { type: 'slow_growth', factor: capacityRatio },
      { type: 'wilted_leaves', issue_ids: orphaned },
    ],
  };
}
