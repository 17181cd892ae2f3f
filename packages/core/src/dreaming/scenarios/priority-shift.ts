/**
 * Priority shift: move effort from every other epic onto one target
 *
 * Total velocity is unchanged; the scenario only redistributes it.
 */

import type { PriorityShiftParams } from '../../schemas/dream.js';
import type { SnapshotIssue, SprintSnapshot } from '../../types/index.js';
import { clamp01, isOpen, type ScenarioOutcome } from './types.js';

const NO_EPIC = 'no_epic';

/**
 * Group issues by epic, keeping first-seen epic order
 */
export function groupByEpic(issues: SnapshotIssue[]): Map<string, SnapshotIssue[]> {
  const epics = new Map<string, SnapshotIssue[]>();
  for (const issue of issues) {
    const key = issue.epic ?? NO_EPIC;
    const group = epics.get(key);
    if (group) {
      group.push(issue);
    } else {
      epics.set(key, [issue]);
    }
  }
  return epics;
}

/**
 * Epic with the most open issues; the first one wins a tie
 */
export function busiestEpic(epics: Map<string, SnapshotIssue[]>): string | null {
  let best: string | null = null;
  let bestOpen = -1;
  for (const [epic, issues] of epics) {
    const open = issues.filter(isOpen).length;
    if (open > bestOpen) {
      best = epic;
      bestOpen = open;
    }
  }
  return best;
}

export function simulatePriorityShift(snapshot: SprintSnapshot, params: PriorityShiftParams): ScenarioOutcome {
  const { issues, velocity } = snapshot;
  const shiftPct = Math.min(100, Math.max(0, params.shift_percentage)) / 100;

  const epics = groupByEpic(issues);
  const targetEpic = params.target_epic ?? busiestEpic(epics);

  const starvedEpics = [...epics.keys()].filter((epic) => epic !== targetEpic);
  const starvedIssues: string[] = [];
  for (const epic of starvedEpics) {
    const open = (epics.get(epic) ?? []).filter(isOpen);
    const starvedCount = Math.floor(open.length * shiftPct);
    starvedIssues.push(...open.slice(0, starvedCount).map((issue) => issue.id));
  }

  const riskScore =
    issues.length === 0 ? 0 : clamp01(starvedIssues.length / issues.length + shiftPct * 0.3);

  return {
    original_velocity: velocity,
    projected_velocity: velocity,
    risk_score: riskScore,
    affected_issues: starvedIssues,
    ghost_intensity: 0.3 + riskScore * 0.3,
    visual_effects: [
      { type: 'firefly_reroute', from_epics: starvedEpics, to_epic: targetEpic },
      { type: 'accelerated_growth', epic: targetEpic, boost: shiftPct },
      { type: 'stalled_growth', issue_ids: starvedIssues },
    ],
  };
}
