import type { VisualEffect } from '../../types/index.js';

/**
 * Numeric result of one scenario, before the narrative is attached
 */
export interface ScenarioOutcome {
  original_velocity: number;
  projected_velocity: number;
  risk_score: number;
  affected_issues: string[];
  ghost_intensity: number;
  visual_effects: VisualEffect[];
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Whole, non-negative count no larger than `max` */
export function clampCount(value: number, max = Number.POSITIVE_INFINITY): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(max, Math.max(0, Math.floor(value)));
}

export function isOpen(issue: { status: string }): boolean {
  return issue.status !== 'done';
}
