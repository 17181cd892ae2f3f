import { SUMMARY_PREVIEW_LENGTH } from '../../constants.js';
import type { DreamResult, DreamSummary } from '../../types/index.js';

/**
 * Durable home for dream results, keyed by dream_id
 */
export interface DreamStore {
  save(result: DreamResult): Promise<void>;
  /** Null when no dream has that id */
  load(dreamId: string): Promise<DreamResult | null>;
  /** Newest first */
  list(): Promise<DreamSummary[]>;
}

export function toDreamSummary(result: DreamResult): DreamSummary {
  return {
    dream_id: result.dream_id,
    scenario_type: result.scenario_type,
    timestamp: result.timestamp,
    risk_score: result.risk_score,
    impact_summary: result.impact_summary.slice(0, SUMMARY_PREVIEW_LENGTH),
  };
}

/**
 * Newest first; ids break ties so the order is stable
 */
export function byRecency(a: DreamSummary, b: DreamSummary): number {
  if (a.timestamp !== b.timestamp) {
    return b.timestamp - a.timestamp;
  }
  if (a.dream_id === b.dream_id) {
    return 0;
  }
  return a.dream_id < b.dream_id ? 1 : -1;
}
