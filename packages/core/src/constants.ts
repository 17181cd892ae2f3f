/**
 * Application constants
 */

import type {
  GrowthType,
  IssueType,
  ScenarioType,
  WeatherState,
} from './types/index.js';

export const TABLE_NAME = process.env.DREAMS_TABLE ?? 'SprintGarden';

/** DynamoDB key prefixes */
export const KEY_PREFIX = {
  DREAM: 'DREAM#',
  DREAMS: 'DREAMS',
} as const;

export const SCENARIO_TYPES: readonly ScenarioType[] = [
  'resource_stress',
  'scope_creep',
  'priority_shift',
] as const;

/** Default blocker statuses for the Jira classifier */
export const DEFAULT_BLOCKER_STATUSES = ['Blocked', 'Impediment', 'On Hold', 'Waiting'] as const;

/** Provider API rate limit */
export const PROVIDER_RATE_LIMIT = {
  MAX_REQUESTS: 100,
  WINDOW_MS: 60_000,
} as const;

/** Circuit breaker thresholds for provider APIs */
export const PROVIDER_CIRCUIT_BREAKER = {
  FAILURE_THRESHOLD: 5,
  RESET_TIMEOUT_MS: 60_000,
} as const;

/** Garden host call defaults */
export const GARDEN_DEFAULTS = {
  RETRY_ATTEMPTS: 3,
  RETRY_DELAY_MS: 1000,
  TIMEOUT_MS: 5000,
} as const;

/** Maximum webhook body size (256 KB) */
export const MAX_BODY_SIZE = 256 * 1024;

// ============================================================================
// Garden growth tables
// ============================================================================

export const GROWTH_TYPE_BY_ISSUE_TYPE: Record<IssueType, GrowthType> = {
  epic: 'trunk',
  feature: 'branch',
  bug: 'flower',
  task: 'leaf',
  chore: 'bud',
};

export const GROWTH_MODIFIER_BY_PRIORITY: Record<number, number> = {
  5: 2.0,
  4: 1.5,
  3: 1.0,
  2: 0.75,
  1: 0.5,
};

/** RGB 0-1 per unified priority */
export const PRIORITY_COLORS: Record<number, readonly [number, number, number]> = {
  5: [1.0, 0.2, 0.2],
  4: [1.0, 0.6, 0.1],
  3: [0.3, 0.8, 0.3],
  2: [0.4, 0.6, 0.4],
  1: [0.5, 0.5, 0.5],
};

/** Weather thresholds over the active sprint */
export const WEATHER_THRESHOLDS: Record<Exclude<WeatherState, 'sunny'>, { blockedAbove: number; doneBelow: number }> = {
  storm: { blockedAbove: 0.2, doneBelow: 0.3 },
  cloudy: { blockedAbove: 0.1, doneBelow: 0.6 },
};

// ============================================================================
// Dreaming
// ============================================================================

/** Scope-creep priority weighting (1 is most urgent) */
export const SCOPE_PRIORITY_WEIGHT: Record<number, number> = {
  1: 1.5,
  2: 1.3,
  3: 1.0,
  4: 0.8,
};

export const DEFAULT_DAYS_REMAINING = 5;

/** Length of impact_summary in dream listings */
export const SUMMARY_PREVIEW_LENGTH = 100;

export const DEFAULT_FORECAST_TIMEOUT_MS = 15_000;
