/**
 * Narrative forecasts for dream results
 *
 * The LLM narrator is optional. Any failure (no client, timeout, empty
 * or failed completion) falls back to a summary built from the numbers.
 */

import { DEFAULT_FORECAST_TIMEOUT_MS } from '../constants.js';
import { errorMessage } from '../errors.js';
import type { TextCompleter } from '../llm/types.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { DreamResult, ScenarioParams, SprintSnapshot } from '../types/index.js';

/** A dream before its narrative is attached */
export type DreamDraft = Omit<DreamResult, 'impact_summary'>;

export type RiskLevel = 'low' | 'moderate' | 'high';

export interface NarrativeGenerator {
  forecast(draft: DreamDraft, snapshot: SprintSnapshot): Promise<string>;
}

export function riskLevel(score: number): RiskLevel {
  if (score < 0.3) {
    return 'low';
  }
  return score < 0.7 ? 'moderate' : 'high';
}

function numberParam(params: ScenarioParams, key: string): number {
  const value = params[key];
  return typeof value === 'number' ? value : 0;
}

/**
 * Deterministic summary from the computed fields
 */
export function fallbackSummary(draft: DreamDraft): string {
  const level = riskLevel(draft.risk_score);
  const affected = draft.affected_issues.length;

  switch (draft.scenario_type) {
    case 'resource_stress': {
      const drop = Math.abs(draft.projected_velocity - draft.original_velocity);
      return (
        `Removing resources would reduce velocity by ${drop.toFixed(1)} issues/sprint ` +
        `(${level} risk). ${affected} issues would become unassigned.`
      );
    }
    case 'scope_creep':
      return (
        `Adding ${numberParam(draft.scenario_params, 'additional_issues')} issues mid-sprint ` +
        `creates ${level} risk. Projected velocity drops to ${draft.projected_velocity.toFixed(1)}.`
      );
    case 'priority_shift':
      return (
        `Shifting ${numberParam(draft.scenario_params, 'shift_percentage')}% of resources ` +
        `would deprioritize ${affected} issues (${level} risk).`
      );
    default: {
      const unhandled: never = draft.scenario_type;
      return `Simulation complete for ${String(unhandled)}. Risk: ${level}.`;
    }
  }
}

export const FORECAST_SYSTEM_PROMPT =
  'You are a project management advisor. Based on simulation data, provide a concise ' +
  '2-3 sentence forecast of the likely outcome. Respond with only the forecast text, ' +
  'no formatting or headers.';

export function buildForecastPrompt(draft: DreamDraft, snapshot: SprintSnapshot): string {
  return [
    `Scenario: ${draft.scenario_type}`,
    `Parameters: ${JSON.stringify(draft.scenario_params)}`,
    `Original velocity: ${draft.original_velocity} issues/sprint`,
    `Projected velocity: ${draft.projected_velocity} issues/sprint`,
    `Risk score: ${draft.risk_score.toFixed(2)} (0=safe, 1=critical)`,
    `Affected issues count: ${draft.affected_issues.length}`,
    `Team size: ${snapshot.team_members.length}`,
    `Days remaining: ${snapshot.days_remaining}`,
  ].join('\n');
}

/**
 * Template-only narrator, used when no LLM is configured
 */
export class TemplateNarrativeGenerator implements NarrativeGenerator {
  async forecast(draft: DreamDraft): Promise<string> {
    return fallbackSummary(draft);
  }
}

export interface ClaudeNarrativeGeneratorOptions {
  completer: TextCompleter;
  timeoutMs?: number;
  logger?: Logger;
}

class ForecastTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Forecast timed out after ${timeoutMs}ms`);
    this.name = 'ForecastTimeoutError';
  }
}

/**
 * Reject when `promise` has not settled within `ms`
 */
async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ForecastTimeoutError(ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * LLM-backed narrator with a hard deadline
 */
export class ClaudeNarrativeGenerator implements NarrativeGenerator {
  private readonly completer: TextCompleter;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ClaudeNarrativeGeneratorOptions) {
    this.completer = options.completer;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FORECAST_TIMEOUT_MS;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'forecast' });
  }

  async forecast(draft: DreamDraft, snapshot: SprintSnapshot): Promise<string> {
    try {
      const response = await withTimeout(
        this.completer.complete(FORECAST_SYSTEM_PROMPT, buildForecastPrompt(draft, snapshot), {
          maxTokens: 256,
          temperature: 0.4,
          timeoutMs: this.timeoutMs,
        }),
        this.timeoutMs
      );

      const text = response.data?.trim();
      if (response.success && text) {
        return text;
      }
      this.logger.warn('Forecast unavailable, using fallback', {
        dreamId: draft.dream_id,
        error: response.error ?? 'empty completion',
      });
    } catch (error) {
      this.logger.warn('Forecast failed, using fallback', {
        dreamId: draft.dream_id,
        error: errorMessage(error),
      });
    }

    return fallbackSummary(draft);
  }
}
