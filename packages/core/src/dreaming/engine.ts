/**
 * Dreaming engine: what-if simulation over sprint snapshots
 *
 * Each dream copies the snapshot, runs one scenario, attaches a
 * narrative and persists the result. The caller's snapshot is never
 * touched.
 */

import { SCENARIO_TYPES } from '../constants.js';
import { toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { ScenarioTypeSchema } from '../schemas/dream.js';
import type { ScenarioDefaults } from '../schemas/dream.js';
import type {
  DreamResult,
  DreamSummary,
  ScenarioParams,
  ScenarioType,
  SprintSnapshot,
} from '../types/index.js';
import { mergeScenarioParams } from './config.js';
import {
  fallbackSummary,
  TemplateNarrativeGenerator,
  type DreamDraft,
  type NarrativeGenerator,
} from './forecast.js';
import { resolveScenario, simulateScenario } from './scenarios/index.js';
import type { DreamStore } from './stores/types.js';

export interface DreamingEngineOptions {
  store: DreamStore;
  narrator?: NarrativeGenerator;
  scenarioDefaults?: ScenarioDefaults;
  logger?: Logger;
  /** Milliseconds since the epoch */
  now?: () => number;
}

export type SimulationOutcome =
  | { ok: true; result: DreamResult }
  | { ok: false; error: string; validScenarios: readonly ScenarioType[] };

export function isScenarioType(value: string): value is ScenarioType {
  return ScenarioTypeSchema.safeParse(value).success;
}

export class DreamingEngine {
  private readonly store: DreamStore;
  private readonly narrator: NarrativeGenerator;
  private readonly scenarioDefaults: ScenarioDefaults;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: DreamingEngineOptions) {
    this.store = options.store;
    this.narrator = options.narrator ?? new TemplateNarrativeGenerator();
    this.scenarioDefaults = options.scenarioDefaults ?? {};
    this.logger = (options.logger ?? defaultLogger).child({ component: 'dreaming' });
    this.now = options.now ?? Date.now;
  }

  /**
   * Run one scenario and persist the result
   */
  async dream(
    scenarioType: ScenarioType,
    snapshot: SprintSnapshot,
    params: ScenarioParams = {}
  ): Promise<DreamResult> {
    // Resolved once; the same values are simulated and stored
    const scenario = resolveScenario(
      scenarioType,
      structuredClone(mergeScenarioParams(this.scenarioDefaults, scenarioType, params))
    );
    const timestamp = Math.floor(this.now() / 1000);
    const dreamId = `dream_${scenarioType}_${timestamp}`;
    const log = this.logger.child({ dreamId, scenarioType });

    log.info('Dream requested', { params: scenario.params });

    const simulated = structuredClone(snapshot);
    log.debug('Snapshot copied', {
      issues: simulated.issues.length,
      teamMembers: simulated.team_members.length,
    });

    const outcome = simulateScenario(scenario, simulated);
    const draft: DreamDraft = {
      scenario_type: scenarioType,
      scenario_params: scenario.params,
      timestamp,
      dream_id: dreamId,
      ...outcome,
    };
    log.debug('Simulated', { riskScore: draft.risk_score, affected: draft.affected_issues.length });

    const result: DreamResult = { ...draft, impact_summary: await this.forecast(draft, snapshot) };
    log.debug('Forecast generated');

    try {
      await this.store.save(result);
      log.debug('Persisted');
    } catch (error) {
      log.error('Failed to persist dream', toError(error));
    }

    log.info('Dream complete', { riskScore: result.risk_score });
    return result;
  }

  /**
   * Validate the scenario name, then dream
   */
  async simulate(
    scenarioType: string,
    snapshot: SprintSnapshot,
    params: ScenarioParams = {}
  ): Promise<SimulationOutcome> {
    if (!isScenarioType(scenarioType)) {
      return {
        ok: false,
        error: `Unknown scenario type: ${scenarioType}`,
        validScenarios: SCENARIO_TYPES,
      };
    }
    return { ok: true, result: await this.dream(scenarioType, snapshot, params) };
  }

  listDreams(): Promise<DreamSummary[]> {
    return this.store.list();
  }

  loadDream(dreamId: string): Promise<DreamResult | null> {
    return this.store.load(dreamId);
  }

  private async forecast(draft: DreamDraft, snapshot: SprintSnapshot): Promise<string> {
    try {
      return await this.narrator.forecast(draft, snapshot);
    } catch (error) {
      this.logger.warn('Narrator failed, using fallback', {
        dreamId: draft.dream_id,
        error: toError(error).message,
      });
      return fallbackSummary(draft);
    }
  }
}
