import {
  PriorityShiftParamsSchema,
  ResourceStressParamsSchema,
  ScopeCreepParamsSchema,
  type PriorityShiftParams,
  type ResourceStressParams,
  type ScopeCreepParams,
} from '../../schemas/dream.js';
import type { ScenarioParams, ScenarioType, SprintSnapshot } from '../../types/index.js';
import { simulatePriorityShift } from './priority-shift.js';
import { simulateResourceStress } from './resource-stress.js';
import { simulateScopeCreep } from './scope-creep.js';
import type { ScenarioOutcome } from './types.js';

/** A scenario with the exact parameters it will be simulated with */
export type ResolvedScenario =
  | { scenarioType: 'resource_stress'; params: ResourceStressParams }
  | { scenarioType: 'scope_creep'; params: ScopeCreepParams }
  | { scenarioType: 'priority_shift'; params: PriorityShiftParams };

export function resolveScenario(scenarioType: ScenarioType, params: ScenarioParams): ResolvedScenario {
  switch (scenarioType) {
    case 'resource_stress':
      return { scenarioType, params: ResourceStressParamsSchema.parse(params) };
    case 'scope_creep':
      return { scenarioType, params: ScopeCreepParamsSchema.parse(params) };
    case 'priority_shift':
      return { scenarioType, params: PriorityShiftParamsSchema.parse(params) };
  }
}

export function simulateScenario(scenario: ResolvedScenario, snapshot: SprintSnapshot): ScenarioOutcome {
  switch (scenario.scenarioType) {
    case 'resource_stress':
      return simulateResourceStress(snapshot, scenario.params);
    case 'scope_creep':
      return simulateScopeCreep(snapshot, scenario.params);
    case 'priority_shift':
      return simulatePriorityShift(snapshot, scenario.params);
  }
}

export { simulateResourceStress } from './resource-stress.js';
export { simulateScopeCreep } from './scope-creep.js';
export { simulatePriorityShift, groupByEpic, busiestEpic } from './priority-shift.js';
export { clamp01, clampCount, type ScenarioOutcome } from './types.js';
