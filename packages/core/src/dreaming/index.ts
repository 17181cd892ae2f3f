/**
 * Dreaming module
 *
 * What-if simulation, narrative forecasts and dream persistence.
 */

export { DreamingEngine, isScenarioType, type DreamingEngineOptions, type SimulationOutcome } from './engine.js';
export {
  BUILTIN_SCENARIOS_PATH,
  loadScenarioDefaults,
  mergeScenarioParams,
  readScenarioDefaults,
} from './config.js';
export {
  buildForecastPrompt,
  ClaudeNarrativeGenerator,
  fallbackSummary,
  FORECAST_SYSTEM_PROMPT,
  riskLevel,
  TemplateNarrativeGenerator,
  type ClaudeNarrativeGeneratorOptions,
  type DreamDraft,
  type NarrativeGenerator,
  type RiskLevel,
} from './forecast.js';
export * from './scenarios/index.js';
export {
  buildSprintSnapshot,
  daysUntil,
  snapshotFromTickets,
  ticketToSnapshotIssue,
  type SnapshotOptions,
} from './snapshot.js';
export { FileDreamStore } from './stores/file-store.js';
export { byRecency, toDreamSummary, type DreamStore } from './stores/types.js';
export { scopePriorityFor, TicketDreamTrigger } from './trigger.js';
export { visualizeDream, type VisualizationReport } from './visualize.js';
