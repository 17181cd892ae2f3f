export { EventProcessor, type DreamTrigger, type EventProcessorOptions } from './processor.js';
export { updateEnvironment, type EnvironmentUpdate } from './environment.js';
export {
  colorFor,
  computeSprintHealth,
  growthModifierFor,
  growthTypeFor,
  weatherFor,
  type SprintHealth,
} from './growth.js';
