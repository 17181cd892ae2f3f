export type { GardenCommand, GardenTriggers, GrowParams, RGB } from './types.js';
export { CommandGarden, HttpGarden, LoggingGarden, type HttpGardenOptions } from './command-garden.js';
