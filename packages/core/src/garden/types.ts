/**
 * Trigger vocabulary consumed by the visualisation host
 *
 * Every call is best-effort; implementations reject once their own
 * retries are exhausted.
 */

import type { GrowthType, RelationType, WeatherState } from '../types/index.js';

export type RGB = readonly [number, number, number];

export interface GrowParams {
  branchId: string;
  growthType: GrowthType;
  growthModifier: number;
  color: RGB;
  epicId: string | null;
}

export interface GardenTriggers {
  grow(params: GrowParams): Promise<void>;
  shrink(branchId: string): Promise<void>;
  addThorns(branchId: string, epicId: string | null): Promise<void>;
  removeThorns(branchId: string): Promise<void>;
  setWeather(state: WeatherState): Promise<void>;
  /** 0-1 progress through the sprint */
  setTime(progress: number): Promise<void>;
  spawnGhostOverlay(dreamId: string, intensity: number): Promise<void>;
  /** Removes every ghost overlay and ghost growth */
  clearGhosts(): Promise<void>;
  spawnGhostGrowth(branchId: string, growthType: GrowthType, opacity: number): Promise<void>;
  spawnVine(fromId: string, toId: string, relationType: RelationType): Promise<void>;
}

/**
 * Wire form of a trigger call
 */
export interface GardenCommand {
  command:
    | 'grow'
    | 'shrink'
    | 'add_thorns'
    | 'remove_thorns'
    | 'set_weather'
    | 'set_time'
    | 'spawn_ghost_overlay'
    | 'clear_ghosts'
    | 'spawn_ghost_growth'
    | 'spawn_vine';
  params: Record<string, unknown>;
}
