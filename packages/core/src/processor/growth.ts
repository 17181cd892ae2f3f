/**
 * Growth parameters and sprint health derived from tickets
 */

import {
  GROWTH_MODIFIER_BY_PRIORITY,
  GROWTH_TYPE_BY_ISSUE_TYPE,
  PRIORITY_COLORS,
  WEATHER_THRESHOLDS,
} from '../constants.js';
import type { RGB } from '../garden/types.js';
import { isBlocked } from '../tickets/ticket.js';
import type { GrowthType, IssueType, UnifiedTicket, WeatherState } from '../types/index.js';

const DEFAULT_COLOR: RGB = [0.3, 0.8, 0.3];

const GROWTH_TABLE: Partial<Record<string, GrowthType>> = GROWTH_TYPE_BY_ISSUE_TYPE;

export function growthTypeFor(issueType: IssueType): GrowthType {
  return GROWTH_TABLE[issueType] ?? 'leaf';
}

export function growthModifierFor(priority: number): number {
  return GROWTH_MODIFIER_BY_PRIORITY[priority] ?? 1.0;
}

export function colorFor(priority: number): RGB {
  return PRIORITY_COLORS[priority] ?? DEFAULT_COLOR;
}

export interface SprintHealth {
  total: number;
  done: number;
  blocked: number;
  doneRatio: number;
  blockedRatio: number;
  weather: WeatherState;
}

export function weatherFor(doneRatio: number, blockedRatio: number): WeatherState {
  const { storm, cloudy } = WEATHER_THRESHOLDS;
  if (blockedRatio > storm.blockedAbove || doneRatio < storm.doneBelow) {
    return 'storm';
  }
  if (blockedRatio > cloudy.blockedAbove || doneRatio < cloudy.doneBelow) {
    return 'cloudy';
  }
  return 'sunny';
}

/**
 * Weather over a sprint's issues; an empty sprint is sunny
 */
export function computeSprintHealth(tickets: UnifiedTicket[]): SprintHealth {
  const total = tickets.length;
  const done = tickets.filter((ticket) => ticket.status === 'done').length;
  const blocked = tickets.filter(isBlocked).length;

  if (total === 0) {
    return { total, done, blocked, doneRatio: 0, blockedRatio: 0, weather: 'sunny' };
  }

  const doneRatio = done / total;
  const blockedRatio = blocked / total;
  return { total, done, blocked, doneRatio, blockedRatio, weather: weatherFor(doneRatio, blockedRatio) };
}
