/**
 * Garden-wide weather and time of day from the active sprint
 */

import type { GardenTriggers } from '../garden/types.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { IssueProvider } from '../providers/types.js';
import { toError } from '../errors.js';
import type { SprintInfo } from '../types/index.js';
import { computeSprintHealth, type SprintHealth } from './growth.js';

export interface EnvironmentUpdate {
  sprintId: string;
  health: SprintHealth;
  progress: number;
}

/**
 * Recompute sprint health and push weather and progress to the garden.
 * Returns null when no sprint is active or the lookup fails; never throws.
 */
export async function updateEnvironment(
  provider: IssueProvider,
  garden: GardenTriggers,
  logger: Logger = defaultLogger
): Promise<EnvironmentUpdate | null> {
  let sprint: SprintInfo | null;
  try {
    sprint = await provider.getActiveSprintOrCycle();
  } catch (error) {
    logger.warn('Active sprint lookup failed', { provider: provider.name, error: toError(error).message });
    return null;
  }

  if (!sprint) {
    logger.debug('No active sprint, skipping environment update', { provider: provider.name });
    return null;
  }

  const tickets = await provider.getSprintIssues(sprint.id);
  const health = computeSprintHealth(tickets);
  const progress = sprint.progress ?? health.doneRatio;

  try {
    await garden.setWeather(health.weather);
  } catch (error) {
    logger.error('Failed to set weather', toError(error), { weather: health.weather });
  }

  try {
    await garden.setTime(progress);
  } catch (error) {
    logger.error('Failed to set time of day', toError(error), { progress });
  }

  logger.info('Environment updated', {
    provider: provider.name,
    sprintId: sprint.id,
    weather: health.weather,
    progress,
    doneRatio: health.doneRatio,
    blockedRatio: health.blockedRatio,
  });

  return { sprintId: sprint.id, health, progress };
}
