/**
 * Ghost-garden overlay for a dream
 */

import { errorMessage } from '../errors.js';
import type { GardenTriggers } from '../garden/types.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { DreamResult, VisualEffect } from '../types/index.js';

/** 'ok' or the error message, per triggered effect */
export type VisualizationReport = Record<string, string>;

function effectIssueIds(effect: VisualEffect): string[] {
  const ids: unknown = effect.issue_ids;
  return Array.isArray(ids) ? ids.filter((id): id is string => typeof id === 'string') : [];
}

/**
 * Clear earlier ghosts, send the overlay, then grow a ghost leaf for every
 * issue a visual effect names. Failures are recorded in the report.
 */
export async function visualizeDream(
  result: DreamResult,
  garden: GardenTriggers,
  logger: Logger = defaultLogger
): Promise<VisualizationReport> {
  const report: VisualizationReport = {};
  const log = logger.child({ dreamId: result.dream_id });

  const attempt = async (key: string, trigger: () => Promise<void>): Promise<void> => {
    try {
      await trigger();
      report[key] = 'ok';
    } catch (error) {
      report[key] = `error: ${errorMessage(error)}`;
      log.warn('Ghost trigger failed', { trigger: key, error: errorMessage(error) });
    }
  };

  await attempt('clear', () => garden.clearGhosts());
  await attempt('overlay', () => garden.spawnGhostOverlay(result.dream_id, result.ghost_intensity));

  for (const effect of result.visual_effects) {
    for (const issueId of effectIssueIds(effect)) {
      await attempt(`ghost_${issueId}`, () => garden.spawnGhostGrowth(issueId, 'leaf', result.ghost_intensity));
    }
  }

  return report;
}
