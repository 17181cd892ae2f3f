/**
 * Scenario default parameters
 *
 * Built-in defaults ship in config/scenarios.json beside the package
 * sources; SCENARIOS_PATH can point at a replacement file.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { errorMessage } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { parseOrThrow } from '../schemas/index.js';
import { ScenarioDefaultsSchema, type ScenarioDefaults } from '../schemas/dream.js';
import type { ScenarioParams, ScenarioType } from '../types/index.js';

export const BUILTIN_SCENARIOS_PATH = fileURLToPath(
  new URL('../../config/scenarios.json', import.meta.url)
);

/**
 * Read and validate a scenario defaults file
 *
 * @throws {ValidationError} when the file does not match the schema
 */
export async function readScenarioDefaults(path: string): Promise<ScenarioDefaults> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
  return parseOrThrow(ScenarioDefaultsSchema, raw, `scenario defaults (${path})`);
}

/**
 * Load scenario defaults, degrading to no defaults when the file is
 * missing or invalid
 */
export async function loadScenarioDefaults(
  path: string = BUILTIN_SCENARIOS_PATH,
  logger: Logger = defaultLogger
): Promise<ScenarioDefaults> {
  try {
    return await readScenarioDefaults(path);
  } catch (error) {
    logger.warn('Failed to load scenario defaults', { path, error: errorMessage(error) });
    return {};
  }
}

/**
 * Caller overrides on top of the configured defaults
 */
export function mergeScenarioParams(
  defaults: ScenarioDefaults,
  scenarioType: ScenarioType,
  overrides: ScenarioParams = {}
): ScenarioParams {
  return { ...(defaults[scenarioType]?.default_params ?? {}), ...overrides };
}
