/**
 * Garden implementations that turn trigger calls into generic
 * `{command, params}` messages
 */

import { GARDEN_DEFAULTS } from '../constants.js';
import { errorMessage, TransportError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { sleep as defaultSleep, withLinearRetry } from '../transport/retry.js';
import type { GrowthType, RelationType, WeatherState } from '../types/index.js';
import type { GardenCommand, GardenTriggers, GrowParams } from './types.js';

export abstract class CommandGarden implements GardenTriggers {
  protected abstract send(command: GardenCommand): Promise<void>;

  grow(params: GrowParams): Promise<void> {
    return this.send({
      command: 'grow',
      params: {
        branch_id: params.branchId,
        growth_type: params.growthType,
        growth_modifier: params.growthModifier,
        color: [...params.color],
        epic_id: params.epicId,
      },
    });
  }

  shrink(branchId: string): Promise<void> {
    return this.send({ command: 'shrink', params: { branch_id: branchId } });
  }

  addThorns(branchId: string, epicId: string | null): Promise<void> {
    return this.send({ command: 'add_thorns', params: { branch_id: branchId, epic_id: epicId } });
  }

  removeThorns(branchId: string): Promise<void> {
    return this.send({ command: 'remove_thorns', params: { branch_id: branchId } });
  }

  setWeather(state: WeatherState): Promise<void> {
    return this.send({ command: 'set_weather', params: { state } });
  }

  setTime(progress: number): Promise<void> {
    return this.send({ command: 'set_time', params: { progress } });
  }

  spawnGhostOverlay(dreamId: string, intensity: number): Promise<void> {
    return this.send({ command: 'spawn_ghost_overlay', params: { dream_id: dreamId, intensity } });
  }

  clearGhosts(): Promise<void> {
    return this.send({ command: 'clear_ghosts', params: {} });
  }

  spawnGhostGrowth(branchId: string, growthType: GrowthType, opacity: number): Promise<void> {
    return this.send({
      command: 'spawn_ghost_growth',
      params: { branch_id: branchId, growth_type: growthType, opacity },
    });
  }

  spawnVine(fromId: string, toId: string, relationType: RelationType): Promise<void> {
    return this.send({
      command: 'spawn_vine',
      params: { from_id: fromId, to_id: toId, relation_type: relationType },
    });
  }
}

export interface HttpGardenOptions {
  url: string;
  retryAttempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * POSTs each command as JSON to the garden host, retrying with linear backoff
 */
export class HttpGarden extends CommandGarden {
  private readonly logger: Logger;

  constructor(private readonly options: HttpGardenOptions) {
    super();
    this.logger = (options.logger ?? defaultLogger).child({ component: 'garden' });
  }

  protected async send(command: GardenCommand): Promise<void> {
    await withLinearRetry(() => this.post(command), {
      attempts: this.options.retryAttempts ?? GARDEN_DEFAULTS.RETRY_ATTEMPTS,
      delayMs: this.options.retryDelayMs ?? GARDEN_DEFAULTS.RETRY_DELAY_MS,
      sleep: this.options.sleep ?? defaultSleep,
      onRetry: (attempt, error, delayMs) =>
        this.logger.warn('Garden command failed, retrying', {
          command: command.command,
          attempt,
          delayMs,
          error: errorMessage(error),
        }),
    });
  }

  private async post(command: GardenCommand): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(command),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? GARDEN_DEFAULTS.TIMEOUT_MS),
      });
    } catch (error) {
      throw new TransportError(`Garden host unreachable: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      throw new TransportError(
        `Garden host rejected ${command.command}: ${response.status} ${response.statusText}`,
        response.status,
        response.status === 429 || response.status >= 500
      );
    }
  }
}

/**
 * Records commands in the log only; used when no garden host is configured
 */
export class LoggingGarden extends CommandGarden {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    super();
    this.logger = (logger ?? defaultLogger).child({ component: 'garden' });
  }

  protected async send(command: GardenCommand): Promise<void> {
    this.logger.info('Garden command', { command: command.command, params: command.params });
  }
}
