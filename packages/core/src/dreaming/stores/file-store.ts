/**
 * Dream store backed by one JSON file per dream
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage } from '../../errors.js';
import { logger as defaultLogger, type Logger } from '../../logger.js';
import { DreamResultSchema } from '../../schemas/dream.js';
import type { DreamResult, DreamSummary } from '../../types/index.js';
import { byRecency, toDreamSummary, type DreamStore } from './types.js';

/** Dream ids become file names, so only a safe alphabet is accepted */
const DREAM_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileDreamStore implements DreamStore {
  private readonly logger: Logger;

  constructor(
    private readonly directory: string,
    logger?: Logger
  ) {
    this.logger = (logger ?? defaultLogger).child({ component: 'dream-store' });
  }

  async save(result: DreamResult): Promise<void> {
    if (!DREAM_ID_PATTERN.test(result.dream_id)) {
      throw new Error(`Invalid dream id: ${result.dream_id}`);
    }
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(result.dream_id), JSON.stringify(result, null, 2), 'utf-8');
    this.logger.info('Dream saved', { dreamId: result.dream_id });
  }

  async load(dreamId: string): Promise<DreamResult | null> {
    if (!DREAM_ID_PATTERN.test(dreamId)) {
      return null;
    }

    let content: string;
    try {
      content = await readFile(this.pathFor(dreamId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    return this.decode(dreamId, content);
  }

  async list(): Promise<DreamSummary[]> {
    let files: string[];
    try {
      files = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const summaries: DreamSummary[] = [];
    for (const file of files.filter((name) => name.endsWith('.json'))) {
      const result = await this.load(file.slice(0, -'.json'.length));
      if (result) {
        summaries.push(toDreamSummary(result));
      }
    }
    return summaries.sort(byRecency);
  }

  private pathFor(dreamId: string): string {
    return join(this.directory, `${dreamId}.json`);
  }

  private decode(dreamId: string, content: string): DreamResult | null {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      this.logger.warn('Unreadable dream file', { dreamId, error: errorMessage(error) });
      return null;
    }

    const parsed = DreamResultSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Dream file failed validation', { dreamId, error: parsed.error.message });
      return null;
    }
    return parsed.data;
  }
}
