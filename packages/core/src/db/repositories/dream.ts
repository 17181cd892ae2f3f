/**
 * Dream repository
 *
 * DynamoDB-backed dream store. All dreams share one partition; the
 * sort key carries the dream id.
 *
 * Key schema:
 * - PK: DREAMS
 * - SK: DREAM#{dreamId}
 */

import { KEY_PREFIX } from '../../constants.js';
import { byRecency, toDreamSummary, type DreamStore } from '../../dreaming/stores/types.js';
import { DreamResultSchema } from '../../schemas/dream.js';
import type { DreamResult, DreamSummary } from '../../types/index.js';
import { DynamoDBClient } from '../client.js';

export class DreamRepository implements DreamStore {
  constructor(private db: DynamoDBClient) {}

  async save(result: DreamResult): Promise<void> {
    await this.db.put({
      PK: KEY_PREFIX.DREAMS,
      SK: `${KEY_PREFIX.DREAM}${result.dream_id}`,
      ...result,
    });
  }

  async load(dreamId: string): Promise<DreamResult | null> {
    const item = await this.db.get(KEY_PREFIX.DREAMS, `${KEY_PREFIX.DREAM}${dreamId}`);
    return item ? this.decode(item) : null;
  }

  /**
   * Every dream, newest first; follows pagination to the end
   */
  async list(): Promise<DreamSummary[]> {
    const summaries: DreamSummary[] = [];
    let cursor: Record<string, unknown> | undefined;

    do {
      const page = await this.db.query(KEY_PREFIX.DREAMS, KEY_PREFIX.DREAM, {
        exclusiveStartKey: cursor,
      });
      for (const item of page.items) {
        const result = this.decode(item);
        if (result) {
          summaries.push(toDreamSummary(result));
        }
      }
      cursor = page.lastKey;
    } while (cursor);

    return summaries.sort(byRecency);
  }

  /** Key attributes are stripped by the schema */
  private decode(item: Record<string, unknown>): DreamResult | null {
    const parsed = DreamResultSchema.safeParse(item);
    return parsed.success ? parsed.data : null;
  }
}
