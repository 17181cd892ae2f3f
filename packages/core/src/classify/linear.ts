/**
 * Linear event classification from `action`, `updatedFrom` and `data`
 *
 * Rule order:
 * 1. state changed to a completed or canceled state: completed
 * 2. blockers changed and the issue now has blockers: blocked
 * 3. blockers changed, it had blockers before and has none now: unblocked
 * 4. create action: created
 * 5. anything else: updated
 */

import { isRecord } from '../guards.js';
import type { ClassifiedEvent } from '../types/index.js';

const DONE_STATE_TYPES = new Set(['completed', 'canceled']);

/**
 * Number of blockers in a `blockedBy` value, which arrives either as a
 * connection (`{nodes: [...]}`) or a plain list
 */
function blockerCount(value: unknown): number {
  if (Array.isArray(value)) {
    return value.length;
  }
  if (isRecord(value) && Array.isArray(value.nodes)) {
    return value.nodes.length;
  }
  return 0;
}

/**
 * Only Issue webhooks are classified; callers should ignore other types
 */
export function isLinearIssueWebhook(payload: unknown): boolean {
  return isRecord(payload) && payload.type === 'Issue';
}

export function classifyLinearWebhook(payload: unknown): ClassifiedEvent {
  if (!isRecord(payload) || payload.type !== 'Issue') {
    return { eventType: 'updated' };
  }

  const updatedFrom = isRecord(payload.updatedFrom) ? payload.updatedFrom : {};
  const data = isRecord(payload.data) ? payload.data : {};
  const state = isRecord(data.state) ? data.state : {};
  const stateType = typeof state.type === 'string' ? state.type.toLowerCase() : '';

  if ('stateId' in updatedFrom && DONE_STATE_TYPES.has(stateType)) {
    return {
      eventType: 'completed',
      toStatus: typeof state.name === 'string' ? state.name : stateType,
    };
  }

  if ('blockedBy' in updatedFrom || 'blocking' in updatedFrom) {
    if (blockerCount(data.blockedBy) > 0) {
      return { eventType: 'blocked' };
    }
    if (blockerCount(updatedFrom.blockedBy) > 0) {
      return { eventType: 'unblocked' };
    }
  }

  if (payload.action === 'create') {
    return { eventType: 'created' };
  }
  return { eventType: 'updated' };
}
