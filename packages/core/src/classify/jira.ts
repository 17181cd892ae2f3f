/**
 * Jira event classification from the webhook changelog
 *
 * The first `status` item decides; items are read in delivery order.
 * Precedence within one item: to Done, from Done, to blocker, from blocker.
 * A status item matching none of these falls through to the next one.
 */

import { DEFAULT_BLOCKER_STATUSES } from '../constants.js';
import { isRecord, ownString } from '../guards.js';
import type { ClassifiedEvent } from '../types/index.js';

export interface JiraClassifierOptions {
  /** Compared case-insensitively */
  blockerStatuses?: readonly string[];
}

function changelogItems(payload: unknown): Record<string, unknown>[] {
  if (!isRecord(payload) || !isRecord(payload.changelog)) {
    return [];
  }
  const items = payload.changelog.items;
  return Array.isArray(items) ? items.filter(isRecord) : [];
}

export function classifyJiraWebhook(
  payload: unknown,
  options: JiraClassifierOptions = {}
): ClassifiedEvent {
  const blockers = new Set(
    (options.blockerStatuses ?? DEFAULT_BLOCKER_STATUSES).map((status) => status.toLowerCase())
  );

  for (const item of changelogItems(payload)) {
    if (ownString(item, 'field') !== 'status') {
      continue;
    }

    const fromStatus = ownString(item, 'fromString') ?? '';
    const toStatus = ownString(item, 'toString') ?? '';
    const from = fromStatus.toLowerCase();
    const to = toStatus.toLowerCase();

    if (to === 'done') {
      return { eventType: 'completed', fromStatus, toStatus };
    }
    if (from === 'done') {
      return { eventType: 'reopened', fromStatus, toStatus };
    }
    if (blockers.has(to)) {
      return { eventType: 'blocked', fromStatus, toStatus };
    }
    if (blockers.has(from)) {
      return { eventType: 'unblocked', fromStatus, toStatus };
    }
  }

  return { eventType: 'updated' };
}
