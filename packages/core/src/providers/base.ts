/**
 * Behaviour shared by every provider adapter
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

import type { z } from 'zod';

import { TransportError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import { formatZodIssues } from '../schemas/index.js';
import type {
  IssueDependencies,
  ProviderName,
  SprintInfo,
  UnifiedTicket,
} from '../types/index.js';
import type { IssueProvider } from './types.js';

/**
 * Constant-time check of an HMAC-SHA256 hex digest over the raw body.
 * A `sha256=` prefix on the signature is accepted.
 */
export function verifyHmacSignature(
  secret: string,
  payload: Buffer | string,
  signature: string | undefined
): boolean {
  if (!signature) {
    return false;
  }
  const provided = signature.startsWith('sha256=') ? signature.slice('sha256='.length) : signature;
  const expected = createHmac('sha256', secret).update(payload).digest('hex');

  const providedBuffer = Buffer.from(provided.toLowerCase(), 'utf8');
  const expectedBuffer = Buffer.from(expected, 'utf8');
  if (providedBuffer.length !== expectedBuffer.length) {
    return false;
  }
  return timingSafeEqual(providedBuffer, expectedBuffer);
}

/**
 * Validate a remote API response; a shape mismatch is a non-retryable
 * transport failure, not a caller error
 */
export function decodeResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  what: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new TransportError(
      `Unexpected ${what} response: ${formatZodIssues(result.error).join('; ')}`,
      undefined,
      false
    );
  }
  return result.data;
}

export function emptyDependencies(): IssueDependencies {
  return { blocks: [], blocked_by: [], relates_to: [] };
}

export abstract class BaseIssueProvider implements IssueProvider {
  abstract readonly name: ProviderName;
  protected readonly logger: Logger;

  constructor(
    protected readonly webhookSecret: string | undefined,
    logger?: Logger
  ) {
    this.logger = logger ?? defaultLogger;
  }

  abstract isConfigured(): boolean;
  abstract parseWebhook(payload: unknown): UnifiedTicket;
  abstract getIssue(issueId: string): Promise<UnifiedTicket | null>;
  abstract getActiveSprintOrCycle(): Promise<SprintInfo | null>;
  abstract getSprintIssues(sprintId: string): Promise<UnifiedTicket[]>;
  abstract transitionToDone(issueId: string): Promise<boolean>;

  async getIssueDependencies(issueId: string): Promise<IssueDependencies> {
    const ticket = await this.getIssue(issueId);
    const dependencies = emptyDependencies();
    if (!ticket) {
      return dependencies;
    }

    for (const relation of ticket.relations) {
      switch (relation.relationType) {
        case 'blocks':
          dependencies.blocks.push(relation.targetId);
          break;
        case 'blocked_by':
          dependencies.blocked_by.push(relation.targetId);
          break;
        case 'relates_to':
          dependencies.relates_to.push(relation.targetId);
          break;
        default:
          break;
      }
    }
    return dependencies;
  }

  /**
   * Permissive when no secret is configured
   */
  verifyWebhookSignature(payload: Buffer | string, signature: string | undefined): boolean {
    if (!this.webhookSecret) {
      this.logger.warn('No webhook secret configured, skipping verification', {
        provider: this.name,
      });
      return true;
    }
    return verifyHmacSignature(this.webhookSecret, payload, signature);
  }
}
