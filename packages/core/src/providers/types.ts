/**
 * Issue provider capability interface
 *
 * Implemented once per tracker. Adding a tracker means implementing this
 * interface and registering it; nothing else branches on provider names.
 */

import type {
  IssueDependencies,
  ProviderName,
  SprintInfo,
  UnifiedTicket,
} from '../types/index.js';

export interface IssueProvider {
  readonly name: ProviderName;

  /** True when the credentials needed for API calls are present */
  isConfigured(): boolean;

  /**
   * Normalise a webhook payload. Pure, performs no I/O.
   *
   * @throws {ValidationError} when the issue identifier is missing
   */
  parseWebhook(payload: unknown): UnifiedTicket;

  /** Null when the tracker reports the issue as not found */
  getIssue(issueId: string): Promise<UnifiedTicket | null>;

  /** First active sprint or cycle, null when none is active */
  getActiveSprintOrCycle(): Promise<SprintInfo | null>;

  /** Issues in a sprint; empty when the fetch fails */
  getSprintIssues(sprintId: string): Promise<UnifiedTicket[]>;

  /**
   * @throws {ConfigurationError} when no transition to done exists
   * @throws {TransportError} when the tracker cannot be reached
   */
  transitionToDone(issueId: string): Promise<boolean>;

  getIssueDependencies(issueId: string): Promise<IssueDependencies>;

  verifyWebhookSignature(payload: Buffer | string, signature: string | undefined): boolean;
}
