import type { ClassifiedEvent, ProviderName } from '../types/index.js';
import { classifyJiraWebhook, type JiraClassifierOptions } from './jira.js';
import { classifyLinearWebhook } from './linear.js';

export { classifyJiraWebhook, type JiraClassifierOptions } from './jira.js';
export { classifyLinearWebhook, isLinearIssueWebhook } from './linear.js';

export interface ClassifierOptions {
  jira?: JiraClassifierOptions;
}

/**
 * Classify a raw webhook payload for the given provider
 */
export function classify(
  provider: ProviderName,
  payload: unknown,
  options: ClassifierOptions = {}
): ClassifiedEvent {
  switch (provider) {
    case 'jira':
      return classifyJiraWebhook(payload, options.jira);
    case 'linear':
      return classifyLinearWebhook(payload);
    default: {
      const unhandled: never = provider;
      throw new Error(`No classifier for provider: ${String(unhandled)}`);
    }
  }
}
