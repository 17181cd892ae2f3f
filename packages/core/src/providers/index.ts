export type { IssueProvider } from './types.js';
export { BaseIssueProvider, decodeResponse, emptyDependencies, verifyHmacSignature } from './base.js';
export {
  JiraProvider,
  JIRA_LINK_MAP,
  JIRA_PRIORITY_MAP,
  JIRA_STATUS_MAP,
  JIRA_TYPE_MAP,
  adfToText,
  extractJiraSprint,
  normalizeJiraPriority,
  normalizeJiraStatus,
  normalizeJiraType,
  type JiraProviderConfig,
} from './jira.js';
export {
  LinearProvider,
  LINEAR_GRAPHQL_URL,
  LINEAR_LABEL_TYPE_MAP,
  LINEAR_PRIORITY_MAP,
  LINEAR_RELATION_MAP,
  LINEAR_STATE_MAP,
  linearIssueToTicket,
  normalizeLinearPriority,
  normalizeLinearStatus,
  normalizeLinearType,
  type LinearProviderConfig,
} from './linear.js';
export { ProviderRegistry, createProviderRegistry, type ProvidersConfig } from './registry.js';
