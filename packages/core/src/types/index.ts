/**
 * Core TypeScript types for Sprint Garden
 *
 * Ticket types are camelCase in memory. Dream records keep their
 * snake_case field names because they are persisted and served as-is.
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type ProviderName = 'jira' | 'linear';

export type TicketStatus = 'todo' | 'in_progress' | 'blocked' | 'done';

export type IssueType = 'epic' | 'feature' | 'bug' | 'task' | 'chore';

export type RelationType =
  | 'blocks'
  | 'blocked_by'
  | 'parent'
  | 'child'
  | 'relates_to'
  | 'duplicates';

/** Semantic event derived from a provider webhook */
export type TicketEventType =
  | 'completed'
  | 'reopened'
  | 'blocked'
  | 'unblocked'
  | 'created'
  | 'updated';

export type ScenarioType = 'resource_stress' | 'scope_creep' | 'priority_shift';

export type GrowthType = 'trunk' | 'branch' | 'flower' | 'leaf' | 'bud';

export type WeatherState = 'storm' | 'cloudy' | 'sunny';

// ============================================================================
// Tickets
// ============================================================================

/**
 * Directed edge from one ticket to another
 */
export interface Relation {
  targetId: string;
  relationType: RelationType;
  targetProvider?: ProviderName;
}

/**
 * Provider-independent issue representation
 */
export interface UnifiedTicket {
  id: string;
  provider: ProviderName;
  title: string;
  description: string | null;
  status: TicketStatus;
  issueType: IssueType;
  /** 1-5, 5 is highest */
  priority: number;
  assigneeId: string | null;
  assigneeName: string | null;
  assigneeAvatar: string | null;
  /** Best-effort hierarchy: parentIssueId ?? containingProjectId */
  parentId: string | null;
  parentIssueId: string | null;
  containingProjectId: string | null;
  relations: Relation[];
  labels: string[];
  sprintId: string | null;
  sprintName: string | null;
  createdAt: Date | null;
  updatedAt: Date | null;
  rawData: Record<string, unknown>;
}

/**
 * Wire shape of a ticket returned by the HTTP API
 */
export interface TicketJSON {
  id: string;
  provider: ProviderName;
  title: string;
  description: string | null;
  status: TicketStatus;
  issue_type: IssueType;
  priority: number;
  assignee: { id: string | null; name: string | null; avatar: string | null } | null;
  parent_issue_id: string | null;
  containing_project_id: string | null;
  parent_id: string | null;
  relations: Array<{ target_id: string; type: RelationType; target_provider: ProviderName | null }>;
  labels: string[];
  sprint: { id: string; name: string | null } | null;
  created_at: string | null;
  updated_at: string | null;
}

export interface ClassifiedEvent {
  eventType: TicketEventType;
  fromStatus?: string;
  toStatus?: string;
}

// ============================================================================
// Sprints
// ============================================================================

/**
 * Active sprint (Jira) or cycle (Linear)
 */
export interface SprintInfo {
  id: string;
  name: string;
  state: string | null;
  startDate: string | null;
  endDate: string | null;
  /** 0-1 when the provider reports it (Linear cycles) */
  progress: number | null;
}

export interface IssueDependencies {
  blocks: string[];
  blocked_by: string[];
  relates_to: string[];
}

// ============================================================================
// Dreaming
// ============================================================================

/**
 * Lightweight issue record inside a sprint snapshot
 */
export interface SnapshotIssue {
  id: string;
  status: string;
  assignee?: string | null;
  priority?: number;
  epic?: string | null;
}

/**
 * Point-in-time sprint data fed to the dreaming engine
 */
export interface SprintSnapshot {
  issues: SnapshotIssue[];
  team_members: string[];
  velocity: number;
  days_remaining: number;
}

/**
 * Effect description handed to the visualisation host
 */
export interface VisualEffect {
  type: string;
  [key: string]: unknown;
}

export type ScenarioParams = Record<string, unknown>;

export interface DreamResult {
  scenario_type: ScenarioType;
  scenario_params: ScenarioParams;
  /** Unix seconds */
  timestamp: number;
  dream_id: string;
  original_velocity: number;
  projected_velocity: number;
  risk_score: number;
  impact_summary: string;
  affected_issues: string[];
  ghost_intensity: number;
  visual_effects: VisualEffect[];
}

export interface DreamSummary {
  dream_id: string;
  scenario_type: ScenarioType;
  timestamp: number;
  risk_score: number;
  impact_summary: string;
}

// ============================================================================
// Event processing
// ============================================================================

export type ProcessStatus =
  | 'growth_triggered'
  | 'shrink_triggered'
  | 'thorns_triggered'
  | 'thorns_removed'
  | 'dream_triggered'
  | 'received'
  | 'visualization_error'
  | 'dream_error';

/**
 * Outcome of processing one ticket event
 */
export interface ProcessResult {
  status: ProcessStatus;
  issue: string;
  action?: string;
  growth_type?: GrowthType;
  dream_id?: string;
  error?: string;
}
