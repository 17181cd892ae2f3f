/**
 * Zod schemas for sprint snapshots, dream requests and persisted dreams
 */

import { z } from 'zod';
import { DEFAULT_DAYS_REMAINING } from '../constants.js';

export const ScenarioTypeSchema = z.enum(['resource_stress', 'scope_creep', 'priority_shift']);

export const SnapshotIssueSchema = z
  .object({
    id: z.string(),
    status: z.string().default('todo'),
    assignee: z.string().nullish(),
    priority: z.number().optional(),
    epic: z.string().nullish(),
  })
  .passthrough();

export const SprintSnapshotSchema = z.object({
  issues: z.array(SnapshotIssueSchema).default([]),
  team_members: z.array(z.string()).default([]),
  velocity: z.number().nonnegative().default(1),
  days_remaining: z.number().nonnegative().default(DEFAULT_DAYS_REMAINING),
});

export const VisualEffectSchema = z.object({ type: z.string() }).passthrough();

export const DreamResultSchema = z.object({
  scenario_type: ScenarioTypeSchema,
  scenario_params: z.record(z.unknown()),
  timestamp: z.number(),
  dream_id: z.string().min(1),
  original_velocity: z.number(),
  projected_velocity: z.number(),
  risk_score: z.number().min(0).max(1),
  impact_summary: z.string(),
  affected_issues: z.array(z.string()),
  ghost_intensity: z.number().min(0).max(1),
  visual_effects: z.array(VisualEffectSchema),
});

/**
 * Body of a simulation request. The scenario name is checked separately so
 * an unknown name can be answered with the list of valid ones.
 */
export const DreamRequestSchema = z.object({
  scenario_type: z.string().min(1, 'scenario_type is required'),
  params: z.record(z.unknown()).default({}),
  sprint_data: SprintSnapshotSchema.optional(),
  provider: z.enum(['jira', 'linear']).optional(),
  visualize: z.boolean().default(true),
});

// Scenario parameters. Numeric strings are read as numbers; anything
// missing or unreadable takes the built-in default.

const numericString = (value: unknown) =>
  typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

const numberParam = (fallback: number) => z.preprocess(numericString, z.number().finite()).catch(fallback);

export const ResourceStressParamsSchema = z.object({
  remove_count: numberParam(1),
});

export const ScopeCreepParamsSchema = z.object({
  additional_issues: numberParam(5),
  priority: numberParam(3),
});

export const PriorityShiftParamsSchema = z.object({
  target_epic: z
    .string()
    .min(1)
    .nullish()
    .catch(null)
    .transform((epic) => epic ?? null),
  shift_percentage: numberParam(30),
});

export const ScenarioTemplateSchema = z.object({
  description: z.string().optional(),
  default_params: z.record(z.unknown()).default({}),
});

/** Shape of the scenario defaults file */
export const ScenarioDefaultsSchema = z.object({
  resource_stress: ScenarioTemplateSchema.optional(),
  scope_creep: ScenarioTemplateSchema.optional(),
  priority_shift: ScenarioTemplateSchema.optional(),
});

export type DreamRequest = z.infer<typeof DreamRequestSchema>;
export type ResourceStressParams = z.infer<typeof ResourceStressParamsSchema>;
export type ScopeCreepParams = z.infer<typeof ScopeCreepParamsSchema>;
export type PriorityShiftParams = z.infer<typeof PriorityShiftParamsSchema>;
export type ScenarioTemplate = z.infer<typeof ScenarioTemplateSchema>;
export type ScenarioDefaults = z.infer<typeof ScenarioDefaultsSchema>;
