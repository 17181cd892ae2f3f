/**
 * Zod schemas for Jira REST and webhook payloads
 *
 * Every field the adapter reads is optional; only the issue key is required.
 * Objects pass unknown keys through so custom fields stay reachable.
 */

import { z } from 'zod';

const NamedSchema = z.object({ name: z.string().nullish() }).passthrough();

const IssueRefSchema = z.object({ key: z.string().nullish() }).passthrough();

export const JiraIssueLinkSchema = z
  .object({
    type: z
      .object({
        name: z.string().nullish(),
        inward: z.string().nullish(),
        outward: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    inwardIssue: IssueRefSchema.nullish(),
    outwardIssue: IssueRefSchema.nullish(),
  })
  .passthrough();

export const JiraIssueFieldsSchema = z
  .object({
    summary: z.string().nullish(),
    /** Plain text (API v2) or an Atlassian document (API v3) */
    description: z.unknown().optional(),
    status: NamedSchema.nullish(),
    issuetype: NamedSchema.nullish(),
    priority: NamedSchema.nullish(),
    assignee: z
      .object({
        accountId: z.string().nullish(),
        displayName: z.string().nullish(),
        avatarUrls: z.record(z.string()).nullish(),
      })
      .passthrough()
      .nullish(),
    parent: IssueRefSchema.nullish(),
    labels: z.array(z.string()).nullish(),
    issuelinks: z.array(JiraIssueLinkSchema).nullish(),
    subtasks: z.array(IssueRefSchema).nullish(),
    created: z.string().nullish(),
    updated: z.string().nullish(),
  })
  .passthrough();

export const JiraIssueSchema = z
  .object({
    id: z.string().optional(),
    key: z.string().min(1, 'issue.key is required'),
    fields: JiraIssueFieldsSchema.nullish(),
  })
  .passthrough();

/**
 * Changelog items are kept as plain records: the `toString` key would
 * otherwise resolve to Object.prototype.toString when absent.
 */
export const JiraChangelogSchema = z
  .object({
    id: z.string().optional(),
    items: z.array(z.record(z.unknown())).nullish(),
  })
  .passthrough();

export const JiraWebhookSchema = z
  .object({
    webhookEvent: z.string().optional(),
    issue_event_type_name: z.string().optional(),
    timestamp: z.number().optional(),
    issue: JiraIssueSchema,
    changelog: JiraChangelogSchema.nullish(),
  })
  .passthrough();

export const JiraSprintSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    name: z.string().nullish(),
    state: z.string().nullish(),
    startDate: z.string().nullish(),
    endDate: z.string().nullish(),
  })
  .passthrough();

export const JiraBoardSprintsResponseSchema = z
  .object({ values: z.array(JiraSprintSchema).default([]) })
  .passthrough();

export const JiraSprintIssuesResponseSchema = z
  .object({
    startAt: z.number().optional(),
    maxResults: z.number().optional(),
    total: z.number().optional(),
    issues: z.array(JiraIssueSchema).default([]),
  })
  .passthrough();

export const JiraTransitionsResponseSchema = z
  .object({
    transitions: z
      .array(
        z
          .object({
            id: z.string(),
            name: z.string().nullish(),
            to: NamedSchema.nullish(),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export type JiraIssueLink = z.infer<typeof JiraIssueLinkSchema>;
export type JiraIssueFields = z.infer<typeof JiraIssueFieldsSchema>;
export type JiraIssue = z.infer<typeof JiraIssueSchema>;
export type JiraWebhook = z.infer<typeof JiraWebhookSchema>;
export type JiraSprint = z.infer<typeof JiraSprintSchema>;
