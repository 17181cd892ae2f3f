/**
 * Zod schemas for Linear GraphQL responses and webhooks
 */

import { z } from 'zod';

function connection<T extends z.ZodTypeAny>(node: T) {
  return z.object({ nodes: z.array(node).default([]) }).passthrough();
}

const IssueRefSchema = z
  .object({ id: z.string().nullish(), identifier: z.string().nullish() })
  .passthrough();

const LabelSchema = z
  .object({ id: z.string().nullish(), name: z.string().nullish() })
  .passthrough();

export const LinearRelationSchema = z
  .object({
    type: z.string().nullish(),
    relatedIssue: IssueRefSchema.nullish(),
    issue: IssueRefSchema.nullish(),
  })
  .passthrough();

export const LinearIssueSchema = z
  .object({
    id: z.string().nullish(),
    identifier: z.string().nullish(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    priority: z.number().nullish(),
    state: z
      .object({ id: z.string().nullish(), name: z.string().nullish(), type: z.string().nullish() })
      .passthrough()
      .nullish(),
    assignee: z
      .object({ id: z.string().nullish(), name: z.string().nullish(), avatarUrl: z.string().nullish() })
      .passthrough()
      .nullish(),
    parent: IssueRefSchema.nullish(),
    project: z.object({ id: z.string().nullish(), name: z.string().nullish() }).passthrough().nullish(),
    cycle: z.object({ id: z.string().nullish(), name: z.string().nullish() }).passthrough().nullish(),
    /** GraphQL returns a connection, webhooks a plain array */
    labels: z.union([z.array(LabelSchema), connection(LabelSchema)]).nullish(),
    relations: connection(LinearRelationSchema).nullish(),
    inverseRelations: connection(LinearRelationSchema).nullish(),
    children: connection(IssueRefSchema).nullish(),
    createdAt: z.string().nullish(),
    updatedAt: z.string().nullish(),
  })
  .passthrough();

export const LinearWebhookSchema = z
  .object({
    action: z.string(),
    type: z.string(),
    data: z.record(z.unknown()),
    updatedFrom: z.record(z.unknown()).nullish(),
    url: z.string().optional(),
    createdAt: z.string().optional(),
  })
  .passthrough();

export const LinearGraphQLResponseSchema = z
  .object({
    data: z.record(z.unknown()).nullish(),
    errors: z.array(z.object({ message: z.string() }).passthrough()).nullish(),
  })
  .passthrough();

export const LinearCycleSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
    number: z.number().nullish(),
    startsAt: z.string().nullish(),
    endsAt: z.string().nullish(),
    progress: z.number().nullish(),
  })
  .passthrough();

export const LinearActiveCycleDataSchema = z.object({
  team: z.object({ activeCycle: LinearCycleSchema.nullish() }).passthrough().nullish(),
});

export const LinearIssueDataSchema = z.object({
  issue: LinearIssueSchema.nullish(),
});

export const LinearCycleIssuesDataSchema = z.object({
  cycle: z
    .object({ issues: connection(LinearIssueSchema) })
    .passthrough()
    .nullish(),
});

export const LinearTeamStatesDataSchema = z.object({
  team: z
    .object({
      states: connection(
        z.object({ id: z.string(), name: z.string().nullish(), type: z.string().nullish() }).passthrough()
      ),
    })
    .passthrough()
    .nullish(),
});

export const LinearIssueUpdateDataSchema = z.object({
  issueUpdate: z.object({ success: z.boolean() }).passthrough().nullish(),
});

export type LinearIssue = z.infer<typeof LinearIssueSchema>;
export type LinearRelation = z.infer<typeof LinearRelationSchema>;
export type LinearWebhook = z.infer<typeof LinearWebhookSchema>;
