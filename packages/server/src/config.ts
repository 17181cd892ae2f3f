/**
 * Process configuration from environment variables
 *
 * Parsed once at startup. Provider credentials are optional: a provider
 * without them is still registered and reports itself unconfigured.
 */

import { z } from 'zod';
import {
  DEFAULT_BLOCKER_STATUSES,
  DEFAULT_FORECAST_TIMEOUT_MS,
  GARDEN_DEFAULTS,
  TABLE_NAME,
  parseLogLevel,
  parseOrThrow,
  type LogLevel,
  type ProvidersConfig,
} from '@sprint-garden/core';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const integer = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const commaList = (fallback: readonly string[]) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? [...fallback]
        : value
            .split(',')
            .map((item) => item.trim())
            .filter(Boolean)
    );

export const EnvSchema = z.object({
  PORT: integer(5000),
  LOG_LEVEL: z.string().optional(),

  JIRA_DOMAIN: optionalString,
  JIRA_EMAIL: optionalString,
  JIRA_API_TOKEN: optionalString,
  JIRA_BOARD_ID: optionalString,
  JIRA_WEBHOOK_SECRET: optionalString,
  JIRA_EPIC_LINK_FIELD: z.string().default('customfield_10014'),
  JIRA_SPRINT_FIELD: z.string().default('customfield_10020'),
  JIRA_BLOCKER_STATUSES: commaList(DEFAULT_BLOCKER_STATUSES),

  LINEAR_API_KEY: optionalString,
  LINEAR_WEBHOOK_SECRET: optionalString,
  LINEAR_TEAM_ID: optionalString,

  GARDEN_HOST_URL: z.string().url().optional().or(z.literal('').transform(() => undefined)),
  GARDEN_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(GARDEN_DEFAULTS.RETRY_ATTEMPTS),
  GARDEN_RETRY_DELAY_MS: integer(GARDEN_DEFAULTS.RETRY_DELAY_MS),
  GARDEN_TIMEOUT_MS: integer(GARDEN_DEFAULTS.TIMEOUT_MS),

  ANTHROPIC_API_KEY: optionalString,
  DREAM_FORECAST_TIMEOUT_MS: integer(DEFAULT_FORECAST_TIMEOUT_MS),
  DREAM_STORE: z.enum(['file', 'dynamodb']).default('file'),
  DREAMS_DIR: z.string().default('./data/dreams'),
  DREAMS_TABLE: z.string().default(TABLE_NAME),
  DYNAMODB_ENDPOINT: optionalString,
  SCENARIOS_PATH: optionalString,
});

export interface GardenConfig {
  /** Absent means log-only */
  url?: string;
  retryAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
}

export interface DreamingConfig {
  anthropicApiKey?: string;
  forecastTimeoutMs: number;
  store: 'file' | 'dynamodb';
  dreamsDir: string;
  dreamsTable: string;
  /** DynamoDB Local or another non-default endpoint */
  dynamodbEndpoint?: string;
  scenariosPath?: string;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  providers: ProvidersConfig;
  blockerStatuses: string[];
  garden: GardenConfig;
  dreaming: DreamingConfig;
}

/**
 * @throws {ValidationError} when a variable has an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseOrThrow(EnvSchema, env, 'environment');

  return {
    port: parsed.PORT,
    logLevel: parseLogLevel(parsed.LOG_LEVEL),
    providers: {
      jira: {
        domain: parsed.JIRA_DOMAIN,
        email: parsed.JIRA_EMAIL,
        apiToken: parsed.JIRA_API_TOKEN,
        boardId: parsed.JIRA_BOARD_ID,
        webhookSecret: parsed.JIRA_WEBHOOK_SECRET,
        epicLinkField: parsed.JIRA_EPIC_LINK_FIELD,
        sprintField: parsed.JIRA_SPRINT_FIELD,
      },
      linear: {
        apiKey: parsed.LINEAR_API_KEY,
        webhookSecret: parsed.LINEAR_WEBHOOK_SECRET,
        teamId: parsed.LINEAR_TEAM_ID,
      },
    },
    blockerStatuses: parsed.JIRA_BLOCKER_STATUSES,
    garden: {
      url: parsed.GARDEN_HOST_URL,
      retryAttempts: parsed.GARDEN_RETRY_ATTEMPTS,
      retryDelayMs: parsed.GARDEN_RETRY_DELAY_MS,
      timeoutMs: parsed.GARDEN_TIMEOUT_MS,
    },
    dreaming: {
      anthropicApiKey: parsed.ANTHROPIC_API_KEY,
      forecastTimeoutMs: parsed.DREAM_FORECAST_TIMEOUT_MS,
      store: parsed.DREAM_STORE,
      dreamsDir: parsed.DREAMS_DIR,
      dreamsTable: parsed.DREAMS_TABLE,
      dynamodbEndpoint: parsed.DYNAMODB_ENDPOINT,
      scenariosPath: parsed.SCENARIOS_PATH,
    },
  };
}
