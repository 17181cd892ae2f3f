/**
 * DynamoDB document client for the dream store
 *
 * Throttling and service errors are retried with the shared linear
 * backoff; every failure surfaces as a DynamoDBError.
 */

import {
  DynamoDBClient as AWSDynamoDBClient,
  type DynamoDBClientConfig,
} from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, GetCommand, PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';

import { TABLE_NAME } from '../constants.js';
import { toError } from '../errors.js';
import { withLinearRetry } from '../transport/retry.js';
import type { DynamoDBItem, QueryOptions, QueryResult } from './types.js';

const STORE_RETRY = { attempts: 4, delayMs: 100 } as const;

const THROTTLING_ERRORS: ReadonlySet<string> = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
  'InternalServerError',
  'ServiceUnavailable',
]);

export class DynamoDBError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'DynamoDBError';
  }
}

function isThrottling(error: unknown): boolean {
  return error instanceof Error && THROTTLING_ERRORS.has(error.name);
}

export interface DynamoDBClientOptions {
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Items come back as plain records; repositories validate them.
 */
export class DynamoDBClient {
  private readonly documents: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(config?: DynamoDBClientConfig, tableName?: string, options: DynamoDBClientOptions = {}) {
    // Retries happen here, not inside the SDK
    const base = new AWSDynamoDBClient({ ...config, maxAttempts: 1 });
    this.documents = DynamoDBDocumentClient.from(base, {
      marshallOptions: { removeUndefinedValues: true },
    });
    this.tableName = tableName ?? TABLE_NAME;
    this.sleep = options.sleep;
  }

  getTableName(): string {
    return this.tableName;
  }

  async get(pk: string, sk: string): Promise<Record<string, unknown> | null> {
    const result = await this.run('GetItem', () =>
      this.documents.send(new GetCommand({ TableName: this.tableName, Key: { PK: pk, SK: sk } }))
    );
    return result.Item ?? null;
  }

  async put(item: DynamoDBItem): Promise<void> {
    await this.run('PutItem', () =>
      this.documents.send(new PutCommand({ TableName: this.tableName, Item: item }))
    );
  }

  /**
   * Items under one partition, optionally narrowed to a sort key prefix.
   * Newest first unless `ascending` is set.
   */
  async query(
    pk: string,
    skPrefix?: string,
    options: QueryOptions = {}
  ): Promise<QueryResult<Record<string, unknown>>> {
    const values: Record<string, unknown> = { ':pk': pk };
    if (skPrefix) {
      values[':skPrefix'] = skPrefix;
    }

    const result = await this.run('Query', () =>
      this.documents.send(
        new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: skPrefix ? 'PK = :pk AND begins_with(SK, :skPrefix)' : 'PK = :pk',
          ExpressionAttributeValues: values,
          ScanIndexForward: options.ascending ?? false,
          Limit: options.limit,
          ExclusiveStartKey: options.exclusiveStartKey,
        })
      )
    );
    return { items: result.Items ?? [], lastKey: result.LastEvaluatedKey };
  }

  private async run<T>(operationName: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await withLinearRetry(operation, {
        ...STORE_RETRY,
        isRetryable: isThrottling,
        sleep: this.sleep,
      });
    } catch (error) {
      const cause = toError(error);
      throw new DynamoDBError(
        `${operationName} failed: ${cause.message}`,
        cause.name || 'UnknownError',
        isThrottling(error),
        cause
      );
    }
  }
}
