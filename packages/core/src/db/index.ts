/**
 * DynamoDB persistence for dreams
 */

export { DynamoDBClient, DynamoDBError } from './client.js';
export { DreamRepository } from './repositories/dream.js';
export type { DynamoDBItem, QueryOptions, QueryResult } from './types.js';
