/**
 * Single-table item and query shapes
 */

/** Every stored item carries the partition and sort keys */
export interface DynamoDBItem {
  PK: string;
  SK: string;
  [key: string]: unknown;
}

export interface QueryOptions {
  limit?: number;
  /** Oldest first; newest first when unset */
  ascending?: boolean;
  /** `lastKey` of the previous page */
  exclusiveStartKey?: Record<string, unknown>;
}

export interface QueryResult<T> {
  items: T[];
  lastKey?: Record<string, unknown>;
}
