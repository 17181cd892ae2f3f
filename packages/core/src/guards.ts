/**
 * Narrowing helpers for untyped JSON
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Own string property, or undefined. Inherited members such as
 * Object.prototype.toString are never returned.
 */
export function ownString(record: Record<string, unknown>, key: string): string | undefined {
  if (!Object.hasOwn(record, key)) {
    return undefined;
  }
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}
