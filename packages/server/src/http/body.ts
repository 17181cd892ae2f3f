import { ValidationError, errorMessage } from '@sprint-garden/core';

/**
 * @throws {ValidationError} when the body is empty or not JSON
 */
export function parseJsonBody(body: Buffer): unknown {
  const text = body.toString('utf-8');
  if (text.trim() === '') {
    throw new ValidationError('No JSON payload');
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Invalid JSON payload: ${errorMessage(error)}`);
  }
}
