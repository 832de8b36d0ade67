/**
 * swiftpick Input Validation
 */
import { MAX_QUERY_LENGTH } from './config.js';

export function validateQuery(query: string): string {
  if (typeof query !== 'string') {
    throw new Error('Query must be a string');
  }
  if (query.length > MAX_QUERY_LENGTH) {
    throw new Error(`Query exceeds maximum length of ${MAX_QUERY_LENGTH} characters`);
  }
  return query;
}

export function validateArgv(argv: readonly string[]): string[] {
  if (!Array.isArray(argv) || argv.length === 0) {
    throw new Error('Command must have at least one element');
  }
  for (const part of argv) {
    if (typeof part !== 'string') {
      throw new Error('Command elements must be strings');
    }
  }
  if (argv[0].trim().length === 0) {
    throw new Error('Command executable must not be empty');
  }
  return [...argv];
}

export function validateCapacity(capacity: number): number {
  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new Error(`Capacity must be a non-negative integer, got ${capacity}`);
  }
  return capacity;
}
