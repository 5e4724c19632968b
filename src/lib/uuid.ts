import { randomUUID } from 'node:crypto';

/**
 * Identifier for one simulation run; tags every row the run exports.
 */
export function createUuid(): string {
  return randomUUID();
}
