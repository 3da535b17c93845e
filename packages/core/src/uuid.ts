/**
 * @module uuid
 * Identifier generation for layers.
 */

import { randomUUID } from 'crypto';

/** Generates a UUID v4 string. */
export function generateId(): string {
  return randomUUID();
}
