import { randomUUID } from 'node:crypto';

export type IdPrefix = 'lr' | 'fc' | 'qz' | 'qa';

/**
 * Generates a prefixed unique id, e.g. `fc_1b9d6bcd-...`.
 */
export function generateId(prefix: IdPrefix): string {
  return `${prefix}_${randomUUID()}`;
}
