import { randomUUID } from 'node:crypto';

export function buildId(prefix: string): string {
  return `${prefix}_${randomUUID()}`;
}
