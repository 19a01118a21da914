import { randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

export function currentTimestampMs(): number {
  return Date.now();
}
