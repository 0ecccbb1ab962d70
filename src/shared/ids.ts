import { randomUUID } from 'crypto';

export type IdFactory = (prefix: string) => string;

export const createId: IdFactory = (prefix) => `${prefix}-${randomUUID().slice(0, 8)}`;

/**
 * Sequential ids ("moment-1", "moment-2", ...) for deterministic output.
 */
export function sequentialIds(): IdFactory {
  const counters = new Map<string, number>();
  return (prefix) => {
    const next = (counters.get(prefix) ?? 0) + 1;
    counters.set(prefix, next);
    return `${prefix}-${next}`;
  };
}
