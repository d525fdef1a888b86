import type { Unavailable } from '../types/snapshot.js';

export function unavailable(reason: string): Unavailable {
  return { kind: 'unavailable', reason };
}

export function isUnavailable(value: unknown): value is Unavailable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'unavailable'
  );
}
