import { setTimeout as delay } from 'node:timers/promises';

/**
 * Milliseconds to wait after failed attempt number `attempt` (1-based).
 */
export type BackoffStrategy = (attempt: number) => number;

export type Sleep = (ms: number) => Promise<void>;

export type BackoffKind = 'fixed' | 'exponential';

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

export function fixedBackoff(delayMs: number): BackoffStrategy {
  return () => delayMs;
}

export interface ExponentialBackoffOptions {
  initialMs: number;
  maxMs: number;
  /** Returns a factor in [0, 1] applied to each delay, e.g. Math.random */
  jitter?: () => number;
}

export function exponentialBackoff({ initialMs, maxMs, jitter }: ExponentialBackoffOptions): BackoffStrategy {
  return (attempt) => {
    const base = Math.min(initialMs * 2 ** (attempt - 1), maxMs);
    return jitter ? Math.floor(base * jitter()) : base;
  };
}

export function createBackoff(kind: BackoffKind, delayMs: number, maxDelayMs: number): BackoffStrategy {
  switch (kind) {
    case 'fixed':
      return fixedBackoff(delayMs);
    case 'exponential':
      return exponentialBackoff({ initialMs: delayMs, maxMs: maxDelayMs, jitter: Math.random });
  }
}
