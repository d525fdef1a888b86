import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import type { Endpoint } from './types.js';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 1_000;

const EndpointSchema = z.object({
  url: z.string().url(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  maxRetries: z.number().int().min(1).default(DEFAULT_MAX_RETRIES),
  retryDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_DELAY_MS),
});

export type EndpointOptions = z.input<typeof EndpointSchema>;

/**
 * Builds a frozen Endpoint, filling in the default retry policy
 * (3 attempts, 1s apart, 10s per request).
 */
export function createEndpoint(options: EndpointOptions): Endpoint {
  const result = EndpointSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigError('Invalid RPC endpoint', result.error.flatten().fieldErrors);
  }
  return Object.freeze({ ...result.data });
}
