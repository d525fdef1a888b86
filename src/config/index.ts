/**
 * Supply Snapshots Configuration
 *
 * Read from the environment (and `.env`) once at startup. The core modules
 * never read the environment; they receive the values built here.
 */

import "dotenv/config";
import { z } from "zod";
import type { BackoffKind } from "../rpc/backoff.js";
import { isValidDuration, parseDuration } from "../utils/duration.js";
import { ConfigError } from "../utils/errors.js";

const DurationSchema = z.string().transform((value, ctx) => {
  if (!isValidDuration(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected {number}{unit} where unit is ms|s|m|h" });
    return z.NEVER;
  }
  return parseDuration(value);
});

const envSchema = z.object({
  // RPC endpoint
  RPC_URL: z.string().url(),
  RPC_TIMEOUT: DurationSchema.default("10s"),
  RPC_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  RPC_RETRY_DELAY: DurationSchema.default("1s"),
  RPC_BACKOFF: z.enum(["fixed", "exponential"]).default("fixed"),
  RPC_MAX_RETRY_DELAY: DurationSchema.default("8s"),

  // Whole-batch retries for state reads
  BATCH_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  BATCH_RETRY_DELAY: DurationSchema.default("1s"),

  // Collection
  QUERIES_FILE: z.string().min(1).default("config/queries.json"),
  LOOKBACK_DAYS: z.coerce.number().int().min(0).default(60),

  // Logging
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface Config {
  readonly rpc: {
    readonly url: string;
    readonly timeoutMs: number;
    readonly maxRetries: number;
    readonly retryDelayMs: number;
    readonly backoff: BackoffKind;
    readonly maxRetryDelayMs: number;
  };
  readonly batch: {
    readonly maxRetries: number;
    readonly retryDelayMs: number;
  };
  readonly queriesFile: string;
  readonly lookbackDays: number;
  readonly log: {
    readonly level: string;
  };
}

/**
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError("Invalid environment variables", result.error.flatten().fieldErrors);
  }

  const vars = result.data;
  return {
    rpc: {
      url: vars.RPC_URL,
      timeoutMs: vars.RPC_TIMEOUT,
      maxRetries: vars.RPC_MAX_RETRIES,
      retryDelayMs: vars.RPC_RETRY_DELAY,
      backoff: vars.RPC_BACKOFF,
      maxRetryDelayMs: vars.RPC_MAX_RETRY_DELAY,
    },
    batch: {
      maxRetries: vars.BATCH_MAX_RETRIES,
      retryDelayMs: vars.BATCH_RETRY_DELAY,
    },
    queriesFile: vars.QUERIES_FILE,
    lookbackDays: vars.LOOKBACK_DAYS,
    log: {
      level: vars.LOG_LEVEL,
    },
  };
}
