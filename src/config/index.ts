import { availableParallelism } from 'os';
import { config } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../types/errors';

config();

export type FailurePolicy = 'degrade' | 'strict';

export function defaultConcurrency(): number {
  return Math.min(32, availableParallelism() + 4);
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    SEARCH_MAX_PAGES: positiveInt.default(50),
    SEARCH_CONCURRENCY: positiveInt.optional(),
    SEARCH_FAILURE_POLICY: z.enum(['degrade', 'strict']).default('degrade'),
    SEARCH_CACHE_TTL_MS: nonNegativeInt.default(60 * 60 * 1000),
    HTTP_MAX_ATTEMPTS: positiveInt.default(3),
    HTTP_BACKOFF_MIN_MS: nonNegativeInt.default(1000),
    HTTP_BACKOFF_MAX_MS: nonNegativeInt.default(3000),
    HTTP_TIMEOUT_MS: positiveInt.default(30000),
  })
  .refine((env) => env.HTTP_BACKOFF_MIN_MS <= env.HTTP_BACKOFF_MAX_MS, {
    message: 'HTTP_BACKOFF_MIN_MS must not exceed HTTP_BACKOFF_MAX_MS',
    path: ['HTTP_BACKOFF_MIN_MS'],
  });

export interface SearchSettings {
  maxPages: number;
  concurrency: number;
  failurePolicy: FailurePolicy;
  cacheTtlMs: number;
}

export interface TransportSettings {
  maxAttempts: number;
  backoffMinMs: number;
  backoffMaxMs: number;
  timeoutMs: number;
}

export interface Config {
  nodeEnv: string;
  search: SearchSettings;
  transport: TransportSettings;
}

/**
 * Build the configuration from an environment map.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    search: {
      maxPages: vars.SEARCH_MAX_PAGES,
      concurrency: vars.SEARCH_CONCURRENCY ?? defaultConcurrency(),
      failurePolicy: vars.SEARCH_FAILURE_POLICY,
      cacheTtlMs: vars.SEARCH_CACHE_TTL_MS,
    },
    transport: {
      maxAttempts: vars.HTTP_MAX_ATTEMPTS,
      backoffMinMs: vars.HTTP_BACKOFF_MIN_MS,
      backoffMaxMs: vars.HTTP_BACKOFF_MAX_MS,
      timeoutMs: vars.HTTP_TIMEOUT_MS,
    },
  };
}

export const CONFIG = loadConfig();
