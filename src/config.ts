/**
 * Runtime configuration
 *
 * Reads `.env` (if present) into `process.env`, then validates the variables
 * this service understands. Every key has a default so the API starts with
 * no configuration at all.
 *
 * @module config
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import type { LogLevel } from '../lib/logger.js';
import {
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_DATA_FILE,
  DEFAULT_PAGE_LIMIT,
  DEFAULT_RATE_LIMIT,
  DEFAULT_RATE_LIMIT_WINDOW_SECONDS,
  DEFAULT_SEARCH_RATE_LIMIT,
} from './lib/constants.js';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const flag = (fallback: boolean) =>
  z.enum(['true', 'false']).default(fallback ? 'true' : 'false').transform((val) => val === 'true');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  TRUST_PROXY: flag(false),
  DATA_FILE: z.string().min(1).default(DEFAULT_DATA_FILE),
  DEFAULT_PAGE_LIMIT: positiveInt(DEFAULT_PAGE_LIMIT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  STRUCTURED_LOGGING: flag(false),
  ENABLE_QUERY_LOGGING: flag(false),
  ENABLE_QUERY_CACHE: flag(true),
  CACHE_DEFAULT_TIMEOUT: positiveInt(DEFAULT_CACHE_TTL_SECONDS),
  RATE_LIMIT: positiveInt(DEFAULT_RATE_LIMIT),
  RATE_LIMIT_SEARCH: positiveInt(DEFAULT_SEARCH_RATE_LIMIT),
  RATE_LIMIT_WINDOW_SECONDS: positiveInt(DEFAULT_RATE_LIMIT_WINDOW_SECONDS),
  APP_VERSION: z.string().min(1).default('1.0.0'),
});

export interface AppConfig {
  server: {
    port: number;
    host: string;
    /** Take the client address from X-Forwarded-For / X-Real-IP */
    trustProxy: boolean;
  };
  data: {
    file: string;
  };
  pagination: {
    defaultLimit: number;
  };
  logging: {
    level: LogLevel;
    structured: boolean;
    queryLogging: boolean;
  };
  cache: {
    enabled: boolean;
    ttlSeconds: number;
  };
  rateLimit: {
    defaultLimit: number;
    searchLimit: number;
    windowSeconds: number;
  };
  version: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build an AppConfig from an environment map.
 *
 * Empty strings count as unset, so `PORT=` in a `.env` file falls back to the
 * default instead of failing validation.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const e = result.data;
  return {
    server: { port: e.PORT, host: e.HOST, trustProxy: e.TRUST_PROXY },
    data: { file: e.DATA_FILE },
    pagination: { defaultLimit: e.DEFAULT_PAGE_LIMIT },
    logging: {
      level: e.LOG_LEVEL,
      structured: e.STRUCTURED_LOGGING,
      queryLogging: e.ENABLE_QUERY_LOGGING,
    },
    cache: { enabled: e.ENABLE_QUERY_CACHE, ttlSeconds: e.CACHE_DEFAULT_TIMEOUT },
    rateLimit: {
      defaultLimit: e.RATE_LIMIT,
      searchLimit: e.RATE_LIMIT_SEARCH,
      windowSeconds: e.RATE_LIMIT_WINDOW_SECONDS,
    },
    version: e.APP_VERSION,
  };
}

/**
 * Load `.env` and parse the process environment
 */
export function loadConfig(envPath?: string): AppConfig {
  loadEnv(envPath ? { path: envPath } : undefined);
  return parseConfig(process.env);
}
