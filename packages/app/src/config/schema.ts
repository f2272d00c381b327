/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { isKnownTimezone } from '@pricevault/market-data-core';

/**
 * Comma-separated environment lists arrive as a single string.
 */
const suffixList = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((part) => part.trim())
          .filter((part) => part !== '')
      : value,
  z.array(z.string().min(1))
);

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
      name: z.string().default('pricevault'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  cache: z
    .object({
      enabled: z.boolean().default(true),
      /**
       * SQLite file path or postgres:// URL. `none` or empty disables the cache.
       * Filled in by detection when unset.
       */
      path: z.coerce.string().optional(),
      timezone: z
        .string()
        .default('UTC')
        .refine(isKnownTimezone, (zone) => ({ message: `Unknown time zone: ${zone}` })),
    })
    .default({}),

  provider: z
    .object({
      timeoutMs: z.number().int().positive().default(30000),
      alternateSuffixes: suffixList.default(['.HK']),
    })
    .default({}),

  request: z
    .object({
      defaultDays: z.number().int().positive().default(1095),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  APP_NAME: 'app.name',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  DB_PATH: 'cache.path',
  CACHE_ENABLED: 'cache.enabled',
  CACHE_TIMEZONE: 'cache.timezone',
  PROVIDER_TIMEOUT_MS: 'provider.timeoutMs',
  ALT_PROVIDER_SUFFIXES: 'provider.alternateSuffixes',
  DEFAULT_DAYS: 'request.defaultDays',
};
