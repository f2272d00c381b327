/**
 * Configuration loading and cache location detection
 */

import { statSync } from 'node:fs';
import type { Logger } from '@pricevault/logger';
import { configSchema, envMapping, type Config } from './schema.js';

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Directory check used by cache detection. */
  dirExists?: (path: string) => boolean;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Default cache location when `DB_PATH` is unset.
 *
 * 1. AWS Lambda (`AWS_LAMBDA_FUNCTION_NAME` set) → `/tmp/cache.db`
 * 2. A mounted `/data` volume → `/data/cache.db`
 * 3. Otherwise `cache.db` in the working directory
 */
export function detectCachePath(env: NodeJS.ProcessEnv, dirExists: (path: string) => boolean = isDirectory): string {
  if (env['AWS_LAMBDA_FUNCTION_NAME']) {
    return '/tmp/cache.db';
  }
  if (dirExists('/data')) {
    return '/data/cache.db';
  }
  return 'cache.db';
}

/**
 * Connection string for the configured cache, or null when caching is off.
 *
 * @example
 * ```typescript
 * cacheConnectionString({ enabled: true, path: '/data/cache.db', timezone: 'UTC' })  // 'sqlite:/data/cache.db'
 * cacheConnectionString({ enabled: true, path: 'none', timezone: 'UTC' })            // null
 * ```
 */
export function cacheConnectionString(cache: Config['cache']): string | null {
  const path = cache.path?.trim() ?? '';
  if (!cache.enabled || path === '' || path.toLowerCase() === 'none') {
    return null;
  }
  if (path.startsWith('postgres://') || path.startsWith('postgresql://') || path.startsWith('sqlite:')) {
    return path;
  }
  return `sqlite:${path}`;
}

/**
 * Load configuration from environment and defaults
 *
 * @throws Error listing every invalid setting
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { env = process.env, logger, dirExists } = options;
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined) {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  const config = result.data;
  if (config.cache.path === undefined) {
    config.cache.path = detectCachePath(env, dirExists);
  }

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(config));
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  let current = obj;

  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  const connection = cacheConnectionString(config.cache);
  return {
    name: config.app.name,
    environment: config.app.env,
    defaultDays: config.request.defaultDays,
    cache: connection === null ? 'disabled' : connection.startsWith('sqlite:') ? 'sqlite' : 'postgres',
    timezone: config.cache.timezone,
    providerTimeoutMs: config.provider.timeoutMs,
    alternateSuffixes: config.provider.alternateSuffixes,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
  };
}

export type { Config } from './schema.js';
export { configSchema, envMapping } from './schema.js';
