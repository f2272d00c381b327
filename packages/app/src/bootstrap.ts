/**
 * Wires logger, cache and series service from a loaded configuration.
 */

import { connect, type DbConnection } from '@pricevault/db-simple';
import { createLogger, startTimer, type Logger } from '@pricevault/logger';
import { PriceSeriesService, SqlPriceCache, type Clock } from '@pricevault/price-cache';
import { errorMessage, type PriceProvider } from '@pricevault/contracts';
import { cacheConnectionString, type Config } from './config/index.js';

export interface PriceVaultProviders {
  primary: PriceProvider;
  /** Serves `useAltProvider` requests and suffix-pinned symbols. */
  alternate?: PriceProvider;
}

export interface PriceVaultOptions {
  /** Replaces the logger built from `config.logging`. */
  logger?: Logger;
  clock?: Clock;
}

export interface PriceVault {
  service: PriceSeriesService;
  logger: Logger;

  /** Null when caching is disabled or the store could not be opened. */
  cache: SqlPriceCache | null;

  close(): Promise<void>;
}

/**
 * Builds the application graph. The cache is opened once here and shared by
 * every request; if it cannot be opened the service runs without it.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const vault = await createPriceVault(config, { primary: macrotrends, alternate: yahoo });
 * const series = await vault.service.getStockSeries({ symbol: 'AAPL' });
 * await vault.close();
 * ```
 */
export async function createPriceVault(
  config: Config,
  providers: PriceVaultProviders,
  options: PriceVaultOptions = {}
): Promise<PriceVault> {
  const timer = startTimer();
  const logger =
    options.logger ??
    createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });

  let db: DbConnection | null = null;
  let cache: SqlPriceCache | null = null;

  const connection = cacheConnectionString(config.cache);
  if (connection === null) {
    logger.info('Price cache disabled');
  } else {
    try {
      db = await connect(connection, { logger: logger.child({ component: 'db' }) });
      const store = new SqlPriceCache(db);
      await store.init();
      cache = store;
    } catch (error) {
      logger.warn('Price cache unavailable, continuing without it', { error: errorMessage(error) });
      if (db) {
        await db.close();
        db = null;
      }
    }
  }

  const service = new PriceSeriesService({
    cache,
    primary: providers.primary,
    alternate: providers.alternate,
    logger,
    clock: options.clock,
    timezone: config.cache.timezone,
    timeoutMs: config.provider.timeoutMs,
    defaultDays: config.request.defaultDays,
    alternateSuffixes: config.provider.alternateSuffixes,
  });

  logger.info(`${config.app.name} ready`, {
    cache: cache === null ? 'disabled' : db?.dbType,
    primary: providers.primary.id,
    alternate: providers.alternate?.id ?? providers.primary.id,
    duration_ms: timer.stop(),
  });

  return {
    service,
    logger,
    cache,
    async close(): Promise<void> {
      if (db) {
        await db.close();
        db = null;
      }
    },
  };
}
