import { afterEach, describe, it, expect } from 'vitest';
import { isSymbolNotFoundError } from '@pricevault/contracts';
import { createLogger } from '@pricevault/logger';
import { createPriceVault, type PriceVault } from '../src/bootstrap.js';
import { loadConfig } from '../src/config/index.js';
import { FixtureFundamentalsProvider, FixturePriceProvider } from '../src/providers/fixture-provider.js';

const logger = createLogger({ level: 'error', silent: true });
const clock = { now: () => new Date('2024-01-15T15:00:00Z') };

const providers = {
  primary: new FixtureFundamentalsProvider({ id: 'macrotrends', logger }),
  alternate: new FixturePriceProvider({ id: 'yahoo', logger }),
};

describe('createPriceVault', () => {
  let vault: PriceVault | undefined;

  afterEach(async () => {
    await vault?.close();
    vault = undefined;
  });

  it('fetches, stores and then serves from the cache', async () => {
    const config = loadConfig({ env: { DB_PATH: 'sqlite::memory:' }, dirExists: () => false });
    vault = await createPriceVault(config, providers, { logger, clock });
    expect(vault.cache).not.toBeNull();

    const first = await vault.service.getStockSeries({ symbol: 'aapl', days: 10 });
    expect(first.origin).toBe('provider');
    expect(first.symbol).toBe('AAPL');
    expect(first.companyName).toBe('Apple Inc.');
    expect(first.ttmEps).toBe(6.43);
    expect(first.hasPE).toBe(true);
    expect(first.records.map((r) => r.date)).toEqual([
      '2024-01-12',
      '2024-01-11',
      '2024-01-10',
      '2024-01-09',
      '2024-01-08',
      '2024-01-05',
    ]);
    expect(first.records[0]).toMatchObject({ close: 185.92, pe: 28.91, change: '0.18%', hChange: '-0.60%' });
    expect(first.records[5]).toMatchObject({ change: '', hChange: '' });

    const second = await vault.service.getStockSeries({ symbol: 'AAPL', days: 10 });
    expect(second.origin).toBe('cache');
    expect(second.records).toEqual(first.records);
  });

  it('routes suffix-pinned symbols to the alternate provider', async () => {
    const config = loadConfig({ env: { DB_PATH: 'sqlite::memory:' }, dirExists: () => false });
    vault = await createPriceVault(config, providers, { logger, clock });

    const series = await vault.service.getStockSeries({ symbol: '0700.hk', days: 10 });
    expect(series.source).toBe('yahoo');
    expect(series.hasPE).toBe(false);
    expect(series.records).toHaveLength(5);
    expect(series.records.every((r) => r.pe === null)).toBe(true);
  });

  it('runs without a cache when caching is disabled', async () => {
    const config = loadConfig({ env: { DB_PATH: 'none' }, dirExists: () => false });
    vault = await createPriceVault(config, providers, { logger, clock });

    expect(vault.cache).toBeNull();
    const series = await vault.service.getStockSeries({ symbol: 'AAPL', days: 10 });
    expect(series.origin).toBe('provider-direct');
    expect(series.records).toHaveLength(9);
  });

  it('runs without a cache when the store cannot be opened', async () => {
    const config = loadConfig({
      env: { DB_PATH: 'sqlite:/nonexistent-pricevault-dir/cache.db' },
      dirExists: () => false,
    });
    vault = await createPriceVault(config, providers, { logger, clock });

    expect(vault.cache).toBeNull();
    const series = await vault.service.getStockSeries({ symbol: 'AAPL', days: 10 });
    expect(series.origin).toBe('provider-direct');
  });

  it('uses the configured default window', async () => {
    const config = loadConfig({ env: { DB_PATH: 'none', DEFAULT_DAYS: '3' }, dirExists: () => false });
    vault = await createPriceVault(config, providers, { logger, clock });

    const series = await vault.service.getStockSeries({ symbol: 'AAPL' });
    expect(series.records.map((r) => r.date)).toEqual(['2024-01-12', '2024-01-11', '2024-01-10', '2024-01-09']);
  });

  it('aggregates into periods', async () => {
    const config = loadConfig({ env: { DB_PATH: 'sqlite::memory:' }, dirExists: () => false });
    vault = await createPriceVault(config, providers, { logger, clock });

    const { periods } = await vault.service.getPeriodSeries({ symbol: 'AAPL', days: 10 }, 'weekly');
    expect(periods.map((p) => p.period)).toEqual(['2024-W02', '2024-W01']);
    expect(periods[0]).toMatchObject({ close: 185.92, high: 187.05, low: 181.5 });
  });

  it('surfaces unknown symbols', async () => {
    const config = loadConfig({ env: { DB_PATH: 'sqlite::memory:' }, dirExists: () => false });
    vault = await createPriceVault(config, providers, { logger, clock });

    const error = await vault.service.getStockSeries({ symbol: 'NOPE', days: 10 }).catch((e: unknown) => e);
    expect(isSymbolNotFoundError(error)).toBe(true);
  });
});
