import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { isProviderUnavailableError, isSymbolNotFoundError } from '@pricevault/contracts';
import { createLogger } from '@pricevault/logger';
import {
  FixtureFundamentalsProvider,
  FixturePriceProvider,
  selectRecentBars,
  type PriceFixture,
} from '../src/providers/fixture-provider.js';

const logger = createLogger({ level: 'error', silent: true });

function bar(date: string, close: number) {
  return { date, open: close, high: close, low: close, close, volume: '1.00M', pe: null };
}

describe('selectRecentBars', () => {
  const fixture: PriceFixture = {
    symbol: 'TEST',
    companyName: 'Test Corp',
    eps: [],
    bars: [bar('2024-01-10', 10), bar('2024-01-02', 2), bar('2024-01-05', 5)],
  };

  it('returns bars newest first', () => {
    expect(selectRecentBars(fixture, 30).map((b) => b.date)).toEqual(['2024-01-10', '2024-01-05', '2024-01-02']);
  });

  it('anchors the window on the newest bar', () => {
    expect(selectRecentBars(fixture, 5).map((b) => b.date)).toEqual(['2024-01-10', '2024-01-05']);
  });

  it('returns nothing for an empty fixture', () => {
    expect(selectRecentBars({ ...fixture, bars: [] }, 5)).toEqual([]);
  });
});

describe('FixtureFundamentalsProvider', () => {
  const provider = new FixtureFundamentalsProvider({ id: 'macrotrends', logger });

  it('serves bars from the bundled fixtures', async () => {
    const bars = await provider.fetchDailyPrices('AAPL', 10);

    expect(bars).toHaveLength(9);
    expect(bars[0]).toEqual({
      date: '2024-01-12',
      open: 186.06,
      high: 186.74,
      low: 185.19,
      close: 185.92,
      volume: '40.44M',
      pe: null,
    });
    expect(bars[8]?.date).toBe('2024-01-02');
  });

  it('serves company name and EPS oldest first', async () => {
    const fundamentals = await provider.fetchFundamentals('AAPL');

    expect(fundamentals.companyName).toBe('Apple Inc.');
    expect(fundamentals.eps.map((point) => point.eps)).toEqual([5.89, 5.95, 6.13, 6.43]);
  });

  it('reports a missing fixture as an unknown symbol', async () => {
    const error = await provider.fetchDailyPrices('NOPE', 10).catch((e: unknown) => e);

    expect(isSymbolNotFoundError(error)).toBe(true);
    expect(error).toHaveProperty('message', 'No fixture for NOPE');
  });
});

describe('FixturePriceProvider', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pricevault-fixtures-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('is a prices-only provider', () => {
    const provider = new FixturePriceProvider({ id: 'yahoo', logger });
    expect(provider.kind).toBe('prices-only');
  });

  it('loads fixtures from a custom directory', async () => {
    const fixture = { symbol: 'TEST', bars: [bar('2024-02-01', 12.5)] };
    await writeFile(join(dir, 'TEST.json'), JSON.stringify(fixture));
    const provider = new FixturePriceProvider({ id: 'yahoo', logger, fixturesPath: dir });

    const bars = await provider.fetchDailyPrices('TEST', 30);
    expect(bars.map((b) => b.close)).toEqual([12.5]);
  });

  it('reports malformed JSON as provider unavailable', async () => {
    await writeFile(join(dir, 'BAD.json'), '{ not json');
    const provider = new FixturePriceProvider({ id: 'yahoo', logger, fixturesPath: dir });

    const error = await provider.fetchDailyPrices('BAD', 30).catch((e: unknown) => e);
    expect(isProviderUnavailableError(error)).toBe(true);
    expect(error).toHaveProperty('message', expect.stringMatching(/^Malformed fixture for BAD: /));
  });

  it('reports a fixture failing validation as provider unavailable', async () => {
    await writeFile(join(dir, 'SHAPE.json'), JSON.stringify({ symbol: 'SHAPE', bars: [{ date: 'yesterday' }] }));
    const provider = new FixturePriceProvider({ id: 'yahoo', logger, fixturesPath: dir });

    const error = await provider.fetchDailyPrices('SHAPE', 30).catch((e: unknown) => e);
    expect(isProviderUnavailableError(error)).toBe(true);
  });

  it('stops waiting when the signal aborts', async () => {
    const provider = new FixturePriceProvider({ id: 'yahoo', logger, simulateLatency: true, latencyMs: 10_000 });
    const controller = new AbortController();
    const pending = provider.fetchDailyPrices('AAPL', 10, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });
});
