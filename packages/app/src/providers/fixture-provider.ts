/**
 * Fixture-based providers for local runs and deterministic tests.
 *
 * Each symbol is one JSON file (`<SYMBOL>.json`) holding company name, EPS
 * history and daily bars.
 */

import { readFile } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import {
  ProviderUnavailableError,
  SymbolNotFoundError,
  errorMessage,
  type DailyBar,
  type Fundamentals,
  type FundamentalsProvider,
  type PriceOnlyProvider,
  type ProviderCallOptions,
} from '@pricevault/contracts';
import type { Logger } from '@pricevault/logger';
import { shiftCalendarDate } from '@pricevault/market-data-core';

const dateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const fixtureSchema = z.object({
  symbol: z.string(),
  companyName: z.string().default(''),
  eps: z.array(z.object({ date: dateString, eps: z.number() })).default([]),
  bars: z.array(
    z.object({
      date: dateString,
      open: z.number(),
      high: z.number(),
      low: z.number(),
      close: z.number(),
      volume: z.string(),
      pe: z.number().nullable().default(null),
    })
  ),
});

export type PriceFixture = z.infer<typeof fixtureSchema>;

export const DEFAULT_FIXTURES_PATH = new URL('../../fixtures/prices/', import.meta.url);

export interface FixtureProviderConfig {
  id: string;
  logger: Logger;
  fixturesPath?: string | URL;
  simulateLatency?: boolean;
  latencyMs?: number;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads and validates fixture files, memoized per symbol.
 */
class FixtureStore {
  private fixtures = new Map<string, PriceFixture>();
  private root: URL;

  constructor(
    private readonly providerId: string,
    fixturesPath: string | URL
  ) {
    const url = typeof fixturesPath === 'string' ? pathToFileURL(fixturesPath) : fixturesPath;
    this.root = url.href.endsWith('/') ? url : new URL(`${url.href}/`);
  }

  async load(symbol: string, signal?: AbortSignal): Promise<PriceFixture> {
    const cached = this.fixtures.get(symbol);
    if (cached) {
      return cached;
    }

    let text: string;
    try {
      text = await readFile(new URL(`${encodeURIComponent(symbol)}.json`, this.root), { encoding: 'utf-8', signal });
    } catch (error) {
      if (isMissingFile(error)) {
        throw new SymbolNotFoundError(`No fixture for ${symbol}`, { symbol, provider: this.providerId });
      }
      throw new ProviderUnavailableError(
        `Failed to read fixture for ${symbol}: ${errorMessage(error)}`,
        { provider: this.providerId, symbol },
        { cause: error }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ProviderUnavailableError(
        `Malformed fixture for ${symbol}: ${errorMessage(error)}`,
        { provider: this.providerId, symbol },
        { cause: error }
      );
    }

    const parsed = fixtureSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderUnavailableError(`Malformed fixture for ${symbol}: ${parsed.error.message}`, {
        provider: this.providerId,
        symbol,
      });
    }

    this.fixtures.set(symbol, parsed.data);
    return parsed.data;
  }
}

/**
 * Bars within `maxDays` of the fixture's newest bar, newest first.
 * Anchoring on the data rather than the clock keeps static fixtures useful.
 */
export function selectRecentBars(fixture: PriceFixture, maxDays: number): DailyBar[] {
  const ordered = [...fixture.bars].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
  const newest = ordered[0];
  if (!newest) {
    return [];
  }
  const cutoff = shiftCalendarDate(newest.date, -maxDays);
  return ordered.filter((bar) => bar.date >= cutoff);
}

abstract class BaseFixtureProvider {
  readonly id: string;
  protected logger: Logger;
  protected store: FixtureStore;
  private simulateLatency: boolean;
  private latencyMs: number;

  constructor(config: FixtureProviderConfig) {
    this.id = config.id;
    this.logger = config.logger;
    this.store = new FixtureStore(config.id, config.fixturesPath ?? DEFAULT_FIXTURES_PATH);
    this.simulateLatency = config.simulateLatency ?? false;
    this.latencyMs = config.latencyMs ?? 50;
  }

  async fetchDailyPrices(symbol: string, maxDays: number, options: ProviderCallOptions = {}): Promise<DailyBar[]> {
    await this.simulateDelay(options.signal);
    const fixture = await this.store.load(symbol, options.signal);
    const bars = selectRecentBars(fixture, maxDays);

    this.logger.debug('Fixture provider returning bars', { provider: this.id, symbol, days: maxDays, count: bars.length });
    return bars;
  }

  protected async simulateDelay(signal?: AbortSignal): Promise<void> {
    if (this.simulateLatency) {
      await sleep(this.latencyMs, undefined, { signal });
    }
  }
}

/**
 * Fixture provider that also serves company name and EPS history.
 */
export class FixtureFundamentalsProvider extends BaseFixtureProvider implements FundamentalsProvider {
  readonly kind = 'fundamentals' as const;

  async fetchFundamentals(symbol: string, options: ProviderCallOptions = {}): Promise<Fundamentals> {
    await this.simulateDelay(options.signal);
    const fixture = await this.store.load(symbol, options.signal);
    const eps = [...fixture.eps].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    return { companyName: fixture.companyName, eps };
  }
}

/**
 * Fixture provider that serves prices only.
 */
export class FixturePriceProvider extends BaseFixtureProvider implements PriceOnlyProvider {
  readonly kind = 'prices-only' as const;
}
