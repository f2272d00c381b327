/**
 * @fileoverview Provider capability contract.
 *
 * Upstream sources are modelled as a tagged union: a provider either serves
 * fundamentals (company name and EPS history) next to its prices, or it
 * serves prices only. Call sites branch on `kind`, never on a flag.
 *
 * @module @pricevault/contracts/provider
 */

import type { DailyBar, Fundamentals } from './market.js';

/**
 * Options passed to every provider call.
 */
export interface ProviderCallOptions {
  /** Aborted when the caller's deadline passes or the request is cancelled. */
  signal?: AbortSignal;
}

interface ProviderBase {
  /** Stable identifier recorded as the cache's `source` (e.g. 'macrotrends'). */
  readonly id: string;

  /**
   * Fetches up to `maxDays` calendar days of daily bars.
   *
   * @returns Bars ordered newest first
   */
  fetchDailyPrices(symbol: string, maxDays: number, options?: ProviderCallOptions): Promise<DailyBar[]>;
}

/**
 * Provider that also supplies company name and EPS history, enabling P/E.
 */
export interface FundamentalsProvider extends ProviderBase {
  readonly kind: 'fundamentals';
  fetchFundamentals(symbol: string, options?: ProviderCallOptions): Promise<Fundamentals>;
}

/**
 * Provider that supplies prices and nothing else.
 */
export interface PriceOnlyProvider extends ProviderBase {
  readonly kind: 'prices-only';
}

export type PriceProvider = FundamentalsProvider | PriceOnlyProvider;

export type ProviderKind = PriceProvider['kind'];

export function suppliesFundamentals(provider: PriceProvider): provider is FundamentalsProvider {
  return provider.kind === 'fundamentals';
}
