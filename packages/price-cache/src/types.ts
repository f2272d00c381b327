/**
 * Core types for the price cache and the series service.
 */

import type { CalendarDate, DailyBar, DailyRecord, FetchMeta } from '@pricevault/contracts'

/**
 * Durable store of daily rows and per-symbol fetch bookkeeping.
 *
 * Every method rejects with a `StorageError` on failure.
 */
export interface PriceCache {
  /**
   * Point lookup of a symbol's bookkeeping, null when never fetched.
   */
  getMeta(symbol: string): Promise<FetchMeta | null>

  /**
   * Rows with `start <= date <= end`, newest first, with `change` and
   * `hChange` recomputed over the returned range only.
   */
  getRange(symbol: string, start: CalendarDate, end: CalendarDate): Promise<DailyRecord[]>

  /**
   * Upserts rows by `(symbol, date)` in one transaction.
   */
  storeRecords(symbol: string, bars: readonly DailyBar[]): Promise<void>

  updateMeta(meta: FetchMeta): Promise<void>

  /**
   * Rows and bookkeeping together, all or nothing.
   */
  storeFetch(symbol: string, bars: readonly DailyBar[], meta: FetchMeta): Promise<void>
}

/**
 * Where a series was served from.
 * - `cache`: fresh cache hit, no provider call
 * - `provider`: fetched, stored, then re-read from the cache
 * - `provider-direct`: fetched and served without the cache
 * - `stale-cache`: provider failed, saved rows served instead
 */
export type SeriesOrigin = 'cache' | 'provider' | 'provider-direct' | 'stale-cache'

export interface StockSeriesRequest {
  symbol: string

  /** Calendar days back from today; the service's `defaultDays` when omitted. */
  days?: number

  /** Route to the alternate provider. */
  useAltProvider?: boolean

  signal?: AbortSignal
}

export interface StockSeries {
  /** Trimmed, upper-cased ticker. */
  symbol: string

  /** Newest first. */
  records: DailyRecord[]

  ttmEps: number
  companyName: string

  /** Whether the serving source supplies EPS, so `pe` can be non-null. */
  hasPE: boolean

  /** Provider id the rows came from. */
  source: string

  origin: SeriesOrigin

  /** True when a provider failure was answered from saved rows. */
  degraded: boolean

  warning?: string
}

export interface Clock {
  now(): Date
}

export const systemClock: Clock = {
  now: () => new Date(),
}
