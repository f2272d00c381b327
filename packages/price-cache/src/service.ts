/**
 * Cache-first daily price series service.
 *
 * Decides per request whether the saved rows can be served as they are,
 * whether a short delta fetch is enough, or whether the full window must be
 * fetched, and falls back to saved rows when the provider fails.
 *
 * Request flow:
 * 1. Fresh hit: fetched today and covering the window → serve from cache
 * 2. Stale but covered → fetch only the recent tail, merge, re-read
 * 3. Miss or uncovered → fetch the full window, store, re-read
 * 4. Provider failure with saved rows → serve them, flagged `degraded`
 *
 * The cache is advisory: storage failures are logged and the fetched rows
 * are served directly.
 */

import {
  ProviderUnavailableError,
  SymbolNotFoundError,
  errorMessage,
  isProviderUnavailableError,
  isSymbolNotFoundError,
  parsePeriodType,
  suppliesFundamentals,
  PriceVaultError,
  type DailyBar,
  type DailyRecord,
  type FetchMeta,
  type PeriodSummary,
  type PeriodType,
  type PriceProvider,
} from '@pricevault/contracts'
import { createLogger, startTimer, type Logger } from '@pricevault/logger'
import { aggregateToPeriods, isValidCalendarDate, roundToCents } from '@pricevault/market-data-core'
import { DeadlineError, withDeadline } from './deadline.js'
import { deriveChanges, priceToEarnings, trailingEps } from './derived.js'
import { coversRange, deltaFetchDays, isFresh, requestedWindow, type DateWindow } from './freshness.js'
import { KeyedLock } from './keyedLock.js'
import { systemClock, type Clock, type PriceCache, type SeriesOrigin, type StockSeries, type StockSeriesRequest } from './types.js'

export const STALE_WARNING = 'upstream degraded, serving saved data'

export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000

/** Three years of calendar days. */
export const DEFAULT_REQUEST_DAYS = 1095

export interface PriceSeriesServiceOptions {
  /** Omit to run without persistence: every request goes to the provider. */
  cache?: PriceCache | null

  primary: PriceProvider

  /** Used for `useAltProvider` and suffix-pinned symbols; defaults to `primary`. */
  alternate?: PriceProvider

  logger?: Logger
  clock?: Clock

  /** IANA zone in which calendar days are evaluated. */
  timezone?: string

  timeoutMs?: number

  /** Window used when a request names no `days`. */
  defaultDays?: number

  /** Symbols ending in one of these always use the alternate provider. */
  alternateSuffixes?: readonly string[]
}

/**
 * What a provider round trip produced, already normalized for storage.
 */
interface FetchResult {
  source: string
  companyName: string
  ttmEps: number

  /** Newest first. */
  bars: DailyBar[]
}

/**
 * Normalizes a user-supplied ticker: trimmed and upper-cased.
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase()
}

/**
 * Cache-first price series service.
 *
 * Example:
 * ```typescript
 * const service = new PriceSeriesService({
 *   cache,
 *   primary: macrotrendsProvider,
 *   alternate: yahooProvider,
 *   logger,
 *   timezone: 'America/New_York',
 * })
 *
 * const series = await service.getStockSeries({ symbol: 'aapl', days: 365 })
 * series.origin   // 'cache' | 'provider' | 'provider-direct' | 'stale-cache'
 * series.records  // newest first
 * ```
 */
export class PriceSeriesService {
  private cache: PriceCache | null
  private primary: PriceProvider
  private alternate: PriceProvider
  private logger: Logger
  private clock: Clock
  private timezone: string
  private timeoutMs: number
  private defaultDays: number
  private alternateSuffixes: string[]
  private lock = new KeyedLock()

  constructor(options: PriceSeriesServiceOptions) {
    this.cache = options.cache ?? null
    this.primary = options.primary
    this.alternate = options.alternate ?? options.primary
    this.logger = (options.logger ?? createLogger({ level: 'error', silent: true })).child({ component: 'price-service' })
    this.clock = options.clock ?? systemClock
    this.timezone = options.timezone ?? 'UTC'
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS
    this.defaultDays = options.defaultDays ?? DEFAULT_REQUEST_DAYS
    this.alternateSuffixes = (options.alternateSuffixes ?? ['.HK']).map((suffix) => suffix.toUpperCase())
  }

  /**
   * Daily series for the last `days` calendar days, newest first.
   *
   * @throws {SymbolNotFoundError} when no rows exist to serve
   * @throws {ProviderUnavailableError} when the provider fails and nothing is saved
   */
  async getStockSeries(request: StockSeriesRequest): Promise<StockSeries> {
    const symbol = normalizeSymbol(request.symbol)
    if (symbol === '') {
      throw new SymbolNotFoundError('symbol is required', { symbol: request.symbol })
    }
    const days = request.days ?? this.defaultDays
    if (!Number.isInteger(days) || days < 1) {
      throw new PriceVaultError('INVALID_REQUEST', `days must be a positive integer, got ${days}`, {
        symbol,
        days,
      })
    }

    const provider = this.providerFor(symbol, request.useAltProvider ?? false)
    const cache = this.cache

    if (!cache) {
      const fetched = await this.fetch(provider, symbol, days, '', request.signal)
      return this.serveDirect(symbol, fetched, provider)
    }

    return this.lock.run(symbol, () => this.resolve(cache, provider, symbol, days, request.signal))
  }

  /**
   * Series aggregated into periods, newest period first.
   *
   * @throws {InvalidPeriodTypeError} before any fetch when `period` is unknown
   */
  async getPeriodSeries(
    request: StockSeriesRequest,
    period: PeriodType | string
  ): Promise<{ series: StockSeries; periods: PeriodSummary[] }> {
    const periodType = parsePeriodType(period)
    const series = await this.getStockSeries(request)
    return { series, periods: aggregateToPeriods(series.records, periodType) }
  }

  private providerFor(symbol: string, useAltProvider: boolean): PriceProvider {
    const pinned = this.alternateSuffixes.some((suffix) => symbol.endsWith(suffix))
    return useAltProvider || pinned ? this.alternate : this.primary
  }

  private providerById(id: string): PriceProvider | undefined {
    return [this.primary, this.alternate].find((provider) => provider.id === id)
  }

  private async resolve(
    cache: PriceCache,
    provider: PriceProvider,
    symbol: string,
    days: number,
    signal: AbortSignal | undefined
  ): Promise<StockSeries> {
    const now = this.clock.now()
    const window = requestedWindow(days, now, this.timezone)

    let meta: FetchMeta | null
    try {
      meta = await cache.getMeta(symbol)
    } catch (error) {
      this.logger.warn('Cache read failed, fetching from provider', { symbol, error: errorMessage(error) })
      const fetched = await this.fetch(provider, symbol, days, '', signal)
      return this.serveDirect(symbol, fetched, provider)
    }

    const covered = meta !== null && coversRange(meta, window.start)

    if (meta && covered && isFresh(meta, now, this.timezone)) {
      const records = await this.readRange(cache, symbol, window)
      if (records === null) {
        const fetched = await this.fetch(provider, symbol, days, meta.companyName, signal)
        return this.serveDirect(symbol, fetched, provider)
      }
      if (records.length === 0) {
        throw new SymbolNotFoundError(`No data available for ${symbol}`, { symbol, provider: meta.source })
      }
      this.logger.info('Cache hit', { symbol, provider: meta.source, count: records.length })
      return this.toSeries(symbol, records, meta, 'cache')
    }

    const fetchDays = meta && covered ? deltaFetchDays(days, meta, now) : days
    this.logger.info('Cache miss', {
      symbol,
      provider: provider.id,
      reason: meta === null ? 'missing' : covered ? 'stale' : 'uncovered',
      fetchDays,
    })

    let fetched: FetchResult
    try {
      fetched = await this.fetch(provider, symbol, fetchDays, meta?.companyName ?? '', signal)
    } catch (error) {
      if (!meta) {
        this.logger.error('Provider fetch failed with nothing saved', { symbol, provider: provider.id, error: errorMessage(error) })
        throw error
      }
      return this.serveStale(cache, symbol, window, meta, error)
    }

    if (fetched.bars.length === 0 && !meta) {
      throw new SymbolNotFoundError(`No data available for ${symbol}`, { symbol, provider: provider.id })
    }

    const nextMeta = this.mergeMeta(symbol, meta, fetched, now)
    try {
      await cache.storeFetch(symbol, fetched.bars, nextMeta)
    } catch (error) {
      this.logger.warn('Cache write failed, serving provider data', { symbol, error: errorMessage(error) })
      const saved = await this.readRange(cache, symbol, window)
      if (saved === null) {
        return this.serveDirect(symbol, fetched, provider)
      }
      return this.serveDirect(symbol, fetched, provider, mergeBars(saved, fetched.bars, window))
    }

    const records = await this.readRange(cache, symbol, window)
    if (records === null) {
      return this.serveDirect(symbol, fetched, provider)
    }
    if (records.length === 0) {
      throw new SymbolNotFoundError(`No data available for ${symbol}`, { symbol, provider: provider.id })
    }

    return this.toSeries(symbol, records, nextMeta, 'provider')
  }

  /**
   * Range read that reports storage failure as null instead of throwing.
   */
  private async readRange(cache: PriceCache, symbol: string, window: DateWindow): Promise<DailyRecord[] | null> {
    try {
      return await cache.getRange(symbol, window.start, window.end)
    } catch (error) {
      this.logger.warn('Cache range read failed', { symbol, error: errorMessage(error) })
      return null
    }
  }

  private async serveStale(
    cache: PriceCache,
    symbol: string,
    window: DateWindow,
    meta: FetchMeta,
    providerError: unknown
  ): Promise<StockSeries> {
    const records = await this.readRange(cache, symbol, window)
    if (records === null || records.length === 0) {
      this.logger.error('Provider fetch failed and no saved rows cover the window', {
        symbol,
        provider: meta.source,
        error: errorMessage(providerError),
      })
      throw providerError
    }

    this.logger.warn('Provider failed, serving saved data', {
      symbol,
      provider: meta.source,
      origin: 'stale-cache',
      count: records.length,
      error: errorMessage(providerError),
    })
    return { ...this.toSeries(symbol, records, meta, 'stale-cache'), degraded: true, warning: STALE_WARNING }
  }

  /**
   * Serves rows that did not come back out of the cache. `bars` defaults to
   * the fetch itself and must be newest first.
   */
  private serveDirect(
    symbol: string,
    fetched: FetchResult,
    provider: PriceProvider,
    bars: readonly DailyBar[] = fetched.bars
  ): StockSeries {
    if (bars.length === 0) {
      throw new SymbolNotFoundError(`No data available for ${symbol}`, { symbol, provider: provider.id })
    }
    const records = deriveChanges([...bars].reverse()).reverse()
    return {
      symbol,
      records,
      ttmEps: fetched.ttmEps,
      companyName: fetched.companyName,
      hasPE: suppliesFundamentals(provider),
      source: fetched.source,
      origin: 'provider-direct',
      degraded: false,
    }
  }

  private toSeries(symbol: string, records: DailyRecord[], meta: FetchMeta, origin: SeriesOrigin): StockSeries {
    const source = this.providerById(meta.source)
    return {
      symbol,
      records,
      ttmEps: meta.ttmEps,
      companyName: meta.companyName,
      hasPE: source !== undefined && suppliesFundamentals(source),
      source: meta.source,
      origin,
      degraded: false,
    }
  }

  private mergeMeta(symbol: string, prior: FetchMeta | null, fetched: FetchResult, now: Date): FetchMeta {
    const dates = fetched.bars.map((bar) => bar.date).sort()
    const oldest = dates[0]
    const newest = dates[dates.length - 1]

    const earliestCandidates = [prior?.earliestDate, oldest].filter((date): date is string => date !== undefined)
    const earliestDate = earliestCandidates.sort()[0] ?? ''
    const latestDate = newest ?? prior?.latestDate ?? earliestDate

    return {
      symbol,
      source: fetched.source,
      companyName: fetched.companyName,
      ttmEps: fetched.ttmEps,
      lastFetched: now,
      latestDate,
      earliestDate,
    }
  }

  /**
   * One bounded provider round trip: fundamentals first when supported,
   * then prices, normalized to cents with P/E attached.
   */
  private async fetch(
    provider: PriceProvider,
    symbol: string,
    maxDays: number,
    knownCompanyName: string,
    signal: AbortSignal | undefined
  ): Promise<FetchResult> {
    const timer = startTimer()
    try {
      const result = await withDeadline(
        async (deadlineSignal) => {
          let companyName = knownCompanyName
          let ttmEps = 0
          if (suppliesFundamentals(provider)) {
            const fundamentals = await provider.fetchFundamentals(symbol, { signal: deadlineSignal })
            companyName = fundamentals.companyName
            ttmEps = trailingEps(fundamentals.eps)
          }
          const raw = await provider.fetchDailyPrices(symbol, maxDays, { signal: deadlineSignal })
          return { source: provider.id, companyName, ttmEps, bars: normalizeBars(raw, ttmEps) }
        },
        { timeoutMs: this.timeoutMs, signal }
      )
      this.logger.debug('Provider fetch complete', {
        symbol,
        provider: provider.id,
        days: maxDays,
        count: result.bars.length,
        duration_ms: timer.stop(),
      })
      return result
    } catch (error) {
      throw toProviderError(error, provider, symbol)
    }
  }
}

/**
 * Rounds prices to cents, recomputes P/E, drops malformed dates and keeps the
 * last bar seen for a duplicated date. Output is newest first.
 */
function normalizeBars(raw: readonly DailyBar[], ttmEps: number): DailyBar[] {
  const byDate = new Map<string, DailyBar>()
  for (const bar of raw) {
    if (!isValidCalendarDate(bar.date)) {
      continue
    }
    const close = roundToCents(bar.close)
    byDate.set(bar.date, {
      date: bar.date,
      open: roundToCents(bar.open),
      high: roundToCents(bar.high),
      low: roundToCents(bar.low),
      close,
      volume: bar.volume,
      pe: priceToEarnings(close, ttmEps),
    })
  }
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0))
}

/**
 * Saved rows of the window overlaid with the fetched ones (fetched wins on a
 * shared date), newest first.
 */
function mergeBars(saved: readonly DailyRecord[], fetched: readonly DailyBar[], window: DateWindow): DailyBar[] {
  const byDate = new Map<string, DailyBar>()
  for (const { change: _change, hChange: _hChange, ...bar } of saved) {
    byDate.set(bar.date, bar)
  }
  for (const bar of fetched) {
    if (bar.date >= window.start && bar.date <= window.end) {
      byDate.set(bar.date, bar)
    }
  }
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0))
}

function toProviderError(error: unknown, provider: PriceProvider, symbol: string): PriceVaultError {
  if (isProviderUnavailableError(error) || isSymbolNotFoundError(error)) {
    return error
  }
  if (error instanceof DeadlineError) {
    return new ProviderUnavailableError(
      `${provider.id} ${error.message} for ${symbol}`,
      { provider: provider.id, symbol, reason: error.reason },
      { cause: error }
    )
  }
  return new ProviderUnavailableError(
    `${provider.id} unavailable for ${symbol}: ${errorMessage(error)}`,
    { provider: provider.id, symbol },
    { cause: error }
  )
}
