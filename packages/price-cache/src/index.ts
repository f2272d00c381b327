/**
 * @pricevault/price-cache
 *
 * SQL-backed daily price cache and the cache-first series service.
 */

export { SqlPriceCache } from './sqlPriceCache.js'
export {
  PriceSeriesService,
  normalizeSymbol,
  STALE_WARNING,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  DEFAULT_REQUEST_DAYS,
  type PriceSeriesServiceOptions,
} from './service.js'
export {
  isFresh,
  coversRange,
  daysSinceFetch,
  deltaFetchDays,
  requestedWindow,
  DELTA_OVERLAP_DAYS,
  type DateWindow,
} from './freshness.js'
export { deriveChanges, trailingEps, priceToEarnings } from './derived.js'
export { KeyedLock } from './keyedLock.js'
export { withDeadline, DeadlineError, type DeadlineOptions, type DeadlineReason } from './deadline.js'
export {
  systemClock,
  type Clock,
  type PriceCache,
  type SeriesOrigin,
  type StockSeries,
  type StockSeriesRequest,
} from './types.js'
