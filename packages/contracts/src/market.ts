/**
 * @fileoverview Daily price, fetch metadata and period summary types.
 *
 * Pure data structures with no I/O. Prices are numbers held at cent
 * precision; display strings are produced by the helpers in
 * `@pricevault/market-data-core`.
 *
 * @module @pricevault/contracts/market
 */

/**
 * Calendar day in `YYYY-MM-DD` form. Lexicographic order is chronological.
 */
export type CalendarDate = string;

/**
 * One trading day as supplied by a provider and as persisted in the cache.
 *
 * @invariant date is unique per symbol
 * @invariant open/high/low/close are rounded to cents
 *
 * @example
 * ```typescript
 * const bar: DailyBar = {
 *   date: '2024-01-08',
 *   open: 100,
 *   high: 105,
 *   low: 99,
 *   close: 104,
 *   volume: '1.20M',
 *   pe: 27.73
 * };
 * ```
 */
export interface DailyBar {
  date: CalendarDate;
  open: number;
  high: number;
  low: number;
  close: number;

  /** Compact magnitude string, e.g. `"12.34M"`, `"850.00K"`, `"950"`. */
  volume: string;

  /** Price-to-earnings ratio at this close, null when the source has no EPS. */
  pe: number | null;
}

/**
 * A daily bar with the derived movement fields. Derived fields are never
 * stored; they are recomputed on every read.
 */
export interface DailyRecord extends DailyBar {
  /** Close-over-close move, `"4.00%"` style, or `""` without a predecessor. */
  change: string;

  /**
   * Current close relative to the previous day's high (not today's high),
   * `"-1.23%"` style, or `""` without a predecessor.
   */
  hChange: string;
}

/**
 * Per-symbol bookkeeping of what the cache holds and where it came from.
 *
 * @invariant earliestDate <= latestDate
 */
export interface FetchMeta {
  symbol: string;

  /** Identifier of the provider that last supplied this symbol. */
  source: string;

  companyName: string;

  /** Trailing-twelve-month EPS; 0 when unknown. */
  ttmEps: number;

  lastFetched: Date;
  latestDate: CalendarDate;
  earliestDate: CalendarDate;
}

/**
 * Close-based and low-based drop-day counters for one severity bucket.
 */
export interface DropCount {
  close: number;
  low: number;
}

/**
 * Drop severity buckets: 2 = [2%,3%), 3 = [3%,4%), 4 = [4%,5%), 5 = 5% and worse.
 */
export type DropBucket = 2 | 3 | 4 | 5;

export type DropBuckets = Record<DropBucket, DropCount>;

/**
 * Aggregation of the trading days falling in one period.
 *
 * Computed on demand, never persisted.
 */
export interface PeriodSummary {
  /** `2024-W02`, `2024-01`, `2024-Q1` or `2024`. */
  period: string;
  startDate: CalendarDate;
  endDate: CalendarDate;
  open: number;
  high: number;
  low: number;
  close: number;

  /** Summed daily volumes in compact form. */
  volume: string;

  /** Move against the previous period's close, `""` for the first period. */
  change: string;

  pe: number | null;
  days: number;
  drops: DropBuckets;
}

/**
 * One point of a provider's EPS history (already trailing-twelve-month).
 */
export interface EpsPoint {
  date: CalendarDate;
  eps: number;
}

/**
 * Fundamentals supplied by EPS-capable providers.
 */
export interface Fundamentals {
  companyName: string;

  /** Ordered oldest to newest. */
  eps: EpsPoint[];
}
