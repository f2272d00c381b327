/**
 * Freshness and coverage rules for cached daily prices.
 *
 * Daily rows only change once per trading day, so recency is judged by
 * calendar date rather than a TTL: a symbol fetched earlier today is fresh
 * regardless of the hour, one fetched yesterday at 23:59 is not.
 */

import type { CalendarDate, FetchMeta } from '@pricevault/contracts'
import { calendarDate, shiftCalendarDate } from '@pricevault/market-data-core'

const MS_PER_DAY = 24 * 60 * 60 * 1000

/**
 * Extra days re-fetched beyond the time since the last fetch, so late
 * corrections to recent rows are picked up.
 */
export const DELTA_OVERLAP_DAYS = 5

/**
 * True when the last fetch happened on today's calendar date in `timezone`.
 *
 * @example
 * ```typescript
 * // lastFetched 2024-01-15T00:05Z, now 2024-01-15T23:55Z
 * isFresh(meta, now)                      // true
 * isFresh(meta, now, 'America/New_York')  // false (Jan 14 vs Jan 15 local)
 * ```
 */
export function isFresh(meta: FetchMeta, now: Date, timezone = 'UTC'): boolean {
  return calendarDate(meta.lastFetched, timezone) === calendarDate(now, timezone)
}

/**
 * True when the cache reaches back to `start` (inclusive).
 */
export function coversRange(meta: FetchMeta, start: CalendarDate): boolean {
  return start >= meta.earliestDate
}

/**
 * Whole days elapsed since the last fetch (floor, never negative).
 */
export function daysSinceFetch(meta: FetchMeta, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - meta.lastFetched.getTime()) / MS_PER_DAY))
}

/**
 * Size of the delta fetch for a stale but covered symbol.
 *
 * @example
 * ```typescript
 * // last fetched 26 hours ago
 * deltaFetchDays(365, meta, now) // 6
 * deltaFetchDays(3, meta, now)   // 3
 * ```
 */
export function deltaFetchDays(requestedDays: number, meta: FetchMeta, now: Date): number {
  return Math.min(requestedDays, daysSinceFetch(meta, now) + DELTA_OVERLAP_DAYS)
}

export interface DateWindow {
  start: CalendarDate
  end: CalendarDate
}

/**
 * `[today - days, today]` as calendar dates in `timezone`.
 */
export function requestedWindow(days: number, now: Date, timezone = 'UTC'): DateWindow {
  const end = calendarDate(now, timezone)
  return { start: shiftCalendarDate(end, -days), end }
}
