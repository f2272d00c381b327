/**
 * Daily-to-period aggregation.
 *
 * Groups daily bars into weekly, monthly, quarterly or yearly periods
 * following standard OHLCV conventions:
 * - Open = first day's open
 * - High = max of all highs
 * - Low = min of all lows
 * - Close = last day's close
 * - Volume = sum of all volumes
 *
 * Each period also counts its drop days. Drops are measured per day against
 * the previous trading day's close, which carries across period boundaries:
 * a Monday is compared with the preceding Friday even in weekly mode.
 */

import {
  PeriodType,
  parsePeriodType,
  type CalendarDate,
  type DailyBar,
  type PeriodSummary,
} from '@pricevault/contracts';
import { isValidCalendarDate, parseCalendarDate } from './calendar.js';
import { classifyDrop, emptyDropBuckets } from './drops.js';
import { formatVolume, parseVolume, percentChange, toCents } from './numeric.js';

/**
 * Period key of a date. Keys sort lexicographically in chronological order.
 *
 * @example
 * ```typescript
 * periodKey('2024-01-08', PeriodType.Weekly);    // '2024-W02'
 * periodKey('2024-12-30', PeriodType.Weekly);    // '2025-W01' (ISO week-year)
 * periodKey('2024-05-17', PeriodType.Quarterly); // '2024-Q2'
 * ```
 */
export function periodKey(date: CalendarDate, period: PeriodType): string {
  const day = parseCalendarDate(date);

  switch (period) {
    case PeriodType.Weekly:
      return `${day.isoWeekYear()}-W${String(day.isoWeek()).padStart(2, '0')}`;
    case PeriodType.Monthly:
      return day.format('YYYY-MM');
    case PeriodType.Quarterly:
      return `${day.year()}-Q${day.quarter()}`;
    case PeriodType.Yearly:
      return day.format('YYYY');
  }
}

interface PeriodBucket {
  summary: PeriodSummary;
  highCents: number;
  lowCents: number;
  volume: number;
}

function openBucket(key: string, bar: DailyBar): PeriodBucket {
  return {
    summary: {
      period: key,
      startDate: bar.date,
      endDate: bar.date,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: '',
      change: '',
      pe: bar.pe,
      days: 0,
      drops: emptyDropBuckets(),
    },
    highCents: toCents(bar.high),
    lowCents: toCents(bar.low),
    volume: 0,
  };
}

/**
 * Aggregates a daily series into period summaries.
 *
 * @param records - Daily bars; any order, they are sorted by date first.
 *   Bars whose date is not a valid `YYYY-MM-DD` are skipped.
 * @param period - A {@link PeriodType} or any alias accepted by `parsePeriodType`
 * @returns Summaries ordered newest period first; `[]` for empty input
 *
 * @throws {InvalidPeriodTypeError} before any work when `period` is unknown
 *
 * @example
 * ```typescript
 * const weeks = aggregateToPeriods(series.records, 'weekly');
 * weeks[0].period;       // '2024-W02'
 * weeks[0].drops[3];     // { close: 1, low: 0 }
 * ```
 */
export function aggregateToPeriods(records: readonly DailyBar[], period: PeriodType | string): PeriodSummary[] {
  const periodType = parsePeriodType(period);

  const ordered = records
    .filter((bar) => isValidCalendarDate(bar.date))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  const buckets = new Map<string, PeriodBucket>();
  let prevClose: number | null = null;

  for (const bar of ordered) {
    const key = periodKey(bar.date, periodType);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = openBucket(key, bar);
      buckets.set(key, bucket);
    }

    const { summary } = bucket;
    summary.endDate = bar.date;
    summary.close = bar.close;
    summary.pe = bar.pe;
    summary.days += 1;
    bucket.volume += parseVolume(bar.volume);

    const highCents = toCents(bar.high);
    if (highCents > bucket.highCents) {
      bucket.highCents = highCents;
      summary.high = bar.high;
    }
    const lowCents = toCents(bar.low);
    if (lowCents < bucket.lowCents) {
      bucket.lowCents = lowCents;
      summary.low = bar.low;
    }

    if (prevClose !== null) {
      const closeBucket = classifyDrop(bar.close, prevClose);
      if (closeBucket !== null) {
        summary.drops[closeBucket].close += 1;
      }
      const lowBucket = classifyDrop(bar.low, prevClose);
      if (lowBucket !== null) {
        summary.drops[lowBucket].low += 1;
      }
    }
    prevClose = bar.close;
  }

  const keys = [...buckets.keys()].sort();
  const result: PeriodSummary[] = [];
  let previousPeriodClose: number | null = null;

  for (const key of keys) {
    const bucket = buckets.get(key);
    if (!bucket) {
      continue;
    }
    const { summary } = bucket;
    summary.volume = formatVolume(bucket.volume);
    summary.change = percentChange(summary.close, previousPeriodClose);
    previousPeriodClose = summary.close;
    result.push(summary);
  }

  return result.reverse();
}
