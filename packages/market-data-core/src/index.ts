/**
 * @pricevault/market-data-core
 *
 * Pure helpers for daily price data: cent-precision arithmetic, compact
 * volume and percent formatting, calendar dates, drop classification and
 * period aggregation. No I/O.
 *
 * @example
 * ```typescript
 * import { aggregateToPeriods, formatDropCount } from "@pricevault/market-data-core";
 *
 * const months = aggregateToPeriods(records, "monthly");
 * formatDropCount(months[0].drops[2]); // "0/1"
 * ```
 *
 * @packageDocumentation
 */

export {
  toCents,
  roundToCents,
  formatPrice,
  formatPercent,
  percentChange,
  parseVolume,
  formatVolume,
} from "./numeric.js";

export {
  calendarDate,
  parseCalendarDate,
  shiftCalendarDate,
  isValidCalendarDate,
  isKnownTimezone,
} from "./calendar.js";

export { classifyDrop, emptyDropBuckets, formatDropCount } from "./drops.js";

export { aggregateToPeriods, periodKey } from "./aggregate.js";
