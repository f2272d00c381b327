/**
 * @fileoverview Aggregation period types and parsing.
 *
 * @module @pricevault/contracts/periods
 */

import { InvalidPeriodTypeError } from './errors.js';

/**
 * Supported aggregation buckets.
 */
export enum PeriodType {
  Weekly = 'weekly',
  Monthly = 'monthly',
  Quarterly = 'quarterly',
  Yearly = 'yearly',
}

/**
 * Accepted spellings, lower-cased.
 *
 * @internal
 */
const PERIOD_ALIASES: Readonly<Record<string, PeriodType>> = {
  weekly: PeriodType.Weekly,
  week: PeriodType.Weekly,
  w: PeriodType.Weekly,
  monthly: PeriodType.Monthly,
  month: PeriodType.Monthly,
  m: PeriodType.Monthly,
  quarterly: PeriodType.Quarterly,
  quarter: PeriodType.Quarterly,
  q: PeriodType.Quarterly,
  yearly: PeriodType.Yearly,
  year: PeriodType.Yearly,
  y: PeriodType.Yearly,
};

export function isPeriodType(value: string): value is PeriodType {
  return Object.values(PeriodType).some((period) => period === value);
}

/**
 * Parses a user-supplied period name.
 *
 * @throws {InvalidPeriodTypeError} for anything outside the accepted aliases
 *
 * @example
 * ```typescript
 * parsePeriodType('W')        // PeriodType.Weekly
 * parsePeriodType('quarter')  // PeriodType.Quarterly
 * parsePeriodType('daily')    // throws InvalidPeriodTypeError
 * ```
 */
export function parsePeriodType(input: string): PeriodType {
  const period = PERIOD_ALIASES[input.trim().toLowerCase()];
  if (!period) {
    throw new InvalidPeriodTypeError(input);
  }
  return period;
}

export function getAllPeriodTypes(): PeriodType[] {
  return Object.values(PeriodType);
}
