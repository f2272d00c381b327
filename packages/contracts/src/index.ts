/**
 * @fileoverview Main entry point for @pricevault/contracts.
 *
 * Exports the domain types, the provider capability contract, period parsing
 * and the error taxonomy shared by every package.
 *
 * @module @pricevault/contracts
 */

// Market data types
export type {
  CalendarDate,
  DailyBar,
  DailyRecord,
  FetchMeta,
  DropCount,
  DropBucket,
  DropBuckets,
  PeriodSummary,
  EpsPoint,
  Fundamentals,
} from './market.js';

// Provider capability
export type {
  ProviderCallOptions,
  FundamentalsProvider,
  PriceOnlyProvider,
  PriceProvider,
  ProviderKind,
} from './provider.js';

export { suppliesFundamentals } from './provider.js';

// Periods
export { PeriodType, isPeriodType, parsePeriodType, getAllPeriodTypes } from './periods.js';

// Error classes and guards
export {
  PriceVaultError,
  ProviderUnavailableError,
  SymbolNotFoundError,
  StorageError,
  InvalidPeriodTypeError,
  isPriceVaultError,
  isProviderUnavailableError,
  isSymbolNotFoundError,
  isStorageError,
  isInvalidPeriodTypeError,
  errorMessage,
} from './errors.js';
