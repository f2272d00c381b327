/**
 * @fileoverview Error taxonomy for the price cache system.
 *
 * Every error carries a machine-readable code, an optional structured data
 * payload and the ISO timestamp of its creation. The orchestrator branches on
 * these classes to decide between stale-cache fallback and propagation.
 *
 * @module @pricevault/contracts/errors
 */

/**
 * Base error class for all pricevault errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new PriceVaultError('CUSTOM_ERROR', 'Something went wrong', { symbol: 'AAPL' });
 * ```
 */
export class PriceVaultError extends Error {
  /** Machine-readable error code (e.g., 'PROVIDER_UNAVAILABLE'). */
  readonly code: string;

  /** Structured context for logging and callers. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PriceVaultError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Upstream provider could not deliver data: network failure, parse failure,
 * timeout, cancellation or an upstream-reported "not found" page.
 *
 * Eligible for the stale-cache fallback whenever cached rows exist.
 */
export class ProviderUnavailableError extends PriceVaultError {
  constructor(
    message: string,
    data: { provider: string; symbol: string; [key: string]: unknown },
    options?: { cause?: unknown }
  ) {
    super('PROVIDER_UNAVAILABLE', message, data, options);
    this.name = 'ProviderUnavailableError';
  }
}

/**
 * The provider matched nothing for the symbol, or no rows exist to serve.
 */
export class SymbolNotFoundError extends PriceVaultError {
  constructor(message: string, data: { symbol: string; provider?: string; [key: string]: unknown }) {
    super('SYMBOL_NOT_FOUND', message, data);
    this.name = 'SymbolNotFoundError';
  }
}

/**
 * Cache read or write failure. Never fatal to a request: reads fall back to
 * provider data and writes are logged and dropped.
 */
export class StorageError extends PriceVaultError {
  constructor(
    message: string,
    data: { operation: string; symbol?: string; [key: string]: unknown },
    options?: { cause?: unknown }
  ) {
    super('STORAGE_ERROR', message, data, options);
    this.name = 'StorageError';
  }
}

/**
 * Unrecognized aggregation bucket. Raised before any aggregation work.
 */
export class InvalidPeriodTypeError extends PriceVaultError {
  constructor(input: string) {
    super(
      'INVALID_PERIOD_TYPE',
      `invalid period type: ${input} (use weekly, monthly, quarterly, or yearly)`,
      { input }
    );
    this.name = 'InvalidPeriodTypeError';
  }
}

export function isPriceVaultError(error: unknown): error is PriceVaultError {
  return error instanceof PriceVaultError;
}

export function isProviderUnavailableError(error: unknown): error is ProviderUnavailableError {
  return error instanceof ProviderUnavailableError;
}

export function isSymbolNotFoundError(error: unknown): error is SymbolNotFoundError {
  return error instanceof SymbolNotFoundError;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isInvalidPeriodTypeError(error: unknown): error is InvalidPeriodTypeError {
  return error instanceof InvalidPeriodTypeError;
}

/**
 * Extracts a printable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
