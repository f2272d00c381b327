/**
 * @fileoverview Type definitions for @pricevault/logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log severity, most to least severe.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/pricevault.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Machine-readable JSON lines instead of the colored single-line format.
   * @default true when NODE_ENV is 'production'
   */
  json?: boolean;

  /**
   * Also append entries to this file.
   */
  filePath?: string;

  /**
   * @default true
   */
  console?: boolean;

  /**
   * Discard every entry. Used by tests and embedders that bring their own sink.
   * @default false
   */
  silent?: boolean;
}

/**
 * Fields the price series service attaches to its entries.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;

  /** Normalized ticker, e.g. "AAPL" or "0700.HK" */
  symbol?: string;

  /** Provider id, e.g. "macrotrends" */
  provider?: string;

  /** Where a response came from: cache, provider, provider-direct or stale-cache */
  origin?: string;

  /** Aggregation bucket, e.g. "weekly" */
  period?: string;

  component?: string;
  operation?: string;
  duration_ms?: number;
  count?: number;
  error?: string;

  [key: string]: unknown;
}

/**
 * Re-export of Winston's logger so callers need not depend on winston directly.
 */
export type Logger = WinstonLogger;
