/**
 * @fileoverview Public API exports for @pricevault/logger
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { redactPII, redactValue, isSensitiveKey, standardFields, prettyPrint } from './formats.js';

export { startTimer, measureAsync } from './perf-timer.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry } from './types.js';
export type { PerfTimer } from './perf-timer.js';
