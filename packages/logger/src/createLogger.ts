/**
 * @fileoverview Logger factory for pricevault.
 * Creates Winston loggers with structured fields, secret redaction and
 * console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Cache hit', { symbol: 'AAPL', provider: 'macrotrends' });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', filePath: './logs/pricevault.log' });
 * const cacheLogger = logger.child({ component: 'price-cache' });
 * cacheLogger.debug('Delta fetch', { symbol: 'MSFT', days: 6 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Redaction runs first so no later format can observe a secret.
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console({ level }));
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    exitOnError: false,
  });
}

/**
 * Child logger whose entries all carry `context`.
 *
 * @example
 * ```typescript
 * const symbolLogger = createChildLogger(logger, { symbol: '0700.HK', provider: 'yahoo' });
 * symbolLogger.info('Cache miss');
 * ```
 */
export function createChildLogger(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}
