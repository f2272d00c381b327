/**
 * @fileoverview Custom Winston formats: secret redaction, standard fields and
 * the human-readable console line.
 */

import { format } from 'winston';

/**
 * Field names whose values never reach a transport. Connection strings for
 * Postgres carry credentials, so `url`-style database fields are included.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
  /connection[_-]?string/i,
  /database[_-]?url/i,
];

const REDACTED = '[REDACTED]';

/** Winston's own keys, never treated as user metadata. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive keys replaced at any depth.
 * Errors and dates pass through untouched.
 */
export function redactValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return copy;
}

/**
 * Redacts sensitive metadata before any other format sees it.
 *
 * @example
 * ```typescript
 * logger.info('Connecting', { databaseUrl: 'postgres://u:p@host/db' });
 * // {"level":"info","message":"Connecting","databaseUrl":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO timestamp plus stack capture for logged Error instances.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * One colored line per entry.
 *
 * @example
 * ```
 * [2024-01-15T09:30:00.000+00:00] info: Cache hit symbol=AAPL provider=macrotrends origin="cache"
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, provider, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (provider) context.push(`provider=${String(provider)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return stack ? `${baseMsg}\n${String(stack)}` : baseMsg;
  })
);
