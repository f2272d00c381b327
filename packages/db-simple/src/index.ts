/**
 * @pricevault/db-simple
 *
 * Minimal connection layer over SQLite and PostgreSQL
 */

export {
  connect,
  isRetryableError,
  parseConnectionString,
  toPositionalParams,
  type DbConnection,
  type DbType,
  type Logger,
  type ConnectOptions,
} from './connect.js'
