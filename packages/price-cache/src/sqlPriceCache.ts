/**
 * Database-backed price cache.
 *
 * Two tables:
 * - `daily_prices`: one row per (symbol, date); prices as fixed 2-decimal
 *   text so values round-trip exactly on both SQLite and PostgreSQL
 * - `fetch_log`: one row per symbol describing the cached span and the
 *   provider that last supplied it
 *
 * Rows are only ever upserted, never deleted. Corrections overwrite by key.
 */

import type { DbConnection } from '@pricevault/db-simple'
import {
  StorageError,
  errorMessage,
  type CalendarDate,
  type DailyBar,
  type DailyRecord,
  type FetchMeta,
} from '@pricevault/contracts'
import { formatPrice } from '@pricevault/market-data-core'
import { deriveChanges } from './derived.js'
import type { PriceCache } from './types.js'

/**
 * Database row type for the daily_prices table.
 */
interface PriceRow {
  date: string
  open: string
  high: string
  low: string
  close: string
  volume: string
  pe: string | null
}

/**
 * Database row type for the fetch_log table.
 */
interface MetaRow {
  symbol: string
  source: string
  company_name: string
  ttm_eps: number | string
  last_fetched: string
  latest_date: string
  earliest_date: string
}

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS daily_prices (
    symbol TEXT NOT NULL,
    date TEXT NOT NULL,
    open TEXT NOT NULL,
    high TEXT NOT NULL,
    low TEXT NOT NULL,
    close TEXT NOT NULL,
    volume TEXT NOT NULL,
    pe TEXT,
    PRIMARY KEY (symbol, date)
  )`,
  `CREATE TABLE IF NOT EXISTS fetch_log (
    symbol TEXT PRIMARY KEY,
    source TEXT NOT NULL,
    company_name TEXT NOT NULL DEFAULT '',
    ttm_eps DOUBLE PRECISION NOT NULL DEFAULT 0,
    last_fetched TEXT NOT NULL,
    latest_date TEXT NOT NULL,
    earliest_date TEXT NOT NULL
  )`,
]

// ON CONFLICT ... DO UPDATE with `excluded` reads the same on SQLite (3.24+) and PostgreSQL.
const UPSERT_PRICE = `
  INSERT INTO daily_prices (symbol, date, open, high, low, close, volume, pe)
  VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT (symbol, date) DO UPDATE SET
    open = excluded.open,
    high = excluded.high,
    low = excluded.low,
    close = excluded.close,
    volume = excluded.volume,
    pe = excluded.pe
`

const UPSERT_META = `
  INSERT INTO fetch_log (symbol, source, company_name, ttm_eps, last_fetched, latest_date, earliest_date)
  VALUES (?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT (symbol) DO UPDATE SET
    source = excluded.source,
    company_name = excluded.company_name,
    ttm_eps = excluded.ttm_eps,
    last_fetched = excluded.last_fetched,
    latest_date = excluded.latest_date,
    earliest_date = excluded.earliest_date
`

const SELECT_META = `
  SELECT symbol, source, company_name, ttm_eps, last_fetched, latest_date, earliest_date
  FROM fetch_log
  WHERE symbol = ?
`

const SELECT_RANGE = `
  SELECT date, open, high, low, close, volume, pe
  FROM daily_prices
  WHERE symbol = ? AND date >= ? AND date <= ?
  ORDER BY date ASC
`

function priceParams(symbol: string, bar: DailyBar): unknown[] {
  return [
    symbol,
    bar.date,
    formatPrice(bar.open),
    formatPrice(bar.high),
    formatPrice(bar.low),
    formatPrice(bar.close),
    bar.volume,
    bar.pe === null ? null : formatPrice(bar.pe),
  ]
}

function metaParams(meta: FetchMeta): unknown[] {
  return [
    meta.symbol,
    meta.source,
    meta.companyName,
    meta.ttmEps,
    meta.lastFetched.toISOString(),
    meta.latestDate,
    meta.earliestDate,
  ]
}

function rowToBar(row: PriceRow): DailyBar {
  return {
    date: row.date,
    open: Number(row.open),
    high: Number(row.high),
    low: Number(row.low),
    close: Number(row.close),
    volume: row.volume,
    pe: row.pe === null ? null : Number(row.pe),
  }
}

function rowToMeta(row: MetaRow): FetchMeta {
  return {
    symbol: row.symbol,
    source: row.source,
    companyName: row.company_name,
    ttmEps: Number(row.ttm_eps),
    lastFetched: new Date(row.last_fetched),
    latestDate: row.latest_date,
    earliestDate: row.earliest_date,
  }
}

/**
 * SQL implementation of {@link PriceCache} over a `@pricevault/db-simple`
 * connection.
 *
 * Example:
 * ```typescript
 * const db = await connect('sqlite:/data/cache.db')
 * const cache = new SqlPriceCache(db)
 * await cache.init()
 *
 * await cache.storeFetch('AAPL', bars, meta)
 * const records = await cache.getRange('AAPL', '2024-01-01', '2024-01-31')
 * ```
 */
export class SqlPriceCache implements PriceCache {
  private db: DbConnection

  constructor(db: DbConnection) {
    this.db = db
  }

  /**
   * Creates both tables if missing. Safe to call repeatedly.
   */
  async init(): Promise<void> {
    try {
      for (const statement of SCHEMA) {
        await this.db.exec(statement)
      }
    } catch (error) {
      throw new StorageError(`Failed to initialize cache schema: ${errorMessage(error)}`, { operation: 'init' }, { cause: error })
    }
  }

  async getMeta(symbol: string): Promise<FetchMeta | null> {
    try {
      const rows = await this.db.query<MetaRow>(SELECT_META, [symbol])
      const row = rows[0]
      return row ? rowToMeta(row) : null
    } catch (error) {
      throw new StorageError(
        `Failed to read fetch metadata for ${symbol}: ${errorMessage(error)}`,
        { operation: 'getMeta', symbol },
        { cause: error }
      )
    }
  }

  async getRange(symbol: string, start: CalendarDate, end: CalendarDate): Promise<DailyRecord[]> {
    let rows: PriceRow[]
    try {
      rows = await this.db.query<PriceRow>(SELECT_RANGE, [symbol, start, end])
    } catch (error) {
      throw new StorageError(
        `Failed to read prices for ${symbol}: ${errorMessage(error)}`,
        { operation: 'getRange', symbol, start, end },
        { cause: error }
      )
    }

    return deriveChanges(rows.map(rowToBar)).reverse()
  }

  async storeRecords(symbol: string, bars: readonly DailyBar[]): Promise<void> {
    try {
      await this.db.transaction(async (tx) => {
        for (const bar of bars) {
          await tx.exec(UPSERT_PRICE, priceParams(symbol, bar))
        }
      })
    } catch (error) {
      throw new StorageError(
        `Failed to store prices for ${symbol}: ${errorMessage(error)}`,
        { operation: 'storeRecords', symbol, count: bars.length },
        { cause: error }
      )
    }
  }

  async updateMeta(meta: FetchMeta): Promise<void> {
    try {
      await this.db.exec(UPSERT_META, metaParams(meta))
    } catch (error) {
      throw new StorageError(
        `Failed to update fetch metadata for ${meta.symbol}: ${errorMessage(error)}`,
        { operation: 'updateMeta', symbol: meta.symbol },
        { cause: error }
      )
    }
  }

  async storeFetch(symbol: string, bars: readonly DailyBar[], meta: FetchMeta): Promise<void> {
    try {
      await this.db.transaction(async (tx) => {
        for (const bar of bars) {
          await tx.exec(UPSERT_PRICE, priceParams(symbol, bar))
        }
        await tx.exec(UPSERT_META, metaParams(meta))
      })
    } catch (error) {
      throw new StorageError(
        `Failed to store fetch for ${symbol}: ${errorMessage(error)}`,
        { operation: 'storeFetch', symbol, count: bars.length },
        { cause: error }
      )
    }
  }
}
