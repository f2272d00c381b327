/**
 * Derived daily fields and fundamentals helpers.
 */

import type { DailyBar, DailyRecord, EpsPoint } from '@pricevault/contracts'
import { percentChange, roundToCents } from '@pricevault/market-data-core'

/**
 * Adds `change` and `hChange` in one forward pass.
 *
 * `change` compares each close with the previous close; `hChange` compares it
 * with the previous day's high. The first bar has no predecessor, so both are
 * empty even when older history exists outside `bars`.
 *
 * @param bars - Ordered oldest first
 * @returns New records, oldest first
 *
 * @example
 * ```typescript
 * deriveChanges([d1, d2]).map((r) => r.change) // ['', '4.00%']
 * ```
 */
export function deriveChanges(bars: readonly DailyBar[]): DailyRecord[] {
  const records: DailyRecord[] = []
  let previous: DailyBar | undefined

  for (const bar of bars) {
    records.push({
      ...bar,
      change: percentChange(bar.close, previous?.close),
      hChange: percentChange(bar.close, previous?.high),
    })
    previous = bar
  }

  return records
}

/**
 * Most recent positive EPS, or 0 when the history has none.
 *
 * @param eps - Ordered oldest first
 */
export function trailingEps(eps: readonly EpsPoint[]): number {
  for (let i = eps.length - 1; i >= 0; i--) {
    const point = eps[i]
    if (point && point.eps > 0) {
      return point.eps
    }
  }
  return 0
}

/**
 * Price-to-earnings at `close`, rounded to cents; null without positive EPS.
 */
export function priceToEarnings(close: number, ttmEps: number): number | null {
  return ttmEps > 0 ? roundToCents(close / ttmEps) : null
}
