import { describe, it, expect } from 'vitest'
import type { DailyBar } from '@pricevault/contracts'
import { deriveChanges, priceToEarnings, trailingEps } from '../src/derived.js'

function bar(date: string, close: number, high = close): DailyBar {
  return { date, open: close, high, low: close, close, volume: '1.00M', pe: null }
}

describe('deriveChanges', () => {
  it('computes close-over-close change with an empty first entry', () => {
    const records = deriveChanges([bar('2024-01-08', 100), bar('2024-01-09', 104), bar('2024-01-10', 99)])
    expect(records.map((r) => r.change)).toEqual(['', '4.00%', '-4.81%'])
    expect(records[0]?.hChange).toBe('')
  })

  it('measures hChange against the previous day high, not the current high', () => {
    const records = deriveChanges([bar('2024-01-08', 100, 110), bar('2024-01-09', 104, 120)])
    // (104 - 110) / 110
    expect(records[1]?.hChange).toBe('-5.45%')
  })

  it('leaves derived fields empty after a non-positive predecessor', () => {
    const records = deriveChanges([bar('2024-01-08', 0, 0), bar('2024-01-09', 5)])
    expect(records[1]?.change).toBe('')
    expect(records[1]?.hChange).toBe('')
  })

  it('does not modify its input', () => {
    const input = [bar('2024-01-08', 100)]
    deriveChanges(input)
    expect(input[0]).not.toHaveProperty('change')
  })
})

describe('trailingEps', () => {
  it('takes the most recent positive value', () => {
    expect(
      trailingEps([
        { date: '2023-06-30', eps: 5.5 },
        { date: '2023-09-30', eps: 6 },
        { date: '2023-12-31', eps: -1 },
      ])
    ).toBe(6)
  })

  it('is 0 without positive history', () => {
    expect(trailingEps([])).toBe(0)
    expect(trailingEps([{ date: '2023-12-31', eps: 0 }])).toBe(0)
  })
})

describe('priceToEarnings', () => {
  it('rounds to cents and needs positive EPS', () => {
    expect(priceToEarnings(147.46, 6)).toBe(24.58)
    expect(priceToEarnings(150, 0)).toBeNull()
  })
})
