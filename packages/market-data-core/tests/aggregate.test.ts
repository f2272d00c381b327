import { describe, it, expect } from 'vitest';
import { InvalidPeriodTypeError, PeriodType, type DailyBar } from '@pricevault/contracts';
import { aggregateToPeriods, periodKey } from '../src/aggregate.js';
import { formatDropCount } from '../src/drops.js';

function bar(date: string, open: number, high: number, low: number, close: number, volume = '1.00M', pe: number | null = null): DailyBar {
  return { date, open, high, low, close, volume, pe };
}

const WEEK_OF_JAN_8: DailyBar[] = [
  bar('2024-01-08', 100, 105, 99, 104, '1.00M', 20.8),
  bar('2024-01-09', 104, 106, 102, 103, '1.50M', 20.6),
  bar('2024-01-10', 103, 104, 98, 99, '2.00M', 19.8),
  bar('2024-01-11', 99, 101, 97, 100, '1.20M', 20),
  bar('2024-01-12', 100, 102, 95, 96, '1.80M', 19.2),
];

describe('periodKey', () => {
  it('uses ISO week-years for weekly keys', () => {
    expect(periodKey('2024-01-08', PeriodType.Weekly)).toBe('2024-W02');
    expect(periodKey('2024-12-30', PeriodType.Weekly)).toBe('2025-W01');
    expect(periodKey('2021-01-03', PeriodType.Weekly)).toBe('2020-W53');
  });

  it('builds month, quarter and year keys', () => {
    expect(periodKey('2024-05-17', PeriodType.Monthly)).toBe('2024-05');
    expect(periodKey('2024-05-17', PeriodType.Quarterly)).toBe('2024-Q2');
    expect(periodKey('2024-10-01', PeriodType.Quarterly)).toBe('2024-Q4');
    expect(periodKey('2024-05-17', PeriodType.Yearly)).toBe('2024');
  });
});

describe('aggregateToPeriods', () => {
  it('skips bars with malformed dates', () => {
    const withBadRow = [...WEEK_OF_JAN_8.slice(0, 2), bar('2024-13-45', 50, 50, 1, 1), ...WEEK_OF_JAN_8.slice(2)];

    expect(aggregateToPeriods(withBadRow, PeriodType.Weekly)).toEqual(
      aggregateToPeriods(WEEK_OF_JAN_8, PeriodType.Weekly)
    );
  });

  it('returns nothing when every date is malformed', () => {
    expect(aggregateToPeriods([bar('not-a-date', 1, 1, 1, 1)], PeriodType.Monthly)).toEqual([]);
  });

  it('summarizes one trading week', () => {
    const [week, ...rest] = aggregateToPeriods(WEEK_OF_JAN_8, PeriodType.Weekly);

    expect(rest).toEqual([]);
    expect(week).toEqual({
      period: '2024-W02',
      startDate: '2024-01-08',
      endDate: '2024-01-12',
      open: 100,
      high: 106,
      low: 95,
      close: 96,
      volume: '7.50M',
      change: '',
      pe: 19.2,
      days: 5,
      drops: {
        2: { close: 0, low: 1 },
        3: { close: 1, low: 0 },
        4: { close: 1, low: 1 },
        5: { close: 0, low: 1 },
      },
    });
  });

  it('returns periods newest first with period-over-period change', () => {
    const records = [
      bar('2024-01-15', 100, 101, 99.5, 100),
      bar('2024-01-16', 100, 103, 99, 102),
      bar('2024-02-01', 101, 101, 96, 97),
      bar('2024-02-02', 97, 100, 96.5, 99),
    ];

    const months = aggregateToPeriods(records, 'monthly');

    expect(months.map((m) => m.period)).toEqual(['2024-02', '2024-01']);
    expect(months.map((m) => m.change)).toEqual(['-2.94%', '']);
    expect(months[1]).toMatchObject({ open: 100, high: 103, low: 99, close: 102, volume: '2.00M', days: 2 });
    expect(months[0]).toMatchObject({ open: 101, high: 101, low: 96, close: 99, days: 2 });
  });

  it('compares the first day of a period with the previous period close', () => {
    const records = [
      bar('2024-01-15', 100, 101, 99.5, 100),
      bar('2024-01-16', 100, 103, 99, 102),
      bar('2024-02-01', 101, 101, 96, 97),
      bar('2024-02-02', 97, 100, 96.5, 99),
    ];

    const [feb, jan] = aggregateToPeriods(records, PeriodType.Monthly);

    expect(feb?.drops[4]).toEqual({ close: 1, low: 0 });
    expect(feb?.drops[5]).toEqual({ close: 0, low: 1 });
    expect(jan?.drops).toEqual({
      2: { close: 0, low: 0 },
      3: { close: 0, low: 0 },
      4: { close: 0, low: 0 },
      5: { close: 0, low: 0 },
    });
  });

  it('sorts its input before grouping', () => {
    const shuffled = [...WEEK_OF_JAN_8].reverse();
    const [week] = aggregateToPeriods(shuffled, 'w');

    expect(week?.open).toBe(100);
    expect(week?.close).toBe(96);
    expect(week?.drops[3].close).toBe(1);
  });

  it('skips drop classification after a non-positive close', () => {
    const records = [bar('2024-03-04', 1, 1, 0, 0), bar('2024-03-05', 1, 1, 0.5, 0.5)];
    const [week] = aggregateToPeriods(records, PeriodType.Weekly);

    expect(week?.drops[5]).toEqual({ close: 0, low: 0 });
  });

  it('groups a year of quarters', () => {
    const records = [
      bar('2024-02-01', 10, 11, 9, 10),
      bar('2024-04-01', 10, 12, 10, 11),
      bar('2024-07-01', 11, 12, 11, 12),
      bar('2024-10-01', 12, 13, 12, 13),
    ];

    expect(aggregateToPeriods(records, 'quarter').map((q) => q.period)).toEqual([
      '2024-Q4',
      '2024-Q3',
      '2024-Q2',
      '2024-Q1',
    ]);
    expect(aggregateToPeriods(records, 'Y')).toHaveLength(1);
  });

  it('returns an empty array for empty input', () => {
    expect(aggregateToPeriods([], PeriodType.Yearly)).toEqual([]);
  });

  it('rejects an unknown period before aggregating', () => {
    expect(() => aggregateToPeriods(WEEK_OF_JAN_8, 'daily')).toThrow(InvalidPeriodTypeError);
    expect(() => aggregateToPeriods([], 'hourly')).toThrow(
      'invalid period type: hourly (use weekly, monthly, quarterly, or yearly)'
    );
  });
});

describe('formatDropCount', () => {
  it('renders close/low', () => {
    const [week] = aggregateToPeriods(WEEK_OF_JAN_8, PeriodType.Weekly);
    expect(week && formatDropCount(week.drops[4])).toBe('1/1');
  });
});
