import { describe, it, expect } from 'vitest';
import {
  calendarDate,
  isKnownTimezone,
  isValidCalendarDate,
  parseCalendarDate,
  shiftCalendarDate,
} from '../src/calendar.js';

describe('calendarDate', () => {
  it('maps an instant to the date in the given zone', () => {
    const instant = new Date('2024-03-10T02:00:00Z');
    expect(calendarDate(instant, 'UTC')).toBe('2024-03-10');
    expect(calendarDate(instant, 'America/New_York')).toBe('2024-03-09');
    expect(calendarDate(new Date('2024-03-09T17:00:00Z'), 'Asia/Hong_Kong')).toBe('2024-03-10');
  });
});

describe('shiftCalendarDate', () => {
  it('moves across month and leap-year boundaries', () => {
    expect(shiftCalendarDate('2024-03-01', -1)).toBe('2024-02-29');
    expect(shiftCalendarDate('2024-01-15', -30)).toBe('2023-12-16');
    expect(shiftCalendarDate('2023-12-31', 1)).toBe('2024-01-01');
  });
});

describe('parseCalendarDate', () => {
  it('rejects impossible dates', () => {
    expect(() => parseCalendarDate('2023-02-29')).toThrow('Invalid calendar date: 2023-02-29');
    expect(isValidCalendarDate('2024-02-29')).toBe(true);
    expect(isValidCalendarDate('2024-2-9')).toBe(false);
  });
});

describe('isKnownTimezone', () => {
  it('accepts IANA names only', () => {
    expect(isKnownTimezone('UTC')).toBe(true);
    expect(isKnownTimezone('Asia/Hong_Kong')).toBe(true);
    expect(isKnownTimezone('Mars/Olympus_Mons')).toBe(false);
  });
});
