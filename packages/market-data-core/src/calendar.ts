/**
 * Calendar-date helpers.
 *
 * Dates are `YYYY-MM-DD` strings. Instants are mapped to a calendar date in
 * an explicit IANA zone; date arithmetic itself is zone-free.
 */

import moment from 'moment-timezone';
import type { CalendarDate } from '@pricevault/contracts';

const DATE_FORMAT = 'YYYY-MM-DD';

/**
 * Calendar date of `instant` as seen in `timezone`.
 *
 * @example
 * ```typescript
 * calendarDate(new Date('2024-03-10T02:00:00Z'), 'America/New_York'); // '2024-03-09'
 * ```
 */
export function calendarDate(instant: Date, timezone: string): CalendarDate {
  return moment(instant).tz(timezone).format(DATE_FORMAT);
}

/**
 * Strictly parses a calendar date.
 *
 * @throws Error on anything that is not a real `YYYY-MM-DD` date
 */
export function parseCalendarDate(date: CalendarDate): moment.Moment {
  const parsed = moment.utc(date, DATE_FORMAT, true);
  if (!parsed.isValid()) {
    throw new Error(`Invalid calendar date: ${date}`);
  }
  return parsed;
}

/**
 * Moves a calendar date by whole days (negative moves back).
 */
export function shiftCalendarDate(date: CalendarDate, days: number): CalendarDate {
  return parseCalendarDate(date).add(days, 'days').format(DATE_FORMAT);
}

export function isValidCalendarDate(date: string): boolean {
  return moment.utc(date, DATE_FORMAT, true).isValid();
}

/**
 * True for IANA zone names known to the bundled tz database.
 */
export function isKnownTimezone(timezone: string): boolean {
  return moment.tz.zone(timezone) !== null;
}
