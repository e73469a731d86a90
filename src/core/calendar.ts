import {
  differenceInCalendarDays,
  format,
  getDay,
  getDaysInYear,
  isExists,
  parseISO,
  startOfYear,
  subWeeks
} from 'date-fns';

import type { IsoDate } from './attendance.js';

/** Day-of-week names used by report weekday constraints. */
export type Weekday = 'sunday' | 'monday' | 'tuesday' | 'wednesday' | 'thursday' | 'friday' | 'saturday';

const WEEKDAYS: readonly Weekday[] = [
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday'
];

const ISO_DATE_FORMAT = 'yyyy-MM-dd';

/** Build an ISO calendar date, or `undefined` when the day does not exist (30 February). */
export function toIsoDate(year: number, month: number, day: number): IsoDate | undefined {
  if (!isExists(year, month - 1, day)) {
    return undefined;
  }

  return format(new Date(year, month - 1, day), ISO_DATE_FORMAT);
}

/** Weekday of an ISO date in the local calendar. */
export function weekdayOf(date: IsoDate): Weekday {
  return WEEKDAYS[getDay(parseISO(date))] ?? 'sunday';
}

/** Four-digit year of an ISO date. */
export function yearOf(date: IsoDate): number {
  return Number.parseInt(date.slice(0, 4), 10);
}

/** One-based month of an ISO date. */
export function monthOf(date: IsoDate): number {
  return Number.parseInt(date.slice(5, 7), 10);
}

/** ISO dates order lexicographically. */
export function compareIsoDates(left: IsoDate, right: IsoDate): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/** Date `weeks` weeks before `date`. */
export function weeksBefore(date: IsoDate, weeks: number): IsoDate {
  return format(subWeeks(parseISO(date), weeks), ISO_DATE_FORMAT);
}

/**
 * Share of the calendar year elapsed before `date` (1 January is 0).
 * Leap years divide by 366.
 */
export function yearProgress(date: IsoDate): number {
  const parsed = parseISO(date);
  const elapsed = differenceInCalendarDays(parsed, startOfYear(parsed));
  return elapsed / getDaysInYear(parsed);
}

/** Validate the `YYYY-MM-DD` shape and calendar existence of a caller-supplied date. */
export function isIsoDate(value: string): value is IsoDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return false;
  }

  const [, year, month, day] = match;
  return toIsoDate(Number(year), Number(month), Number(day)) === value;
}
