import type { ColumnDescriptor, ServiceTime } from '../core/attendance.js';
import { toIsoDate } from '../core/calendar.js';
import { normalizeText } from './html-ast.js';

/** Options threaded into header parsing; the year is never read from ambient state. */
export interface ParseHeaderOptions {
  /** Year applied to short `DD/MM` dates (the report's declared reporting year). */
  reportingYear?: number;
  /** When false, date-only headers (group meeting columns) are accepted as `other`. */
  requireTime?: boolean;
  /** Column position recorded on the descriptor. */
  columnIndex?: number;
}

const TIME_PATTERN = /(?<!\d)(\d{1,2}):(\d{2})\s*(AM|PM)/i;
const FULL_DATE_PATTERN = /(?<!\d)(\d{1,2})\/(\d{1,2})\/(\d{4})(?!\d)/;
const SHORT_DATE_PATTERN = /(?<![\d/])(\d{1,2})\/(\d{1,2})(?![\d/])/;

/** Any of the two date grammars; used by table signatures. */
export const DATE_HEADER_PATTERN = /(?<!\d)\d{1,2}\/\d{1,2}(?:\/\d{4})?(?!\d)/;

/** Leap year used to validate short dates before a year is known (29/02 stays possible). */
const PLACEHOLDER_LEAP_YEAR = 2000;

/** Service slots matched by substring containment, in priority order. */
const SERVICE_TIME_MARKERS: ReadonlyArray<readonly [string, ServiceTime]> = [
  ['8:30', '8:30'],
  ['9:30', '9:30'],
  ['10:30', '10:30'],
  ['6:30', '6:30'],
  ['6:00', '6:30']
];

/**
 * Parse one raw column header into a service column descriptor.
 *
 * Headers look like `9:30 AMMorning Prayer 14/01` (short date, year from context) or
 * `Communion 02/06/2024 8:30 AM` (full date). Returns `null` for columns that are not
 * service columns: no time token (unless `requireTime` is false), no date, or a date
 * that is not on the calendar.
 */
export function parseHeader(raw: string, options: ParseHeaderOptions = {}): ColumnDescriptor | null {
  const header = normalizeText(raw);
  const timeMatch = TIME_PATTERN.exec(header);
  if (!timeMatch && options.requireTime !== false) {
    return null;
  }

  const timeToken = timeMatch ? `${timeMatch[1]}:${timeMatch[2]} ${(timeMatch[3] ?? '').toUpperCase()}` : undefined;
  const serviceTime = timeToken ? normalizeServiceTime(timeToken) : 'other';
  const withoutTime = timeMatch ? header.replace(timeMatch[0], ' ') : header;

  const fullMatch = FULL_DATE_PATTERN.exec(withoutTime);
  if (fullMatch) {
    const date = toIsoDate(Number(fullMatch[3]), Number(fullMatch[2]), Number(fullMatch[1]));
    if (!date) {
      return null;
    }

    return Object.freeze({
      index: options.columnIndex ?? 0,
      rawHeader: raw,
      label: normalizeText(withoutTime.replace(fullMatch[0], ' ')),
      timeToken,
      serviceTime,
      date,
      dateIsYearExplicit: true
    });
  }

  const shortMatch = SHORT_DATE_PATTERN.exec(withoutTime);
  if (!shortMatch) {
    return null;
  }

  const day = Number(shortMatch[1]);
  const month = Number(shortMatch[2]);
  const year = options.reportingYear;
  const date = toIsoDate(year ?? PLACEHOLDER_LEAP_YEAR, month, day);
  if (!date) {
    return null;
  }

  return Object.freeze({
    index: options.columnIndex ?? 0,
    rawHeader: raw,
    label: normalizeText(withoutTime.replace(shortMatch[0], ' ')),
    timeToken,
    serviceTime,
    date: year === undefined ? null : date,
    dateIsYearExplicit: false
  });
}

/** Map a normalized `H:MM AM|PM` token onto a service slot. */
export function normalizeServiceTime(timeToken: string): ServiceTime {
  for (const [marker, serviceTime] of SERVICE_TIME_MARKERS) {
    if (timeToken.includes(marker)) {
      return serviceTime;
    }
  }

  return 'other';
}
