import type { ColumnDescriptor, IsoDate } from '../core/attendance.js';
import { compareIsoDates, weekdayOf, yearOf } from '../core/calendar.js';
import type { HtmlNode } from './html-ast.js';
import { addDiagnostic, type ParseContext } from './parse-context.js';
import { DATE_HEADER_PATTERN, parseHeader } from './parse-header.js';
import type { ReportProfile } from './report-profiles.js';

/** Reporting context for resolving and filtering column dates. */
export interface ColumnPlanContext {
  reportingYear?: number;
  /** Columns dated after this day are not yet meaningful and are dropped. */
  asOf?: IsoDate;
}

/** Identity and contact headers that are never service columns. */
const IDENTITY_HEADER_FRAGMENTS = ['first name', 'last name', 'category', 'email', 'phone', 'volunteers'];

/**
 * Turn header cells into the ordered list of usable service columns.
 * Every dropped column leaves a diagnostic so skipped data can be counted.
 */
export function planColumns(
  headerCells: readonly HtmlNode[],
  profile: ReportProfile,
  context: ColumnPlanContext,
  ctx: ParseContext
): ColumnDescriptor[] {
  const columns: ColumnDescriptor[] = [];

  headerCells.forEach((cell, index) => {
    const column = planColumn(cell, index, profile, context, ctx);
    if (column) {
      columns.push(column);
    }
  });

  return columns.sort(
    (left, right) => compareIsoDates(left.date ?? '', right.date ?? '') || left.index - right.index
  );
}

/** Parse and filter one header cell. */
function planColumn(
  cell: HtmlNode,
  index: number,
  profile: ReportProfile,
  context: ColumnPlanContext,
  ctx: ParseContext
): ColumnDescriptor | undefined {
  const header = cell.text;
  if (header.length === 0 || isIdentityHeader(header)) {
    return undefined;
  }

  const parsed = parseHeader(header, {
    reportingYear: context.reportingYear,
    requireTime: profile.requireTime,
    columnIndex: index
  });

  if (!parsed) {
    if (DATE_HEADER_PATTERN.test(header) && (!profile.requireTime || /\d:\d{2}/.test(header))) {
      addDiagnostic(ctx, 'COLUMN_INVALID_DATE', 'warning', `Column '${header}' does not hold a calendar date.`, cell);
    } else {
      addDiagnostic(ctx, 'COLUMN_NOT_SERVICE', 'info', `Column '${header}' is not a service column.`, cell);
    }
    return undefined;
  }

  if (parsed.date === null) {
    addDiagnostic(
      ctx,
      'COLUMN_MISSING_YEAR',
      'warning',
      `Column '${header}' has a short date but no reporting year was supplied.`,
      cell
    );
    return undefined;
  }

  const label = parsed.label.toLowerCase();
  let column: ColumnDescriptor = parsed;

  if (profile.requiredLabel !== undefined) {
    if (!label.includes(profile.requiredLabel)) {
      addDiagnostic(
        ctx,
        'COLUMN_NOT_PRAYER_MEETING',
        'info',
        `Column '${header}' is not a ${profile.requiredLabel} column.`,
        cell
      );
      return undefined;
    }

    column = Object.freeze({
      ...parsed,
      meetingKind: label.includes(`quarterly ${profile.requiredLabel}`) ? 'quarterly' : 'weekly'
    });
  }

  if (profile.weekday !== null && weekdayOf(parsed.date) !== profile.weekday) {
    addDiagnostic(
      ctx,
      'COLUMN_WRONG_WEEKDAY',
      'info',
      `Column '${header}' falls on a ${weekdayOf(parsed.date)}, expected ${profile.weekday}.`,
      cell
    );
    return undefined;
  }

  const excludedBy = profile.excludedServicePatterns.find((pattern) => label.includes(pattern));
  if (excludedBy !== undefined) {
    addDiagnostic(
      ctx,
      'COLUMN_EXCLUDED_SERVICE',
      'info',
      `Column '${header}' is a special service ('${excludedBy}').`,
      cell
    );
    return undefined;
  }

  if (
    profile.restrictToReportingYear &&
    context.reportingYear !== undefined &&
    yearOf(parsed.date) !== context.reportingYear
  ) {
    addDiagnostic(
      ctx,
      'COLUMN_OUTSIDE_REPORTING_YEAR',
      'info',
      `Column '${header}' is outside reporting year ${context.reportingYear}.`,
      cell
    );
    return undefined;
  }

  if (context.asOf !== undefined && compareIsoDates(parsed.date, context.asOf) > 0) {
    addDiagnostic(ctx, 'COLUMN_FUTURE_DATE', 'info', `Column '${header}' is dated after ${context.asOf}.`, cell);
    return undefined;
  }

  return column;
}

/** True for name, category and contact headers. */
export function isIdentityHeader(header: string): boolean {
  const lowered = header.toLowerCase();
  return lowered === 'name' || IDENTITY_HEADER_FRAGMENTS.some((fragment) => lowered.includes(fragment));
}
