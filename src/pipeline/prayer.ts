import type { AggregateSeries, IsoDate, MeetingKind, SeriesPoint } from '../core/attendance.js';
import { compareIsoDates } from '../core/calendar.js';
import { requireIsoDate } from '../config/config-fields.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import {
  createAggregateSeries,
  cumulativeYearToDate,
  rollingSeries,
  trimTrailingZeros
} from '../aggregate/series.js';
import { proratedCumulativeTarget } from '../metrics/calculate.js';
import type { ReportPassResult } from './report-pass.js';

export interface PrayerSummary {
  year?: number;
  weekly: AggregateSeries;
  /** Weekly attendance smoothed over the prayer rolling window. */
  weeklySmoothed: AggregateSeries;
  weeklyAverage: number;
  quarterly: AggregateSeries;
  quarterlyCumulative: AggregateSeries;
  quarterlyAverage: number;
  /** Share of the annual quarterly target due by `asOf`, when both were supplied. */
  proratedQuarterlyTarget?: number;
}

export interface PrayerSummaryOptions {
  asOf?: IsoDate;
  quarterlyAnnualTarget?: number;
}

/** Summarize a prayer pass into weekly and quarterly meeting series. */
export function buildPrayerSummary(
  pass: ReportPassResult,
  config: PipelineConfig,
  options: PrayerSummaryOptions = {}
): PrayerSummary {
  const asOf = options.asOf === undefined ? undefined : requireIsoDate('prayer summary options', 'asOf', options.asOf);
  const weeklyPoints = trimTrailingZeros(meetingPoints(pass, 'weekly'));
  const quarterlyPoints = trimTrailingZeros(meetingPoints(pass, 'quarterly'));

  const weekly = createAggregateSeries('weekly_prayer_meeting', weeklyPoints, pass.reportingYear);
  const quarterly = createAggregateSeries('quarterly_prayer_meeting', quarterlyPoints, pass.reportingYear);

  const summary: PrayerSummary = {
    weekly,
    weeklySmoothed: rollingSeries(weekly, config.prayerRollingWindow),
    weeklyAverage: average(weeklyPoints),
    quarterly,
    quarterlyCumulative: cumulativeYearToDate(quarterly),
    quarterlyAverage: average(quarterlyPoints)
  };

  if (pass.reportingYear !== undefined) {
    summary.year = pass.reportingYear;
  }
  if (asOf !== undefined && options.quarterlyAnnualTarget !== undefined) {
    summary.proratedQuarterlyTarget = proratedCumulativeTarget(options.quarterlyAnnualTarget, asOf);
  }
  return summary;
}

/** Attendance per meeting date for one cadence; columns sharing a date are summed. */
function meetingPoints(pass: ReportPassResult, kind: MeetingKind): SeriesPoint[] {
  const byDate = new Map<IsoDate, number>();
  for (const total of pass.columnTotals) {
    if ((total.meetingKind ?? 'weekly') !== kind) {
      continue;
    }
    byDate.set(total.date, (byDate.get(total.date) ?? 0) + total.attended);
  }

  return [...byDate.entries()]
    .sort(([left], [right]) => compareIsoDates(left, right))
    .map(([date, value]) => ({ date, value }));
}

function average(points: readonly SeriesPoint[]): number {
  if (points.length === 0) {
    return 0;
  }
  return points.reduce((sum, point) => sum + point.value, 0) / points.length;
}
