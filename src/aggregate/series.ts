import type { AggregateSeries, SeriesPoint } from '../core/attendance.js';
import { compareIsoDates, monthOf, yearOf } from '../core/calendar.js';

/** Raised when a series is built out of date order or with a bad window. */
export class AggregateSeriesError extends Error {
  readonly cohort?: string;

  constructor(message: string, cohort?: string) {
    super(cohort ? `Series '${cohort}': ${message}` : message);
    this.name = 'AggregateSeriesError';
    this.cohort = cohort;
  }
}

/** Validate strictly increasing dates and copy the points. */
export function createAggregateSeries(cohort: string, points: readonly SeriesPoint[], year?: number): AggregateSeries {
  for (let index = 1; index < points.length; index += 1) {
    const previous = points[index - 1];
    const current = points[index];
    if (previous && current && compareIsoDates(previous.date, current.date) >= 0) {
      throw new AggregateSeriesError(
        `dates must be strictly increasing (${previous.date} then ${current.date})`,
        cohort
      );
    }
  }

  const series: AggregateSeries = { cohort, points: points.map((point) => ({ ...point })) };
  if (year !== undefined) {
    series.year = year;
  }
  return series;
}

/**
 * Mean of `values[max(0, i - window + 1) .. i]` at every index: expanding for the first
 * `window - 1` points, sliding after that.
 */
export function rollingAverage(values: readonly number[], window: number): number[] {
  if (!Number.isInteger(window) || window < 1) {
    throw new AggregateSeriesError(`rolling window must be a positive integer, got ${window}`);
  }

  return values.map((_, index) => {
    const span = values.slice(Math.max(0, index - window + 1), index + 1);
    return span.reduce((sum, value) => sum + value, 0) / span.length;
  });
}

/** Rolling average over a series, keeping its dates. */
export function rollingSeries(series: AggregateSeries, window: number): AggregateSeries {
  const smoothed = rollingAverage(
    series.points.map((point) => point.value),
    window
  );
  return createAggregateSeries(
    series.cohort,
    series.points.map((point, index) => ({ date: point.date, value: smoothed[index] ?? 0 })),
    series.year
  );
}

/** Running sum that restarts at zero on each calendar year boundary. */
export function cumulativeYearToDate(series: AggregateSeries): AggregateSeries {
  let year: number | undefined;
  let total = 0;

  const points = series.points.map((point) => {
    const pointYear = yearOf(point.date);
    if (pointYear !== year) {
      year = pointYear;
      total = 0;
    }
    total += point.value;
    return { date: point.date, value: total };
  });

  return createAggregateSeries(series.cohort, points, series.year);
}

/** Drop the run of zero values after the last non-zero value. */
export function trimTrailingZeros(points: readonly SeriesPoint[]): SeriesPoint[] {
  let end = points.length;
  while (end > 0 && points[end - 1]?.value === 0) {
    end -= 1;
  }
  return points.slice(0, end);
}

/**
 * Points that count towards a yearly mean: trailing zeros trimmed, and where a year has
 * more than one January point only its latest January point kept.
 */
export function pointsOfRecord(points: readonly SeriesPoint[]): SeriesPoint[] {
  const trimmed = trimTrailingZeros(points);
  const latestJanuary = new Map<number, string>();
  for (const point of trimmed) {
    if (monthOf(point.date) === 1) {
      latestJanuary.set(yearOf(point.date), point.date);
    }
  }

  return trimmed.filter(
    (point) => monthOf(point.date) !== 1 || latestJanuary.get(yearOf(point.date)) === point.date
  );
}

/** Yearly mean of weekly values, 0 for an empty series. */
export function meanOfRecord(points: readonly SeriesPoint[]): number {
  const kept = pointsOfRecord(points);
  if (kept.length === 0) {
    return 0;
  }
  return kept.reduce((sum, point) => sum + point.value, 0) / kept.length;
}

/** Cumulative monthly totals for months `1..throughMonth` of a twelve-slot array. */
export function monthlyCumulative(monthly: readonly number[], throughMonth: number): number[] {
  const limit = Math.max(0, Math.min(throughMonth, 12));
  const cumulative: number[] = [];
  let total = 0;
  for (let index = 0; index < limit; index += 1) {
    total += monthly[index] ?? 0;
    cumulative.push(total);
  }
  return cumulative;
}
