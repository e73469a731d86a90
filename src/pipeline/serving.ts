import type { AggregateSeries, Metric, PersonKey, SeriesPoint } from '../core/attendance.js';
import { yearOf } from '../core/calendar.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { createAggregateSeries } from '../aggregate/series.js';
import { createMetric, targetProjection } from '../metrics/calculate.js';
import type { ReportPassResult } from './report-pass.js';

/** Congregation whose servers are tracked, or `overall` for anyone serving at any of them. */
export type ServingCohort = '8:30' | '10:30' | '6:30' | 'overall';

/** Regular congregations; combined and unrecognized services do not count toward serving. */
const CONGREGATIONS = ['8:30', '10:30', '6:30'] as const;

const SERVING_COHORTS: readonly ServingCohort[] = ['8:30', '10:30', '6:30', 'overall'];

export interface ServingParticipation {
  year?: number;
  /** Distinct people who have served so far, per cohort, at each service date. */
  cumulative: AggregateSeries[];
  /** Distinct servers over the whole pass. */
  totals: Record<ServingCohort, number>;
  /** Overall servers over the congregation size (0 when unknown). */
  participation: Metric;
}

export interface ServingOptions {
  /** Regular attenders at the start of the year, the participation denominator. */
  congregationSize?: number;
}

/** Running count of unique servers per congregation across a serving roster pass. */
export function buildServingParticipation(
  pass: ReportPassResult,
  config: PipelineConfig,
  options: ServingOptions = {}
): ServingParticipation {
  const servers = new Map(
    SERVING_COHORTS.map((cohort): [ServingCohort, Set<PersonKey>] => [cohort, new Set<PersonKey>()])
  );
  const points = new Map(SERVING_COHORTS.map((cohort): [ServingCohort, SeriesPoint[]] => [cohort, []]));

  for (const day of pass.serviceDays) {
    for (const congregation of CONGREGATIONS) {
      for (const person of day.attendees[congregation]) {
        servers.get(congregation)?.add(person);
        servers.get('overall')?.add(person);
      }
    }
    for (const cohort of SERVING_COHORTS) {
      points.get(cohort)?.push({ date: day.date, value: servers.get(cohort)?.size ?? 0 });
    }
  }

  const lastDate = pass.serviceDays.at(-1)?.date;
  const year = pass.reportingYear ?? (lastDate === undefined ? undefined : yearOf(lastDate));
  const totals = {
    '8:30': servers.get('8:30')?.size ?? 0,
    '10:30': servers.get('10:30')?.size ?? 0,
    '6:30': servers.get('6:30')?.size ?? 0,
    overall: servers.get('overall')?.size ?? 0
  };

  const participation: ServingParticipation = {
    cumulative: SERVING_COHORTS.map((cohort) => createAggregateSeries(cohort, points.get(cohort) ?? [], year)),
    totals,
    participation: createMetric({
      numerator: totals.overall,
      denominator: options.congregationSize ?? 0,
      year: year ?? 0,
      cohort: 'overall',
      projection: targetProjection(config)
    })
  };
  if (year !== undefined) {
    participation.year = year;
  }
  return participation;
}
