import type { AggregateSeries, Metric, SeriesPoint, ServiceTime } from '../core/attendance.js';
import { compareIsoDates, yearOf } from '../core/calendar.js';
import type { Diagnostic } from '../core/diagnostics.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { applyProRata, serviceCountsByTime, type ServiceCounts } from '../aggregate/services.js';
import { createAggregateSeries, meanOfRecord, rollingSeries, trimTrailingZeros } from '../aggregate/series.js';
import { createMetric, targetProjection, yearOverYearDelta, type MetricDelta } from '../metrics/calculate.js';
import { addDiagnostic, createParseContext } from '../parser/parse-context.js';
import type { ReportPassResult } from './report-pass.js';

/** Service slot, or `overall` for the de-duplicated daily head count. */
export type ServiceCohort = ServiceTime | 'overall';

/** One cohort's weekly view for a calendar year. */
export interface ServiceCohortSeries {
  cohort: ServiceCohort;
  year: number;
  /** Weekly counts with trailing zero weeks removed. */
  weekly: AggregateSeries;
  smoothed: AggregateSeries;
  meanOfRecord: number;
}

export interface ServiceYear {
  year: number;
  proRataRatio: number;
  usedDefaultRatio: boolean;
  cohorts: ServiceCohortSeries[];
  /**
   * Mean of record per cohort over the congregation size for the year (0 when unknown), with
   * next year's target projected from the configured increments.
   */
  metrics: Metric[];
}

export interface ServiceDashboard {
  years: ServiceYear[];
  /** Consecutive-year changes per cohort present in both years. */
  comparisons: MetricDelta[];
  diagnostics: Diagnostic[];
}

export interface ServiceDashboardOptions {
  /** Congregation size per year, the denominator for participation metrics. */
  congregationSize?: Readonly<Record<number, number>>;
}

/**
 * Build per-year service series from one or more service passes. Combined 9:30 counts are
 * split pro-rata before the series are built; the overall cohort is never split.
 */
export function buildServiceDashboard(
  passes: readonly ReportPassResult[],
  config: PipelineConfig,
  options: ServiceDashboardOptions = {}
): ServiceDashboard {
  const ctx = createParseContext(config.mode);
  const years: ServiceYear[] = [];

  for (const [year, days] of groupDaysByYear(passes)) {
    const proRata = applyProRata(days, config.proRataDefaultRatio);
    if (proRata.usedDefaultRatio && days.some((day) => day.counts['9:30'] > 0)) {
      addDiagnostic(
        ctx,
        'PRO_RATA_DEFAULT_RATIO',
        'info',
        `No 8:30/10:30 pair in ${year}; combined services split with default ratio ${config.proRataDefaultRatio}.`
      );
    }

    const cohorts: ServiceCohortSeries[] = [];
    for (const [serviceTime, points] of serviceCountsByTime(proRata.days)) {
      cohorts.push(buildCohort(serviceTime, year, points, config.rollingWindow));
    }
    cohorts.push(
      buildCohort(
        'overall',
        year,
        proRata.days.map((day) => ({ date: day.date, value: day.overall })),
        config.rollingWindow
      )
    );

    const denominator = options.congregationSize?.[year] ?? 0;
    const projection = targetProjection(config);
    years.push({
      year,
      proRataRatio: proRata.ratio,
      usedDefaultRatio: proRata.usedDefaultRatio,
      cohorts,
      metrics: cohorts.map((cohort) =>
        createMetric({ numerator: cohort.meanOfRecord, denominator, year, cohort: cohort.cohort, projection })
      )
    });
  }

  return { years, comparisons: compareYears(years), diagnostics: ctx.diagnostics };
}

function buildCohort(
  cohort: ServiceCohort,
  year: number,
  points: readonly SeriesPoint[],
  window: number
): ServiceCohortSeries {
  const weekly = createAggregateSeries(cohort, trimTrailingZeros(points), year);
  return {
    cohort,
    year,
    weekly,
    smoothed: rollingSeries(weekly, window),
    meanOfRecord: meanOfRecord(points)
  };
}

/** Service days from every pass, grouped by calendar year; the first pass to report a date wins. */
function groupDaysByYear(passes: readonly ReportPassResult[]): Map<number, ServiceCounts[]> {
  const seen = new Set<string>();
  const all: ServiceCounts[] = [];
  for (const pass of passes) {
    for (const day of pass.serviceDays) {
      if (!seen.has(day.date)) {
        seen.add(day.date);
        all.push(day);
      }
    }
  }
  all.sort((left, right) => compareIsoDates(left.date, right.date));

  const byYear = new Map<number, ServiceCounts[]>();
  for (const day of all) {
    const year = yearOf(day.date);
    const days = byYear.get(year) ?? [];
    days.push(day);
    byYear.set(year, days);
  }
  return byYear;
}

function compareYears(years: readonly ServiceYear[]): MetricDelta[] {
  const deltas: MetricDelta[] = [];
  for (let index = 1; index < years.length; index += 1) {
    const previous = years[index - 1];
    const current = years[index];
    if (!previous || !current) {
      continue;
    }
    for (const metric of current.metrics) {
      const before = previous.metrics.find((candidate) => candidate.cohort === metric.cohort);
      if (before) {
        deltas.push(yearOverYearDelta(before, metric));
      }
    }
  }
  return deltas;
}
