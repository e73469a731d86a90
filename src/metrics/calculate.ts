import type { IsoDate, Metric } from '../core/attendance.js';
import { yearProgress } from '../core/calendar.js';
import type { PipelineConfig, ProjectionMode, TargetIncrements } from '../config/pipeline-config.js';

/** Percentage of `numerator` over `denominator`; a zero denominator yields 0. */
export function ratio(numerator: number, denominator: number): number {
  if (denominator === 0) {
    return 0;
  }
  return (numerator / denominator) * 100;
}

/** Step sizes and mode for projecting next year's targets. */
export interface TargetProjection {
  increments: TargetIncrements;
  mode: ProjectionMode;
}

export interface MetricInput {
  numerator: number;
  denominator: number;
  year: number;
  cohort: string;
  projection?: TargetProjection;
}

export function createMetric(input: MetricInput): Metric {
  const metric: Metric = {
    numerator: input.numerator,
    denominator: input.denominator,
    percentage: ratio(input.numerator, input.denominator),
    year: input.year,
    cohort: input.cohort
  };

  if (input.projection) {
    const { increments, mode } = input.projection;
    metric.target = {
      count: projectTarget(metric.numerator, increments.count, mode),
      percentage: projectTarget(metric.percentage, increments.percentagePoints, mode)
    };
  }
  return metric;
}

/** Projection settings carried by a pipeline configuration. */
export function targetProjection(config: Pick<PipelineConfig, 'targetIncrements' | 'projection'>): TargetProjection {
  return { increments: config.targetIncrements, mode: config.projection };
}

/** Change from one year's metric to the next. */
export interface MetricDelta {
  cohort: string;
  fromYear: number;
  toYear: number;
  /** Difference of numerators. */
  absolute: number;
  /** Difference of percentages. */
  percentagePoints: number;
}

export function yearOverYearDelta(previous: Metric, current: Metric): MetricDelta {
  return {
    cohort: current.cohort,
    fromYear: previous.year,
    toYear: current.year,
    absolute: current.numerator - previous.numerator,
    percentagePoints: current.percentage - previous.percentage
  };
}

/**
 * Next target from the current value. Additive adds the increment (percentage points or
 * a count); multiplicative treats the increment as a growth fraction.
 */
export function projectTarget(current: number, increment: number, mode: ProjectionMode = 'additive'): number {
  return mode === 'multiplicative' ? current * (1 + increment) : current + increment;
}

/** Share of an annual target due by `asOf`, by elapsed fraction of the calendar year. */
export function proratedCumulativeTarget(annualTarget: number, asOf: IsoDate): number {
  return annualTarget * yearProgress(asOf);
}

/** Straight monthly line from zero to last year's total grown by `growth`. */
export function growthBenchmarkLine(lastYearTotal: number, months = 12, growth = 0.1): number[] {
  const yearTarget = lastYearTotal * (1 + growth);
  return Array.from({ length: months }, (_, index) => (yearTarget * (index + 1)) / 12);
}
