import { describe, expect, it } from 'vitest';

import {
  createMetric,
  growthBenchmarkLine,
  projectTarget,
  proratedCumulativeTarget,
  ratio,
  yearOverYearDelta
} from '../../src/metrics/calculate.js';

describe('metric calculator', () => {
  it('returns a percentage, or 0 for a zero denominator', () => {
    expect(ratio(1, 4)).toBe(25);
    expect(ratio(5, 0)).toBe(0);
    expect(ratio(0, 0)).toBe(0);
  });

  it('builds metrics with their percentage', () => {
    expect(createMetric({ numerator: 30, denominator: 120, year: 2025, cohort: 'iff' })).toEqual({
      numerator: 30,
      denominator: 120,
      percentage: 25,
      year: 2025,
      cohort: 'iff'
    });
  });

  it('projects next year targets when a projection is given', () => {
    const additive = createMetric({
      numerator: 30,
      denominator: 120,
      year: 2025,
      cohort: 'iff',
      projection: { increments: { percentagePoints: 5, count: 2 }, mode: 'additive' }
    });
    const multiplicative = createMetric({
      numerator: 30,
      denominator: 120,
      year: 2025,
      cohort: 'iff',
      projection: { increments: { percentagePoints: 0.2, count: 0.5 }, mode: 'multiplicative' }
    });

    expect(additive.target).toEqual({ count: 32, percentage: 30 });
    expect(multiplicative.target).toEqual({ count: 45, percentage: 30 });
  });

  it('compares consecutive years', () => {
    const previous = createMetric({ numerator: 40, denominator: 100, year: 2024, cohort: 'overall' });
    const current = createMetric({ numerator: 50, denominator: 125, year: 2025, cohort: 'overall' });

    expect(yearOverYearDelta(previous, current)).toEqual({
      cohort: 'overall',
      fromYear: 2024,
      toYear: 2025,
      absolute: 10,
      percentagePoints: 0
    });
  });

  it('projects targets additively by default', () => {
    expect(projectTarget(40, 5)).toBe(45);
    expect(projectTarget(12, 2, 'additive')).toBe(14);
    expect(projectTarget(100, 0.1, 'multiplicative')).toBeCloseTo(110, 10);
  });

  it('prorates an annual target by elapsed share of the year', () => {
    expect(proratedCumulativeTarget(20, '2025-01-01')).toBe(0);
    expect(proratedCumulativeTarget(365, '2025-07-02')).toBeCloseTo(182, 10);
    expect(proratedCumulativeTarget(366, '2024-12-31')).toBeCloseTo(365, 10);
  });

  it('draws a straight benchmark line to last year plus growth', () => {
    const line = growthBenchmarkLine(120);

    expect(line).toHaveLength(12);
    expect(line[0]).toBeCloseTo(11, 10);
    expect(line[5]).toBeCloseTo(66, 10);
    expect(line[11]).toBeCloseTo(132, 10);
    expect(growthBenchmarkLine(0, 3)).toEqual([0, 0, 0]);
  });
});
