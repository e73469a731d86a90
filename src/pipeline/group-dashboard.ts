import type { IsoDate, Metric, PersonKey, SectionKind } from '../core/attendance.js';
import { monthOf, yearOf } from '../core/calendar.js';
import { requireIsoDate } from '../config/config-fields.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import type { SectionSummary } from '../aggregate/sections.js';
import { monthlyCumulative } from '../aggregate/series.js';
import { createMetric, growthBenchmarkLine, targetProjection } from '../metrics/calculate.js';
import { familiesOf, type SectionFamily } from '../parser/segment.js';
import type { ReportPassResult } from './report-pass.js';

/** Family rollup name, or `all` for every section including unclassified ones. */
export type GroupCohort = SectionFamily | 'all';

const GROUP_COHORTS: readonly GroupCohort[] = ['kids_youth', 'iff', 'regular_bible_studies', 'all'];

export interface GroupSectionView {
  title: string;
  kind: SectionKind | null;
  /** Attended marks per month, January first. */
  monthly: number[];
  attendees: PersonKey[];
}

export interface GroupRollup {
  cohort: GroupCohort;
  sectionCount: number;
  monthly: number[];
  /** Running total through the reporting month. */
  cumulative: number[];
  lastYearTotal: number;
  /** Straight line to last year's total plus the configured growth. */
  benchmark: number[];
  participation: Metric;
}

export interface FollowUpList {
  title: string;
  recentMissed: PersonKey[];
  zeroAttendance: PersonKey[];
}

export interface GroupDashboard {
  year: number;
  throughMonth: number;
  sections: GroupSectionView[];
  rollups: GroupRollup[];
  followUp: FollowUpList[];
}

export interface GroupDashboardOptions {
  /** Cut-off for cumulative series; defaults to the last column date of the current pass. */
  asOf?: IsoDate;
  /** Participation denominators per cohort (for example roster totals by category). */
  denominators?: Partial<Record<GroupCohort, number>>;
}

/** Compare a group report pass with the previous year's pass. */
export function buildGroupDashboard(
  current: ReportPassResult,
  previous: ReportPassResult | undefined,
  config: PipelineConfig,
  options: GroupDashboardOptions = {}
): GroupDashboard {
  const year = passYear(current);
  const asOf = options.asOf === undefined ? undefined : requireIsoDate('group dashboard options', 'asOf', options.asOf);
  const lastDate = asOf ?? current.columns.at(-1)?.date ?? undefined;
  const throughMonth = lastDate !== undefined && yearOf(lastDate) === year ? monthOf(lastDate) : 12;

  const sections = current.sections.map((section) => ({
    title: section.title,
    kind: section.kind,
    monthly: monthlyCounts(section, year),
    attendees: section.attendees
  }));

  const previousYear = previous ? passYear(previous) : year - 1;
  const projection = targetProjection(config);
  const rollups = GROUP_COHORTS.map((cohort): GroupRollup => {
    const members = current.sections.filter((section) => inCohort(section, cohort));
    const monthly = sumMonthly(members.map((section) => monthlyCounts(section, year)));
    const lastYearTotal = previous
      ? sumMonthly(
          previous.sections
            .filter((section) => inCohort(section, cohort))
            .map((section) => monthlyCounts(section, previousYear))
        ).reduce((sum, value) => sum + value, 0)
      : 0;

    const attendees = new Set(members.flatMap((section) => section.attendees));

    return {
      cohort,
      sectionCount: members.length,
      monthly,
      cumulative: monthlyCumulative(monthly, throughMonth),
      lastYearTotal,
      benchmark: growthBenchmarkLine(lastYearTotal, 12, config.growthBenchmark),
      participation: createMetric({
        numerator: attendees.size,
        denominator: options.denominators?.[cohort] ?? 0,
        year,
        cohort,
        projection
      })
    };
  });

  return {
    year,
    throughMonth,
    sections,
    rollups,
    followUp: current.sections
      .filter((section) => section.recentMissed.length > 0 || section.zeroAttendance.length > 0)
      .map((section) => ({
        title: section.title,
        recentMissed: section.recentMissed,
        zeroAttendance: section.zeroAttendance
      }))
  };
}

function passYear(pass: ReportPassResult): number {
  if (pass.reportingYear !== undefined) {
    return pass.reportingYear;
  }
  const last = pass.columns.at(-1)?.date;
  return last ? yearOf(last) : 0;
}

function inCohort(section: SectionSummary, cohort: GroupCohort): boolean {
  return cohort === 'all' || familiesOf(section.kind).includes(cohort);
}

function monthlyCounts(section: SectionSummary, year: number): number[] {
  const monthly = new Array<number>(12).fill(0);
  for (const entry of section.monthlyAttendance) {
    if (yearOf(entry.month) !== year) {
      continue;
    }
    const index = Number.parseInt(entry.month.slice(5, 7), 10) - 1;
    monthly[index] = (monthly[index] ?? 0) + entry.attended;
  }
  return monthly;
}

function sumMonthly(rows: readonly number[][]): number[] {
  const total = new Array<number>(12).fill(0);
  for (const row of rows) {
    row.forEach((value, index) => {
      total[index] = (total[index] ?? 0) + value;
    });
  }
  return total;
}
