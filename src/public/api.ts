import type { Diagnostic } from '../core/diagnostics.js';
import {
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineConfigOverrides
} from '../config/pipeline-config.js';
import { buildGroupDashboard, type GroupDashboard, type GroupDashboardOptions } from '../pipeline/group-dashboard.js';
import { buildPrayerSummary, type PrayerSummary, type PrayerSummaryOptions } from '../pipeline/prayer.js';
import {
  fetchAndRunReportPass,
  runReportPass,
  type DocumentFetcher,
  type ReportPassInput,
  type ReportPassResult,
  type RosterSnapshot
} from '../pipeline/report-pass.js';
import {
  buildServiceDashboard,
  type ServiceDashboard,
  type ServiceDashboardOptions
} from '../pipeline/service-dashboard.js';
import { buildServingParticipation, type ServingOptions, type ServingParticipation } from '../pipeline/serving.js';

/** Accepts a resolved config or overrides on the defaults. */
export type ConfigInput = PipelineConfig | PipelineConfigOverrides | undefined;

/** Service dashboard plus the passes it was derived from. */
export interface ServiceAnalysis {
  passes: ReportPassResult[];
  dashboard: ServiceDashboard;
  diagnostics: Diagnostic[];
}

export interface GroupAnalysis {
  current: ReportPassResult;
  previous?: ReportPassResult;
  dashboard: GroupDashboard;
  diagnostics: Diagnostic[];
}

export interface PrayerAnalysis {
  pass: ReportPassResult;
  summary: PrayerSummary;
  diagnostics: Diagnostic[];
}

export interface ServingAnalysis {
  pass: ReportPassResult;
  participation: ServingParticipation;
  diagnostics: Diagnostic[];
}

/** Run service passes over each document (one per year, usually) and build the dashboard. */
export function analyzeServiceReports(
  inputs: readonly Omit<ReportPassInput, 'kind'>[],
  roster: RosterSnapshot | null,
  config?: ConfigInput,
  options: ServiceDashboardOptions = {}
): ServiceAnalysis {
  const resolved = resolvePipelineConfig(config);
  const passes = inputs.map((input) => runReportPass({ ...input, kind: 'service' }, roster, resolved));
  const dashboard = buildServiceDashboard(passes, resolved, options);
  return {
    passes,
    dashboard,
    diagnostics: [...passes.flatMap((pass) => pass.diagnostics), ...dashboard.diagnostics]
  };
}

/** Run group passes for this year and, optionally, last year, and compare them. */
export function analyzeGroupReports(
  current: Omit<ReportPassInput, 'kind'>,
  previous: Omit<ReportPassInput, 'kind'> | undefined,
  roster: RosterSnapshot | null,
  config?: ConfigInput,
  options: GroupDashboardOptions = {}
): GroupAnalysis {
  const resolved = resolvePipelineConfig(config);
  const currentPass = runReportPass({ ...current, kind: 'group' }, roster, resolved);
  const previousPass = previous ? runReportPass({ ...previous, kind: 'group' }, roster, resolved) : undefined;
  const analysis: GroupAnalysis = {
    current: currentPass,
    dashboard: buildGroupDashboard(currentPass, previousPass, resolved, options),
    diagnostics: [...currentPass.diagnostics, ...(previousPass?.diagnostics ?? [])]
  };
  if (previousPass) {
    analysis.previous = previousPass;
  }
  return analysis;
}

/** Run a prayer pass over a service attendance document and summarize its meetings. */
export function analyzePrayerReport(
  input: Omit<ReportPassInput, 'kind'>,
  roster: RosterSnapshot | null,
  config?: ConfigInput,
  options: PrayerSummaryOptions = {}
): PrayerAnalysis {
  const resolved = resolvePipelineConfig(config);
  const pass = runReportPass({ ...input, kind: 'prayer' }, roster, resolved);
  return { pass, summary: buildPrayerSummary(pass, resolved, options), diagnostics: pass.diagnostics };
}

/** Run a pass over a serving roster and count unique servers per congregation. */
export function analyzeServingReport(
  input: Omit<ReportPassInput, 'kind'>,
  roster: RosterSnapshot | null,
  config?: ConfigInput,
  options: ServingOptions = {}
): ServingAnalysis {
  const resolved = resolvePipelineConfig(config);
  const pass = runReportPass({ ...input, kind: 'serving' }, roster, resolved);
  return {
    pass,
    participation: buildServingParticipation(pass, resolved, options),
    diagnostics: pass.diagnostics
  };
}

/**
 * Fetch each URL through the collaborator and run service passes in order.
 * A transport failure rejects with `DocumentFetchError`; nothing is retried.
 */
export async function fetchServiceReports(
  sources: readonly (Omit<ReportPassInput, 'html' | 'kind'> & { url: string })[],
  fetchDocument: DocumentFetcher,
  roster: RosterSnapshot | null,
  config?: ConfigInput,
  options: ServiceDashboardOptions = {}
): Promise<ServiceAnalysis> {
  const resolved = resolvePipelineConfig(config);
  const passes: ReportPassResult[] = [];
  for (const { url, ...input } of sources) {
    passes.push(await fetchAndRunReportPass(url, fetchDocument, { ...input, kind: 'service' }, roster, resolved));
  }

  const dashboard = buildServiceDashboard(passes, resolved, options);
  return {
    passes,
    dashboard,
    diagnostics: [...passes.flatMap((pass) => pass.diagnostics), ...dashboard.diagnostics]
  };
}
