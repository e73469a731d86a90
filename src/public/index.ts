export * from './api.js';
export * from './report.js';

export type {
  AggregateSeries,
  AttendanceFact,
  ColumnDescriptor,
  IdentityRecord,
  IsoDate,
  Mark,
  MeetingKind,
  Metric,
  MetricTarget,
  PersonKey,
  RowRecord,
  SectionKind,
  SectionRecord,
  SeriesPoint,
  ServiceTime
} from '../core/attendance.js';
export { SERVICE_TIMES, personKeyForId, personKeyForName } from '../core/attendance.js';
export type { Diagnostic, DiagnosticHistogram, DiagnosticSeverity, DiagnosticSource } from '../core/diagnostics.js';
export { buildCodeHistogram, buildSeverityHistogram, hasErrors } from '../core/diagnostics.js';

export { ConfigError } from '../config/config-fields.js';
export {
  DEFAULT_PIPELINE_CONFIG,
  loadPipelineConfig,
  parsePipelineConfig,
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineConfigOverrides,
  type ProjectionMode,
  type TargetIncrements
} from '../config/pipeline-config.js';

export { parseHeader, normalizeServiceTime, type ParseHeaderOptions } from '../parser/parse-header.js';
export { planColumns, type ColumnPlanContext } from '../parser/parse-columns.js';
export { locateTable, matchesSignature, type HeaderSignature, type LocatedTable } from '../parser/locate-table.js';
export {
  HEADER_ROW_PREDICATES,
  classifySectionKind,
  darkBackground,
  familiesOf,
  isDarkColor,
  isWhiteColor,
  matchHeaderRow,
  parseMark,
  programKeyword,
  segment,
  singleCellWithoutDigits,
  type HeaderRowPredicate,
  type MarkTokens,
  type NamedHeaderRowPredicate,
  type SectionFamily
} from '../parser/segment.js';
export {
  GROUP_PROFILE,
  PRAYER_PROFILE,
  SERVICE_PROFILE,
  SERVING_PROFILE,
  reportProfile,
  type ReportKind,
  type ReportProfile
} from '../parser/report-profiles.js';
export { HtmlParseError, parseHtmlToAst, type HtmlNode } from '../parser/html-ast.js';
export {
  parseAttendanceReport,
  type ParsedReport,
  type ParseReportOptions,
  type ParseReportResult
} from '../parser/parse.js';

export {
  buildRosterIndex,
  nameKeys,
  normalizeDisplayName,
  splitDisplayName,
  type RosterIndex
} from '../identity/roster-index.js';
export { resolve, resolveIdentity, type IdentityResolution, type ResolutionMethod } from '../identity/resolve.js';

export { buildFacts, type PersonResolver } from '../aggregate/facts.js';
export { summarizeSection, type SectionMember, type SectionSummary } from '../aggregate/sections.js';
export {
  applyProRata,
  countServiceDays,
  historicalRatio,
  serviceCountsByTime,
  type ProRataResult,
  type ServiceCounts,
  type ServiceDay,
  type ServiceSlot
} from '../aggregate/services.js';
export {
  AggregateSeriesError,
  createAggregateSeries,
  cumulativeYearToDate,
  meanOfRecord,
  monthlyCumulative,
  pointsOfRecord,
  rollingAverage,
  rollingSeries,
  trimTrailingZeros
} from '../aggregate/series.js';

export {
  createMetric,
  growthBenchmarkLine,
  projectTarget,
  proratedCumulativeTarget,
  ratio,
  targetProjection,
  yearOverYearDelta,
  type MetricDelta,
  type TargetProjection
} from '../metrics/calculate.js';
export {
  findTarget,
  loadTargetPlan,
  parseTargetPlan,
  relevantTargets,
  type StrategicTarget,
  type TargetPlan,
  type TargetPoint
} from '../metrics/targets.js';

export {
  DocumentFetchError,
  fetchAndRunReportPass,
  runReportPass,
  type DocumentFetcher,
  type ReportPassInput,
  type ReportPassResult,
  type RosterSnapshot
} from '../pipeline/report-pass.js';
export { buildServiceDashboard, type ServiceDashboard, type ServiceYear } from '../pipeline/service-dashboard.js';
export { buildGroupDashboard, type GroupDashboard, type GroupRollup } from '../pipeline/group-dashboard.js';
export { buildPrayerSummary, type PrayerSummary } from '../pipeline/prayer.js';
export { buildPastoralCareReport, type PastoralCareReport } from '../pipeline/pastoral-care.js';
export {
  buildServingParticipation,
  type ServingCohort,
  type ServingOptions,
  type ServingParticipation
} from '../pipeline/serving.js';
export {
  matchVisitorsToJoined,
  type JoinRecord,
  type RetentionYear,
  type VisitorMatch,
  type VisitorRecord,
  type VisitorRetention,
  type VisitorRetentionOptions
} from '../pipeline/visitor-retention.js';
