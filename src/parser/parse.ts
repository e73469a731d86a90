import type { ColumnDescriptor, IsoDate, SectionRecord } from '../core/attendance.js';
import type { Diagnostic } from '../core/diagnostics.js';
import { requireIsoDate } from '../config/config-fields.js';
import { HtmlParseError, parseHtmlToAst, type HtmlNode } from './html-ast.js';
import { locateTable } from './locate-table.js';
import { planColumns } from './parse-columns.js';
import { addDiagnostic, createParseContext, type ParseContext, type ParserMode } from './parse-context.js';
import { reportProfile, type ReportKind, type ReportProfile } from './report-profiles.js';
import { segment, type MarkTokens } from './segment.js';

/** Parser entry options for source naming, strictness and reporting context. */
export interface ParseReportOptions {
  profile?: ReportKind | ReportProfile;
  /** Year applied to short `DD/MM` headers. */
  reportingYear?: number;
  asOf?: IsoDate;
  sourceName?: string;
  mode?: ParserMode;
  /** Title of the implicit section for profiles that use one. */
  title?: string;
  marks?: MarkTokens;
}

/** Columns and sections extracted from one report table. */
export interface ParsedReport {
  kind: ReportKind;
  title: string;
  reportingYear?: number;
  columns: ColumnDescriptor[];
  sections: SectionRecord[];
}

/** Parser return envelope with diagnostics-first reporting. */
export interface ParseReportResult {
  report?: ParsedReport;
  diagnostics: Diagnostic[];
}

const DEFAULT_TITLES: Record<ReportKind, string> = {
  service: 'Service Attendance',
  group: 'Group Attendance',
  prayer: 'Prayer Meetings',
  serving: 'Serving Roster'
};

/**
 * Parse report markup into planned columns and row sections.
 * Structural absence is reported through diagnostics; the result then carries no report.
 */
export function parseAttendanceReport(html: string, options: ParseReportOptions = {}): ParseReportResult {
  const ctx = createParseContext(options.mode ?? 'lenient', options.sourceName);
  const report = extractReport(html, options, ctx);
  return report ? { report, diagnostics: ctx.diagnostics } : { diagnostics: ctx.diagnostics };
}

/**
 * Extraction against a caller-owned context, for passes that keep diagnosing after parsing.
 * A malformed `asOf` is a caller error and throws `ConfigError`.
 */
export function extractReport(html: string, options: ParseReportOptions, ctx: ParseContext): ParsedReport | undefined {
  const asOf = options.asOf === undefined ? undefined : requireIsoDate('report options', 'asOf', options.asOf);
  const profile = resolveProfile(options.profile);
  const doc = parseDocument(html, ctx);
  if (!doc) {
    return undefined;
  }

  const located = locateTable(doc, profile.signature);
  if (!located) {
    addDiagnostic(ctx, 'TABLE_NOT_FOUND', 'error', `No table matches the ${profile.kind} report header signature.`, doc);
    return undefined;
  }

  const columns = planColumns(
    located.headerCells,
    profile,
    { reportingYear: options.reportingYear, asOf },
    ctx
  );
  if (columns.length === 0) {
    addDiagnostic(ctx, 'NO_SERVICE_COLUMNS', 'error', 'The report table has no usable date columns.', located.headerRow);
    return undefined;
  }

  const title = options.title ?? DEFAULT_TITLES[profile.kind];
  const sections = segment(
    located,
    columns,
    {
      implicitSection: profile.implicitSection ? title : undefined,
      marks: options.marks,
      attendedWhenFilled: profile.attendedWhenFilled
    },
    ctx
  );

  if (ctx.mode === 'strict' && ctx.validationFailure) {
    return undefined;
  }

  return {
    kind: profile.kind,
    title,
    reportingYear: options.reportingYear,
    columns,
    sections
  };
}

function resolveProfile(profile: ReportKind | ReportProfile | undefined): ReportProfile {
  if (profile === undefined) {
    return reportProfile('service');
  }
  return typeof profile === 'string' ? reportProfile(profile) : profile;
}

function parseDocument(html: string, ctx: ParseContext): HtmlNode | undefined {
  try {
    return parseHtmlToAst(html);
  } catch (error) {
    if (error instanceof HtmlParseError) {
      addDiagnostic(ctx, 'HTML_EMPTY_DOCUMENT', 'error', error.message, undefined, error.source);
      return undefined;
    }
    throw error;
  }
}
