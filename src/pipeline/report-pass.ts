import {
  personKeyForId,
  personKeyForName,
  isAttended,
  type AttendanceFact,
  type ColumnDescriptor,
  type IdentityRecord,
  type IsoDate,
  type MeetingKind,
  type PersonKey,
  type RowRecord,
  type ServiceTime
} from '../core/attendance.js';
import type { Diagnostic } from '../core/diagnostics.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { buildFacts, type PersonResolver } from '../aggregate/facts.js';
import { summarizeSection, type SectionSummary } from '../aggregate/sections.js';
import { countServiceDays, type ServiceDay } from '../aggregate/services.js';
import { resolveIdentity } from '../identity/resolve.js';
import { buildRosterIndex, normalizeDisplayName, type RosterIndex } from '../identity/roster-index.js';
import { extractReport } from '../parser/parse.js';
import { addDiagnostic, createParseContext, type ParseContext } from '../parser/parse-context.js';
import type { ReportKind } from '../parser/report-profiles.js';

/** Read-only roster snapshot supplied by the roster provider for one pass. */
export interface RosterSnapshot {
  people: IdentityRecord[];
  /** Category id to display name. */
  categories: Record<string, string>;
}

/** Fetches report markup for a URL; failures are transport errors. */
export type DocumentFetcher = (url: string) => Promise<string>;

/** Transport failure from the document fetcher. Never retried here. */
export class DocumentFetchError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Failed to fetch report document from ${url}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause
    });
    this.name = 'DocumentFetchError';
    this.url = url;
  }
}

export interface ReportPassInput {
  html: string;
  kind?: ReportKind;
  reportingYear?: number;
  asOf?: IsoDate;
  sourceName?: string;
  /** Title of the implicit section (service and prayer reports). */
  title?: string;
}

/** Distinct attendees counted for one planned column. */
export interface ColumnTotal {
  index: number;
  date: IsoDate;
  serviceTime: ServiceTime;
  label: string;
  meetingKind?: MeetingKind;
  attended: number;
}

/** Everything derived from one report document. */
export interface ReportPassResult {
  kind: ReportKind;
  reportingYear?: number;
  /** False when the report produced no usable table; every collection is then empty. */
  found: boolean;
  columns: ColumnDescriptor[];
  sections: SectionSummary[];
  facts: AttendanceFact[];
  serviceDays: ServiceDay[];
  columnTotals: ColumnTotal[];
  /** Display names with no roster match, in first-seen order. */
  unresolvedNames: string[];
  /** Display name seen first for each resolved person. */
  displayNames: Record<PersonKey, string>;
  diagnostics: Diagnostic[];
}

/**
 * Run one synchronous extraction pass: parse, resolve identities, build facts and
 * section summaries. Without a roster, people are keyed by normalized display name.
 */
export function runReportPass(
  input: ReportPassInput,
  roster: RosterSnapshot | null,
  config: PipelineConfig
): ReportPassResult {
  const kind = input.kind ?? 'service';
  const ctx = createParseContext(config.mode, input.sourceName);
  const report = extractReport(
    input.html,
    {
      profile: kind,
      reportingYear: input.reportingYear,
      asOf: input.asOf,
      sourceName: input.sourceName,
      mode: config.mode,
      title: input.title,
      marks: { attended: config.attendedMark, absent: config.absentMark }
    },
    ctx
  );

  if (!report) {
    return emptyResult(kind, input.reportingYear, ctx.diagnostics);
  }

  const identities = createIdentityTracker(roster ? buildRosterIndex(roster.people) : null, ctx);
  const facts = buildFacts(report.sections, report.columns, identities.resolvePerson);
  const sections = report.sections.map((section) =>
    summarizeSection(section, report.columns, identities.resolvePerson, {
      minimumAttendance: config.minimumAttendance,
      recentAbsenceWindow: config.recentAbsenceWindow
    })
  );

  if (ctx.mode === 'strict' && ctx.validationFailure) {
    return emptyResult(kind, input.reportingYear, ctx.diagnostics);
  }

  const slots = report.columns.flatMap((column) =>
    column.date === null ? [] : [{ date: column.date, serviceTime: column.serviceTime }]
  );

  return {
    kind,
    reportingYear: input.reportingYear,
    found: true,
    columns: report.columns,
    sections,
    facts,
    serviceDays: countServiceDays(facts, slots),
    columnTotals: totalColumns(report.columns, identities.attendedByColumn),
    unresolvedNames: identities.unresolvedNames,
    displayNames: identities.displayNames,
    diagnostics: ctx.diagnostics
  };
}

/** Fetch the report through the collaborator, then run a pass over it. */
export async function fetchAndRunReportPass(
  url: string,
  fetchDocument: DocumentFetcher,
  input: Omit<ReportPassInput, 'html'>,
  roster: RosterSnapshot | null,
  config: PipelineConfig
): Promise<ReportPassResult> {
  let html: string;
  try {
    html = await fetchDocument(url);
  } catch (error) {
    throw new DocumentFetchError(url, error);
  }

  return runReportPass({ ...input, html, sourceName: input.sourceName ?? url }, roster, config);
}

interface IdentityTracker {
  resolvePerson: PersonResolver;
  unresolvedNames: string[];
  displayNames: Record<PersonKey, string>;
  attendedByColumn: Map<number, Set<PersonKey>>;
}

/** Resolve each display name once, recording diagnostics on first sight. */
function createIdentityTracker(index: RosterIndex | null, ctx: ParseContext): IdentityTracker {
  const cache = new Map<string, PersonKey | null>();
  const unresolvedNames: string[] = [];
  const displayNames: Record<PersonKey, string> = {};
  const attendedByColumn = new Map<number, Set<PersonKey>>();
  const tallied = new Set<RowRecord>();

  const tallyColumns = (row: RowRecord, person: PersonKey): void => {
    if (tallied.has(row)) {
      return;
    }
    tallied.add(row);
    for (const [columnIndex, mark] of row.marks) {
      if (!isAttended(mark)) {
        continue;
      }
      const attendees = attendedByColumn.get(columnIndex) ?? new Set<PersonKey>();
      attendees.add(person);
      attendedByColumn.set(columnIndex, attendees);
    }
  };

  const resolveRow = (row: RowRecord): PersonKey | null => {
    const node = row.htmlPath === undefined ? undefined : { path: row.htmlPath };

    if (!index) {
      const normalized = normalizeDisplayName(row.rawName);
      if (normalized.length === 0) {
        return null;
      }
      const person = personKeyForName(normalized);
      displayNames[person] ??= row.rawName;
      return person;
    }

    const resolution = resolveIdentity(row.rawName, index);
    if (resolution.record === null) {
      unresolvedNames.push(row.rawName);
      if (resolution.reason === 'ambiguous') {
        const names = resolution.candidates.map((record) => `${record.firstName} ${record.lastName}`).join(', ');
        addDiagnostic(ctx, 'IDENTITY_AMBIGUOUS', 'warning', `'${row.rawName}' matches several people (${names}).`, node);
      } else {
        addDiagnostic(ctx, 'IDENTITY_UNRESOLVED', 'warning', `'${row.rawName}' is not on the roster.`, node);
      }
      return null;
    }

    if (resolution.method === 'partial') {
      addDiagnostic(
        ctx,
        'IDENTITY_PARTIAL_MATCH',
        'info',
        `'${row.rawName}' matched ${resolution.record.firstName} ${resolution.record.lastName} by partial name.`,
        node
      );
    }

    const person = personKeyForId(resolution.record.id);
    displayNames[person] ??= `${resolution.record.firstName} ${resolution.record.lastName}`;
    return person;
  };

  const resolvePerson: PersonResolver = (row) => {
    const cached = cache.get(row.rawName);
    const person = cached !== undefined ? cached : resolveRow(row);
    cache.set(row.rawName, person);
    if (person !== null) {
      tallyColumns(row, person);
    }
    return person;
  };

  return { resolvePerson, unresolvedNames, displayNames, attendedByColumn };
}

function totalColumns(
  columns: readonly ColumnDescriptor[],
  attendedByColumn: ReadonlyMap<number, ReadonlySet<PersonKey>>
): ColumnTotal[] {
  const totals: ColumnTotal[] = [];
  for (const column of columns) {
    if (column.date === null) {
      continue;
    }
    const total: ColumnTotal = {
      index: column.index,
      date: column.date,
      serviceTime: column.serviceTime,
      label: column.label,
      attended: attendedByColumn.get(column.index)?.size ?? 0
    };
    if (column.meetingKind !== undefined) {
      total.meetingKind = column.meetingKind;
    }
    totals.push(total);
  }
  return totals;
}

function emptyResult(kind: ReportKind, reportingYear: number | undefined, diagnostics: Diagnostic[]): ReportPassResult {
  return {
    kind,
    reportingYear,
    found: false,
    columns: [],
    sections: [],
    facts: [],
    serviceDays: [],
    columnTotals: [],
    unresolvedNames: [],
    displayNames: {},
    diagnostics
  };
}
