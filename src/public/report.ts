import { buildCodeHistogram, buildSeverityHistogram, type DiagnosticHistogram } from '../core/diagnostics.js';
import type { ReportPassResult } from '../pipeline/report-pass.js';

/** Serializable counts for one pass, for triage of skipped data. */
export interface PassSummary {
  kind: string;
  reportingYear?: number;
  found: boolean;
  columnCount: number;
  sectionCount: number;
  factCount: number;
  attendedFactCount: number;
  unresolvedNames: string[];
  sections: { title: string; kind: string | null; people: number; attendees: number; recentMissed: number }[];
  diagnosticCodeHistogram: DiagnosticHistogram;
  diagnosticSeverityHistogram: DiagnosticHistogram;
}

export function summarizePass(result: ReportPassResult): PassSummary {
  const summary: PassSummary = {
    kind: result.kind,
    found: result.found,
    columnCount: result.columns.length,
    sectionCount: result.sections.length,
    factCount: result.facts.length,
    attendedFactCount: result.facts.filter((fact) => fact.attended).length,
    unresolvedNames: [...result.unresolvedNames],
    sections: result.sections.map((section) => ({
      title: section.title,
      kind: section.kind,
      people: section.people.length,
      attendees: section.attendees.length,
      recentMissed: section.recentMissed.length
    })),
    diagnosticCodeHistogram: buildCodeHistogram(result.diagnostics),
    diagnosticSeverityHistogram: buildSeverityHistogram(result.diagnostics)
  };
  if (result.reportingYear !== undefined) {
    summary.reportingYear = result.reportingYear;
  }
  return summary;
}

/** Format a compact markdown summary of one pass. */
export function formatPassSummaryMarkdown(result: ReportPassResult, title = 'Attendance Report Pass'): string {
  const summary = summarizePass(result);
  const lines: string[] = [
    `# ${title}`,
    '',
    `Report kind: ${summary.kind}`,
    `Reporting year: ${summary.reportingYear ?? 'n/a'}`,
    `Table found: ${summary.found ? 'yes' : 'no'}`,
    `Service columns: ${summary.columnCount}`,
    `Attendance facts: ${summary.factCount} (${summary.attendedFactCount} attended)`,
    '',
    '## Sections',
    ''
  ];

  if (summary.sections.length === 0) {
    lines.push('- none');
  } else {
    lines.push('| Section | Kind | People | Attendees | Missed recently |');
    lines.push('|---|---|---|---|---|');
    for (const section of summary.sections) {
      lines.push(
        `| ${escapeMarkdownTable(section.title)} | ${section.kind ?? '-'} | ${section.people} | ${
          section.attendees
        } | ${section.recentMissed} |`
      );
    }
  }

  lines.push('');
  lines.push('## Unresolved Names');
  lines.push('');
  if (summary.unresolvedNames.length === 0) {
    lines.push('- none');
  } else {
    for (const name of summary.unresolvedNames) {
      lines.push(`- ${name}`);
    }
  }

  lines.push('');
  lines.push('## Diagnostic Histograms');
  lines.push('');
  appendHistogramSection(lines, 'Diagnostic Codes', summary.diagnosticCodeHistogram);
  lines.push('');
  appendHistogramSection(lines, 'Diagnostic Severities', summary.diagnosticSeverityHistogram);

  return `${lines.join('\n')}\n`;
}

/** Serialize the pass summary to deterministic JSON text. */
export function formatPassSummaryJson(result: ReportPassResult): string {
  return `${JSON.stringify(summarizePass(result), null, 2)}\n`;
}

function escapeMarkdownTable(value: string): string {
  return value.replaceAll('|', '\\|');
}

/** Append a histogram table sorted by descending count then key. */
function appendHistogramSection(lines: string[], title: string, histogram: DiagnosticHistogram): void {
  lines.push(`### ${title}`);
  lines.push('');

  const entries = Object.entries(histogram).sort((left, right) => {
    if (right[1] !== left[1]) {
      return right[1] - left[1];
    }
    return left[0].localeCompare(right[0]);
  });

  if (entries.length === 0) {
    lines.push('- none');
    return;
  }

  lines.push('| Key | Count |');
  lines.push('|---|---|');
  for (const [key, count] of entries) {
    lines.push(`| ${escapeMarkdownTable(key)} | ${count} |`);
  }
}
