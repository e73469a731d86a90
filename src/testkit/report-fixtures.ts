/** Section header row in a fixture table. */
export interface SectionHeaderRow {
  kind: 'section';
  title: string;
  /** Inline style on the cell, for example `background-color: #000`. */
  style?: string;
  /** When set the title is followed by this many empty cells instead of one spanning cell. */
  padCells?: number;
}

export type FixtureRow = readonly string[] | SectionHeaderRow;

/** Build a section header row. */
export function sectionRow(title: string, options: Omit<SectionHeaderRow, 'kind' | 'title'> = {}): SectionHeaderRow {
  return { kind: 'section', title, ...options };
}

/** Render one report table: a `<th>` header row followed by data and section rows. */
export function reportTable(headers: readonly string[], rows: readonly FixtureRow[], attributes = ''): string {
  const lines = [`<table${attributes ? ` ${attributes}` : ''}>`, '<tbody>'];
  lines.push(`<tr>${headers.map((header) => `<th>${escapeHtml(header)}</th>`).join('')}</tr>`);

  for (const row of rows) {
    lines.push(isSectionRow(row) ? renderSectionRow(row, headers.length) : renderDataRow(row));
  }

  lines.push('</tbody>', '</table>');
  return lines.join('\n');
}

/** Wrap tables (or any markup) in a minimal HTML document. */
export function htmlDocument(...bodyParts: readonly string[]): string {
  return ['<!DOCTYPE html>', '<html>', '<head><title>Report</title></head>', '<body>', ...bodyParts, '</body>', '</html>'].join(
    '\n'
  );
}

function isSectionRow(row: FixtureRow): row is SectionHeaderRow {
  return !Array.isArray(row);
}

function renderDataRow(cells: readonly string[]): string {
  return `<tr>${cells.map((cell) => `<td>${escapeHtml(cell)}</td>`).join('')}</tr>`;
}

function renderSectionRow(row: SectionHeaderRow, width: number): string {
  const attributes = row.style ? ` style="${escapeHtml(row.style)}"` : '';

  if (row.padCells !== undefined) {
    const padding = '<td></td>'.repeat(row.padCells);
    return `<tr><td${attributes}>${escapeHtml(row.title)}</td>${padding}</tr>`;
  }

  return `<tr><td colspan="${width}"${attributes}>${escapeHtml(row.title)}</td></tr>`;
}

function escapeHtml(value: string): string {
  return value.replaceAll('&', '&amp;').replaceAll('<', '&lt;').replaceAll('>', '&gt;').replaceAll('"', '&quot;');
}
