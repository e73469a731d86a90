import type { HtmlNode } from './html-ast.js';
import { cellsOf, descendantsOf, rowsOf } from './html-utils.js';

/** Column signature a table's first row must satisfy to qualify. */
export interface HeaderSignature {
  /** Every token must appear (case-insensitive substring) in some header cell. */
  all: readonly string[];
  /** When non-empty, at least one token or pattern must match some header cell. */
  any: ReadonlyArray<string | RegExp>;
}

/** Qualifying table plus its header row, ready for column planning. */
export interface LocatedTable {
  table: HtmlNode;
  headerRow: HtmlNode;
  headerCells: HtmlNode[];
  /** Rows after the header row, in document order. */
  bodyRows: HtmlNode[];
}

/** Find the first table (document order) whose first row matches `signature`. */
export function locateTable(doc: HtmlNode, signature: HeaderSignature): LocatedTable | null {
  const tables = doc.name === 'table' ? [doc, ...descendantsOf(doc, 'table')] : descendantsOf(doc, 'table');

  for (const table of tables) {
    const [headerRow, ...bodyRows] = rowsOf(table);
    if (!headerRow) {
      continue;
    }

    const headerCells = cellsOf(headerRow);
    if (matchesSignature(headerCells.map((cell) => cell.text), signature)) {
      return { table, headerRow, headerCells, bodyRows };
    }
  }

  return null;
}

/** Check header texts against a signature. */
export function matchesSignature(headers: readonly string[], signature: HeaderSignature): boolean {
  const lowered = headers.map((header) => header.toLowerCase());

  const hasAll = signature.all.every((token) => {
    const needle = token.toLowerCase();
    return lowered.some((header) => header.includes(needle));
  });
  if (!hasAll) {
    return false;
  }

  if (signature.any.length === 0) {
    return true;
  }

  return signature.any.some((token) =>
    typeof token === 'string'
      ? lowered.some((header) => header.includes(token.toLowerCase()))
      : headers.some((header) => token.test(header))
  );
}
