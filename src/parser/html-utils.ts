import type { HtmlNode } from './html-ast.js';

const ROW_GROUPS = new Set(['thead', 'tbody', 'tfoot']);
const CELL_NAMES = new Set(['td', 'th']);

/** Return all descendants named `name`, in document order. */
export function descendantsOf(node: HtmlNode, name: string): HtmlNode[] {
  const matches: HtmlNode[] = [];

  const walk = (current: HtmlNode): void => {
    for (const child of current.children) {
      if (child.name === name) {
        matches.push(child);
      }
      walk(child);
    }
  };

  walk(node);
  return matches;
}

/** Rows owned by `table` (direct or via row groups), excluding rows of nested tables. */
export function rowsOf(table: HtmlNode): HtmlNode[] {
  const rows: HtmlNode[] = [];
  for (const child of table.children) {
    if (child.name === 'tr') {
      rows.push(child);
    } else if (ROW_GROUPS.has(child.name)) {
      rows.push(...child.children.filter((grandchild) => grandchild.name === 'tr'));
    }
  }
  return rows;
}

/** Header and data cells of one row. */
export function cellsOf(row: HtmlNode): HtmlNode[] {
  return row.children.filter((child) => CELL_NAMES.has(child.name));
}

/** Read attribute `name` from a node, if available. */
export function attribute(node: HtmlNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}
