import { describe, expect, it } from 'vitest';

import { buildCodeHistogram, buildSeverityHistogram, hasErrors } from '../../src/core/diagnostics.js';
import { HtmlParseError, parseHtmlToAst } from '../../src/parser/html-ast.js';
import { cellsOf, descendantsOf, rowsOf } from '../../src/parser/html-utils.js';

describe('html AST builder', () => {
  it('builds element paths with sibling indexes', () => {
    const ast = parseHtmlToAst('<html><body><p>one</p><p>two <b>bold</b></p></body></html>');
    const body = ast.children[1];

    expect(ast.path).toBe('/html[1]');
    expect(body?.path).toBe('/html[1]/body[1]');
    expect(body?.children[1]?.path).toBe('/html[1]/body[1]/p[2]');
    expect(body?.children[1]?.children[0]?.path).toBe('/html[1]/body[1]/p[2]/b[1]');
    expect(body?.children[1]?.text).toBe('two bold');
  });

  it('records source lines for elements', () => {
    const ast = parseHtmlToAst('<html>\n<body>\n<table><tr><td>x</td></tr></table>\n</body>\n</html>');
    const [cell] = descendantsOf(ast, 'td');

    expect(cell?.location?.line).toBe(3);
  });

  it('collapses whitespace and non-breaking spaces in text', () => {
    const ast = parseHtmlToAst('<table><tr><td>  10:30&nbsp;AM\n 05/01/2025 </td></tr></table>');
    const [cell] = descendantsOf(ast, 'td');

    expect(cell?.text).toBe('10:30 AM 05/01/2025');
  });

  it('reads rows through row groups but not from nested tables', () => {
    const ast = parseHtmlToAst(
      '<table><thead><tr><th>A</th></tr></thead><tbody><tr><td><table><tr><td>inner</td></tr></table></td></tr></tbody></table>'
    );
    const [outer] = descendantsOf(ast, 'table');
    const rows = outer ? rowsOf(outer) : [];

    expect(rows).toHaveLength(2);
    expect(rows[0] ? cellsOf(rows[0]).map((cell) => cell.name) : []).toEqual(['th']);
  });

  it('throws an HtmlParseError for an empty document', () => {
    expect(() => parseHtmlToAst('  \n ')).toThrow(HtmlParseError);
  });
});

describe('diagnostic histograms', () => {
  const diagnostics = [
    { code: 'COLUMN_NOT_SERVICE', severity: 'info' as const, message: 'a' },
    { code: 'COLUMN_NOT_SERVICE', severity: 'info' as const, message: 'b' },
    { code: 'TABLE_NOT_FOUND', severity: 'error' as const, message: 'c' }
  ];

  it('counts codes and severities', () => {
    expect(buildCodeHistogram(diagnostics)).toEqual({ COLUMN_NOT_SERVICE: 2, TABLE_NOT_FOUND: 1 });
    expect(buildSeverityHistogram(diagnostics)).toEqual({ info: 2, error: 1 });
    expect(hasErrors(diagnostics)).toBe(true);
    expect(hasErrors(diagnostics.slice(0, 2))).toBe(false);
  });
});
