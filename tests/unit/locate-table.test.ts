import { describe, expect, it } from 'vitest';

import { parseHtmlToAst } from '../../src/parser/html-ast.js';
import { locateTable, matchesSignature } from '../../src/parser/locate-table.js';
import { SERVICE_PROFILE } from '../../src/parser/report-profiles.js';
import { htmlDocument, reportTable } from '../../src/testkit/report-fixtures.js';

describe('table locator', () => {
  it('returns the first table whose header row matches the signature', () => {
    const doc = parseHtmlToAst(
      htmlDocument(
        reportTable(['Name', 'Phone'], [['Pat Doe', '555 0100']]),
        reportTable(['First Name', 'Last Name', '10:30 AM 05/01/2025'], [['Pat', 'Doe', 'Y'], ['Sam', 'Roe', '']]),
        reportTable(['First Name', 'Last Name', '10:30 AM 12/01/2025'], [['Lee', 'Poe', 'Y']])
      )
    );

    const located = locateTable(doc, SERVICE_PROFILE.signature);

    expect(located?.headerCells.map((cell) => cell.text)).toEqual(['First Name', 'Last Name', '10:30 AM 05/01/2025']);
    expect(located?.bodyRows).toHaveLength(2);
    expect(located?.table.path).toBe('/html[1]/body[1]/table[2]');
  });

  it('returns null when no table qualifies', () => {
    const doc = parseHtmlToAst(htmlDocument('<p>No attendance this week.</p>'));

    expect(locateTable(doc, SERVICE_PROFILE.signature)).toBeNull();
  });

  it('matches signatures case-insensitively, with patterns tested against the raw text', () => {
    expect(matchesSignature(['FIRST NAME', 'Attended'], SERVICE_PROFILE.signature)).toBe(true);
    expect(matchesSignature(['First Name', '10:30 AM 05/01'], SERVICE_PROFILE.signature)).toBe(true);
    expect(matchesSignature(['First Name', 'Email'], SERVICE_PROFILE.signature)).toBe(false);
    expect(matchesSignature(['Surname', 'Attended'], SERVICE_PROFILE.signature)).toBe(false);
  });
});
