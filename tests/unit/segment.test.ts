import { describe, expect, it } from 'vitest';

import type { HtmlNode } from '../../src/parser/html-ast.js';
import { parseAttendanceReport } from '../../src/parser/parse.js';
import {
  classifySectionKind,
  darkBackground,
  familiesOf,
  isDarkColor,
  isWhiteColor,
  matchHeaderRow,
  parseMark,
  programKeyword,
  singleCellWithoutDigits
} from '../../src/parser/segment.js';
import { htmlDocument, reportTable, sectionRow } from '../../src/testkit/report-fixtures.js';

function cell(text: string, attributes: Record<string, string> = {}): HtmlNode {
  return { name: 'td', attributes, children: [], text, path: '/td[1]' };
}

function row(cells: HtmlNode[], attributes: Record<string, string> = {}): HtmlNode {
  return {
    name: 'tr',
    attributes,
    children: cells,
    text: cells.map((child) => child.text).join(' '),
    path: '/tr[1]'
  };
}

describe('section header predicates', () => {
  it('recognizes program keywords in the first non-empty cell', () => {
    const cells = [cell(''), cell('Tuesday Bible Study'), cell('')];

    expect(programKeyword(row(cells), cells)).toBe(true);
    expect(programKeyword(row([cell('Pat Doe'), cell('Y')]), [cell('Pat Doe'), cell('Y')])).toBe(false);
  });

  it('treats a lone cell without digits as a header', () => {
    expect(singleCellWithoutDigits(row([cell('Welcome Team')]), [cell('Welcome Team')])).toBe(true);
    expect(singleCellWithoutDigits(row([cell('Team 2')]), [cell('Team 2')])).toBe(false);
    expect(singleCellWithoutDigits(row([cell('A'), cell('B')]), [cell('A'), cell('B')])).toBe(false);
  });

  it('detects dark backgrounds on the row or any cell', () => {
    const styled = [cell('Leaders', { style: 'font-weight: bold; background-color: #000000' }), cell('')];
    const banded = [cell('Leaders'), cell('')];
    const plain = [cell('Leaders', { style: 'background: #ffffff' }), cell('')];

    expect(darkBackground(row(styled), styled)).toBe(true);
    expect(darkBackground(row(banded, { bgcolor: '#222' }), banded)).toBe(true);
    expect(darkBackground(row(plain), plain)).toBe(false);
  });

  it('detects white header text', () => {
    const white = [cell('Leaders', { style: 'color: white; font-weight: bold' }), cell('')];
    const hexWhite = [cell('Leaders'), cell('')];
    const grey = [cell('Leaders', { style: 'color: #eeeeee' }), cell('')];

    expect(darkBackground(row(white), white)).toBe(true);
    expect(darkBackground(row(hexWhite, { style: 'color:#FFF' }), hexWhite)).toBe(true);
    expect(darkBackground(row(grey), grey)).toBe(false);
  });

  it('ignores row and cell class names', () => {
    const cells = [cell('Leaders'), cell('')];

    expect(matchHeaderRow(row(cells, { class: 'group-header' }))).toBeUndefined();
    expect(matchHeaderRow(row([cell('Pat Doe', { class: 'group' }), cell('Y')], { class: 'group-member' }))).toBeUndefined();
  });

  it('reports the first predicate that fires', () => {
    expect(matchHeaderRow(row([cell('Kids Club')]))).toBe('programKeyword');
    expect(matchHeaderRow(row([cell('Welcome Team')]))).toBe('singleCellWithoutDigits');
    expect(matchHeaderRow(row([cell('Leaders', { bgcolor: 'black' }), cell('')], { class: 'header' }))).toBe(
      'darkBackground'
    );
    expect(matchHeaderRow(row([cell('Leaders', { style: 'color: white' }), cell('')]))).toBe('darkBackground');
    expect(matchHeaderRow(row([cell('Pat Doe'), cell('Y')]))).toBeUndefined();
  });
});

describe('dark colors', () => {
  it('accepts black and channels at or below 0x33', () => {
    expect(isDarkColor('black')).toBe(true);
    expect(isDarkColor('#000')).toBe(true);
    expect(isDarkColor('#333333')).toBe(true);
    expect(isDarkColor('rgb(51, 51, 51)')).toBe(true);
    expect(isDarkColor('rgba(0,0,0,0.8)')).toBe(true);
  });

  it('rejects lighter colors and unknown names', () => {
    expect(isDarkColor('#444')).toBe(false);
    expect(isDarkColor('#ffffff')).toBe(false);
    expect(isDarkColor('rgb(52, 0, 0)')).toBe(false);
    expect(isDarkColor('navy')).toBe(false);
  });
});

describe('white colors', () => {
  it('accepts white and full-intensity channels only', () => {
    expect(isWhiteColor('white')).toBe(true);
    expect(isWhiteColor('#fff')).toBe(true);
    expect(isWhiteColor('rgb(255, 255, 255)')).toBe(true);
    expect(isWhiteColor('#fefefe')).toBe(false);
    expect(isWhiteColor('whitesmoke')).toBe(false);
  });
});

describe('section kinds', () => {
  it('classifies titles by vocabulary', () => {
    expect(classifySectionKind('Tuesday Bible Study')).toBe('bible_study');
    expect(classifySectionKind('Home Group North')).toBe('bible_study');
    expect(classifySectionKind('Youth Group')).toBe('youth_group');
    expect(classifySectionKind('Kids Club')).toBe('kids_club');
    expect(classifySectionKind('IFF Thursday')).toBe('iff');
    expect(classifySectionKind('International Food Fellowship')).toBe('iff');
    expect(classifySectionKind('Tariff Review')).toBeNull();
    expect(classifySectionKind('Ever Attended')).toBeNull();
  });

  it('rolls kinds up into program families', () => {
    expect(familiesOf('kids_club')).toEqual(['kids_youth']);
    expect(familiesOf('youth_group')).toEqual(['kids_youth']);
    expect(familiesOf('iff')).toEqual(['iff']);
    expect(familiesOf('bible_study')).toEqual(['regular_bible_studies']);
    expect(familiesOf(null)).toEqual([]);
  });
});

describe('mark parsing', () => {
  it('matches the sentinels exactly after trimming', () => {
    expect(parseMark(' Y ')).toBe('attended');
    expect(parseMark('N')).toBe('absent');
    expect(parseMark('y')).toBe('unmarked');
    expect(parseMark('Yes')).toBe('unmarked');
    expect(parseMark('')).toBe('unmarked');
    expect(parseMark('X', { attended: 'X', absent: '-' })).toBe('attended');
  });
});

describe('segmenter', () => {
  const html = htmlDocument(
    reportTable(
      ['Name', '07/01/2025', '14/01/2025', '21/01/2025'],
      [
        ['Stray Person', 'Y', '', ''],
        sectionRow('Tuesday Bible Study'),
        ['Alice Brown', 'Y', 'Y', 'N'],
        ['Bob Green', 'Y', '', ''],
        ['', '', '', ''],
        sectionRow('Leaders', { style: 'background-color: #000000', padCells: 3 }),
        ['Carol White', 'N', 'N', 'N'],
        sectionRow('Kids Club'),
        ['Dan Black', 'Y', 'Y', 'Y']
      ]
    )
  );

  it('partitions rows into sections in document order', () => {
    const result = parseAttendanceReport(html, { profile: 'group' });
    const sections = result.report?.sections ?? [];

    expect(sections.map((section) => [section.title, section.kind, section.rows.map((entry) => entry.rawName)])).toEqual([
      ['Tuesday Bible Study', 'bible_study', ['Alice Brown', 'Bob Green']],
      ['Leaders', null, ['Carol White']],
      ['Kids Club', 'kids_club', ['Dan Black']]
    ]);
  });

  it('reads marks for the planned columns only', () => {
    const result = parseAttendanceReport(html, { profile: 'group' });
    const alice = result.report?.sections[0]?.rows[0];

    expect(alice?.rowIndex).toBe(3);
    expect(alice ? [...alice.marks.entries()] : []).toEqual([
      [1, 'attended'],
      [2, 'attended'],
      [3, 'absent']
    ]);
  });

  it('discards rows before the first header in group reports', () => {
    const result = parseAttendanceReport(html, { profile: 'group' });

    expect(result.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity])).toEqual([
      ['ROW_BEFORE_SECTION', 'info']
    ]);
    expect(result.report?.sections.flatMap((section) => section.rows.map((entry) => entry.rawName))).not.toContain(
      'Stray Person'
    );
  });

  it('keeps classed member rows inside the open section', () => {
    const classed = htmlDocument(
      [
        '<table>',
        '<tr><th>Name</th><th>07/01/2025</th><th>14/01/2025</th></tr>',
        '<tr style="background-color: #000000"><td>Tuesday Bible Study</td><td></td><td></td></tr>',
        '<tr class="group-member"><td>Alice Brown</td><td>Y</td><td>Y</td></tr>',
        '<tr class="group-member"><td>Bob Green</td><td>Y</td><td>Y</td></tr>',
        '</table>'
      ].join('\n')
    );

    const result = parseAttendanceReport(classed, { profile: 'group' });

    expect(result.report?.sections.map((section) => [section.title, section.rows.map((entry) => entry.rawName)])).toEqual(
      [['Tuesday Bible Study', ['Alice Brown', 'Bob Green']]]
    );
  });

  it('puts leading rows of service reports into a section titled after the report', () => {
    const result = parseAttendanceReport(
      htmlDocument(
        reportTable(
          ['First Name', 'Last Name', '10:30 AM 05/01/2025'],
          [['Pat', 'Doe', 'Y'], sectionRow('Ever Attended'), ['Sam', 'Roe', 'N']]
        )
      ),
      { title: 'Morning Services' }
    );

    expect(result.report?.sections.map((section) => [section.title, section.rows.map((entry) => entry.rawName)])).toEqual(
      [
        ['Morning Services', ['Pat Doe']],
        ['Ever Attended', ['Sam Roe']]
      ]
    );
  });
});
