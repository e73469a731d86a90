import type { ColumnDescriptor, Mark, SectionKind, SectionRecord } from '../core/attendance.js';
import type { HtmlNode } from './html-ast.js';
import { attribute, cellsOf } from './html-utils.js';
import type { LocatedTable } from './locate-table.js';
import { addDiagnostic, type ParseContext } from './parse-context.js';

/** Decides whether a table row opens a new section. */
export type HeaderRowPredicate = (row: HtmlNode, cells: readonly HtmlNode[]) => boolean;

/** Predicate plus the name recorded when it fires. */
export interface NamedHeaderRowPredicate {
  name: string;
  test: HeaderRowPredicate;
}

/** Program families rolled up across sections. */
export type SectionFamily = 'kids_youth' | 'iff' | 'regular_bible_studies';

/** Mark sentinels compared against trimmed cell text. */
export interface MarkTokens {
  attended: string;
  absent: string;
}

export interface SegmentOptions {
  /** Title of the section that owns rows appearing before any header row. */
  implicitSection?: string;
  marks?: MarkTokens;
  /** Read any non-empty cell as attended instead of matching the mark sentinels. */
  attendedWhenFilled?: boolean;
}

const DEFAULT_MARKS: MarkTokens = { attended: 'Y', absent: 'N' };

/** Title vocabulary, checked in order; the first hit decides the kind. */
const SECTION_VOCABULARY: ReadonlyArray<readonly [RegExp, SectionKind]> = [
  [/kids club/i, 'kids_club'],
  [/youth group/i, 'youth_group'],
  [/\biff\b|international food/i, 'iff'],
  [/bible study|small group|home group/i, 'bible_study']
];

const EVER_ATTENDED_PATTERN = /ever attended/i;

const DARK_CHANNEL_LIMIT = 0x33;

const BACKGROUND_PROPERTY = /^background(-color)?$/i;
const TEXT_COLOR_PROPERTY = /^color$/i;

/** Keyword rows always open a section, even when they also look like data. */
export function programKeyword(_row: HtmlNode, cells: readonly HtmlNode[]): boolean {
  const title = sectionTitle(cells);
  return EVER_ATTENDED_PATTERN.test(title) || SECTION_VOCABULARY.some(([pattern]) => pattern.test(title));
}

export function singleCellWithoutDigits(_row: HtmlNode, cells: readonly HtmlNode[]): boolean {
  const [only] = cells;
  return cells.length === 1 && only !== undefined && !/\d/.test(only.text);
}

/**
 * Header band styling on the row or any cell: a black or near-black `bgcolor` or
 * background, or white text.
 */
export function darkBackground(row: HtmlNode, cells: readonly HtmlNode[]): boolean {
  return [row, ...cells].some((node) => {
    const style = attribute(node, 'style');
    const backgrounds = [attribute(node, 'bgcolor'), ...styleValues(style, BACKGROUND_PROPERTY)];
    return (
      backgrounds.some((color) => color !== undefined && isDarkColor(color)) ||
      styleValues(style, TEXT_COLOR_PROPERTY).some(isWhiteColor)
    );
  });
}

/** Evaluated in order, short-circuit. */
export const HEADER_ROW_PREDICATES: readonly NamedHeaderRowPredicate[] = [
  { name: 'programKeyword', test: programKeyword },
  { name: 'singleCellWithoutDigits', test: singleCellWithoutDigits },
  { name: 'darkBackground', test: darkBackground }
];

/** Name of the first predicate that marks `row` as a section header, if any. */
export function matchHeaderRow(
  row: HtmlNode,
  predicates: readonly NamedHeaderRowPredicate[] = HEADER_ROW_PREDICATES
): string | undefined {
  const cells = cellsOf(row);
  return predicates.find((predicate) => predicate.test(row, cells))?.name;
}

/** Assign a section kind from its title; unknown titles get `null`. */
export function classifySectionKind(title: string): SectionKind | null {
  for (const [pattern, kind] of SECTION_VOCABULARY) {
    if (pattern.test(title)) {
      return kind;
    }
  }
  return null;
}

/** Program families a section kind rolls up into. */
export function familiesOf(kind: SectionKind | null): SectionFamily[] {
  switch (kind) {
    case 'kids_club':
    case 'youth_group':
      return ['kids_youth'];
    case 'iff':
      return ['iff'];
    case 'bible_study':
      return ['regular_bible_studies'];
    case null:
      return [];
  }
}

/**
 * Partition the body rows of a located table into sections, in document order.
 * Marks are read only for the planned columns.
 */
export function segment(
  located: LocatedTable,
  columns: readonly ColumnDescriptor[],
  options: SegmentOptions,
  ctx: ParseContext
): SectionRecord[] {
  const marks = options.marks ?? DEFAULT_MARKS;
  const nameColumns = findNameColumns(located.headerCells);
  const sections: SectionRecord[] = [];
  let current: SectionRecord | undefined =
    options.implicitSection === undefined ? undefined : openSection(options.implicitSection);
  if (current) {
    sections.push(current);
  }

  for (const [offset, row] of located.bodyRows.entries()) {
    const cells = cellsOf(row);
    if (cells.every((cell) => cell.text.length === 0)) {
      continue;
    }

    if (matchHeaderRow(row)) {
      current = openSection(sectionTitle(cells));
      sections.push(current);
      continue;
    }

    const rawName = displayName(cells, nameColumns);
    if (rawName.length === 0) {
      continue;
    }

    if (!current) {
      addDiagnostic(
        ctx,
        'ROW_BEFORE_SECTION',
        'info',
        `Row '${rawName}' appears before any section header and was discarded.`,
        row
      );
      continue;
    }

    current.rows.push({
      rowIndex: offset + 1,
      rawName,
      marks: readMarks(cells, columns, options.attendedWhenFilled ? undefined : marks),
      htmlPath: row.path
    });
  }

  return sections;
}

/** Interpret one trimmed cell value. */
export function parseMark(text: string, tokens: MarkTokens = DEFAULT_MARKS): Mark {
  const value = text.trim();
  if (value === tokens.attended) {
    return 'attended';
  }
  if (value === tokens.absent) {
    return 'absent';
  }
  return 'unmarked';
}

function openSection(title: string): SectionRecord {
  return { title, kind: classifySectionKind(title), rows: [] };
}

function sectionTitle(cells: readonly HtmlNode[]): string {
  return cells.find((cell) => cell.text.length > 0)?.text ?? '';
}

/** Marks for the planned columns; without tokens any non-empty cell is attended. */
function readMarks(
  cells: readonly HtmlNode[],
  columns: readonly ColumnDescriptor[],
  tokens: MarkTokens | undefined
): ReadonlyMap<number, Mark> {
  const marks = new Map<number, Mark>();
  for (const column of columns) {
    const text = cells[column.index]?.text ?? '';
    if (tokens) {
      marks.set(column.index, parseMark(text, tokens));
    } else {
      marks.set(column.index, text.trim().length > 0 ? 'attended' : 'unmarked');
    }
  }
  return marks;
}

interface NameColumns {
  first?: number;
  last?: number;
  name?: number;
}

function findNameColumns(headerCells: readonly HtmlNode[]): NameColumns {
  const columns: NameColumns = {};
  headerCells.forEach((cell, index) => {
    const header = cell.text.toLowerCase();
    if (header.includes('first name')) {
      columns.first ??= index;
    } else if (header.includes('last name')) {
      columns.last ??= index;
    } else if (header === 'name' || header === 'volunteers') {
      columns.name ??= index;
    }
  });
  return columns;
}

/** `First Name` + `Last Name` when both exist, else `Name` or `Volunteers`, else the first cell. */
function displayName(cells: readonly HtmlNode[], columns: NameColumns): string {
  if (columns.first !== undefined && columns.last !== undefined) {
    const first = cells[columns.first]?.text ?? '';
    const last = cells[columns.last]?.text ?? '';
    return `${first} ${last}`.trim();
  }

  const index = columns.name ?? 0;
  return cells[index]?.text ?? '';
}

/** Values of the inline style declarations whose property matches `property`. */
function styleValues(style: string | undefined, property: RegExp): string[] {
  if (!style) {
    return [];
  }

  const values: string[] = [];
  for (const declaration of style.split(';')) {
    const [name, ...valueParts] = declaration.split(':');
    if (name && property.test(name.trim())) {
      values.push(valueParts.join(':').trim());
    }
  }
  return values;
}

/** `black`, or a hex or `rgb()` color whose channels are all `#333` or darker. */
export function isDarkColor(color: string): boolean {
  const value = color.trim().toLowerCase();
  if (/^black\b/.test(value)) {
    return true;
  }

  const channels = parseColorChannels(value);
  return channels !== undefined && channels.every((channel) => channel <= DARK_CHANNEL_LIMIT);
}

/** `white`, or a hex or `rgb()` color with every channel at 0xff. */
export function isWhiteColor(color: string): boolean {
  const value = color.trim().toLowerCase();
  if (/^white\b/.test(value)) {
    return true;
  }

  const channels = parseColorChannels(value);
  return channels !== undefined && channels.every((channel) => channel === 0xff);
}

function parseColorChannels(value: string): number[] | undefined {
  const shortHex = /^#([0-9a-f])([0-9a-f])([0-9a-f])\b/.exec(value);
  if (shortHex) {
    return shortHex.slice(1, 4).map((digit) => Number.parseInt(`${digit}${digit}`, 16));
  }

  const longHex = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})\b/.exec(value);
  if (longHex) {
    return longHex.slice(1, 4).map((pair) => Number.parseInt(pair, 16));
  }

  const rgb = /^rgba?\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})/.exec(value);
  if (rgb) {
    return rgb.slice(1, 4).map((channel) => Number.parseInt(channel, 10));
  }

  return undefined;
}
