import type { ColumnDescriptor, IsoDate, Mark, PersonKey, SectionKind, SectionRecord } from '../core/attendance.js';
import { isAttended, isRecorded } from '../core/attendance.js';
import { compareIsoDates } from '../core/calendar.js';
import type { PersonResolver } from './facts.js';

export interface SectionSummaryOptions {
  minimumAttendance: number;
  /** How many of the most recent meeting dates the absence check looks at. */
  recentAbsenceWindow: number;
}

/** One person's marks within a section, merged across duplicate rows. */
export interface SectionMember {
  person: PersonKey;
  displayName: string;
  attendedCount: number;
  recordedCount: number;
  lastAttended: IsoDate | null;
}

/** Attended marks in one calendar month (`YYYY-MM`). */
export interface MonthlyAttendance {
  month: string;
  attended: number;
}

/** Derived view of one section for a pass. */
export interface SectionSummary {
  title: string;
  kind: SectionKind | null;
  /** Members in document order. */
  people: SectionMember[];
  /** Members at or above the minimum attendance count. */
  attendees: PersonKey[];
  /** Dates with any recorded mark in this section, chronological. */
  meetingDates: IsoDate[];
  /** Members with an opportunity but no attendance across the most recent meeting dates. */
  recentMissed: PersonKey[];
  /** Members who never attended in the pass. */
  zeroAttendance: PersonKey[];
  monthlyAttendance: MonthlyAttendance[];
}

interface MemberMarks {
  displayName: string;
  marks: Map<number, Mark>;
}

const MARK_RANK: Record<Mark, number> = { unmarked: 0, absent: 1, attended: 2 };

/** Summarize a section's rows against the planned columns. */
export function summarizeSection(
  section: SectionRecord,
  columns: readonly ColumnDescriptor[],
  resolvePerson: PersonResolver,
  options: SectionSummaryOptions
): SectionSummary {
  const datedColumns = columns.filter((column) => column.date !== null);
  const members = collectMembers(section, resolvePerson);

  const people: SectionMember[] = [];
  for (const [person, member] of members) {
    let attendedCount = 0;
    let recordedCount = 0;
    let lastAttended: IsoDate | null = null;

    for (const column of datedColumns) {
      const mark = member.marks.get(column.index);
      if (isRecorded(mark)) {
        recordedCount += 1;
      }
      if (isAttended(mark) && column.date !== null) {
        attendedCount += 1;
        if (lastAttended === null || compareIsoDates(column.date, lastAttended) > 0) {
          lastAttended = column.date;
        }
      }
    }

    people.push({ person, displayName: member.displayName, attendedCount, recordedCount, lastAttended });
  }

  const meetingDates = findMeetingDates(members, datedColumns);
  const recentDates = new Set(meetingDates.slice(-options.recentAbsenceWindow));
  const recentColumns = datedColumns.filter((column) => column.date !== null && recentDates.has(column.date));

  const recentMissed: PersonKey[] = [];
  if (options.recentAbsenceWindow > 0) {
    for (const [person, member] of members) {
      const recentMarks = recentColumns.map((column) => member.marks.get(column.index));
      if (recentMarks.some(isRecorded) && !recentMarks.some(isAttended)) {
        recentMissed.push(person);
      }
    }
  }

  return {
    title: section.title,
    kind: section.kind,
    people,
    attendees: people
      .filter((member) => member.attendedCount >= options.minimumAttendance)
      .map((member) => member.person),
    meetingDates,
    recentMissed,
    zeroAttendance: people.filter((member) => member.attendedCount === 0).map((member) => member.person),
    monthlyAttendance: countMonthlyAttendance(members, datedColumns)
  };
}

/** Merge duplicate rows for one person, keeping the strongest mark per column. */
function collectMembers(section: SectionRecord, resolvePerson: PersonResolver): Map<PersonKey, MemberMarks> {
  const members = new Map<PersonKey, MemberMarks>();

  for (const row of section.rows) {
    const person = resolvePerson(row, section);
    if (person === null) {
      continue;
    }

    let member = members.get(person);
    if (!member) {
      member = { displayName: row.rawName, marks: new Map() };
      members.set(person, member);
    }

    for (const [index, mark] of row.marks) {
      const existing = member.marks.get(index) ?? 'unmarked';
      if (MARK_RANK[mark] > MARK_RANK[existing]) {
        member.marks.set(index, mark);
      }
    }
  }

  return members;
}

function findMeetingDates(members: Map<PersonKey, MemberMarks>, columns: readonly ColumnDescriptor[]): IsoDate[] {
  const dates = new Set<IsoDate>();
  for (const column of columns) {
    if (column.date === null || dates.has(column.date)) {
      continue;
    }
    for (const member of members.values()) {
      if (isRecorded(member.marks.get(column.index))) {
        dates.add(column.date);
        break;
      }
    }
  }
  return [...dates].sort(compareIsoDates);
}

function countMonthlyAttendance(
  members: Map<PersonKey, MemberMarks>,
  columns: readonly ColumnDescriptor[]
): MonthlyAttendance[] {
  const counts = new Map<string, number>();
  for (const column of columns) {
    if (column.date === null) {
      continue;
    }
    const month = column.date.slice(0, 7);
    for (const member of members.values()) {
      if (isAttended(member.marks.get(column.index))) {
        counts.set(month, (counts.get(month) ?? 0) + 1);
      }
    }
  }

  return [...counts.entries()]
    .sort(([left], [right]) => compareIsoDates(left, right))
    .map(([month, attended]) => ({ month, attended }));
}
