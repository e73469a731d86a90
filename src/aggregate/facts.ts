import type {
  AttendanceFact,
  ColumnDescriptor,
  PersonKey,
  RowRecord,
  SectionRecord
} from '../core/attendance.js';
import { isAttended } from '../core/attendance.js';

/** Maps a report row to its person key, or `null` when the row is skipped. */
export type PersonResolver = (row: RowRecord, section: SectionRecord) => PersonKey | null;

/**
 * Build de-duplicated attendance facts, one per (person, date, service time).
 * Repeated cells for the same key merge with logical OR. Facts come out in section,
 * row, then chronological column order (first occurrence wins the position).
 */
export function buildFacts(
  sections: readonly SectionRecord[],
  columns: readonly ColumnDescriptor[],
  resolvePerson: PersonResolver
): AttendanceFact[] {
  const facts = new Map<string, AttendanceFact>();

  for (const section of sections) {
    for (const row of section.rows) {
      const person = resolvePerson(row, section);
      if (person === null) {
        continue;
      }

      for (const column of columns) {
        if (column.date === null) {
          continue;
        }

        const key = factKey(person, column.date, column.serviceTime);
        const attended = isAttended(row.marks.get(column.index));
        const existing = facts.get(key);
        if (existing) {
          existing.attended = existing.attended || attended;
        } else {
          facts.set(key, { person, date: column.date, serviceTime: column.serviceTime, attended });
        }
      }
    }
  }

  return [...facts.values()];
}

function factKey(person: PersonKey, date: string, serviceTime: string): string {
  return `${person}\u0000${date}\u0000${serviceTime}`;
}
