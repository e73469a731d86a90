/** Calendar date in `YYYY-MM-DD` form. Lexicographic order is chronological order. */
export type IsoDate = string;

/** Normalized congregation service slot. `9:30` is the combined service. */
export type ServiceTime = '8:30' | '9:30' | '10:30' | '6:30' | 'other';

/** Service slots in reporting order. */
export const SERVICE_TIMES: readonly ServiceTime[] = ['8:30', '9:30', '10:30', '6:30', 'other'];

/** Prayer meeting cadence derived from a column label. */
export type MeetingKind = 'weekly' | 'quarterly';

/** Structured view of one report column header. Frozen once produced. */
export interface ColumnDescriptor {
  index: number;
  rawHeader: string;
  /** Header text with time and date tokens removed (the service name). */
  label: string;
  timeToken?: string;
  serviceTime: ServiceTime;
  date: IsoDate | null;
  dateIsYearExplicit: boolean;
  meetingKind?: MeetingKind;
}

/** Per-cell mark state. Only the attended sentinel counts as attendance. */
export type Mark = 'attended' | 'absent' | 'unmarked';

/** One data row of a report table. */
export interface RowRecord {
  rowIndex: number;
  rawName: string;
  marks: ReadonlyMap<number, Mark>;
  htmlPath?: string;
}

/** Program family recognized from a section title. */
export type SectionKind = 'bible_study' | 'kids_club' | 'youth_group' | 'iff';

/** Named run of rows opened by a header row. */
export interface SectionRecord {
  title: string;
  kind: SectionKind | null;
  rows: RowRecord[];
}

/** Canonical roster person. */
export interface IdentityRecord {
  id: string;
  firstName: string;
  lastName: string;
  category?: string;
}

/** Stable person key: `id:<roster id>` or `name:<normalized display name>`. */
export type PersonKey = string;

/** Atomic attendance unit; at most one per (person, date, serviceTime). */
export interface AttendanceFact {
  person: PersonKey;
  date: IsoDate;
  serviceTime: ServiceTime;
  attended: boolean;
}

/** One dated value in a series. */
export interface SeriesPoint {
  date: IsoDate;
  value: number;
}

/** Ordered series for one cohort. Dates are strictly increasing. */
export interface AggregateSeries {
  cohort: string;
  year?: number;
  points: SeriesPoint[];
}

/** Next year's goal for a metric, as a count and as a percentage. */
export interface MetricTarget {
  count: number;
  percentage: number;
}

/** Ratio metric for one cohort and year. */
export interface Metric {
  numerator: number;
  denominator: number;
  percentage: number;
  year: number;
  cohort: string;
  /** Projected from the configured target increments, when a projection was requested. */
  target?: MetricTarget;
}

/** Build the person key for a roster record id. */
export function personKeyForId(id: string): PersonKey {
  return `id:${id}`;
}

/** Build the person key for an unresolved, normalized display name. */
export function personKeyForName(normalizedName: string): PersonKey {
  return `name:${normalizedName}`;
}

/** True when the mark counts as attendance. */
export function isAttended(mark: Mark | undefined): boolean {
  return mark === 'attended';
}

/** True when the mark records an opportunity to attend (Y or N). */
export function isRecorded(mark: Mark | undefined): boolean {
  return mark === 'attended' || mark === 'absent';
}
