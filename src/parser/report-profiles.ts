import type { Weekday } from '../core/calendar.js';
import type { HeaderSignature } from './locate-table.js';
import { DATE_HEADER_PATTERN } from './parse-header.js';

/** Report families the pipeline understands. */
export type ReportKind = 'service' | 'group' | 'prayer' | 'serving';

/** Extraction rules for one report family. */
export interface ReportProfile {
  kind: ReportKind;
  signature: HeaderSignature;
  /** Service reports carry `H:MM AM` tokens; group meeting columns are date-only. */
  requireTime: boolean;
  weekday: Weekday | null;
  /** Rows before the first header row belong to a section named after the report. */
  implicitSection: boolean;
  /** Lower-case label fragments that exclude a column (special services). */
  excludedServicePatterns: readonly string[];
  restrictToReportingYear: boolean;
  /** Lower-case label fragment every kept column must contain. */
  requiredLabel?: string;
  /** Any non-empty cell counts as attendance (serving rosters hold position names, not marks). */
  attendedWhenFilled: boolean;
}

const SERVICE_SIGNATURE: HeaderSignature = {
  all: ['first name'],
  any: ['attended', DATE_HEADER_PATTERN]
};

/** Sunday congregation service attendance. */
export const SERVICE_PROFILE: ReportProfile = {
  kind: 'service',
  signature: SERVICE_SIGNATURE,
  requireTime: true,
  weekday: 'sunday',
  implicitSection: true,
  excludedServicePatterns: [
    'wednesday',
    'saturday',
    'prayer meeting',
    'good friday',
    'christmas',
    'easter vigil',
    'maundy thursday'
  ],
  restrictToReportingYear: false,
  attendedWhenFilled: false
};

/** Group individual attendance, sectioned by header rows. */
export const GROUP_PROFILE: ReportProfile = {
  kind: 'group',
  signature: { all: [], any: [DATE_HEADER_PATTERN] },
  requireTime: false,
  weekday: null,
  implicitSection: false,
  excludedServicePatterns: [],
  restrictToReportingYear: false,
  attendedWhenFilled: false
};

/** Saturday prayer meetings read from the service attendance report. */
export const PRAYER_PROFILE: ReportProfile = {
  kind: 'prayer',
  signature: SERVICE_SIGNATURE,
  requireTime: false,
  weekday: 'saturday',
  implicitSection: true,
  excludedServicePatterns: [],
  restrictToReportingYear: true,
  requiredLabel: 'prayer meeting',
  attendedWhenFilled: false
};

/** Sunday serving roster: one row per volunteer, positions in `DD/MM H:MM AM` columns. */
export const SERVING_PROFILE: ReportProfile = {
  kind: 'serving',
  signature: { all: ['volunteers'], any: [DATE_HEADER_PATTERN] },
  requireTime: true,
  weekday: 'sunday',
  implicitSection: true,
  excludedServicePatterns: SERVICE_PROFILE.excludedServicePatterns,
  restrictToReportingYear: true,
  attendedWhenFilled: true
};

/** Look up the built-in profile for a report family. */
export function reportProfile(kind: ReportKind): ReportProfile {
  switch (kind) {
    case 'service':
      return SERVICE_PROFILE;
    case 'group':
      return GROUP_PROFILE;
    case 'prayer':
      return PRAYER_PROFILE;
    case 'serving':
      return SERVING_PROFILE;
  }
}
