import { personKeyForId, type IsoDate, type PersonKey } from '../core/attendance.js';
import { compareIsoDates, weeksBefore } from '../core/calendar.js';
import { requireIsoDate } from '../config/config-fields.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import type { ReportPassResult, RosterSnapshot } from './report-pass.js';

/** Roster member absent from every recent Sunday. */
export interface PastoralContact {
  id: string;
  name: string;
  category?: string;
  /** Latest attended date anywhere in the pass, if any. */
  lastAttended: IsoDate | null;
}

export interface Newcomer {
  person: PersonKey;
  name: string;
  firstAttended: IsoDate;
}

export interface PastoralCareReport {
  asOf: IsoDate;
  recentSundays: IsoDate[];
  missing: PastoralContact[];
  newcomers: Newcomer[];
}

export interface PastoralCareOptions {
  asOf: IsoDate;
  /** Category names counted as members; every roster person when omitted. */
  memberCategories?: readonly string[];
}

/**
 * Roster members missing from all of the most recent service Sundays on or before `asOf`,
 * plus people whose first attendance falls within the newcomer window.
 */
export function buildPastoralCareReport(
  pass: ReportPassResult,
  roster: RosterSnapshot,
  config: PipelineConfig,
  options: PastoralCareOptions
): PastoralCareReport {
  const asOf = requireIsoDate('pastoral care options', 'asOf', options.asOf);
  const serviceDates = [...new Set(pass.facts.map((fact) => fact.date))]
    .filter((date) => compareIsoDates(date, asOf) <= 0)
    .sort(compareIsoDates);
  const recentSundays = serviceDates.slice(-config.pastoralCareSundays);
  const recent = new Set(recentSundays);

  const firstAttended = new Map<PersonKey, IsoDate>();
  const lastAttended = new Map<PersonKey, IsoDate>();
  const attendedRecently = new Set<PersonKey>();
  for (const fact of pass.facts) {
    if (!fact.attended || compareIsoDates(fact.date, asOf) > 0) {
      continue;
    }
    if (recent.has(fact.date)) {
      attendedRecently.add(fact.person);
    }
    const first = firstAttended.get(fact.person);
    if (first === undefined || compareIsoDates(fact.date, first) < 0) {
      firstAttended.set(fact.person, fact.date);
    }
    const last = lastAttended.get(fact.person);
    if (last === undefined || compareIsoDates(fact.date, last) > 0) {
      lastAttended.set(fact.person, fact.date);
    }
  }

  const memberCategories = options.memberCategories ? new Set(options.memberCategories) : undefined;
  const missing: PastoralContact[] = [];
  for (const person of roster.people) {
    const category = person.category === undefined ? undefined : roster.categories[person.category];
    if (memberCategories && (category === undefined || !memberCategories.has(category))) {
      continue;
    }

    const key = personKeyForId(person.id);
    if (attendedRecently.has(key)) {
      continue;
    }

    const contact: PastoralContact = {
      id: person.id,
      name: `${person.firstName} ${person.lastName}`,
      lastAttended: lastAttended.get(key) ?? null
    };
    if (category !== undefined) {
      contact.category = category;
    }
    missing.push(contact);
  }

  const windowStart = weeksBefore(asOf, config.newcomerWeeks);
  const newcomers: Newcomer[] = [];
  for (const [person, date] of firstAttended) {
    if (compareIsoDates(date, windowStart) >= 0) {
      newcomers.push({ person, name: pass.displayNames[person] ?? person, firstAttended: date });
    }
  }
  newcomers.sort(
    (left, right) => compareIsoDates(left.firstAttended, right.firstAttended) || left.name.localeCompare(right.name)
  );

  return { asOf, recentSundays, missing, newcomers };
}
