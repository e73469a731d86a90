import {
  SERVICE_TIMES,
  type AttendanceFact,
  type IsoDate,
  type PersonKey,
  type SeriesPoint,
  type ServiceTime
} from '../core/attendance.js';
import { compareIsoDates } from '../core/calendar.js';

/** Per-service head counts for one date. */
export interface ServiceCounts {
  date: IsoDate;
  counts: Record<ServiceTime, number>;
  /** Distinct people across every service that day. */
  overall: number;
  /** Slots with a report column (or an attended fact) that day, in service order. */
  held: ServiceTime[];
}

/** One planned service column: a slot on a date. */
export interface ServiceSlot {
  date: IsoDate;
  serviceTime: ServiceTime;
}

/** Head counts plus the attendee lists they were counted from. */
export interface ServiceDay extends ServiceCounts {
  attendees: Record<ServiceTime, PersonKey[]>;
  overallAttendees: PersonKey[];
}

export interface ProRataResult {
  days: ServiceCounts[];
  /** 8:30 to 10:30 ratio applied to combined services. */
  ratio: number;
  usedDefaultRatio: boolean;
}

/** Floating tolerance applied before truncating a share. */
const TRUNCATION_EPSILON = 1e-9;

function emptyCounts(): Record<ServiceTime, number> {
  return { '8:30': 0, '9:30': 0, '10:30': 0, '6:30': 0, other: 0 };
}

function emptyAttendees(): Record<ServiceTime, PersonKey[]> {
  return { '8:30': [], '9:30': [], '10:30': [], '6:30': [], other: [] };
}

function emptyDay(date: IsoDate): ServiceDay {
  return { date, counts: emptyCounts(), overall: 0, held: [], attendees: emptyAttendees(), overallAttendees: [] };
}

function markHeld(held: ServiceTime[], serviceTime: ServiceTime): ServiceTime[] {
  if (held.includes(serviceTime)) {
    return held;
  }
  return SERVICE_TIMES.filter((slot) => slot === serviceTime || held.includes(slot));
}

/**
 * Count attendees per date and service. The overall count is the union of the day's
 * attendee sets, so a person at two services on one date counts once.
 * `slots` seeds zero-count days and held services for columns nobody attended.
 */
export function countServiceDays(facts: readonly AttendanceFact[], slots: readonly ServiceSlot[] = []): ServiceDay[] {
  const days = new Map<IsoDate, ServiceDay>();
  for (const slot of slots) {
    const day = days.get(slot.date) ?? emptyDay(slot.date);
    day.held = markHeld(day.held, slot.serviceTime);
    days.set(slot.date, day);
  }

  for (const fact of facts) {
    if (!fact.attended) {
      continue;
    }

    let day = days.get(fact.date);
    if (!day) {
      day = emptyDay(fact.date);
      days.set(fact.date, day);
    }
    day.held = markHeld(day.held, fact.serviceTime);

    const attendees = day.attendees[fact.serviceTime];
    if (!attendees.includes(fact.person)) {
      attendees.push(fact.person);
      day.counts[fact.serviceTime] = attendees.length;
    }
    if (!day.overallAttendees.includes(fact.person)) {
      day.overallAttendees.push(fact.person);
      day.overall = day.overallAttendees.length;
    }
  }

  return [...days.values()].sort((left, right) => compareIsoDates(left.date, right.date));
}

/** Mean 8:30 to 10:30 ratio over dates where both services have attendance. */
export function historicalRatio(days: readonly ServiceCounts[]): number | undefined {
  const ratios = days
    .filter((day) => day.counts['8:30'] > 0 && day.counts['10:30'] > 0)
    .map((day) => day.counts['8:30'] / day.counts['10:30']);

  if (ratios.length === 0) {
    return undefined;
  }
  return ratios.reduce((sum, value) => sum + value, 0) / ratios.length;
}

/**
 * Split each combined 9:30 count between 8:30 and 10:30 using the historical ratio `r`:
 * `total * r / (1 + r)` to 8:30 and `total / (1 + r)` to 10:30, each truncated and added
 * to the counts already recorded for that date, which then count as held. Without a historical
 * pair the default applies.
 */
export function applyProRata(days: readonly ServiceCounts[], defaultRatio: number): ProRataResult {
  const historical = historicalRatio(days);
  const ratio = historical ?? defaultRatio;

  const split = days.map((day): ServiceCounts => {
    const counts = { ...day.counts };
    let held = [...day.held];
    const combined = counts['9:30'];
    if (combined > 0) {
      counts['8:30'] += Math.floor((combined * ratio) / (1 + ratio) + TRUNCATION_EPSILON);
      counts['10:30'] += Math.floor(combined / (1 + ratio) + TRUNCATION_EPSILON);
      held = markHeld(markHeld(held, '8:30'), '10:30');
    }
    return { date: day.date, counts, overall: day.overall, held };
  });

  return { days: split, ratio, usedDefaultRatio: historical === undefined };
}

/**
 * Weekly points per service time, in service order, over the days that service was held.
 * Services with no attendance at all are left out.
 */
export function serviceCountsByTime(days: readonly ServiceCounts[]): Map<ServiceTime, SeriesPoint[]> {
  const byTime = new Map<ServiceTime, SeriesPoint[]>();
  for (const serviceTime of SERVICE_TIMES) {
    const heldDays = days.filter((day) => day.held.includes(serviceTime));
    if (heldDays.every((day) => day.counts[serviceTime] === 0)) {
      continue;
    }
    byTime.set(
      serviceTime,
      heldDays.map((day) => ({ date: day.date, value: day.counts[serviceTime] }))
    );
  }
  return byTime;
}
