import type { IdentityRecord } from '../core/attendance.js';

/** Role suffixes report authors append to names, for example `Smith, John (Leader)`. */
const ROLE_SUFFIX_PATTERN = /\(\s*(?:assistant leader|leader|helper|coordinator)\s*\)/gi;

/** Read-only lookup built once per pass. */
export interface RosterIndex {
  /** Normalized `first last` and `last, first` keys; the first record wins a collision. */
  byKey: ReadonlyMap<string, IdentityRecord>;
  /** Records in roster order, for the partial-match fallback. */
  records: readonly IdentityRecord[];
}

/**
 * Canonical comparison form of a display name: role suffixes removed, whitespace collapsed,
 * comma spacing normalized to `, ` and case folded.
 */
export function normalizeDisplayName(raw: string): string {
  return raw
    .replace(ROLE_SUFFIX_PATTERN, ' ')
    .replace(/\s+/g, ' ')
    .replace(/\s*,\s*/g, ', ')
    .trim()
    .replace(/^,\s*|,$/g, '')
    .trim()
    .toLowerCase();
}

/**
 * Lookup keys for a normalized name: the name as written, then its transposition.
 * `smith, john` transposes to `john smith`; `john smith` to `smith, john`; with three or more
 * tokens the first token is the given name and the rest the family name.
 */
export function nameKeys(normalized: string): string[] {
  const keys = [normalized];
  const transposed = transposeName(normalized);
  if (transposed !== undefined && transposed !== normalized) {
    keys.push(transposed);
  }
  return keys;
}

/** The `first last` ordering of a normalized name. */
export function forwardOrder(normalized: string): string {
  return normalized.includes(',') ? (transposeName(normalized) ?? normalized) : normalized;
}

function transposeName(normalized: string): string | undefined {
  const comma = normalized.indexOf(',');
  if (comma >= 0) {
    const family = normalized.slice(0, comma).trim();
    const given = normalized.slice(comma + 1).trim();
    return `${given} ${family}`.trim();
  }

  const [given, ...family] = normalized.split(' ');
  if (given === undefined || family.length === 0) {
    return undefined;
  }
  return `${family.join(' ')}, ${given}`;
}

/**
 * Given and family name of a display name, in normalized form. `Smith, John` and `John Smith`
 * both split to `john` / `smith`; a single token is a given name only.
 */
export function splitDisplayName(raw: string): { firstName: string; lastName: string } {
  const [given = '', ...family] = forwardOrder(normalizeDisplayName(raw)).split(' ');
  return { firstName: given, lastName: family.join(' ') };
}

/** Index roster records under both name orderings. */
export function buildRosterIndex(records: readonly IdentityRecord[]): RosterIndex {
  const byKey = new Map<string, IdentityRecord>();
  for (const record of records) {
    const forward = normalizeDisplayName(`${record.firstName} ${record.lastName}`);
    const reversed = normalizeDisplayName(`${record.lastName}, ${record.firstName}`);
    for (const key of [forward, reversed]) {
      if (key.length > 0 && !byKey.has(key)) {
        byKey.set(key, record);
      }
    }
  }

  return { byKey, records: [...records] };
}
