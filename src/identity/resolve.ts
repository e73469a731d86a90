import type { IdentityRecord } from '../core/attendance.js';
import { forwardOrder, nameKeys, normalizeDisplayName, type RosterIndex } from './roster-index.js';

/** How a display name reached its roster record. */
export type ResolutionMethod = 'exact' | 'transposed' | 'partial';

export type IdentityResolution =
  | { record: IdentityRecord; method: ResolutionMethod; normalized: string }
  | { record: null; reason: 'unresolved' | 'ambiguous'; normalized: string; candidates: IdentityRecord[] };

/**
 * Map a scraped display name to a roster record.
 * Exact keys are tried first (as written, then transposed). The partial fallback requires the
 * first token to prefix the candidate's first name and the candidate's last name to appear in
 * the name; more than one distinct candidate is ambiguous and resolves to nothing.
 */
export function resolveIdentity(raw: string, index: RosterIndex): IdentityResolution {
  const normalized = normalizeDisplayName(raw);
  if (normalized.length === 0) {
    return { record: null, reason: 'unresolved', normalized, candidates: [] };
  }

  const keys = nameKeys(normalized);
  for (const [position, key] of keys.entries()) {
    const record = index.byKey.get(key);
    if (record) {
      return { record, method: position === 0 ? 'exact' : 'transposed', normalized };
    }
  }

  const candidates = partialCandidates(forwardOrder(normalized), index);
  const [only, ...others] = candidates;
  if (only && others.length === 0) {
    return { record: only, method: 'partial', normalized };
  }

  return {
    record: null,
    reason: candidates.length > 1 ? 'ambiguous' : 'unresolved',
    normalized,
    candidates
  };
}

/** Resolve to a record or `null`, discarding the resolution detail. */
export function resolve(raw: string, index: RosterIndex): IdentityRecord | null {
  return resolveIdentity(raw, index).record;
}

function partialCandidates(forward: string, index: RosterIndex): IdentityRecord[] {
  const [firstToken] = forward.split(' ');
  if (!firstToken) {
    return [];
  }

  const seen = new Set<string>();
  const candidates: IdentityRecord[] = [];
  for (const record of index.records) {
    const firstName = normalizeDisplayName(record.firstName);
    const lastName = normalizeDisplayName(record.lastName);
    if (lastName.length === 0 || !firstName.startsWith(firstToken) || !forward.includes(lastName)) {
      continue;
    }
    if (!seen.has(record.id)) {
      seen.add(record.id);
      candidates.push(record);
    }
  }
  return candidates;
}
