import { describe, expect, it } from 'vitest';

import type { IdentityRecord } from '../../src/core/attendance.js';
import { resolve, resolveIdentity } from '../../src/identity/resolve.js';
import { buildRosterIndex, nameKeys, normalizeDisplayName, splitDisplayName } from '../../src/identity/roster-index.js';

const people: IdentityRecord[] = [
  { id: 'p1', firstName: 'John', lastName: 'Smith' },
  { id: 'p2', firstName: 'Jane', lastName: 'Smith' },
  { id: 'p3', firstName: 'Mary Ann', lastName: 'Lee' },
  { id: 'p4', firstName: 'Robert', lastName: 'Brown' },
  { id: 'p5', firstName: 'Roberta', lastName: 'Browning' }
];

const index = buildRosterIndex(people);

describe('display name normalization', () => {
  it('splits either name order into given and family names', () => {
    expect(splitDisplayName('Smith, John')).toEqual({ firstName: 'john', lastName: 'smith' });
    expect(splitDisplayName('John Smith')).toEqual({ firstName: 'john', lastName: 'smith' });
    expect(splitDisplayName('Mary Ann Lee')).toEqual({ firstName: 'mary', lastName: 'ann lee' });
    expect(splitDisplayName('Cher')).toEqual({ firstName: 'cher', lastName: '' });
  });

  it('strips role suffixes and normalizes spacing and case', () => {
    expect(normalizeDisplayName('  Smith ,  John (Leader) ')).toBe('smith, john');
    expect(normalizeDisplayName('(Helper) Jo   Bloggs')).toBe('jo bloggs');
    expect(normalizeDisplayName('Doe, Pat (Assistant Leader)')).toBe('doe, pat');
    expect(normalizeDisplayName('Smith,John')).toBe('smith, john');
  });

  it('builds the written key followed by its transposition', () => {
    expect(nameKeys('smith, john')).toEqual(['smith, john', 'john smith']);
    expect(nameKeys('john smith')).toEqual(['john smith', 'smith, john']);
    expect(nameKeys('mary ann lee')).toEqual(['mary ann lee', 'ann lee, mary']);
    expect(nameKeys('cher')).toEqual(['cher']);
  });
});

describe('identity resolution', () => {
  it('resolves both name orderings and role suffixes to the same person', () => {
    expect(resolve('Smith, John (Leader)', index)?.id).toBe('p1');
    expect(resolve('John Smith', index)?.id).toBe('p1');
    expect(resolve('john   smith', index)?.id).toBe('p1');
    expect(resolve('JOHN SMITH (Assistant Leader)', index)?.id).toBe('p1');
    expect(resolve('Lee, Mary Ann', index)?.id).toBe('p3');
  });

  it('reports a transposed match when only the reordered name is indexed', () => {
    const resolution = resolveIdentity('Lee, Mary Ann', buildRosterIndex([{ id: 'x', firstName: 'Mary', lastName: 'Ann Lee' }]));

    expect(resolution).toEqual({
      record: { id: 'x', firstName: 'Mary', lastName: 'Ann Lee' },
      method: 'transposed',
      normalized: 'lee, mary ann'
    });
  });

  it('falls back to a single partial candidate', () => {
    const resolution = resolveIdentity('Rob Brown', index);

    expect(resolution.record?.id).toBe('p4');
    expect(resolution.record === null ? undefined : resolution.method).toBe('partial');
  });

  it('refuses to pick between several partial candidates', () => {
    const resolution = resolveIdentity('J Smith', index);

    expect(resolution.record).toBeNull();
    expect(resolution.record === null ? resolution.reason : undefined).toBe('ambiguous');
    expect(resolution.record === null ? resolution.candidates.map((record) => record.id) : []).toEqual(['p1', 'p2']);
    expect(resolve('J Smith', index)).toBeNull();
  });

  it('leaves unknown and empty names unresolved', () => {
    const unknown = resolveIdentity('Zed Unknown', index);

    expect(unknown).toEqual({ record: null, reason: 'unresolved', normalized: 'zed unknown', candidates: [] });
    expect(resolve('', index)).toBeNull();
    expect(resolve('(Leader)', index)).toBeNull();
  });

  it('keeps the first record when two share a name', () => {
    const duplicated = buildRosterIndex([
      { id: 'a', firstName: 'Sam', lastName: 'Roe' },
      { id: 'b', firstName: 'Sam', lastName: 'Roe' }
    ]);

    expect(resolve('Sam Roe', duplicated)?.id).toBe('a');
    expect(resolve('Roe, Sam', duplicated)?.id).toBe('a');
  });
});
