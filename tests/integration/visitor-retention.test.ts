import { describe, expect, it } from 'vitest';

import { resolvePipelineConfig } from '../../src/config/pipeline-config.js';
import { matchVisitorsToJoined, type JoinRecord, type VisitorRecord } from '../../src/pipeline/visitor-retention.js';

const config = resolvePipelineConfig();

const visitors: Record<number, VisitorRecord[]> = {
  2024: [
    { id: 'V-1', name: 'Ann Archer', service: '8:30' },
    { name: 'Smith, Bob', service: '10:30' }
  ],
  2025: [
    { name: 'Cara Cole', service: '10:30' },
    { name: 'Dan Dale' },
    { name: 'Joan Park', service: '8:30' },
    { name: 'Josh Park', service: '10:30' }
  ]
};

const joined: Record<number, JoinRecord[]> = {
  2025: [
    { id: 'v-1 ', name: 'Annie Archer', date: '2025-03-02' },
    { name: 'Bob Smith', date: '2025-04-06' },
    { name: 'Cole, Cara', date: '2025-05-04' },
    { name: 'Cara Cole', date: '2025-02-02' },
    { name: 'Jo Park' },
    { name: 'Zed Zane' }
  ]
};

describe('visitor retention', () => {
  it('matches joiners by id, then by name across the lookback years', () => {
    const { years } = matchVisitorsToJoined(visitors, joined, config);
    const [year] = years;

    expect(years).toHaveLength(1);
    expect(year?.year).toBe(2025);
    expect(year?.visitors).toBe(4);
    expect(year?.joined).toBe(5);
    expect(year?.matches.map((match) => [match.joiner.name, match.visitor.name, match.visitYear, match.method])).toEqual([
      ['Annie Archer', 'Ann Archer', 2024, 'id'],
      ['Bob Smith', 'Smith, Bob', 2024, 'exact'],
      ['Cara Cole', 'Cara Cole', 2025, 'exact']
    ]);
    expect(year?.unmatched.map((joiner) => joiner.name)).toEqual(['Jo Park', 'Zed Zane']);
    expect(year?.byService).toEqual({ '8:30': 1, '10:30': 2 });
    expect(year?.retention.percentage).toBe(75);
  });

  it('keeps the earliest transition of a person who joined twice', () => {
    const { years } = matchVisitorsToJoined(visitors, joined, config);
    const cara = years[0]?.matches.find((match) => match.visitor.name === 'Cara Cole');

    expect(cara?.joiner.date).toBe('2025-02-02');
  });

  it('reports ambiguous and missing visits', () => {
    const { diagnostics } = matchVisitorsToJoined(visitors, joined, config);

    expect(diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.severity, diagnostic.message])).toEqual([
      ['VISITOR_MATCH_AMBIGUOUS', 'warning', "'Jo Park' matches several 2025 visitors; left unmatched."],
      ['VISITOR_UNMATCHED', 'info', "'Zed Zane' has no visit on record."]
    ]);
  });

  it('searches only the joining year without a lookback', () => {
    const { years } = matchVisitorsToJoined(visitors, joined, config, { lookbackYears: 0 });

    expect(years[0]?.matches.map((match) => match.joiner.name)).toEqual(['Cara Cole']);
    expect(years[0]?.unmatched.map((joiner) => joiner.name)).toEqual(['Annie Archer', 'Bob Smith', 'Jo Park', 'Zed Zane']);
  });
});
