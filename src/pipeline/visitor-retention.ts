import type { IdentityRecord, IsoDate, Metric } from '../core/attendance.js';
import { compareIsoDates } from '../core/calendar.js';
import type { Diagnostic } from '../core/diagnostics.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { resolveIdentity, type ResolutionMethod } from '../identity/resolve.js';
import { buildRosterIndex, normalizeDisplayName, splitDisplayName, type RosterIndex } from '../identity/roster-index.js';
import { createMetric, targetProjection } from '../metrics/calculate.js';
import { addDiagnostic, createParseContext, type ParseContext } from '../parser/parse-context.js';

/** One row of a new-visitors report. */
export interface VisitorRecord {
  id?: string;
  name: string;
  /** Service the visit was recorded at, when the report names one. */
  service?: string;
}

/** Someone whose category changed from visitor to member. */
export interface JoinRecord {
  id?: string;
  name: string;
  date?: IsoDate;
}

export interface VisitorMatch {
  joiner: JoinRecord;
  visitor: VisitorRecord;
  visitYear: number;
  method: 'id' | ResolutionMethod;
}

export interface RetentionYear {
  year: number;
  visitors: number;
  /** Joiners after collapsing repeat transitions of one person. */
  joined: number;
  matches: VisitorMatch[];
  unmatched: JoinRecord[];
  /** Matched joiners per visit service; `unknown` when the visit named none. */
  byService: Record<string, number>;
  /** Matched joiners over the year's visitors. */
  retention: Metric;
}

export interface VisitorRetention {
  years: RetentionYear[];
  diagnostics: Diagnostic[];
}

export interface VisitorRetentionOptions {
  /** Earlier visitor years searched for each joiner. */
  lookbackYears?: number;
}

const DEFAULT_LOOKBACK_YEARS = 2;

interface VisitorYearIndex {
  year: number;
  visitors: readonly VisitorRecord[];
  index: RosterIndex;
}

/**
 * Match each year's joiners to an earlier visit: by id across the lookback years first,
 * then by name through the identity resolver, the joining year before earlier ones.
 * An ambiguous name match leaves the joiner unmatched.
 */
export function matchVisitorsToJoined(
  visitorsByYear: Readonly<Record<number, readonly VisitorRecord[]>>,
  joinedByYear: Readonly<Record<number, readonly JoinRecord[]>>,
  config: PipelineConfig,
  options: VisitorRetentionOptions = {}
): VisitorRetention {
  const ctx = createParseContext(config.mode);
  const lookback = options.lookbackYears ?? DEFAULT_LOOKBACK_YEARS;
  const indexes = new Map<number, VisitorYearIndex>();
  const indexFor = (year: number): VisitorYearIndex => {
    let entry = indexes.get(year);
    if (!entry) {
      const visitors = visitorsByYear[year] ?? [];
      entry = { year, visitors, index: buildRosterIndex(visitors.map(toIdentity)) };
      indexes.set(year, entry);
    }
    return entry;
  };

  const years = Object.keys(joinedByYear)
    .map(Number)
    .sort((left, right) => left - right)
    .map((year): RetentionYear => {
      const joiners = dedupeJoiners(joinedByYear[year] ?? []);
      const chain = Array.from({ length: lookback + 1 }, (_, offset) => indexFor(year - offset));
      const matches: VisitorMatch[] = [];
      const unmatched: JoinRecord[] = [];
      const byService: Record<string, number> = {};

      for (const joiner of joiners) {
        const match = matchJoiner(joiner, chain, ctx);
        if (!match) {
          unmatched.push(joiner);
          continue;
        }
        matches.push(match);
        const service = match.visitor.service ?? 'unknown';
        byService[service] = (byService[service] ?? 0) + 1;
      }

      const visitors = visitorsByYear[year]?.length ?? 0;
      return {
        year,
        visitors,
        joined: joiners.length,
        matches,
        unmatched,
        byService,
        retention: createMetric({
          numerator: matches.length,
          denominator: visitors,
          year,
          cohort: 'visitors',
          projection: targetProjection(config)
        })
      };
    });

  return { years, diagnostics: ctx.diagnostics };
}

function matchJoiner(joiner: JoinRecord, chain: readonly VisitorYearIndex[], ctx: ParseContext): VisitorMatch | undefined {
  const id = normalizeId(joiner.id);
  if (id !== undefined) {
    for (const entry of chain) {
      const visitor = entry.visitors.find((candidate) => normalizeId(candidate.id) === id);
      if (visitor) {
        return { joiner, visitor, visitYear: entry.year, method: 'id' };
      }
    }
  }

  for (const entry of chain) {
    const resolution = resolveIdentity(joiner.name, entry.index);
    if (resolution.record !== null) {
      const visitor = entry.visitors[Number(resolution.record.id)];
      if (visitor) {
        return { joiner, visitor, visitYear: entry.year, method: resolution.method };
      }
      continue;
    }
    if (resolution.reason === 'ambiguous') {
      addDiagnostic(
        ctx,
        'VISITOR_MATCH_AMBIGUOUS',
        'warning',
        `'${joiner.name}' matches several ${entry.year} visitors; left unmatched.`
      );
      return undefined;
    }
  }

  addDiagnostic(ctx, 'VISITOR_UNMATCHED', 'info', `'${joiner.name}' has no visit on record.`);
  return undefined;
}

/** Visitor rows become identity records keyed by their position in the year's list. */
function toIdentity(visitor: VisitorRecord, position: number): IdentityRecord {
  return { id: String(position), ...splitDisplayName(visitor.name) };
}

/** One transition per person: the earliest dated one, else the first seen. */
function dedupeJoiners(joiners: readonly JoinRecord[]): JoinRecord[] {
  const byPerson = new Map<string, JoinRecord>();
  for (const joiner of joiners) {
    const key = joinerKey(joiner);
    const kept = byPerson.get(key);
    if (
      kept === undefined ||
      (joiner.date !== undefined && kept.date !== undefined && compareIsoDates(joiner.date, kept.date) < 0)
    ) {
      byPerson.set(key, joiner);
    }
  }
  return [...byPerson.values()];
}

function joinerKey(joiner: JoinRecord): string {
  const id = normalizeId(joiner.id);
  if (id !== undefined) {
    return `id:${id}`;
  }
  const tokens = normalizeDisplayName(joiner.name).replace(/,/g, ' ').split(' ').filter(Boolean);
  return `name:${tokens.sort().join(' ')}`;
}

function normalizeId(id: string | undefined): string | undefined {
  const trimmed = id?.trim().toLowerCase();
  return trimmed ? trimmed : undefined;
}
