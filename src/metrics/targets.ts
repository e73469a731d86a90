import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';

import {
  ConfigError,
  isRecord,
  readOptionalString,
  readRequiredNumber,
  readRequiredObject,
  readRequiredString
} from '../config/config-fields.js';

/** Target value for one planning year. */
export interface TargetPoint {
  year: number;
  value: number;
}

/** One strategic metric with its baseline and yearly targets. */
export interface StrategicTarget {
  area: string;
  metric: string;
  description: string;
  baseline: TargetPoint;
  /** Ascending by year. */
  targets: TargetPoint[];
  note?: string;
}

export interface TargetPlan {
  targets: StrategicTarget[];
}

/**
 * Load a strategic target plan:
 *
 * ```yaml
 * areas:
 *   prayer:
 *     weekly_prayer_meeting_attendance:
 *       description: Weekly prayer meeting attendance
 *       baseline: { year: 2025, value: 6 }
 *       targets: { 2026: 8, 2029: 12 }
 * ```
 */
export async function loadTargetPlan(filePath: string): Promise<TargetPlan> {
  const raw = await readFile(filePath, 'utf8');
  return parseTargetPlan(filePath, parseYaml(raw));
}

/** Validate parsed YAML into a target plan, in file order. */
export function parseTargetPlan(filePath: string, input: unknown): TargetPlan {
  if (!isRecord(input)) {
    throw new ConfigError(filePath, 'target plan must be a YAML object');
  }

  const areas = readRequiredObject(filePath, input, 'areas');
  const targets: StrategicTarget[] = [];

  for (const [area, metrics] of Object.entries(areas)) {
    if (!isRecord(metrics)) {
      throw new ConfigError(filePath, `area '${area}' must be an object`);
    }

    for (const [metric, entry] of Object.entries(metrics)) {
      if (!isRecord(entry)) {
        throw new ConfigError(filePath, `target '${area}.${metric}' must be an object`);
      }
      targets.push(parseTarget(filePath, area, metric, entry));
    }
  }

  return { targets };
}

function parseTarget(filePath: string, area: string, metric: string, entry: Record<string, unknown>): StrategicTarget {
  const baseline = readRequiredObject(filePath, entry, 'baseline');
  const yearly = readRequiredObject(filePath, entry, 'targets');

  const points: TargetPoint[] = [];
  for (const [yearKey, value] of Object.entries(yearly)) {
    const year = Number(yearKey);
    if (!Number.isInteger(year)) {
      throw new ConfigError(filePath, `target '${area}.${metric}' has a non-year key '${yearKey}'`);
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ConfigError(filePath, `target '${area}.${metric}' for ${year} must be a finite number`);
    }
    points.push({ year, value });
  }
  points.sort((left, right) => left.year - right.year);

  const target: StrategicTarget = {
    area,
    metric,
    description: readRequiredString(filePath, entry, 'description'),
    baseline: {
      year: readRequiredNumber(filePath, baseline, 'year'),
      value: readRequiredNumber(filePath, baseline, 'value')
    },
    targets: points
  };

  const note = readOptionalString(filePath, entry, 'note');
  if (note !== undefined) {
    target.note = note;
  }
  return target;
}

/** Targets for `year` and later, ascending. */
export function relevantTargets(target: StrategicTarget, year: number): TargetPoint[] {
  return target.targets.filter((point) => point.year >= year);
}

/** Look up one target by area and metric name. */
export function findTarget(plan: TargetPlan, area: string, metric: string): StrategicTarget | undefined {
  return plan.targets.find((target) => target.area === area && target.metric === metric);
}
