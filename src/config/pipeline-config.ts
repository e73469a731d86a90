import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';

import type { ParserMode } from '../parser/parse-context.js';
import {
  ConfigError,
  isRecord,
  readOptionalEnum,
  readOptionalNumber,
  readOptionalObject,
  readOptionalPositiveInteger,
  readOptionalString
} from './config-fields.js';

/** How a target is projected forward from the current value. */
export type ProjectionMode = 'additive' | 'multiplicative';

/** Per-year target steps: percentage points for ratio metrics, raw counts otherwise. */
export interface TargetIncrements {
  percentagePoints: number;
  count: number;
}

/** Explicit options threaded into every pipeline entry point. */
export interface PipelineConfig {
  rollingWindow: number;
  prayerRollingWindow: number;
  minimumAttendance: number;
  proRataDefaultRatio: number;
  recentAbsenceWindow: number;
  pastoralCareSundays: number;
  newcomerWeeks: number;
  attendedMark: string;
  absentMark: string;
  mode: ParserMode;
  targetIncrements: TargetIncrements;
  projection: ProjectionMode;
  /** Growth over last year's total drawn as the benchmark line (0.10 = 10%). */
  growthBenchmark: number;
}

export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, 'targetIncrements'>> & {
  targetIncrements?: Partial<TargetIncrements>;
};

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = {
  rollingWindow: 4,
  prayerRollingWindow: 6,
  minimumAttendance: 2,
  proRataDefaultRatio: 0.4,
  recentAbsenceWindow: 3,
  pastoralCareSundays: 4,
  newcomerWeeks: 6,
  attendedMark: 'Y',
  absentMark: 'N',
  mode: 'lenient',
  targetIncrements: { percentagePoints: 5, count: 2 },
  projection: 'additive',
  growthBenchmark: 0.1
};

const PARSER_MODES: readonly ParserMode[] = ['strict', 'lenient'];
const PROJECTION_MODES: readonly ProjectionMode[] = ['additive', 'multiplicative'];

/** YAML key for each scalar option. */
const YAML_KEYS = {
  rollingWindow: 'rolling_window',
  prayerRollingWindow: 'prayer_rolling_window',
  minimumAttendance: 'minimum_attendance',
  proRataDefaultRatio: 'pro_rata_default_ratio',
  recentAbsenceWindow: 'recent_absence_window',
  pastoralCareSundays: 'pastoral_care_sundays',
  newcomerWeeks: 'newcomer_weeks',
  attendedMark: 'attended_mark',
  absentMark: 'absent_mark',
  mode: 'mode',
  targetIncrements: 'target_increments',
  projection: 'projection',
  growthBenchmark: 'growth_benchmark'
} as const satisfies Record<keyof PipelineConfig, string>;

const KNOWN_YAML_KEYS = new Set<string>(Object.values(YAML_KEYS));

/** Merge overrides onto the defaults and validate the result. */
export function resolvePipelineConfig(
  overrides: PipelineConfigOverrides = {},
  source = 'pipeline options'
): PipelineConfig {
  const defaults = DEFAULT_PIPELINE_CONFIG;
  const config: PipelineConfig = {
    rollingWindow: overrides.rollingWindow ?? defaults.rollingWindow,
    prayerRollingWindow: overrides.prayerRollingWindow ?? defaults.prayerRollingWindow,
    minimumAttendance: overrides.minimumAttendance ?? defaults.minimumAttendance,
    proRataDefaultRatio: overrides.proRataDefaultRatio ?? defaults.proRataDefaultRatio,
    recentAbsenceWindow: overrides.recentAbsenceWindow ?? defaults.recentAbsenceWindow,
    pastoralCareSundays: overrides.pastoralCareSundays ?? defaults.pastoralCareSundays,
    newcomerWeeks: overrides.newcomerWeeks ?? defaults.newcomerWeeks,
    attendedMark: overrides.attendedMark ?? defaults.attendedMark,
    absentMark: overrides.absentMark ?? defaults.absentMark,
    mode: overrides.mode ?? defaults.mode,
    targetIncrements: {
      percentagePoints: overrides.targetIncrements?.percentagePoints ?? defaults.targetIncrements.percentagePoints,
      count: overrides.targetIncrements?.count ?? defaults.targetIncrements.count
    },
    projection: overrides.projection ?? defaults.projection,
    growthBenchmark: overrides.growthBenchmark ?? defaults.growthBenchmark
  };

  validatePipelineConfig(config, source);
  return config;
}

/** Load a YAML pipeline configuration file; absent keys take their defaults. */
export async function loadPipelineConfig(filePath: string): Promise<PipelineConfig> {
  const raw = await readFile(filePath, 'utf8');
  return parsePipelineConfig(filePath, parseYaml(raw));
}

/** Validate parsed YAML into a pipeline configuration. */
export function parsePipelineConfig(filePath: string, input: unknown): PipelineConfig {
  if (!isRecord(input)) {
    throw new ConfigError(filePath, 'configuration must be a YAML object');
  }

  for (const key of Object.keys(input)) {
    if (!KNOWN_YAML_KEYS.has(key)) {
      throw new ConfigError(filePath, `unknown key '${key}'`);
    }
  }

  const increments = readOptionalObject(filePath, input, YAML_KEYS.targetIncrements);

  return resolvePipelineConfig(
    {
      rollingWindow: readOptionalPositiveInteger(filePath, input, YAML_KEYS.rollingWindow),
      prayerRollingWindow: readOptionalPositiveInteger(filePath, input, YAML_KEYS.prayerRollingWindow),
      minimumAttendance: readOptionalPositiveInteger(filePath, input, YAML_KEYS.minimumAttendance),
      proRataDefaultRatio: readOptionalNumber(filePath, input, YAML_KEYS.proRataDefaultRatio),
      recentAbsenceWindow: readOptionalPositiveInteger(filePath, input, YAML_KEYS.recentAbsenceWindow),
      pastoralCareSundays: readOptionalPositiveInteger(filePath, input, YAML_KEYS.pastoralCareSundays),
      newcomerWeeks: readOptionalPositiveInteger(filePath, input, YAML_KEYS.newcomerWeeks),
      attendedMark: readOptionalString(filePath, input, YAML_KEYS.attendedMark),
      absentMark: readOptionalString(filePath, input, YAML_KEYS.absentMark),
      mode: readOptionalEnum(filePath, input, YAML_KEYS.mode, PARSER_MODES),
      targetIncrements: increments
        ? {
            percentagePoints: readOptionalNumber(filePath, increments, 'percentage_points'),
            count: readOptionalNumber(filePath, increments, 'count')
          }
        : undefined,
      projection: readOptionalEnum(filePath, input, YAML_KEYS.projection, PROJECTION_MODES),
      growthBenchmark: readOptionalNumber(filePath, input, YAML_KEYS.growthBenchmark)
    },
    filePath
  );
}

function validatePipelineConfig(config: PipelineConfig, source: string): void {
  const positiveIntegers = [
    'rollingWindow',
    'prayerRollingWindow',
    'minimumAttendance',
    'recentAbsenceWindow',
    'pastoralCareSundays',
    'newcomerWeeks'
  ] as const;
  for (const key of positiveIntegers) {
    if (!Number.isInteger(config[key]) || config[key] < 1) {
      throw new ConfigError(source, `'${YAML_KEYS[key]}' must be a positive integer`);
    }
  }

  if (!(config.proRataDefaultRatio > 0) || !Number.isFinite(config.proRataDefaultRatio)) {
    throw new ConfigError(source, `'${YAML_KEYS.proRataDefaultRatio}' must be a positive number`);
  }

  if (!(config.growthBenchmark >= 0) || !Number.isFinite(config.growthBenchmark)) {
    throw new ConfigError(source, `'${YAML_KEYS.growthBenchmark}' must be a non-negative number`);
  }

  const attended = config.attendedMark.trim();
  const absent = config.absentMark.trim();
  if (attended === '' || absent === '' || attended === absent) {
    throw new ConfigError(source, 'attended and absent marks must be distinct non-empty tokens');
  }

  if (!Number.isFinite(config.targetIncrements.percentagePoints) || !Number.isFinite(config.targetIncrements.count)) {
    throw new ConfigError(source, `'${YAML_KEYS.targetIncrements}' values must be finite numbers`);
  }
}
