import type { IsoDate } from '../core/attendance.js';
import { isIsoDate } from '../core/calendar.js';

/** Validation error for malformed configuration or target files. */
export class ConfigError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Configuration error in ${filePath}: ${message}`);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

/** Plain object narrowing for parsed YAML. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a required nested object field. */
export function readRequiredObject(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const value = obj[key];
  if (!isRecord(value)) {
    throw new ConfigError(filePath, `'${key}' must be an object`);
  }
  return value;
}

/** Read an optional nested object field. */
export function readOptionalObject(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Record<string, unknown> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return readRequiredObject(filePath, obj, key);
}

/** Read a required non-empty string field. */
export function readRequiredString(filePath: string, obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

/** Read an optional string field. */
export function readOptionalString(filePath: string, obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new ConfigError(filePath, `'${key}' must be a string`);
  }

  return value;
}

/** Read a required finite number field. */
export function readRequiredNumber(filePath: string, obj: Record<string, unknown>, key: string): number {
  const value = readOptionalNumber(filePath, obj, key);
  if (value === undefined) {
    throw new ConfigError(filePath, `missing '${key}'`);
  }
  return value;
}

/** Read an optional finite number field. */
export function readOptionalNumber(filePath: string, obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(filePath, `'${key}' must be a finite number`);
  }

  return value;
}

/** Read an optional positive integer field. */
export function readOptionalPositiveInteger(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): number | undefined {
  const value = readOptionalNumber(filePath, obj, key);
  if (value === undefined) {
    return undefined;
  }

  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(filePath, `'${key}' must be a positive integer`);
  }

  return value;
}

/** Read an optional string field restricted to `allowed` values. */
export function readOptionalEnum<T extends string>(
  filePath: string,
  obj: Record<string, unknown>,
  key: string,
  allowed: readonly T[]
): T | undefined {
  const value = readOptionalString(filePath, obj, key);
  if (value === undefined) {
    return undefined;
  }

  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(filePath, `'${key}' must be one of ${allowed.map((item) => `'${item}'`).join(', ')}`);
  }
  return match;
}

/** Check a caller-supplied `YYYY-MM-DD` option such as `asOf`. */
export function requireIsoDate(source: string, key: string, value: string): IsoDate {
  if (!isIsoDate(value)) {
    throw new ConfigError(source, `'${key}' must be a YYYY-MM-DD calendar date, got '${value}'`);
  }
  return value;
}
