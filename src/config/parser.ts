/**
 * TOML settings parser for globaldefs.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_FEATURES, DEFAULT_LOGGING, DEFAULT_SCHEDULER, DEFAULT_SETTINGS } from './defaults.js';
import type { FeatureFlags, LoggingSettings, ParserSettings, SchedulerSettings } from './types.js';
import { FEATURE_NAMES } from './types.js';

/**
 * Error class for settings parsing errors.
 */
export class SettingsParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new SettingsParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SettingsParseError';
    this.cause = cause;
  }
}

/**
 * Narrows a parsed TOML value to a table.
 */
function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Reads an optional table, rejecting values of any other type.
 */
function readTable(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new SettingsParseError(`Invalid type for '${fieldPath}': expected table, got ${typeof value}`);
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Parses the features table. Unknown keys are rejected so that a misspelt
 * flag does not silently leave a subsystem enabled.
 */
function parseFeatures(raw: Record<string, unknown> | undefined): FeatureFlags {
  const result: FeatureFlags = { ...DEFAULT_FEATURES };
  if (raw === undefined) {
    return result;
  }

  const known: ReadonlySet<string> = new Set(FEATURE_NAMES);
  for (const [key, value] of Object.entries(raw)) {
    if (!known.has(key)) {
      throw new SettingsParseError(
        `Unknown feature 'features.${key}'. Known features: ${FEATURE_NAMES.join(', ')}`
      );
    }
  }
  for (const name of FEATURE_NAMES) {
    if (name in raw) {
      result[name] = validateBoolean(raw[name], `features.${name}`);
    }
  }

  return result;
}

function parseScheduler(raw: Record<string, unknown> | undefined): SchedulerSettings {
  const result: SchedulerSettings = { ...DEFAULT_SCHEDULER };
  if (raw === undefined) {
    return result;
  }

  if ('rt_priority_min' in raw) {
    result.rt_priority_min = validateNumber(raw.rt_priority_min, 'scheduler.rt_priority_min');
  }
  if ('rt_priority_max' in raw) {
    result.rt_priority_max = validateNumber(raw.rt_priority_max, 'scheduler.rt_priority_max');
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingSettings {
  const result: LoggingSettings = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

function parseHosts(raw: Record<string, unknown> | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (raw === undefined) {
    return result;
  }

  for (const [name, address] of Object.entries(raw)) {
    result[name] = validateString(address, `hosts.${name}`);
  }

  return result;
}

/**
 * Parses a TOML string into settings, filling in defaults for anything absent.
 *
 * @param tomlContent - Raw TOML content.
 * @returns Settings with defaults applied.
 * @throws SettingsParseError for invalid TOML syntax or values of the wrong type.
 *
 * @example
 * ```typescript
 * const settings = parseSettings(`
 * [features]
 * bfd = false
 *
 * [hosts]
 * "mail.example.test" = "192.0.2.25"
 * `);
 * settings.features.bfd; // false
 * ```
 */
export function parseSettings(tomlContent: string): ParserSettings {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SettingsParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    features: parseFeatures(readTable(parsed.features, 'features')),
    scheduler: parseScheduler(readTable(parsed.scheduler, 'scheduler')),
    logging: parseLogging(readTable(parsed.logging, 'logging')),
    hosts: parseHosts(readTable(parsed.hosts, 'hosts')),
  };
}

/**
 * Returns a copy of the default settings.
 */
export function getDefaultSettings(): ParserSettings {
  return {
    features: { ...DEFAULT_SETTINGS.features },
    scheduler: { ...DEFAULT_SETTINGS.scheduler },
    logging: { ...DEFAULT_SETTINGS.logging },
    hosts: { ...DEFAULT_SETTINGS.hosts },
  };
}
