/**
 * Environment variable overrides for settings.
 *
 * Override precedence: env > settings file > defaults
 *
 * @packageDocumentation
 */

import type {
  FeatureName,
  LoggingSettings,
  ParserSettings,
  PartialSettings,
  SchedulerSettings,
} from './types.js';
import { FEATURE_NAMES } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Prefix shared by every recognised environment variable.
 */
export const ENV_PREFIX = 'GLOBALDEFS_';

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { readonly kind: 'feature'; readonly feature: FeatureName }
  | { readonly kind: 'scheduler'; readonly field: keyof SchedulerSettings }
  | { readonly kind: 'logging'; readonly field: keyof LoggingSettings };

function buildEnvMappings(): ReadonlyMap<string, EnvMapping> {
  const mappings = new Map<string, EnvMapping>();
  for (const feature of FEATURE_NAMES) {
    mappings.set(`${ENV_PREFIX}FEATURES_${feature.toUpperCase()}`, { kind: 'feature', feature });
  }
  mappings.set(`${ENV_PREFIX}SCHEDULER_RT_PRIORITY_MIN`, {
    kind: 'scheduler',
    field: 'rt_priority_min',
  });
  mappings.set(`${ENV_PREFIX}SCHEDULER_RT_PRIORITY_MAX`, {
    kind: 'scheduler',
    field: 'rt_priority_max',
  });
  mappings.set(`${ENV_PREFIX}LOGGING_DEBUG`, { kind: 'logging', field: 'debug' });
  // Shortcut
  mappings.set(`${ENV_PREFIX}DEBUG`, { kind: 'logging', field: 'debug' });
  return mappings;
}

const ENV_VAR_MAPPINGS = buildEnvMappings();

/**
 * Coerces a string value to a whole number.
 *
 * @throws EnvCoercionError if the value is not a decimal integer.
 */
function coerceToInteger(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new EnvCoercionError(envVar, value, 'integer');
  }

  return Number(trimmed);
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off', case-insensitively.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function applyMapping(
  overrides: PartialSettings,
  mapping: EnvMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.kind) {
    case 'feature':
      overrides.features = {
        ...overrides.features,
        [mapping.feature]: coerceToBoolean(value, envVar),
      };
      break;
    case 'scheduler':
      overrides.scheduler = {
        ...overrides.scheduler,
        [mapping.field]: coerceToInteger(value, envVar),
      };
      break;
    case 'logging':
      overrides.logging = { ...overrides.logging, [mapping.field]: coerceToBoolean(value, envVar) };
      break;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial settings with values from environment variables. */
  overrides: PartialSettings;
  /** Environment variables that were applied. */
  appliedVars: string[];
  /** Coercion errors, when collected rather than thrown. */
  errors: EnvCoercionError[];
}

/**
 * Reads GLOBALDEFS_* environment variables into partial settings.
 *
 * @param env - The environment to read from.
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing the first.
 * @returns Overrides, the variables applied and any collected errors.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ GLOBALDEFS_FEATURES_BFD: 'off' });
 * overrides.features?.bfd; // false
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialSettings = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(overrides, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges partial settings into full settings.
 */
export function mergeSettings(base: ParserSettings, partial: PartialSettings): ParserSettings {
  return {
    features: { ...base.features, ...partial.features },
    scheduler: { ...base.scheduler, ...partial.scheduler },
    logging: { ...base.logging, ...partial.logging },
    hosts: { ...base.hosts, ...partial.hosts },
  };
}

/**
 * Applies environment variable overrides to settings.
 *
 * @param settings - The settings read from file (or the defaults).
 * @param env - The environment to read from.
 * @returns New settings with the overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(
  settings: ParserSettings,
  env: EnvRecord = process.env
): ParserSettings {
  const { overrides } = readEnvOverrides(env);
  return mergeSettings(settings, overrides);
}

/**
 * Lists every recognised environment variable with a description.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    switch (mapping.kind) {
      case 'feature':
        docs[envVar] = {
          description: `Enable or disable the '${mapping.feature}' directives`,
          type: 'boolean',
        };
        break;
      case 'scheduler':
        docs[envVar] = { description: `Override scheduler.${mapping.field}`, type: 'integer' };
        break;
      case 'logging':
        docs[envVar] = { description: 'Enable debug logging', type: 'boolean' };
        break;
    }
  }
  return docs;
}
