/**
 * Settings module for globaldefs.toml parsing and validation.
 *
 * Provides typed settings with defaults, semantic validation and
 * environment variable overrides.
 *
 * Override precedence: env > settings file > defaults
 *
 * @packageDocumentation
 */

export { getDefaultSettings, parseSettings, SettingsParseError } from './parser.js';
export type {
  FeatureFlags,
  FeatureName,
  LoggingSettings,
  ParserSettings,
  PartialSettings,
  SchedulerSettings,
} from './types.js';
export { FEATURE_NAMES } from './types.js';
export { DEFAULT_FEATURES, DEFAULT_LOGGING, DEFAULT_SCHEDULER, DEFAULT_SETTINGS } from './defaults.js';
export { assertSettingsValid, SettingsValidationError, validateSettings } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  applyEnvOverrides,
  ENV_PREFIX,
  EnvCoercionError,
  getEnvVarDocumentation,
  mergeSettings,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { DEFAULT_SETTINGS_FILE, loadSettings } from './loader.js';
export type { LoadSettingsOptions } from './loader.js';
