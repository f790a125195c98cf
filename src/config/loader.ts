/**
 * Loads settings from disk and the environment.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'node:fs';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { getDefaultSettings, parseSettings, SettingsParseError } from './parser.js';
import type { ParserSettings } from './types.js';
import { assertSettingsValid } from './validator.js';

/**
 * Settings file looked for in the working directory when no path is given.
 */
export const DEFAULT_SETTINGS_FILE = 'globaldefs.toml';

/**
 * Options for {@link loadSettings}.
 */
export interface LoadSettingsOptions {
  /**
   * Path to the settings file. When omitted, {@link DEFAULT_SETTINGS_FILE} is
   * used if it exists and defaults otherwise.
   */
  readonly path?: string;
  /** Environment to read overrides from. */
  readonly env?: EnvRecord;
}

/**
 * Reads, merges and validates settings.
 *
 * Override precedence: env > settings file > defaults
 *
 * @throws SettingsParseError when an explicitly named file is missing or malformed.
 * @throws SettingsValidationError when the merged settings fail validation.
 * @throws EnvCoercionError when an environment variable cannot be coerced.
 */
export function loadSettings(options: LoadSettingsOptions = {}): ParserSettings {
  const { path, env = process.env } = options;

  let settings: ParserSettings;
  if (path !== undefined) {
    if (!existsSync(path)) {
      throw new SettingsParseError(`Settings file not found: ${path}`);
    }
    settings = parseSettings(readFileSync(path, 'utf-8'));
  } else if (existsSync(DEFAULT_SETTINGS_FILE)) {
    settings = parseSettings(readFileSync(DEFAULT_SETTINGS_FILE, 'utf-8'));
  } else {
    settings = getDefaultSettings();
  }

  const merged = applyEnvOverrides(settings, env);
  assertSettingsValid(merged);
  return merged;
}
