/**
 * Semantic validation for settings values.
 *
 * Checks what type checking alone cannot:
 * - Real-time priority bounds are integers in 1..99 with min <= max
 * - Hosts entries are numeric address literals
 *
 * @packageDocumentation
 */

import { parseNumericAddress } from '../validators/address.js';
import type { ParserSettings } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class SettingsValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'SettingsValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const RT_PRIORITY_LIMITS = { min: 1, max: 99 } as const;

function validatePriorityBound(value: number, field: string, errors: ValidationError[]): void {
  if (!Number.isInteger(value) || value < RT_PRIORITY_LIMITS.min || value > RT_PRIORITY_LIMITS.max) {
    errors.push({
      field,
      value,
      message: `'${field}' must be an integer between ${String(RT_PRIORITY_LIMITS.min)} and ${String(RT_PRIORITY_LIMITS.max)}, got ${String(value)}`,
    });
  }
}

function validateScheduler(settings: ParserSettings, errors: ValidationError[]): void {
  const { rt_priority_min: min, rt_priority_max: max } = settings.scheduler;
  validatePriorityBound(min, 'scheduler.rt_priority_min', errors);
  validatePriorityBound(max, 'scheduler.rt_priority_max', errors);
  if (min > max) {
    errors.push({
      field: 'scheduler.rt_priority_min',
      value: min,
      message: `'scheduler.rt_priority_min' (${String(min)}) exceeds 'scheduler.rt_priority_max' (${String(max)})`,
    });
  }
}

function validateHosts(settings: ParserSettings, errors: ValidationError[]): void {
  for (const [name, address] of Object.entries(settings.hosts)) {
    if (parseNumericAddress(address, 0) === undefined) {
      errors.push({
        field: `hosts.${name}`,
        value: address,
        message: `Host '${name}' must map to a numeric IPv4 or IPv6 address, got '${address}'`,
      });
    }
  }
}

/**
 * Validates settings semantically.
 *
 * @param settings - The parsed settings.
 * @returns Validation result with any errors.
 */
export function validateSettings(settings: ParserSettings): ValidationResult {
  const errors: ValidationError[] = [];

  validateScheduler(settings, errors);
  validateHosts(settings, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates settings and throws if invalid.
 *
 * @param settings - The parsed settings.
 * @throws SettingsValidationError if validation fails.
 */
export function assertSettingsValid(settings: ParserSettings): void {
  const result = validateSettings(settings);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new SettingsValidationError(
      `Settings validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
