/**
 * Numeric token validators.
 *
 * Tokens must consist of the number alone: trailing characters, embedded
 * whitespace and exponents are format errors rather than being ignored.
 * {@link parseLeadingInteger} is the exception, for values that are
 * corrected instead of rejected.
 *
 * @packageDocumentation
 */

import { TIMER_HZ } from '../global/defaults.js';
import type { IntegerBounds, TokenValidation } from './types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const LEADING_INTEGER_PATTERN = /^\s*([+-]?)(\d*)/;
const DECIMAL_PATTERN = /^\+?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parses a decimal integer and checks it against inclusive bounds.
 *
 * @param token - The token to parse.
 * @param bounds - Inclusive minimum and maximum.
 * @returns The integer, or the reason it was rejected.
 *
 * @example
 * ```typescript
 * parseInteger('42', { min: 0, max: 255 });  // { success: true, value: 42 }
 * parseInteger('42x', { min: 0, max: 255 }); // { success: false, reason: 'format' }
 * parseInteger('999', { min: 0, max: 255 }); // { success: false, reason: 'range' }
 * ```
 */
export function parseInteger(token: string, bounds: IntegerBounds): TokenValidation<number> {
  if (!INTEGER_PATTERN.test(token)) {
    return { success: false, reason: 'format' };
  }
  const value = Number(token);
  if (!Number.isSafeInteger(value) || value < bounds.min || value > bounds.max) {
    return { success: false, reason: 'range' };
  }
  // Number('-0') is -0; normalise so snapshots serialise identically.
  return { success: true, value: value === 0 ? 0 : value };
}

/**
 * Parses a whole number of seconds and converts it to timer ticks.
 *
 * @param token - The token to parse.
 * @param bounds - Inclusive bounds in seconds.
 */
export function parseSecondsAsTicks(token: string, bounds: IntegerBounds): TokenValidation<number> {
  const seconds = parseInteger(token, bounds);
  if (!seconds.success) {
    return seconds;
  }
  return { success: true, value: seconds.value * TIMER_HZ };
}

/**
 * Parses a non-negative decimal number of seconds, such as `0.5`, and
 * converts it to timer ticks rounded to the nearest tick.
 *
 * @param token - The token to parse.
 * @param maxSeconds - Largest accepted value in seconds.
 */
export function parseDecimalSecondsAsTicks(
  token: string,
  maxSeconds: number
): TokenValidation<number> {
  if (!DECIMAL_PATTERN.test(token)) {
    return { success: false, reason: 'format' };
  }
  const seconds = Number(token);
  if (!Number.isFinite(seconds) || seconds > maxSeconds) {
    return { success: false, reason: 'range' };
  }
  return { success: true, value: Math.round(seconds * TIMER_HZ) };
}

/**
 * Reads the signed integer a token starts with, ignoring anything after the
 * digits. A token without leading digits reads as 0.
 *
 * Used where a value is corrected rather than rejected; `exact` tells the
 * caller whether the token was an integer and nothing else.
 *
 * @example
 * ```typescript
 * parseLeadingInteger('50x'); // { value: 50, exact: false }
 * parseLeadingInteger('-7');  // { value: -7, exact: true }
 * parseLeadingInteger('abc'); // { value: 0, exact: false }
 * ```
 */
export function parseLeadingInteger(token: string): { readonly value: number; readonly exact: boolean } {
  const match = LEADING_INTEGER_PATTERN.exec(token);
  const sign = match?.[1] ?? '';
  const digits = match?.[2] ?? '';
  const value = digits === '' ? 0 : Number(`${sign}${digits}`);
  return { value: value === 0 ? 0 : value, exact: INTEGER_PATTERN.test(token) };
}

/**
 * Clamps an integer to inclusive bounds.
 *
 * @returns The clamped value and which bound, if any, was applied.
 */
export function clampInteger(
  value: number,
  bounds: IntegerBounds
): { readonly value: number; readonly clamped: 'min' | 'max' | undefined } {
  if (value < bounds.min) {
    return { value: bounds.min, clamped: 'min' };
  }
  if (value > bounds.max) {
    return { value: bounds.max, clamped: 'max' };
  }
  return { value, clamped: undefined };
}

/**
 * Checks that a token is made of decimal digits only.
 */
export function isAllDigits(token: string): boolean {
  return /^\d+$/.test(token);
}
