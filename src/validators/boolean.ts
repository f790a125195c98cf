/**
 * Boolean token validator.
 *
 * @packageDocumentation
 */

import type { TokenValidation } from './types.js';

const TRUE_WORDS: ReadonlySet<string> = new Set(['true', 'on', 'yes']);
const FALSE_WORDS: ReadonlySet<string> = new Set(['false', 'off', 'no']);

/**
 * Parses `true`/`on`/`yes` or `false`/`off`/`no`.
 *
 * Matching is case-sensitive: `TRUE` is a format error.
 *
 * @param token - The token to parse.
 */
export function parseBoolean(token: string): TokenValidation<boolean> {
  if (TRUE_WORDS.has(token)) {
    return { success: true, value: true };
  }
  if (FALSE_WORDS.has(token)) {
    return { success: true, value: false };
  }
  return { success: false, reason: 'format' };
}
