/**
 * Validators converting tokens into typed values.
 *
 * @packageDocumentation
 */

export type { IntegerBounds, RejectionReason, TokenValidation } from './types.js';
export {
  clampInteger,
  isAllDigits,
  parseDecimalSecondsAsTicks,
  parseInteger,
  parseLeadingInteger,
  parseSecondsAsTicks,
} from './numeric.js';
export { parseBoolean } from './boolean.js';
export {
  isMulticastAddress,
  mayBeNumericAddress,
  parseNumericAddress,
  resolveSocketAddress,
  StaticHostResolver,
} from './address.js';
export type { HostResolver } from './address.js';
