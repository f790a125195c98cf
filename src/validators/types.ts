/**
 * Shared result types for token validators.
 *
 * @packageDocumentation
 */

/**
 * Why a token was rejected.
 *
 * - `format`: the token is not a value of the expected type
 * - `range`: the token parsed but lies outside the permitted bounds
 */
export type RejectionReason = 'format' | 'range';

/**
 * Outcome of validating one token.
 */
export type TokenValidation<T> =
  | {
      readonly success: true;
      readonly value: T;
    }
  | {
      readonly success: false;
      readonly reason: RejectionReason;
    };

/**
 * Inclusive bounds for an integer value.
 */
export interface IntegerBounds {
  readonly min: number;
  readonly max: number;
}
