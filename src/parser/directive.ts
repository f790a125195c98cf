/**
 * Directive definitions and the building blocks handlers share.
 *
 * @packageDocumentation
 */

import type { FeatureName } from '../config/types.js';
import { parseBoolean } from '../validators/boolean.js';
import { parseInteger } from '../validators/numeric.js';
import type { IntegerBounds } from '../validators/types.js';
import type { HandlerContext } from './context.js';
import type { TokenLine } from './token-line.js';

/**
 * Validates one line and applies it to the context's record.
 *
 * Handlers never throw: every rejection is reported through the context.
 */
export type DirectiveHandler = (line: TokenLine, ctx: HandlerContext) => void;

/**
 * An entry of the directive table.
 */
export interface DirectiveDefinition {
  /** Name matched against token 0. */
  readonly name: string;
  /** Features that must all be enabled for the directive to exist. */
  readonly features: readonly FeatureName[];
  /** Whether a reload pass skips the directive entirely. */
  readonly frozenOnReload: boolean;
  readonly handle: DirectiveHandler;
}

/**
 * Options accepted by the directive builders.
 */
export interface DirectiveOptions {
  readonly features?: readonly FeatureName[];
  readonly frozenOnReload?: boolean;
}

/**
 * Defines a directive. The returned handler ignores empty lines, so no
 * individual handler has to.
 */
export function defineDirective(
  name: string,
  handle: DirectiveHandler,
  options: DirectiveOptions = {}
): DirectiveDefinition {
  return {
    name,
    features: options.features ?? [],
    frozenOnReload: options.frozenOnReload ?? false,
    handle: (line, ctx) => {
      if (line.isEmpty) {
        return;
      }
      handle(line, ctx);
    },
  };
}

/**
 * Checks that a line has at least `count` arguments, reporting what is
 * missing when it does not.
 *
 * @param what - Description of the required arguments, e.g. `'a server address'`.
 * @returns Whether the line has enough arguments.
 */
export function requireArguments(
  line: TokenLine,
  ctx: HandlerContext,
  count: number,
  what: string
): boolean {
  if (line.argumentCount >= count) {
    return true;
  }
  ctx.report(line.directive, `${line.directive} requires ${what}`, 'info');
  return false;
}

/**
 * Message for an integer token that failed validation.
 */
export function invalidIntegerMessage(subject: string, token: string, bounds: IntegerBounds): string {
  return `Invalid ${subject} '${token}' (expected an integer between ${String(bounds.min)} and ${String(bounds.max)})`;
}

/**
 * A boolean directive. A missing argument means `true`; an unrecognised one
 * is rejected and the field keeps its value.
 */
export function toggleDirective(
  name: string,
  apply: (ctx: HandlerContext, enabled: boolean) => void,
  options: DirectiveOptions = {}
): DirectiveDefinition {
  return defineDirective(
    name,
    (line, ctx) => {
      const token = line.at(1);
      if (token === undefined) {
        apply(ctx, true);
        return;
      }
      const parsed = parseBoolean(token);
      if (!parsed.success) {
        ctx.report(name, `Invalid ${name} value '${token}' (expected true/false, on/off or yes/no)`);
        return;
      }
      apply(ctx, parsed.value);
    },
    options
  );
}

/**
 * A directive taking one string argument, copied as written.
 *
 * @param maxLength - When given, values of this length or longer are rejected.
 */
export function stringDirective(
  name: string,
  what: string,
  apply: (ctx: HandlerContext, value: string) => void,
  options: DirectiveOptions & { readonly maxLength?: number } = {}
): DirectiveDefinition {
  const { maxLength } = options;
  return defineDirective(
    name,
    (line, ctx) => {
      if (!requireArguments(line, ctx, 1, what)) {
        return;
      }
      const value = line.at(1) ?? '';
      if (maxLength !== undefined && value.length >= maxLength) {
        ctx.report(
          name,
          `${name} value '${value}' is too long (must be shorter than ${String(maxLength)} characters)`
        );
        return;
      }
      apply(ctx, value);
    },
    options
  );
}

/**
 * A directive taking one bounded integer. Invalid values are rejected and
 * the field keeps its value.
 */
export function integerDirective(
  name: string,
  bounds: IntegerBounds,
  apply: (ctx: HandlerContext, value: number) => void,
  options: DirectiveOptions = {}
): DirectiveDefinition {
  return defineDirective(
    name,
    (line, ctx) => {
      if (!requireArguments(line, ctx, 1, 'a value')) {
        return;
      }
      const token = line.at(1) ?? '';
      const parsed = parseInteger(token, bounds);
      if (!parsed.success) {
        ctx.report(name, invalidIntegerMessage(`${name} value`, token, bounds));
        return;
      }
      apply(ctx, parsed.value);
    },
    options
  );
}
