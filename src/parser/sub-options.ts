/**
 * Order-independent scanner for `keyword value` pairs.
 *
 * Directives such as `lvs_timeouts tcp 10 udp 5` accept optional pairs in
 * any order after their fixed arguments. The scanner walks the remaining
 * tokens with a cursor:
 *
 * - a known keyword followed by a value is applied and the cursor moves 2
 * - a known keyword with a rejected value is reported and the cursor moves 2
 * - a known keyword with no value left is reported and scanning stops
 * - an unknown keyword is reported and the cursor moves 1
 *
 * @packageDocumentation
 */

import type { IntegerBounds } from '../validators/types.js';
import { parseInteger } from '../validators/numeric.js';
import type { HandlerContext } from './context.js';
import type { TokenLine } from './token-line.js';

/**
 * Outcome of applying one value. `detail` is appended to the diagnostic.
 */
export type SubOptionOutcome =
  | { readonly success: true }
  | { readonly success: false; readonly detail?: string };

/**
 * A keyword recognised by the scanner and the rule for its value.
 */
export interface SubOption {
  readonly keyword: string;
  apply(value: string, ctx: HandlerContext): SubOptionOutcome;
}

/**
 * What a scan did, keyword by keyword.
 */
export interface SubOptionScan {
  /** Keywords whose value was applied, in order. */
  readonly applied: readonly string[];
  /** Keywords whose value was rejected. */
  readonly rejected: readonly string[];
  /** Tokens skipped as unknown keywords. */
  readonly unknown: readonly string[];
  /** Whether scanning stopped at a keyword with no value. */
  readonly abandoned: boolean;
}

/**
 * Scans `line` from token `start` for the given sub-options.
 *
 * Every rejection is reported through `ctx` under the line's directive name;
 * a rejected value never stops the keywords after it from being applied.
 */
export function scanSubOptions(
  line: TokenLine,
  start: number,
  options: readonly SubOption[],
  ctx: HandlerContext
): SubOptionScan {
  const byKeyword = new Map(options.map((option) => [option.keyword, option]));
  const directive = line.directive;
  const applied: string[] = [];
  const rejected: string[] = [];
  const unknown: string[] = [];
  let abandoned = false;

  let i = start;
  while (i < line.size) {
    const keyword = line.at(i) ?? '';
    const option = byKeyword.get(keyword);
    if (option === undefined) {
      ctx.report(directive, `Unknown option '${keyword}' specified for ${directive}`);
      unknown.push(keyword);
      i += 1;
      continue;
    }

    const value = line.at(i + 1);
    if (value === undefined) {
      ctx.report(directive, `No value specified for ${directive} ${keyword}`, 'info');
      abandoned = true;
      break;
    }

    const outcome = option.apply(value, ctx);
    if (outcome.success) {
      applied.push(keyword);
    } else {
      const suffix = outcome.detail === undefined ? '' : ` (${outcome.detail})`;
      ctx.report(directive, `Invalid ${directive} ${keyword} '${value}'${suffix}`);
      rejected.push(keyword);
    }
    i += 2;
  }

  return { applied, rejected, unknown, abandoned };
}

/**
 * A sub-option whose value is a bounded integer.
 */
export function integerSubOption(
  keyword: string,
  bounds: IntegerBounds,
  assign: (ctx: HandlerContext, value: number) => void
): SubOption {
  return {
    keyword,
    apply(value, ctx) {
      const parsed = parseInteger(value, bounds);
      if (!parsed.success) {
        return {
          success: false,
          detail: `expected an integer between ${String(bounds.min)} and ${String(bounds.max)}`,
        };
      }
      assign(ctx, parsed.value);
      return { success: true };
    },
  };
}
