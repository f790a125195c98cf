/**
 * Scheduling directives for the child processes.
 *
 * Priorities are corrected rather than rejected: a token is read up to its
 * first non-digit (no digits reads as 0) and the result is clamped to its
 * bounds.
 *
 * @packageDocumentation
 */

import type { FeatureName } from '../../config/types.js';
import type { ProcessName, ProcessTuning } from '../../global/types.js';
import { clampInteger, parseLeadingInteger } from '../../validators/numeric.js';
import type { IntegerBounds } from '../../validators/types.js';
import type { HandlerContext } from '../context.js';
import type { DirectiveDefinition } from '../directive.js';
import {
  defineDirective,
  integerDirective,
  requireArguments,
  toggleDirective,
} from '../directive.js';
import type { TokenLine } from '../token-line.js';

/** Nice values. */
export const PROCESS_PRIORITY_BOUNDS: IntegerBounds = { min: -20, max: 19 };

/**
 * Reads a priority and clamps it, reporting any correction once.
 *
 * @returns The value to store, or `undefined` when the argument is missing.
 */
function clampedPriority(
  line: TokenLine,
  ctx: HandlerContext,
  what: string,
  bounds: IntegerBounds
): number | undefined {
  if (!requireArguments(line, ctx, 1, `a ${what}`)) {
    return undefined;
  }
  const token = line.at(1) ?? '';
  const parsed = parseLeadingInteger(token);
  const clamped = clampInteger(parsed.value, bounds);
  if (clamped.clamped === 'min') {
    ctx.report(
      line.directive,
      `${what} ${token} is less than the minimum ${String(bounds.min)} - using ${String(bounds.min)}`,
      'info'
    );
  } else if (clamped.clamped === 'max') {
    ctx.report(
      line.directive,
      `${what} ${token} is greater than the maximum ${String(bounds.max)} - using ${String(bounds.max)}`,
      'info'
    );
  } else if (!parsed.exact) {
    ctx.report(
      line.directive,
      `${what} '${token}' is not an integer - using ${String(clamped.value)}`,
      'info'
    );
  }
  return clamped.value;
}

/**
 * Builds the `<process>_priority`, `_no_swap`, `_rt_priority` and
 * `_rlimit_rtime` directives for one child process.
 *
 * @param process - Which child process the directives tune.
 * @param feature - Feature the process belongs to.
 */
export function processDirectives(process: ProcessName, feature: FeatureName): DirectiveDefinition[] {
  const tuning = (ctx: HandlerContext): ProcessTuning => ctx.data.processes[process];
  return [
    defineDirective(
      `${process}_priority`,
      (line, ctx) => {
        const value = clampedPriority(line, ctx, `${process} process priority`, PROCESS_PRIORITY_BOUNDS);
        if (value !== undefined) {
          tuning(ctx).priority = value;
        }
      },
      { features: [feature] }
    ),
    toggleDirective(
      `${process}_no_swap`,
      (ctx, enabled) => {
        tuning(ctx).noSwap = enabled;
      },
      { features: [feature] }
    ),
    defineDirective(
      `${process}_rt_priority`,
      (line, ctx) => {
        const value = clampedPriority(
          line,
          ctx,
          `${process} process real-time priority`,
          ctx.scheduler.realtimePriority
        );
        if (value !== undefined) {
          tuning(ctx).realtimePriority = value;
        }
      },
      { features: [feature, 'sched_rt'] }
    ),
    integerDirective(
      `${process}_rlimit_rtime`,
      { min: 0, max: Number.MAX_SAFE_INTEGER },
      (ctx, value) => {
        tuning(ctx).rlimitRtTime = value;
      },
      { features: [feature, 'sched_rt', 'rlimit_rttime'] }
    ),
  ];
}
