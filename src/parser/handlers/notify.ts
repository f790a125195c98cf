/**
 * Notification FIFO directives for the global, VRRP and load-balancer
 * variants.
 *
 * @packageDocumentation
 */

import type { FeatureName } from '../../config/types.js';
import type { GlobalData, NotifyFifo } from '../../global/types.js';
import type { DirectiveDefinition } from '../directive.js';
import { defineDirective, requireArguments } from '../directive.js';

/**
 * Builds `<prefix>notify_fifo` and `<prefix>notify_fifo_script`. Both are
 * first-wins.
 *
 * @param prefix - `''`, `'vrrp_'` or `'lvs_'`.
 * @param select - Picks the FIFO the directives configure.
 */
export function notifyFifoDirectives(
  prefix: string,
  select: (data: GlobalData) => NotifyFifo,
  features: readonly FeatureName[] = []
): DirectiveDefinition[] {
  const fifoName = `${prefix}notify_fifo`;
  const scriptName = `${prefix}notify_fifo_script`;
  return [
    defineDirective(
      fifoName,
      (line, ctx) => {
        const fifo = select(ctx.data);
        if (fifo.name !== undefined) {
          ctx.report(fifoName, `${fifoName} is already set to '${fifo.name}' - ignoring`, 'info');
          return;
        }
        if (!requireArguments(line, ctx, 1, 'a FIFO path')) {
          return;
        }
        fifo.name = line.at(1);
      },
      { features }
    ),
    defineDirective(
      scriptName,
      (line, ctx) => {
        const fifo = select(ctx.data);
        if (fifo.script !== undefined) {
          ctx.report(
            scriptName,
            `${scriptName} is already set to '${fifo.script.args.join(' ')}' - ignoring`,
            'info'
          );
          return;
        }
        if (!requireArguments(line, ctx, 1, 'a script')) {
          return;
        }
        fifo.script = { id: fifoName, args: line.from(1) };
      },
      { features }
    ),
  ];
}
