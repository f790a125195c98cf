/**
 * Netlink receive buffer directives.
 *
 * @packageDocumentation
 */

import type { FeatureName } from '../../config/types.js';
import { UINT32_MAX } from '../../global/defaults.js';
import type { GlobalData, NetlinkBuffers } from '../../global/types.js';
import type { DirectiveDefinition } from '../directive.js';
import { integerDirective, toggleDirective } from '../directive.js';

const BUFFER_BOUNDS = { min: 1, max: UINT32_MAX } as const;

/**
 * Builds the command and monitor socket buffer directives, with their
 * `_force` toggles, for `vrrp_` or `lvs_`.
 */
export function netlinkDirectives(
  prefix: string,
  select: (data: GlobalData) => NetlinkBuffers,
  feature: FeatureName
): DirectiveDefinition[] {
  const options = { features: [feature] };
  return [
    integerDirective(
      `${prefix}netlink_cmd_rcv_bufs`,
      BUFFER_BOUNDS,
      (ctx, value) => {
        select(ctx.data).cmdRcvBufs = value;
      },
      options
    ),
    toggleDirective(
      `${prefix}netlink_cmd_rcv_bufs_force`,
      (ctx, enabled) => {
        select(ctx.data).cmdRcvBufsForce = enabled;
      },
      options
    ),
    integerDirective(
      `${prefix}netlink_monitor_rcv_bufs`,
      BUFFER_BOUNDS,
      (ctx, value) => {
        select(ctx.data).monitorRcvBufs = value;
      },
      options
    ),
    toggleDirective(
      `${prefix}netlink_monitor_rcv_bufs_force`,
      (ctx, enabled) => {
        select(ctx.data).monitorRcvBufsForce = enabled;
      },
      options
    ),
  ];
}
