/**
 * Process-control directives: identity, namespaces, pid files and scripts.
 *
 * @packageDocumentation
 */

import { UINT32_MAX } from '../../global/defaults.js';
import type { HandlerContext } from '../context.js';
import type { DirectiveDefinition } from '../directive.js';
import {
  defineDirective,
  integerDirective,
  requireArguments,
  toggleDirective,
} from '../directive.js';
import type { TokenLine } from '../token-line.js';

/**
 * Handles a first-wins name. A second occurrence keeps the first value.
 */
function setOnce(
  line: TokenLine,
  ctx: HandlerContext,
  what: string,
  current: string | undefined,
  assign: (value: string) => void
): void {
  if (!requireArguments(line, ctx, 1, what)) {
    return;
  }
  const value = line.at(1) ?? '';
  if (current !== undefined) {
    ctx.report(
      line.directive,
      `${line.directive} is already set to '${current}' - ignoring '${value}'`,
      'info'
    );
    return;
  }
  assign(value);
}

/**
 * Directives available in every build.
 */
export const rootDirectives: readonly DirectiveDefinition[] = [
  defineDirective('global_defs', () => undefined),
  toggleDirective('linkbeat_use_polling', (ctx, enabled) => {
    ctx.data.control.linkbeatUsePolling = enabled;
  }),
  defineDirective(
    'net_namespace',
    (line, ctx) => {
      const control = ctx.data.control;
      setOnce(line, ctx, 'a namespace name', control.networkNamespace.name, (name) => {
        control.networkNamespace.name = name;
        control.usePidDir = true;
      });
    },
    { features: ['namespaces'], frozenOnReload: true }
  ),
  toggleDirective(
    'namespace_with_ipsets',
    (ctx, enabled) => {
      ctx.data.control.networkNamespace.withIpsets = enabled;
    },
    { features: ['namespaces'] }
  ),
  toggleDirective('use_pid_dir', (ctx, enabled) => {
    ctx.data.control.usePidDir = enabled;
  }),
  defineDirective(
    'instance',
    (line, ctx) => {
      const control = ctx.data.control;
      setOnce(line, ctx, 'an instance name', control.instanceName, (name) => {
        control.instanceName = name;
        control.usePidDir = true;
      });
    },
    { frozenOnReload: true }
  ),
  integerDirective('child_wait_time', { min: 0, max: UINT32_MAX }, (ctx, seconds) => {
    ctx.data.control.childWaitTime = seconds;
  }),
  defineDirective('script_user', (line, ctx) => {
    if (!requireArguments(line, ctx, 1, 'a user name')) {
      return;
    }
    const user = line.at(1) ?? '';
    const group = line.at(2);
    const identity = ctx.scriptUsers(user, group);
    if (identity === undefined) {
      const who = group === undefined ? `'${user}'` : `'${user}' group '${group}'`;
      ctx.report('script_user', `Unable to set default script user ${who}`);
      return;
    }
    ctx.data.control.scriptUser = identity;
  }),
  toggleDirective('enable_script_security', (ctx, enabled) => {
    ctx.data.control.scriptSecurity = enabled;
  }),
];
