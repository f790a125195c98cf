/**
 * SNMP agent directives.
 *
 * @packageDocumentation
 */

import type { FeatureFlags } from '../../config/types.js';
import type { HandlerContext } from '../context.js';
import type { DirectiveDefinition, DirectiveOptions } from '../directive.js';
import { defineDirective, requireArguments, toggleDirective } from '../directive.js';

/** Longest accepted socket path. */
export const SNMP_SOCKET_MAXLEN = 4095;

/** Former name of `enable_snmp_vrrp`. */
export const SNMP_VRRP_LEGACY_NAME = 'enable_snmp_keepalived';

function setSnmpVrrp(ctx: HandlerContext, enabled: boolean): void {
  ctx.data.snmp.enableVrrp = enabled;
}

/**
 * The former name of `enable_snmp_vrrp`: same effect, plus a deprecation
 * notice.
 */
function legacySnmpVrrpDirective(options: DirectiveOptions): DirectiveDefinition {
  const toggle = toggleDirective(SNMP_VRRP_LEGACY_NAME, setSnmpVrrp, options);
  return defineDirective(
    SNMP_VRRP_LEGACY_NAME,
    (line, ctx) => {
      ctx.report(
        SNMP_VRRP_LEGACY_NAME,
        `${SNMP_VRRP_LEGACY_NAME} is deprecated - use enable_snmp_vrrp`,
        'info'
      );
      toggle.handle(line, ctx);
    },
    options
  );
}

/**
 * Builds the SNMP directives. `enable_snmp_rfc` switches on whichever of the
 * RFC MIB versions are present.
 */
export function snmpDirectives(features: Readonly<FeatureFlags>): DirectiveDefinition[] {
  return [
    defineDirective(
      'snmp_socket',
      (line, ctx) => {
        const snmp = ctx.data.snmp;
        if (snmp.socket !== undefined) {
          ctx.report('snmp_socket', `snmp_socket is already set to '${snmp.socket}' - ignoring`, 'info');
          return;
        }
        if (!requireArguments(line, ctx, 1, 'a socket')) {
          return;
        }
        if (line.argumentCount > 1) {
          ctx.report('snmp_socket', `snmp_socket takes exactly one argument, got '${line.from(1).join(' ')}'`);
          return;
        }
        const socket = line.at(1) ?? '';
        if (socket.length > SNMP_SOCKET_MAXLEN) {
          ctx.report(
            'snmp_socket',
            `snmp_socket '${socket.slice(0, 32)}...' is too long (at most ${String(SNMP_SOCKET_MAXLEN)} characters)`
          );
          return;
        }
        snmp.socket = socket;
      },
      { features: ['snmp'] }
    ),
    toggleDirective(
      'enable_traps',
      (ctx, enabled) => {
        ctx.data.snmp.enableTraps = enabled;
      },
      { features: ['snmp'] }
    ),
    toggleDirective('enable_snmp_vrrp', setSnmpVrrp, { features: ['snmp', 'snmp_vrrp'] }),
    legacySnmpVrrpDirective({ features: ['snmp', 'snmp_vrrp'] }),
    toggleDirective(
      'enable_snmp_rfc',
      (ctx, enabled) => {
        if (features.snmp_rfcv2) {
          ctx.data.snmp.enableRfcV2 = enabled;
        }
        if (features.snmp_rfcv3) {
          ctx.data.snmp.enableRfcV3 = enabled;
        }
      },
      { features: ['snmp', 'snmp_rfc'] }
    ),
    toggleDirective(
      'enable_snmp_rfcv2',
      (ctx, enabled) => {
        ctx.data.snmp.enableRfcV2 = enabled;
      },
      { features: ['snmp', 'snmp_rfcv2'] }
    ),
    toggleDirective(
      'enable_snmp_rfcv3',
      (ctx, enabled) => {
        ctx.data.snmp.enableRfcV3 = enabled;
      },
      { features: ['snmp', 'snmp_rfcv3'] }
    ),
    toggleDirective(
      'enable_snmp_checker',
      (ctx, enabled) => {
        ctx.data.snmp.enableChecker = enabled;
      },
      { features: ['snmp', 'snmp_checker'] }
    ),
  ];
}
