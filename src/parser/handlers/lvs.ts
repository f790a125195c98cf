/**
 * Load-balancer directives, including the sync daemon.
 *
 * @packageDocumentation
 */

import type { FeatureFlags } from '../../config/types.js';
import { UNSPECIFIED_ADDRESS } from '../../global/defaults.js';
import { isAllDigits, parseInteger } from '../../validators/numeric.js';
import type { HandlerContext } from '../context.js';
import type { DirectiveDefinition } from '../directive.js';
import {
  defineDirective,
  invalidIntegerMessage,
  requireArguments,
  toggleDirective,
} from '../directive.js';
import type { SubOption } from '../sub-options.js';
import { integerSubOption, scanSubOptions } from '../sub-options.js';
import type { TokenLine } from '../token-line.js';
import { resolveMulticastGroup } from './multicast.js';

/**
 * Longest IPVS timeout, 31 days in seconds.
 */
export const LVS_MAX_TIMEOUT = 86400 * 31;

/**
 * Interface names handed to IPVS must be shorter than this.
 */
export const IPVS_IFNAME_MAXLEN = 16;

const SYNC_ID_BOUNDS = { min: 0, max: 255 } as const;

const TIMEOUT_OPTIONS: readonly SubOption[] = [
  integerSubOption('tcp', { min: 0, max: LVS_MAX_TIMEOUT }, (ctx, value) => {
    ctx.data.lvs.timeouts.tcp = value;
  }),
  integerSubOption('tcpfin', { min: 1, max: LVS_MAX_TIMEOUT }, (ctx, value) => {
    ctx.data.lvs.timeouts.tcpfin = value;
  }),
  integerSubOption('udp', { min: 1, max: LVS_MAX_TIMEOUT }, (ctx, value) => {
    ctx.data.lvs.timeouts.udp = value;
  }),
];

const SYNC_ID_OPTION = integerSubOption('id', SYNC_ID_BOUNDS, (ctx, value) => {
  ctx.data.lvs.syncDaemon.syncId = value;
});

const SYNC_ATTRIBUTE_OPTIONS: readonly SubOption[] = [
  // 65535 less the IP and UDP headers
  integerSubOption('maxlen', { min: 1, max: 65535 - 20 - 8 }, (ctx, value) => {
    ctx.data.lvs.syncDaemon.maxlen = value;
  }),
  integerSubOption('port', { min: 1, max: 65535 }, (ctx, value) => {
    ctx.data.lvs.syncDaemon.port = value;
  }),
  integerSubOption('ttl', { min: 1, max: 255 }, (ctx, value) => {
    ctx.data.lvs.syncDaemon.ttl = value;
  }),
  {
    keyword: 'group',
    apply(value, ctx) {
      const group = resolveMulticastGroup(value, undefined, ctx.resolver);
      if (group.success) {
        ctx.data.lvs.syncDaemon.group = group.address;
        return { success: true };
      }
      if (group.reason === 'not-multicast') {
        ctx.data.lvs.syncDaemon.group = UNSPECIFIED_ADDRESS;
        return { success: false, detail: 'not a multicast address' };
      }
      return { success: false, detail: 'unable to resolve' };
    },
  },
];

function handleLegacySyncId(line: TokenLine, ctx: HandlerContext): number {
  const token = line.at(3);
  if (token === undefined || !isAllDigits(token)) {
    return 3;
  }
  ctx.report(
    'lvs_sync_daemon',
    `lvs_sync_daemon id '${token}' given without the 'id' keyword is deprecated`,
    'info'
  );
  const parsed = parseInteger(token, SYNC_ID_BOUNDS);
  if (parsed.success) {
    ctx.data.lvs.syncDaemon.syncId = parsed.value;
  } else {
    ctx.report('lvs_sync_daemon', invalidIntegerMessage('lvs_sync_daemon id', token, SYNC_ID_BOUNDS));
  }
  return 4;
}

/**
 * Builds `lvs_sync_daemon`. The `maxlen`, `port`, `ttl` and `group` options
 * exist only when the `ipvs_syncd_attributes` feature is enabled.
 */
export function lvsSyncDaemonDirective(features: Readonly<FeatureFlags>): DirectiveDefinition {
  const options: readonly SubOption[] = features.ipvs_syncd_attributes
    ? [SYNC_ID_OPTION, ...SYNC_ATTRIBUTE_OPTIONS]
    : [SYNC_ID_OPTION];

  return defineDirective(
    'lvs_sync_daemon',
    (line, ctx) => {
      const syncDaemon = ctx.data.lvs.syncDaemon;
      if (syncDaemon.interfaceName !== undefined) {
        const current = [syncDaemon.interfaceName, syncDaemon.vrrpInstance ?? ''].join(' ').trim();
        ctx.report('lvs_sync_daemon', `lvs_sync_daemon is already set to ${current} - ignoring`, 'info');
        return;
      }
      if (!requireArguments(line, ctx, 2, 'an interface and a VRRP instance')) {
        return;
      }
      const interfaceName = line.at(1) ?? '';
      const vrrpInstance = line.at(2) ?? '';
      if (interfaceName.length >= IPVS_IFNAME_MAXLEN) {
        ctx.report('lvs_sync_daemon', `lvs_sync_daemon interface name '${interfaceName}' is too long`);
        return;
      }
      if (vrrpInstance.length >= IPVS_IFNAME_MAXLEN) {
        ctx.report('lvs_sync_daemon', `lvs_sync_daemon VRRP instance name '${vrrpInstance}' is too long`);
        return;
      }
      syncDaemon.interfaceName = interfaceName;
      syncDaemon.vrrpInstance = vrrpInstance;

      scanSubOptions(line, handleLegacySyncId(line, ctx), options, ctx);
    },
    { features: ['lvs', 'vrrp'] }
  );
}

/**
 * Load-balancer directives that do not depend on other features' settings.
 */
export const lvsDirectives: readonly DirectiveDefinition[] = [
  defineDirective(
    'lvs_timeouts',
    (line, ctx) => {
      if (!requireArguments(line, ctx, 2, 'at least one of tcp, tcpfin or udp with a value')) {
        return;
      }
      scanSubOptions(line, 1, TIMEOUT_OPTIONS, ctx);
    },
    { features: ['lvs'] }
  ),
  toggleDirective(
    'lvs_flush',
    (ctx, enabled) => {
      ctx.data.lvs.flush = enabled;
    },
    { features: ['lvs'] }
  ),
];
