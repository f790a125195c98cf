/**
 * The complete directive vocabulary.
 *
 * @packageDocumentation
 */

import type { FeatureFlags } from '../../config/types.js';
import type { DirectiveDefinition } from '../directive.js';
import { dbusDirectives } from './dbus.js';
import { lvsDirectives, lvsSyncDaemonDirective } from './lvs.js';
import { mailDirectives } from './mail.js';
import { netlinkDirectives } from './netlink.js';
import { notifyFifoDirectives } from './notify.js';
import { processDirectives } from './process.js';
import { rootDirectives } from './root.js';
import { snmpDirectives } from './snmp.js';
import { vrrpDirectives } from './vrrp.js';

/**
 * Every directive definition, before feature filtering. Definitions whose
 * behaviour depends on which features are present are built for `features`.
 */
export function allDirectives(features: Readonly<FeatureFlags>): DirectiveDefinition[] {
  return [
    ...rootDirectives,
    ...mailDirectives,
    ...lvsDirectives,
    lvsSyncDaemonDirective(features),
    ...processDirectives('checker', 'lvs'),
    ...netlinkDirectives('lvs_', (data) => data.lvs.netlink, 'lvs'),
    ...notifyFifoDirectives('lvs_', (data) => data.lvs.notifyFifo, ['lvs']),
    ...vrrpDirectives,
    ...processDirectives('vrrp', 'vrrp'),
    ...netlinkDirectives('vrrp_', (data) => data.vrrp.netlink, 'vrrp'),
    ...notifyFifoDirectives('vrrp_', (data) => data.vrrp.notifyFifo, ['vrrp']),
    ...processDirectives('bfd', 'bfd'),
    ...notifyFifoDirectives('', (data) => data.control.notifyFifo),
    ...snmpDirectives(features),
    ...dbusDirectives,
  ];
}

export { lvsSyncDaemonDirective, LVS_MAX_TIMEOUT, IPVS_IFNAME_MAXLEN } from './lvs.js';
export { deriveIpsetNames, IFNAME_MAXLEN, IPSET_NAME_MAXLEN, IPTABLES_CHAIN_MAXLEN } from './vrrp.js';
export { PROCESS_PRIORITY_BOUNDS } from './process.js';
export { SNMP_SOCKET_MAXLEN, SNMP_VRRP_LEGACY_NAME } from './snmp.js';
export { resolveMulticastGroup } from './multicast.js';
export type { MulticastResolution } from './multicast.js';
