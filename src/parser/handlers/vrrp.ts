/**
 * VRRP tuning directives.
 *
 * @packageDocumentation
 */

import { MAX_TICK_SECONDS, TIMER_HZ, UINT32_MAX, UNSPECIFIED_ADDRESS } from '../../global/defaults.js';
import type { AddressFamily, IpsetNames, SocketAddress, VrrpSettings } from '../../global/types.js';
import {
  parseDecimalSecondsAsTicks,
  parseInteger,
  parseSecondsAsTicks,
} from '../../validators/numeric.js';
import type { IntegerBounds } from '../../validators/types.js';
import type { HandlerContext } from '../context.js';
import type { DirectiveDefinition, DirectiveOptions } from '../directive.js';
import {
  defineDirective,
  integerDirective,
  invalidIntegerMessage,
  requireArguments,
  stringDirective,
  toggleDirective,
} from '../directive.js';
import { resolveMulticastGroup } from './multicast.js';

/** iptables chain names must be shorter than this. */
export const IPTABLES_CHAIN_MAXLEN = 28;

/** ipset names must be shorter than this. */
export const IPSET_NAME_MAXLEN = 31;

/** Interface names must be shorter than this. */
export const IFNAME_MAXLEN = 16;

const VRRP: DirectiveOptions = { features: ['vrrp'] };

function vrrpToggle(
  name: string,
  field:
    | 'dynamicInterfaces'
    | 'lowerPrioNoAdvert'
    | 'higherPrioSendAdvert'
    | 'checkUnicastSrc'
    | 'skipCheckAdvAddr'
    | 'strict'
): DirectiveDefinition {
  return toggleDirective(
    name,
    (ctx, enabled) => {
      ctx.data.vrrp[field] = enabled;
    },
    VRRP
  );
}

function mcastGroupDirective(
  name: string,
  family: AddressFamily,
  assign: (vrrp: VrrpSettings, address: SocketAddress) => void
): DirectiveDefinition {
  const label = family === 'ipv4' ? 'IPv4' : 'IPv6';
  return defineDirective(
    name,
    (line, ctx) => {
      if (!requireArguments(line, ctx, 1, 'a multicast address')) {
        return;
      }
      const token = line.at(1) ?? '';
      const group = resolveMulticastGroup(token, family, ctx.resolver);
      if (group.success) {
        assign(ctx.data.vrrp, group.address);
        return;
      }
      if (group.reason === 'unresolved') {
        ctx.report(name, `Unable to resolve ${name} address '${token}'`);
        return;
      }
      assign(ctx.data.vrrp, UNSPECIFIED_ADDRESS);
      ctx.report(name, `${name} address '${token}' is not an ${label} multicast address`);
    },
    VRRP
  );
}

function delayDirective(
  name: string,
  assign: (vrrp: VrrpSettings, ticks: number) => void
): DirectiveDefinition {
  const bounds: IntegerBounds = { min: 0, max: MAX_TICK_SECONDS };
  return defineDirective(
    name,
    (line, ctx) => {
      if (!requireArguments(line, ctx, 1, 'a delay in seconds')) {
        return;
      }
      const token = line.at(1) ?? '';
      const parsed = parseSecondsAsTicks(token, bounds);
      if (!parsed.success) {
        ctx.report(name, invalidIntegerMessage(`${name} value`, token, bounds));
        return;
      }
      assign(ctx.data.vrrp, parsed.value);
    },
    VRRP
  );
}

function intervalDirective(
  name: string,
  assign: (vrrp: VrrpSettings, ticks: number) => void
): DirectiveDefinition {
  return defineDirective(
    name,
    (line, ctx) => {
      if (!requireArguments(line, ctx, 1, 'an interval in seconds')) {
        return;
      }
      const token = line.at(1) ?? '';
      const parsed = parseDecimalSecondsAsTicks(token, MAX_TICK_SECONDS);
      if (!parsed.success) {
        ctx.report(
          name,
          `Invalid ${name} value '${token}' (expected seconds between 0 and ${String(MAX_TICK_SECONDS)})`
        );
        return;
      }
      if (parsed.value >= TIMER_HZ) {
        ctx.report(name, `${name} of ${token} seconds is very large`, 'info');
      }
      assign(ctx.data.vrrp, parsed.value);
    },
    VRRP
  );
}

function vrrpInteger(
  name: string,
  bounds: IntegerBounds,
  assign: (vrrp: VrrpSettings, value: number) => void
): DirectiveDefinition {
  return integerDirective(name, bounds, (ctx, value) => {
    assign(ctx.data.vrrp, value);
  }, VRRP);
}

function rejectLongName(
  ctx: HandlerContext,
  directive: string,
  what: string,
  name: string,
  maxLength: number
): boolean {
  if (name.length < maxLength) {
    return false;
  }
  ctx.report(
    directive,
    `${directive} ${what} '${name}' is too long (must be shorter than ${String(maxLength)} characters)`
  );
  return true;
}

/**
 * Derives the ipset names not given explicitly from the ones that were.
 */
export function deriveIpsetNames(
  address: string,
  address6: string | undefined,
  addressIface6: string | undefined
): Omit<IpsetNames, 'enabled'> {
  const v6 = address6 ?? `${address.slice(0, IPSET_NAME_MAXLEN - 1)}6`;
  const base = v6.endsWith('6') ? v6.slice(0, -1) : v6;
  const iface6 = addressIface6 ?? `${base.slice(0, IPSET_NAME_MAXLEN - 4)}_if6`;
  return { address, address6: v6, addressIface6: iface6 };
}

const vrrpIptables = defineDirective(
  'vrrp_iptables',
  (line, ctx) => {
    const chains = ctx.data.vrrp.iptables;
    chains.inChain = '';
    chains.outChain = '';
    const inChain = line.at(1);
    const outChain = line.at(2);
    if (inChain === undefined) {
      return;
    }
    if (rejectLongName(ctx, 'vrrp_iptables', 'in chain', inChain, IPTABLES_CHAIN_MAXLEN)) {
      return;
    }
    chains.inChain = inChain;
    if (
      outChain === undefined ||
      rejectLongName(ctx, 'vrrp_iptables', 'out chain', outChain, IPTABLES_CHAIN_MAXLEN)
    ) {
      return;
    }
    chains.outChain = outChain;
  },
  VRRP
);

const vrrpIpsets = defineDirective(
  'vrrp_ipsets',
  (line, ctx) => {
    const ipsets = ctx.data.vrrp.ipsets;
    const address = line.at(1);
    if (address === undefined) {
      ipsets.enabled = false;
      return;
    }
    const address6 = line.at(2);
    const addressIface6 = line.at(3);
    if (rejectLongName(ctx, 'vrrp_ipsets', 'address', address, IPSET_NAME_MAXLEN)) {
      return;
    }
    ipsets.enabled = true;
    ipsets.address = address;
    // Applied in order: names after a rejected one keep their previous values.
    if (
      address6 !== undefined &&
      rejectLongName(ctx, 'vrrp_ipsets', 'IPv6 address', address6, IPSET_NAME_MAXLEN)
    ) {
      return;
    }
    const derived = deriveIpsetNames(address, address6, addressIface6);
    ipsets.address6 = derived.address6;
    if (
      addressIface6 !== undefined &&
      rejectLongName(ctx, 'vrrp_ipsets', 'IPv6 interface address', addressIface6, IPSET_NAME_MAXLEN)
    ) {
      return;
    }
    ipsets.addressIface6 = derived.addressIface6;
  },
  { features: ['vrrp', 'ipset'] }
);

export const vrrpDirectives: readonly DirectiveDefinition[] = [
  vrrpToggle('dynamic_interfaces', 'dynamicInterfaces'),
  stringDirective(
    'default_interface',
    'an interface name',
    (ctx, value) => {
      ctx.data.vrrp.defaultInterface = value;
    },
    { ...VRRP, maxLength: IFNAME_MAXLEN }
  ),
  mcastGroupDirective('vrrp_mcast_group4', 'ipv4', (vrrp, address) => {
    vrrp.mcastGroup4 = address;
  }),
  mcastGroupDirective('vrrp_mcast_group6', 'ipv6', (vrrp, address) => {
    vrrp.mcastGroup6 = address;
  }),
  delayDirective('vrrp_garp_master_delay', (vrrp, ticks) => {
    vrrp.garpDelay = ticks;
  }),
  vrrpInteger('vrrp_garp_master_repeat', { min: 1, max: UINT32_MAX }, (vrrp, value) => {
    vrrp.garpRepeat = value;
  }),
  vrrpInteger('vrrp_garp_master_refresh', { min: 0, max: UINT32_MAX }, (vrrp, value) => {
    vrrp.garpRefresh = value;
  }),
  vrrpInteger('vrrp_garp_master_refresh_repeat', { min: 1, max: UINT32_MAX }, (vrrp, value) => {
    vrrp.garpRefreshRepeat = value;
  }),
  delayDirective('vrrp_garp_lower_prio_delay', (vrrp, ticks) => {
    vrrp.garpLowerPrioDelay = ticks;
  }),
  vrrpInteger('vrrp_garp_lower_prio_repeat', { min: 0, max: UINT32_MAX }, (vrrp, value) => {
    vrrp.garpLowerPrioRepeat = value;
  }),
  intervalDirective('vrrp_garp_interval', (vrrp, ticks) => {
    vrrp.garpInterval = ticks;
  }),
  intervalDirective('vrrp_gna_interval', (vrrp, ticks) => {
    vrrp.gnaInterval = ticks;
  }),
  vrrpToggle('vrrp_lower_prio_no_advert', 'lowerPrioNoAdvert'),
  vrrpToggle('vrrp_higher_prio_send_advert', 'higherPrioSendAdvert'),
  defineDirective(
    'vrrp_version',
    (line, ctx) => {
      if (!requireArguments(line, ctx, 1, 'a version')) {
        return;
      }
      const token = line.at(1) ?? '';
      const parsed = parseInteger(token, { min: 2, max: 3 });
      if (!parsed.success) {
        ctx.report('vrrp_version', `Invalid vrrp_version '${token}' (expected 2 or 3)`);
        return;
      }
      ctx.data.vrrp.version = parsed.value === 3 ? 3 : 2;
    },
    VRRP
  ),
  vrrpIptables,
  vrrpIpsets,
  vrrpToggle('vrrp_check_unicast_src', 'checkUnicastSrc'),
  vrrpToggle('vrrp_skip_check_adv_addr', 'skipCheckAdvAddr'),
  vrrpToggle('vrrp_strict', 'strict'),
];
