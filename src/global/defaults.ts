/**
 * Default values for the global configuration record.
 *
 * @packageDocumentation
 */

import type {
  GlobalData,
  NetlinkBuffers,
  NotifyFifo,
  ProcessTuning,
  SocketAddress,
} from './types.js';

/**
 * Timer ticks per second. Durations held in ticks are microseconds.
 */
export const TIMER_HZ = 1_000_000;

/**
 * Largest unsigned 32-bit value.
 */
export const UINT32_MAX = 4_294_967_295;

/**
 * Longest duration, in whole seconds, that still fits in 32 bits of ticks.
 */
export const MAX_TICK_SECONDS = Math.floor(UINT32_MAX / TIMER_HZ);

/**
 * Port the SMTP server is contacted on when none is given.
 */
export const DEFAULT_SMTP_PORT = 25;

/**
 * The unspecified socket address.
 */
export const UNSPECIFIED_ADDRESS: SocketAddress = { family: 'unspecified' };

/**
 * IANA-assigned VRRP multicast groups.
 */
export const DEFAULT_VRRP_MCAST_GROUP4: SocketAddress = {
  family: 'ipv4',
  address: '224.0.0.18',
  port: 0,
};
export const DEFAULT_VRRP_MCAST_GROUP6: SocketAddress = {
  family: 'ipv6',
  address: 'ff02::12',
  port: 0,
};

function emptyNotifyFifo(): NotifyFifo {
  return { name: undefined, script: undefined };
}

function defaultNetlinkBuffers(): NetlinkBuffers {
  return {
    cmdRcvBufs: undefined,
    cmdRcvBufsForce: false,
    monitorRcvBufs: undefined,
    monitorRcvBufsForce: false,
  };
}

function defaultProcessTuning(): ProcessTuning {
  return { priority: 0, noSwap: false, realtimePriority: undefined, rlimitRtTime: undefined };
}

/**
 * Creates a fresh record holding every default.
 *
 * Each call returns new objects, so one pass never shares state with another.
 */
export function createDefaultGlobalData(): GlobalData {
  return {
    mail: {
      routerId: undefined,
      emailFrom: undefined,
      emailTo: [],
      smtpServer: UNSPECIFIED_ADDRESS,
      smtpHeloName: undefined,
      smtpConnectTimeout: 30 * TIMER_HZ,
      smtpAlert: undefined,
      smtpAlertVrrp: undefined,
      smtpAlertChecker: undefined,
      noEmailFaults: false,
    },
    lvs: {
      timeouts: { tcp: undefined, tcpfin: undefined, udp: undefined },
      flush: false,
      syncDaemon: {
        interfaceName: undefined,
        vrrpInstance: undefined,
        syncId: undefined,
        maxlen: undefined,
        port: 8848,
        ttl: 1,
        group: UNSPECIFIED_ADDRESS,
      },
      notifyFifo: emptyNotifyFifo(),
      netlink: defaultNetlinkBuffers(),
    },
    vrrp: {
      mcastGroup4: DEFAULT_VRRP_MCAST_GROUP4,
      mcastGroup6: DEFAULT_VRRP_MCAST_GROUP6,
      garpDelay: 5 * TIMER_HZ,
      garpRepeat: 5,
      garpRefresh: 0,
      garpRefreshRepeat: 1,
      garpLowerPrioDelay: undefined,
      garpLowerPrioRepeat: undefined,
      garpInterval: 0,
      gnaInterval: 0,
      lowerPrioNoAdvert: false,
      higherPrioSendAdvert: false,
      checkUnicastSrc: false,
      skipCheckAdvAddr: false,
      strict: false,
      dynamicInterfaces: false,
      defaultInterface: undefined,
      version: 2,
      iptables: { inChain: '', outChain: '' },
      ipsets: { enabled: true, address: 'vrrp', address6: 'vrrp6', addressIface6: 'vrrp_if6' },
      notifyFifo: emptyNotifyFifo(),
      netlink: defaultNetlinkBuffers(),
    },
    processes: {
      vrrp: defaultProcessTuning(),
      checker: defaultProcessTuning(),
      bfd: defaultProcessTuning(),
    },
    control: {
      linkbeatUsePolling: false,
      usePidDir: false,
      scriptSecurity: false,
      childWaitTime: 5,
      scriptUser: undefined,
      notifyFifo: emptyNotifyFifo(),
      instanceName: undefined,
      networkNamespace: { name: undefined, withIpsets: false },
    },
    snmp: {
      socket: undefined,
      enableTraps: false,
      enableVrrp: false,
      enableRfcV2: false,
      enableRfcV3: false,
      enableChecker: false,
    },
    dbus: {
      enabled: false,
      serviceName: undefined,
    },
  };
}
