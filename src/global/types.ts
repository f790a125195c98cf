/**
 * Types for the process-wide global configuration record.
 *
 * The record is mutable while a parse pass runs and is handed to the rest of
 * the daemon as a deep-frozen {@link GlobalConfig} afterwards.
 *
 * @packageDocumentation
 */

/**
 * Address family of a resolved socket address.
 */
export type AddressFamily = 'ipv4' | 'ipv6';

/**
 * A resolved socket address, or the unspecified address.
 */
export type SocketAddress =
  | {
      readonly family: 'unspecified';
    }
  | {
      readonly family: AddressFamily;
      /** Canonical textual form of the address. */
      readonly address: string;
      /** Port number, 0 when the address carries none. */
      readonly port: number;
    };

/**
 * A notification script: the command and its arguments as written.
 */
export interface NotifyScript {
  /** Identifier used when reporting on the script, e.g. `vrrp_notify_fifo`. */
  readonly id: string;
  /** Command followed by its arguments. */
  readonly args: readonly string[];
}

/**
 * A FIFO that state changes are written to, with an optional reader script.
 */
export interface NotifyFifo {
  name: string | undefined;
  script: NotifyScript | undefined;
}

/**
 * Netlink socket receive buffer tuning.
 */
export interface NetlinkBuffers {
  cmdRcvBufs: number | undefined;
  cmdRcvBufsForce: boolean;
  monitorRcvBufs: number | undefined;
  monitorRcvBufsForce: boolean;
}

/**
 * Mail and alerting settings.
 */
export interface MailSettings {
  routerId: string | undefined;
  emailFrom: string | undefined;
  /** Recipients, in the order they were configured. */
  emailTo: string[];
  smtpServer: SocketAddress;
  smtpHeloName: string | undefined;
  /** SMTP connect timeout in timer ticks. */
  smtpConnectTimeout: number;
  /** `undefined` lets the alerting subsystem decide. */
  smtpAlert: boolean | undefined;
  smtpAlertVrrp: boolean | undefined;
  smtpAlertChecker: boolean | undefined;
  noEmailFaults: boolean;
}

/**
 * IPVS connection timeouts in seconds. Unset values keep the kernel's.
 */
export interface LvsTimeouts {
  tcp: number | undefined;
  tcpfin: number | undefined;
  udp: number | undefined;
}

/**
 * IPVS connection synchronisation daemon settings.
 */
export interface LvsSyncDaemon {
  interfaceName: string | undefined;
  vrrpInstance: string | undefined;
  /** Unset means the VRRP instance's virtual router id is used. */
  syncId: number | undefined;
  maxlen: number | undefined;
  port: number;
  ttl: number;
  group: SocketAddress;
}

/**
 * Load-balancer tuning.
 */
export interface LvsSettings {
  timeouts: LvsTimeouts;
  flush: boolean;
  syncDaemon: LvsSyncDaemon;
  notifyFifo: NotifyFifo;
  netlink: NetlinkBuffers;
}

/**
 * iptables chains VRRP adds its rules to. Empty means not used.
 */
export interface IptablesChains {
  inChain: string;
  outChain: string;
}

/**
 * ipset names VRRP maintains.
 */
export interface IpsetNames {
  enabled: boolean;
  address: string;
  address6: string;
  addressIface6: string;
}

/**
 * VRRP tuning.
 */
export interface VrrpSettings {
  mcastGroup4: SocketAddress;
  mcastGroup6: SocketAddress;
  /** Gratuitous ARP delay after becoming master, in timer ticks. */
  garpDelay: number;
  garpRepeat: number;
  /** Gratuitous ARP refresh period in seconds, 0 disables. */
  garpRefresh: number;
  garpRefreshRepeat: number;
  garpLowerPrioDelay: number | undefined;
  garpLowerPrioRepeat: number | undefined;
  /** Delay between gratuitous ARPs on one interface, in timer ticks. */
  garpInterval: number;
  /** Delay between unsolicited neighbour advertisements, in timer ticks. */
  gnaInterval: number;
  lowerPrioNoAdvert: boolean;
  higherPrioSendAdvert: boolean;
  checkUnicastSrc: boolean;
  skipCheckAdvAddr: boolean;
  strict: boolean;
  dynamicInterfaces: boolean;
  defaultInterface: string | undefined;
  version: 2 | 3;
  iptables: IptablesChains;
  ipsets: IpsetNames;
  notifyFifo: NotifyFifo;
  netlink: NetlinkBuffers;
}

/**
 * Scheduling tuning for one child process.
 */
export interface ProcessTuning {
  /** Nice value, -20..19. */
  priority: number;
  noSwap: boolean;
  realtimePriority: number | undefined;
  /** RLIMIT_RTTIME in microseconds. */
  rlimitRtTime: number | undefined;
}

/**
 * Child processes that can be tuned.
 */
export type ProcessName = 'vrrp' | 'checker' | 'bfd';

/**
 * User and group notification scripts run as.
 */
export interface ScriptIdentity {
  readonly user: string;
  readonly group: string | undefined;
}

/**
 * Process-control settings.
 */
export interface ControlSettings {
  linkbeatUsePolling: boolean;
  usePidDir: boolean;
  scriptSecurity: boolean;
  /** Seconds to wait for children on shutdown. */
  childWaitTime: number;
  scriptUser: ScriptIdentity | undefined;
  notifyFifo: NotifyFifo;
  /** Set once per process lifetime; frozen across reloads. */
  instanceName: string | undefined;
  networkNamespace: {
    /** Set once per process lifetime; frozen across reloads. */
    name: string | undefined;
    withIpsets: boolean;
  };
}

/**
 * SNMP agent settings.
 */
export interface SnmpSettings {
  socket: string | undefined;
  enableTraps: boolean;
  enableVrrp: boolean;
  enableRfcV2: boolean;
  enableRfcV3: boolean;
  enableChecker: boolean;
}

/**
 * DBus settings.
 */
export interface DbusSettings {
  enabled: boolean;
  serviceName: string | undefined;
}

/**
 * The mutable global configuration record assembled by a parse pass.
 */
export interface GlobalData {
  mail: MailSettings;
  lvs: LvsSettings;
  vrrp: VrrpSettings;
  processes: Record<ProcessName, ProcessTuning>;
  control: ControlSettings;
  snmp: SnmpSettings;
  dbus: DbusSettings;
}

/**
 * Recursively read-only view of a type.
 */
export type DeepReadonly<T> = T extends (infer E)[]
  ? readonly DeepReadonly<E>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * The immutable configuration snapshot consumed after the pass completes.
 */
export type GlobalConfig = DeepReadonly<GlobalData>;
