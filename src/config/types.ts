/**
 * Types for the parser's own settings (globaldefs.toml).
 *
 * @packageDocumentation
 */

/**
 * Optional subsystems. Each flag decides whether the directives belonging to
 * that subsystem are present in the directive table at all.
 */
export interface FeatureFlags {
  /** VRRP directives. */
  vrrp: boolean;
  /** Load-balancer (IPVS) directives. */
  lvs: boolean;
  /** BFD process directives. */
  bfd: boolean;
  /** SNMP agent directives. */
  snmp: boolean;
  snmp_vrrp: boolean;
  snmp_rfc: boolean;
  snmp_rfcv2: boolean;
  snmp_rfcv3: boolean;
  snmp_checker: boolean;
  /** DBus directives. */
  dbus: boolean;
  /** Network namespace directives. */
  namespaces: boolean;
  /** Real-time scheduling directives. */
  sched_rt: boolean;
  /** RLIMIT_RTTIME directives (also need sched_rt). */
  rlimit_rttime: boolean;
  /** vrrp_ipsets. */
  ipset: boolean;
  /** maxlen, port, ttl and group options of lvs_sync_daemon. */
  ipvs_syncd_attributes: boolean;
}

/**
 * Name of a feature flag.
 */
export type FeatureName = keyof FeatureFlags;

/**
 * Every feature flag name, in declaration order.
 */
export const FEATURE_NAMES: readonly FeatureName[] = [
  'vrrp',
  'lvs',
  'bfd',
  'snmp',
  'snmp_vrrp',
  'snmp_rfc',
  'snmp_rfcv2',
  'snmp_rfcv3',
  'snmp_checker',
  'dbus',
  'namespaces',
  'sched_rt',
  'rlimit_rttime',
  'ipset',
  'ipvs_syncd_attributes',
];

/**
 * Scheduler limits real-time priorities are clamped to.
 */
export interface SchedulerSettings {
  /** Lowest SCHED_RR priority (default: 1). */
  rt_priority_min: number;
  /** Highest SCHED_RR priority (default: 99). */
  rt_priority_max: number;
}

/**
 * Logging settings.
 */
export interface LoggingSettings {
  /** Whether debug-level entries are written. */
  debug: boolean;
}

/**
 * Complete settings object parsed from globaldefs.toml.
 */
export interface ParserSettings {
  features: FeatureFlags;
  scheduler: SchedulerSettings;
  logging: LoggingSettings;
  /** Host name to numeric address, used for name resolution. */
  hosts: Record<string, string>;
}

/**
 * Partial settings for merging with defaults.
 */
export interface PartialSettings {
  features?: Partial<FeatureFlags>;
  scheduler?: Partial<SchedulerSettings>;
  logging?: Partial<LoggingSettings>;
  hosts?: Record<string, string>;
}
