/**
 * Default values for globaldefs.toml.
 *
 * @packageDocumentation
 */

import type { FeatureFlags, LoggingSettings, ParserSettings, SchedulerSettings } from './types.js';

/**
 * Every subsystem enabled.
 */
export const DEFAULT_FEATURES: FeatureFlags = {
  vrrp: true,
  lvs: true,
  bfd: true,
  snmp: true,
  snmp_vrrp: true,
  snmp_rfc: true,
  snmp_rfcv2: true,
  snmp_rfcv3: true,
  snmp_checker: true,
  dbus: true,
  namespaces: true,
  sched_rt: true,
  rlimit_rttime: true,
  ipset: true,
  ipvs_syncd_attributes: true,
};

/**
 * SCHED_RR priority range on Linux.
 */
export const DEFAULT_SCHEDULER: SchedulerSettings = {
  rt_priority_min: 1,
  rt_priority_max: 99,
};

export const DEFAULT_LOGGING: LoggingSettings = {
  debug: false,
};

/**
 * Complete default settings.
 */
export const DEFAULT_SETTINGS: ParserSettings = {
  features: DEFAULT_FEATURES,
  scheduler: DEFAULT_SCHEDULER,
  logging: DEFAULT_LOGGING,
  hosts: {},
};
