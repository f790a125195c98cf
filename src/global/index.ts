/**
 * Global configuration record: types, defaults and snapshots.
 *
 * @packageDocumentation
 */

export type {
  AddressFamily,
  ControlSettings,
  DbusSettings,
  DeepReadonly,
  GlobalConfig,
  GlobalData,
  IpsetNames,
  IptablesChains,
  LvsSettings,
  LvsSyncDaemon,
  LvsTimeouts,
  MailSettings,
  NetlinkBuffers,
  NotifyFifo,
  NotifyScript,
  ProcessName,
  ProcessTuning,
  ScriptIdentity,
  SnmpSettings,
  SocketAddress,
  VrrpSettings,
} from './types.js';
export {
  createDefaultGlobalData,
  DEFAULT_SMTP_PORT,
  DEFAULT_VRRP_MCAST_GROUP4,
  DEFAULT_VRRP_MCAST_GROUP6,
  MAX_TICK_SECONDS,
  TIMER_HZ,
  UINT32_MAX,
  UNSPECIFIED_ADDRESS,
} from './defaults.js';
export { serializeGlobalConfig, snapshotGlobalData } from './snapshot.js';
