/**
 * @file index.ts
 * @description API publique de wgfleet
 */

export * from './types.js';
export * from './errors.js';
export { loadConfig, parseConfigText, getExampleConfig, DEFAULT_CONFIG_PATH } from './config.js';
export type { FleetConfig, TunnelConfig, ProbeConfig, PostgresConfig, SupabaseConfig, DeviceApiConfig } from './config.js';
export { initI18n, t, getLang } from './i18n.js';
export { AddressPool, ipToNumber, numberToIp, stripCidr } from './tunnel/address-pool.js';
export { ConfigStore, parseConfig, formatPeerBlock, appendPeerBlock, excisePeerBlock, formatParseWarning, isValidPeerName, isValidPublicKey } from './tunnel/config-file.js';
export type { ParsedConfig, ReloadReport, ConfigStoreOptions } from './tunnel/config-file.js';
export { WgQuickDaemon, parseWgDump, readInterfacePeers } from './tunnel/wireguard.js';
export type { TunnelDaemon, WgPeerStatus } from './tunnel/wireguard.js';
export * from './sources/index.js';
export { PeerRegistry } from './registry.js';
export type { MergeResult, ShadowedPeer } from './registry.js';
export { HealthProbe, SystemProbe, DEFAULT_PROBE_OPTIONS } from './health.js';
export type { ProbeCapability, ProbeOptions, ProbeResult, DeviceCheck, DeviceClientFactory } from './health.js';
export { RouterOsClient } from './device/routeros.js';
export type { DeviceApiOptions, DeviceCredentials, DeviceStatus } from './device/routeros.js';
export { generateRouterScript, fileNameFor, quoteRouterOs } from './device/script.js';
export type { RouterScriptOptions } from './device/script.js';
export { ReconciliationService } from './reconciler.js';
export type { OperationResult, OperationStage, OperationKind, PeerStatus, AggregateStatus, ReconcilerOptions } from './reconciler.js';
export { openFleet } from './fleet.js';
export type { FleetContext, FleetOverrides } from './fleet.js';
export { Mutex, KeyedMutex } from './utils/mutex.js';
export { mapWithConcurrency } from './utils/concurrency.js';
export { logger } from './utils/logger.js';
export type { LogLevel, LogFn } from './utils/logger.js';
