/**
 * @file fleet.ts
 * @description Assemblage des composants à partir de la configuration
 */

import type { FleetConfig } from './config.js';
import { RouterOsClient } from './device/routeros.js';
import { HealthProbe, SystemProbe, type DeviceClientFactory, type ProbeCapability } from './health.js';
import { ReconciliationService } from './reconciler.js';
import { closeRecordSources, createRecordSources } from './sources/index.js';
import type { RecordSource } from './sources/types.js';
import { AddressPool } from './tunnel/address-pool.js';
import { ConfigStore } from './tunnel/config-file.js';
import { WgQuickDaemon, readInterfacePeers, type TunnelDaemon, type WgPeerStatus } from './tunnel/wireguard.js';
import { logger } from './utils/logger.js';

export interface FleetContext {
  config: FleetConfig;
  store: ConfigStore;
  pool: AddressPool;
  sources: RecordSource[];
  probe: HealthProbe;
  reconciler: ReconciliationService;
  /** État live de l'interface (`wg show dump`), null si indisponible */
  readLive(): Promise<WgPeerStatus[] | null>;
  close(): Promise<void>;
}

/**
 * Remplacements des dépendances système (tests, intégration)
 */
export interface FleetOverrides {
  daemon?: TunnelDaemon | null;
  capability?: ProbeCapability;
  sources?: RecordSource[];
  deviceFactory?: DeviceClientFactory;
  readLive?: () => Promise<WgPeerStatus[] | null>;
}

export async function openFleet(config: FleetConfig, overrides: FleetOverrides = {}): Promise<FleetContext> {
  const { tunnel, probe: probeConfig, device } = config;

  const pool = new AddressPool(tunnel.network, tunnel.gateway);
  const daemon = overrides.daemon !== undefined
    ? overrides.daemon
    : tunnel.reload ? new WgQuickDaemon() : null;

  const store = new ConfigStore({
    path: tunnel.configPath,
    interfaceName: tunnel.interface,
    daemon,
    log: logger.createSimpleLogger('info', 'tunnel'),
  });

  const sources = overrides.sources ?? await createRecordSources(config, store);

  const deviceFactory: DeviceClientFactory = overrides.deviceFactory ?? ((address, credentials) =>
    new RouterOsClient(address, credentials, {
      scheme: device.scheme,
      port: device.port,
      verifyTls: device.verifyTls,
      timeoutMs: device.timeoutMs,
    }));

  const probe = new HealthProbe(
    { timeoutMs: probeConfig.timeoutMs, attempts: probeConfig.attempts, apiPort: probeConfig.apiPort },
    overrides.capability ?? new SystemProbe(),
    logger.createSimpleLogger('debug', 'probe'),
    deviceFactory
  );

  const reconciler = new ReconciliationService({
    store,
    pool,
    sources,
    probe,
    concurrency: probeConfig.concurrency,
    log: logger.createSimpleLogger('error', 'reconciler'),
  });

  return {
    config,
    store,
    pool,
    sources,
    probe,
    reconciler,
    readLive: overrides.readLive ?? (() => readInterfacePeers(tunnel.interface)),
    close: () => closeRecordSources(sources),
  };
}
