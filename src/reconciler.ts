/**
 * @file reconciler.ts
 * @description Orchestration des opérations sur les peers : fichier du tunnel,
 * sources d'enregistrements et sondes de santé
 */

import { FleetError, errorMessage, isFleetError, type FleetErrorCode } from './errors.js';
import type { HealthProbe } from './health.js';
import { t } from './i18n.js';
import { PeerRegistry, type MergeResult } from './registry.js';
import type { PeerRecord, RecordSource } from './sources/types.js';
import { stripCidr, type AddressPool } from './tunnel/address-pool.js';
import { isValidPeerName, isValidPublicKey, type ConfigStore } from './tunnel/config-file.js';
import type { ConfigPeer, Peer, SourceName } from './types.js';
import { mapWithConcurrency } from './utils/concurrency.js';
import { KeyedMutex, Mutex } from './utils/mutex.js';

// ============================================
// Types
// ============================================

export type OperationKind = 'add' | 'remove' | 'sync';

export type OperationStage =
  | 'requested'
  | 'address_resolved'
  | 'config_written'
  | 'probed'
  | 'records_written'
  | 'done';

export type OperationResult =
  | {
      state: 'done';
      operation: OperationKind;
      peer: string;
      address?: string;
      stages: OperationStage[];
      warnings: string[];
    }
  | {
      state: 'failed';
      operation: OperationKind;
      peer: string;
      /** Dernière étape atteinte avant l'échec */
      stage: OperationStage;
      code: FleetErrorCode;
      reason: string;
      stages: OperationStage[];
      warnings: string[];
    };

export interface PeerStatus {
  name: string;
  publicKey: string;
  address?: string;
  source: SourceName;
  active: boolean;
  online: boolean;
  apiAccessible: boolean;
  lastCheck: Date | null;
  reason?: string;
}

export interface AggregateStatus {
  total: number;
  online: number;
  offline: number;
  peers: PeerStatus[];
  warnings: string[];
}

export interface ReconcilerOptions {
  store: ConfigStore;
  pool: AddressPool;
  /** Par ordre de priorité */
  sources: readonly RecordSource[];
  probe: HealthProbe;
  /** Sondes simultanées lors d'un état global */
  concurrency?: number;
  log?: (msg: string) => void;
}

/**
 * Suivi des étapes franchies par une opération
 */
class OperationTrace {
  readonly stages: OperationStage[] = ['requested'];
  readonly warnings: string[] = [];

  constructor(
    readonly operation: OperationKind,
    readonly peer: string
  ) {}

  reach(stage: OperationStage): void {
    this.stages.push(stage);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  done(address?: string): OperationResult {
    this.reach('done');
    return {
      state: 'done',
      operation: this.operation,
      peer: this.peer,
      address,
      stages: [...this.stages],
      warnings: [...this.warnings],
    };
  }

  failed(code: FleetErrorCode, reason: string): OperationResult {
    return {
      state: 'failed',
      operation: this.operation,
      peer: this.peer,
      stage: this.stages[this.stages.length - 1],
      code,
      reason,
      stages: [...this.stages],
      warnings: [...this.warnings],
    };
  }
}

// ============================================
// ReconciliationService
// ============================================

/**
 * Le fichier du tunnel fait foi : une fois écrit, les échecs des sources
 * d'enregistrements ne sont plus que des avertissements.
 */
export class ReconciliationService {
  private readonly store: ConfigStore;
  private readonly pool: AddressPool;
  private readonly sources: readonly RecordSource[];
  private readonly registry: PeerRegistry;
  private readonly probe: HealthProbe;
  private readonly concurrency: number;
  private readonly log: (msg: string) => void;

  private readonly peerLocks = new KeyedMutex();
  // Résolution d'adresse + écriture du fichier, pour tous les noms
  private readonly allocationLock = new Mutex();

  constructor(options: ReconcilerOptions) {
    this.store = options.store;
    this.pool = options.pool;
    this.sources = options.sources;
    this.registry = new PeerRegistry(options.sources);
    this.probe = options.probe;
    this.concurrency = options.concurrency ?? 16;
    this.log = options.log ?? console.log;
  }

  /**
   * Enregistre un nouveau peer (adresse attribuée si absente)
   */
  async addPeer(name: string, publicKey: string, address?: string): Promise<OperationResult> {
    const trace = new OperationTrace('add', name);

    if (!isValidPeerName(name)) {
      return trace.failed('INVALID_PEER', t('peer.invalidName', { name: JSON.stringify(name) }));
    }
    if (!isValidPublicKey(publicKey)) {
      return trace.failed('INVALID_PEER', t('peer.invalidKey', { name }));
    }

    return this.peerLocks.runExclusive(name, () =>
      this.track(trace, async () => {
        const resolved = await this.allocationLock.runExclusive(async () => {
          const chosen = this.resolveAddress(name, publicKey, address);
          trace.reach('address_resolved');

          const report = await this.store.addPeer({ name, publicKey, address: chosen });
          trace.reach('config_written');
          if (report.warning) trace.warn(report.warning);
          return chosen;
        });

        await this.writeRecord(trace, {
          name,
          publicKey,
          address: resolved,
          active: true,
          apiAccessible: false,
          lastCheck: null,
        });
        trace.reach('records_written');

        return trace.done(resolved);
      })
    );
  }

  /**
   * Retire un peer du tunnel puis de chaque source qui le connaît
   */
  async removePeer(name: string): Promise<OperationResult> {
    const trace = new OperationTrace('remove', name);

    return this.peerLocks.runExclusive(name, () =>
      this.track(trace, async () => {
        const configured = this.store.findPeer(name);
        const report = await this.allocationLock.runExclusive(() => this.store.removePeer(name));
        trace.reach('config_written');
        if (report.warning) trace.warn(report.warning);

        const writable = this.sources.filter((source) => source.writable);
        if (writable.length === 0) {
          trace.warn(t('reconciler.noWritableSource'));
        }
        for (const source of writable) {
          const result = await source.remove(name);
          // Absent d'une source : jamais répliqué, rien à faire
          if (!result.ok && result.error !== 'not_found') {
            trace.warn(t('reconciler.recordRemoveFailed', { source: source.name, error: result.message }));
          }
        }
        trace.reach('records_written');

        return trace.done(configured?.address);
      })
    );
  }

  /**
   * Sonde un peer configuré et enregistre son accessibilité
   */
  async syncPeer(name: string): Promise<OperationResult> {
    const trace = new OperationTrace('sync', name);

    return this.peerLocks.runExclusive(name, () =>
      this.track(trace, async () => {
        const configured = this.store.findPeer(name);
        if (!configured) {
          throw new FleetError('NOT_CONFIGURED', t('peer.notConfigured', { name }));
        }
        trace.reach('address_resolved');

        const probe = await this.probe.check(configured.address);
        if (!probe.reachable) {
          throw new FleetError('UNREACHABLE', probe.reason ?? t('probe.noEcho', { address: configured.address, attempts: probe.attempts }));
        }
        if (!probe.apiAccessible) {
          throw new FleetError('API_UNREACHABLE', probe.reason ?? t('probe.portClosed', { address: configured.address, port: this.probe.apiPort }));
        }
        trace.reach('probed');

        await this.writeProbeOutcome(trace, configured, probe.timestamp);
        trace.reach('records_written');

        return trace.done(configured.address);
      })
    );
  }

  /**
   * Vue fusionnée + sonde de chaque peer, rendue une fois toutes les sondes terminées
   */
  async aggregateStatus(): Promise<AggregateStatus> {
    const merged: MergeResult = await this.registry.merge();
    const peers = await mapWithConcurrency(
      merged.peers,
      Math.min(this.concurrency, merged.peers.length),
      (peer) => this.peerStatus(peer)
    );

    const online = peers.filter((peer) => peer.online).length;
    return {
      total: peers.length,
      online,
      offline: peers.length - online,
      peers,
      warnings: merged.warnings,
    };
  }

  /**
   * Vue fusionnée sans sonde
   */
  listPeers(): Promise<MergeResult> {
    return this.registry.merge();
  }

  // ============================================
  // Étapes internes
  // ============================================

  /**
   * Adresse demandée validée, ou première adresse libre du pool.
   * Les adresses utilisées sont relues dans le fichier à chaque appel.
   */
  private resolveAddress(name: string, publicKey: string, requested?: string): string {
    const configured = this.store.listPeers();

    if (configured.some((peer) => peer.name === name)) {
      throw new FleetError('DUPLICATE_NAME', t('peer.duplicateName', { name }));
    }
    const sameKey = configured.find((peer) => peer.publicKey === publicKey);
    if (sameKey) {
      throw new FleetError('INVALID_PEER', t('peer.keyInUse', { name: sameKey.name }));
    }

    const used = configured.map((peer) => peer.address);
    if (requested === undefined) {
      return this.pool.allocate(used);
    }

    const address = stripCidr(requested.trim());
    if (!this.pool.validate(address)) {
      throw new FleetError('INVALID_ADDRESS', t('peer.invalidAddress', { address: requested, network: this.pool.network }));
    }
    const holder = configured.find((peer) => peer.address === address);
    if (holder) {
      throw new FleetError('ADDRESS_IN_USE', t('peer.addressInUse', { address, name: holder.name }));
    }
    return address;
  }

  /**
   * Première source inscriptible et disponible
   */
  private primaryWritable(): RecordSource | undefined {
    return this.sources.find((source) => source.writable && source.isAvailable());
  }

  private async writeRecord(trace: OperationTrace, record: PeerRecord): Promise<void> {
    const target = this.primaryWritable();
    if (!target) {
      trace.warn(t('reconciler.noWritableSource'));
      return;
    }

    const result = await target.upsert(record);
    if (!result.ok) {
      trace.warn(t('reconciler.recordWriteFailed', { source: target.name, error: result.message }));
    }
  }

  /**
   * Repart de l'enregistrement existant de la source quand il y en a un
   */
  private async writeProbeOutcome(trace: OperationTrace, configured: ConfigPeer, checkedAt: Date): Promise<void> {
    const target = this.primaryWritable();
    if (!target) {
      trace.warn(t('reconciler.noWritableSource'));
      return;
    }

    const current = await target.get(configured.name);
    const base: PeerRecord = current.ok
      ? toRecord(current.value)
      : {
          name: configured.name,
          publicKey: configured.publicKey,
          address: configured.address,
          active: true,
          apiAccessible: false,
          lastCheck: null,
        };

    const result = await target.upsert({
      ...base,
      address: base.address ?? configured.address,
      active: true,
      apiAccessible: true,
      lastCheck: checkedAt,
    });
    if (!result.ok) {
      trace.warn(t('reconciler.recordWriteFailed', { source: target.name, error: result.message }));
    }
  }

  private async peerStatus(peer: Peer): Promise<PeerStatus> {
    const status: PeerStatus = {
      name: peer.name,
      publicKey: peer.publicKey,
      address: peer.address,
      source: peer.source,
      active: peer.active,
      online: false,
      apiAccessible: false,
      lastCheck: peer.lastCheck,
    };

    if (!peer.address) {
      return { ...status, reason: t('status.noAddress') };
    }

    const probe = await this.probe.check(peer.address);
    return {
      ...status,
      online: probe.reachable,
      apiAccessible: probe.reachable && probe.apiAccessible,
      lastCheck: probe.timestamp,
      reason: probe.reason,
    };
  }

  /**
   * Convertit les erreurs d'étape en résultat `failed`
   */
  private async track(trace: OperationTrace, run: () => Promise<OperationResult>): Promise<OperationResult> {
    try {
      return await run();
    } catch (error: unknown) {
      if (isFleetError(error)) {
        return trace.failed(error.code, error.message);
      }
      // Seul ConfigStore lève autre chose qu'une FleetError : lecture ou écriture du fichier
      const reason = t('reconciler.tunnelIoError', { error: errorMessage(error) });
      this.log(reason);
      return trace.failed('TUNNEL_IO', reason);
    }
  }
}

function toRecord(peer: Peer): PeerRecord {
  const { source: _source, ...record } = peer;
  return record;
}
