import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ReconciliationService } from './reconciler.js';
import { HealthProbe, type ProbeCapability } from './health.js';
import { fail, ok, type PeerRecord, type RecordSource, type SourceError, type SourceResult } from './sources/types.js';
import { AddressPool } from './tunnel/address-pool.js';
import { ConfigStore } from './tunnel/config-file.js';
import type { Peer, SourceName } from './types.js';
import { t } from './i18n.js';

const HEADER = '[Interface]\nAddress = 10.10.0.1/24\nListenPort = 51820\nPrivateKey = test-server-private\n';

/**
 * Source inscriptible en mémoire ; `failWith` force le résultat des écritures
 */
class MemorySource implements RecordSource {
  readonly writable = true;
  records = new Map<string, PeerRecord>();
  failWith: SourceError | null = null;
  available = true;

  constructor(readonly name: SourceName = 'postgres') {}

  async init(): Promise<boolean> {
    return this.available;
  }

  isAvailable(): boolean {
    return this.available;
  }

  async list(): Promise<SourceResult<Peer[]>> {
    if (!this.available) return fail('unavailable', 'hors service');
    return ok([...this.records.values()].map((r) => ({ ...r, source: this.name })));
  }

  async get(name: string): Promise<SourceResult<Peer>> {
    const found = this.records.get(name);
    return found ? ok({ ...found, source: this.name }) : fail('not_found', name);
  }

  async upsert(peer: PeerRecord): Promise<SourceResult<void>> {
    if (this.failWith) return fail(this.failWith, `${this.failWith} forcé`);
    this.records.set(peer.name, { ...peer });
    return ok(undefined);
  }

  async remove(name: string): Promise<SourceResult<void>> {
    if (this.failWith) return fail(this.failWith, `${this.failWith} forcé`);
    return this.records.delete(name) ? ok(undefined) : fail('not_found', name);
  }

  async healthCheck(): Promise<boolean> {
    return this.available;
  }

  async close(): Promise<void> {}
}

/**
 * Réseau simulé : adresses joignables et ports API ouverts
 */
class FakeNetwork implements ProbeCapability {
  reachable = new Set<string>();
  apiOpen = new Set<string>();
  inFlight = 0;
  peak = 0;

  async ping(address: string): Promise<boolean> {
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inFlight--;
    return this.reachable.has(address);
  }

  async portOpen(address: string): Promise<boolean> {
    return this.apiOpen.has(address);
  }
}

describe('ReconciliationService', () => {
  let dir: string;
  let path: string;
  let store: ConfigStore;
  let source: MemorySource;
  let network: FakeNetwork;
  let service: ReconciliationService;

  function build(sources: RecordSource[], concurrency = 16): ReconciliationService {
    return new ReconciliationService({
      store,
      pool: new AddressPool('10.10.0.0/24', '10.10.0.1'),
      sources,
      probe: new HealthProbe({ timeoutMs: 100, attempts: 1, apiPort: 8728 }, network, () => undefined),
      concurrency,
      log: () => undefined,
    });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'wgfleet-rec-'));
    path = join(dir, 'wg0.conf');
    writeFileSync(path, HEADER);
    store = new ConfigStore({ path, interfaceName: 'wg0', daemon: null, log: () => undefined });
    source = new MemorySource();
    network = new FakeNetwork();
    service = build([source]);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('addPeer', () => {
    it('attribue une adresse, écrit le fichier puis la base', async () => {
      const result = await service.addPeer('r1', 'key-r1');

      expect(result).toEqual({
        state: 'done',
        operation: 'add',
        peer: 'r1',
        address: '10.10.0.2',
        stages: ['requested', 'address_resolved', 'config_written', 'records_written', 'done'],
        warnings: [],
      });
      expect(store.findPeer('r1')?.address).toBe('10.10.0.2');
      expect(source.records.get('r1')).toEqual({
        name: 'r1', publicKey: 'key-r1', address: '10.10.0.2', active: true, apiAccessible: false, lastCheck: null,
      });
    });

    it('attribue 10.10.0.5 après trois ajouts', async () => {
      for (const name of ['r1', 'r2', 'r3']) {
        await service.addPeer(name, `key-${name}`);
      }
      const fourth = await service.addPeer('r4', 'key-r4');
      expect(fourth.state === 'done' && fourth.address).toBe('10.10.0.5');
    });

    it('conserve les deux ajouts concurrents', async () => {
      const [r1, r2] = await Promise.all([
        service.addPeer('r1', 'key-r1'),
        service.addPeer('r2', 'key-r2'),
      ]);

      expect(r1.state).toBe('done');
      expect(r2.state).toBe('done');
      const peers = store.listPeers();
      expect(peers.map((p) => p.name).sort()).toEqual(['r1', 'r2']);
      expect(new Set(peers.map((p) => p.address)).size).toBe(2);
    });

    it('échoue vite sur un nom déjà configuré', async () => {
      await service.addPeer('r1', 'key-r1');
      const before = readFileSync(path, 'utf-8');
      source.records.clear();

      const result = await service.addPeer('r1', 'key-other');
      expect(result).toMatchObject({ state: 'failed', stage: 'requested', code: 'DUPLICATE_NAME' });
      expect(readFileSync(path, 'utf-8')).toBe(before);
      expect(source.records.size).toBe(0);
    });

    it('valide l’adresse demandée', async () => {
      await service.addPeer('r1', 'key-r1', '10.10.0.20');

      expect(await service.addPeer('r2', 'key-r2', '10.10.0.1')).toMatchObject({ state: 'failed', code: 'INVALID_ADDRESS' });
      expect(await service.addPeer('r2', 'key-r2', '10.10.0.20/32')).toMatchObject({
        state: 'failed',
        code: 'ADDRESS_IN_USE',
        reason: t('peer.addressInUse', { address: '10.10.0.20', name: 'r1' }),
      });
      expect(await service.addPeer('r2', 'key-r1')).toMatchObject({ state: 'failed', code: 'INVALID_PEER' });
    });

    it('refuse un nom ou une clé invalides', async () => {
      expect(await service.addPeer(' r1', 'key-r1')).toMatchObject({ state: 'failed', stage: 'requested', code: 'INVALID_PEER' });
      expect(await service.addPeer('r1', 'key with space')).toMatchObject({ state: 'failed', code: 'INVALID_PEER' });
      expect(store.listPeers()).toEqual([]);
    });

    it('distingue une erreur du fichier du tunnel d’une base indisponible', async () => {
      rmSync(path);
      mkdirSync(path);

      const result = await service.addPeer('r1', 'key-r1');
      expect(result).toMatchObject({ state: 'failed', stage: 'requested', code: 'TUNNEL_IO' });
      expect(source.records.size).toBe(0);
    });

    it('termine avec un avertissement si la base refuse l’écriture', async () => {
      source.failWith = 'conflict';
      const result = await service.addPeer('r1', 'key-r1');

      expect(result).toMatchObject({
        state: 'done',
        warnings: [t('reconciler.recordWriteFailed', { source: 'postgres', error: 'conflict forcé' })],
      });
      expect(store.findPeer('r1')).toBeDefined();
    });

    it('termine avec un avertissement sans base disponible', async () => {
      source.available = false;
      const result = await service.addPeer('r1', 'key-r1');
      expect(result).toMatchObject({ state: 'done', warnings: [t('reconciler.noWritableSource')] });
    });

    it('lève EXHAUSTED quand le pool est plein', async () => {
      const tiny = new ReconciliationService({
        store,
        pool: new AddressPool('10.10.0.0/30', '10.10.0.1'),
        sources: [source],
        probe: new HealthProbe({ timeoutMs: 100, attempts: 1 }, network, () => undefined),
        log: () => undefined,
      });

      expect((await tiny.addPeer('r1', 'key-r1')).state).toBe('done');
      expect(await tiny.addPeer('r2', 'key-r2')).toMatchObject({ state: 'failed', stage: 'requested', code: 'EXHAUSTED' });
    });
  });

  describe('removePeer', () => {
    it('retire le peer du fichier et de la base', async () => {
      await service.addPeer('r1', 'key-r1');
      const result = await service.removePeer('r1');

      expect(result).toEqual({
        state: 'done',
        operation: 'remove',
        peer: 'r1',
        address: '10.10.0.2',
        stages: ['requested', 'config_written', 'records_written', 'done'],
        warnings: [],
      });
      expect(readFileSync(path, 'utf-8')).toBe(HEADER);
      expect(source.records.has('r1')).toBe(false);
    });

    it('ignore un enregistrement absent de la base', async () => {
      await service.addPeer('r1', 'key-r1');
      source.records.clear();

      expect(await service.removePeer('r1')).toMatchObject({ state: 'done', warnings: [] });
    });

    it('répond NOT_FOUND au second retrait', async () => {
      await service.addPeer('r1', 'key-r1');
      await service.removePeer('r1');

      expect(await service.removePeer('r1')).toMatchObject({ state: 'failed', stage: 'requested', code: 'NOT_FOUND' });
    });

    it('signale une base indisponible', async () => {
      await service.addPeer('r1', 'key-r1');
      source.failWith = 'unavailable';

      expect(await service.removePeer('r1')).toMatchObject({
        state: 'done',
        warnings: [t('reconciler.recordRemoveFailed', { source: 'postgres', error: 'unavailable forcé' })],
      });
    });
  });

  describe('syncPeer', () => {
    it('enregistre l’accessibilité après une sonde réussie', async () => {
      await service.addPeer('r1', 'key-r1');
      network.reachable.add('10.10.0.2');
      network.apiOpen.add('10.10.0.2');

      const result = await service.syncPeer('r1');
      expect(result).toMatchObject({
        state: 'done',
        address: '10.10.0.2',
        stages: ['requested', 'address_resolved', 'probed', 'records_written', 'done'],
      });
      const saved = source.records.get('r1');
      expect(saved?.apiAccessible).toBe(true);
      expect(saved?.active).toBe(true);
      expect(saved?.lastCheck).toBeInstanceOf(Date);
    });

    it('exige un peer présent dans le fichier', async () => {
      expect(await service.syncPeer('r9')).toMatchObject({ state: 'failed', code: 'NOT_CONFIGURED' });
    });

    it('distingue injoignable et API fermée', async () => {
      await service.addPeer('r1', 'key-r1');

      expect(await service.syncPeer('r1')).toMatchObject({ state: 'failed', stage: 'address_resolved', code: 'UNREACHABLE' });

      network.reachable.add('10.10.0.2');
      expect(await service.syncPeer('r1')).toMatchObject({
        state: 'failed',
        code: 'API_UNREACHABLE',
        reason: t('probe.portClosed', { address: '10.10.0.2', port: 8728 }),
      });
      expect(source.records.get('r1')?.apiAccessible).toBe(false);
    });

    it('repart de l’enregistrement existant', async () => {
      await service.addPeer('r1', 'key-r1');
      const stored = source.records.get('r1');
      if (stored) source.records.set('r1', { ...stored, active: false, address: '10.10.0.2' });
      network.reachable.add('10.10.0.2');
      network.apiOpen.add('10.10.0.2');

      await service.syncPeer('r1');
      expect(source.records.get('r1')).toMatchObject({ name: 'r1', publicKey: 'key-r1', active: true, apiAccessible: true });
    });
  });

  describe('aggregateStatus', () => {
    it('compte 3 peers en ligne et 2 hors ligne sur 5', async () => {
      const limited = build([source], 3);
      for (let i = 1; i <= 5; i++) {
        await limited.addPeer(`r${i}`, `key-r${i}`);
      }
      for (const address of ['10.10.0.2', '10.10.0.4', '10.10.0.6']) {
        network.reachable.add(address);
        network.apiOpen.add(address);
      }

      const status = await limited.aggregateStatus();
      expect({ total: status.total, online: status.online, offline: status.offline }).toEqual({ total: 5, online: 3, offline: 2 });
      expect(status.peers.map((p) => [p.name, p.online])).toEqual([
        ['r1', true], ['r2', false], ['r3', true], ['r4', false], ['r5', true],
      ]);
      for (const peer of status.peers.filter((p) => !p.online)) {
        expect(peer.apiAccessible).toBe(false);
      }
      expect(network.peak).toBeLessThanOrEqual(3);
      expect(network.peak).toBeGreaterThan(1);
    });

    it('compte hors ligne un peer sans adresse', async () => {
      source.records.set('pending', {
        name: 'pending', publicKey: 'key-p', address: undefined, active: true, apiAccessible: false, lastCheck: null,
      });

      const status = await service.aggregateStatus();
      expect(status).toMatchObject({ total: 1, online: 0, offline: 1 });
      expect(status.peers[0].reason).toBe(t('status.noAddress'));
    });

    it('remonte les sources ignorées', async () => {
      source.available = false;
      const status = await service.aggregateStatus();
      expect(status).toEqual({
        total: 0,
        online: 0,
        offline: 0,
        peers: [],
        warnings: [t('registry.sourceSkipped', { source: 'postgres', error: 'hors service' })],
      });
    });
  });
});
