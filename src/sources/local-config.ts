/**
 * @file sources/local-config.ts
 * @description Source de repli : vue en lecture seule du fichier wg0.conf
 */

import { existsSync, accessSync, constants } from 'fs';
import { t } from '../i18n.js';
import type { ConfigStore } from '../tunnel/config-file.js';
import type { ConfigPeer, Peer } from '../types.js';
import { BaseRecordSource, type SourceOptions } from './base.js';
import { fail, ok, type ListFilter, type SourceResult } from './types.js';

/**
 * Les écritures passent uniquement par ConfigStore ; cette source ne fait que lire.
 * Un peer du fichier est considéré actif, sans vérification connue.
 */
export class LocalConfigRecordSource extends BaseRecordSource {
  readonly name = 'wireguard-config' as const;
  readonly writable = false;

  private store: ConfigStore;

  constructor(store: ConfigStore, log: (msg: string) => void = console.log, options: SourceOptions = {}) {
    super(log, options);
    this.store = store;
  }

  protected async connect(): Promise<void> {
    // Lecture de fichier locale, rien à ouvrir
  }

  /**
   * Un fichier absent est un tunnel sans peer, pas une source en panne
   */
  async healthCheck(): Promise<boolean> {
    const path = this.store.filePath;
    if (!existsSync(path)) return true;
    try {
      accessSync(path, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  protected async doList(_filter: ListFilter): Promise<SourceResult<Peer[]>> {
    return ok(this.store.listPeers().map((peer) => this.toPeer(peer)));
  }

  protected async doGet(name: string): Promise<SourceResult<Peer>> {
    const peer = this.store.findPeer(name);
    if (!peer) {
      return fail('not_found', t('peer.notFound', { name }));
    }
    return ok(this.toPeer(peer));
  }

  protected async doUpsert(): Promise<SourceResult<void>> {
    return fail('unavailable', t('source.readOnly', { source: this.name }));
  }

  protected async doRemove(): Promise<SourceResult<void>> {
    return fail('unavailable', t('source.readOnly', { source: this.name }));
  }

  private toPeer(peer: ConfigPeer): Peer {
    return {
      name: peer.name,
      publicKey: peer.publicKey,
      address: peer.address,
      active: true,
      apiAccessible: false,
      lastCheck: null,
      source: this.name,
    };
  }
}
