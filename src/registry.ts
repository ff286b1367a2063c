/**
 * @file registry.ts
 * @description Fusion des peers de plusieurs sources, par ordre de priorité
 */

import { t } from './i18n.js';
import type { RecordSource } from './sources/types.js';
import type { Peer, SourceName } from './types.js';

/**
 * Peer écarté parce qu'une source prioritaire le connaît déjà
 */
export interface ShadowedPeer {
  peer: Peer;
  by: {
    name: string;
    source: SourceName;
    /** Correspondance ayant provoqué l'éviction */
    match: 'name' | 'publicKey';
  };
}

export interface MergeResult {
  peers: Peer[];
  shadowed: ShadowedPeer[];
  /** Sources n'ayant rien pu fournir */
  warnings: string[];
}

/**
 * Vue unifiée des peers
 *
 * La première source qui produit un peer l'emporte en entier (pas de fusion
 * champ par champ). Deux vues désignent le même peer si elles partagent le
 * nom OU la clé publique.
 */
export class PeerRegistry {
  private readonly sources: readonly RecordSource[];

  constructor(sources: readonly RecordSource[]) {
    this.sources = sources;
  }

  async merge(): Promise<MergeResult> {
    const peers: Peer[] = [];
    const shadowed: ShadowedPeer[] = [];
    const warnings: string[] = [];
    const byName = new Map<string, Peer>();
    const byKey = new Map<string, Peer>();

    // Séquentiel : l'ordre des sources fait partie du résultat
    for (const source of this.sources) {
      const result = await source.list();
      if (!result.ok) {
        warnings.push(t('registry.sourceSkipped', { source: source.name, error: result.message }));
        continue;
      }

      for (const candidate of result.value) {
        const peer: Peer = { ...candidate, source: source.name };
        const sameName = byName.get(peer.name);
        const sameKey = byKey.get(peer.publicKey);
        const winner = sameName ?? sameKey;

        if (winner) {
          shadowed.push({
            peer,
            by: { name: winner.name, source: winner.source, match: sameName ? 'name' : 'publicKey' },
          });
          continue;
        }

        peers.push(peer);
        byName.set(peer.name, peer);
        byKey.set(peer.publicKey, peer);
      }
    }

    return { peers, shadowed, warnings };
  }

  /**
   * Peer fusionné portant ce nom
   */
  async find(name: string): Promise<Peer | undefined> {
    const { peers } = await this.merge();
    return peers.find((peer) => peer.name === name);
  }
}
