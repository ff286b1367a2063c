/**
 * @file sources/rows.ts
 * @description Correspondance ligne `routers` <-> Peer (schéma commun PostgreSQL / Supabase)
 */

import { stripCidr } from '../tunnel/address-pool.js';
import type { Peer, SourceName } from '../types.js';
import { VPN_TYPE, type PeerRecord } from './types.js';

/**
 * Ligne de la table `routers`, telle que renvoyée par PostgreSQL ou PostgREST
 */
export interface RouterRow {
  name: string;
  public_key: string | null;
  ip_address: string | null;
  vpn_type?: string | null;
  is_active: boolean | null;
  api_accessible: boolean | null;
  /** Date (driver postgres) ou chaîne ISO (PostgREST) */
  last_vpn_check: Date | string | null;
}

/**
 * Colonnes écrites lors d'un upsert
 */
export interface RouterWrite {
  name: string;
  public_key: string;
  ip_address: string | null;
  vpn_type: string;
  is_active: boolean;
  api_accessible: boolean;
  last_vpn_check: string | null;
}

function toDate(value: Date | string | null): Date | null {
  if (value === null) return null;
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * null si la ligne n'a pas de clé publique (inutilisable comme peer)
 */
export function rowToPeer(row: RouterRow, source: SourceName): Peer | null {
  if (!row.name || !row.public_key) return null;

  const address = row.ip_address ? stripCidr(row.ip_address) : '';
  return {
    name: row.name,
    publicKey: row.public_key,
    address: address || undefined,
    active: row.is_active ?? false,
    apiAccessible: row.api_accessible ?? false,
    lastCheck: toDate(row.last_vpn_check),
    source,
  };
}

export function peerToRow(peer: PeerRecord): RouterWrite {
  return {
    name: peer.name,
    public_key: peer.publicKey,
    ip_address: peer.address ?? null,
    vpn_type: VPN_TYPE,
    is_active: peer.active,
    api_accessible: peer.apiAccessible,
    last_vpn_check: peer.lastCheck ? peer.lastCheck.toISOString() : null,
  };
}

/**
 * Convertit une liste de lignes, en signalant celles qui sont ignorées
 */
export function rowsToPeers(
  rows: readonly RouterRow[],
  source: SourceName,
  onSkip: (row: RouterRow) => void
): Peer[] {
  const peers: Peer[] = [];
  for (const row of rows) {
    const peer = rowToPeer(row, source);
    if (peer) {
      peers.push(peer);
    } else {
      onSkip(row);
    }
  }
  return peers;
}
