/**
 * @file sources/types.ts
 * @description Contrat commun des sources d'enregistrements de peers
 */

import type { Peer, SourceName } from '../types.js';

/** Étiquette fixe du type de tunnel dans les tables de routeurs */
export const VPN_TYPE = 'wireguard';

export type SourceError = 'unavailable' | 'conflict' | 'not_found';

export type SourceResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: SourceError; message: string };

export interface ListFilter {
  /** Ne renvoyer que les peers actifs */
  activeOnly?: boolean;
}

/**
 * Peer à écrire : la source d'origine n'est pas persistée
 */
export type PeerRecord = Omit<Peer, 'source'>;

/**
 * Accès en lecture/écriture aux enregistrements d'un stockage
 *
 * Une source injoignable à l'initialisation répond `unavailable` à chaque
 * appel : elle ne contribue rien mais ne fait jamais échouer l'appelant.
 */
export interface RecordSource {
  readonly name: SourceName;
  readonly writable: boolean;

  /**
   * Connexion + test de santé. Faux si la source est désormais indisponible.
   */
  init(): Promise<boolean>;
  isAvailable(): boolean;

  list(filter?: ListFilter): Promise<SourceResult<Peer[]>>;
  get(name: string): Promise<SourceResult<Peer>>;
  upsert(peer: PeerRecord): Promise<SourceResult<void>>;
  remove(name: string): Promise<SourceResult<void>>;

  /** Test léger de joignabilité du stockage lui-même */
  healthCheck(): Promise<boolean>;

  close(): Promise<void>;
}

export function ok<T>(value: T): SourceResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: SourceError, message: string): SourceResult<T> {
  return { ok: false, error, message };
}
