/**
 * @file types.ts
 * @description Types partagés de la flotte de peers
 */

/**
 * Origine d'une vue de peer (diagnostic uniquement, ne fait pas partie de l'identité)
 */
export type SourceName = 'postgres' | 'supabase' | 'wireguard-config';

/**
 * Un routeur distant enregistré dans le tunnel
 */
export interface Peer {
  /** Clé primaire dans toute la flotte (sensible à la casse) */
  name: string;
  publicKey: string;
  /** IPv4 hôte dans le pool, absente = attribution automatique en attente */
  address?: string;
  active: boolean;
  apiAccessible: boolean;
  /** null = jamais vérifié */
  lastCheck: Date | null;
  source: SourceName;
}

/**
 * Peer tel qu'écrit dans le fichier de configuration WireGuard
 */
export interface ConfigPeer {
  name: string;
  publicKey: string;
  address: string;
  /** Ligne (1-based) du commentaire de nom */
  line: number;
}

/**
 * Bloc ignoré lors du parsing du fichier de configuration
 */
export interface ParseWarning {
  line: number;
  name?: string;
  message: string;
}
