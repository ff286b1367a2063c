/**
 * @file tunnel/wireguard.ts
 * @description Pilotage du démon WireGuard (wg-quick) et lecture de l'état live
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

const COMMAND_TIMEOUT_MS = 30_000;

/**
 * Cycle de rechargement du tunnel. Les deux opérations sont idempotentes.
 */
export interface TunnelDaemon {
  down(interfaceName: string): Promise<void>;
  up(interfaceName: string): Promise<void>;
}

/**
 * Statut d'un peer vu par `wg show <iface> dump`
 */
export interface WgPeerStatus {
  publicKey: string;
  endpoint?: string;
  allowedIps: string[];
  /** Epoch en secondes, absent si aucun handshake */
  latestHandshake?: number;
  transferRx: number;
  transferTx: number;
  persistentKeepalive?: number;
}

/**
 * wg-quick down/up via processus externe
 */
export class WgQuickDaemon implements TunnelDaemon {
  constructor(private readonly timeoutMs: number = COMMAND_TIMEOUT_MS) {}

  async down(interfaceName: string): Promise<void> {
    try {
      await execFileAsync('wg-quick', ['down', interfaceName], { timeout: this.timeoutMs });
    } catch (error: unknown) {
      // wg-quick échoue si l'interface n'est pas montée : ce n'est pas une erreur ici
      if (!isInterfaceMissing(error)) throw error;
    }
  }

  async up(interfaceName: string): Promise<void> {
    await execFileAsync('wg-quick', ['up', interfaceName], { timeout: this.timeoutMs });
  }
}

function isInterfaceMissing(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('stderr' in error)) return false;
  const stderr = String(error.stderr);
  return stderr.includes('is not a WireGuard interface') || stderr.includes('does not exist');
}

/**
 * Parse la sortie de `wg show <iface> dump`
 * Première ligne = interface, lignes suivantes = peers (8 champs séparés par des tabulations)
 */
export function parseWgDump(output: string): WgPeerStatus[] {
  const lines = output.trim().split('\n').filter((line) => line.length > 0);
  const peers: WgPeerStatus[] = [];

  for (let i = 1; i < lines.length; i++) {
    const parts = lines[i].split('\t');
    if (parts.length < 8) continue;

    const [publicKey, , endpoint, allowedIps, latestHandshake, rxBytes, txBytes, keepalive] = parts;
    const handshake = parseInt(latestHandshake, 10);
    const keepaliveSec = parseInt(keepalive, 10);

    peers.push({
      publicKey,
      endpoint: endpoint !== '(none)' ? endpoint : undefined,
      allowedIps: allowedIps === '(none)' ? [] : allowedIps.split(','),
      latestHandshake: handshake > 0 ? handshake : undefined,
      transferRx: parseInt(rxBytes, 10) || 0,
      transferTx: parseInt(txBytes, 10) || 0,
      persistentKeepalive: Number.isNaN(keepaliveSec) ? undefined : keepaliveSec,
    });
  }

  return peers;
}

/**
 * État live des peers de l'interface, null si l'interface est absente
 */
export async function readInterfacePeers(interfaceName: string): Promise<WgPeerStatus[] | null> {
  try {
    const { stdout } = await execFileAsync('wg', ['show', interfaceName, 'dump'], {
      timeout: COMMAND_TIMEOUT_MS,
      encoding: 'utf-8',
    });
    return parseWgDump(stdout);
  } catch {
    return null;
  }
}
