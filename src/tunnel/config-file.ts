/**
 * @file tunnel/config-file.ts
 * @description Lecture et réécriture du fichier de configuration WireGuard (wg0.conf)
 *
 * Format d'un bloc peer :
 *
 *   # <nom>
 *   [Peer]
 *   PublicKey = <clé>
 *   AllowedIPs = <ipv4>/32
 *
 * Tout le reste du fichier ([Interface], commentaires libres, PostUp...) est
 * conservé octet pour octet lors des ajouts et suppressions.
 */

import { existsSync, readFileSync, writeFileSync, renameSync, unlinkSync, mkdirSync } from 'fs';
import { dirname, basename, join } from 'path';
import { FleetError, errorMessage } from '../errors.js';
import { t } from '../i18n.js';
import type { ConfigPeer, ParseWarning } from '../types.js';
import { Mutex } from '../utils/mutex.js';
import { ipToNumber } from './address-pool.js';
import type { TunnelDaemon } from './wireguard.js';

const PEER_SECTION = '[Peer]';
const NAME_COMMENT_RE = /^#\s?(.*)$/;
const FIELD_RE = /^([A-Za-z]+)\s*=\s*(.*)$/;
const SECTION_RE = /^\[.+\]$/;

export interface ParsedConfig {
  peers: ConfigPeer[];
  warnings: ParseWarning[];
}

/**
 * Étendue d'un bloc dans le fichier (indices de lignes, 0-based, fin exclusive)
 */
interface BlockSpan {
  name: string;
  start: number;
  end: number;
}

export interface ReloadReport {
  /** Faux si le rechargement est désactivé ou a échoué */
  reloaded: boolean;
  warning?: string;
}

export interface ConfigStoreOptions {
  path: string;
  interfaceName: string;
  /** Démon à recharger après écriture, null = pas de rechargement */
  daemon: TunnelDaemon | null;
  log?: (msg: string) => void;
}

/**
 * Adresse d'une ligne AllowedIPs : une seule IPv4 en /32
 */
function parseAllowedIp(value: string): string | null {
  const [ip, prefix, ...rest] = value.trim().split('/');
  if (rest.length > 0 || prefix !== '32' || ipToNumber(ip) === null) {
    return null;
  }
  return ip;
}

/**
 * Nom non vide, sans espace en bordure ni saut de ligne
 */
export function isValidPeerName(name: string): boolean {
  return name.length > 0 && name.trim() === name && !/[\r\n]/.test(name);
}

export function isValidPublicKey(key: string): boolean {
  return key.length > 0 && !/\s/.test(key);
}

/**
 * Parse le texte et renvoie les blocs valides avec leur étendue.
 * Les blocs malformés sont ignorés avec un avertissement.
 */
function scan(text: string): { blocks: Array<ConfigPeer & BlockSpan>; warnings: ParseWarning[] } {
  const lines = text.split('\n');
  const blocks: Array<ConfigPeer & BlockSpan> = [];
  const warnings: ParseWarning[] = [];
  const seen = new Set<string>();

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();

    if (line === PEER_SECTION) {
      // Un [Peer] atteint ici n'est pas précédé d'un commentaire de nom
      warnings.push({ line: i + 1, message: t('config.peerWithoutName') });
      continue;
    }

    const comment = NAME_COMMENT_RE.exec(line);
    if (!comment || lines[i + 1]?.trim() !== PEER_SECTION) continue;

    const name = comment[1].trim();
    const start = i;
    const fields = new Map<string, string>();
    let end = i + 2;
    while (end < lines.length) {
      const field = FIELD_RE.exec(lines[end].trim());
      if (!field || SECTION_RE.test(lines[end].trim())) break;
      if (!fields.has(field[1])) fields.set(field[1], field[2].trim());
      end++;
    }
    i = end - 1;

    if (!name) {
      warnings.push({ line: start + 1, message: t('config.emptyName') });
      continue;
    }

    const publicKey = fields.get('PublicKey');
    const allowedIps = fields.get('AllowedIPs');
    if (!publicKey) {
      warnings.push({ line: start + 1, name, message: t('config.missingField', { field: 'PublicKey' }) });
      continue;
    }
    if (allowedIps === undefined) {
      warnings.push({ line: start + 1, name, message: t('config.missingField', { field: 'AllowedIPs' }) });
      continue;
    }

    const address = parseAllowedIp(allowedIps);
    if (!address) {
      warnings.push({ line: start + 1, name, message: t('config.invalidAllowedIps', { value: allowedIps }) });
      continue;
    }

    if (seen.has(name)) {
      warnings.push({ line: start + 1, name, message: t('config.duplicateName') });
      continue;
    }
    seen.add(name);

    blocks.push({ name, publicKey, address, line: start + 1, start, end });
  }

  return { blocks, warnings };
}

/**
 * Parse le contenu d'un fichier de configuration WireGuard
 */
export function parseConfig(text: string): ParsedConfig {
  const { blocks, warnings } = scan(text);
  return {
    peers: blocks.map(({ name, publicKey, address, line }) => ({ name, publicKey, address, line })),
    warnings,
  };
}

/**
 * Texte d'un bloc peer tel qu'ajouté au fichier
 */
export function formatPeerBlock(peer: { name: string; publicKey: string; address: string }): string {
  return `# ${peer.name}\n${PEER_SECTION}\nPublicKey = ${peer.publicKey}\nAllowedIPs = ${peer.address}/32\n`;
}

/**
 * Ajoute un bloc en fin de texte, séparé par une ligne vide
 */
export function appendPeerBlock(text: string, peer: { name: string; publicKey: string; address: string }): string {
  const block = formatPeerBlock(peer);
  if (text.length === 0) return block;
  const base = text.endsWith('\n') ? text : `${text}\n`;
  return `${base}\n${block}`;
}

/**
 * Retire le bloc `name` (du commentaire à la dernière ligne de champ) ainsi
 * qu'une ligne vide qui le précède directement. null si absent.
 */
export function excisePeerBlock(text: string, name: string): string | null {
  const { blocks } = scan(text);
  const block = blocks.find((b) => b.name === name);
  if (!block) return null;

  const lines = text.split('\n');
  let start = block.start;
  if (start > 0 && lines[start - 1].trim() === '') start--;

  lines.splice(start, block.end - start);
  return lines.join('\n');
}

/**
 * `chemin:ligne: message (nom)`
 */
export function formatParseWarning(path: string, warning: ParseWarning): string {
  const who = warning.name ? ` (${warning.name})` : '';
  return t('config.parseWarning', { path, line: warning.line, message: `${warning.message}${who}` });
}

/**
 * Propriétaire unique du fichier de configuration du tunnel
 */
export class ConfigStore {
  private readonly path: string;
  private readonly interfaceName: string;
  private readonly daemon: TunnelDaemon | null;
  private readonly log: (msg: string) => void;
  private readonly lock = new Mutex();
  private warnings: ParseWarning[] = [];

  constructor(options: ConfigStoreOptions) {
    this.path = options.path;
    this.interfaceName = options.interfaceName;
    this.daemon = options.daemon;
    this.log = options.log ?? console.log;
  }

  get filePath(): string {
    return this.path;
  }

  /**
   * Avertissements de la dernière lecture par listPeers
   */
  get lastWarnings(): ParseWarning[] {
    return [...this.warnings];
  }

  /**
   * Contenu brut, chaîne vide si le fichier n'existe pas encore
   */
  read(): string {
    if (!existsSync(this.path)) return '';
    return readFileSync(this.path, 'utf-8');
  }

  /**
   * Peers du fichier, dans l'ordre d'apparition
   */
  listPeers(): ConfigPeer[] {
    const parsed = parseConfig(this.read());
    this.warnings = parsed.warnings;
    for (const warning of parsed.warnings) {
      this.log(formatParseWarning(this.path, warning));
    }
    return parsed.peers;
  }

  findPeer(name: string): ConfigPeer | undefined {
    return this.listPeers().find((peer) => peer.name === name);
  }

  /**
   * Ajoute un bloc peer puis recharge le tunnel
   */
  async addPeer(peer: { name: string; publicKey: string; address: string }): Promise<ReloadReport> {
    // Seuls des blocs relisibles par parseConfig sont écrits
    if (!isValidPeerName(peer.name)) {
      throw new FleetError('INVALID_PEER', t('peer.invalidName', { name: JSON.stringify(peer.name) }));
    }
    if (!isValidPublicKey(peer.publicKey)) {
      throw new FleetError('INVALID_PEER', t('peer.invalidKey', { name: peer.name }));
    }
    if (parseAllowedIp(`${peer.address}/32`) === null) {
      throw new FleetError('INVALID_ADDRESS', t('config.invalidPeerAddress', { address: JSON.stringify(peer.address) }));
    }

    return this.lock.runExclusive(async () => {
      const text = this.read();
      if (parseConfig(text).peers.some((p) => p.name === peer.name)) {
        throw new FleetError('DUPLICATE_NAME', t('peer.duplicateName', { name: peer.name }));
      }

      this.writeAtomic(appendPeerBlock(text, peer));
      this.log(t('config.peerAdded', { name: peer.name, address: peer.address }));
      return this.reload();
    });
  }

  /**
   * Retire le bloc du peer puis recharge le tunnel
   */
  async removePeer(name: string): Promise<ReloadReport> {
    return this.lock.runExclusive(async () => {
      const next = excisePeerBlock(this.read(), name);
      if (next === null) {
        throw new FleetError('NOT_FOUND', t('peer.notFound', { name }));
      }

      this.writeAtomic(next);
      this.log(t('config.peerRemoved', { name }));
      return this.reload();
    });
  }

  /**
   * Écrit dans un fichier temporaire du même répertoire puis le renomme :
   * un lecteur concurrent voit l'ancien ou le nouveau contenu, jamais un mélange
   */
  private writeAtomic(content: string): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    const tmpPath = join(dir, `.${basename(this.path)}.${process.pid}.${Date.now()}.tmp`);
    try {
      writeFileSync(tmpPath, content, { mode: 0o600 });
      renameSync(tmpPath, this.path);
    } catch (error: unknown) {
      try {
        if (existsSync(tmpPath)) unlinkSync(tmpPath);
      } catch (cleanupError: unknown) {
        this.log(t('config.tmpCleanupFailed', { path: tmpPath, error: errorMessage(cleanupError) }));
      }
      throw error;
    }
  }

  /**
   * Cycle down/up : un échec est signalé mais n'annule pas l'écriture
   */
  private async reload(): Promise<ReloadReport> {
    if (!this.daemon) {
      return { reloaded: false };
    }

    try {
      await this.daemon.down(this.interfaceName);
      await this.daemon.up(this.interfaceName);
      return { reloaded: true };
    } catch (error: unknown) {
      const warning = t('tunnel.reloadFailed', { iface: this.interfaceName, error: errorMessage(error) });
      this.log(warning);
      return { reloaded: false, warning };
    }
  }
}
