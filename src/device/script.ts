/**
 * @file device/script.ts
 * @description Génération du script RouterOS (.rsc) de raccordement d'un routeur au tunnel
 */

import { FleetError } from '../errors.js';
import { t } from '../i18n.js';

export interface RouterScriptOptions {
  /** Clé publique WireGuard du serveur */
  serverPublicKey: string;
  /** Adresse publique (IP ou nom) du serveur */
  endpoint: string;
  /** Port UDP du serveur */
  endpointPort: number;
  /** Longueur de préfixe du pool, ex: 24 */
  prefix: number;
  gateway: string;
  apiPort: number;
  /** Nom de l'interface créée sur le routeur */
  interfaceName?: string;
}

const DEFAULT_ROUTER_INTERFACE = 'wg-fleet';

/**
 * Échappe une valeur placée entre guillemets dans un script RouterOS
 */
export function quoteRouterOs(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\$/g, '\\$')}"`;
}

/**
 * Script à importer sur le routeur (`/import file=<name>.rsc`)
 *
 * Le routeur génère sa propre clé privée ; le script affiche sa clé publique,
 * à enregistrer ensuite avec `wgfleet add`.
 */
export function generateRouterScript(
  peer: { name: string; address?: string },
  options: RouterScriptOptions
): string {
  if (!peer.address) {
    throw new FleetError('INVALID_ADDRESS', t('script.missingAddress', { name: peer.name }));
  }
  if (!options.serverPublicKey.trim() || /\s/.test(options.serverPublicKey.trim())) {
    throw new FleetError('INVALID_PEER', t('script.invalidServerKey'));
  }
  if (!options.endpoint.trim()) {
    throw new FleetError('CONFIG_INVALID', t('script.missingEndpoint'));
  }

  const iface = options.interfaceName ?? DEFAULT_ROUTER_INTERFACE;
  const name = quoteRouterOs(peer.name);

  const lines = [
    `# wgfleet : raccordement de ${peer.name.replace(/[\r\n]/g, ' ')} (${peer.address})`,
    `# Import : /import file=${fileNameFor(peer.name)}`,
    '',
    `:log info ("wgfleet: configuration de " . ${name})`,
    '',
    `/system identity set name=${name}`,
    '',
    `:foreach i in=[/interface wireguard find name="${iface}"] do={ /interface wireguard remove $i }`,
    `/interface wireguard add name="${iface}" listen-port=${options.endpointPort} comment="wgfleet"`,
    '',
    '/interface wireguard peers add \\',
    `    interface="${iface}" \\`,
    `    public-key=${quoteRouterOs(options.serverPublicKey.trim())} \\`,
    `    endpoint-address=${quoteRouterOs(options.endpoint.trim())} \\`,
    `    endpoint-port=${options.endpointPort} \\`,
    `    allowed-address=${options.gateway}/32 \\`,
    '    persistent-keepalive=25s \\',
    '    comment="wgfleet server"',
    '',
    `/ip address add address=${peer.address}/${options.prefix} interface="${iface}"`,
    '',
    `/ip service set api disabled=no port=${options.apiPort}`,
    '',
    '/ip firewall filter add \\',
    `    chain=input protocol=tcp dst-port=${options.apiPort} in-interface="${iface}" \\`,
    '    action=accept comment="wgfleet: API via tunnel" place-before=0',
    '/ip firewall filter add \\',
    `    chain=input protocol=tcp dst-port=${options.apiPort} \\`,
    '    action=drop comment="wgfleet: API hors tunnel"',
    '',
    ':delay 2s',
    `:local pubkey [/interface wireguard get [find name="${iface}"] public-key]`,
    ':put "Clé publique du routeur :"',
    ':put $pubkey',
    `:put ("wgfleet add " . ${name} . " " . $pubkey . " ${peer.address}")`,
    '',
  ];

  return lines.join('\n');
}

/**
 * Nom de fichier sûr pour le script d'un routeur
 */
export function fileNameFor(name: string): string {
  const safe = name.replace(/[^A-Za-z0-9._-]/g, '_');
  return `${safe}-wireguard.rsc`;
}
