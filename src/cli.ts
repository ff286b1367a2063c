#!/usr/bin/env node
/**
 * @file cli.ts
 * @description CLI wgfleet avec Commander.js
 */

import { Command } from 'commander';
import { existsSync, readFileSync, realpathSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { getExampleConfig, loadConfig } from './config.js';
import { fileNameFor, generateRouterScript } from './device/script.js';
import { FleetError, errorMessage, isFleetError } from './errors.js';
import { openFleet, type FleetContext } from './fleet.js';
import { initI18n, t } from './i18n.js';
import type { AggregateStatus, OperationResult } from './reconciler.js';
import { formatParseWarning } from './tunnel/config-file.js';
import type { WgPeerStatus } from './tunnel/wireguard.js';
import { logger } from './utils/logger.js';

const VERSION = '0.3.0';

/** Sortie terminée avec avertissements */
export const EXIT_WARNINGS = 2;

// ============================================
// Entrées/sorties
// ============================================

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
  colors: boolean;
}

export type GlobalOptions = {
  config?: string;
  lang?: string;
  verbose?: boolean;
};

export type ContextFactory = (options: GlobalOptions) => Promise<FleetContext>;

const processIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  colors: process.stdout.isTTY === true && !process.env.NO_COLOR,
};

/**
 * Configuration, langue et niveau de log puis assemblage des composants
 */
const defaultContext: ContextFactory = async (options) => {
  const config = loadConfig(options.config);
  initI18n(options.lang ?? config.lang);
  logger.setLevel(options.verbose ? 'debug' : config.logging.level);
  return openFleet(config);
};

// ============================================
// Helpers
// ============================================

type Color = 'green' | 'red' | 'yellow' | 'gray' | 'bold';

const COLORS: Record<Color, string> = {
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  gray: '\x1b[90m',
  bold: '\x1b[1m',
};

function colorize(io: CliIo, text: string, color: Color): string {
  return io.colors ? `${COLORS[color]}${text}\x1b[0m` : text;
}

function formatDate(date: Date | null): string {
  return date ? date.toISOString() : t('cli.never');
}

/**
 * Tableau à colonnes alignées
 */
function table(rows: string[][]): string[] {
  const widths = rows[0].map((_, col) => Math.max(...rows.map((row) => row[col].length)));
  return rows.map((row) => row.map((cell, col) => cell.padEnd(widths[col])).join('  ').trimEnd());
}

function printWarnings(io: CliIo, warnings: readonly string[]): void {
  for (const warning of warnings) {
    io.err(`${colorize(io, '⚠', 'yellow')} ${warning}`);
  }
}

/**
 * 0 = terminé, 2 = terminé avec avertissements, 1 = échec
 */
export function exitCodeFor(result: OperationResult): number {
  if (result.state === 'failed') return 1;
  return result.warnings.length > 0 ? EXIT_WARNINGS : 0;
}

function printResult(io: CliIo, result: OperationResult): number {
  if (result.state === 'failed') {
    io.err(`${colorize(io, '✗', 'red')} ${t('cli.operationFailed', {
      operation: result.operation,
      name: result.peer,
      stage: result.stage,
      code: result.code,
      reason: result.reason,
    })}`);
  } else {
    io.out(`${colorize(io, '✓', 'green')} ${t(`cli.${result.operation}Done`, {
      name: result.peer,
      address: result.address ?? '-',
    })}`);
  }
  printWarnings(io, result.warnings);
  return exitCodeFor(result);
}

/**
 * Assemble le contexte, exécute l'action et ferme les sources dans tous les cas
 */
async function withContext(
  io: CliIo,
  open: ContextFactory,
  options: GlobalOptions,
  action: (ctx: FleetContext) => Promise<number>
): Promise<void> {
  let ctx: FleetContext | undefined;
  try {
    ctx = await open(options);
    io.setExitCode(await action(ctx));
  } catch (error: unknown) {
    const code = isFleetError(error) ? ` [${error.code}]` : '';
    io.err(`${colorize(io, '✗', 'red')} ${errorMessage(error)}${code}`);
    io.setExitCode(1);
  } finally {
    if (ctx) await ctx.close();
  }
}

function globals(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return { config: opts.config, lang: opts.lang, verbose: opts.verbose };
}

// ============================================
// Commandes
// ============================================

async function listCommand(io: CliIo, ctx: FleetContext, options: { json?: boolean }): Promise<number> {
  const merged = await ctx.reconciler.listPeers();
  // Blocs ignorés du fichier du tunnel, relu par la source locale pendant la fusion
  const fileWarnings = ctx.store.lastWarnings.map((warning) => formatParseWarning(ctx.store.filePath, warning));
  const warnings = [...merged.warnings, ...fileWarnings];

  if (options.json) {
    io.out(JSON.stringify({ peers: merged.peers, warnings }, null, 2));
  } else if (merged.peers.length === 0) {
    io.out(t('cli.noPeers'));
  } else {
    const rows = [[t('cli.colName'), t('cli.colAddress'), t('cli.colSource'), t('cli.colActive'), t('cli.colApi'), t('cli.colLastCheck')]];
    for (const peer of merged.peers) {
      rows.push([
        peer.name,
        peer.address ?? '-',
        peer.source,
        peer.active ? t('cli.yes') : t('cli.no'),
        peer.apiAccessible ? t('cli.yes') : t('cli.no'),
        formatDate(peer.lastCheck),
      ]);
    }
    table(rows).forEach((line) => io.out(line));
  }

  printWarnings(io, warnings);
  return warnings.length > 0 ? EXIT_WARNINGS : 0;
}

function liveLine(live: WgPeerStatus | undefined, now: number): string {
  if (!live) return t('cli.liveMissing');
  if (live.latestHandshake === undefined) return t('cli.liveNoHandshake');
  return t('cli.liveHandshake', { seconds: Math.max(0, Math.round(now / 1000 - live.latestHandshake)) });
}

async function statusCommand(io: CliIo, ctx: FleetContext, options: { json?: boolean; live?: boolean }): Promise<number> {
  const status: AggregateStatus = await ctx.reconciler.aggregateStatus();
  const live = options.live ? await ctx.readLive() : null;
  if (options.live && live === null) {
    status.warnings.push(t('cli.liveUnavailable', { iface: ctx.config.tunnel.interface }));
  }

  if (options.json) {
    io.out(JSON.stringify(options.live ? { ...status, live } : status, null, 2));
  } else {
    io.out(colorize(io, t('cli.statusSummary', { total: status.total, online: status.online, offline: status.offline }), 'bold'));
    const byKey = new Map((live ?? []).map((entry) => [entry.publicKey, entry]));
    const now = Date.now();

    for (const peer of status.peers) {
      const mark = peer.online ? colorize(io, '●', 'green') : colorize(io, '○', 'red');
      const api = peer.apiAccessible ? t('cli.apiOpen') : t('cli.apiClosed');
      let line = `${mark} ${peer.name} ${peer.address ?? '-'} ${api}`;
      if (options.live) line += ` ${liveLine(byKey.get(peer.publicKey), now)}`;
      if (peer.reason) line += ` ${colorize(io, `(${peer.reason})`, 'gray')}`;
      io.out(line);
    }
  }

  printWarnings(io, status.warnings);
  return status.warnings.length > 0 ? EXIT_WARNINGS : 0;
}

/**
 * Adresse d'un peer : fichier du tunnel d'abord, puis vue fusionnée
 */
async function resolvePeerAddress(ctx: FleetContext, name: string): Promise<string> {
  const configured = ctx.store.findPeer(name);
  if (configured) return configured.address;

  const merged = await ctx.reconciler.listPeers();
  const peer = merged.peers.find((p) => p.name === name);
  if (!peer) {
    throw new FleetError('NOT_FOUND', t('peer.notFound', { name }));
  }
  if (!peer.address) {
    throw new FleetError('INVALID_ADDRESS', t('script.missingAddress', { name }));
  }
  return peer.address;
}

async function generateCommand(
  io: CliIo,
  ctx: FleetContext,
  name: string,
  options: { serverKey: string; endpoint?: string; output?: string }
): Promise<number> {
  const endpoint = options.endpoint ?? ctx.config.tunnel.endpoint;
  if (!endpoint) {
    throw new FleetError('CONFIG_INVALID', t('script.missingEndpoint'));
  }

  const address = await resolvePeerAddress(ctx, name);
  const script = generateRouterScript({ name, address }, {
    serverPublicKey: options.serverKey,
    endpoint,
    endpointPort: ctx.config.tunnel.listenPort,
    prefix: ctx.pool.prefix,
    gateway: ctx.pool.gateway,
    apiPort: ctx.config.probe.apiPort,
  });

  if (options.output) {
    writeFileSync(options.output, script, { mode: 0o600 });
    io.out(`${colorize(io, '✓', 'green')} ${t('cli.scriptWritten', { path: options.output, file: fileNameFor(name) })}`);
  } else {
    io.out(script);
  }
  return 0;
}

function readDeviceSecret(secretFile?: string): string {
  if (secretFile) {
    if (!existsSync(secretFile)) {
      throw new FleetError('CONFIG_INVALID', t('error.secretFileNotFound', { path: secretFile }));
    }
    return readFileSync(secretFile, 'utf-8').trim();
  }
  const secret = process.env.WGFLEET_DEVICE_SECRET;
  if (!secret) {
    throw new FleetError('CONFIG_INVALID', t('cli.deviceSecretMissing'));
  }
  return secret;
}

async function checkDeviceCommand(
  io: CliIo,
  ctx: FleetContext,
  name: string,
  options: { username: string; secretFile?: string }
): Promise<number> {
  const secret = readDeviceSecret(options.secretFile);
  const address = await resolvePeerAddress(ctx, name);
  const result = await ctx.probe.checkDevice(address, { username: options.username, secret });

  if (!result.ok) {
    io.err(`${colorize(io, '✗', 'red')} ${result.reason}`);
    return 1;
  }

  const { identity, version, platform, uptime } = result.status;
  io.out(`${colorize(io, '✓', 'green')} ${t('cli.deviceOk', { name, address })}`);
  io.out(`  ${t('cli.deviceIdentity')}: ${identity}`);
  io.out(`  ${t('cli.deviceVersion')}: ${version}`);
  io.out(`  ${t('cli.devicePlatform')}: ${platform}`);
  io.out(`  ${t('cli.deviceUptime')}: ${uptime}`);
  return 0;
}

// ============================================
// Programme
// ============================================

export function createProgram(io: CliIo = processIo, open: ContextFactory = defaultContext): Command {
  const program = new Command();

  program
    .name('wgfleet')
    .description('Gestion des routeurs reliés au serveur WireGuard')
    .version(VERSION, '-v, --version', 'Afficher la version')
    .option('-c, --config <path>', 'Chemin de la configuration (défaut: /etc/wgfleet/config.yml)')
    .option('--lang <lang>', 'Langue (fr/en)')
    .option('--verbose', 'Activer les logs de debug')
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  program
    .command('add <name> <publicKey> [address]')
    .description('Ajouter un peer (adresse attribuée automatiquement si absente)')
    .action((name: string, publicKey: string, address: string | undefined, _opts: unknown, command: Command) =>
      withContext(io, open, globals(command), async (ctx) =>
        printResult(io, await ctx.reconciler.addPeer(name, publicKey, address))));

  program
    .command('remove <name>')
    .description('Retirer un peer du tunnel et des bases')
    .action((name: string, _opts: unknown, command: Command) =>
      withContext(io, open, globals(command), async (ctx) =>
        printResult(io, await ctx.reconciler.removePeer(name))));

  program
    .command('sync <name>')
    .description("Sonder un peer et enregistrer l'accessibilité de son API")
    .action((name: string, _opts: unknown, command: Command) =>
      withContext(io, open, globals(command), async (ctx) =>
        printResult(io, await ctx.reconciler.syncPeer(name))));

  program
    .command('list')
    .description('Lister les peers de toutes les sources')
    .option('-j, --json', 'Sortie JSON')
    .action((options: { json?: boolean }, command: Command) =>
      withContext(io, open, globals(command), (ctx) => listCommand(io, ctx, options)));

  program
    .command('status')
    .description('Sonder tous les peers')
    .option('-j, --json', 'Sortie JSON')
    .option('--live', "Inclure l'état de l'interface (wg show)")
    .action((options: { json?: boolean; live?: boolean }, command: Command) =>
      withContext(io, open, globals(command), (ctx) => statusCommand(io, ctx, options)));

  program
    .command('generate <name>')
    .description('Générer le script RouterOS de raccordement')
    .requiredOption('--server-key <key>', 'Clé publique WireGuard du serveur')
    .option('--endpoint <host>', 'Adresse publique du serveur (défaut: tunnel.endpoint)')
    .option('-o, --output <file>', 'Écrire le script dans un fichier')
    .action((name: string, options: { serverKey: string; endpoint?: string; output?: string }, command: Command) =>
      withContext(io, open, globals(command), (ctx) => generateCommand(io, ctx, name, options)));

  program
    .command('check-device <name>')
    .description("Vérifier l'API REST du routeur")
    .requiredOption('-u, --username <user>', 'Utilisateur API')
    .option('--secret-file <path>', 'Fichier contenant le mot de passe (défaut: WGFLEET_DEVICE_SECRET)')
    .action((name: string, options: { username: string; secretFile?: string }, command: Command) =>
      withContext(io, open, globals(command), (ctx) => checkDeviceCommand(io, ctx, name, options)));

  const configCmd = program
    .command('config')
    .description('Configuration');

  configCmd
    .command('example')
    .description('Afficher un exemple de configuration')
    .action(() => {
      io.out(getExampleConfig());
    });

  configCmd
    .command('check')
    .description('Vérifier la configuration')
    .action((_opts: unknown, command: Command) => {
      const options = globals(command);
      try {
        const config = loadConfig(options.config);
        initI18n(options.lang ?? config.lang);
        io.out(`${colorize(io, '✓', 'green')} ${t('cli.configValid', { path: config.tunnel.configPath, network: config.tunnel.network })}`);
      } catch (error: unknown) {
        io.err(`${colorize(io, '✗', 'red')} ${errorMessage(error)}`);
        io.setExitCode(1);
      }
    });

  return program;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
}
