/**
 * @file config.ts
 * @description Parsing de la configuration YAML pour wgfleet
 */

import { readFileSync, existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { FleetError, errorMessage } from './errors.js';
import { t } from './i18n.js';
import type { LogLevel } from './utils/logger.js';

export const DEFAULT_CONFIG_PATH = '/etc/wgfleet/config.yml';

// ============================================
// Schéma (clés snake_case du fichier)
// ============================================

const TunnelSchema = z
  .object({
    interface: z.string().regex(/^[A-Za-z0-9_=+.-]{1,15}$/).default('wg0'),
    config_path: z.string().min(1).optional(),
    network: z.string().default('10.10.0.0/24'),
    gateway: z.string().default('10.10.0.1'),
    listen_port: z.number().int().min(1).max(65535).default(51820),
    /** Adresse publique du serveur, utilisée pour les scripts routeur */
    endpoint: z.string().min(1).optional(),
    reload: z.boolean().default(true),
  })
  .strict();

const ProbeSchema = z
  .object({
    timeout_ms: z.number().int().min(100).max(10_000).default(5000),
    attempts: z.number().int().min(1).max(10).default(3),
    api_port: z.number().int().min(1).max(65535).default(8728),
    concurrency: z.number().int().min(1).max(256).default(16),
  })
  .strict();

const PostgresSchema = z
  .object({
    url: z.string().min(1).optional(),
    url_file: z.string().min(1).optional(),
    table: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/).default('routers'),
    ssl: z.enum(['require', 'prefer', 'disable']).default('prefer'),
    timeout_ms: z.number().int().min(100).max(60_000).default(5000),
  })
  .strict();

const SupabaseSchema = z
  .object({
    url: z.string().url(),
    key: z.string().min(1).optional(),
    key_file: z.string().min(1).optional(),
    table: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/).default('routers'),
    timeout_ms: z.number().int().min(100).max(60_000).default(5000),
  })
  .strict();

const DeviceSchema = z
  .object({
    scheme: z.enum(['https', 'http']).default('https'),
    port: z.number().int().min(1).max(65535).optional(),
    verify_tls: z.boolean().default(false),
    timeout_ms: z.number().int().min(100).max(60_000).default(5000),
  })
  .strict();

const ConfigSchema = z
  .object({
    tunnel: TunnelSchema.default({}),
    probe: ProbeSchema.default({}),
    sources: z
      .object({
        postgres: PostgresSchema.optional(),
        supabase: SupabaseSchema.optional(),
        local: z.object({ enabled: z.boolean().default(true) }).strict().default({}),
      })
      .strict()
      .default({}),
    device: DeviceSchema.default({}),
    logging: z
      .object({ level: z.enum(['debug', 'info', 'warn', 'error']).default('info') })
      .strict()
      .default({}),
    lang: z.enum(['fr', 'en']).optional(),
  })
  .strict();

type RawConfig = z.infer<typeof ConfigSchema>;

// ============================================
// Types normalisés
// ============================================

export interface TunnelConfig {
  interface: string;
  configPath: string;
  network: string;
  gateway: string;
  listenPort: number;
  endpoint?: string;
  reload: boolean;
}

export interface ProbeConfig {
  timeoutMs: number;
  attempts: number;
  apiPort: number;
  concurrency: number;
}

export interface PostgresConfig {
  url: string;
  table: string;
  ssl: 'require' | 'prefer' | false;
  timeoutMs: number;
}

export interface SupabaseConfig {
  url: string;
  key: string;
  table: string;
  timeoutMs: number;
}

export interface DeviceApiConfig {
  scheme: 'https' | 'http';
  port?: number;
  verifyTls: boolean;
  timeoutMs: number;
}

export interface FleetConfig {
  tunnel: TunnelConfig;
  probe: ProbeConfig;
  sources: {
    postgres?: PostgresConfig;
    supabase?: SupabaseConfig;
    local: boolean;
  };
  device: DeviceApiConfig;
  logging: {
    level: LogLevel;
  };
  lang?: 'fr' | 'en';
}

// ============================================
// Parsing
// ============================================

/**
 * Charge la configuration
 * Un fichier par défaut absent donne la configuration par défaut ; un chemin
 * demandé explicitement doit exister.
 */
export function loadConfig(configPath?: string): FleetConfig {
  const explicit = configPath ?? process.env.WGFLEET_CONFIG;
  const path = explicit ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(path)) {
    if (explicit) {
      throw new FleetError('CONFIG_INVALID', t('error.configNotFound', { path }));
    }
    return parseConfigText('');
  }

  return parseConfigText(readFileSync(path, 'utf-8'));
}

/**
 * Parse et valide le texte YAML
 */
export function parseConfigText(content: string): FleetConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content) ?? {};
  } catch (error: unknown) {
    throw new FleetError('CONFIG_INVALID', t('error.configInvalid', { error: errorMessage(error) }));
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(racine)'}: ${issue.message}`)
      .join('; ');
    throw new FleetError('CONFIG_INVALID', t('error.configInvalid', { error: details }));
  }

  return normalizeConfig(result.data);
}

/**
 * Lit un secret depuis un fichier (une ligne)
 */
function readSecretFile(path: string): string {
  if (!existsSync(path)) {
    throw new FleetError('CONFIG_INVALID', t('error.secretFileNotFound', { path }));
  }
  return readFileSync(path, 'utf-8').trim();
}

function normalizeConfig(raw: RawConfig): FleetConfig {
  const config: FleetConfig = {
    tunnel: {
      interface: raw.tunnel.interface,
      configPath: raw.tunnel.config_path ?? `/etc/wireguard/${raw.tunnel.interface}.conf`,
      network: raw.tunnel.network,
      gateway: raw.tunnel.gateway,
      listenPort: raw.tunnel.listen_port,
      endpoint: raw.tunnel.endpoint,
      reload: raw.tunnel.reload,
    },
    probe: {
      timeoutMs: raw.probe.timeout_ms,
      attempts: raw.probe.attempts,
      apiPort: raw.probe.api_port,
      concurrency: raw.probe.concurrency,
    },
    sources: {
      local: raw.sources.local.enabled,
    },
    device: {
      scheme: raw.device.scheme,
      port: raw.device.port,
      verifyTls: raw.device.verify_tls,
      timeoutMs: raw.device.timeout_ms,
    },
    logging: {
      level: raw.logging.level,
    },
    lang: raw.lang,
  };

  const pg = raw.sources.postgres;
  if (pg) {
    // Priorité: variable d'environnement > fichier > valeur en clair
    const url = process.env.WGFLEET_POSTGRES_URL ?? (pg.url_file ? readSecretFile(pg.url_file) : pg.url);
    if (!url) {
      throw new FleetError('CONFIG_INVALID', t('error.configInvalid', { error: 'sources.postgres: url ou url_file requis' }));
    }
    config.sources.postgres = {
      url,
      table: pg.table,
      ssl: pg.ssl === 'disable' ? false : pg.ssl,
      timeoutMs: pg.timeout_ms,
    };
  }

  const sb = raw.sources.supabase;
  if (sb) {
    const key = process.env.WGFLEET_SUPABASE_KEY ?? (sb.key_file ? readSecretFile(sb.key_file) : sb.key);
    if (!key) {
      throw new FleetError('CONFIG_INVALID', t('error.configInvalid', { error: 'sources.supabase: key ou key_file requis' }));
    }
    config.sources.supabase = {
      url: sb.url.replace(/\/+$/, ''),
      key,
      table: sb.table,
      timeoutMs: sb.timeout_ms,
    };
  }

  return config;
}

/**
 * Exemple de configuration commenté
 */
export function getExampleConfig(): string {
  return `# Configuration wgfleet
# Flotte de routeurs MikroTik reliés au serveur par WireGuard

tunnel:
  interface: wg0
  config_path: /etc/wireguard/wg0.conf
  # Pool des adresses attribuées aux routeurs
  network: 10.10.0.0/24
  gateway: 10.10.0.1
  listen_port: 51820
  # Adresse publique du serveur (scripts de configuration routeur)
  endpoint: vpn.example.net
  # wg-quick down/up après chaque modification du fichier
  reload: true

# Sondes de santé (ping + ouverture du port API)
probe:
  timeout_ms: 5000
  attempts: 3
  api_port: 8728
  concurrency: 16

# Sources des enregistrements, par ordre de priorité :
# postgres, puis supabase, puis le fichier WireGuard
sources:
  postgres:
    # Ou WGFLEET_POSTGRES_URL
    url_file: /etc/wgfleet/postgres.url
    table: routers
    ssl: require
    timeout_ms: 5000

  # supabase:
  #   url: https://votre-projet.supabase.co
  #   key_file: /etc/wgfleet/supabase.key
  #   table: routers

  local:
    enabled: true

# API REST RouterOS (check-device)
device:
  scheme: https
  verify_tls: false
  timeout_ms: 5000

logging:
  level: info

lang: fr
`;
}
