/**
 * @file utils/logger.ts
 * @description Logger wgfleet - sortie stdout/stderr, capturée par journald
 *
 * Aucun fichier de log : la rotation et la persistance sont laissées au système.
 *
 * Utilisation :
 *   import { logger } from './utils/logger.js';
 *   logger.info('Peer ajouté');
 *   const log = logger.createSimpleLogger('warn', 'postgres');
 *   log('Base injoignable');
 */

// ============================================
// Types
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFn = (msg: string) => void;

export interface LoggerOptions {
  /** Niveau minimum (défaut: 'info' ou WGFLEET_LOG_LEVEL) */
  level?: LogLevel;
  /** Couleurs, null pour l'auto-détection */
  colors?: boolean | null;
  /** Préfixe global */
  prefix?: string;
}

// ============================================
// Constants
// ============================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

// ============================================
// State
// ============================================

let currentLevel: LogLevel = parseLevel(process.env.WGFLEET_LOG_LEVEL) ?? 'info';
let useColors: boolean | null = null;
let logPrefix = '';

// ============================================
// Helpers
// ============================================

export function parseLevel(value: string | undefined): LogLevel | undefined {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return undefined;
}

/**
 * [YYYY-MM-DD HH:mm:ss] en heure locale
 */
function formatTimestamp(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
}

function shouldUseColors(): boolean {
  if (useColors !== null) return useColors;
  if (process.env.NO_COLOR) return false;
  if (process.env.FORCE_COLOR) return true;
  return process.stdout.isTTY === true;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function formatMessage(level: LogLevel, message: string, args: unknown[] = [], scope?: string): string {
  const label = level.toUpperCase().padEnd(5);
  const prefix = logPrefix ? `[${logPrefix}] ` : '';
  const scoped = scope ? `[${scope}] ` : '';
  const extra = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
  const full = `${prefix}${scoped}${message}${extra}`;

  if (shouldUseColors()) {
    return `${DIM}[${formatTimestamp()}]${RESET} ${LEVEL_COLORS[level]}${BOLD}[${label}]${RESET} ${full}`;
  }
  return `[${formatTimestamp()}] [${label}] ${full}`;
}

function write(level: LogLevel, message: string, args: unknown[], scope?: string): void {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, message, args, scope);
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

// ============================================
// Logger Functions
// ============================================

function debug(message: string, ...args: unknown[]): void {
  write('debug', message, args);
}

function info(message: string, ...args: unknown[]): void {
  write('info', message, args);
}

function warn(message: string, ...args: unknown[]): void {
  write('warn', message, args);
}

function error(message: string, ...args: unknown[]): void {
  write('error', message, args);
}

/**
 * Fonction de log à un seul argument, pour les composants qui reçoivent `log`
 * en paramètre de constructeur
 */
function createSimpleLogger(level: LogLevel = 'info', scope?: string): LogFn {
  return (msg: string) => write(level, msg, [], scope);
}

// ============================================
// Configuration
// ============================================

function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * @param enabled true/false ou null pour l'auto-détection
 */
function setColors(enabled: boolean | null): void {
  useColors = enabled;
}

function setPrefix(prefix: string): void {
  logPrefix = prefix;
}

function configure(options: LoggerOptions): void {
  if (options.level !== undefined) setLogLevel(options.level);
  if (options.colors !== undefined) setColors(options.colors);
  if (options.prefix !== undefined) setPrefix(options.prefix);
}

// ============================================
// Exports
// ============================================

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  setColors,
  setPrefix,
  configure,
  createSimpleLogger,
};

export {
  debug,
  info,
  warn,
  error,
  setLogLevel,
  setColors,
  setPrefix,
  configure,
  createSimpleLogger,
};

export default logger;
