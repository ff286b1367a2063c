/**
 * @file health.ts
 * @description Sondes de santé des peers (écho réseau + ouverture du port API)
 */

import { execFile } from 'child_process';
import { createConnection, Socket } from 'net';
import { RouterOsClient, type DeviceCredentials, type DeviceStatus } from './device/routeros.js';
import { errorMessage } from './errors.js';
import { t } from './i18n.js';

// ============================================
// Types
// ============================================

/**
 * Capacités système utilisées par les sondes.
 * Le moteur de réconciliation ne dépend que de cette interface.
 */
export interface ProbeCapability {
  ping(address: string, timeoutMs: number): Promise<boolean>;
  portOpen(address: string, port: number, timeoutMs: number): Promise<boolean>;
}

export interface ProbeOptions {
  /** Délai par tentative (ms) */
  timeoutMs: number;
  /** Nombre de tentatives d'écho */
  attempts: number;
  /** Port de l'API de gestion (8728 = API RouterOS) */
  apiPort: number;
}

export interface ProbeResult {
  address: string;
  reachable: boolean;
  apiAccessible: boolean;
  timestamp: Date;
  /** Tentatives d'écho effectuées */
  attempts: number;
  /** Cause de l'échec, absente en cas de succès complet */
  reason?: string;
}

export type DeviceCheck =
  | { ok: true; status: DeviceStatus }
  | { ok: false; reason: string };

export type DeviceClientFactory = (address: string, credentials: DeviceCredentials) => { checkStatus(): Promise<DeviceStatus> };

export const DEFAULT_PROBE_OPTIONS: ProbeOptions = {
  timeoutMs: 5000,
  attempts: 3,
  apiPort: 8728,
};

const MAX_TIMEOUT_MS = 10_000;
const MAX_ATTEMPTS = 10;

// ============================================
// Capacités système
// ============================================

/**
 * ping(8) et socket TCP natif
 */
export class SystemProbe implements ProbeCapability {
  ping(address: string, timeoutMs: number): Promise<boolean> {
    const waitSec = String(Math.max(1, Math.ceil(timeoutMs / 1000)));
    return new Promise((resolve) => {
      execFile(
        'ping',
        ['-c', '1', '-W', waitSec, address],
        { timeout: timeoutMs + 1000, killSignal: 'SIGKILL' },
        (error) => resolve(error === null)
      );
    });
  }

  /**
   * Ouverture de socket uniquement, aucun échange protocolaire
   */
  portOpen(address: string, port: number, timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket: Socket = createConnection({ host: address, port });

      const timer = setTimeout(() => {
        socket.destroy();
        resolve(false);
      }, timeoutMs);

      socket.on('connect', () => {
        clearTimeout(timer);
        socket.destroy();
        resolve(true);
      });

      socket.on('error', () => {
        clearTimeout(timer);
        socket.destroy();
        resolve(false);
      });
    });
  }
}

// ============================================
// HealthProbe
// ============================================

/**
 * Sonde bornée dans le temps : au pire `attempts × timeoutMs` + un test de port
 */
export class HealthProbe {
  private readonly options: ProbeOptions;
  private readonly capability: ProbeCapability;
  private readonly deviceFactory: DeviceClientFactory;
  private readonly log: (msg: string) => void;

  constructor(
    options: Partial<ProbeOptions> = {},
    capability: ProbeCapability = new SystemProbe(),
    log: (msg: string) => void = console.log,
    deviceFactory?: DeviceClientFactory
  ) {
    const merged: ProbeOptions = { ...DEFAULT_PROBE_OPTIONS, ...options };
    if (!Number.isInteger(merged.attempts) || merged.attempts < 1 || merged.attempts > MAX_ATTEMPTS) {
      throw new RangeError(t('probe.invalidAttempts', { max: MAX_ATTEMPTS }));
    }
    if (merged.timeoutMs < 100 || merged.timeoutMs > MAX_TIMEOUT_MS) {
      throw new RangeError(t('probe.invalidTimeout', { max: MAX_TIMEOUT_MS }));
    }

    this.options = merged;
    this.capability = capability;
    this.log = log;
    this.deviceFactory = deviceFactory ?? ((address, credentials) =>
      new RouterOsClient(address, credentials, { timeoutMs: merged.timeoutMs }));
  }

  get apiPort(): number {
    return this.options.apiPort;
  }

  /**
   * Joignabilité puis accès au port API. Ne lève jamais.
   */
  async check(address: string, apiPort: number = this.options.apiPort): Promise<ProbeResult> {
    const { timeoutMs, attempts } = this.options;
    let tries = 0;
    let reachable = false;
    let lastError: string | undefined;

    while (tries < attempts && !reachable) {
      tries++;
      try {
        reachable = await this.capability.ping(address, timeoutMs);
        // La raison rapportée est celle de la dernière tentative
        lastError = undefined;
      } catch (error: unknown) {
        lastError = errorMessage(error);
      }
    }

    if (!reachable) {
      const reason = lastError
        ? t('probe.pingError', { address, error: lastError })
        : t('probe.noEcho', { address, attempts: tries });
      this.log(reason);
      return { address, reachable: false, apiAccessible: false, timestamp: new Date(), attempts: tries, reason };
    }

    let apiAccessible = false;
    let reason: string | undefined;
    try {
      apiAccessible = await this.capability.portOpen(address, apiPort, timeoutMs);
      if (!apiAccessible) reason = t('probe.portClosed', { address, port: apiPort });
    } catch (error: unknown) {
      reason = t('probe.portError', { address, port: apiPort, error: errorMessage(error) });
    }

    if (reason) this.log(reason);
    return { address, reachable: true, apiAccessible, timestamp: new Date(), attempts: tries, reason };
  }

  /**
   * Vérification étendue via l'API du routeur. Les identifiants ne sont pas conservés.
   */
  async checkDevice(address: string, credentials: DeviceCredentials): Promise<DeviceCheck> {
    try {
      const status = await this.deviceFactory(address, credentials).checkStatus();
      return { ok: true, status };
    } catch (error: unknown) {
      const reason = t('probe.deviceError', { address, error: errorMessage(error) });
      this.log(reason);
      return { ok: false, reason };
    }
  }
}
