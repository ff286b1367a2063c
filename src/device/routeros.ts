/**
 * @file device/routeros.ts
 * @description Client de l'API REST RouterOS (v7+) d'un routeur de la flotte
 *
 * Documentation API: https://help.mikrotik.com/docs/display/ROS/REST+API
 */

import https from 'https';
import http from 'http';
import { FleetError } from '../errors.js';
import { t } from '../i18n.js';

/**
 * Identifiants fournis à chaque appel, jamais conservés ni journalisés
 */
export interface DeviceCredentials {
  username: string;
  secret: string;
}

export interface DeviceApiOptions {
  scheme?: 'https' | 'http';
  /** Défaut : 443 en https, 80 en http */
  port?: number;
  /** Les routeurs utilisent souvent un certificat auto-signé */
  verifyTls?: boolean;
  timeoutMs?: number;
}

export interface DeviceStatus {
  identity: string;
  version: string;
  platform: string;
  uptime: string;
}

/**
 * Lecture d'un champ texte d'une réponse JSON
 */
function readField(value: unknown, field: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(field in value)) return undefined;
  const entry: unknown = Reflect.get(value, field);
  return typeof entry === 'string' ? entry : undefined;
}

export class RouterOsClient {
  private readonly address: string;
  private readonly credentials: DeviceCredentials;
  private readonly scheme: 'https' | 'http';
  private readonly port: number;
  private readonly verifyTls: boolean;
  private readonly timeout: number;

  constructor(address: string, credentials: DeviceCredentials, options: DeviceApiOptions = {}) {
    this.address = address;
    this.credentials = credentials;
    this.scheme = options.scheme ?? 'https';
    this.port = options.port ?? (this.scheme === 'https' ? 443 : 80);
    this.verifyTls = options.verifyTls ?? false;
    this.timeout = options.timeoutMs ?? 5000;
  }

  /**
   * Identité et ressources système du routeur
   */
  async checkStatus(): Promise<DeviceStatus> {
    const identity = await this.apiRequest('/rest/system/identity');
    const resource = await this.apiRequest('/rest/system/resource');

    return {
      identity: readField(identity, 'name') ?? '',
      version: readField(resource, 'version') ?? '',
      platform: readField(resource, 'board-name') ?? readField(resource, 'platform') ?? '',
      uptime: readField(resource, 'uptime') ?? '',
    };
  }

  /**
   * GET authentifié (Basic) sur l'API REST
   */
  private apiRequest(path: string): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const fail = (error: string) =>
        reject(new FleetError('API_UNREACHABLE', t('device.apiError', { address: this.address, error })));

      const auth = Buffer.from(`${this.credentials.username}:${this.credentials.secret}`).toString('base64');
      const options: https.RequestOptions = {
        hostname: this.address,
        port: this.port,
        path,
        method: 'GET',
        headers: {
          Authorization: `Basic ${auth}`,
          Accept: 'application/json',
        },
        timeout: this.timeout,
      };

      const onResponse = (res: http.IncomingMessage) => {
        let data = '';
        res.setEncoding('utf-8');
        res.on('data', (chunk: string) => {
          data += chunk;
        });
        res.on('end', () => {
          const status = res.statusCode ?? 0;
          if (status === 401) {
            fail(t('device.unauthorized'));
            return;
          }
          if (status < 200 || status >= 300) {
            fail(`HTTP ${status}`);
            return;
          }
          try {
            resolve(JSON.parse(data));
          } catch {
            fail(t('device.invalidResponse', { body: data.slice(0, 100) }));
          }
        });
      };

      const req = this.scheme === 'https'
        ? https.request({ ...options, rejectUnauthorized: this.verifyTls }, onResponse)
        : http.request(options, onResponse);

      req.on('error', (e) => {
        fail(e.message);
      });

      req.on('timeout', () => {
        req.destroy();
        fail(t('device.timeout', { ms: this.timeout }));
      });

      req.end();
    });
  }
}
