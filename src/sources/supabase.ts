/**
 * @file sources/supabase.ts
 * @description Source secondaire : table `routers` exposée par Supabase (PostgREST)
 */

import https from 'https';
import http from 'http';
import { errorMessage } from '../errors.js';
import { t } from '../i18n.js';
import type { Peer } from '../types.js';
import { BaseRecordSource, type SourceOptions } from './base.js';
import { peerToRow, rowsToPeers, type RouterRow } from './rows.js';
import { VPN_TYPE, fail, ok, type ListFilter, type PeerRecord, type SourceResult } from './types.js';

const COLUMNS = 'name,public_key,ip_address,vpn_type,is_active,api_accessible,last_vpn_check';

export interface SupabaseSourceConfig {
  /** URL du projet, ex: https://xyz.supabase.co */
  url: string;
  /** Clé d'API (service role) */
  key: string;
  table: string;
}

interface HttpResponse {
  statusCode: number;
  body: string;
}

function isRouterRow(value: unknown): value is RouterRow {
  return typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string';
}

/**
 * Source Supabase via l'API REST PostgREST
 */
export class SupabaseRecordSource extends BaseRecordSource {
  readonly name = 'supabase' as const;

  private config: SupabaseSourceConfig;

  constructor(
    config: SupabaseSourceConfig,
    log: (msg: string) => void = console.log,
    options: SourceOptions = {}
  ) {
    super(log, options);
    this.config = config;
  }

  protected async connect(): Promise<void> {
    // Pas de connexion persistante : chaque appel est une requête HTTP
    const { protocol } = new URL(this.config.url);
    if (protocol !== 'https:' && protocol !== 'http:') {
      throw new Error(t('source.invalidUrl', { source: this.name, url: this.config.url }));
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await this.request('GET', this.query({ select: 'name', limit: '1' }));
      if (res.statusCode >= 200 && res.statusCode < 300) return true;
      this.log(t('source.healthFailed', { source: this.name, error: `HTTP ${res.statusCode}` }));
      return false;
    } catch (error: unknown) {
      this.log(t('source.healthFailed', { source: this.name, error: errorMessage(error) }));
      return false;
    }
  }

  protected async doList(filter: ListFilter): Promise<SourceResult<Peer[]>> {
    const params: Record<string, string> = {
      select: COLUMNS,
      vpn_type: `eq.${VPN_TYPE}`,
      order: 'created_at.asc,name.asc',
    };
    if (filter.activeOnly) params.is_active = 'is.true';

    const rows = await this.fetchRows(params);
    return ok(rowsToPeers(rows, this.name, (row) => {
      this.log(t('source.rowSkipped', { source: this.name, name: row.name }));
    }));
  }

  protected async doGet(name: string): Promise<SourceResult<Peer>> {
    const rows = await this.fetchRows({ select: COLUMNS, vpn_type: `eq.${VPN_TYPE}`, name: `eq.${name}` });
    const peer = rowsToPeers(rows, this.name, () => undefined)[0];
    if (!peer) {
      return fail('not_found', t('peer.notFound', { name }));
    }
    return ok(peer);
  }

  /**
   * Lecture préalable : une ligne existante avec une autre clé publique est un conflit
   */
  protected async doUpsert(peer: PeerRecord): Promise<SourceResult<void>> {
    const existing = await this.fetchRows({ select: 'name,public_key', name: `eq.${peer.name}` });
    const row = peerToRow(peer);

    let res: HttpResponse;
    if (existing.length > 0) {
      if (existing[0].public_key !== peer.publicKey) {
        return fail('conflict', t('source.conflict', { source: this.name, name: peer.name }));
      }
      const { name: _name, public_key: _key, ...changes } = row;
      res = await this.request('PATCH', this.query({ name: `eq.${peer.name}` }), JSON.stringify(changes));
    } else {
      res = await this.request('POST', this.query({}), JSON.stringify(row));
    }

    if (res.statusCode === 409) {
      return fail('conflict', t('source.conflict', { source: this.name, name: peer.name }));
    }
    this.assertOk(res);
    return ok(undefined);
  }

  protected async doRemove(name: string): Promise<SourceResult<void>> {
    const res = await this.request(
      'DELETE',
      this.query({ name: `eq.${name}`, vpn_type: `eq.${VPN_TYPE}` }),
      undefined,
      { Prefer: 'return=representation' }
    );
    this.assertOk(res);

    const deleted: unknown = JSON.parse(res.body || '[]');
    if (!Array.isArray(deleted) || deleted.length === 0) {
      return fail('not_found', t('peer.notFound', { name }));
    }
    return ok(undefined);
  }

  private async fetchRows(params: Record<string, string>): Promise<RouterRow[]> {
    const res = await this.request('GET', this.query(params));
    this.assertOk(res);

    const parsed: unknown = JSON.parse(res.body);
    if (!Array.isArray(parsed)) {
      throw new Error(t('source.invalidResponse', { source: this.name }));
    }
    return parsed.filter(isRouterRow);
  }

  private query(params: Record<string, string>): string {
    const search = new URLSearchParams(params).toString();
    return `/rest/v1/${encodeURIComponent(this.config.table)}${search ? `?${search}` : ''}`;
  }

  private assertOk(res: HttpResponse): void {
    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new Error(`Supabase HTTP ${res.statusCode}: ${res.body.slice(0, 200)}`);
    }
  }

  /**
   * Requête HTTP(S) vers PostgREST
   */
  private request(
    method: 'GET' | 'POST' | 'PATCH' | 'DELETE',
    path: string,
    body?: string,
    extraHeaders: Record<string, string> = {}
  ): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
      const base = new URL(this.config.url);
      const isHttps = base.protocol === 'https:';
      const httpModule = isHttps ? https : http;

      const headers: Record<string, string> = {
        apikey: this.config.key,
        Authorization: `Bearer ${this.config.key}`,
        Accept: 'application/json',
        Prefer: 'return=minimal',
        ...extraHeaders,
      };
      if (body !== undefined) {
        headers['Content-Type'] = 'application/json';
        headers['Content-Length'] = Buffer.byteLength(body).toString();
      }

      const req = httpModule.request(
        {
          hostname: base.hostname,
          port: base.port || (isHttps ? 443 : 80),
          path,
          method,
          headers,
          timeout: this.timeout,
        },
        (res) => {
          let data = '';
          res.setEncoding('utf-8');
          res.on('data', (chunk: string) => {
            data += chunk;
          });
          res.on('end', () => {
            resolve({ statusCode: res.statusCode ?? 0, body: data });
          });
        }
      );

      req.on('error', (e) => {
        reject(new Error(`Erreur réseau: ${e.message}`));
      });

      req.on('timeout', () => {
        req.destroy();
        reject(new Error('Timeout'));
      });

      if (body !== undefined) {
        req.write(body);
      }
      req.end();
    });
  }
}
