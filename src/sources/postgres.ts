/**
 * @file sources/postgres.ts
 * @description Source primaire : table `routers` dans PostgreSQL
 */

import postgres from 'postgres';
import { errorMessage } from '../errors.js';
import { t } from '../i18n.js';
import type { Peer } from '../types.js';
import { BaseRecordSource, type SourceOptions } from './base.js';
import { peerToRow, rowsToPeers, type RouterRow, type RouterWrite } from './rows.js';
import { VPN_TYPE, fail, ok, type ListFilter, type PeerRecord, type SourceResult } from './types.js';

const UNIQUE_VIOLATION = '23505';

/**
 * Accès SQL à la table des routeurs
 * Séparé de la source pour pouvoir être remplacé dans les tests.
 */
export interface RouterTable {
  ping(): Promise<void>;
  select(filter: ListFilter): Promise<RouterRow[]>;
  selectOne(name: string): Promise<RouterRow | undefined>;
  /** 'conflict' si la ligne existe avec une autre clé publique */
  upsert(row: RouterWrite): Promise<'written' | 'conflict'>;
  /** Nombre de lignes supprimées */
  delete(name: string): Promise<number>;
  end(): Promise<void>;
}

export interface PostgresSourceConfig {
  url: string;
  table: string;
  ssl: 'require' | 'prefer' | false;
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof postgres.PostgresError && error.code === UNIQUE_VIOLATION;
}

/**
 * Implémentation de RouterTable avec le client `postgres`
 */
export function createPostgresTable(config: PostgresSourceConfig, connectTimeoutSec: number): RouterTable {
  const sql = postgres(config.url, {
    ssl: config.ssl,
    max: 4,
    connect_timeout: connectTimeoutSec,
    idle_timeout: 20,
    onnotice: () => undefined,
  });
  const table = sql(config.table);
  const columns = () => sql`name, public_key, ip_address::text AS ip_address, vpn_type, is_active, api_accessible, last_vpn_check`;

  return {
    async ping() {
      await sql`SELECT 1`;
    },

    async select(filter) {
      const active = filter.activeOnly ? sql`AND is_active = true` : sql``;
      return sql<RouterRow[]>`
        SELECT ${columns()} FROM ${table}
        WHERE vpn_type = ${VPN_TYPE} ${active}
        ORDER BY created_at ASC, name ASC
      `;
    },

    async selectOne(name) {
      const rows = await sql<RouterRow[]>`
        SELECT ${columns()} FROM ${table}
        WHERE name = ${name} AND vpn_type = ${VPN_TYPE}
      `;
      return rows[0];
    },

    async upsert(row) {
      try {
        const rows = await sql<Array<{ name: string }>>`
          INSERT INTO ${table} (name, public_key, ip_address, vpn_type, is_active, api_accessible, last_vpn_check)
          VALUES (
            ${row.name}, ${row.public_key}, ${row.ip_address}, ${row.vpn_type},
            ${row.is_active}, ${row.api_accessible}, ${row.last_vpn_check}
          )
          ON CONFLICT (name) DO UPDATE SET
            ip_address = EXCLUDED.ip_address,
            vpn_type = EXCLUDED.vpn_type,
            is_active = EXCLUDED.is_active,
            api_accessible = EXCLUDED.api_accessible,
            last_vpn_check = EXCLUDED.last_vpn_check,
            updated_at = NOW()
          WHERE ${table}.public_key = EXCLUDED.public_key
          RETURNING name
        `;
        return rows.length > 0 ? 'written' : 'conflict';
      } catch (error: unknown) {
        // Clé publique déjà portée par un autre routeur
        if (isUniqueViolation(error)) return 'conflict';
        throw error;
      }
    },

    async delete(name) {
      const result = await sql`
        DELETE FROM ${table} WHERE name = ${name} AND vpn_type = ${VPN_TYPE}
      `;
      return result.count;
    },

    async end() {
      await sql.end({ timeout: 5 });
    },
  };
}

/**
 * Source primaire (base du système de facturation)
 */
export class PostgresRecordSource extends BaseRecordSource {
  readonly name = 'postgres' as const;

  private readonly openTable: () => RouterTable;
  private table: RouterTable | null = null;

  /**
   * @param openTable fabrique de l'accès SQL, appelée à l'initialisation
   */
  constructor(
    openTable: () => RouterTable,
    log: (msg: string) => void = console.log,
    options: SourceOptions = {}
  ) {
    super(log, options);
    this.openTable = openTable;
  }

  static fromConfig(
    config: PostgresSourceConfig,
    log: (msg: string) => void = console.log,
    options: SourceOptions = {}
  ): PostgresRecordSource {
    const connectTimeoutSec = Math.max(1, Math.ceil((options.timeoutMs ?? 5000) / 1000));
    return new PostgresRecordSource(() => createPostgresTable(config, connectTimeoutSec), log, options);
  }

  protected async connect(): Promise<void> {
    this.table = this.openTable();
  }

  async healthCheck(): Promise<boolean> {
    if (!this.table) return false;
    try {
      await this.withTimeout(this.table.ping(), 'healthCheck');
      return true;
    } catch (error: unknown) {
      this.log(t('source.healthFailed', { source: this.name, error: errorMessage(error) }));
      return false;
    }
  }

  protected async doList(filter: ListFilter): Promise<SourceResult<Peer[]>> {
    const rows = await this.requireTable().select(filter);
    return ok(rowsToPeers(rows, this.name, (row) => {
      this.log(t('source.rowSkipped', { source: this.name, name: row.name }));
    }));
  }

  protected async doGet(name: string): Promise<SourceResult<Peer>> {
    const row = await this.requireTable().selectOne(name);
    const peer = row ? rowsToPeers([row], this.name, () => undefined)[0] : undefined;
    if (!peer) {
      return fail('not_found', t('peer.notFound', { name }));
    }
    return ok(peer);
  }

  protected async doUpsert(peer: PeerRecord): Promise<SourceResult<void>> {
    const outcome = await this.requireTable().upsert(peerToRow(peer));
    if (outcome === 'conflict') {
      return fail('conflict', t('source.conflict', { source: this.name, name: peer.name }));
    }
    return ok(undefined);
  }

  protected async doRemove(name: string): Promise<SourceResult<void>> {
    const count = await this.requireTable().delete(name);
    if (count === 0) {
      return fail('not_found', t('peer.notFound', { name }));
    }
    return ok(undefined);
  }

  async close(): Promise<void> {
    const table = this.table;
    this.table = null;
    if (table) {
      await table.end();
    }
  }

  private requireTable(): RouterTable {
    if (!this.table) {
      throw new Error(t('source.unavailable', { source: this.name }));
    }
    return this.table;
  }
}
