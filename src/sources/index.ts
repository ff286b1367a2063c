/**
 * @file sources/index.ts
 * @description Construction de la liste ordonnée des sources d'enregistrements
 */

import type { FleetConfig } from '../config.js';
import { t } from '../i18n.js';
import type { ConfigStore } from '../tunnel/config-file.js';
import { logger } from '../utils/logger.js';
import { LocalConfigRecordSource } from './local-config.js';
import { PostgresRecordSource } from './postgres.js';
import { SupabaseRecordSource } from './supabase.js';
import type { RecordSource } from './types.js';

export * from './types.js';
export { BaseRecordSource } from './base.js';
export { PostgresRecordSource, createPostgresTable } from './postgres.js';
export type { RouterTable } from './postgres.js';
export { SupabaseRecordSource } from './supabase.js';
export { LocalConfigRecordSource } from './local-config.js';

/**
 * Sources dans l'ordre de priorité fixe : postgres, supabase, fichier WireGuard.
 * Les stockages absents de la configuration sont omis ; les autres sont
 * initialisés, une source injoignable reste dans la liste mais ne contribue rien.
 */
export async function createRecordSources(config: FleetConfig, store: ConfigStore): Promise<RecordSource[]> {
  const sources: RecordSource[] = [];
  const { postgres, supabase, local } = config.sources;

  if (postgres) {
    sources.push(
      PostgresRecordSource.fromConfig(
        { url: postgres.url, table: postgres.table, ssl: postgres.ssl },
        logger.createSimpleLogger('warn', 'postgres'),
        { timeoutMs: postgres.timeoutMs }
      )
    );
  }

  if (supabase) {
    sources.push(
      new SupabaseRecordSource(
        { url: supabase.url, key: supabase.key, table: supabase.table },
        logger.createSimpleLogger('warn', 'supabase'),
        { timeoutMs: supabase.timeoutMs }
      )
    );
  }

  if (local) {
    sources.push(new LocalConfigRecordSource(store, logger.createSimpleLogger('warn', 'wireguard-config')));
  }

  const states = await Promise.all(sources.map((source) => source.init()));
  sources.forEach((source, i) => {
    logger.debug(t('source.initialized', { source: source.name, state: states[i] ? t('source.stateOk') : t('source.stateUnavailable') }));
  });

  return sources;
}

/**
 * Ferme toutes les connexions, sans interrompre sur une erreur
 */
export async function closeRecordSources(sources: readonly RecordSource[]): Promise<void> {
  const results = await Promise.allSettled(sources.map((source) => source.close()));
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      logger.warn(t('source.closeFailed', { source: sources[i].name, error: String(result.reason) }));
    }
  });
}
