/**
 * @file sources/base.ts
 * @description Classe de base des sources d'enregistrements
 */

import { errorMessage } from '../errors.js';
import { t } from '../i18n.js';
import type { Peer, SourceName } from '../types.js';
import {
  fail,
  type ListFilter,
  type PeerRecord,
  type RecordSource,
  type SourceResult,
} from './types.js';

export interface SourceOptions {
  /** Délai max d'un appel distant (ms) */
  timeoutMs?: number;
}

/**
 * Fournit la dégradation commune : une source indisponible, un appel en
 * timeout ou une erreur de transport deviennent des résultats `unavailable`.
 */
export abstract class BaseRecordSource implements RecordSource {
  abstract readonly name: SourceName;
  readonly writable: boolean = true;

  protected log: (msg: string) => void;
  protected timeout: number;
  private available = false;
  private initialized = false;

  constructor(log: (msg: string) => void = console.log, options: SourceOptions = {}) {
    this.log = log;
    this.timeout = options.timeoutMs ?? 5000;
  }

  /** Ouvre la connexion (ne doit pas tester la santé) */
  protected abstract connect(): Promise<void>;
  abstract healthCheck(): Promise<boolean>;
  protected abstract doList(filter: ListFilter): Promise<SourceResult<Peer[]>>;
  protected abstract doGet(name: string): Promise<SourceResult<Peer>>;
  protected abstract doUpsert(peer: PeerRecord): Promise<SourceResult<void>>;
  protected abstract doRemove(name: string): Promise<SourceResult<void>>;

  async init(): Promise<boolean> {
    if (this.initialized) return this.available;
    this.initialized = true;

    try {
      await this.withTimeout(this.connect(), 'connect');
      this.available = await this.healthCheck();
    } catch (error: unknown) {
      this.log(t('source.initFailed', { source: this.name, error: errorMessage(error) }));
      this.available = false;
    }

    if (!this.available) {
      this.log(t('source.unavailable', { source: this.name }));
      try {
        await this.close();
      } catch (error: unknown) {
        this.log(t('source.closeFailed', { source: this.name, error: errorMessage(error) }));
      }
    }
    return this.available;
  }

  isAvailable(): boolean {
    return this.available;
  }

  list(filter: ListFilter = {}): Promise<SourceResult<Peer[]>> {
    return this.guard('list', () => this.doList(filter));
  }

  get(name: string): Promise<SourceResult<Peer>> {
    return this.guard('get', () => this.doGet(name));
  }

  upsert(peer: PeerRecord): Promise<SourceResult<void>> {
    return this.guard('upsert', () => this.doUpsert(peer));
  }

  remove(name: string): Promise<SourceResult<void>> {
    return this.guard('remove', () => this.doRemove(name));
  }

  async close(): Promise<void> {
    // Rien à libérer par défaut
  }

  /**
   * Exécute une opération si la source est disponible, sans jamais lever
   */
  private async guard<T>(operation: string, task: () => Promise<SourceResult<T>>): Promise<SourceResult<T>> {
    if (!this.available) {
      return fail('unavailable', t('source.unavailable', { source: this.name }));
    }

    try {
      return await this.withTimeout(task(), operation);
    } catch (error: unknown) {
      const message = t('source.callFailed', { source: this.name, operation, error: errorMessage(error) });
      this.log(message);
      return fail('unavailable', message);
    }
  }

  /**
   * Rejette si l'opération dépasse `this.timeout`
   */
  protected withTimeout<T>(promise: Promise<T>, operation: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(t('source.timeout', { operation, ms: this.timeout })));
      }, this.timeout);

      promise.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }
}
