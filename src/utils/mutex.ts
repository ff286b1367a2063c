/**
 * @file utils/mutex.ts
 * @description Exclusion mutuelle intra-processus (file de promesses)
 */

/**
 * Verrou non réentrant : les sections critiques s'exécutent dans l'ordre d'arrivée
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Exécute `task` une fois toutes les sections précédentes terminées
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}

/**
 * Un verrou par clé (ex: nom de peer), libéré de la table quand plus personne ne l'attend
 */
export class KeyedMutex {
  private locks = new Map<string, Mutex>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }

    try {
      return await mutex.runExclusive(task);
    } finally {
      if (!mutex.isLocked() && this.locks.get(key) === mutex) {
        this.locks.delete(key);
      }
    }
  }

  get size(): number {
    return this.locks.size;
  }
}
