/**
 * @file utils/concurrency.ts
 * @description Exécution parallèle bornée
 */

/**
 * Applique `worker` à chaque élément avec au plus `limit` exécutions simultanées.
 * Le résultat conserve l'ordre d'entrée et n'est rendu qu'une fois tout terminé.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;

  async function run(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: workers }, () => run()));
  return results;
}
