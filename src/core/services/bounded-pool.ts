/**
 * Run `worker` over every item with at most `limit` calls pending at once.
 *
 * A fixed set of workers pulls the next index from a shared cursor and only
 * takes another item once its current one has settled. `worker` is expected
 * to handle its own failures; a rejection still frees the slot, but the pool
 * waits for every other item before rethrowing the first one.
 */
export async function runBounded<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  const size = Math.max(1, Math.floor(Number.isFinite(limit) ? limit : 1));
  let cursor = 0;
  const failures: unknown[] = [];

  const runWorker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      try {
        await worker(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const workers = Array.from({ length: Math.min(size, items.length) }, () => runWorker());
  await Promise.all(workers);

  if (failures.length > 0) {
    throw failures[0];
  }
}
