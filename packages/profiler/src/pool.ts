export type PoolResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Workers
 * pull the next item in input order; results keep that order. A failing
 * item is recorded and the pool carries on.
 */
export async function runPool<I, T>(
  items: readonly I[],
  concurrency: number,
  worker: (item: I, index: number) => Promise<T>,
): Promise<PoolResult<T>[]> {
  const results: PoolResult<T>[] = new Array<PoolResult<T>>(items.length);
  const width = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  let next = 0;

  const loop = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      try {
        results[index] = { ok: true, value: await worker(item, index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  };

  await Promise.all(Array.from({ length: width }, () => loop()));
  return results;
}
