export type PoolTaskResult<R> = { ok: true; value: R } | { ok: false; error: Error };

export interface PoolOptions {
  limit: number;
  signal?: AbortSignal;
}

export class PoolCancelledError extends Error {
  constructor() {
    super('Work pool was cancelled');
    this.name = 'PoolCancelledError';
  }
}

/*
 * Runs `worker` over `items` with at most `limit` in flight. Results land in
 * index-addressed slots, so output order matches input order whatever the
 * completion order. The first failure stops new items from starting; items
 * already running finish, then that failure is thrown. An aborted signal
 * also stops new items and rejects with PoolCancelledError. A limit that is
 * not a finite number runs one item at a time.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  options: PoolOptions,
  worker: (item: T, index: number) => Promise<PoolTaskResult<R>>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const limit = Number.isFinite(options.limit) ? Math.max(1, Math.floor(options.limit)) : 1;
  let next = 0;
  const failure: { error?: Error } = {};

  const workers = new Array(Math.min(limit, items.length)).fill(0).map(async () => {
    while (failure.error === undefined && !options.signal?.aborted) {
      const idx = next++;
      if (idx >= items.length) break;
      const item = items[idx];
      if (item === undefined) continue;

      const outcome = await worker(item, idx);
      if (outcome.ok) {
        results[idx] = outcome.value;
      } else if (failure.error === undefined) {
        failure.error = outcome.error;
      }
    }
  });
  await Promise.all(workers);

  if (failure.error !== undefined) throw failure.error;
  if (options.signal?.aborted) throw new PoolCancelledError();
  return results;
}
