/**
 * Bounded worker pool for sub-requests
 *
 * At most `concurrency` workers run at once. Results come back in input
 * order. The first failure, or an abort of the caller's signal, rejects
 * immediately: workers still running are signalled to stop and their
 * results are discarded.
 */

import { CancelledError } from "../errors.js";

export type PoolWorker<T, R> = (item: T, signal: AbortSignal) => Promise<R>;

export function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: PoolWorker<T, R>,
  signal?: AbortSignal
): Promise<R[]> {
  if (signal?.aborted === true) {
    return Promise.reject(new CancelledError());
  }
  if (items.length === 0) {
    return Promise.resolve([]);
  }

  const limit = Math.max(1, Math.floor(concurrency));

  return new Promise<R[]>((resolve, reject) => {
    const controller = new AbortController();
    const queue = items.map((item, index) => ({ item, index }));
    const results: R[] = [];
    let active = 0;
    let settled = false;

    const cleanup = (): void => {
      signal?.removeEventListener("abort", onAbort);
    };

    const fail = (error: unknown): void => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      controller.abort();
      reject(error);
    };

    function onAbort(): void {
      fail(new CancelledError());
    }

    const launch = (): void => {
      while (!settled && active < limit) {
        const job = queue.shift();
        if (job === undefined) {
          break;
        }
        active++;

        worker(job.item, controller.signal).then((value) => {
          active--;
          if (settled) {
            return;
          }
          results[job.index] = value;
          if (active === 0 && queue.length === 0) {
            settled = true;
            cleanup();
            resolve(results);
          } else {
            launch();
          }
        }, fail);
      }
    };

    signal?.addEventListener("abort", onAbort, { once: true });
    launch();
  });
}
