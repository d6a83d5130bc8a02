/**
 * Bounded worker pool — at most `concurrency` tasks in flight.
 *
 * On abort the pool stops dispatching and settles at once with whatever has
 * completed; in-flight tasks see their signal abort and are not awaited.
 * A task that throws aborts the rest and rejects the pool.
 */

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
  /** Called after each task completes, in completion order. */
  onSettled?: (index: number, completed: number) => void;
}

export interface PoolOutcome<R> {
  /** Index-aligned with the input; `undefined` where the task never finished. */
  results: (R | undefined)[];
  completed: number;
  cancelled: boolean;
}

export type PoolTask<T, R> = (item: T, index: number, signal: AbortSignal) => Promise<R>;

export function runPool<T, R>(items: readonly T[], task: PoolTask<T, R>, options: PoolOptions): Promise<PoolOutcome<R>> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const results: (R | undefined)[] = new Array<R | undefined>(items.length).fill(undefined);
  const controller = new AbortController();
  let next = 0;
  let active = 0;
  let completed = 0;
  let settled = false;

  return new Promise<PoolOutcome<R>>((resolve, reject) => {
    const finish = (cancelled: boolean) => {
      if (settled) return;
      settled = true;
      options.signal?.removeEventListener("abort", onAbort);
      resolve({ results, completed, cancelled });
    };
    const onAbort = () => {
      controller.abort();
      finish(true);
    };

    const dispatch = () => {
      while (!settled && active < concurrency && next < items.length) {
        const index = next++;
        active++;
        task(items[index], index, controller.signal).then(
          (value) => {
            active--;
            if (settled) return;
            results[index] = value;
            completed++;
            options.onSettled?.(index, completed);
            if (completed === items.length) finish(false);
            else dispatch();
          },
          (err: unknown) => {
            active--;
            if (settled) return;
            settled = true;
            controller.abort();
            options.signal?.removeEventListener("abort", onAbort);
            reject(err);
          },
        );
      }
    };

    if (options.signal?.aborted) {
      onAbort();
      return;
    }
    options.signal?.addEventListener("abort", onAbort, { once: true });
    if (items.length === 0) finish(false);
    else dispatch();
  });
}
