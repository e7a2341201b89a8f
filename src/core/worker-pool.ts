/**
 * Bounded worker pool
 *
 * Runs independent units of work with at most `concurrency` in flight and
 * collects results by submission index, so completion order never affects
 * output order. A failing unit yields `fallback` and is reported; siblings
 * keep running.
 */

import Bottleneck from 'bottleneck';

export interface WorkerPoolOptions<T, R> {
  concurrency: number;
  /** Value stored in the slot of a unit that threw */
  fallback: R;
  onError?: (error: unknown, item: T, index: number) => void;
}

export async function runBounded<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions<T, R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length).fill(options.fallback);
  const limiter = new Bottleneck({ maxConcurrent: Math.max(1, options.concurrency) });

  await Promise.all(
    items.map((item, index) =>
      limiter
        .schedule(() => worker(item, index))
        .then(
          (value) => {
            results[index] = value;
          },
          (error: unknown) => {
            results[index] = options.fallback;
            options.onError?.(error, item, index);
          }
        )
    )
  );

  return results;
}
