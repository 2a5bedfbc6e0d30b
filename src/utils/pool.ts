import os from 'node:os';

export interface BatchRun<R> {
  results: R[];
  /** Whether the signal stopped scheduling before every item ran */
  interrupted: boolean;
}

export function defaultConcurrency(): number {
  return Math.max(os.availableParallelism(), 1);
}

/**
 * Run `task` over `items`, at most `concurrency` at a time, batch by batch.
 * A rejected task is turned into a result by `onRejected` so one failure
 * never breaks the batch. Once `signal` aborts, no further batch starts.
 */
export async function runInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
  onRejected: (item: T, reason: unknown) => R,
  signal?: AbortSignal
): Promise<BatchRun<R>> {
  const results: R[] = [];
  const size = Math.max(1, Math.floor(concurrency));

  for (let i = 0; i < items.length; i += size) {
    if (signal?.aborted) {
      return { results, interrupted: true };
    }

    const batch = items.slice(i, i + size);
    const settled = await Promise.allSettled(batch.map(item => task(item)));

    settled.forEach((result, j) => {
      results.push(result.status === 'fulfilled' ? result.value : onRejected(batch[j], result.reason));
    });
  }

  return { results, interrupted: false };
}
