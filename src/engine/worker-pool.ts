/**
 * Bounded worker pool for stage sub-tasks.
 *
 * At most `concurrency` workers run at once. The first failure stops
 * further dispatch; workers already running are awaited, then that first
 * error is thrown. Results come back in input order.
 */

import { CancellationError } from '../domain/errors';
import { CancellationToken } from './stage';

export interface PoolOptions {
  concurrency: number;
  /** Checked before each dispatch. */
  cancellation?: CancellationToken;
}

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(options.concurrency));
  const results = new Array<R>(items.length);
  const running = new Set<Promise<void>>();
  let failure: { error: unknown } | undefined;
  let next = 0;

  const dispatch = (index: number): void => {
    const task: Promise<void> = Promise.resolve()
      .then(() => worker(items[index], index))
      .then(
        (value) => {
          results[index] = value;
        },
        (error: unknown) => {
          if (!failure) failure = { error };
        },
      )
      .finally(() => {
        running.delete(task);
      });
    running.add(task);
  };

  while (next < items.length && !failure) {
    const token = options.cancellation;
    if (token?.canceled) {
      failure = { error: new CancellationError(token.reason) };
      break;
    }
    if (running.size >= limit) {
      await Promise.race(running);
      continue;
    }
    dispatch(next++);
  }

  await Promise.all(running);
  if (failure) throw failure.error;
  return results;
}
