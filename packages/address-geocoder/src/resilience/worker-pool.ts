/**
 * Bounded Worker Pool
 *
 * Runs one async task per item with at most `concurrency` tasks in flight.
 * Workers pull the next item from a shared cursor; each task writes only
 * its own result slot. The returned promise settles once every worker has
 * drained, so a pool run is a synchronization barrier.
 */

import { availableParallelism } from 'node:os';
import { InvalidInputError } from '../core/errors.js';

/**
 * Number of parallel execution units the host offers
 */
export function hostParallelism(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Resolve the worker count for a run.
 *
 * Unset means host parallelism. A request above host parallelism is
 * clamped down to it.
 *
 * @throws InvalidInputError when `requested` is not a positive integer
 */
export function resolveConcurrency(requested?: number): number {
  const limit = hostParallelism();
  if (requested === undefined) {
    return limit;
  }

  if (!Number.isInteger(requested) || requested < 1) {
    throw new InvalidInputError(`Concurrency must be a positive integer, got ${requested}`);
  }

  return Math.min(requested, limit);
}

/**
 * Execute `task` for every item with controlled concurrency.
 *
 * Results are returned in item order regardless of completion order.
 * A rejected task does not stop its siblings; the first rejection is
 * rethrown after all workers finish.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, position: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const position = cursor++;
      const item = items[position];
      if (item === undefined) break;

      results[position] = await task(item, position);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  const runs: Array<Promise<void>> = [];
  for (let i = 0; i < workerCount; i++) {
    runs.push(worker());
  }

  const settled = await Promise.allSettled(runs);
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
  }

  return results;
}
