/**
 * Worker Pool Tests
 */

import { describe, it, expect } from 'vitest';
import {
  hostParallelism,
  resolveConcurrency,
  runWithConcurrency,
} from '../../../resilience/worker-pool.js';
import { InvalidInputError } from '../../../core/errors.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('resolveConcurrency', () => {
  it('should default to host parallelism', () => {
    expect(resolveConcurrency()).toBe(hostParallelism());
  });

  it('should keep a request within host parallelism', () => {
    expect(resolveConcurrency(1)).toBe(1);
  });

  it('should clamp a request above host parallelism', () => {
    expect(resolveConcurrency(hostParallelism() + 8)).toBe(hostParallelism());
  });

  it('should reject zero, negative and fractional requests', () => {
    expect(() => resolveConcurrency(0)).toThrow(InvalidInputError);
    expect(() => resolveConcurrency(-2)).toThrow(InvalidInputError);
    expect(() => resolveConcurrency(2.5)).toThrow(InvalidInputError);
    expect(() => resolveConcurrency(Number.NaN)).toThrow(InvalidInputError);
  });
});

describe('runWithConcurrency', () => {
  it('should return results in item order regardless of completion order', async () => {
    const results = await runWithConcurrency([30, 10, 20], 3, async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(results).toEqual([60, 20, 40]);
  });

  it('should pass each item its position', async () => {
    const results = await runWithConcurrency(['a', 'b', 'c'], 2, async (item, position) => `${item}${position}`);

    expect(results).toEqual(['a0', 'b1', 'c2']);
  });

  it('should limit the number of tasks in flight', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(5);
      inFlight--;
    });

    expect(maxInFlight).toBe(3);
  });

  it('should handle an empty item list', async () => {
    await expect(runWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('should finish sibling tasks before rethrowing a task failure', async () => {
    const finished: number[] = [];

    const run = runWithConcurrency([1, 2, 3, 4], 2, async (item) => {
      await delay(item * 5);
      if (item === 1) throw new Error('task 1 failed');
      finished.push(item);
      return item;
    });

    await expect(run).rejects.toThrow('task 1 failed');
    expect(finished.sort()).toEqual([2, 3, 4]);
  });
});
