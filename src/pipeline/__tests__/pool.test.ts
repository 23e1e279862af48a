/**
 * Tests for the bounded worker pool
 */

import { describe, it, expect } from 'vitest';
import { runPool } from '../pool.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

async function* numbers(count: number): AsyncGenerator<number> {
  for (let i = 1; i <= count; i++) {
    yield i;
  }
}

describe('runPool', () => {
  it('processes every item from a sync iterable', async () => {
    const results = await runPool([1, 2, 3], 2, async (n) => n * 10);
    expect([...results].sort((a, b) => a - b)).toEqual([10, 20, 30]);
  });

  it('processes every item from an async iterable', async () => {
    const results = await runPool(numbers(5), 3, async (n) => n);
    expect([...results].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
  });

  it('never runs more than `concurrency` workers at once', async () => {
    let active = 0;
    let peak = 0;

    await runPool(numbers(10), 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    });

    expect(peak).toBe(3);
  });

  it('lets fast items finish while a slow one is still running', async () => {
    const gate = deferred();
    const finished: string[] = [];

    const run = runPool(['slow', 'a', 'b'], 2, async (item) => {
      if (item === 'slow') await gate.promise;
      finished.push(item);
      return item;
    });

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(finished).toEqual(['a', 'b']);

    gate.resolve();
    await expect(run).resolves.toEqual(['a', 'b', 'slow']);
  });

  it('returns an empty list for no items', async () => {
    await expect(runPool([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('rejects when a worker throws', async () => {
    await expect(
      runPool([1, 2, 3], 2, async (n) => {
        if (n === 2) throw new Error('worker failed');
        return n;
      }),
    ).rejects.toThrow('worker failed');
  });
});
