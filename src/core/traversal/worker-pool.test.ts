import { describe, it, expect } from 'vitest';
import { runPool } from './worker-pool.js';

describe('runPool', () => {
  it('returns results in item order', async () => {
    const results = await runPool([30, 10, 20], 3, async (ms) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return ms * 2;
    });
    expect(results).toEqual([60, 20, 40]);
  });

  it('passes the item index to the worker', async () => {
    const results = await runPool(['a', 'b'], 1, async (item, index) => `${item}${index}`);
    expect(results).toEqual(['a0', 'b1']);
  });

  it('handles an empty list', async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });

  it('starts no new item after the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    const results = await runPool(
      [1, 2, 3, 4],
      1,
      async (n) => {
        started.push(n);
        if (n === 2) controller.abort();
        return n;
      },
      controller.signal,
    );
    expect(started).toEqual([1, 2]);
    expect(results).toEqual([1, 2, undefined, undefined]);
  });

  it('rejects when a worker throws', async () => {
    await expect(
      runPool([1], 1, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });

  it('starts no new item after a worker throws and waits for the ones in flight', async () => {
    const started: number[] = [];
    const finished: number[] = [];

    const pool = runPool([0, 1, 2, 3, 4], 2, async (n) => {
      started.push(n);
      if (n === 0) throw new Error('disk full');
      await new Promise((resolve) => setTimeout(resolve, 10));
      finished.push(n);
      return n;
    });

    await expect(pool).rejects.toThrow('disk full');
    expect(started).toEqual([0, 1]);
    expect(finished).toEqual([1]);
  });
});
