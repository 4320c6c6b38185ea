import { describe, it, expect } from 'vitest';
import { PoolCancelledError, runWithConcurrency } from '../src/dispatch/worker-pool';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('runWithConcurrency', () => {
  it('returns results in input order whatever the completion order', async () => {
    const results = await runWithConcurrency<number, string>([30, 5, 15], { limit: 3 }, async (ms, index) => {
      await delay(ms);
      return { ok: true, value: `item-${index}` };
    });

    expect(results).toEqual(['item-0', 'item-1', 'item-2']);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;

    await runWithConcurrency<number, number>([1, 2, 3, 4, 5, 6, 7], { limit: 2 }, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return { ok: true, value: n };
    });

    expect(peak).toBe(2);
  });

  it('stops scheduling after the first failure and rethrows it', async () => {
    const started: number[] = [];

    await expect(
      runWithConcurrency<number, number>([0, 1, 2, 3], { limit: 1 }, async (n) => {
        started.push(n);
        return n === 1 ? { ok: false, error: new Error('chunk 1 failed') } : { ok: true, value: n };
      })
    ).rejects.toThrow('chunk 1 failed');

    expect(started).toEqual([0, 1]);
  });

  it('stops scheduling once the signal is aborted', async () => {
    const controller = new AbortController();
    const started: number[] = [];

    const run = runWithConcurrency<number, number>([0, 1, 2], { limit: 1, signal: controller.signal }, async (n) => {
      started.push(n);
      if (n === 0) controller.abort();
      return { ok: true, value: n };
    });

    await expect(run).rejects.toBeInstanceOf(PoolCancelledError);
    expect(started).toEqual([0]);
  });

  it('runs one item at a time when the limit is not a number', async () => {
    let active = 0;
    let peak = 0;

    const results = await runWithConcurrency<number, number>([1, 2, 3], { limit: Number.NaN }, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await delay(2);
      active--;
      return { ok: true, value: n * 10 };
    });

    expect(results).toEqual([10, 20, 30]);
    expect(peak).toBe(1);
  });

  it('handles an empty list', async () => {
    await expect(runWithConcurrency<number, number>([], { limit: 4 }, async () => ({ ok: true, value: 1 }))).resolves.toEqual([]);
  });
});
