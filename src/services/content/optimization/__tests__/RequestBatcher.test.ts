import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runWithConcurrency } from '../RequestBatcher';

describe('RequestBatcher runWithConcurrency', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('respects the concurrency limit and preserves ordering', async () => {
    let active = 0;
    let peak = 0;
    const worker = vi.fn(async (item: string) => {
      active++;
      peak = Math.max(peak, active);
      // Later items finish sooner
      await new Promise((r) => setTimeout(r, item === 'A' ? 30 : 5));
      active--;
      return `res:${item}`;
    });

    const p = runWithConcurrency(['A', 'B', 'C', 'D', 'E'], 2, worker);
    await vi.runAllTimersAsync();
    const out = await p;

    expect(out).toEqual(['res:A', 'res:B', 'res:C', 'res:D', 'res:E']);
    expect(peak).toBe(2);
    expect(worker).toHaveBeenCalledTimes(5);
  });

  it('passes the item index to the worker', async () => {
    const out = await runWithConcurrency(['x', 'y'], 3, async (item, index) => `${index}:${item}`);
    expect(out).toEqual(['0:x', '1:y']);
  });

  it('returns an empty array for no items', async () => {
    const worker = vi.fn(async (n: number) => n);
    await expect(runWithConcurrency([], 3, worker)).resolves.toEqual([]);
    expect(worker).not.toHaveBeenCalled();
  });

  it('treats a non-positive limit as one', async () => {
    let active = 0;
    let peak = 0;
    const p = runWithConcurrency([1, 2, 3], 0, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 1));
      active--;
      return n * 2;
    });
    await vi.runAllTimersAsync();
    expect(await p).toEqual([2, 4, 6]);
    expect(peak).toBe(1);
  });

  it('rejects with the first worker error', async () => {
    const p = runWithConcurrency(['ok', 'fail'], 2, async (item) => {
      if (item === 'fail') throw new Error('worker failed');
      return item;
    });
    await expect(p).rejects.toThrow('worker failed');
  });
});
