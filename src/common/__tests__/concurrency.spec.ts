import { describe, expect, it } from 'vitest';
import { mapWithConcurrency } from '../concurrency.js';

const tick = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let active = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (delay, index) => {
      active += 1;
      peak = Math.max(peak, active);
      await tick(delay);
      active -= 1;
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
    expect(peak).toBe(2);
  });

  it('handles empty input and limits below one', async () => {
    expect(await mapWithConcurrency([], 4, async value => value)).toEqual([]);
    expect(await mapWithConcurrency([1, 2], 0, async value => value * 2)).toEqual([2, 4]);
  });

  it('rejects when a worker fails', async () => {
    await expect(
      mapWithConcurrency([1, 2, 3], 3, async value => {
        if (value === 2) throw new Error('worker failed');
        return value;
      }),
    ).rejects.toThrow('worker failed');
  });
});
