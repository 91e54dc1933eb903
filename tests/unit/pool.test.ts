import { describe, expect, it } from 'vitest';
import { mapWithConcurrency } from '@/utils/pool';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('keeps input order whatever the completion order', async () => {
    const results = await mapWithConcurrency([30, 5, 15, 1], 4, async (ms, i) => {
      await delay(ms);
      return `${i}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:1']);
  });

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(2);
      active -= 1;
    });

    expect(peak).toBe(3);
  });

  it('treats a non-positive limit as one', async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3], 0, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(1);
      active -= 1;
    });

    expect(peak).toBe(1);
  });

  it('returns an empty list for no items', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
