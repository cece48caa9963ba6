/**
 * Bounded Concurrency Tests
 */

import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '../../src/lib/concurrency';

const tick = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('should keep input order in the results', async () => {
    const results = await mapWithConcurrency([30, 5, 15, 0], 2, async (ms, index) => {
      await tick(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('should never exceed the limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick(5);
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it('should handle an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('should propagate the first rejection', async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async item => {
        if (item === 2) throw new Error('item 2 failed');
        return item;
      })
    ).rejects.toThrow('item 2 failed');
  });
});
