import { describe, it, expect } from 'vitest';
import { runBounded } from '../../../src/core/services/bounded-pool';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('runBounded', () => {
  it('should never run more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await runBounded([1, 2, 3, 4, 5, 6, 7], 3, async item => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      seen.push(item);
      active--;
    });

    expect(peak).toBe(3);
    expect(seen.sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('should run sequentially with a limit of one', async () => {
    const order: string[] = [];

    await runBounded(['a', 'b', 'c'], 1, async (item, index) => {
      order.push(`start ${item}${index}`);
      await delay(1);
      order.push(`end ${item}${index}`);
    });

    expect(order).toEqual(['start a0', 'end a0', 'start b1', 'end b1', 'start c2', 'end c2']);
  });

  it('should treat limits below one as one', async () => {
    let active = 0;
    let peak = 0;

    await runBounded([1, 2, 3], 0, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(1);
      active--;
    });

    expect(peak).toBe(1);
  });

  it('should finish every item before rethrowing the first failure', async () => {
    const done: number[] = [];

    await expect(
      runBounded([1, 2, 3, 4], 2, async item => {
        await delay(item);
        if (item === 2) throw new Error('item 2 failed');
        done.push(item);
      }),
    ).rejects.toThrow('item 2 failed');

    expect(done.sort((a, b) => a - b)).toEqual([1, 3, 4]);
  });

  it('should resolve immediately for an empty list', async () => {
    await expect(runBounded([], 5, async () => undefined)).resolves.toBeUndefined();
  });
});
