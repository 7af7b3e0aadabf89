import { mapLimit } from '../../src/lib/map-limit.js';
import { SourceErrorCode } from '../../src/sources/types.js';

describe('mapLimit', () => {
  it('keeps result order and never exceeds the limit', async () => {
    let active = 0;
    let peak = 0;

    const results = await mapLimit([5, 1, 4, 2, 3], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, n));
      active--;
      return n * 10;
    });

    expect(results).toEqual([50, 10, 40, 20, 30]);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    expect(await mapLimit([], 3, async () => 1)).toEqual([]);
  });

  it('stops picking up items once aborted', async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    const run = mapLimit(
      [1, 2, 3, 4],
      1,
      async (n) => {
        seen.push(n);
        if (n === 2) controller.abort();
        return n;
      },
      controller.signal,
    );

    await expect(run).rejects.toMatchObject({ code: SourceErrorCode.CANCELLED });
    expect(seen).toEqual([1, 2]);
  });
});
