import { runWindowed, type WindowProgress } from '../batch.js';

describe('runWindowed', () => {
  test('never has more than one window in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const items = Array.from({ length: 7 }, (_, i) => i);

    await runWindowed(
      items,
      3,
      (i) => `k${i}`,
      async (i) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, (7 - i) * 2));
        inFlight--;
        return i;
      }
    );

    expect(peak).toBe(3);
  });

  test('keys results by request key regardless of completion order', async () => {
    const results = await runWindowed(
      ['slow', 'fast'],
      2,
      (s) => s,
      async (s) => {
        await new Promise((resolve) => setTimeout(resolve, s === 'slow' ? 20 : 1));
        return s.toUpperCase();
      }
    );

    expect(results.get('slow')).toBe('SLOW');
    expect(results.get('fast')).toBe('FAST');
  });

  test('issues one request per key', async () => {
    const calls: string[] = [];

    const results = await runWindowed(['a', 'b', 'a'], 10, (s) => s, async (s) => {
      calls.push(s);
      return s.length;
    });

    expect(calls).toEqual(['a', 'b']);
    expect(results.size).toBe(2);
  });

  test('reports progress after each window', async () => {
    const progress: WindowProgress[] = [];

    await runWindowed([1, 2, 3, 4, 5], 2, String, async (n) => n, (p) => progress.push(p));

    expect(progress).toEqual([
      { window: 1, windows: 3, completed: 2, total: 5 },
      { window: 2, windows: 3, completed: 4, total: 5 },
      { window: 3, windows: 3, completed: 5, total: 5 },
    ]);
  });

  test('rejects a non-positive window size', async () => {
    await expect(runWindowed([1], 0, String, async (n) => n)).rejects.toThrow(RangeError);
  });

  test('propagates a task failure', async () => {
    await expect(
      runWindowed([1, 2], 2, String, async (n) => {
        if (n === 2) throw new Error('boom');
        return n;
      })
    ).rejects.toThrow('boom');
  });
});
