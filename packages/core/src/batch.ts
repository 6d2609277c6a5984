/**
 * Windowed request dispatcher.
 *
 * Issues up to `windowSize` tasks at once, waits for the whole window, then
 * starts the next one. Results are keyed by request key, never by position,
 * so completion order inside a window does not matter.
 */

export interface WindowProgress {
  /** 1-based index of the window that just completed */
  window: number;
  windows: number;
  completed: number;
  total: number;
}

export async function runWindowed<T, R>(
  items: readonly T[],
  windowSize: number,
  keyOf: (item: T) => string,
  task: (item: T) => Promise<R>,
  onWindow?: (progress: WindowProgress) => void
): Promise<Map<string, R>> {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new RangeError(`Window size must be a positive integer, got ${windowSize}`);
  }

  // One request per key
  const unique = new Map<string, T>();
  for (const item of items) {
    const key = keyOf(item);
    if (!unique.has(key)) unique.set(key, item);
  }

  const queue = [...unique.entries()];
  const results = new Map<string, R>();
  const windows = Math.ceil(queue.length / windowSize);

  for (let w = 0; w < windows; w++) {
    const slice = queue.slice(w * windowSize, (w + 1) * windowSize);
    const settled = await Promise.all(
      slice.map(async ([key, item]) => [key, await task(item)] as const)
    );
    for (const [key, value] of settled) {
      results.set(key, value);
    }
    onWindow?.({
      window: w + 1,
      windows,
      completed: results.size,
      total: queue.length,
    });
  }

  return results;
}
