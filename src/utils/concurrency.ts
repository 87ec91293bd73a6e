// ============================================================================
// chatdeck - Bounded Worker Pool
// ============================================================================

import pLimit from 'p-limit';

export type SettledResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 *
 * Results keep the input order. A rejected item never stops the others;
 * `onSettled` fires once per item with the running completion count.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (completed: number, total: number) => void
): Promise<SettledResult<R>[]> {
  const run = pLimit(Math.max(1, Math.floor(limit)));
  let completed = 0;

  const settle = async (item: T, index: number): Promise<SettledResult<R>> => {
    let result: SettledResult<R>;
    try {
      result = { status: 'fulfilled', value: await worker(item, index) };
    } catch (reason) {
      result = { status: 'rejected', reason };
    }
    completed++;
    onSettled?.(completed, items.length);
    return result;
  };

  return Promise.all(items.map((item, index) => run(() => settle(item, index))));
}
