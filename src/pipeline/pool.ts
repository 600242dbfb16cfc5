// Bounded worker pool: at most `limit` tasks in flight at once

export function clampConcurrency(value: number, min = 1, max = 32): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, Math.floor(value)));
}

/**
 * Run `task` over `items` with up to `limit` in flight.
 *
 * Results come back in completion order. Resolves only after every task has
 * settled; if any task threw, the first error is rethrown after that.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results.push(await task(items[index], index));
    }
  }

  const workerCount = Math.min(clampConcurrency(limit), items.length);
  const settled = await Promise.allSettled(
    Array.from({ length: workerCount }, () => worker()),
  );
  for (const outcome of settled) {
    if (outcome.status === "rejected") throw outcome.reason;
  }
  return results;
}
