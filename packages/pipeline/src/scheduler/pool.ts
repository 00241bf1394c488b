/**
 * Bounded-concurrency task runner.
 *
 * Starts at most `concurrency` tasks at a time (1 = strictly sequential).
 * The first rejection stops new tasks from starting and rejects the whole
 * run; tasks already in flight are left to settle on their own. An aborted
 * signal likewise stops new tasks from starting.
 */

export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && !signal?.aborted && next < items.length) {
      const index = next++;
      const item = items[index]!;
      try {
        await task(item, index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
}
