import { setTimeout as sleepMs } from "node:timers/promises";

export type PoolOptions = {
  /** Number of workers, at least 1. */
  concurrency: number;
  /** Minimum gap between the starts of two consecutive tasks on the same worker. */
  delayMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
};

/**
 * Run `task` over every item with at most `concurrency` tasks in flight.
 *
 * Workers pull `(index, item)` pairs from a shared cursor, so every item is
 * taken exactly once. Each worker keeps its own clock: before starting a task
 * it waits until `delayMs` has passed since the start of its previous one.
 * Results land in a buffer at the item's original index, so the returned
 * array lines up with `items` whatever order the tasks finish in.
 *
 * Resolves once every slot is filled. A task that rejects rejects the whole
 * pool; callers that need per-item isolation catch inside the task.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<R[]> {
  const { concurrency, delayMs } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new RangeError(`delayMs must be a non-negative number, got ${delayMs}`);
  }

  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? sleepMs;

  const queue = items.map((item, index) => ({ item, index }));
  const slots: { value: R }[] = new Array(items.length);
  let cursor = 0;

  async function worker(): Promise<void> {
    let lastStart: number | undefined;

    for (let next = queue[cursor++]; next; next = queue[cursor++]) {
      const { item, index } = next;

      if (lastStart !== undefined && delayMs > 0) {
        const wait = delayMs - (now() - lastStart);
        if (wait > 0) await sleep(wait);
      }
      lastStart = now();

      slots[index] = { value: await task(item, index) };
    }
  }

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const results: R[] = [];
  for (let i = 0; i < items.length; i++) {
    const slot = slots[i];
    if (!slot) throw new Error(`Pool finished without a result for item ${i}`);
    results.push(slot.value);
  }
  return results;
}
