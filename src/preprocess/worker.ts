// worker.ts
import { WorkerFailure } from '../errors';

export type Job<T, R> = (item: T, index: number) => Promise<R> | R;

/**
 * Runs `job` over `items` on at most `workerCount` concurrent lanes. Lanes
 * finish in any order; results come back joined by input index. Every
 * failure is collected, and any failure fails the whole pass.
 */
export async function runPool<T, R>(items: readonly T[], workerCount: number, job: Job<T, R>): Promise<R[]> {
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new RangeError(`workerCount must be a positive integer, got ${workerCount}`);
  }
  const settled: Array<{ value: R } | undefined> = new Array(items.length);
  const failures = new Map<number, unknown>();
  let cursor = 0;

  const lane = async () => {
    while (cursor < items.length) {
      const index = cursor++;
      try {
        settled[index] = { value: await job(items[index], index) };
      } catch (err) {
        failures.set(index, err);
      }
    }
  };
  await Promise.all(Array.from({ length: Math.min(workerCount, items.length) }, lane));

  if (failures.size > 0) {
    throw new WorkerFailure([...failures.keys()].sort((a, b) => a - b), failures);
  }
  return settled.map((s, i) => {
    if (!s) throw new Error(`runPool: no result for index ${i}`);
    return s.value;
  });
}
