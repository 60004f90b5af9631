// split.ts
import { ConfigurationError } from '../errors';
import type { Rng } from '../utils/rng';

export interface Keyed {
  key: string;
}

export interface Partition<T> {
  train: T[];
  val: T[];
  test: T[];
  testKeys: string[];
}

/**
 * Moves whole disjointness keys into the held-out set, in shuffled key order,
 * until it holds at least `fraction` of the items. At least one key always
 * stays behind for train/val.
 */
export function holdOutByKey<T extends Keyed>(rng: Rng, items: readonly T[], fraction: number): { test: T[]; rest: T[]; testKeys: string[] } {
  const counts = new Map<string, number>();
  for (const item of items) counts.set(item.key, (counts.get(item.key) ?? 0) + 1);
  const keys = [...counts.keys()];
  if (keys.length < 2) {
    throw new ConfigurationError(`A held-out split needs at least two distinct keys, found ${keys.length}`);
  }

  const target = Math.ceil(items.length * fraction);
  const chosen = new Set<string>();
  let taken = 0;
  for (const key of rng.shuffle(keys)) {
    if (taken >= target || chosen.size === keys.length - 1) break;
    chosen.add(key);
    taken += counts.get(key) ?? 0;
  }

  const test: T[] = [];
  const rest: T[] = [];
  for (const item of items) (chosen.has(item.key) ? test : rest).push(item);
  return { test, rest, testKeys: [...chosen].sort() };
}

export function splitTrainVal<T>(rng: Rng, items: readonly T[], trainRatio: number): { train: T[]; val: T[] } {
  const shuffled = rng.shuffle(items);
  const nTrain = Math.min(shuffled.length, Math.round(shuffled.length * trainRatio));
  return { train: shuffled.slice(0, nTrain), val: shuffled.slice(nTrain) };
}

export function partition<T extends Keyed>(
  rng: Rng,
  items: readonly T[],
  opts: { trainRatio: number; heldOutFraction?: number },
): Partition<T> {
  let pool: readonly T[] = items;
  let test: T[] = [];
  let testKeys: string[] = [];
  if (opts.heldOutFraction !== undefined) {
    const held = holdOutByKey(rng, items, opts.heldOutFraction);
    pool = held.rest;
    test = rng.shuffle(held.test);
    testKeys = held.testKeys;
  }
  const { train, val } = splitTrainVal(rng, pool, opts.trainRatio);
  return { train, val, test, testKeys };
}
