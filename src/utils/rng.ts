// rng.ts
import seedrandom from 'seedrandom';

/**
 * The single random stream of a generation run. Every draw goes through
 * `next()`, so the same seed and the same sequence of calls give the same
 * dataset.
 */
export class Rng {
  readonly seed: number;
  private prng: () => number;
  private count = 0;

  constructor(seed: number) {
    this.seed = seed;
    this.prng = seedrandom(String(seed));
  }

  /** Number of values drawn so far. */
  get calls(): number {
    return this.count;
  }

  next(): number {
    this.count++;
    return this.prng();
  }

  /** Uniform integer in [lo, hi], both inclusive. */
  int(lo: number, hi: number): number {
    if (!Number.isInteger(lo) || !Number.isInteger(hi) || hi < lo) {
      throw new RangeError(`int: invalid range [${lo}, ${hi}]`);
    }
    return lo + Math.floor(this.next() * (hi - lo + 1));
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new RangeError('pick: empty list');
    return items[this.int(0, items.length - 1)];
  }

  /** k distinct items, drawn with a partial Fisher–Yates over a copy. */
  sample<T>(items: readonly T[], k: number): T[] {
    if (k < 0 || k > items.length) {
      throw new RangeError(`sample: k=${k} outside [0, ${items.length}]`);
    }
    const pool = items.slice();
    for (let i = 0; i < k; i++) {
      const j = this.int(i, pool.length - 1);
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, k);
  }

  shuffle<T>(items: readonly T[]): T[] {
    const out = items.slice();
    for (let i = out.length - 1; i > 0; i--) {
      const j = this.int(0, i);
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }
}
