/**
 * Random source
 *
 * One RandomFn is created per run and handed to every operator that
 * consumes randomness, so a seeded run replays exactly.
 */

export type RandomFn = () => number;

export function createSeededRandom(seed?: number | null): RandomFn {
  if (seed === undefined || seed === null) return Math.random;
  let state = (seed >>> 0) || 0x6d2b79f5;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

/** Uniform integer in [0, n). */
export function randomInt(random: RandomFn, n: number): number {
  return Math.min(n - 1, Math.floor(random() * n));
}

/**
 * Draw `k` distinct indices from [0, n) without replacement, in draw order
 */
export function sampleDistinct(random: RandomFn, n: number, k: number): number[] {
  if (k > n) {
    throw new RangeError(`Cannot sample ${k} distinct values from ${n}`);
  }
  // Partial Fisher-Yates over a sparse index map
  const swapped = new Map<number, number>();
  const out: number[] = [];
  for (let i = 0; i < k; i++) {
    const j = i + randomInt(random, n - i);
    const atJ = swapped.get(j) ?? j;
    const atI = swapped.get(i) ?? i;
    swapped.set(j, atI);
    out.push(atJ);
  }
  return out;
}

export function shuffleInPlace<T>(random: RandomFn, items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}
