/**
 * Permutation Operators
 *
 * Genetic operators that keep every layout a permutation of the canonical
 * symbols, with no repair pass:
 * - Order crossover (OX), over all positions or a restricted subset
 * - Swap mutation
 * - Initial layouts
 */

import { InvariantError } from '../errors.js';
import { RandomFn, sampleDistinct, shuffleInPlace } from '../random.js';
import { PermutationStrategy } from '../types.js';

export type CutPoints = readonly [number, number];

export function fullPermutation(): PermutationStrategy {
  return { kind: 'full' };
}

export function restrictedPermutation(indices: readonly number[]): PermutationStrategy {
  return { kind: 'restricted', indices: [...indices].sort((a, b) => a - b) };
}

/**
 * Problems with a strategy for a layout of `size` positions; empty when usable
 */
export function validatePermutationStrategy(
  strategy: PermutationStrategy,
  size: number
): string[] {
  if (strategy.kind === 'full') {
    return [];
  }
  const issues: string[] = [];
  const { indices } = strategy;
  if (indices.length < 2) {
    issues.push(`restricted permutation needs at least 2 indices, got ${indices.length}`);
  }
  const seen = new Set<number>();
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= size) {
      issues.push(`restricted index ${index} is outside 0..${size - 1}`);
    } else if (seen.has(index)) {
      issues.push(`restricted index ${index} is listed twice`);
    }
    seen.add(index);
  }
  return issues;
}

/**
 * Two distinct cut indices from [0, length), ascending
 */
export function pickCutPoints(random: RandomFn, length: number): [number, number] {
  const [a, b] = sampleDistinct(random, length, 2);
  return a < b ? [a, b] : [b, a];
}

/**
 * Order crossover with explicit cut points.
 *
 * Each child keeps its own parent's slice [c1, c2) in place, then takes the
 * other parent's values in their cyclic order starting at c2, skipping values
 * it already holds, into the free slots from c2 onwards (wrapping).
 */
export function orderCrossover<T>(
  parentA: readonly T[],
  parentB: readonly T[],
  cuts: CutPoints
): [T[], T[]] {
  if (parentA.length !== parentB.length) {
    throw new InvariantError(
      `Crossover parents differ in length (${parentA.length} vs ${parentB.length})`
    );
  }
  const [c1, c2] = cuts;
  if (!Number.isInteger(c1) || !Number.isInteger(c2) || c1 < 0 || c1 >= c2 || c2 > parentA.length) {
    throw new RangeError(`Invalid cut points (${c1}, ${c2}) for length ${parentA.length}`);
  }
  return [fillChild(parentA, parentB, c1, c2), fillChild(parentB, parentA, c1, c2)];
}

function fillChild<T>(donor: readonly T[], filler: readonly T[], c1: number, c2: number): T[] {
  const n = donor.length;
  const child = new Array<T>(n);
  const used = new Set<T>();

  for (let i = c1; i < c2; i++) {
    child[i] = donor[i];
    used.add(donor[i]);
  }

  let filled = c2 - c1;
  let slot = c2;
  for (let step = 0; step < n && filled < n; step++) {
    const gene = filler[(c2 + step) % n];
    if (used.has(gene)) continue;
    child[slot % n] = gene;
    used.add(gene);
    slot++;
    filled++;
  }

  if (filled < n) {
    throw new InvariantError('Crossover parents are not permutations of the same symbols');
  }
  return child;
}

/**
 * Produce two children by OX with random cut points.
 * A restricted strategy crosses only the subset positions; every other
 * position is copied from the child's own parent.
 */
export function crossover(
  parentA: readonly string[],
  parentB: readonly string[],
  strategy: PermutationStrategy,
  random: RandomFn
): [string[], string[]] {
  if (strategy.kind === 'full') {
    return orderCrossover(parentA, parentB, pickCutPoints(random, parentA.length));
  }

  const { indices } = strategy;
  if (indices.length < 2) {
    return [[...parentA], [...parentB]];
  }

  const [subA, subB] = orderCrossover(
    indices.map((i) => parentA[i]),
    indices.map((i) => parentB[i]),
    pickCutPoints(random, indices.length)
  );

  const childA = [...parentA];
  const childB = [...parentB];
  indices.forEach((position, k) => {
    childA[position] = subA[k];
    childB[position] = subB[k];
  });
  return [childA, childB];
}

/**
 * With probability `rate`, swap two distinct eligible positions in place.
 * Returns whether a swap happened.
 */
export function swapMutation(
  genes: string[],
  strategy: PermutationStrategy,
  rate: number,
  random: RandomFn
): boolean {
  if (random() >= rate) {
    return false;
  }
  const eligible = strategy.kind === 'full' ? null : strategy.indices;
  const count = eligible ? eligible.length : genes.length;
  if (count < 2) {
    return false;
  }

  const [x, y] = sampleDistinct(random, count, 2);
  const i = eligible ? eligible[x] : x;
  const j = eligible ? eligible[y] : y;
  [genes[i], genes[j]] = [genes[j], genes[i]];
  return true;
}

/**
 * A fresh random layout: the canonical genes shuffled, or with only the
 * restricted positions' values shuffled among themselves
 */
export function initialGenes(
  canonical: readonly string[],
  strategy: PermutationStrategy,
  random: RandomFn
): string[] {
  const genes = [...canonical];
  if (strategy.kind === 'full') {
    return shuffleInPlace(random, genes);
  }

  const values = shuffleInPlace(
    random,
    strategy.indices.map((i) => genes[i])
  );
  strategy.indices.forEach((position, k) => {
    genes[position] = values[k];
  });
  return genes;
}
