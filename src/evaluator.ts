/**
 * Fitness Evaluator
 *
 * Turns a candidate layout into a modelled typing cost and a fitness:
 * - Maps each logical n-gram onto the physical keys that type it
 * - Weights the measured timing of that physical n-gram by its corpus count
 * - Optionally backs off to summed unigram timings when a sequence was never measured
 * - Fitness is the reciprocal of cost
 */

import { ConfigurationError, InvariantError } from './errors.js';
import { DEFAULT_KEYSPACE, KeySpace, buildMapping } from './keyspace.js';
import {
  COST_ORDERS,
  CostOptions,
  CostOrder,
  DEFAULT_COST_OPTIONS,
  FitnessFunction,
  FrequencyTables,
  Individual,
  TimingTables,
} from './types.js';

const ORDER_LENGTH: Record<CostOrder, number> = { uni: 1, bi: 2, tri: 3 };

/**
 * Total modelled typing time (ms) of the corpus on a layout.
 *
 * Only the n-grams of `options.order` are scored, so no keystroke is counted
 * at two granularities. A sequence missing from the timing table contributes
 * the sum of its unigram timings when `fallbackToUnigram` is set and nothing
 * otherwise; the latter undercounts layouts that produce unmeasured sequences.
 * Trigram order counts only while `useTrigrams` is on.
 */
export function computeCost(
  genes: readonly string[],
  frequencies: FrequencyTables,
  timings: TimingTables,
  options: CostOptions,
  keySpace: KeySpace = DEFAULT_KEYSPACE
): number {
  const { order, fallbackToUnigram, useTrigrams } = options;
  if (order === 'tri' && !useTrigrams) {
    return 0;
  }

  const length = ORDER_LENGTH[order];
  const counts = frequencies[order];
  const measured = timings[order];
  const logicalToPhysical = buildMapping(genes, keySpace);

  let cost = 0;
  for (const [ngram, count] of counts) {
    if (ngram.length !== length) continue;

    const keys = toPhysicalKeys(ngram, logicalToPhysical);
    if (!keys) continue;

    let time = measured.get(keys.join(''));
    if (time === undefined && fallbackToUnigram && length > 1) {
      time = sumUnigramTimings(keys, timings);
    }
    if (time === undefined) continue;

    cost += count * time;
  }
  return cost;
}

export function fitnessFromCost(cost: number): number {
  return cost > 0 ? 1 / cost : 0;
}

/**
 * Approximate cost share of each physical key, for reporting.
 *
 * Unigrams, bigrams and (with `useTrigrams`) trigrams are all added up, each
 * n-gram's cost split evenly over the keys it touches. Unmeasured sequences
 * always use the unigram sum.
 */
export function perKeyCostApprox(
  genes: readonly string[],
  frequencies: FrequencyTables,
  timings: TimingTables,
  useTrigrams: boolean,
  keySpace: KeySpace = DEFAULT_KEYSPACE
): Map<string, number> {
  const logicalToPhysical = buildMapping(genes, keySpace);
  const keyCost = new Map<string, number>(keySpace.symbols.map((key) => [key, 0]));

  const distribute = (counts: ReadonlyMap<string, number>, length: number, measured: ReadonlyMap<string, number>) => {
    for (const [ngram, count] of counts) {
      if (ngram.length !== length) continue;
      const keys = toPhysicalKeys(ngram, logicalToPhysical);
      if (!keys) continue;

      const time = measured.get(keys.join('')) ?? sumUnigramTimings(keys, timings);
      const share = (count * time) / length;
      for (const key of keys) {
        keyCost.set(key, (keyCost.get(key) ?? 0) + share);
      }
    }
  };

  distribute(frequencies.uni, 1, timings.uni);
  distribute(frequencies.bi, 2, timings.bi);
  if (useTrigrams) {
    distribute(frequencies.tri, 3, timings.tri);
  }
  return keyCost;
}

export function validateCostOptions(options: CostOptions): string[] {
  const issues: string[] = [];
  if (!COST_ORDERS.includes(options.order)) {
    issues.push(`cost order must be one of ${COST_ORDERS.join(', ')}, got "${String(options.order)}"`);
  }
  if (options.order === 'tri' && !options.useTrigrams) {
    issues.push('cost order "tri" requires useTrigrams to be enabled');
  }
  return issues;
}

function toPhysicalKeys(ngram: string, logicalToPhysical: Map<string, string>): string[] | null {
  const keys: string[] = [];
  for (const logical of ngram) {
    const physical = logicalToPhysical.get(logical);
    if (physical === undefined) {
      return null;
    }
    keys.push(physical);
  }
  return keys;
}

function sumUnigramTimings(keys: readonly string[], timings: TimingTables): number {
  return keys.reduce((sum, key) => sum + (timings.uni.get(key) ?? 0), 0);
}

/**
 * Cost model bound to one run's read-only tables and options
 */
export class CostModel {
  readonly options: CostOptions;
  private readonly frequencies: FrequencyTables;
  private readonly timings: TimingTables;
  private readonly keySpace: KeySpace;

  constructor(
    frequencies: FrequencyTables,
    timings: TimingTables,
    options: Partial<CostOptions> = {},
    keySpace: KeySpace = DEFAULT_KEYSPACE
  ) {
    this.options = { ...DEFAULT_COST_OPTIONS, ...options };
    const issues = validateCostOptions(this.options);
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }
    this.frequencies = frequencies;
    this.timings = timings;
    this.keySpace = keySpace;
  }

  cost(genes: readonly string[]): number {
    return computeCost(genes, this.frequencies, this.timings, this.options, this.keySpace);
  }

  fitness(genes: readonly string[]): number {
    return fitnessFromCost(this.cost(genes));
  }

  perKeyCost(genes: readonly string[]): Map<string, number> {
    return perKeyCostApprox(
      genes,
      this.frequencies,
      this.timings,
      this.options.useTrigrams,
      this.keySpace
    );
  }

  /**
   * Fitness function for the orchestrator
   */
  fitnessFunction(): FitnessFunction {
    return (genes) => this.fitness(genes);
  }
}

export class Evaluator {
  private fitnessFn: FitnessFunction;
  private evaluations = 0;

  constructor(fitnessFn: FitnessFunction) {
    this.fitnessFn = fitnessFn;
  }

  /**
   * Evaluate an individual and store the result in its fitness slot
   */
  async evaluate(individual: Individual): Promise<number> {
    const fitness = await this.fitnessFn(individual.genes);
    if (!Number.isFinite(fitness)) {
      throw new InvariantError(`Fitness of ${individual.id} is not a finite number: ${fitness}`);
    }
    individual.fitness = fitness;
    this.evaluations++;
    return fitness;
  }

  get count(): number {
    return this.evaluations;
  }
}
