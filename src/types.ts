/**
 * Core types for keyboard-evolve
 */

/** A candidate layout: genes[i] is the logical character placed on physical key i. */
export type Genes = string[];

export interface Individual {
  id: string;
  generation: number;
  genes: Genes;
  parentIds: string[];
  origin: IndividualOrigin;
  mutated: boolean;
  fitness: number | null;
}

export type IndividualOrigin = 'seed' | 'elite' | 'crossover' | 'clone';

/**
 * Which positions the genetic operators may touch.
 * Positions outside a restricted set keep their canonical symbol for the whole run.
 */
export type PermutationStrategy =
  | { kind: 'full' }
  | { kind: 'restricted'; indices: readonly number[] };

// N-gram tables

/** Logical n-gram -> occurrence count, or physical n-gram -> mean milliseconds. */
export type NgramTable = ReadonlyMap<string, number>;

export interface FrequencyTables {
  uni: NgramTable;
  bi: NgramTable;
  tri: NgramTable;
}

export interface TimingTables {
  uni: NgramTable;
  bi: NgramTable;
  tri: NgramTable;
}

export type CostOrder = 'uni' | 'bi' | 'tri';

export const COST_ORDERS: readonly CostOrder[] = ['uni', 'bi', 'tri'];

export interface CostOptions {
  order: CostOrder;
  fallbackToUnigram: boolean;
  useTrigrams: boolean; // must be on for trigram-order contributions to count
}

export type FitnessFunction = (genes: readonly string[]) => number | Promise<number>;

export interface EvolutionConfig {
  // Population
  populationSize: number;
  eliteCount: number; // Always keep top N
  tournamentSize: number;

  // Operators
  mutationRate: number; // per individual, not per gene
  crossoverRate: number;
  permutation: PermutationStrategy;

  // Stopping condition
  generations: number;

  // Fitness evaluations awaited together per batch
  evaluatorCount: number;

  seed: number | null;
  outputDir: string;
  verbose: boolean;
}

export interface EvolutionState {
  config: EvolutionConfig;
  generation: number;
  bestIndividualId: string | null;
  totalEvaluations: number;
  startedAt: string;
  status: 'pending' | 'running' | 'completed' | 'failed';
}

export interface GenerationResult {
  generation: number;
  bestFitness: number;
  meanFitness: number;
  bestIndividualId: string;
  improvement: number; // fraction vs previous generation's best
}

export interface EvolutionResult {
  success: boolean;
  champion: Individual;
  bestFitness: number;
  trajectory: number[]; // best fitness per generation, recorded before reproduction
  generations: GenerationResult[];
  totalEvaluations: number;
  totalTimeMs: number;
}

// Default configuration
export const DEFAULT_CONFIG: EvolutionConfig = {
  populationSize: 200,
  eliteCount: 5,
  tournamentSize: 3,
  mutationRate: 0.1,
  crossoverRate: 0.7,
  permutation: { kind: 'full' },
  generations: 300,
  evaluatorCount: 8,
  seed: 42,
  outputDir: '.evolve',
  verbose: true,
};

export const DEFAULT_COST_OPTIONS: CostOptions = {
  order: 'bi',
  fallbackToUnigram: false,
  useTrigrams: false,
};
