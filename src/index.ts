/**
 * keyboard-evolve
 *
 * Genetic search over keyboard layouts.
 * Evolves key assignments that minimise modelled typing time from measured
 * n-gram timings and corpus n-gram frequencies.
 */

export { Orchestrator, validateConfig } from './orchestrator.js';
export { Population, createIndividual, copyIndividual } from './population.js';
export type { PopulationStats } from './population.js';
export {
  CostModel,
  Evaluator,
  computeCost,
  fitnessFromCost,
  perKeyCostApprox,
  validateCostOptions,
} from './evaluator.js';
export {
  KeySpace,
  DEFAULT_KEYSPACE,
  KEY_GROUPS,
  buildMapping,
  buildCheckedMapping,
  isPermutation,
  assertPermutation,
  formatLayoutAscii,
  layoutString,
} from './keyspace.js';
export type { KeyGroup, KeyPartition } from './keyspace.js';
export {
  orderCrossover,
  crossover,
  pickCutPoints,
  swapMutation,
  initialGenes,
  fullPermutation,
  restrictedPermutation,
  validatePermutationStrategy,
} from './mutations/permutation-operators.js';
export { createSeededRandom, randomInt, sampleDistinct, shuffleInPlace } from './random.js';
export type { RandomFn } from './random.js';
export {
  countNgrams,
  loadCorpus,
  characterFrequencies,
  bigramFrequencies,
  formatFrequencyReport,
} from './data/corpus.js';
export type { FrequencyEntry } from './data/corpus.js';
export {
  SyntheticTimingModel,
  generateSyntheticRecords,
  DEFAULT_SYNTHETIC_OPTIONS,
} from './data/synthetic.js';
export type { SyntheticTimingOptions, SyntheticRecord } from './data/synthetic.js';
export {
  parseTimingRecords,
  parseTypingCsv,
  parseCsvRows,
  loadTimingRecords,
  loadTimingFile,
  fuseTimingFiles,
  formatTypingCsv,
} from './data/typing-data.js';
export {
  asciiSparkline,
  compareToBaseline,
  formatKeyCostTable,
  keyCostToRecord,
  summarizeRun,
  collectKeyTimings,
  formatKeyTimingReport,
} from './report.js';
export type { BaselineComparison, KeyTimingEntry } from './report.js';
export { ConfigurationError, LayoutError, InvariantError } from './errors.js';
export * from './types.js';

// Default export for convenience
import { Orchestrator } from './orchestrator.js';
export default Orchestrator;
