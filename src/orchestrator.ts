/**
 * Evolution Orchestrator
 *
 * Controls the generational loop:
 * 1. Initialize a population of random layouts
 * 2. For each generation:
 *    a. Evaluate every layout (concurrently, in batches)
 *    b. Carry the elites over unchanged
 *    c. Record the generation's best fitness
 *    d. Fill the rest by tournament selection, order crossover and swap mutation
 * 3. Evaluate the final generation and return the champion
 */

import { z } from 'zod';
import { ConfigurationError, InvariantError } from './errors.js';
import { Evaluator } from './evaluator.js';
import { DEFAULT_KEYSPACE, KeySpace } from './keyspace.js';
import {
  crossover,
  swapMutation,
  validatePermutationStrategy,
} from './mutations/permutation-operators.js';
import { Population, copyIndividual, createIndividual } from './population.js';
import { RandomFn, createSeededRandom } from './random.js';
import {
  DEFAULT_CONFIG,
  EvolutionConfig,
  EvolutionResult,
  EvolutionState,
  FitnessFunction,
  GenerationResult,
  Individual,
} from './types.js';

function configSchema(layoutSize: number) {
  return z
    .object({
      populationSize: z.number().int().min(1),
      eliteCount: z.number().int().min(0),
      tournamentSize: z.number().int().min(1),
      mutationRate: z.number().min(0).max(1),
      crossoverRate: z.number().min(0).max(1),
      permutation: z.discriminatedUnion('kind', [
        z.object({ kind: z.literal('full') }),
        z.object({ kind: z.literal('restricted'), indices: z.array(z.number()) }),
      ]),
      generations: z.number().int().min(0),
      evaluatorCount: z.number().int().min(1),
      seed: z.number().int().nullable(),
      outputDir: z.string().min(1),
      verbose: z.boolean(),
    })
    .superRefine((config, ctx) => {
      if (config.eliteCount > config.populationSize) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['eliteCount'],
          message: `elite count ${config.eliteCount} exceeds population size ${config.populationSize}`,
        });
      }
      if (config.tournamentSize > config.populationSize) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tournamentSize'],
          message: `tournament size ${config.tournamentSize} exceeds population size ${config.populationSize}`,
        });
      }
      for (const message of validatePermutationStrategy(config.permutation, layoutSize)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['permutation'], message });
      }
    });
}

/**
 * Every problem with a configuration for a layout of `layoutSize` keys
 */
export function validateConfig(config: EvolutionConfig, layoutSize: number): string[] {
  const parsed = configSchema(layoutSize).safeParse(config);
  if (parsed.success) {
    return [];
  }
  return parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
}

export class Orchestrator {
  private config: EvolutionConfig;
  private keySpace: KeySpace;
  private evaluator: Evaluator;
  private random: RandomFn;
  private population: Population;
  private state: EvolutionState;
  private onProgress: ((result: GenerationResult) => void) | null = null;

  constructor(
    fitnessFn: FitnessFunction,
    config: Partial<EvolutionConfig> = {},
    keySpace: KeySpace = DEFAULT_KEYSPACE
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    const issues = validateConfig(this.config, keySpace.size);
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }

    this.keySpace = keySpace;
    this.evaluator = new Evaluator(fitnessFn);
    this.random = createSeededRandom(this.config.seed);
    this.population = Population.initialize(
      this.config.populationSize,
      keySpace.canonicalGenes(),
      this.config.permutation,
      this.random
    );

    this.state = {
      config: this.config,
      generation: 0,
      bestIndividualId: null,
      totalEvaluations: 0,
      startedAt: new Date().toISOString(),
      status: 'pending',
    };
  }

  /**
   * Set progress callback for real-time updates
   */
  setProgressCallback(callback: (result: GenerationResult) => void): void {
    this.onProgress = callback;
  }

  /**
   * Run the full evolution loop
   */
  async evolve(): Promise<EvolutionResult> {
    if (this.state.status !== 'pending') {
      throw new Error(`Evolution already ${this.state.status}; create a new orchestrator to run again`);
    }
    const startTime = Date.now();
    const generationResults: GenerationResult[] = [];
    const trajectory: number[] = [];
    this.state.status = 'running';

    try {
      this.log(
        `Evolving ${this.config.populationSize} layouts for ${this.config.generations} generations` +
          (this.config.seed === null ? '' : ` (seed ${this.config.seed})`)
      );

      let previousBest = 0;
      for (let g = 0; g < this.config.generations; g++) {
        this.state.generation = g;
        const result = await this.runGeneration(previousBest);
        generationResults.push(result);
        trajectory.push(result.bestFitness);
        previousBest = result.bestFitness;

        if (this.onProgress) {
          this.onProgress(result);
        }
      }

      // Final evaluation of the last generation
      this.state.generation = this.config.generations;
      await this.evaluatePopulation();
      const champion = this.population.getBest();
      if (!champion) {
        throw new InvariantError('Final generation has no evaluated individual');
      }
      this.state.bestIndividualId = champion.id;
      this.state.status = 'completed';

      const bestFitness = champion.fitness ?? 0;
      this.log(`Best fitness: ${bestFitness.toExponential(4)}`);

      return {
        success: true,
        champion: copyIndividual(champion),
        bestFitness,
        trajectory,
        generations: generationResults,
        totalEvaluations: this.state.totalEvaluations,
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      this.state.status = 'failed';
      throw error;
    }
  }

  /**
   * Run a single generation
   */
  private async runGeneration(previousBest: number): Promise<GenerationResult> {
    const { populationSize, eliteCount, tournamentSize, crossoverRate, mutationRate, permutation } =
      this.config;
    const current = this.population;
    const nextGeneration = this.state.generation + 1;

    // 1. Evaluate
    await this.evaluatePopulation();

    // 2. Elitism
    const next: Individual[] = current.getTop(eliteCount).map((elite): Individual => ({
      ...copyIndividual(elite),
      generation: nextGeneration,
      origin: 'elite',
    }));

    // 3. Record, before reproduction
    const stats = current.getStats();
    const best = current.getBest();
    const bestFitness = stats.bestFitness;
    const improvement = previousBest > 0 ? (bestFitness - previousBest) / previousBest : 0;
    if (best) {
      this.state.bestIndividualId = best.id;
    }
    this.log(
      `--- Generation ${nextGeneration}/${this.config.generations} --- ` +
        `best ${bestFitness.toExponential(4)}, mean ${stats.meanFitness.toExponential(4)}`
    );

    // 4. Reproduction
    while (next.length < populationSize) {
      const parentA = current.tournamentSelect(tournamentSize, this.random);
      const parentB = current.tournamentSelect(tournamentSize, this.random);

      let childA: Individual;
      let childB: Individual;
      if (this.random() < crossoverRate) {
        const [genesA, genesB] = crossover(parentA.genes, parentB.genes, permutation, this.random);
        const parentIds = [parentA.id, parentB.id];
        childA = createIndividual(genesA, nextGeneration, 'crossover', parentIds);
        childB = createIndividual(genesB, nextGeneration, 'crossover', parentIds);
      } else {
        // Tournament winners are already private copies
        childA = createIndividual(parentA.genes, nextGeneration, 'clone', [parentA.id]);
        childB = createIndividual(parentB.genes, nextGeneration, 'clone', [parentB.id]);
      }

      childA.mutated = swapMutation(childA.genes, permutation, mutationRate, this.random);
      childB.mutated = swapMutation(childB.genes, permutation, mutationRate, this.random);

      next.push(childA);
      if (next.length < populationSize) {
        next.push(childB);
      }
    }

    // 5. Replace
    this.population = new Population(next);

    return {
      generation: nextGeneration,
      bestFitness,
      meanFitness: stats.meanFitness,
      bestIndividualId: best?.id ?? '',
      improvement,
    };
  }

  /**
   * Evaluate the current population, `evaluatorCount` individuals at a time
   */
  private async evaluatePopulation(): Promise<void> {
    const individuals = this.population.getAll();
    const batchSize = this.config.evaluatorCount;

    for (let i = 0; i < individuals.length; i += batchSize) {
      const batch = individuals.slice(i, i + batchSize);
      await Promise.all(batch.map((individual) => this.evaluator.evaluate(individual)));
    }
    this.state.totalEvaluations = this.evaluator.count;
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(message);
    }
  }

  getPopulation(): Population {
    return this.population;
  }

  getKeySpace(): KeySpace {
    return this.keySpace;
  }

  /**
   * Get current state for persistence
   */
  getState(): EvolutionState {
    return { ...this.state };
  }

  /**
   * Save the current population to the configured output directory
   */
  async saveState(): Promise<void> {
    await this.population.save(this.config.outputDir, this.keySpace);
    this.log(`Population saved to ${this.config.outputDir}`);
  }
}
