/**
 * Population Manager
 *
 * Holds one generation of candidate layouts:
 * - Initialization from the canonical layout
 * - Elite and tournament selection
 * - Statistics
 * - Persistence to disk
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { nanoid } from 'nanoid';
import { DEFAULT_KEYSPACE, KeySpace, formatLayoutAscii, layoutString } from './keyspace.js';
import { initialGenes } from './mutations/permutation-operators.js';
import { RandomFn, sampleDistinct } from './random.js';
import { Genes, Individual, IndividualOrigin, PermutationStrategy } from './types.js';

export function createIndividual(
  genes: Genes,
  generation: number,
  origin: IndividualOrigin,
  parentIds: string[] = []
): Individual {
  return {
    id: nanoid(10),
    generation,
    genes,
    parentIds,
    origin,
    mutated: false,
    fitness: null,
  };
}

/**
 * Deep copy; the copy owns its gene array
 */
export function copyIndividual(individual: Individual): Individual {
  return {
    ...individual,
    genes: [...individual.genes],
    parentIds: [...individual.parentIds],
  };
}

export interface PopulationStats {
  size: number;
  evaluated: number;
  bestFitness: number;
  meanFitness: number;
  worstFitness: number;
  uniqueLayouts: number;
}

export class Population {
  private individuals: Individual[];

  constructor(individuals: Individual[]) {
    this.individuals = individuals;
  }

  /**
   * Random initial population built from the canonical layout
   */
  static initialize(
    size: number,
    canonical: readonly string[],
    strategy: PermutationStrategy,
    random: RandomFn
  ): Population {
    const individuals: Individual[] = [];
    for (let i = 0; i < size; i++) {
      individuals.push(createIndividual(initialGenes(canonical, strategy, random), 0, 'seed'));
    }
    return new Population(individuals);
  }

  /**
   * Get population size
   */
  size(): number {
    return this.individuals.length;
  }

  getAll(): Individual[] {
    return [...this.individuals];
  }

  get(id: string): Individual | undefined {
    return this.individuals.find((individual) => individual.id === id);
  }

  /**
   * Top N evaluated individuals by fitness; equal fitness keeps population order
   */
  getTop(n: number): Individual[] {
    return this.individuals
      .filter((individual) => individual.fitness !== null)
      .sort((a, b) => (b.fitness ?? 0) - (a.fitness ?? 0))
      .slice(0, n);
  }

  getBest(): Individual | null {
    return this.getTop(1)[0] ?? null;
  }

  /**
   * Sample k distinct individuals and return a copy of the fittest
   */
  tournamentSelect(k: number, random: RandomFn): Individual {
    const sample = sampleDistinct(random, this.individuals.length, k);
    let winner = this.individuals[sample[0]];
    for (const index of sample.slice(1)) {
      const contender = this.individuals[index];
      if ((contender.fitness ?? 0) > (winner.fitness ?? 0)) {
        winner = contender;
      }
    }
    return copyIndividual(winner);
  }

  getStats(): PopulationStats {
    const fitnesses = this.individuals
      .map((individual) => individual.fitness)
      .filter((fitness): fitness is number => fitness !== null);
    const layouts = new Set(this.individuals.map((individual) => layoutString(individual.genes)));

    return {
      size: this.individuals.length,
      evaluated: fitnesses.length,
      bestFitness: fitnesses.length > 0 ? Math.max(...fitnesses) : 0,
      meanFitness:
        fitnesses.length > 0 ? fitnesses.reduce((a, b) => a + b, 0) / fitnesses.length : 0,
      worstFitness: fitnesses.length > 0 ? Math.min(...fitnesses) : 0,
      uniqueLayouts: layouts.size,
    };
  }

  /**
   * Save population to disk
   */
  async save(outputDir: string, keySpace: KeySpace = DEFAULT_KEYSPACE): Promise<void> {
    await mkdir(outputDir, { recursive: true });

    const snapshot = {
      stats: this.getStats(),
      individuals: this.individuals.map((individual) => ({
        id: individual.id,
        generation: individual.generation,
        origin: individual.origin,
        parentIds: individual.parentIds,
        mutated: individual.mutated,
        fitness: individual.fitness,
        layout: layoutString(individual.genes),
      })),
    };
    await writeFile(join(outputDir, 'population.json'), JSON.stringify(snapshot, null, 2));

    // Save best layout prominently
    const best = this.getBest();
    if (best) {
      await writeFile(
        join(outputDir, 'best_layout.txt'),
        `${layoutString(best.genes)}\n\n${formatLayoutAscii(best.genes, keySpace)}\n`
      );
    }
  }
}
