import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { KeySpace, isPermutation } from '../src/keyspace.js';
import { Population, copyIndividual, createIndividual } from '../src/population.js';
import { createSeededRandom } from '../src/random.js';
import { Individual } from '../src/types.js';

const keySpace = KeySpace.fromRows(['ab', 'cd']);

function individualWith(genes: string[], fitness: number | null): Individual {
  const individual = createIndividual(genes, 0, 'seed');
  individual.fitness = fitness;
  return individual;
}

describe('createIndividual', () => {
  it('should start unevaluated with a fresh id', () => {
    const a = createIndividual(['a', 'b'], 3, 'crossover', ['p1', 'p2']);
    const b = createIndividual(['a', 'b'], 3, 'crossover', ['p1', 'p2']);

    expect(a).toMatchObject({ generation: 3, origin: 'crossover', parentIds: ['p1', 'p2'], mutated: false, fitness: null });
    expect(a.id).toHaveLength(10);
    expect(a.id).not.toBe(b.id);
  });

  it('should copy deeply while keeping the id', () => {
    const original = individualWith(['a', 'b'], 1);
    const copy = copyIndividual(original);
    copy.genes[0] = 'b';

    expect(copy.id).toBe(original.id);
    expect(original.genes).toEqual(['a', 'b']);
  });
});

describe('Population', () => {
  it('should initialize permutations of the canonical layout', () => {
    const canonical = keySpace.canonicalGenes();
    const population = Population.initialize(5, canonical, { kind: 'full' }, createSeededRandom(1));
    const all = population.getAll();

    expect(population.size()).toBe(5);
    expect(new Set(all.map((individual) => individual.id)).size).toBe(5);
    for (const individual of all) {
      expect(isPermutation(individual.genes, canonical)).toBe(true);
      expect(individual.origin).toBe('seed');
      expect(individual.fitness).toBeNull();
    }
  });

  it('should rank evaluated individuals and keep population order on ties', () => {
    const members = [
      individualWith(['a', 'b', 'c', 'd'], 1),
      individualWith(['b', 'a', 'c', 'd'], 3),
      individualWith(['c', 'a', 'b', 'd'], 3),
      individualWith(['d', 'a', 'b', 'c'], null),
      individualWith(['a', 'c', 'b', 'd'], 2),
    ];
    const population = new Population(members);

    expect(population.getTop(3).map((individual) => individual.id)).toEqual([
      members[1].id,
      members[2].id,
      members[4].id,
    ]);
    expect(population.getBest()).toBe(members[1]);
    expect(population.get(members[3].id)).toBe(members[3]);
  });

  it('should have no best before evaluation', () => {
    expect(new Population([individualWith(['a', 'b', 'c', 'd'], null)]).getBest()).toBeNull();
  });

  it('should return a copy of the tournament winner', () => {
    const members = [
      individualWith(['a', 'b', 'c', 'd'], 1),
      individualWith(['b', 'a', 'c', 'd'], 5),
      individualWith(['c', 'a', 'b', 'd'], 2),
    ];
    const population = new Population(members);

    const winner = population.tournamentSelect(3, createSeededRandom(8));

    expect(winner.id).toBe(members[1].id);
    expect(winner).not.toBe(members[1]);
    expect(winner.genes).not.toBe(members[1].genes);
    expect(winner.genes).toEqual(members[1].genes);
  });

  it('should reject tournaments larger than the population', () => {
    const population = new Population([individualWith(['a', 'b', 'c', 'd'], 1)]);

    expect(() => population.tournamentSelect(2, createSeededRandom(1))).toThrow(RangeError);
  });

  it('should summarize evaluated fitness and distinct layouts', () => {
    const population = new Population([
      individualWith(['a', 'b', 'c', 'd'], 1),
      individualWith(['a', 'b', 'c', 'd'], 3),
      individualWith(['b', 'a', 'c', 'd'], null),
    ]);

    expect(population.getStats()).toEqual({
      size: 3,
      evaluated: 2,
      bestFitness: 3,
      meanFitness: 2,
      worstFitness: 1,
      uniqueLayouts: 2,
    });
  });

  describe('save', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'population-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write the population and the best layout', async () => {
      const best = individualWith(['b', 'a', 'c', 'd'], 2);
      const population = new Population([individualWith(['a', 'b', 'c', 'd'], 1), best]);
      const outputDir = join(dir, 'nested');

      await population.save(outputDir, keySpace);

      const bestLayout = await readFile(join(outputDir, 'best_layout.txt'), 'utf-8');
      expect(bestLayout).toBe('bacd\n\nb a\n c d\n');

      const snapshot: unknown = JSON.parse(await readFile(join(outputDir, 'population.json'), 'utf-8'));
      expect(snapshot).toMatchObject({
        stats: { size: 2, evaluated: 2, bestFitness: 2 },
        individuals: [
          { layout: 'abcd', fitness: 1, origin: 'seed' },
          { id: best.id, layout: 'bacd', fitness: 2 },
        ],
      });
    });
  });
});
