#!/usr/bin/env node
/**
 * Command line entry point
 *
 *   keyboard-evolve evolve --timings data/typing.csv --corpus data/corpus.txt [options]
 *   keyboard-evolve fuse --out merged.csv a.csv b.csv
 *   keyboard-evolve synth --out data/synthetic.csv [--seed 1234]
 *   keyboard-evolve key-cost --timings data/typing.csv --key f [--mix other.csv]
 *   keyboard-evolve corpus-stats --corpus data/corpus.txt [--out stats.txt] [--top 50]
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { formatFrequencyReport, loadCorpus } from './data/corpus.js';
import { DEFAULT_SYNTHETIC_OPTIONS, generateSyntheticRecords } from './data/synthetic.js';
import {
  DEFAULT_TIMING_COLUMN,
  formatTypingCsv,
  fuseTimingFiles,
  loadTimingFile,
  loadTimingRecords,
  parseTimingRecords,
} from './data/typing-data.js';
import { ConfigurationError } from './errors.js';
import { CostModel } from './evaluator.js';
import { DEFAULT_KEYSPACE, KEY_GROUPS, KeyGroup, KeySpace } from './keyspace.js';
import { fullPermutation, restrictedPermutation } from './mutations/permutation-operators.js';
import { Orchestrator } from './orchestrator.js';
import { createSeededRandom } from './random.js';
import {
  collectKeyTimings,
  compareToBaseline,
  formatKeyTimingReport,
  keyCostToRecord,
  summarizeRun,
  BaselineComparison,
} from './report.js';
import { COST_ORDERS, CostOptions, CostOrder, DEFAULT_CONFIG, EvolutionConfig } from './types.js';

type Args = Record<string, string | boolean>;

export function parseArgs(argv: string[]): { cmd: string; args: Args; positionals: string[] } {
  const first = argv[0] ?? '';
  const cmd = first === '' || first.startsWith('--') ? 'evolve' : first;
  const start = cmd === first ? 1 : 0;
  const args: Args = {};
  const positionals: string[] = [];
  for (let i = start; i < argv.length; i += 1) {
    const token = argv[i] ?? '';
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith('--')) {
      args[key] = true;
      continue;
    }
    args[key] = next;
    i += 1;
  }
  return { cmd, args, positionals };
}

/**
 * Numeric flag value; an absent flag takes the fallback, anything unparseable is an issue
 */
function readNumber(args: Args, key: string, fallback: number, issues: string[]): number {
  const value = args[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string') {
    issues.push(`--${key} needs a number`);
    return fallback;
  }
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    issues.push(`--${key} must be a number, got "${value}"`);
    return fallback;
  }
  return n;
}

function asString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value : fallback;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  if (value === true) {
    return true;
  }
  if (typeof value !== 'string') {
    return fallback;
  }
  return ['1', 'true', 'yes', 'y'].includes(value.trim().toLowerCase());
}

function isCostOrder(value: string): value is CostOrder {
  return COST_ORDERS.some((order) => order === value);
}

function isKeyGroup(value: string): value is KeyGroup {
  return KEY_GROUPS.some((group) => group === value);
}

export interface RunOptions {
  timingsPath: string;
  timingsColumn: string;
  corpusPath: string;
  cost: CostOptions;
  config: Partial<EvolutionConfig>;
}

/**
 * Turn parsed flags into run options; every problem is reported at once
 */
export function buildRunOptions(args: Args, keySpace: KeySpace = DEFAULT_KEYSPACE): RunOptions {
  const issues: string[] = [];

  const timingsPath = asString(args.timings, '');
  const corpusPath = asString(args.corpus, '');
  if (!timingsPath) issues.push('--timings <file> is required');
  if (!corpusPath) issues.push('--corpus <file> is required');

  const order = asString(args['cost-order'], 'bi');
  if (!isCostOrder(order)) {
    issues.push(`--cost-order must be one of ${COST_ORDERS.join(', ')}, got "${order}"`);
  }

  let permutation = fullPermutation();
  const subset = asString(args.subset, 'all');
  if (subset !== 'all') {
    const groups = subset.split(',').map((group) => group.trim());
    const unknown = groups.filter((group) => !isKeyGroup(group));
    if (unknown.length > 0) {
      issues.push(`--subset accepts ${KEY_GROUPS.join(', ')} or all, got "${unknown.join(',')}"`);
    } else {
      permutation = restrictedPermutation(keySpace.indicesFor(groups.filter(isKeyGroup)));
    }
  }

  const config: Partial<EvolutionConfig> = {
    populationSize: readNumber(args, 'population', DEFAULT_CONFIG.populationSize, issues),
    generations: readNumber(args, 'generations', DEFAULT_CONFIG.generations, issues),
    mutationRate: readNumber(args, 'mutation-rate', DEFAULT_CONFIG.mutationRate, issues),
    crossoverRate: readNumber(args, 'crossover-rate', DEFAULT_CONFIG.crossoverRate, issues),
    eliteCount: readNumber(args, 'elitism', DEFAULT_CONFIG.eliteCount, issues),
    tournamentSize: readNumber(args, 'tournament-size', DEFAULT_CONFIG.tournamentSize, issues),
    evaluatorCount: readNumber(args, 'evaluators', DEFAULT_CONFIG.evaluatorCount, issues),
    seed: args.seed === 'none' ? null : readNumber(args, 'seed', 42, issues),
    outputDir: asString(args.outdir, 'outputs'),
    verbose: !asBoolean(args.quiet, false),
    permutation,
  };

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return {
    timingsPath,
    timingsColumn: asString(args['timings-column'], DEFAULT_TIMING_COLUMN),
    corpusPath,
    cost: {
      order: isCostOrder(order) ? order : 'bi',
      fallbackToUnigram: asBoolean(args['fallback-to-unigrams'], false),
      useTrigrams: asBoolean(args['use-trigrams'], false),
    },
    config,
  };
}

export interface RunSummary {
  genes: string[];
  fitness: number;
  comparison: BaselineComparison;
  trajectory: number[];
}

export async function runEvolve(options: RunOptions, keySpace: KeySpace = DEFAULT_KEYSPACE): Promise<RunSummary> {
  console.log('Loading typing data...');
  const timingData = await loadTimingFile(options.timingsPath, options.timingsColumn);
  const { timings } = timingData;
  console.log(
    `Timings: uni=${timings.uni.size} bi=${timings.bi.size} tri=${timings.tri.size} ` +
      `(skipped ${timingData.skippedRecords} records, ${timingData.skippedRows} rows)`
  );

  console.log('Counting corpus n-grams...');
  const frequencies = await loadCorpus(options.corpusPath, keySpace.alphabet());
  console.log(
    `Frequencies: uni=${frequencies.uni.size} bi=${frequencies.bi.size} tri=${frequencies.tri.size}`
  );

  // Both constructors validate, so bad settings stop the run here
  const costModel = new CostModel(frequencies, timings, options.cost, keySpace);
  const orchestrator = new Orchestrator(costModel.fitnessFunction(), options.config, keySpace);

  const result = await orchestrator.evolve();
  const genes = result.champion.genes;
  const comparison = compareToBaseline(costModel.cost(genes), costModel.cost(keySpace.canonicalGenes()));

  console.log('');
  console.log(summarizeRun({ genes, fitness: result.bestFitness, comparison, trajectory: result.trajectory, keySpace }));

  const outputDir = options.config.outputDir ?? DEFAULT_CONFIG.outputDir;
  await orchestrator.saveState();
  await writeFile(join(outputDir, 'fitness.json'), JSON.stringify(result.trajectory, null, 2));
  await writeFile(
    join(outputDir, 'key_cost.json'),
    JSON.stringify(keyCostToRecord(costModel.perKeyCost(genes)), null, 2)
  );
  console.log(`\nSaved outputs to ${outputDir}`);

  return { genes, fitness: result.bestFitness, comparison, trajectory: result.trajectory };
}

export async function runFuse(args: Args, inputs: string[]): Promise<void> {
  const out = asString(args.out, '');
  if (!out || inputs.length === 0) {
    throw new ConfigurationError(['fuse needs --out <file> and at least one input file']);
  }
  const column = asString(args['json-col'], DEFAULT_TIMING_COLUMN);
  const { records, files } = await fuseTimingFiles(inputs, column);
  await writeText(out, formatTypingCsv(records, column));
  console.log(`Fused ${records.length} records from ${files} files into ${out}`);
}

async function writeText(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}

/**
 * Write a synthetic typing CSV covering every unigram and bigram of the layout
 */
export async function runSynth(args: Args, keySpace: KeySpace = DEFAULT_KEYSPACE): Promise<number> {
  const issues: string[] = [];
  const out = asString(args.out, '');
  if (!out) issues.push('--out <file> is required');

  const defaults = DEFAULT_SYNTHETIC_OPTIONS;
  const [numbers, top, home, bottom] = defaults.rowBaseMs;
  const seed = args.seed === 'none' ? null : readNumber(args, 'seed', 1234, issues);
  const options = {
    rowBaseMs: [
      readNumber(args, 'row-base-numbers', numbers, issues),
      readNumber(args, 'row-base-top', top, issues),
      readNumber(args, 'row-base-home', home, issues),
      readNumber(args, 'row-base-bottom', bottom, issues),
    ],
    distancePenalty: readNumber(args, 'distance-penalty', defaults.distancePenalty, issues),
    sameRowPenalty: readNumber(args, 'same-row-penalty', defaults.sameRowPenalty, issues),
    diffRowPenalty: readNumber(args, 'diff-row-penalty', defaults.diffRowPenalty, issues),
    repeatPenalty: readNumber(args, 'repeat-penalty', defaults.repeatPenalty, issues),
    noiseStd: readNumber(args, 'noise-std', defaults.noiseStd, issues),
  };
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const records = generateSyntheticRecords(createSeededRandom(seed), options, keySpace);
  await writeText(out, formatTypingCsv(records, asString(args['json-col'], DEFAULT_TIMING_COLUMN)));
  console.log(`Wrote ${records.length} records to ${out}`);
  return records.length;
}

/**
 * Print the unigram and every bigram timing involving one key
 */
export async function runKeyCost(args: Args, keySpace: KeySpace = DEFAULT_KEYSPACE): Promise<string> {
  const issues: string[] = [];
  const timingsPath = asString(args.timings, '');
  const key = asString(args.key, '');
  if (!timingsPath) issues.push('--timings <file> is required');
  if (!keySpace.has(key)) {
    issues.push(`--key must be one of the ${keySpace.size} layout keys, got "${key}"`);
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const column = asString(args['timings-column'], DEFAULT_TIMING_COLUMN);
  const { records } = await loadTimingRecords(timingsPath, column);
  const mix = asString(args.mix, '');
  if (mix) {
    // A missing extra file is only warned about
    records.push(...(await fuseTimingFiles([mix], column)).records);
  }

  const entries = collectKeyTimings(key, parseTimingRecords(records).timings, keySpace);
  if (entries.length === 0) {
    throw new Error(`No timings found for key "${key}" in ${timingsPath}`);
  }
  const report = formatKeyTimingReport(key, entries);
  console.log(report);
  return report;
}

/**
 * Character and bigram frequency report of a corpus, printed or written to --out
 */
export async function runCorpusStats(args: Args): Promise<string> {
  const issues: string[] = [];
  const corpusPath = asString(args.corpus, '');
  if (!corpusPath) issues.push('--corpus <file> is required');
  const topBigrams = readNumber(args, 'top', 50, issues);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const report = formatFrequencyReport(await readFile(corpusPath, 'utf-8'), topBigrams);
  const out = asString(args.out, '');
  if (out) {
    await writeText(out, report);
    console.log(`Wrote frequency report to ${out}`);
  } else {
    console.log(report);
  }
  return report;
}

async function main(): Promise<void> {
  const { cmd, args, positionals } = parseArgs(process.argv.slice(2));
  switch (cmd) {
    case 'evolve':
      await runEvolve(buildRunOptions(args));
      return;
    case 'fuse':
      await runFuse(args, positionals);
      return;
    case 'synth':
      await runSynth(args);
      return;
    case 'key-cost':
      await runKeyCost(args);
      return;
    case 'corpus-stats':
      await runCorpusStats(args);
      return;
    default:
      throw new ConfigurationError([
        `unknown command "${cmd}" (expected evolve, fuse, synth, key-cost or corpus-stats)`,
      ]);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
