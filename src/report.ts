/**
 * Run reporting: plain-text summaries of a finished evolution
 */

import { DEFAULT_KEYSPACE, KeySpace, formatLayoutAscii, layoutString } from './keyspace.js';
import { TimingTables } from './types.js';

const SPARK_CHARS = '▁▂▃▄▅▆▇█';

/**
 * One block character per sampled value, scaled between the series' min and max
 */
export function asciiSparkline(values: readonly number[], width = 60): string {
  if (values.length === 0) {
    return '';
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (max - min < 1e-12) {
    return SPARK_CHARS[0].repeat(Math.min(width, values.length));
  }

  const step = Math.max(1, Math.floor(values.length / width));
  let out = '';
  for (let i = 0; i < values.length; i += step) {
    const norm = (values[i] - min) / (max - min);
    const index = Math.min(SPARK_CHARS.length - 1, Math.round(norm * (SPARK_CHARS.length - 1)));
    out += SPARK_CHARS[index];
  }
  return out;
}

export interface BaselineComparison {
  bestCost: number;
  baselineCost: number;
  improvementPercent: number; // positive when the best layout is faster
}

export function compareToBaseline(bestCost: number, baselineCost: number): BaselineComparison {
  return {
    bestCost,
    baselineCost,
    improvementPercent: baselineCost > 0 ? (100 * (baselineCost - bestCost)) / baselineCost : 0,
  };
}

/**
 * Per-key cost laid out on the keyboard rows, `key:cost` with one decimal
 */
export function formatKeyCostTable(
  keyCost: ReadonlyMap<string, number>,
  keySpace: KeySpace = DEFAULT_KEYSPACE
): string {
  return keySpace
    .rowIndices()
    .map((indices, row) => {
      const cells = indices.map((i) => {
        const key = keySpace.symbols[i];
        return `${key}:${(keyCost.get(key) ?? 0).toFixed(1)}`;
      });
      return ' '.repeat(row) + cells.join(' ');
    })
    .join('\n');
}

export function keyCostToRecord(keyCost: ReadonlyMap<string, number>): Record<string, number> {
  return Object.fromEntries(keyCost);
}

export interface RunSummaryInput {
  genes: readonly string[];
  fitness: number;
  comparison: BaselineComparison;
  trajectory: readonly number[];
  keySpace?: KeySpace;
}

export function summarizeRun({ genes, fitness, comparison, trajectory, keySpace }: RunSummaryInput): string {
  return [
    'Best layout (string):',
    layoutString(genes),
    '',
    'Best layout (ASCII):',
    formatLayoutAscii(genes, keySpace ?? DEFAULT_KEYSPACE),
    '',
    `Best cost: ${comparison.bestCost.toFixed(2)} ms, fitness: ${fitness.toFixed(6)}`,
    `Baseline (canonical) cost: ${comparison.baselineCost.toFixed(2)} ms`,
    `Improvement over baseline: ${comparison.improvementPercent.toFixed(2)}%`,
    '',
    'Fitness (ASCII sparkline):',
    asciiSparkline(trajectory),
  ].join('\n');
}

export interface KeyTimingEntry {
  label: string;
  kind: 'uni' | 'bi';
  time: number;
}

/**
 * Measured timings involving one key: its unigram and every bigram it starts
 * or ends, fastest first
 */
export function collectKeyTimings(
  key: string,
  timings: TimingTables,
  keySpace: KeySpace = DEFAULT_KEYSPACE
): KeyTimingEntry[] {
  const entries: KeyTimingEntry[] = [];
  const unigram = timings.uni.get(key);
  if (unigram !== undefined) {
    entries.push({ label: key, kind: 'uni', time: unigram });
  }
  for (const other of keySpace.symbols) {
    const leading = timings.bi.get(key + other);
    if (leading !== undefined) {
      entries.push({ label: `${key}+${other}`, kind: 'bi', time: leading });
    }
    const trailing = other === key ? undefined : timings.bi.get(other + key);
    if (trailing !== undefined) {
      entries.push({ label: `${other}+${key}`, kind: 'bi', time: trailing });
    }
  }
  return entries.sort((a, b) => a.time - b.time);
}

export function formatKeyTimingReport(key: string, entries: readonly KeyTimingEntry[]): string {
  const bigrams = entries.filter((entry) => entry.kind === 'bi').map((entry) => entry.time);
  const unigram = entries.find((entry) => entry.kind === 'uni');
  const lines = [
    `Timings for key "${key}": ${unigram ? 1 : 0} unigram + ${bigrams.length} bigrams`,
    ...entries.map((entry) => `  ${entry.label.padEnd(6)} ${entry.time.toFixed(2)} ms`),
  ];
  if (unigram) {
    lines.push(`Unigram: ${unigram.time.toFixed(2)} ms`);
  }
  if (bigrams.length > 0) {
    const mean = bigrams.reduce((a, b) => a + b, 0) / bigrams.length;
    lines.push(
      `Bigrams: min=${Math.min(...bigrams).toFixed(2)} ms, max=${Math.max(...bigrams).toFixed(2)} ms, ` +
        `mean=${mean.toFixed(2)} ms`
    );
  }
  return lines.join('\n');
}
