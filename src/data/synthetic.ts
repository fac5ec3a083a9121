/**
 * Synthetic typing data
 *
 * Generates plausible unigram and bigram timings from key geometry when no
 * measurements are at hand: home-row keys near F/J are fastest, distant and
 * edge keys slower, and bigrams pay for row changes, travel and same-hand use.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_KEYSPACE, KeySpace } from '../keyspace.js';
import { RandomFn } from '../random.js';

// Horizontal stagger of each row relative to the home row, in key widths
const ROW_STAGGER = [0, -1.5, 0, -2.5];
const HOME_ROW = 2;
const ANCHOR_COLUMNS = [3, 6]; // F and J on the home row
const HAND_SPLIT = 5.5;
const EDGE_PENALTY = 15;
const MIN_UNIGRAM_MS = 60;
const MIN_BIGRAM_MS = 80;

const syntheticOptionsSchema = z.object({
  rowBaseMs: z.array(z.number().finite().nonnegative()).min(1),
  distancePenalty: z.number().finite().nonnegative(),
  sameRowPenalty: z.number().finite(),
  diffRowPenalty: z.number().finite(),
  repeatPenalty: z.number().finite(),
  noiseStd: z.number().finite().nonnegative(),
});

export type SyntheticTimingOptions = z.infer<typeof syntheticOptionsSchema>;

export const DEFAULT_SYNTHETIC_OPTIONS: SyntheticTimingOptions = {
  rowBaseMs: [220, 170, 140, 200], // number, top, home, bottom
  distancePenalty: 4,
  sameRowPenalty: 12,
  diffRowPenalty: 6,
  repeatPenalty: 35,
  noiseStd: 0,
};

export interface SyntheticRecord {
  sequence: string;
  letterTimings: Array<{ letter: string; reactionTime: number }>;
  totalSequenceTime: number;
}

interface KeyPosition {
  row: number;
  columnInRow: number;
  column: number; // stagger-adjusted
  rowSize: number;
}

/**
 * Noise-free timing model over a key space's geometry
 */
export class SyntheticTimingModel {
  readonly options: SyntheticTimingOptions;
  private readonly positions: KeyPosition[];

  constructor(options: Partial<SyntheticTimingOptions> = {}, keySpace: KeySpace = DEFAULT_KEYSPACE) {
    const parsed = syntheticOptionsSchema.safeParse({ ...DEFAULT_SYNTHETIC_OPTIONS, ...options });
    if (!parsed.success) {
      throw new ConfigurationError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    this.options = parsed.data;
    this.positions = keySpace.rowIndices().flatMap((indices, row) =>
      indices.map((_, columnInRow) => ({
        row,
        columnInRow,
        column: columnInRow + (ROW_STAGGER[row] ?? 0),
        rowSize: indices.length,
      }))
    );
  }

  unigram(index: number): number {
    const { row, columnInRow, column, rowSize } = this.position(index);
    const { rowBaseMs, distancePenalty } = this.options;
    const base = rowBaseMs[Math.min(row, rowBaseMs.length - 1)];

    const distance = Math.min(
      ...ANCHOR_COLUMNS.map((anchor) => Math.hypot(row - HOME_ROW, column - anchor))
    );
    // Linear near the anchors, quadratic out in pinky territory
    let penalty =
      distance > 2
        ? 2 * distancePenalty + (distance - 2) ** 2 * distancePenalty * 1.5
        : distance * distancePenalty;
    if (columnInRow < 2 || columnInRow >= rowSize - 2) {
      penalty += EDGE_PENALTY;
    }
    return Math.max(MIN_UNIGRAM_MS, base + penalty);
  }

  bigram(first: number, second: number): number {
    let time = this.unigram(first) + this.unigram(second);
    if (first === second) {
      return Math.max(MIN_BIGRAM_MS, time + this.options.repeatPenalty);
    }

    const a = this.position(first);
    const b = this.position(second);
    const vertical = Math.abs(a.row - b.row);
    const horizontal = Math.abs(a.column - b.column);
    const travel = Math.hypot(vertical, horizontal);

    time += a.row === b.row ? this.options.sameRowPenalty : this.options.diffRowPenalty;
    time += travel * this.options.distancePenalty;
    time += (a.column < HAND_SPLIT) === (b.column < HAND_SPLIT) ? 30 * (travel / 3) : 4;
    if (vertical > 0) {
      time += vertical * (b.row < a.row ? 6 : 7.5);
    }
    if (horizontal > 2.5) {
      time += (horizontal - 2.5) * 4.5;
    }
    if (vertical > 0 && horizontal > 1.5) {
      time += (vertical * horizontal) / 1.5;
    }
    // Fixed per-pair variation so equal geometry does not give equal times
    time += (((first * 17 + second * 23) % 100) / 100 - 0.5) * 22;

    return Math.max(MIN_BIGRAM_MS, time);
  }

  private position(index: number): KeyPosition {
    const position = this.positions[index];
    if (!position) {
      throw new RangeError(`Key index ${index} is outside 0..${this.positions.length - 1}`);
    }
    return position;
  }
}

/** Standard normal via Box-Muller. */
function gaussian(random: RandomFn): number {
  const u1 = Math.max(random(), 1e-15);
  const u2 = random();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Every unigram and every ordered bigram of the key space, with jitter
 */
export function generateSyntheticRecords(
  random: RandomFn,
  options: Partial<SyntheticTimingOptions> = {},
  keySpace: KeySpace = DEFAULT_KEYSPACE
): SyntheticRecord[] {
  const model = new SyntheticTimingModel(options, keySpace);
  const jitter = (value: number) => {
    const noisy = value + (random() * 0.3 - 0.15);
    return model.options.noiseStd > 0 ? noisy + gaussian(random) * model.options.noiseStd : noisy;
  };

  const records: SyntheticRecord[] = [];
  keySpace.symbols.forEach((symbol, i) => {
    const time = round2(jitter(model.unigram(i)));
    records.push({
      sequence: symbol,
      letterTimings: [{ letter: symbol, reactionTime: time }],
      totalSequenceTime: time,
    });
  });
  keySpace.symbols.forEach((a, i) => {
    keySpace.symbols.forEach((b, j) => {
      const total = round2(jitter(model.bigram(i, j)));
      records.push({
        sequence: a + b,
        letterTimings: [
          { letter: a, reactionTime: round2(jitter(model.unigram(i))) },
          { letter: b, reactionTime: round2(jitter(model.unigram(j))) },
        ],
        totalSequenceTime: total,
      });
    });
  });
  return records;
}
