/**
 * Key Space
 *
 * The fixed, ordered set of physical key positions and the mapping from a
 * candidate layout onto them:
 * - Row structure for display and sub-permutation groups
 * - Logical -> physical mapping derived from a layout
 * - Permutation checks
 */

import { LayoutError } from './errors.js';

export type KeyGroup = 'letters' | 'digits' | 'symbols';

export const KEY_GROUPS: readonly KeyGroup[] = ['letters', 'digits', 'symbols'];

export interface KeyPartition {
  letters: number[];
  digits: number[];
  symbols: number[];
}

export class KeySpace {
  readonly symbols: readonly string[];
  readonly rowSizes: readonly number[];
  private readonly positions: ReadonlyMap<string, number>;
  private partition: KeyPartition | null = null;

  constructor(rows: ReadonlyArray<readonly string[]>) {
    const symbols = rows.flat();
    const positions = new Map<string, number>();

    if (symbols.length < 2) {
      throw new LayoutError('A key space needs at least two keys');
    }
    symbols.forEach((symbol, index) => {
      if (symbol.length !== 1) {
        throw new LayoutError(`Key symbols must be single characters, got "${symbol}"`);
      }
      if (positions.has(symbol)) {
        throw new LayoutError(`Duplicate key symbol "${symbol}"`);
      }
      positions.set(symbol, index);
    });

    this.symbols = Object.freeze([...symbols]);
    this.rowSizes = Object.freeze(rows.map((row) => row.length));
    this.positions = positions;
  }

  /**
   * Build a key space from one string per row, one character per key
   */
  static fromRows(rows: readonly string[]): KeySpace {
    return new KeySpace(rows.map((row) => Array.from(row)));
  }

  get size(): number {
    return this.symbols.length;
  }

  indexOf(symbol: string): number {
    return this.positions.get(symbol) ?? -1;
  }

  has(symbol: string): boolean {
    return this.positions.has(symbol);
  }

  /** All key symbols concatenated, in position order. */
  alphabet(): string {
    return this.symbols.join('');
  }

  /** The canonical layout: every key carries its own symbol. */
  canonicalGenes(): string[] {
    return [...this.symbols];
  }

  rowIndices(): number[][] {
    const rows: number[][] = [];
    let start = 0;
    for (const size of this.rowSizes) {
      rows.push(Array.from({ length: size }, (_, i) => start + i));
      start += size;
    }
    return rows;
  }

  /**
   * Split positions into letter, digit and symbol keys.
   * The three groups are disjoint and together cover every position.
   */
  partitionIndices(): KeyPartition {
    if (!this.partition) {
      const partition: KeyPartition = { letters: [], digits: [], symbols: [] };
      this.symbols.forEach((symbol, index) => {
        if (/^[a-z]$/i.test(symbol)) {
          partition.letters.push(index);
        } else if (/^[0-9]$/.test(symbol)) {
          partition.digits.push(index);
        } else {
          partition.symbols.push(index);
        }
      });
      this.partition = partition;
    }
    return {
      letters: [...this.partition.letters],
      digits: [...this.partition.digits],
      symbols: [...this.partition.symbols],
    };
  }

  /**
   * Sorted positions belonging to any of the given groups
   */
  indicesFor(groups: readonly KeyGroup[]): number[] {
    const partition = this.partitionIndices();
    const indices = new Set<number>();
    for (const group of groups) {
      for (const index of partition[group]) {
        indices.add(index);
      }
    }
    return [...indices].sort((a, b) => a - b);
  }
}

// Staggered 46-key block: number row, top, home and bottom rows
export const DEFAULT_KEYSPACE = KeySpace.fromRows([
  '1234567890-=',
  'qwertyuiop[]\\',
  "asdfghjkl;'",
  'zxcvbnm,./',
]);

/**
 * Map each logical symbol to the physical key it sits on.
 * Unchecked: positions beyond either side's length are ignored, so partial
 * layouts produce partial mappings.
 */
export function buildMapping(
  genes: readonly string[],
  keySpace: KeySpace = DEFAULT_KEYSPACE
): Map<string, string> {
  const mapping = new Map<string, string>();
  const length = Math.min(genes.length, keySpace.size);
  for (let i = 0; i < length; i++) {
    mapping.set(genes[i], keySpace.symbols[i]);
  }
  return mapping;
}

export function buildCheckedMapping(
  genes: readonly string[],
  keySpace: KeySpace = DEFAULT_KEYSPACE
): Map<string, string> {
  assertPermutation(genes, keySpace);
  return buildMapping(genes, keySpace);
}

/**
 * True when `genes` holds exactly the symbols of `reference`, each once
 */
export function isPermutation(genes: readonly unknown[], reference: readonly unknown[]): boolean {
  if (genes.length !== reference.length) {
    return false;
  }
  const remaining = new Map<unknown, number>();
  for (const value of reference) {
    remaining.set(value, (remaining.get(value) ?? 0) + 1);
  }
  for (const value of genes) {
    const count = remaining.get(value);
    if (!count) {
      return false;
    }
    remaining.set(value, count - 1);
  }
  return true;
}

export function assertPermutation(
  genes: readonly string[],
  keySpace: KeySpace = DEFAULT_KEYSPACE
): void {
  if (genes.length !== keySpace.size) {
    throw new LayoutError(`Layout has ${genes.length} keys, expected ${keySpace.size}`);
  }
  const seen = new Set<string>();
  for (const symbol of genes) {
    if (!keySpace.has(symbol)) {
      throw new LayoutError(`Layout contains unknown symbol "${symbol}"`);
    }
    if (seen.has(symbol)) {
      throw new LayoutError(`Layout contains "${symbol}" more than once`);
    }
    seen.add(symbol);
  }
}

/**
 * Staggered multi-line rendering, one row per line
 */
export function formatLayoutAscii(
  genes: readonly string[],
  keySpace: KeySpace = DEFAULT_KEYSPACE
): string {
  return keySpace
    .rowIndices()
    .map((indices, row) => {
      const keys = indices.filter((i) => i < genes.length).map((i) => genes[i]);
      return ' '.repeat(row) + keys.join(' ');
    })
    .join('\n');
}

export function layoutString(genes: readonly string[]): string {
  return genes.join('');
}
