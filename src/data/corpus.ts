/**
 * Corpus n-gram counting and frequency reports
 */

import { readFile } from 'fs/promises';
import { FrequencyTables } from '../types.js';

/**
 * Count overlapping 1-, 2- and 3-character windows of the corpus after
 * lower-casing it and dropping every character outside `alphabet`
 */
export function countNgrams(text: string, alphabet: string): FrequencyTables {
  const allowed = new Set(Array.from(alphabet));
  const chars = Array.from(text.toLowerCase()).filter((ch) => allowed.has(ch));

  const uni = new Map<string, number>();
  const bi = new Map<string, number>();
  const tri = new Map<string, number>();
  const bump = (table: Map<string, number>, key: string) => {
    table.set(key, (table.get(key) ?? 0) + 1);
  };

  for (let i = 0; i < chars.length; i++) {
    bump(uni, chars[i]);
    if (i + 1 < chars.length) {
      bump(bi, chars[i] + chars[i + 1]);
    }
    if (i + 2 < chars.length) {
      bump(tri, chars[i] + chars[i + 1] + chars[i + 2]);
    }
  }

  return { uni, bi, tri };
}

export async function loadCorpus(path: string, alphabet: string): Promise<FrequencyTables> {
  const text = await readFile(path, 'utf-8');
  return countNgrams(text, alphabet);
}

export type FrequencyEntry = [string, number];

function byCountThenText(a: FrequencyEntry, b: FrequencyEntry): number {
  if (a[1] !== b[1]) {
    return b[1] - a[1];
  }
  return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

/**
 * Raw character counts of the whole text, most frequent first
 */
export function characterFrequencies(text: string): FrequencyEntry[] {
  const counts = new Map<string, number>();
  for (const ch of text) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }
  return [...counts].sort(byCountThenText);
}

/**
 * Raw overlapping character pairs of the whole text, most frequent first
 */
export function bigramFrequencies(text: string): FrequencyEntry[] {
  const chars = Array.from(text);
  const counts = new Map<string, number>();
  for (let i = 0; i + 1 < chars.length; i++) {
    const pair = chars[i] + chars[i + 1];
    counts.set(pair, (counts.get(pair) ?? 0) + 1);
  }
  return [...counts].sort(byCountThenText);
}

function displayCharacter(ch: string): string {
  if (ch === '\n') return '\\n';
  if (ch === '\t') return '\\t';
  if (ch === '\r') return '\\r';
  if (ch === ' ') return "' ' (space)";
  const code = ch.codePointAt(0) ?? 0;
  if (code < 32 || code === 127) {
    return `\\x${code.toString(16).padStart(2, '0')}`;
  }
  return ch;
}

const RULE = '='.repeat(50);

/**
 * Plain-text frequency report: every character, then the `topBigrams` most common pairs
 */
export function formatFrequencyReport(text: string, topBigrams = 50): string {
  const chars = characterFrequencies(text);
  const total = chars.reduce((sum, [, count]) => sum + count, 0);
  const lines = [
    'Character Frequency Count',
    RULE,
    `Total unique characters: ${chars.length}`,
    `Total characters: ${total}`,
    RULE,
    '',
    ...chars.map(([ch, count]) => `${displayCharacter(ch).padEnd(20)} : ${String(count).padStart(10)}`),
    '',
    `Top ${topBigrams} bigrams`,
    RULE,
    ...bigramFrequencies(text)
      .slice(0, topBigrams)
      .map(([pair, count]) => `${JSON.stringify(pair).padEnd(20)} : ${String(count).padStart(10)}`),
  ];
  return lines.join('\n') + '\n';
}
