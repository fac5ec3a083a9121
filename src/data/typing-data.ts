/**
 * Typing Data
 *
 * Turns raw per-sequence timing measurements into mean timing tables:
 * - Records validated one by one; malformed ones are skipped and counted
 * - CSV files carry a JSON array of records per row
 * - Several measurement files can be fused into one
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { TimingTables } from '../types.js';

export const DEFAULT_TIMING_COLUMN = 'typing_data';

const milliseconds = z.coerce.number().finite();

// Letter timings are only read when the total is missing, so they are not validated up front
const timingRecordSchema = z.object({
  sequence: z.coerce.string().min(1).max(3),
  letterTimings: z.array(z.unknown()).nullish(),
  totalSequenceTime: milliseconds.nullish(),
});

export type TimingRecord = z.infer<typeof timingRecordSchema>;

const letterTimingSchema = z.object({ reactionTime: milliseconds });

/**
 * Sum of the letters' reaction times; entries without a usable time count as 0
 */
function sumReactionTimes(letterTimings: readonly unknown[]): number {
  return letterTimings.reduce<number>((sum, letter) => {
    const parsed = letterTimingSchema.safeParse(letter);
    return parsed.success ? sum + parsed.data.reactionTime : sum;
  }, 0);
}

export interface TimingParseResult {
  timings: TimingTables;
  accepted: number;
  skippedRecords: number;
}

export interface RecordLoadResult {
  records: unknown[];
  skippedRows: number;
}

/**
 * Mean total time per sequence, split by sequence length.
 * A record without a total uses the sum of its letters' reaction times.
 */
export function parseTimingRecords(records: readonly unknown[]): TimingParseResult {
  const samples: Array<Map<string, { sum: number; count: number }>> = [new Map(), new Map(), new Map()];
  let accepted = 0;
  let skippedRecords = 0;

  for (const raw of records) {
    const parsed = timingRecordSchema.safeParse(raw);
    if (!parsed.success) {
      skippedRecords++;
      continue;
    }
    const record = parsed.data;
    const total = record.totalSequenceTime ?? sumReactionTimes(record.letterTimings ?? []);

    const bucket = samples[record.sequence.length - 1];
    const entry = bucket.get(record.sequence) ?? { sum: 0, count: 0 };
    entry.sum += total;
    entry.count++;
    bucket.set(record.sequence, entry);
    accepted++;
  }

  const [uni, bi, tri] = samples.map(
    (bucket) =>
      new Map([...bucket].map(([sequence, { sum, count }]): [string, number] => [sequence, sum / count]))
  );
  return { timings: { uni, bi, tri }, accepted, skippedRecords };
}

/**
 * Split CSV text into rows of fields (RFC 4180 quoting, CRLF or LF)
 */
export function parseCsvRows(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (quoted) {
      if (ch === '"' && content[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && content[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

/**
 * Collect the records of a CSV whose `column` holds a JSON array per row.
 * Rows with an empty, unparseable or non-array cell are skipped.
 */
export function parseTypingCsv(content: string, column: string = DEFAULT_TIMING_COLUMN): RecordLoadResult {
  const [header, ...rows] = parseCsvRows(content.replace(/^\uFEFF/, ''));
  const columnIndex = header ? header.indexOf(column) : -1;
  const records: unknown[] = [];
  let skippedRows = 0;

  for (const row of rows) {
    const cell = columnIndex >= 0 ? row[columnIndex] : undefined;
    const parsed = cell ? parseJsonArray(cell) : null;
    if (!parsed) {
      skippedRows++;
      continue;
    }
    records.push(...parsed);
  }
  return { records, skippedRows };
}

function parseJsonArray(text: string): unknown[] | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  return Array.isArray(value) ? value : null;
}

/**
 * Read timing records from a `.json` file (an array of records) or a CSV file
 */
export async function loadTimingRecords(
  path: string,
  column: string = DEFAULT_TIMING_COLUMN
): Promise<RecordLoadResult> {
  const content = await readFile(path, 'utf-8');
  if (path.toLowerCase().endsWith('.json')) {
    const records = parseJsonArray(content);
    return records ? { records, skippedRows: 0 } : { records: [], skippedRows: 1 };
  }
  return parseTypingCsv(content, column);
}

export async function loadTimingFile(
  path: string,
  column: string = DEFAULT_TIMING_COLUMN
): Promise<TimingParseResult & { skippedRows: number }> {
  const { records, skippedRows } = await loadTimingRecords(path, column);
  return { ...parseTimingRecords(records), skippedRows };
}

/**
 * Concatenate the records of several measurement files; unreadable files are skipped
 */
export async function fuseTimingFiles(
  paths: readonly string[],
  column: string = DEFAULT_TIMING_COLUMN
): Promise<{ records: unknown[]; files: number }> {
  const records: unknown[] = [];
  let files = 0;
  for (const path of paths) {
    try {
      const loaded = await loadTimingRecords(path, column);
      records.push(...loaded.records);
      files++;
    } catch (error) {
      console.warn(`Skipping ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return { records, files };
}

/**
 * One-row CSV holding all records as a JSON array
 */
export function formatTypingCsv(records: readonly unknown[], column: string = DEFAULT_TIMING_COLUMN): string {
  const payload = JSON.stringify(records);
  return `${column}\n"${payload.replace(/"/g, '""')}"\n`;
}
