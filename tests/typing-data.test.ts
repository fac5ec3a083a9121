import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  formatTypingCsv,
  fuseTimingFiles,
  loadTimingFile,
  loadTimingRecords,
  parseCsvRows,
  parseTimingRecords,
  parseTypingCsv,
} from '../src/data/typing-data.js';

describe('parseTimingRecords', () => {
  it('should average totals per sequence and skip malformed records', () => {
    const { timings, accepted, skippedRecords } = parseTimingRecords([
      { sequence: 'a', totalSequenceTime: 100 },
      { sequence: 'a', totalSequenceTime: '120' },
      { sequence: 'ab', letterTimings: [{ reactionTime: 50 }, { reactionTime: 70 }] },
      { sequence: 'abc', totalSequenceTime: 300 },
      { sequence: 'abcd', totalSequenceTime: 400 },
      { sequence: '' },
      { sequence: 'ab', totalSequenceTime: 'fast' },
      'garbage',
    ]);

    expect(Object.fromEntries(timings.uni)).toEqual({ a: 110 });
    expect(Object.fromEntries(timings.bi)).toEqual({ ab: 120 });
    expect(Object.fromEntries(timings.tri)).toEqual({ abc: 300 });
    expect(accepted).toBe(4);
    expect(skippedRecords).toBe(4);
  });

  it('should prefer the recorded total over the letter timings', () => {
    const { timings } = parseTimingRecords([
      { sequence: 'qw', totalSequenceTime: 90, letterTimings: [{ reactionTime: 10 }, { reactionTime: 20 }] },
    ]);

    expect(timings.bi.get('qw')).toBe(90);
  });

  it('should keep a usable total when the letter timings are malformed', () => {
    const { timings, skippedRecords } = parseTimingRecords([
      { sequence: 'a', totalSequenceTime: 120, letterTimings: [{ reactionTime: 'n/a' }] },
    ]);

    expect(timings.uni.get('a')).toBe(120);
    expect(skippedRecords).toBe(0);
  });

  it('should sum only the letter timings that parse when the total is missing', () => {
    const { timings } = parseTimingRecords([
      { sequence: 'as', letterTimings: [{ reactionTime: '40' }, { reactionTime: 'n/a' }, 'junk'] },
    ]);

    expect(timings.bi.get('as')).toBe(40);
  });

  it('should read numeric sequences as digit keys', () => {
    const { timings } = parseTimingRecords([{ sequence: 1, totalSequenceTime: 200 }]);

    expect(timings.uni.get('1')).toBe(200);
  });
});

describe('CSV parsing', () => {
  it('should split quoted fields and mixed line endings', () => {
    expect(parseCsvRows('a,"b,c"\r\n"x""y",z')).toEqual([
      ['a', 'b,c'],
      ['x"y', 'z'],
    ]);
  });

  it('should collect JSON arrays from the timing column and count bad rows', () => {
    const content = [
      'id,typing_data',
      '1,"[{""sequence"":""a"",""totalSequenceTime"":100}]"',
      '2,',
      '3,not json',
      '4,"{""sequence"":""a""}"',
      '',
    ].join('\n');

    expect(parseTypingCsv(content)).toEqual({
      records: [{ sequence: 'a', totalSequenceTime: 100 }],
      skippedRows: 3,
    });
  });

  it('should find the column behind a byte-order mark', () => {
    const content = '\uFEFFtyping_data\n"[{""sequence"":""a"",""totalSequenceTime"":90}]"\n';

    expect(parseTypingCsv(content)).toEqual({
      records: [{ sequence: 'a', totalSequenceTime: 90 }],
      skippedRows: 0,
    });
  });

  it('should skip every row when the column is missing', () => {
    expect(parseTypingCsv('id,other\n1,"[]"\n2,"[]"\n')).toEqual({ records: [], skippedRows: 2 });
  });

  it('should write all records into a single quoted cell', () => {
    const csv = formatTypingCsv([{ sequence: 'a' }], 'data');

    expect(csv).toBe('data\n"[{""sequence"":""a""}]"\n');
    expect(parseTypingCsv(csv, 'data').records).toEqual([{ sequence: 'a' }]);
  });
});

describe('timing files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'typing-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read JSON arrays and reject other JSON as one bad row', async () => {
    const good = join(dir, 'good.json');
    const bad = join(dir, 'bad.json');
    await writeFile(good, JSON.stringify([{ sequence: 'ab', totalSequenceTime: 150 }]));
    await writeFile(bad, JSON.stringify({ sequence: 'ab' }));

    expect(await loadTimingRecords(good)).toEqual({
      records: [{ sequence: 'ab', totalSequenceTime: 150 }],
      skippedRows: 0,
    });
    expect(await loadTimingRecords(bad)).toEqual({ records: [], skippedRows: 1 });
  });

  it('should build timing tables from a CSV file', async () => {
    const path = join(dir, 'typing.csv');
    await writeFile(path, formatTypingCsv([{ sequence: 'ab', totalSequenceTime: 150 }, { sequence: 'zz' }], 'rows'));

    const result = await loadTimingFile(path, 'rows');

    expect(result.timings.bi.get('ab')).toBe(150);
    expect(result.timings.bi.get('zz')).toBe(0);
    expect(result.accepted).toBe(2);
    expect(result.skippedRecords).toBe(0);
    expect(result.skippedRows).toBe(0);
  });

  it('should fuse readable files and warn about the rest', async () => {
    const first = join(dir, 'first.json');
    const second = join(dir, 'second.csv');
    await writeFile(first, JSON.stringify([{ sequence: 'a', totalSequenceTime: 80 }]));
    await writeFile(second, formatTypingCsv([{ sequence: 'b', totalSequenceTime: 90 }]));
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    try {
      const fused = await fuseTimingFiles([first, join(dir, 'missing.csv'), second]);

      expect(fused).toEqual({
        records: [
          { sequence: 'a', totalSequenceTime: 80 },
          { sequence: 'b', totalSequenceTime: 90 },
        ],
        files: 2,
      });
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(expect.stringContaining(`Skipping ${join(dir, 'missing.csv')}: `));
    } finally {
      warn.mockRestore();
    }
  });
});
