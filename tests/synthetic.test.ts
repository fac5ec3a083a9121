import { generateSyntheticRecords, SyntheticTimingModel } from '../src/data/synthetic.js';
import { parseTimingRecords } from '../src/data/typing-data.js';
import { ConfigurationError } from '../src/errors.js';
import { DEFAULT_KEYSPACE } from '../src/keyspace.js';
import { createSeededRandom } from '../src/random.js';

const at = (symbol: string) => DEFAULT_KEYSPACE.indexOf(symbol);

describe('SyntheticTimingModel', () => {
  const model = new SyntheticTimingModel();

  it('should make the home anchor keys the fastest', () => {
    expect(model.unigram(at('f'))).toBe(140);
    expect(model.unigram(at('j'))).toBe(140);
  });

  it('should penalise distance from the anchors and edge columns', () => {
    // Three keys from F on the home row, plus the edge penalty
    expect(model.unigram(at('a'))).toBe(169);
    // Number row corner: sqrt(13) from F
    expect(model.unigram(at('1'))).toBeCloseTo(258.467, 3);
  });

  it('should add the repeat penalty to same-key bigrams', () => {
    expect(model.bigram(at('f'), at('f'))).toBe(315);
  });

  it('should charge travel, hand use and pair variation on other bigrams', () => {
    // 280 base + 12 same row + 12 travel + 4 cross hand + 2.25 lateral + 8.58 variation
    expect(model.bigram(at('f'), at('j'))).toBeCloseTo(318.83, 6);
  });

  it('should reject negative penalties', () => {
    expect(() => new SyntheticTimingModel({ distancePenalty: -1 })).toThrow(ConfigurationError);
  });

  it('should reject key indices outside the layout', () => {
    expect(() => model.unigram(46)).toThrow(RangeError);
  });
});

describe('generateSyntheticRecords', () => {
  it('should cover every unigram and ordered bigram', () => {
    const records = generateSyntheticRecords(createSeededRandom(1234));
    const { timings, accepted, skippedRecords } = parseTimingRecords(records);

    expect(records).toHaveLength(46 + 46 * 46);
    expect(accepted).toBe(records.length);
    expect(skippedRecords).toBe(0);
    expect(timings.uni.size).toBe(46);
    expect(timings.bi.size).toBe(46 * 46);
  });

  it('should stay within the jitter of the noise-free model', () => {
    const model = new SyntheticTimingModel();
    const records = generateSyntheticRecords(createSeededRandom(3));

    records.slice(0, 46).forEach((record, i) => {
      expect(Math.abs(record.totalSequenceTime - model.unigram(i))).toBeLessThanOrEqual(0.16);
    });
  });

  it('should replay for a fixed seed', () => {
    const options = { noiseStd: 5 };

    expect(generateSyntheticRecords(createSeededRandom(9), options)).toEqual(
      generateSyntheticRecords(createSeededRandom(9), options)
    );
  });
});
