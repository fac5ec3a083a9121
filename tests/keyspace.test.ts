import { LayoutError } from '../src/errors.js';
import {
  DEFAULT_KEYSPACE,
  KeySpace,
  assertPermutation,
  buildCheckedMapping,
  buildMapping,
  formatLayoutAscii,
  isPermutation,
  layoutString,
} from '../src/keyspace.js';

describe('KeySpace', () => {
  it('should lay out the default 46-key block row by row', () => {
    expect(DEFAULT_KEYSPACE.size).toBe(46);
    expect(DEFAULT_KEYSPACE.rowSizes).toEqual([12, 13, 11, 10]);
    expect(DEFAULT_KEYSPACE.indexOf('1')).toBe(0);
    expect(DEFAULT_KEYSPACE.indexOf('q')).toBe(12);
    expect(DEFAULT_KEYSPACE.indexOf('\\')).toBe(24);
    expect(DEFAULT_KEYSPACE.indexOf('/')).toBe(45);
    expect(DEFAULT_KEYSPACE.indexOf('A')).toBe(-1);
  });

  it('should reject duplicate, multi-character and too few symbols', () => {
    expect(() => KeySpace.fromRows(['aba'])).toThrow(LayoutError);
    expect(() => new KeySpace([['a', 'bc']])).toThrow(LayoutError);
    expect(() => KeySpace.fromRows(['a'])).toThrow(LayoutError);
  });

  it('should partition positions into disjoint groups covering every key', () => {
    const { letters, digits, symbols } = DEFAULT_KEYSPACE.partitionIndices();

    expect(letters).toHaveLength(26);
    expect(digits).toHaveLength(10);
    expect(symbols).toHaveLength(10);
    expect(new Set([...letters, ...digits, ...symbols]).size).toBe(46);
  });

  it('should return partitions the caller may modify freely', () => {
    DEFAULT_KEYSPACE.partitionIndices().letters.length = 0;

    expect(DEFAULT_KEYSPACE.partitionIndices().letters).toHaveLength(26);
  });

  it('should merge groups into sorted indices', () => {
    const space = KeySpace.fromRows(['1a', ',b2']);

    expect(space.indicesFor(['digits', 'symbols'])).toEqual([0, 2, 4]);
    expect(space.indicesFor(['letters'])).toEqual([1, 3]);
  });

  it('should number rows consecutively', () => {
    expect(KeySpace.fromRows(['ab', 'cde']).rowIndices()).toEqual([
      [0, 1],
      [2, 3, 4],
    ]);
  });
});

describe('mapping', () => {
  const space = KeySpace.fromRows(['ab', 'cd']);

  it('should map each logical symbol to the key at its position', () => {
    const mapping = buildMapping(['c', 'a', 'd', 'b'], space);

    expect(Object.fromEntries(mapping)).toEqual({ c: 'a', a: 'b', d: 'c', b: 'd' });
  });

  it('should build a partial mapping for short layouts', () => {
    expect(Object.fromEntries(buildMapping(['d'], space))).toEqual({ d: 'a' });
  });

  it('should check the layout before building a checked mapping', () => {
    expect(() => buildCheckedMapping(['a', 'b', 'c'], space)).toThrow('Layout has 3 keys, expected 4');
  });
});

describe('permutation checks', () => {
  const space = KeySpace.fromRows(['ab', 'cd']);

  it('should compare symbol multisets', () => {
    expect(isPermutation(['d', 'c', 'b', 'a'], ['a', 'b', 'c', 'd'])).toBe(true);
    expect(isPermutation(['a', 'a', 'c', 'd'], ['a', 'b', 'c', 'd'])).toBe(false);
    expect(isPermutation(['a', 'b'], ['a', 'b', 'c'])).toBe(false);
  });

  it('should name the problem with a layout', () => {
    expect(() => assertPermutation(['a', 'b', 'c', 'x'], space)).toThrow('Layout contains unknown symbol "x"');
    expect(() => assertPermutation(['a', 'b', 'b', 'd'], space)).toThrow('Layout contains "b" more than once');
    expect(() => assertPermutation(['d', 'c', 'b', 'a'], space)).not.toThrow();
  });
});

describe('rendering', () => {
  it('should stagger rows by one space each', () => {
    const space = KeySpace.fromRows(['ab', 'cd', 'ef']);

    expect(formatLayoutAscii(['f', 'e', 'd', 'c', 'b', 'a'], space)).toBe('f e\n d c\n  b a');
  });

  it('should render the canonical default layout', () => {
    const lines = formatLayoutAscii(DEFAULT_KEYSPACE.canonicalGenes()).split('\n');

    expect(lines[0]).toBe('1 2 3 4 5 6 7 8 9 0 - =');
    expect(lines[3]).toBe('   z x c v b n m , . /');
  });

  it('should join genes into a layout string', () => {
    expect(layoutString(['q', 'w', 'e'])).toBe('qwe');
  });
});
