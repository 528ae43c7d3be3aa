import { describe, it, expect } from 'vitest';
import {
  isBlankRow,
  normalizeGrid,
  fitRow,
  lastNonBlankRow,
  lastNonBlankColumn,
  deepFreeze,
} from '../grid-utils';

describe('isBlankRow', () => {
  it('is true for empty and whitespace rows', () => {
    expect(isBlankRow([])).toBe(true);
    expect(isBlankRow([null, ' ', ''])).toBe(true);
    expect(isBlankRow(undefined)).toBe(true);
  });

  it('is false when any cell has a value', () => {
    expect(isBlankRow([null, 0])).toBe(false);
  });
});

describe('normalizeGrid', () => {
  it('pads ragged rows to the widest row', () => {
    expect(normalizeGrid([['a'], ['b', 'c']])).toEqual([
      ['a', null],
      ['b', 'c'],
    ]);
  });

  it('trims trailing blank rows and columns', () => {
    expect(normalizeGrid([['a', null, ''], ['b', 1, null], [null, null], []])).toEqual([
      ['a', null],
      ['b', 1],
    ]);
  });

  it('keeps blank rows between values', () => {
    expect(normalizeGrid([['a'], [], ['b']])).toEqual([['a'], [null], ['b']]);
  });

  it('returns an empty grid for blank input', () => {
    expect(normalizeGrid([[null], ['']])).toEqual([]);
  });
});

describe('fitRow', () => {
  it('cuts and pads', () => {
    expect(fitRow(['a', 'b', 'c'], 2)).toEqual(['a', 'b']);
    expect(fitRow(['a'], 3)).toEqual(['a', null, null]);
  });
});

describe('lastNonBlankRow', () => {
  it('finds the last row with a value', () => {
    expect(lastNonBlankRow([['a'], ['b'], [null]])).toBe(1);
    expect(lastNonBlankRow([[null]])).toBe(-1);
  });
});

describe('lastNonBlankColumn', () => {
  it('looks across every row', () => {
    expect(lastNonBlankColumn([['a', null, null], [null, null, 'x']])).toBe(2);
    expect(lastNonBlankColumn([[null, ' ']])).toBe(-1);
  });
});

describe('deepFreeze', () => {
  it('freezes nested arrays and objects', () => {
    const value = deepFreeze({ rows: [[1, 2]], meta: { name: 'x' } });
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.rows)).toBe(true);
    expect(Object.isFrozen(value.rows[0])).toBe(true);
    expect(Object.isFrozen(value.meta)).toBe(true);
  });
});
