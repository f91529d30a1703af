/**
 * Tests for Table Encoding
 */

import { describe, it, expect } from 'vitest';
import { encodeDelimited, formatCell, isTabularData, toMatrix } from './table-encoding.js';

describe('isTabularData', () => {
  it('accepts rows of cells', () => {
    expect(isTabularData([['a', 1], ['b', null]])).toBe(true);
  });

  it('accepts arrays of records', () => {
    expect(isTabularData([{ a: 1 }, { b: 'x' }])).toBe(true);
  });

  it('rejects empty arrays, scalars and nested objects', () => {
    expect(isTabularData([])).toBe(false);
    expect(isTabularData('a,b')).toBe(false);
    expect(isTabularData([{ nested: { deep: 1 } }])).toBe(false);
    expect(isTabularData([['a'], { b: 1 }])).toBe(false);
  });
});

describe('toMatrix', () => {
  it('builds a header from record keys in order of first appearance', () => {
    expect(toMatrix([{ a: 1, b: 'x' }, { b: 'y', c: true }])).toEqual([
      ['a', 'b', 'c'],
      [1, 'x', null],
      [null, 'y', true],
    ]);
  });

  it('copies rows of cells', () => {
    const rows = [['h'], ['v']];
    const matrix = toMatrix(rows);
    expect(matrix).toEqual(rows);
    expect(matrix[0]).not.toBe(rows[0]);
  });
});

describe('formatCell', () => {
  it('renders empty cells as empty strings', () => {
    expect(formatCell(null)).toBe('');
    expect(formatCell(undefined)).toBe('');
  });

  it('renders dates as ISO strings', () => {
    expect(formatCell(new Date(Date.UTC(2026, 0, 2)))).toBe('2026-01-02T00:00:00.000Z');
  });
});

describe('encodeDelimited', () => {
  it('encodes CSV with quoting', () => {
    const csv = encodeDelimited([
      ['name', 'qty'],
      ['apple', 3],
      ['pear, green', null],
      ['say "hi"', 1],
    ]);
    expect(csv).toBe('name,qty\napple,3\n"pear, green",\n"say ""hi""",1\n');
  });

  it('encodes records', () => {
    expect(encodeDelimited([{ a: 1, b: 'x' }, { b: 'y', c: true }])).toBe(
      'a,b,c\n1,x,\n,y,true\n'
    );
  });

  it('encodes TSV', () => {
    expect(encodeDelimited([['a', 'b c'], ['1', 'x\ty']], '\t')).toBe('a\tb c\n1\t"x\ty"\n');
  });
});
