/**
 * Data Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import { normalizeData, parseChartData } from '../../src/chart/normalize.js';
import { ValidationError } from '../../src/errors/index.js';

describe('normalizeData', () => {
  it('keeps record iteration order', () => {
    const entries = normalizeData({ kind: 'record', values: { zeta: 2, alpha: 1 } });
    expect(entries).toEqual([
      { label: 'zeta', value: 2 },
      { label: 'alpha', value: 1 },
    ]);
  });

  it('accepts a Map in insertion order', () => {
    const values = new Map([['2', 5], ['1', 7]]);
    const entries = normalizeData({ kind: 'record', values });
    expect(entries.map(e => e.label)).toEqual(['2', '1']);
  });

  it('keeps duplicate labels from pairs', () => {
    const entries = normalizeData({ kind: 'pairs', pairs: [['x', 1], ['x', 2], ['y', 3]] });
    expect(entries).toEqual([
      { label: 'x', value: 1 },
      { label: 'x', value: 2 },
      { label: 'y', value: 3 },
    ]);
  });

  it('labels bare values by index', () => {
    const entries = normalizeData({ kind: 'values', values: [10, 20, 30] });
    expect(entries).toEqual([
      { label: '0', value: 10, decimals: true },
      { label: '1', value: 20, decimals: true },
      { label: '2', value: 30, decimals: true },
    ]);
  });

  it.each([
    ['record', { kind: 'record', values: {} }],
    ['pairs', { kind: 'pairs', pairs: [] }],
    ['values', { kind: 'values', values: [] }],
  ] as const)('rejects empty %s input', (_name, data) => {
    expect(() => normalizeData(data)).toThrow(ValidationError);
    expect(() => normalizeData(data)).toThrow('Data cannot be empty');
  });
});

describe('parseChartData', () => {
  it('maps an array of numbers to values', () => {
    expect(parseChartData([1, 2.5])).toEqual({ kind: 'values', values: [1, 2.5] });
  });

  it('maps tuples to pairs', () => {
    expect(parseChartData([['a', 1], ['b', 2]])).toEqual({
      kind: 'pairs',
      pairs: [['a', 1], ['b', 2]],
    });
  });

  it('maps label/value objects to pairs', () => {
    expect(parseChartData([{ label: 'a', value: 3 }, { label: 7, value: 4 }])).toEqual({
      kind: 'pairs',
      pairs: [['a', 3], ['7', 4]],
    });
  });

  it('maps an object of numbers to a record', () => {
    expect(parseChartData({ a: 1, b: 2 })).toEqual({ kind: 'record', values: { a: 1, b: 2 } });
  });

  it('accepts an empty array as empty values', () => {
    expect(parseChartData([])).toEqual({ kind: 'values', values: [] });
  });

  it.each([
    ['a string', 'hello'],
    ['null', null],
    ['mixed array', [1, 'two']],
    ['object with strings', { a: 'one' }],
  ])('rejects %s', (_name, input) => {
    expect(() => parseChartData(input)).toThrow(ValidationError);
  });
});
