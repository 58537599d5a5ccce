import { describe, it, expect } from 'vitest';
import { effectiveMaximum, scaleValue } from '../../src/chart/scale.js';

const entries = (values: number[]) => values.map((value, i) => ({ label: String(i), value }));

describe('effectiveMaximum', () => {
  it('derives the maximum from the data', () => {
    expect(effectiveMaximum(entries([3, 9, 4]))).toBe(9);
  });

  it('prefers an explicit maximum', () => {
    expect(effectiveMaximum(entries([3, 9, 4]), 20)).toBe(20);
  });

  it('coerces non-positive maxima to 1', () => {
    expect(effectiveMaximum(entries([1]), 0)).toBe(1);
    expect(effectiveMaximum(entries([1]), -5)).toBe(1);
    expect(effectiveMaximum(entries([-3, -1]))).toBe(1);
    expect(effectiveMaximum(entries([0, 0]))).toBe(1);
  });

  it('finds the maximum of very large datasets', () => {
    const values = Array.from({ length: 200_000 }, (_, i) => i % 1000);
    expect(effectiveMaximum(entries(values))).toBe(999);
  });

  it('coerces NaN to 1', () => {
    expect(effectiveMaximum(entries([1]), Number.NaN)).toBe(1);
  });
});

describe('scaleValue', () => {
  it('rounds down', () => {
    expect(scaleValue(1, 4, 13)).toBe(3);
    expect(scaleValue(2, 4, 13)).toBe(6);
    expect(scaleValue(4, 4, 13)).toBe(13);
  });

  it('draws nothing for zero and negative values', () => {
    expect(scaleValue(0, 4, 13)).toBe(0);
    expect(scaleValue(-2, 4, 13)).toBe(0);
  });

  it('does not clamp values above the maximum', () => {
    expect(scaleValue(8, 4, 10)).toBe(20);
  });

  it('treats non-finite results as zero', () => {
    expect(scaleValue(Number.NaN, 4, 10)).toBe(0);
    expect(scaleValue(Number.POSITIVE_INFINITY, 4, 10)).toBe(0);
  });

  it('is non-decreasing in the value', () => {
    const extents = Array.from({ length: 41 }, (_, i) => scaleValue(i * 0.25, 10, 17));
    for (let i = 1; i < extents.length; i++) {
      expect(extents[i]).toBeGreaterThanOrEqual(extents[i - 1]);
    }
  });
});
