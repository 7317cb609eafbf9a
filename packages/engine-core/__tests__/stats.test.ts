import { describe, expect, it } from 'vitest';
import { firstQuartile, mean, minimum, percentile, upperMedian } from '../src/stats.js';

describe('mean', () => {
  it('averages values', () => {
    expect(mean([1, 2, 3, 6])).toBe(3);
  });

  it('returns 0 for empty list', () => {
    expect(mean([])).toBe(0);
  });
});

describe('minimum', () => {
  it('finds the lowest score', () => {
    expect(minimum([7, -2, 4])).toBe(-2);
  });

  it('returns 0 for empty list', () => {
    expect(minimum([])).toBe(0);
  });
});

describe('upperMedian', () => {
  it('takes the middle of an odd list', () => {
    expect(upperMedian([9, 1, 5])).toBe(5);
  });

  it('takes the upper middle of an even list', () => {
    expect(upperMedian([4, 1, 3, 2])).toBe(3);
  });
});

describe('percentile', () => {
  it('lands exactly on an element', () => {
    expect(percentile([10, 20, 30, 40, 50], 0.25)).toBe(20);
  });

  it('interpolates between closest ranks', () => {
    expect(percentile([1, 2, 3, 4], 0.25)).toBe(1.75);
  });

  it('sorts before interpolating', () => {
    expect(percentile([40, 10, 30, 20], 0.25)).toBe(17.5);
  });

  it('returns the bounds at 0 and 1', () => {
    expect(percentile([3, 1, 2], 0)).toBe(1);
    expect(percentile([3, 1, 2], 1)).toBe(3);
  });

  it('does not mutate input', () => {
    const values = [3, 1, 2];
    percentile(values, 0.5);
    expect(values).toEqual([3, 1, 2]);
  });
});

describe('firstQuartile', () => {
  it('single value is its own quartile', () => {
    expect(firstQuartile([7])).toBe(7);
  });

  it('two values: a quarter of the way up', () => {
    expect(firstQuartile([100, 200])).toBe(125);
  });

  it('returns 0 for empty list', () => {
    expect(firstQuartile([])).toBe(0);
  });
});
