import { describe, it, expect } from 'vitest';
import { boxStats, describe as describeValues, histogram, mean, quantileSorted } from '../statistics';

describe('describe', () => {
  it('computes count, mean, sample std and quartiles', () => {
    const stats = describeValues([4, 1, 3, 2]);
    expect(stats.count).toBe(4);
    expect(stats.mean).toBe(2.5);
    expect(stats.std).toBeCloseTo(1.2909944, 6);
    expect(stats.min).toBe(1);
    expect(stats.q25).toBe(1.75);
    expect(stats.q50).toBe(2.5);
    expect(stats.q75).toBe(3.25);
    expect(stats.max).toBe(4);
  });

  it('leaves std empty for a single value', () => {
    expect(describeValues([5]).std).toBeNull();
  });

  it('returns nulls when there are no values', () => {
    expect(describeValues([])).toEqual({
      count: 0,
      mean: null,
      std: null,
      min: null,
      q25: null,
      q50: null,
      q75: null,
      max: null,
    });
  });
});

describe('quantileSorted', () => {
  it('interpolates between ranks', () => {
    expect(quantileSorted([10, 20, 30], 0.25)).toBe(15);
    expect(quantileSorted([7], 0.9)).toBe(7);
    expect(quantileSorted([], 0.5)).toBeNaN();
  });
});

describe('mean', () => {
  it('is NaN for no values', () => {
    expect(mean([])).toBeNaN();
    expect(mean([5, 7])).toBe(6);
  });
});

describe('boxStats', () => {
  it('stops whiskers inside 1.5 IQR and lists outliers', () => {
    expect(boxStats([100, 1, 2, 3, 4])).toEqual({ min: 1, q1: 2, median: 3, q3: 4, max: 4, outliers: [100] });
  });
});

describe('histogram', () => {
  it('uses Sturges bins and counts the maximum in the last bin', () => {
    const bins = histogram([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(bins).toHaveLength(5);
    expect(bins[4].end).toBe(10);
    expect(bins.reduce((sum, b) => sum + b.count, 0)).toBe(10);
  });

  it('puts identical values in one bin', () => {
    expect(histogram([2, 2, 2])).toEqual([{ start: 1.5, end: 2.5, count: 3 }]);
    expect(histogram([])).toEqual([]);
  });
});
