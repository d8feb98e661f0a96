/**
 * Statistical utilities for data analysis
 */

import { BoxStats, NumericStats } from './types';

/**
 * Arithmetic mean; NaN for an empty array
 */
export function mean(values: number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Calculate mean and standard error from array
 */
export function meanAndSE(values: number[]): { mean: number; se: number; std: number } {
  const n = values.length;
  if (n === 0) return { mean: 0, se: 0, std: 0 };

  const m = mean(values);

  if (n === 1) return { mean: m, se: 0, std: 0 };

  const squaredDiffs = values.map(v => Math.pow(v - m, 2));
  const variance = squaredDiffs.reduce((a, b) => a + b, 0) / (n - 1);
  const std = Math.sqrt(variance);
  const se = std / Math.sqrt(n);

  return { mean: m, se, std };
}

/**
 * Quantile of pre-sorted values, linear interpolation between closest ranks
 */
export function quantileSorted(sorted: number[], q: number): number {
  const n = sorted.length;
  if (n === 0) return NaN;
  if (n === 1) return sorted[0];

  const pos = (n - 1) * q;
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  const weight = pos - lower;

  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

/**
 * count / mean / std / min / quartiles / max over the given values.
 * std is the sample standard deviation (n - 1), null below two values.
 */
export function describe(values: number[]): NumericStats {
  const n = values.length;
  if (n === 0) {
    return { count: 0, mean: null, std: null, min: null, q25: null, q50: null, q75: null, max: null };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const { mean: m, std } = meanAndSE(values);

  return {
    count: n,
    mean: m,
    std: n > 1 ? std : null,
    min: sorted[0],
    q25: quantileSorted(sorted, 0.25),
    q50: quantileSorted(sorted, 0.5),
    q75: quantileSorted(sorted, 0.75),
    max: sorted[n - 1],
  };
}

/**
 * Five-number summary for box plots. Whiskers stop at the most extreme
 * values inside 1.5 IQR; anything beyond is an outlier.
 */
export function boxStats(values: number[]): BoxStats {
  const sorted = [...values].sort((a, b) => a - b);
  const q1 = quantileSorted(sorted, 0.25);
  const median = quantileSorted(sorted, 0.5);
  const q3 = quantileSorted(sorted, 0.75);
  const iqr = q3 - q1;
  const lowerFence = q1 - 1.5 * iqr;
  const upperFence = q3 + 1.5 * iqr;

  const inside = sorted.filter(v => v >= lowerFence && v <= upperFence);
  const outliers = sorted.filter(v => v < lowerFence || v > upperFence);

  return {
    min: inside.length > 0 ? inside[0] : q1,
    q1,
    median,
    q3,
    max: inside.length > 0 ? inside[inside.length - 1] : q3,
    outliers,
  };
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

/**
 * Equal-width bins, bin count by Sturges' rule. The last bin is closed on
 * both ends so the maximum is counted.
 */
export function histogram(values: number[]): HistogramBin[] {
  const n = values.length;
  if (n === 0) return [];

  const min = Math.min(...values);
  const max = Math.max(...values);

  if (min === max) {
    return [{ start: min - 0.5, end: max + 0.5, count: n }];
  }

  const binCount = Math.ceil(Math.log2(n)) + 1;
  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    start: min + i * width,
    end: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));

  for (const v of values) {
    const idx = Math.min(Math.floor((v - min) / width), binCount - 1);
    bins[idx].count++;
  }

  return bins;
}
