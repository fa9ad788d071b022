/**
 * Raw Draw Summarizer
 *
 * Reduces posterior fatality-count draws for one grid cell and month to the
 * 13 published metrics.
 */

import {
  CONFIDENCE_INTERVALS,
  type ForecastMetrics,
  PROBABILITY_THRESHOLDS,
  type RawDrawSet,
} from '@shared/forecast-types';
import { DataError } from '../errors';

/**
 * Most frequent value; ties go to the smallest value.
 * Expects `sorted` in ascending order.
 */
export function modeOfSorted(sorted: readonly number[]): number {
  let best = sorted[0];
  let bestCount = 0;
  let runStart = 0;
  for (let i = 1; i <= sorted.length; i++) {
    if (i === sorted.length || sorted[i] !== sorted[runStart]) {
      const count = i - runStart;
      // Strict > keeps the earlier (smaller) value on ties.
      if (count > bestCount) {
        best = sorted[runStart];
        bestCount = count;
      }
      runStart = i;
    }
  }
  return best;
}

/** Empirical quantile with linear interpolation at h = (n - 1) * p. */
export function quantileOfSorted(sorted: readonly number[], p: number): number {
  const h = (sorted.length - 1) * p;
  const lower = Math.floor(h);
  const upper = Math.min(lower + 1, sorted.length - 1);
  return sorted[lower] + (h - lower) * (sorted[upper] - sorted[lower]);
}

/** Fraction of draws at or above `threshold`, at 32-bit float precision. */
export function exceedanceOfSorted(sorted: readonly number[], threshold: number): number {
  // First index whose value is >= threshold.
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < threshold) lo = mid + 1;
    else hi = mid;
  }
  return Math.fround((sorted.length - lo) / sorted.length);
}

/**
 * @throws DataError when the set is empty or holds a value that is not a
 *   finite, non-negative integer
 */
export function summarizeDraws(set: RawDrawSet): ForecastMetrics {
  const context = { gridId: set.grid_id, month: set.month };
  if (set.draws.length === 0) {
    throw new DataError('Draw set is empty', context);
  }
  for (const [index, value] of set.draws.entries()) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new DataError(
        `Draw #${index} is ${String(value)}; draws must be finite non-negative integers`,
        context
      );
    }
  }

  const sorted = [...set.draws].sort((a, b) => a - b);
  const metrics: ForecastMetrics = {
    map: modeOfSorted(sorted),
    ci_50_low: 0,
    ci_50_high: 0,
    ci_90_low: 0,
    ci_90_high: 0,
    ci_99_low: 0,
    ci_99_high: 0,
    prob_0: 0,
    prob_1: 0,
    prob_10: 0,
    prob_100: 0,
    prob_1000: 0,
    prob_10000: 0,
  };

  for (const { level, low, high } of CONFIDENCE_INTERVALS) {
    const tail = (1 - level) / 2;
    metrics[low] = quantileOfSorted(sorted, tail);
    metrics[high] = Math.max(metrics[low], quantileOfSorted(sorted, 1 - tail));
  }
  for (const { threshold, metric } of PROBABILITY_THRESHOLDS) {
    metrics[metric] = exceedanceOfSorted(sorted, threshold);
  }
  return metrics;
}
