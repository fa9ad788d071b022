import { describe, it, expect } from 'vitest';
import {
  exceedanceOfSorted,
  modeOfSorted,
  quantileOfSorted,
  summarizeDraws,
} from '../preparation/draw-summarizer';
import { DataError } from '../errors';

describe('draw-summarizer', () => {
  describe('summarizeDraws', () => {
    const draws = [0, 0, 1, 2, 5, 10, 50, 200];

    it('should take interval bounds from interpolated quantiles', () => {
      const metrics = summarizeDraws({ grid_id: 1, month: '2025-08', draws });

      // 90%: positions 7 * 0.05 = 0.35 and 7 * 0.95 = 6.65
      expect(metrics.ci_90_low).toBe(0);
      expect(metrics.ci_90_high).toBeCloseTo(147.5, 9);
      // 50%: positions 1.75 and 5.25
      expect(metrics.ci_50_low).toBeCloseTo(0.75, 9);
      expect(metrics.ci_50_high).toBeCloseTo(20, 9);
      // 99%: positions 0.035 and 6.965
      expect(metrics.ci_99_low).toBe(0);
      expect(metrics.ci_99_high).toBeCloseTo(194.75, 9);
    });

    it('should report the fraction of draws at or above each threshold', () => {
      const metrics = summarizeDraws({ grid_id: 1, month: '2025-08', draws });

      expect(metrics.prob_0).toBe(1);
      expect(metrics.prob_1).toBe(0.75);
      // 10, 50 and 200 meet the threshold
      expect(metrics.prob_10).toBe(0.375);
      expect(metrics.prob_100).toBe(0.125);
      expect(metrics.prob_1000).toBe(0);
      expect(metrics.prob_10000).toBe(0);
    });

    it('should use the mode as the point estimate', () => {
      expect(summarizeDraws({ grid_id: 1, month: '2025-08', draws }).map).toBe(0);
      expect(summarizeDraws({ grid_id: 1, month: '2025-08', draws: [4, 7, 7, 9] }).map).toBe(7);
    });

    it('should round probabilities to 32-bit float precision', () => {
      const metrics = summarizeDraws({ grid_id: 1, month: '2025-08', draws: [0, 0, 1] });
      expect(metrics.prob_1).toBe(Math.fround(1 / 3));
    });

    it('should keep every interval ordered', () => {
      const metrics = summarizeDraws({ grid_id: 1, month: '2025-08', draws: [3, 3, 3] });
      expect(metrics.ci_50_low).toBe(3);
      expect(metrics.ci_50_high).toBe(3);
      expect(metrics.ci_99_low).toBeLessThanOrEqual(metrics.ci_99_high);
    });

    it('should reject an empty draw set', () => {
      expect(() => summarizeDraws({ grid_id: 5, month: '2025-08', draws: [] })).toThrow(
        'Draw set is empty (grid_id=5, month=2025-08)'
      );
    });

    it.each([[-1], [1.5], [Number.NaN], [Number.POSITIVE_INFINITY]])(
      'should reject the draw value %s',
      (bad) => {
        expect(() => summarizeDraws({ grid_id: 5, month: '2025-08', draws: [0, bad] })).toThrow(
          DataError
        );
      }
    );
  });

  describe('modeOfSorted', () => {
    it('should resolve ties to the smallest value', () => {
      expect(modeOfSorted([1, 1, 2, 3, 3])).toBe(1);
      expect(modeOfSorted([5])).toBe(5);
    });
  });

  describe('quantileOfSorted', () => {
    it('should interpolate between neighbouring ranks', () => {
      expect(quantileOfSorted([10, 20], 0.5)).toBe(15);
      expect(quantileOfSorted([10, 20, 30], 1)).toBe(30);
      expect(quantileOfSorted([10, 20, 30], 0)).toBe(10);
    });
  });

  describe('exceedanceOfSorted', () => {
    it('should count values equal to the threshold', () => {
      expect(exceedanceOfSorted([1, 10, 10, 11], 10)).toBe(0.75);
    });
  });
});
