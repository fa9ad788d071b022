import { describe, it, expect } from 'vitest';
import {
  expandMonthRange,
  formatMonth,
  isValidMonth,
  nextMonth,
  parseMonth,
} from '../month-utils';

describe('month-utils', () => {
  describe('parseMonth', () => {
    it('should parse YYYY-MM', () => {
      expect(parseMonth('2025-08')).toEqual({ year: 2025, month: 8 });
    });

    it('should reject out-of-range months and other shapes', () => {
      expect(parseMonth('2025-13')).toBeNull();
      expect(parseMonth('2025-00')).toBeNull();
      expect(parseMonth('2025-8')).toBeNull();
      expect(parseMonth('2025-08-01')).toBeNull();
      expect(parseMonth('')).toBeNull();
    });
  });

  it('isValidMonth should mirror parseMonth', () => {
    expect(isValidMonth('1999-12')).toBe(true);
    expect(isValidMonth('1999-1')).toBe(false);
  });

  it('formatMonth should zero-pad', () => {
    expect(formatMonth({ year: 2025, month: 3 })).toBe('2025-03');
  });

  it('nextMonth should roll over the year', () => {
    expect(nextMonth({ year: 2025, month: 12 })).toEqual({ year: 2026, month: 1 });
    expect(nextMonth({ year: 2025, month: 1 })).toEqual({ year: 2025, month: 2 });
  });

  describe('expandMonthRange', () => {
    it('should include both endpoints', () => {
      expect(expandMonthRange({ year: 2025, month: 8 }, { year: 2025, month: 10 })).toEqual([
        '2025-08',
        '2025-09',
        '2025-10',
      ]);
    });

    it('should cross year boundaries', () => {
      expect(expandMonthRange({ year: 2025, month: 11 }, { year: 2026, month: 2 })).toEqual([
        '2025-11',
        '2025-12',
        '2026-01',
        '2026-02',
      ]);
    });

    it('should return a single month when start equals end', () => {
      expect(expandMonthRange({ year: 2025, month: 8 }, { year: 2025, month: 8 })).toEqual([
        '2025-08',
      ]);
    });

    it('should return an empty array when end precedes start', () => {
      expect(expandMonthRange({ year: 2025, month: 9 }, { year: 2025, month: 8 })).toEqual([]);
    });
  });
});
