/**
 * Calendar month helpers for `YYYY-MM` strings.
 *
 * Months are compared lexicographically; the zero-padded format makes that
 * equal to calendar order.
 */

const MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

export interface YearMonth {
  year: number;
  month: number;
}

/** Parse `YYYY-MM`; returns null for anything else (including month 13). */
export function parseMonth(value: string): YearMonth | null {
  const match = MONTH_PATTERN.exec(value);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;
  return { year, month };
}

export function isValidMonth(value: string): boolean {
  return parseMonth(value) !== null;
}

export function formatMonth({ year, month }: YearMonth): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

export function nextMonth({ year, month }: YearMonth): YearMonth {
  return month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 };
}

/**
 * Every month from `start` to `end`, both inclusive, in calendar order.
 * Returns an empty array when `end` precedes `start`; callers decide whether
 * that is an error.
 */
export function expandMonthRange(start: YearMonth, end: YearMonth): string[] {
  const months: string[] = [];
  let current = start;
  const last = formatMonth(end);
  while (formatMonth(current) <= last) {
    months.push(formatMonth(current));
    current = nextMonth(current);
  }
  return months;
}
