/**
 * Forecast query parameters
 *
 * Turns the raw Express query object into a validated, immutable QuerySpec
 * (one Zod parse of the raw shape, then token validation). The first
 * problem found becomes an InvalidFilterError naming the offending token.
 */

import { z } from 'zod';
import {
  METRIC_NAMES,
  type MetricName,
  type OutputFormat,
  isMetricName,
  normalizeCountryId,
} from '@shared/forecast-types';
import { expandMonthRange, isValidMonth, parseMonth } from '@shared/month-utils';
import { InvalidFilterError } from './errors';

export const THRESHOLD_OPERATORS = ['>=', '<=', '==', '>', '<'] as const;
export type ThresholdOperator = (typeof THRESHOLD_OPERATORS)[number];

export interface ThresholdPredicate {
  metric: MetricName;
  op: ThresholdOperator;
  value: number;
  /** Token as supplied, echoed back in responses and errors */
  token: string;
}

export interface MonthRange {
  start: string;
  end: string;
}

export type QueryScope = 'filtered' | 'full-scan';

export interface QuerySpec {
  readonly country?: string;
  readonly gridIds?: readonly number[];
  readonly months?: readonly string[];
  readonly monthRange?: MonthRange;
  readonly metrics: readonly MetricName[];
  readonly thresholds: readonly ThresholdPredicate[];
  readonly format: OutputFormat;
  /** 'full-scan' when neither country nor grid ids narrow the query */
  readonly scope: QueryScope;
}

export interface QueryParseOptions {
  allowFullScan: boolean;
}

// ============================================================================
// Token parsers
// ============================================================================

const THRESHOLD_PATTERN = /^([a-z0-9_]+)\s*(>=|<=|==|>|<)\s*(\S.*)$/;
const NUMBER_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

function isThresholdOperator(value: string): value is ThresholdOperator {
  return (THRESHOLD_OPERATORS as readonly string[]).includes(value);
}

/** Parse `<metric><op><number>`, e.g. `prob_100>=0.5`. */
export function parseThreshold(token: string): ThresholdPredicate {
  const trimmed = token.trim();
  const match = THRESHOLD_PATTERN.exec(trimmed);
  if (!match) {
    throw new InvalidFilterError(
      `Malformed metric filter "${token}"; expected <metric><op><number> with op one of ${THRESHOLD_OPERATORS.join(' ')}`,
      token
    );
  }
  const [, metric, op, operand] = match;
  if (!isMetricName(metric)) {
    throw new InvalidFilterError(`Unknown metric "${metric}" in filter "${token}"`, token);
  }
  if (!isThresholdOperator(op)) {
    throw new InvalidFilterError(`Unknown operator "${op}" in filter "${token}"`, token);
  }
  const operandText = operand.trim();
  const value = Number(operandText);
  if (!NUMBER_PATTERN.test(operandText) || !Number.isFinite(value)) {
    throw new InvalidFilterError(`Operand "${operandText}" in filter "${token}" is not a number`, token);
  }
  return { metric, op, value, token };
}

export function matchesThreshold(actual: number, predicate: ThresholdPredicate): boolean {
  switch (predicate.op) {
    case '>':
      return actual > predicate.value;
    case '>=':
      return actual >= predicate.value;
    case '<':
      return actual < predicate.value;
    case '<=':
      return actual <= predicate.value;
    case '==':
      return actual === predicate.value;
  }
}

/** Parse `YYYY-MM:YYYY-MM` (inclusive) into its endpoints. */
export function parseMonthRange(token: string): MonthRange {
  const parts = token.split(':');
  const start = parts[0]?.trim() ?? '';
  const end = parts[1]?.trim() ?? '';
  if (parts.length !== 2 || !isValidMonth(start) || !isValidMonth(end)) {
    throw new InvalidFilterError(`Malformed month_range "${token}"; expected YYYY-MM:YYYY-MM`, token);
  }
  if (end < start) {
    throw new InvalidFilterError(`month_range "${token}" ends before it starts`, token);
  }
  return { start, end };
}

export function expandRange(range: MonthRange): string[] {
  const start = parseMonth(range.start);
  const end = parseMonth(range.end);
  return start && end ? expandMonthRange(start, end) : [];
}

// ============================================================================
// Zod schema
// ============================================================================

/** Repeated params arrive as arrays; wrap single values so both look alike. */
const stringList = z.preprocess(
  (val) => (val === undefined ? [] : Array.isArray(val) ? val : [val]),
  z.array(z.string({ invalid_type_error: 'must be a plain string value' }))
);

/** Repeated and/or comma-separated values, flattened and trimmed. */
const csvList = stringList.transform((values) =>
  values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value !== '')
);

const RawQuerySchema = z.object({
  country: z.string({ invalid_type_error: 'must be a single value' }).optional(),
  grid_ids: csvList,
  months: csvList,
  month_range: z.string({ invalid_type_error: 'must be a single value' }).optional(),
  metrics: csvList,
  metric_filters: stringList,
  format: z.string({ invalid_type_error: 'must be a single value' }).optional(),
});

type RawQuery = z.infer<typeof RawQuerySchema>;

function buildQuerySpec(raw: RawQuery, options: QueryParseOptions): QuerySpec {
  let country: string | undefined;
  if (raw.country !== undefined && raw.country.trim() !== '') {
    const normalized = normalizeCountryId(raw.country);
    if (normalized === null || !/^\d{3}$/.test(normalized)) {
      throw new InvalidFilterError(
        `country must be a numeric UN M49 code, got "${raw.country}"`,
        raw.country
      );
    }
    country = normalized;
  }

  let gridIds: number[] | undefined;
  if (raw.grid_ids.length > 0) {
    const ids = new Set<number>();
    for (const token of raw.grid_ids) {
      if (!/^-?\d+$/.test(token) || !Number.isSafeInteger(Number(token))) {
        throw new InvalidFilterError(`grid_ids entry "${token}" is not an integer`, token);
      }
      ids.add(Number(token));
    }
    gridIds = [...ids].sort((a, b) => a - b);
  }

  let months: string[] | undefined;
  if (raw.months.length > 0) {
    for (const token of raw.months) {
      if (!isValidMonth(token)) {
        throw new InvalidFilterError(`months entry "${token}" is not a YYYY-MM month`, token);
      }
    }
    months = [...new Set(raw.months)].sort();
  }

  const monthRange =
    raw.month_range !== undefined && raw.month_range.trim() !== ''
      ? parseMonthRange(raw.month_range)
      : undefined;

  const requested = new Set<MetricName>();
  for (const token of raw.metrics) {
    if (!isMetricName(token)) {
      throw new InvalidFilterError(
        `Unknown metric "${token}"; expected one of ${METRIC_NAMES.join(', ')}`,
        token
      );
    }
    requested.add(token);
  }
  const metrics =
    requested.size === 0 ? [...METRIC_NAMES] : METRIC_NAMES.filter((name) => requested.has(name));

  const thresholds = raw.metric_filters
    .filter((token) => token.trim() !== '')
    .map(parseThreshold);

  const format = raw.format?.trim().toLowerCase() || 'json';
  if (format !== 'json' && format !== 'ndjson') {
    throw new InvalidFilterError(`format must be "json" or "ndjson", got "${raw.format}"`, raw.format);
  }

  const scope: QueryScope = country !== undefined || gridIds !== undefined ? 'filtered' : 'full-scan';
  if (scope === 'full-scan' && !options.allowFullScan) {
    throw new InvalidFilterError(
      'Full scans are disabled; narrow the query with country or grid_ids'
    );
  }

  return Object.freeze({ country, gridIds, months, monthRange, metrics, thresholds, format, scope });
}

/**
 * Validate raw query parameters. Unknown parameters are ignored.
 *
 * @throws InvalidFilterError for the first malformed or contradictory value
 */
export function parseQuerySpec(query: unknown, options: QueryParseOptions): QuerySpec {
  const result = RawQuerySchema.safeParse(query ?? {});
  if (!result.success) {
    const issue = result.error.errors[0];
    const param = issue?.path[0];
    throw new InvalidFilterError(
      `Invalid query parameter${param !== undefined ? ` "${String(param)}"` : ''}: ${issue?.message ?? 'malformed'}`,
      param !== undefined ? String(param) : undefined
    );
  }
  return buildQuerySpec(result.data, options);
}

/** Months a spec admits, or undefined when it places no month constraint. */
export function admittedMonths(
  spec: Pick<QuerySpec, 'months' | 'monthRange'>
): Set<string> | undefined {
  if (spec.months === undefined && spec.monthRange === undefined) return undefined;
  const months = new Set(spec.months ?? []);
  if (spec.monthRange) {
    for (const month of expandRange(spec.monthRange)) months.add(month);
  }
  return months;
}

/** JSON echo of a spec, returned as `query` in aggregate responses. */
export function describeQuery(spec: QuerySpec) {
  return {
    country: spec.country ?? null,
    grid_ids: spec.gridIds ?? null,
    months: spec.months ?? null,
    month_range: spec.monthRange ? `${spec.monthRange.start}:${spec.monthRange.end}` : null,
    metrics: spec.metrics,
    metric_filters: spec.thresholds.map((t) => t.token),
    format: spec.format,
    scope: spec.scope,
  };
}

export type QueryEcho = ReturnType<typeof describeQuery>;
