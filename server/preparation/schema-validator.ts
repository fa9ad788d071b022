/**
 * Schema Validator
 *
 * Final gate before publication: checks every record of a batch and reports
 * every violation at once. A batch with any violation is rejected whole.
 */

import { z } from 'zod';
import {
  CONFIDENCE_INTERVALS,
  type ForecastRecord,
  type MetricName,
  metricKind,
  recordKey,
} from '@shared/forecast-types';
import { isValidMonth } from '@shared/month-utils';
import { SchemaError, type SchemaViolation } from '../errors';

function metricSchema(name: MetricName) {
  const base = z.number({ required_error: 'is required' }).finite('must be finite');
  return metricKind(name) === 'probability'
    ? base.min(0, 'must be within [0, 1]').max(1, 'must be within [0, 1]')
    : base.min(0, 'must be >= 0');
}

const MetricsSchema = z
  .object({
    map: metricSchema('map'),
    ci_50_low: metricSchema('ci_50_low'),
    ci_50_high: metricSchema('ci_50_high'),
    ci_90_low: metricSchema('ci_90_low'),
    ci_90_high: metricSchema('ci_90_high'),
    ci_99_low: metricSchema('ci_99_low'),
    ci_99_high: metricSchema('ci_99_high'),
    prob_0: metricSchema('prob_0'),
    prob_1: metricSchema('prob_1'),
    prob_10: metricSchema('prob_10'),
    prob_100: metricSchema('prob_100'),
    prob_1000: metricSchema('prob_1000'),
    prob_10000: metricSchema('prob_10000'),
  } satisfies Record<MetricName, z.ZodTypeAny>)
  .superRefine((metrics, ctx) => {
    for (const { low, high } of CONFIDENCE_INTERVALS) {
      if (metrics[low] > metrics[high]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [low],
          message: `must be <= ${high} (${metrics[low]} > ${metrics[high]})`,
        });
      }
    }
  });

const nullableText = z.string().nullable();

export const ForecastRecordSchema = z.object({
  grid_id: z.number({ required_error: 'is required' }).int('must be an integer'),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  country_id: z
    .string()
    .regex(/^\d{3}$/, 'must be a zero-padded 3-digit UN M49 code')
    .nullable(),
  admin_1_id: nullableText,
  admin_2_id: nullableText,
  month: z.string().refine(isValidMonth, 'must be YYYY-MM'),
  metrics: MetricsSchema,
});

function identify(raw: unknown): { grid_id: number | null; month: string | null } {
  if (typeof raw !== 'object' || raw === null) return { grid_id: null, month: null };
  const gridId = 'grid_id' in raw && typeof raw.grid_id === 'number' ? raw.grid_id : null;
  const month = 'month' in raw && typeof raw.month === 'string' ? raw.month : null;
  return { grid_id: gridId, month };
}

/** Every violation in `records`; empty when the batch is publishable. */
export function collectViolations(records: readonly unknown[]): SchemaViolation[] {
  const violations: SchemaViolation[] = [];
  const firstIndexByKey = new Map<string, number>();

  records.forEach((raw, index) => {
    const { grid_id, month } = identify(raw);
    const result = ForecastRecordSchema.safeParse(raw);
    if (!result.success) {
      for (const issue of result.error.errors) {
        violations.push({
          index,
          grid_id,
          month,
          field: issue.path.join('.') || '(record)',
          message: issue.message,
        });
      }
    }

    if (grid_id !== null && month !== null) {
      const key = recordKey({ grid_id, month });
      const first = firstIndexByKey.get(key);
      if (first === undefined) {
        firstIndexByKey.set(key, index);
      } else {
        violations.push({
          index,
          grid_id,
          month,
          field: 'grid_id,month',
          message: `duplicates record #${first}`,
        });
      }
    }
  });

  return violations;
}

/**
 * @throws SchemaError listing every violation when any record is invalid
 */
export function validateForecastBatch(records: readonly unknown[]): ForecastRecord[] {
  const violations = collectViolations(records);
  if (violations.length > 0) throw new SchemaError(violations);
  return records.map((raw) => ForecastRecordSchema.parse(raw));
}
