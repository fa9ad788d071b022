/**
 * Forecast Types
 *
 * The 13 published forecast metrics and the record shapes shared by the
 * query API, the storage backends and the preparation pipeline.
 */

// ============================================================================
// Metric schema
// ============================================================================

/** Published metric names, in canonical output order. */
export const METRIC_NAMES = [
  'map',
  'ci_50_low',
  'ci_50_high',
  'ci_90_low',
  'ci_90_high',
  'ci_99_low',
  'ci_99_high',
  'prob_0',
  'prob_1',
  'prob_10',
  'prob_100',
  'prob_1000',
  'prob_10000',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export function isMetricName(value: string): value is MetricName {
  return (METRIC_NAMES as readonly string[]).includes(value);
}

/** Confidence levels with their published bound names. */
export const CONFIDENCE_INTERVALS = [
  { level: 0.5, low: 'ci_50_low', high: 'ci_50_high' },
  { level: 0.9, low: 'ci_90_low', high: 'ci_90_high' },
  { level: 0.99, low: 'ci_99_low', high: 'ci_99_high' },
] as const satisfies ReadonlyArray<{ level: number; low: MetricName; high: MetricName }>;

/** Fatality thresholds with their exceedance-probability metric. */
export const PROBABILITY_THRESHOLDS = [
  { threshold: 0, metric: 'prob_0' },
  { threshold: 1, metric: 'prob_1' },
  { threshold: 10, metric: 'prob_10' },
  { threshold: 100, metric: 'prob_100' },
  { threshold: 1000, metric: 'prob_1000' },
  { threshold: 10000, metric: 'prob_10000' },
] as const satisfies ReadonlyArray<{ threshold: number; metric: MetricName }>;

export type MetricKind = 'point' | 'interval_bound' | 'probability';

export function metricKind(name: MetricName): MetricKind {
  if (name === 'map') return 'point';
  return name.startsWith('prob_') ? 'probability' : 'interval_bound';
}

/** All 13 metrics, as stored in a published snapshot. */
export type ForecastMetrics = Record<MetricName, number>;

/** A projected subset of metrics, as returned by a query. */
export type ProjectedMetrics = Partial<ForecastMetrics>;

// ============================================================================
// Records
// ============================================================================

/**
 * One grid cell, one month. `(grid_id, month)` is unique within a snapshot.
 */
export interface ForecastRecord<M extends ProjectedMetrics = ForecastMetrics> {
  grid_id: number;
  latitude: number;
  longitude: number;
  /** UN M49 numeric code, zero-padded to 3 digits */
  country_id: string | null;
  admin_1_id: string | null;
  admin_2_id: string | null;
  /** YYYY-MM */
  month: string;
  metrics: M;
}

export type ProjectedForecastRecord = ForecastRecord<ProjectedMetrics>;

/** Posterior fatality-count draws for one grid cell and month. */
export interface RawDrawSet {
  grid_id: number;
  month: string;
  draws: readonly number[];
}

/** Static attributes of a grid cell, joined onto summarized metrics. */
export interface GridCellMetadata {
  grid_id: number;
  latitude: number;
  longitude: number;
  country_id: string | null;
  admin_1_id: string | null;
  admin_2_id: string | null;
}

export interface MonthMetadata {
  month: string;
  forecast_count: number;
  countries: string[];
}

export interface ForecastSummary {
  count: number;
  countries: string[];
  months: string[];
  grid_cells: number;
  metrics_summary: {
    avg_map: number;
    min_map: number;
    max_map: number;
  };
}

export type OutputFormat = 'json' | 'ndjson';

export type IngestionMode = 'replace' | 'append';

/** Flatten a record into the column layout used by parquet and SQL storage. */
export type ForecastRow = Omit<ForecastRecord, 'metrics'> & ForecastMetrics;

export function recordToRow(record: ForecastRecord): ForecastRow {
  const { metrics, ...rest } = record;
  return { ...rest, ...metrics };
}

export function rowToRecord(row: ForecastRow): ForecastRecord {
  const { grid_id, latitude, longitude, country_id, admin_1_id, admin_2_id, month, ...metrics } =
    row;
  return { grid_id, latitude, longitude, country_id, admin_1_id, admin_2_id, month, metrics };
}

/**
 * Normalize a country identifier to a zero-padded UN M49 code.
 * Numeric inputs (including "404.0" from float columns) are padded to three
 * digits; anything else is returned trimmed so validation can report it.
 */
export function normalizeCountryId(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value).replace(/\.0+$/, '').padStart(3, '0');
  }
  const text = String(value).trim().replace(/\.0+$/, '');
  if (text === '') return null;
  return /^\d+$/.test(text) ? text.padStart(3, '0') : text;
}

/** Stable identity of a record within a snapshot. */
export function recordKey(record: { grid_id: number; month: string }): string {
  return `${record.grid_id}::${record.month}`;
}

/** Ascending `(grid_id, month)` order. */
export function compareRecords(
  a: { grid_id: number; month: string },
  b: { grid_id: number; month: string }
): number {
  if (a.grid_id !== b.grid_id) return a.grid_id - b.grid_id;
  if (a.month === b.month) return 0;
  return a.month < b.month ? -1 : 1;
}
