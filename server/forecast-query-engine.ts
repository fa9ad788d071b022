/**
 * Forecast Query Engine
 *
 * Answers queries against the cached snapshot of one backend. Predicates run
 * in a fixed order (grid ids, country, months, metric thresholds) against
 * full metric values; projection to the requested metrics comes last, so a
 * threshold may reference a metric the caller did not ask to see.
 */

import {
  type ForecastRecord,
  type ForecastSummary,
  type GridCellMetadata,
  type MonthMetadata,
  type ProjectedForecastRecord,
  type ProjectedMetrics,
  compareRecords,
} from '@shared/forecast-types';
import type { ForecastBackend } from './backends/forecast-backend';
import { admittedMonths, matchesThreshold, type QuerySpec } from './forecast-query';
import type { CacheEntry, Snapshot, SnapshotCache } from './snapshot-cache';

/** Filters shared by /forecasts and /forecasts/summary. */
export type RecordFilter = Pick<QuerySpec, 'country' | 'gridIds' | 'months' | 'monthRange'> &
  Partial<Pick<QuerySpec, 'thresholds'>>;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function uniqueSorted(values: Iterable<string | null>): string[] {
  const set = new Set<string>();
  for (const value of values) if (value !== null) set.add(value);
  return [...set].sort();
}

export function projectRecord(
  record: Readonly<ForecastRecord>,
  metrics: QuerySpec['metrics']
): ProjectedForecastRecord {
  const projected: ProjectedMetrics = {};
  for (const name of metrics) projected[name] = record.metrics[name];
  return { ...record, metrics: projected };
}

export function filterRecords(
  records: Snapshot,
  filter: RecordFilter
): Array<Readonly<ForecastRecord>> {
  const gridIds = filter.gridIds ? new Set(filter.gridIds) : undefined;
  const months = admittedMonths({ months: filter.months, monthRange: filter.monthRange });
  const thresholds = filter.thresholds ?? [];

  return records.filter(
    (record) =>
      (gridIds === undefined || gridIds.has(record.grid_id)) &&
      (filter.country === undefined || record.country_id === filter.country) &&
      (months === undefined || months.has(record.month)) &&
      thresholds.every((predicate) => matchesThreshold(record.metrics[predicate.metric], predicate))
  );
}

export class ForecastQueryEngine {
  constructor(
    private readonly backend: ForecastBackend,
    private readonly cache: SnapshotCache
  ) {}

  get backendId(): string {
    return this.backend.id;
  }

  /** Current snapshot, loaded through the cache; records are in (grid_id, month) order. */
  async snapshot(): Promise<CacheEntry> {
    return this.cache.getOrLoad(this.backend.id, async () => {
      const records = await this.backend.loadAll();
      return records.sort(compareRecords);
    });
  }

  async execute(spec: QuerySpec): Promise<ProjectedForecastRecord[]> {
    const { records } = await this.snapshot();
    return filterRecords(records, spec)
      .sort(compareRecords)
      .map((record) => projectRecord(record, spec.metrics));
  }

  async summarize(filter: RecordFilter): Promise<ForecastSummary> {
    const { records } = await this.snapshot();
    const matched = filterRecords(records, filter);

    if (matched.length === 0) {
      return {
        count: 0,
        countries: [],
        months: [],
        grid_cells: 0,
        metrics_summary: { avg_map: 0, min_map: 0, max_map: 0 },
      };
    }

    let sum = 0;
    let min = Infinity;
    let max = -Infinity;
    for (const record of matched) {
      const value = record.metrics.map;
      sum += value;
      if (value < min) min = value;
      if (value > max) max = value;
    }

    return {
      count: matched.length,
      countries: uniqueSorted(matched.map((r) => r.country_id)),
      months: uniqueSorted(matched.map((r) => r.month)),
      grid_cells: new Set(matched.map((r) => r.grid_id)).size,
      metrics_summary: {
        avg_map: round2(sum / matched.length),
        min_map: round2(min),
        max_map: round2(max),
      },
    };
  }

  async listMonths(): Promise<MonthMetadata[]> {
    const { records } = await this.snapshot();
    const byMonth = new Map<string, { count: number; countries: Set<string> }>();
    for (const record of records) {
      let bucket = byMonth.get(record.month);
      if (!bucket) {
        bucket = { count: 0, countries: new Set() };
        byMonth.set(record.month, bucket);
      }
      bucket.count++;
      if (record.country_id !== null) bucket.countries.add(record.country_id);
    }
    return [...byMonth.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([month, bucket]) => ({
        month,
        forecast_count: bucket.count,
        countries: [...bucket.countries].sort(),
      }));
  }

  /** Unique grid cells in grid_id order, optionally for one country. */
  async listGridCells(country?: string): Promise<GridCellMetadata[]> {
    const { records } = await this.snapshot();
    const cells = new Map<number, GridCellMetadata>();
    for (const record of records) {
      if (country !== undefined && record.country_id !== country) continue;
      if (cells.has(record.grid_id)) continue;
      const { grid_id, latitude, longitude, country_id, admin_1_id, admin_2_id } = record;
      cells.set(grid_id, { grid_id, latitude, longitude, country_id, admin_1_id, admin_2_id });
    }
    return [...cells.values()].sort((a, b) => a.grid_id - b.grid_id);
  }

  async listCountries(): Promise<string[]> {
    const { records } = await this.snapshot();
    return uniqueSorted(records.map((r) => r.country_id));
  }
}
