import { describe, it, expect, beforeEach } from 'vitest';
import { ForecastQueryEngine } from '../forecast-query-engine';
import { parseQuerySpec } from '../forecast-query';
import { SnapshotCache } from '../snapshot-cache';
import { InMemoryBackend, makeRecord } from './helpers/forecast-fixtures';

const allow = { allowFullScan: true };

function seedRecords() {
  return [
    makeRecord({ grid_id: 3, country_id: '404', month: '2025-08', metrics: { map: 7, prob_100: 0.6 } }),
    makeRecord({ grid_id: 1, country_id: '706', month: '2025-09', metrics: { map: 2, prob_100: 0.2 } }),
    makeRecord({ grid_id: 1, country_id: '706', month: '2025-08', metrics: { map: 4, prob_100: 0.7 } }),
    makeRecord({ grid_id: 2, country_id: '706', month: '2025-10', metrics: { map: 0, prob_100: 0 } }),
    makeRecord({ grid_id: 2, country_id: '706', month: '2025-11', metrics: { map: 9, prob_100: 0.9 } }),
    makeRecord({ grid_id: 4, country_id: null, month: '2025-08', metrics: { map: 1 } }),
  ];
}

describe('ForecastQueryEngine', () => {
  let backend: InMemoryBackend;
  let engine: ForecastQueryEngine;

  beforeEach(() => {
    backend = new InMemoryBackend(seedRecords());
    engine = new ForecastQueryEngine(backend, new SnapshotCache({ ttlMs: 60_000, maxEntries: 4 }));
  });

  describe('execute', () => {
    it('should return grid ids 1 and 2 with only the map metric', async () => {
      const result = await engine.execute(parseQuerySpec({ grid_ids: '1,2', metrics: 'map' }, allow));

      expect(result.map((r) => [r.grid_id, r.month])).toEqual([
        [1, '2025-08'],
        [1, '2025-09'],
        [2, '2025-10'],
        [2, '2025-11'],
      ]);
      for (const record of result) {
        expect(Object.keys(record.metrics)).toEqual(['map']);
      }
      expect(result[0]).toEqual({
        grid_id: 1,
        latitude: 2.25,
        longitude: 45.25,
        country_id: '706',
        admin_1_id: null,
        admin_2_id: null,
        month: '2025-08',
        metrics: { map: 4 },
      });
    });

    it('should expand an inclusive month range', async () => {
      const result = await engine.execute(
        parseQuerySpec({ month_range: '2025-08:2025-10' }, allow)
      );
      expect(result.map((r) => r.month).sort()).toEqual([
        '2025-08',
        '2025-08',
        '2025-08',
        '2025-09',
        '2025-10',
      ]);
    });

    it('should admit the union of explicit months and the range', async () => {
      const result = await engine.execute(
        parseQuerySpec({ months: '2025-11', month_range: '2025-09:2025-09' }, allow)
      );
      expect(result.map((r) => [r.grid_id, r.month])).toEqual([
        [1, '2025-09'],
        [2, '2025-11'],
      ]);
    });

    it('should filter by country', async () => {
      const result = await engine.execute(parseQuerySpec({ country: '404' }, allow));
      expect(result.map((r) => r.grid_id)).toEqual([3]);
    });

    it('should apply thresholds to metrics that are projected away', async () => {
      const result = await engine.execute(
        parseQuerySpec({ metrics: 'map', metric_filters: 'prob_100>=0.6' }, allow)
      );
      expect(result.map((r) => [r.grid_id, r.month, r.metrics])).toEqual([
        [1, '2025-08', { map: 4 }],
        [2, '2025-11', { map: 9 }],
        [3, '2025-08', { map: 7 }],
      ]);
    });

    it('should AND multiple thresholds', async () => {
      const result = await engine.execute(
        parseQuerySpec({ metric_filters: ['prob_100>=0.6', 'map<8'] }, allow)
      );
      expect(result.map((r) => r.grid_id)).toEqual([1, 3]);
    });

    it('should return an empty array when nothing matches', async () => {
      expect(await engine.execute(parseQuerySpec({ grid_ids: '99' }, allow))).toEqual([]);
    });

    it('should return an empty array for an empty snapshot', async () => {
      backend.records = [];
      expect(await engine.execute(parseQuerySpec({}, allow))).toEqual([]);
    });

    it('should be deterministic across calls', async () => {
      const spec = parseQuerySpec({ country: '706', metric_filters: 'map>0' }, allow);
      const first = await engine.execute(spec);
      const second = await engine.execute(spec);
      expect(second).toEqual(first);
      expect(backend.loadCalls).toBe(1);
    });

    it('should not mutate the cached snapshot when projecting', async () => {
      await engine.execute(parseQuerySpec({ metrics: 'map' }, allow));
      const full = await engine.execute(parseQuerySpec({}, allow));
      expect(Object.keys(full[0].metrics)).toHaveLength(13);
    });
  });

  describe('summarize', () => {
    it('should summarize the filtered records', async () => {
      const summary = await engine.summarize({ country: '706' });
      expect(summary).toEqual({
        count: 4,
        countries: ['706'],
        months: ['2025-08', '2025-09', '2025-10', '2025-11'],
        grid_cells: 2,
        metrics_summary: { avg_map: 3.75, min_map: 0, max_map: 9 },
      });
    });

    it('should round the average to two decimals', async () => {
      backend.records = [
        makeRecord({ grid_id: 1, metrics: { map: 1 } }),
        makeRecord({ grid_id: 2, metrics: { map: 1 } }),
        makeRecord({ grid_id: 3, metrics: { map: 2 } }),
      ];
      const summary = await engine.summarize({});
      expect(summary.metrics_summary.avg_map).toBe(1.33);
    });

    it('should return zeros when nothing matches', async () => {
      expect(await engine.summarize({ gridIds: [99] })).toEqual({
        count: 0,
        countries: [],
        months: [],
        grid_cells: 0,
        metrics_summary: { avg_map: 0, min_map: 0, max_map: 0 },
      });
    });
  });

  describe('metadata', () => {
    it('should list months with counts and countries', async () => {
      expect(await engine.listMonths()).toEqual([
        { month: '2025-08', forecast_count: 3, countries: ['404', '706'] },
        { month: '2025-09', forecast_count: 1, countries: ['706'] },
        { month: '2025-10', forecast_count: 1, countries: ['706'] },
        { month: '2025-11', forecast_count: 1, countries: ['706'] },
      ]);
    });

    it('should list unique grid cells in grid id order', async () => {
      const cells = await engine.listGridCells();
      expect(cells.map((c) => c.grid_id)).toEqual([1, 2, 3, 4]);
      expect(cells[0]).toEqual({
        grid_id: 1,
        latitude: 2.25,
        longitude: 45.25,
        country_id: '706',
        admin_1_id: null,
        admin_2_id: null,
      });
      expect((await engine.listGridCells('404')).map((c) => c.grid_id)).toEqual([3]);
    });

    it('should list countries without nulls', async () => {
      expect(await engine.listCountries()).toEqual(['404', '706']);
    });
  });
});
