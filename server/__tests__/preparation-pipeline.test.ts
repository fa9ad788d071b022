import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { GridCellMetadata } from '@shared/forecast-types';
import { DataError, SchemaError } from '../errors';
import { ParquetBackend } from '../backends/parquet-backend';
import {
  OutputExistsError,
  loadSourceForecasts,
  prepareForecasts,
  publishForecasts,
  runPreparation,
} from '../preparation/preparation-pipeline';
import {
  type RawDrawLine,
  parseRawDrawLine,
  readGridMetadata,
  readRawDraws,
} from '../preparation/raw-draw-source';
import { generateSampleDraws, seededRandom } from '../preparation/sample-draws';
import { InMemoryBackend, makeRecord } from './helpers/forecast-fixtures';

const DRAWS = [0, 0, 1, 2, 5, 10, 50, 200];

const cell: GridCellMetadata = {
  grid_id: 7,
  latitude: 10.25,
  longitude: 40.75,
  country_id: '231',
  admin_1_id: 'ET-AF',
  admin_2_id: null,
};

function metadataFor(...cells: GridCellMetadata[]): Map<number, GridCellMetadata> {
  return new Map(cells.map((c) => [c.grid_id, c]));
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

describe('preparation pipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('prepareForecasts', () => {
    it('should summarize draws and join grid metadata', async () => {
      const records = await prepareForecasts(
        [{ grid_id: 7, month: '2025-08', draws: DRAWS }],
        metadataFor(cell)
      );

      expect(records).toHaveLength(1);
      const [record] = records;
      expect(record.grid_id).toBe(7);
      expect(record.latitude).toBe(10.25);
      expect(record.country_id).toBe('231');
      expect(record.admin_1_id).toBe('ET-AF');
      expect(record.month).toBe('2025-08');
      expect(record.metrics.map).toBe(0);
      expect(record.metrics.ci_50_low).toBeCloseTo(0.75);
      expect(record.metrics.ci_50_high).toBeCloseTo(20);
      expect(record.metrics.prob_0).toBe(1);
      expect(record.metrics.prob_1).toBe(0.75);
      expect(record.metrics.prob_10).toBe(0.375);
      expect(record.metrics.prob_100).toBe(0.125);
      expect(record.metrics.prob_1000).toBe(0);
    });

    it('should fall back to coordinates carried on the draw line', async () => {
      const [record] = await prepareForecasts([
        { grid_id: 3, month: '2025-09', draws: [1, 1, 2], latitude: 1.5, longitude: 2.5, country_id: '004' },
      ]);
      expect(record.latitude).toBe(1.5);
      expect(record.longitude).toBe(2.5);
      expect(record.country_id).toBe('004');
      expect(record.admin_1_id).toBeNull();
    });

    it('should reject an input with no draw sets', async () => {
      await expect(prepareForecasts([], metadataFor(cell))).rejects.toThrow(
        'No draw sets found in the input'
      );
    });

    it('should reject a cell without coordinates', async () => {
      await expect(
        prepareForecasts([{ grid_id: 99, month: '2025-08', draws: [1] }], metadataFor(cell))
      ).rejects.toThrow(DataError);
    });

    it('should reject an empty draw set naming the cell', async () => {
      await expect(
        prepareForecasts([{ grid_id: 7, month: '2025-08', draws: [] }], metadataFor(cell))
      ).rejects.toThrow('Draw set is empty (grid_id=7, month=2025-08)');
    });

    it('should reject negative draws', async () => {
      await expect(
        prepareForecasts([{ grid_id: 7, month: '2025-08', draws: [1, -2] }], metadataFor(cell))
      ).rejects.toThrow(DataError);
    });

    it('should report schema violations for the summarized batch', async () => {
      const lines: RawDrawLine[] = [
        { grid_id: 7, month: '2025-08', draws: [1] },
        { grid_id: 7, month: '2025-08', draws: [2] },
      ];
      const error = await prepareForecasts(lines, metadataFor(cell)).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(SchemaError);
      if (error instanceof SchemaError) {
        expect(error.violations.map((v) => v.field)).toEqual(['grid_id,month']);
      }
    });
  });

  describe('publishForecasts', () => {
    it('should replace an empty destination', async () => {
      const backend = new InMemoryBackend();
      const result = await publishForecasts(
        backend,
        [makeRecord({ grid_id: 1 }), makeRecord({ grid_id: 2 }), makeRecord({ grid_id: 2, month: '2025-09' })],
        { mode: 'replace', overwrite: false }
      );
      expect(result).toEqual({ records: 3, gridCells: 2, months: 2 });
      expect(backend.records).toHaveLength(3);
    });

    it('should refuse to replace existing data without overwrite', async () => {
      const backend = new InMemoryBackend([makeRecord({ grid_id: 1 })]);
      await expect(
        publishForecasts(backend, [makeRecord({ grid_id: 2 })], { mode: 'replace', overwrite: false })
      ).rejects.toThrow(OutputExistsError);
      expect(backend.records.map((r) => r.grid_id)).toEqual([1]);
    });

    it('should replace existing data with overwrite', async () => {
      const backend = new InMemoryBackend([makeRecord({ grid_id: 1 })]);
      await publishForecasts(backend, [makeRecord({ grid_id: 2 })], { mode: 'replace', overwrite: true });
      expect(backend.records.map((r) => r.grid_id)).toEqual([2]);
    });

    it('should append without checking existing data', async () => {
      const backend = new InMemoryBackend([makeRecord({ grid_id: 1 })]);
      const loadAll = vi.spyOn(backend, 'loadAll');
      await publishForecasts(backend, [makeRecord({ grid_id: 2 })], { mode: 'append', overwrite: false });
      expect(backend.records.map((r) => r.grid_id)).toEqual([1, 2]);
      expect(loadAll).not.toHaveBeenCalled();
    });
  });

  describe('loadSourceForecasts', () => {
    it('should fail on a missing source directory and leave the target intact', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const missing = path.join(os.tmpdir(), `forecast-missing-${process.pid}-${Date.now()}`);
      const source = new ParquetBackend(missing, { maxRetries: 0, baseDelayMs: 0, timeoutMs: 5_000 });
      const target = new InMemoryBackend([makeRecord({ grid_id: 1 }), makeRecord({ grid_id: 2 })]);

      const error = await loadSourceForecasts(source).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DataError);
      expect(error).toHaveProperty('message', `No forecast records found in ${source.id}`);
      expect(target.records.map((r) => r.grid_id)).toEqual([1, 2]);
    });

    it('should return the validated source records', async () => {
      const source = new InMemoryBackend([makeRecord({ grid_id: 4 })]);
      const records = await loadSourceForecasts(source);
      expect(records.map((r) => r.grid_id)).toEqual([4]);
    });

    it('should reject invalid source records', async () => {
      const source = new InMemoryBackend([makeRecord({ metrics: { prob_1: 1.5 } })]);
      await expect(loadSourceForecasts(source)).rejects.toBeInstanceOf(SchemaError);
    });
  });

  describe('runPreparation', () => {
    it('should publish nothing when one draw set is malformed', async () => {
      const backend = new InMemoryBackend();
      const replaceAll = vi.spyOn(backend, 'replaceAll');
      await expect(
        runPreparation(
          [
            { grid_id: 7, month: '2025-08', draws: DRAWS },
            { grid_id: 7, month: '2025-09', draws: [] },
          ],
          backend,
          { mode: 'replace', overwrite: true, metadata: metadataFor(cell) }
        )
      ).rejects.toThrow(DataError);
      expect(replaceAll).not.toHaveBeenCalled();
    });

    it('should publish a valid batch', async () => {
      const backend = new InMemoryBackend();
      const result = await runPreparation(
        [
          { grid_id: 7, month: '2025-08', draws: DRAWS },
          { grid_id: 7, month: '2025-09', draws: [0, 3] },
        ],
        backend,
        { mode: 'replace', overwrite: false, metadata: metadataFor(cell) }
      );
      expect(result).toEqual({ records: 2, gridCells: 1, months: 2 });
      expect(backend.records.map((r) => r.month)).toEqual(['2025-08', '2025-09']);
    });
  });
});

describe('raw draw source', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'forecast-draws-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should stream NDJSON lines and skip blanks', async () => {
    const file = path.join(dir, 'draws.ndjson');
    await fs.writeFile(
      file,
      '{"grid_id":1,"month":"2025-08","draws":[0,1]}\n\n{"grid_id":2,"month":"2025-08","draws":[3],"country_id":706}\n'
    );

    const lines = await collect(readRawDraws(file));
    expect(lines.map((l) => l.grid_id)).toEqual([1, 2]);
    expect(lines[1].country_id).toBe('706');
  });

  it('should name the file and line of invalid JSON', async () => {
    const file = path.join(dir, 'broken.ndjson');
    await fs.writeFile(file, '{"grid_id":1,"month":"2025-08","draws":[0]}\nnot json\n');
    await expect(collect(readRawDraws(file))).rejects.toThrow(`${file}:2 is not valid JSON`);
  });

  it('should reject a line missing draws', () => {
    expect(() => parseRawDrawLine('{"grid_id":1,"month":"2025-08"}', 4, 'input')).toThrow(
      /^input:4 draws: /
    );
  });

  it('should read grid metadata keyed by grid id', async () => {
    const file = path.join(dir, 'cells.json');
    await fs.writeFile(
      file,
      JSON.stringify([
        { grid_id: 5, latitude: 1, longitude: 2, country_id: 4, admin_1_id: null },
        { grid_id: 6, latitude: 3, longitude: 4, country_id: '706.0', admin_1_id: 12, admin_2_id: 'x' },
      ])
    );

    const metadata = await readGridMetadata(file);
    expect(metadata.get(5)).toEqual({
      grid_id: 5,
      latitude: 1,
      longitude: 2,
      country_id: '004',
      admin_1_id: null,
      admin_2_id: null,
    });
    expect(metadata.get(6)?.country_id).toBe('706');
    expect(metadata.get(6)?.admin_1_id).toBe('12');
  });
});

describe('sample draws', () => {
  it('should be deterministic for a seed', () => {
    const options = { months: ['2025-08', '2025-09'], drawsPerSet: 20, seed: 42 };
    const first = [...generateSampleDraws([cell], options)];
    const second = [...generateSampleDraws([cell], options)];
    expect(first).toEqual(second);
    expect(first.map((l) => l.month)).toEqual(['2025-08', '2025-09']);
    for (const line of first) {
      expect(line.draws).toHaveLength(20);
      expect(line.draws.every((d) => Number.isInteger(d) && d >= 0)).toBe(true);
    }
  });

  it('should produce floats in [0, 1)', () => {
    const random = seededRandom(7);
    for (let i = 0; i < 100; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
