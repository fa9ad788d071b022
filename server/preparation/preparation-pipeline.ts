/**
 * Preparation Pipeline
 *
 * raw draws -> summarize -> join grid metadata -> validate -> publish.
 * Nothing is published unless the whole batch summarizes and validates.
 */

import type {
  ForecastRecord,
  GridCellMetadata,
  IngestionMode,
  RawDrawSet,
} from '@shared/forecast-types';
import type { ForecastBackend } from '../backends/forecast-backend';
import { DataError } from '../errors';
import { log } from '../logger';
import { summarizeDraws } from './draw-summarizer';
import { type RawDrawLine, toDrawSet } from './raw-draw-source';
import { validateForecastBatch } from './schema-validator';

/** Destination already holds data and overwriting was not allowed. */
export class OutputExistsError extends Error {
  constructor(backendId: string) {
    super(`${backendId} already holds forecast data; pass --overwrite to replace it`);
    this.name = 'OutputExistsError';
  }
}

export interface PublishOptions {
  mode: IngestionMode;
  /** Allow `replace` over a destination that already holds data */
  overwrite: boolean;
}

export interface PreparationResult {
  records: number;
  gridCells: number;
  months: number;
}

/** Resolve a cell's static attributes: metadata file first, then the draw line. */
function resolveCell(
  line: RawDrawLine,
  metadata: ReadonlyMap<number, GridCellMetadata> | undefined
): GridCellMetadata {
  const known = metadata?.get(line.grid_id);
  const latitude = known?.latitude ?? line.latitude;
  const longitude = known?.longitude ?? line.longitude;
  if (latitude === undefined || longitude === undefined) {
    throw new DataError('No coordinates for grid cell in metadata or draw input', {
      gridId: line.grid_id,
      month: line.month,
    });
  }
  return {
    grid_id: line.grid_id,
    latitude,
    longitude,
    country_id: known?.country_id ?? line.country_id ?? null,
    admin_1_id: known?.admin_1_id ?? line.admin_1_id ?? null,
    admin_2_id: known?.admin_2_id ?? line.admin_2_id ?? null,
  };
}

export function buildRecord(set: RawDrawSet, cell: GridCellMetadata): ForecastRecord {
  return { ...cell, month: set.month, metrics: summarizeDraws(set) };
}

/**
 * Summarize and validate a batch of draw lines.
 *
 * @throws DataError on the first malformed draw set (the batch is abandoned)
 *   or when there are no draw sets at all
 * @throws SchemaError listing every violation in the summarized batch
 */
export async function prepareForecasts(
  lines: AsyncIterable<RawDrawLine> | Iterable<RawDrawLine>,
  metadata?: ReadonlyMap<number, GridCellMetadata>
): Promise<ForecastRecord[]> {
  const records: ForecastRecord[] = [];
  for await (const line of lines) {
    records.push(buildRecord(toDrawSet(line), resolveCell(line, metadata)));
  }
  if (records.length === 0) {
    throw new DataError('No draw sets found in the input');
  }
  return validateForecastBatch(records);
}

/**
 * Read an API-ready snapshot from `source` for loading elsewhere.
 *
 * @throws DataError when the source holds no records, so a mistyped path or
 *   an empty prefix can never replace the target with nothing
 * @throws SchemaError listing every violation in the source records
 */
export async function loadSourceForecasts(source: ForecastBackend): Promise<ForecastRecord[]> {
  const records = await source.loadAll();
  if (records.length === 0) {
    throw new DataError(`No forecast records found in ${source.id}`);
  }
  return validateForecastBatch(records);
}

export async function publishForecasts(
  backend: ForecastBackend,
  records: readonly ForecastRecord[],
  options: PublishOptions
): Promise<PreparationResult> {
  if (options.mode === 'replace') {
    if (!options.overwrite && (await backend.loadAll()).length > 0) {
      throw new OutputExistsError(backend.id);
    }
    await backend.replaceAll(records);
  } else {
    await backend.appendAll(records);
  }

  const result: PreparationResult = {
    records: records.length,
    gridCells: new Set(records.map((r) => r.grid_id)).size,
    months: new Set(records.map((r) => r.month)).size,
  };
  log(
    `Published ${result.records} records (${result.gridCells} grid cells, ${result.months} months) to ${backend.id} [${options.mode}]`,
    'prepare'
  );
  return result;
}

export async function runPreparation(
  lines: AsyncIterable<RawDrawLine> | Iterable<RawDrawLine>,
  backend: ForecastBackend,
  options: PublishOptions & { metadata?: ReadonlyMap<number, GridCellMetadata> }
): Promise<PreparationResult> {
  const records = await prepareForecasts(lines, options.metadata);
  return publishForecasts(backend, records, options);
}
