/**
 * Parquet encoding of forecast snapshots.
 *
 * Shared by the parquet-directory backend and the object-storage backend,
 * which downloads parquet objects and decodes them from memory.
 */

import { ParquetReader, ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { z } from 'zod';
import {
  type ForecastRecord,
  normalizeCountryId,
  recordToRow,
  rowToRecord,
} from '@shared/forecast-types';

const DOUBLE = { type: 'DOUBLE' } as const;
const OPTIONAL_TEXT = { type: 'UTF8', optional: true } as const;

export const FORECAST_PARQUET_SCHEMA = new ParquetSchema({
  grid_id: { type: 'INT32' },
  latitude: DOUBLE,
  longitude: DOUBLE,
  country_id: OPTIONAL_TEXT,
  admin_1_id: OPTIONAL_TEXT,
  admin_2_id: OPTIONAL_TEXT,
  month: { type: 'UTF8' },
  map: DOUBLE,
  ci_50_low: DOUBLE,
  ci_50_high: DOUBLE,
  ci_90_low: DOUBLE,
  ci_90_high: DOUBLE,
  ci_99_low: DOUBLE,
  ci_99_high: DOUBLE,
  prob_0: DOUBLE,
  prob_1: DOUBLE,
  prob_10: DOUBLE,
  prob_100: DOUBLE,
  prob_1000: DOUBLE,
  prob_10000: DOUBLE,
});

// Files dropped in by other tools may use INT64 or FLOAT columns and
// numeric country codes; coerce them to the served shape.
const numeric = z.union([z.number(), z.bigint()]).transform(Number);
const optionalText = z
  .union([z.string(), z.number(), z.bigint()])
  .nullish()
  .transform((val) => (val === null || val === undefined ? null : String(val)));

const StoredRowSchema = z.object({
  grid_id: numeric,
  latitude: numeric,
  longitude: numeric,
  country_id: z.unknown().transform(normalizeCountryId),
  admin_1_id: optionalText,
  admin_2_id: optionalText,
  month: z.string(),
  map: numeric,
  ci_50_low: numeric,
  ci_50_high: numeric,
  ci_90_low: numeric,
  ci_90_high: numeric,
  ci_99_low: numeric,
  ci_99_high: numeric,
  prob_0: numeric,
  prob_1: numeric,
  prob_10: numeric,
  prob_100: numeric,
  prob_1000: numeric,
  prob_10000: numeric,
});

export class ParquetDecodeError extends Error {
  constructor(source: string, detail: string) {
    super(`Unable to decode forecast rows from ${source}: ${detail}`);
    this.name = 'ParquetDecodeError';
  }
}

export function decodeRow(raw: unknown, source: string): ForecastRecord {
  const result = StoredRowSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ParquetDecodeError(source, detail);
  }
  return rowToRecord(result.data);
}

async function readAll(reader: ParquetReader, source: string): Promise<ForecastRecord[]> {
  try {
    const cursor = reader.getCursor();
    const records: ForecastRecord[] = [];
    for (let row: unknown = await cursor.next(); row; row = await cursor.next()) {
      records.push(decodeRow(row, source));
    }
    return records;
  } finally {
    await reader.close();
  }
}

export async function readParquetFile(filePath: string): Promise<ForecastRecord[]> {
  const reader = await ParquetReader.openFile(filePath);
  return readAll(reader, filePath);
}

export async function decodeParquetBuffer(
  buffer: Buffer,
  source = 'buffer'
): Promise<ForecastRecord[]> {
  const reader = await ParquetReader.openBuffer(buffer);
  return readAll(reader, source);
}

/** Write records to `filePath`, replacing any existing file at that path. */
export async function writeParquetFile(
  filePath: string,
  records: readonly ForecastRecord[]
): Promise<void> {
  const writer = await ParquetWriter.openFile(FORECAST_PARQUET_SCHEMA, filePath);
  try {
    for (const record of records) {
      const { country_id, admin_1_id, admin_2_id, ...required } = recordToRow(record);
      // Optional columns are omitted rather than written as null.
      await writer.appendRow({
        ...required,
        ...(country_id !== null ? { country_id } : {}),
        ...(admin_1_id !== null ? { admin_1_id } : {}),
        ...(admin_2_id !== null ? { admin_2_id } : {}),
      });
    }
  } finally {
    await writer.close();
  }
}
