/**
 * Readers for preparation inputs.
 *
 * Raw draws come as NDJSON, one `{grid_id, month, draws}` object per line;
 * a line may also carry the cell's coordinates and admin codes. Grid
 * metadata is a JSON array of `{grid_id, latitude, longitude, country_id,
 * admin_1_id, admin_2_id}`.
 */

import { createReadStream } from 'node:fs';
import fs from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import { type GridCellMetadata, type RawDrawSet, normalizeCountryId } from '@shared/forecast-types';
import { DataError } from '../errors';

const countryId = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((val) => normalizeCountryId(val));
const adminId = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((val) => (val === null || val === undefined ? null : String(val)));

const GridCellSchema = z.object({
  grid_id: z.number().int(),
  latitude: z.number(),
  longitude: z.number(),
  country_id: countryId,
  admin_1_id: adminId,
  admin_2_id: adminId,
});

export const RawDrawLineSchema = z.object({
  grid_id: z.number().int(),
  month: z.string(),
  // Value checks happen in the summarizer so errors name grid_id and month.
  draws: z.array(z.number()),
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  country_id: countryId.optional(),
  admin_1_id: adminId.optional(),
  admin_2_id: adminId.optional(),
});

export type RawDrawLine = z.infer<typeof RawDrawLineSchema>;

function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(line)'}: ${e.message}`).join('; ');
}

export function parseRawDrawLine(line: string, lineNumber: number, source: string): RawDrawLine {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (err) {
    throw new DataError(`${source}:${lineNumber} is not valid JSON (${String(err)})`);
  }
  const result = RawDrawLineSchema.safeParse(json);
  if (!result.success) {
    throw new DataError(`${source}:${lineNumber} ${describeIssues(result.error)}`);
  }
  return result.data;
}

/** Stream raw draw lines from an NDJSON file; blank lines are skipped. */
export async function* readRawDraws(filePath: string): AsyncGenerator<RawDrawLine> {
  const lines = createInterface({
    input: createReadStream(filePath, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });
  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      if (line.trim() === '') continue;
      yield parseRawDrawLine(line, lineNumber, filePath);
    }
  } finally {
    lines.close();
  }
}

export function toDrawSet(line: RawDrawLine): RawDrawSet {
  return { grid_id: line.grid_id, month: line.month, draws: line.draws };
}

export async function readGridMetadata(filePath: string): Promise<Map<number, GridCellMetadata>> {
  const json: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  const result = z.array(GridCellSchema).safeParse(json);
  if (!result.success) {
    throw new DataError(`${filePath}: ${describeIssues(result.error)}`);
  }
  return new Map(result.data.map((cell) => [cell.grid_id, cell]));
}
