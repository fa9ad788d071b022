/* eslint-disable no-console */
/**
 * Seed a parquet directory with synthetic forecasts.
 *
 * Draws are generated deterministically from --seed and run through the full
 * preparation pipeline, so the output is exactly what a real preparation run
 * would publish.
 *
 * Usage:
 *   npm run seed -- --output data/sample --overwrite
 */

import { config as loadEnv } from 'dotenv';
loadEnv();

import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { z } from 'zod';
import { formatMonth, nextMonth, parseMonth } from '@shared/month-utils';
import { ParquetBackend } from '../server/backends/parquet-backend';
import { loadConfig } from '../server/config';
import { runPreparation } from '../server/preparation/preparation-pipeline';
import { readGridMetadata } from '../server/preparation/raw-draw-source';
import { generateSampleDraws } from '../server/preparation/sample-draws';
import { exitWithError } from './cli-support';

const DEFAULT_CELLS = fileURLToPath(new URL('../data/seed/grid-cells.json', import.meta.url));

const OptionsSchema = z.object({
  output: z.string().optional(),
  cells: z.string(),
  startMonth: z.string().refine((m) => parseMonth(m) !== null, 'must be YYYY-MM'),
  months: z.coerce.number().int().min(1).max(120),
  draws: z.coerce.number().int().min(1).max(10_000),
  seed: z.coerce.number().int(),
  overwrite: z.boolean(),
});

const program = new Command()
  .name('seed-sample-forecasts')
  .description('Generate deterministic synthetic forecasts into a parquet directory')
  .option('--output <dir>', 'parquet directory (default: DATA_PATH)')
  .option('--cells <file>', 'grid cell metadata JSON', DEFAULT_CELLS)
  .option('--start-month <month>', 'first forecast month', '2025-08')
  .option('--months <n>', 'number of consecutive months', '6')
  .option('--draws <n>', 'draws per grid cell and month', '500')
  .option('--seed <n>', 'PRNG seed', '42')
  .option('--overwrite', 'replace existing data in the output directory', false);

async function main(): Promise<void> {
  program.parse(process.argv);
  const options = OptionsSchema.parse(program.opts());
  const config = loadConfig();

  const months: string[] = [];
  let current = parseMonth(options.startMonth);
  for (let i = 0; current && i < options.months; i++) {
    months.push(formatMonth(current));
    current = nextMonth(current);
  }

  const metadata = await readGridMetadata(options.cells);
  const output = options.output ?? config.dataPath;
  const lines = generateSampleDraws(metadata.values(), {
    months,
    drawsPerSet: options.draws,
    seed: options.seed,
  });

  const result = await runPreparation(lines, new ParquetBackend(output, config.retry), {
    mode: 'replace',
    overwrite: options.overwrite,
    metadata,
  });
  console.log(`[seed] Wrote ${result.records} records to ${output}`);
}

main().catch((err) => exitWithError('seed', err));
