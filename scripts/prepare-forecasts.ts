/* eslint-disable no-console */
/**
 * Summarize raw posterior draws into API-ready forecasts and publish them.
 *
 * Usage:
 *   npm run prepare-forecasts -- --draws data/raw/draws.ndjson --metadata data/raw/grid.json \
 *     --output data/sample --overwrite
 *
 * Without --output the records go to the configured backend (DATA_BACKEND).
 * Any data or validation error aborts the run with a non-zero exit before
 * anything is published.
 */

import { config as loadEnv } from 'dotenv';
loadEnv();

import { Command, Option } from 'commander';
import { z } from 'zod';
import { loadConfig } from '../server/config';
import { readGridMetadata, readRawDraws } from '../server/preparation/raw-draw-source';
import { runPreparation } from '../server/preparation/preparation-pipeline';
import { IngestionModeSchema, exitWithError, resolveOutputBackend } from './cli-support';

const OptionsSchema = z.object({
  draws: z.string(),
  metadata: z.string().optional(),
  output: z.string().optional(),
  mode: IngestionModeSchema,
  overwrite: z.boolean(),
});

const program = new Command()
  .name('prepare-forecasts')
  .description('Summarize raw fatality draws into the 13 published forecast metrics')
  .requiredOption('--draws <file>', 'NDJSON file of {grid_id, month, draws} lines')
  .option('--metadata <file>', 'JSON array of grid cell metadata')
  .option('--output <dir>', 'parquet directory to publish to (default: configured backend)')
  .addOption(
    new Option('--mode <mode>', 'ingestion mode').choices(['replace', 'append']).default('replace')
  )
  .option('--overwrite', 'replace a destination that already holds data', false);

async function main(): Promise<void> {
  program.parse(process.argv);
  const options = OptionsSchema.parse(program.opts());
  const config = loadConfig();

  const metadata = options.metadata ? await readGridMetadata(options.metadata) : undefined;
  const backend = resolveOutputBackend(config, options.output);
  try {
    console.log(`[prepare] Reading draws from ${options.draws}`);
    const result = await runPreparation(readRawDraws(options.draws), backend, {
      mode: options.mode,
      overwrite: options.overwrite,
      metadata,
    });
    console.log(
      `[prepare] Done: ${result.records} records, ${result.gridCells} grid cells, ${result.months} months`
    );
  } finally {
    await backend.close?.();
  }
}

main().catch((err) => exitWithError('prepare', err));
