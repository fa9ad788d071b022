/* eslint-disable no-console */
/**
 * Bulk-load API-ready parquet forecasts into the configured backend.
 *
 * Usage:
 *   npm run load-forecasts -- --input data/api_ready
 *   npm run load-forecasts -- --s3-bucket forecasts-bucket --s3-prefix api_ready/ --mode append
 *
 * Country ids are normalized to zero-padded UN M49 codes while decoding, and
 * the batch is validated before anything is written. A source with no
 * records fails the run and leaves the target untouched.
 */

import { config as loadEnv } from 'dotenv';
loadEnv();

import { S3Client } from '@aws-sdk/client-s3';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { createBackend } from '../server/backends/backend-factory';
import type { ForecastBackend } from '../server/backends/forecast-backend';
import { ObjectStorageBackend } from '../server/backends/object-storage-backend';
import { ParquetBackend } from '../server/backends/parquet-backend';
import { type AppConfig, loadConfig } from '../server/config';
import { loadSourceForecasts, publishForecasts } from '../server/preparation/preparation-pipeline';
import { IngestionModeSchema, exitWithError } from './cli-support';

const OptionsSchema = z
  .object({
    input: z.string().optional(),
    s3Bucket: z.string().optional(),
    s3Prefix: z.string().optional(),
    s3Key: z.string().optional(),
    mode: IngestionModeSchema,
    skipIfExists: z.boolean(),
  })
  .refine((opts) => Boolean(opts.input) !== Boolean(opts.s3Bucket), {
    message: 'Pass exactly one of --input or --s3-bucket',
  });

type LoadOptions = z.infer<typeof OptionsSchema>;

const program = new Command()
  .name('load-forecasts')
  .description('Load API-ready parquet forecasts into the configured backend')
  .option('--input <dir>', 'directory of parquet files')
  .option('--s3-bucket <bucket>', 'read parquet objects from this bucket')
  .option('--s3-prefix <prefix>', 'prefix to list under --s3-bucket', 'api_ready/')
  .option('--s3-key <key>', 'single object to read instead of listing a prefix')
  .addOption(
    new Option('--mode <mode>', 'ingestion mode').choices(['replace', 'append']).default('replace')
  )
  .option('--skip-if-exists', 'do nothing when the target already holds data', false);

function sourceBackend(config: AppConfig, options: LoadOptions): ForecastBackend {
  if (options.s3Bucket) {
    const { region, accessKeyId, secretAccessKey } = config.cloud;
    const client = new S3Client({
      region,
      ...(accessKeyId && secretAccessKey ? { credentials: { accessKeyId, secretAccessKey } } : {}),
    });
    return new ObjectStorageBackend(
      client,
      { bucket: options.s3Bucket, prefix: options.s3Prefix, key: options.s3Key },
      config.retry
    );
  }
  return new ParquetBackend(options.input ?? '.', config.retry);
}

async function main(): Promise<void> {
  program.parse(process.argv);
  const options = OptionsSchema.parse(program.opts());
  const config = loadConfig();

  const target = createBackend(config);
  try {
    if (options.skipIfExists && (await target.loadAll()).length > 0) {
      console.log(`[load] ${target.id} already holds data; skipping (--skip-if-exists)`);
      return;
    }

    const source = sourceBackend(config, options);
    console.log(`[load] Reading from ${source.id}`);
    const records = await loadSourceForecasts(source);
    console.log(`[load] ${records.length} records validated`);

    await publishForecasts(target, records, { mode: options.mode, overwrite: true });
  } finally {
    await target.close?.();
  }
}

main().catch((err) => exitWithError('load', err));
