/* eslint-disable no-console */
import { z } from 'zod';
import { createBackend } from '../server/backends/backend-factory';
import type { ForecastBackend } from '../server/backends/forecast-backend';
import { ParquetBackend } from '../server/backends/parquet-backend';
import type { AppConfig } from '../server/config';
import { SchemaError, isForecastApiError } from '../server/errors';

export const IngestionModeSchema = z.enum(['replace', 'append']);

/** Parquet directory when `output` is given, else the configured backend. */
export function resolveOutputBackend(config: AppConfig, output: string | undefined): ForecastBackend {
  return output ? new ParquetBackend(output, config.retry) : createBackend(config);
}

/** Print a failure the way an operator needs to see it and exit non-zero. */
export function exitWithError(tag: string, err: unknown): never {
  if (err instanceof SchemaError) {
    console.error(`[${tag}] ${err.violations.length} validation error(s):`);
    for (const v of err.violations) {
      console.error(
        `  #${v.index} grid_id=${v.grid_id ?? '?'} month=${v.month ?? '?'} ${v.field}: ${v.message}`
      );
    }
  } else if (isForecastApiError(err)) {
    console.error(`[${tag}] ${err.code}: ${err.message}`);
  } else {
    console.error(`[${tag}] Fatal error:`, err);
  }
  process.exit(1);
}
