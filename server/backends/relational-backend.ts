/**
 * Relational Backend (PostgreSQL via Drizzle ORM)
 *
 * Records live in the `forecasts` table keyed by (grid_id, month).
 * replaceAll deletes and re-inserts inside a single transaction; under MVCC,
 * readers keep seeing the previous rows until the transaction commits, so a
 * half-repopulated table is never visible. DELETE is used instead of TRUNCATE
 * because TRUNCATE takes an ACCESS EXCLUSIVE lock that would block readers for
 * the whole load.
 *
 * Writes are bounded by `statement_timeout` inside the transaction rather than
 * by a client-side race, so a timed-out attempt has rolled back before any
 * retry starts. Only failures that guarantee a rollback are retried.
 */

import { sql } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { forecasts, type ForecastRowInsert, type ForecastRowSelect } from '@shared/forecast-schema';
import type { ForecastRecord } from '@shared/forecast-types';
import type { RetryPolicy } from '../config';
import { ForecastApiError } from '../errors';
import type { ForecastBackend } from './forecast-backend';
import { AttemptTimeoutError, withRetry } from './retry';

type Transaction = Parameters<Parameters<NodePgDatabase['transaction']>[0]>[0];

/** Rows per INSERT statement; 20 columns each keeps us far below the 65535 bind-parameter cap. */
const DEFAULT_INSERT_CHUNK_SIZE = 1_000;

// SQLSTATE classes worth retrying: connection exceptions, serialization
// failures and deadlocks, operator intervention (admin shutdown).
const TRANSIENT_SQLSTATE = /^(08|40001|40P01|57P0)/;
const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

export function isTransientDbError(err: unknown): boolean {
  if (err instanceof ForecastApiError) return false;
  if (err instanceof AttemptTimeoutError) return true;
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return TRANSIENT_SQLSTATE.test(err.code) || TRANSIENT_NODE_CODES.has(err.code);
  }
  // pg raises plain Errors for dropped connections ("Connection terminated ...").
  return err instanceof Error && /connection/i.test(err.message);
}

// A write is retried only when Postgres rolled it back (serialization
// failure, deadlock) or the connection was never established. A connection
// lost mid-transaction may have committed, so it is not retried.
const ROLLED_BACK_SQLSTATE = new Set(['40001', '40P01', '08001', '08004']);

export function isRetryableWriteError(err: unknown): boolean {
  if (err instanceof ForecastApiError) return false;
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return ROLLED_BACK_SQLSTATE.has(err.code) || err.code === 'ECONNREFUSED';
  }
  return false;
}

export function fromDbRow(row: ForecastRowSelect): ForecastRecord {
  return {
    grid_id: row.gridId,
    latitude: row.latitude,
    longitude: row.longitude,
    country_id: row.countryId,
    admin_1_id: row.admin1Id,
    admin_2_id: row.admin2Id,
    month: row.month,
    metrics: {
      map: row.map,
      ci_50_low: row.ci50Low,
      ci_50_high: row.ci50High,
      ci_90_low: row.ci90Low,
      ci_90_high: row.ci90High,
      ci_99_low: row.ci99Low,
      ci_99_high: row.ci99High,
      prob_0: row.prob0,
      prob_1: row.prob1,
      prob_10: row.prob10,
      prob_100: row.prob100,
      prob_1000: row.prob1000,
      prob_10000: row.prob10000,
    },
  };
}

export function toDbRow(record: ForecastRecord): ForecastRowInsert {
  const m = record.metrics;
  return {
    gridId: record.grid_id,
    month: record.month,
    latitude: record.latitude,
    longitude: record.longitude,
    countryId: record.country_id,
    admin1Id: record.admin_1_id,
    admin2Id: record.admin_2_id,
    map: m.map,
    ci50Low: m.ci_50_low,
    ci50High: m.ci_50_high,
    ci90Low: m.ci_90_low,
    ci90High: m.ci_90_high,
    ci99Low: m.ci_99_low,
    ci99High: m.ci_99_high,
    prob0: m.prob_0,
    prob1: m.prob_1,
    prob10: m.prob_10,
    prob100: m.prob_100,
    prob1000: m.prob_1000,
    prob10000: m.prob_10000,
  };
}

export interface RelationalBackendOptions {
  /** Cache identity; defaults to "database:forecasts" */
  id?: string;
  insertChunkSize?: number;
}

export class RelationalBackend implements ForecastBackend {
  readonly id: string;
  private readonly insertChunkSize: number;

  constructor(
    private readonly db: NodePgDatabase,
    private readonly retryPolicy: RetryPolicy,
    options: RelationalBackendOptions = {}
  ) {
    this.id = options.id ?? 'database:forecasts';
    this.insertChunkSize = options.insertChunkSize ?? DEFAULT_INSERT_CHUNK_SIZE;
  }

  async loadAll(): Promise<ForecastRecord[]> {
    return withRetry(
      async () => {
        const rows = await this.db.select().from(forecasts);
        return rows.map(fromDbRow);
      },
      this.retryOptions('loadAll')
    );
  }

  async replaceAll(records: readonly ForecastRecord[]): Promise<void> {
    await this.write('replaceAll', async (tx) => {
      await tx.delete(forecasts);
      await this.insertChunks(tx, records);
    });
  }

  async appendAll(records: readonly ForecastRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.write('appendAll', (tx) => this.insertChunks(tx, records));
  }

  private async write(operation: string, body: (tx: Transaction) => Promise<void>): Promise<void> {
    const timeoutMs = Math.max(1, Math.floor(this.retryPolicy.timeoutMs));
    await withRetry(
      () =>
        this.db.transaction(async (tx) => {
          await tx.execute(sql.raw(`SET LOCAL statement_timeout = ${timeoutMs}`));
          await body(tx);
        }),
      {
        ...this.retryOptions(operation),
        isRetryable: isRetryableWriteError,
        raceTimeout: false,
      }
    );
  }

  private async insertChunks(tx: Transaction, records: readonly ForecastRecord[]): Promise<void> {
    for (let start = 0; start < records.length; start += this.insertChunkSize) {
      const chunk = records.slice(start, start + this.insertChunkSize).map(toDbRow);
      await tx.insert(forecasts).values(chunk);
    }
  }

  private retryOptions(operation: string) {
    return {
      backendId: this.id,
      operation,
      policy: this.retryPolicy,
      isRetryable: isTransientDbError,
    };
  }
}
