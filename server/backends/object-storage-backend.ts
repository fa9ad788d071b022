/**
 * Object Storage Backend (S3)
 *
 * Reads parquet objects from a bucket, either one configured key or every
 * `*.parquet` object under a prefix, and decodes them with the shared parquet
 * codec. Under a prefix, publishing mirrors the parquet-directory backend:
 * new part objects are uploaded first, then a `_manifest.json` object naming
 * the live parts is overwritten (a single PUT is atomic), then unreferenced
 * parts are deleted.
 *
 * Every S3 call runs under a timeout with bounded retries; transient failures
 * that outlast the budget, and non-transient ones such as AccessDenied,
 * surface as BackendUnavailableError.
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3ServiceException,
  type S3Client,
} from '@aws-sdk/client-s3';
import { z } from 'zod';
import type { ForecastRecord } from '@shared/forecast-types';
import type { RetryPolicy } from '../config';
import { BackendUnavailableError, ForecastApiError, errorMessage } from '../errors';
import type { ForecastBackend } from './forecast-backend';
import { MANIFEST_FILE } from './parquet-backend';
import { decodeParquetBuffer, writeParquetFile } from './parquet-codec';
import { AttemptTimeoutError, withRetry } from './retry';

const PARQUET_CONTENT_TYPE = 'application/vnd.apache.parquet';

/** Full snapshot reads restarted because a listed part disappeared mid-read. */
const MAX_STALE_MANIFEST_RELOADS = 2;

const ManifestSchema = z.object({
  version: z.literal(1),
  parts: z.array(z.string().regex(/^[^/]+\.parquet$/)),
  updatedAt: z.string(),
});

export interface ObjectStorageLocation {
  bucket: string;
  /** Prefix holding parquet objects; ignored when `key` is set */
  prefix?: string;
  /** Single object to read instead of listing a prefix */
  key?: string;
}

export function normalizePrefix(prefix: string | undefined): string {
  const trimmed = (prefix ?? '').replace(/^\/+/, '');
  if (trimmed === '') return '';
  return trimmed.endsWith('/') ? trimmed : `${trimmed}/`;
}

export function isTransientS3Error(err: unknown): boolean {
  if (err instanceof ForecastApiError || err instanceof NoSuchKey) return false;
  if (err instanceof AttemptTimeoutError) return true;
  if (err instanceof S3ServiceException) {
    const status = err.$metadata.httpStatusCode;
    return status === undefined || status >= 500 || status === 429;
  }
  // Socket-level failures carry no HTTP status.
  return true;
}

export class ObjectStorageBackend implements ForecastBackend {
  readonly id: string;
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly key?: string;

  constructor(
    private readonly client: S3Client,
    location: ObjectStorageLocation,
    private readonly retryPolicy: RetryPolicy
  ) {
    this.bucket = location.bucket;
    this.prefix = normalizePrefix(location.prefix);
    this.key = location.key?.replace(/^\/+/, '') || undefined;
    this.id = `s3://${this.bucket}/${this.key ?? this.prefix}`;
  }

  async loadAll(): Promise<ForecastRecord[]> {
    for (let reload = 0; ; reload++) {
      const keys = await this.resolveObjectKeys();
      if (keys.length === 0) {
        console.warn(`[${this.id}] No parquet objects found - returning empty snapshot`);
        return [];
      }

      try {
        const records: ForecastRecord[] = [];
        for (const key of keys) {
          const bytes = await this.getObjectBytes(key);
          records.push(...(await decodeParquetBuffer(bytes, `s3://${this.bucket}/${key}`)));
          console.log(`[${this.id}] Loaded s3://${this.bucket}/${key}`);
        }
        return records;
      } catch (err) {
        if (err instanceof NoSuchKey && !this.key && reload < MAX_STALE_MANIFEST_RELOADS) {
          console.warn(`[${this.id}] Listed object vanished during read; reloading manifest`);
          continue;
        }
        if (err instanceof NoSuchKey) {
          throw new BackendUnavailableError(this.id, `Object not found: ${errorMessage(err)}`, {
            cause: err,
          });
        }
        throw err;
      }
    }
  }

  async replaceAll(records: readonly ForecastRecord[]): Promise<void> {
    if (this.key) {
      await this.putParquet(this.key, records);
      return;
    }
    const previous = await this.resolveObjectKeys();
    const parts = records.length > 0 ? [await this.uploadPart(records)] : [];
    await this.commit(parts, previous);
  }

  async appendAll(records: readonly ForecastRecord[]): Promise<void> {
    if (records.length === 0) return;
    if (this.key) {
      // A single object cannot grow in place: rewrite it with both sets.
      const existing = await this.loadAll();
      await this.putParquet(this.key, [...existing, ...records]);
      return;
    }
    const previous = await this.resolveObjectKeys();
    const part = await this.uploadPart(records);
    const kept = previous.map((key) => key.slice(this.prefix.length));
    await this.commit([...kept, part], previous);
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  /** Full object keys making up the current snapshot. */
  private async resolveObjectKeys(): Promise<string[]> {
    if (this.key) return [this.key];

    const manifest = await this.readManifest();
    if (manifest) return manifest.parts.map((part) => `${this.prefix}${part}`);

    const keys: string[] = [];
    let continuationToken: string | undefined;
    do {
      const token = continuationToken;
      const page = await this.send('ListObjectsV2', (signal) =>
        this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: this.prefix,
            ContinuationToken: token,
          }),
          { abortSignal: signal }
        )
      );
      for (const obj of page.Contents ?? []) {
        // Direct children only, matching what a manifest may name.
        const name = obj.Key?.slice(this.prefix.length);
        if (obj.Key && name && !name.includes('/') && name.endsWith('.parquet')) keys.push(obj.Key);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys.sort();
  }

  private async readManifest(): Promise<z.infer<typeof ManifestSchema> | null> {
    const manifestKey = `${this.prefix}${MANIFEST_FILE}`;
    let body: string;
    try {
      body = await this.send('GetObject manifest', async (signal) => {
        const response = await this.client.send(
          new GetObjectCommand({ Bucket: this.bucket, Key: manifestKey }),
          { abortSignal: signal }
        );
        return (await response.Body?.transformToString('utf-8')) ?? '';
      });
    } catch (err) {
      if (err instanceof NoSuchKey) return null;
      throw err;
    }
    return ManifestSchema.parse(JSON.parse(body));
  }

  private async getObjectBytes(key: string): Promise<Buffer> {
    return this.send(`GetObject ${key}`, async (signal) => {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
        { abortSignal: signal }
      );
      if (!response.Body) {
        throw new BackendUnavailableError(this.id, `Object ${key} has no body`);
      }
      return Buffer.from(await response.Body.transformToByteArray());
    });
  }

  private async putParquet(key: string, records: readonly ForecastRecord[]): Promise<void> {
    const body = await encodeParquet(records);
    await this.send(`PutObject ${key}`, (signal) =>
      this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: PARQUET_CONTENT_TYPE,
        }),
        { abortSignal: signal }
      )
    );
  }

  /** Upload a new part under the prefix; returns its name relative to the prefix. */
  private async uploadPart(records: readonly ForecastRecord[]): Promise<string> {
    const part = `part-${Date.now()}-${randomUUID()}.parquet`;
    await this.putParquet(`${this.prefix}${part}`, records);
    return part;
  }

  private async commit(parts: string[], previousKeys: string[]): Promise<void> {
    const manifestKey = `${this.prefix}${MANIFEST_FILE}`;
    const manifest = { version: 1, parts, updatedAt: new Date().toISOString() };
    await this.send('PutObject manifest', (signal) =>
      this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: manifestKey,
          Body: JSON.stringify(manifest, null, 2),
          ContentType: 'application/json',
        }),
        { abortSignal: signal }
      )
    );

    const live = new Set(parts.map((part) => `${this.prefix}${part}`));
    for (const key of previousKeys) {
      if (live.has(key)) continue;
      await this.send(`DeleteObject ${key}`, (signal) =>
        this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }), {
          abortSignal: signal,
        })
      );
    }
  }

  private async send<T>(operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        backendId: this.id,
        operation,
        policy: this.retryPolicy,
        isRetryable: isTransientS3Error,
      });
    } catch (err) {
      if (err instanceof ForecastApiError || err instanceof NoSuchKey) throw err;
      throw new BackendUnavailableError(this.id, `${operation} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}

/** Encode records through a temp file; the parquet writer targets file streams. */
async function encodeParquet(records: readonly ForecastRecord[]): Promise<Buffer> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'forecast-upload-'));
  try {
    const filePath = path.join(dir, 'part.parquet');
    await writeParquetFile(filePath, records);
    return await fs.readFile(filePath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
