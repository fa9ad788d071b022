/**
 * Parquet Directory Backend
 *
 * Stores a snapshot as parquet part files inside one directory, with a
 * `_manifest.json` naming the live parts.
 *
 * Publishing (replace or append):
 *   1. write each new part to a temp name and rename it into place
 *   2. write the new manifest to a temp name and rename it over the old one
 *   3. delete parts the new manifest no longer references
 *
 * The manifest rename is the commit point, so a reader sees the complete old
 * part list or the complete new one. A reader that loses the race against
 * step 3 (a listed part disappears under it) re-reads the manifest.
 *
 * Directories without a manifest are read by globbing `*.parquet`, so
 * API-ready files copied in by hand keep working.
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { ForecastRecord } from '@shared/forecast-types';
import type { RetryPolicy } from '../config';
import type { ForecastBackend } from './forecast-backend';
import { readParquetFile, writeParquetFile } from './parquet-codec';
import { AttemptTimeoutError, withRetry } from './retry';

export const MANIFEST_FILE = '_manifest.json';

const ManifestSchema = z.object({
  version: z.literal(1),
  parts: z.array(z.string().regex(/^[^/\\]+\.parquet$/)),
  updatedAt: z.string(),
});

export type Manifest = z.infer<typeof ManifestSchema>;

/** Reading a part listed by a manifest we read a moment ago failed: reload. */
class StaleManifestError extends Error {
  constructor(part: string) {
    super(`Part ${part} vanished while reading; manifest changed underneath the reader`);
    this.name = 'StaleManifestError';
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

const TRANSIENT_FS_CODES = new Set(['EAGAIN', 'EBUSY', 'EMFILE', 'ENFILE', 'EIO', 'ETIMEDOUT']);

/**
 * Reads worth repeating: a manifest swap under the reader, a timeout, or a
 * busy filesystem. Undecodable parts and malformed manifests fail at once.
 */
export function isTransientReadError(err: unknown): boolean {
  if (err instanceof StaleManifestError || err instanceof AttemptTimeoutError) return true;
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
    ? TRANSIENT_FS_CODES.has(err.code)
    : false;
}

export class ParquetBackend implements ForecastBackend {
  readonly id: string;

  constructor(
    private readonly directory: string,
    private readonly retryPolicy: RetryPolicy
  ) {
    this.id = `parquet:${path.resolve(directory)}`;
  }

  async loadAll(): Promise<ForecastRecord[]> {
    return withRetry(() => this.readSnapshot(), {
      backendId: this.id,
      operation: 'loadAll',
      policy: this.retryPolicy,
      isRetryable: isTransientReadError,
    });
  }

  async replaceAll(records: readonly ForecastRecord[]): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });
    const parts = records.length > 0 ? [await this.writePart(records)] : [];
    await this.commit(parts);
  }

  async appendAll(records: readonly ForecastRecord[]): Promise<void> {
    if (records.length === 0) return;
    await fs.mkdir(this.directory, { recursive: true });
    const existing = await this.currentParts();
    const part = await this.writePart(records);
    await this.commit([...existing, part]);
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private async readSnapshot(): Promise<ForecastRecord[]> {
    let parts: string[];
    try {
      parts = await this.currentParts();
    } catch (err) {
      if (isNotFound(err)) {
        console.warn(`[${this.id}] Data directory does not exist - returning empty snapshot`);
        return [];
      }
      throw err;
    }

    const records: ForecastRecord[] = [];
    for (const part of parts) {
      try {
        records.push(...(await readParquetFile(path.join(this.directory, part))));
      } catch (err) {
        if (isNotFound(err)) throw new StaleManifestError(part);
        throw err;
      }
    }
    return records;
  }

  private async readManifest(): Promise<Manifest | null> {
    let raw: string;
    try {
      raw = await fs.readFile(path.join(this.directory, MANIFEST_FILE), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return ManifestSchema.parse(JSON.parse(raw));
  }

  private async currentParts(): Promise<string[]> {
    const manifest = await this.readManifest();
    if (manifest) return manifest.parts;

    const entries = await fs.readdir(this.directory);
    return entries.filter((name) => name.endsWith('.parquet')).sort();
  }

  private async writePart(records: readonly ForecastRecord[]): Promise<string> {
    const part = `part-${Date.now()}-${randomUUID()}.parquet`;
    const tempPath = path.join(this.directory, `.${part}.tmp`);
    try {
      await writeParquetFile(tempPath, records);
      await fs.rename(tempPath, path.join(this.directory, part));
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }
    return part;
  }

  private async commit(parts: string[]): Promise<void> {
    const previous = await this.currentParts();
    const manifest: Manifest = { version: 1, parts, updatedAt: new Date().toISOString() };

    const manifestPath = path.join(this.directory, MANIFEST_FILE);
    const tempPath = path.join(this.directory, `.${MANIFEST_FILE}.${randomUUID()}.tmp`);
    await fs.writeFile(tempPath, JSON.stringify(manifest, null, 2), 'utf-8');
    await fs.rename(tempPath, manifestPath);

    const live = new Set(parts);
    const stale = previous.filter((part) => !live.has(part));
    await Promise.all(
      stale.map((part) => fs.rm(path.join(this.directory, part), { force: true }))
    );
  }
}
