import type { ForecastRecord } from '@shared/forecast-types';

/**
 * Read/replace contract shared by every storage backend.
 *
 * `replaceAll` is atomic: a concurrent `loadAll` observes either the complete
 * old record set or the complete new one, never a mix. `appendAll` adds the
 * batch without removing existing records and only guarantees uniqueness
 * inside the batch it was given.
 */
export interface ForecastBackend {
  /** Stable identity of this backend instance; used as the cache key. */
  readonly id: string;
  loadAll(): Promise<ForecastRecord[]>;
  replaceAll(records: readonly ForecastRecord[]): Promise<void>;
  appendAll(records: readonly ForecastRecord[]): Promise<void>;
  /** Release connections or handles. */
  close?(): Promise<void>;
}
