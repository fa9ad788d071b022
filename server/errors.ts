/**
 * Error taxonomy for the forecast API.
 *
 * Every error raised on purpose by the query engine, the preparation
 * pipeline or a storage backend extends ForecastApiError, which carries a
 * stable machine-readable `code` and the HTTP status the API layer maps it to.
 */

export abstract class ForecastApiError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Extra fields included in the JSON error body. */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

/** Malformed or contradictory query parameters. Never retried. */
export class InvalidFilterError extends ForecastApiError {
  readonly code = 'invalid_filter';
  readonly status = 400;

  constructor(
    message: string,
    readonly token?: string
  ) {
    super(message);
  }

  override details(): Record<string, unknown> | undefined {
    return this.token === undefined ? undefined : { token: this.token };
  }
}

/** Malformed raw input to summarization. */
export class DataError extends ForecastApiError {
  readonly code = 'data_error';
  readonly status = 422;

  constructor(
    message: string,
    readonly context: { gridId?: number; month?: string } = {}
  ) {
    super(
      context.gridId !== undefined || context.month !== undefined
        ? `${message} (grid_id=${context.gridId ?? '?'}, month=${context.month ?? '?'})`
        : message
    );
  }

  override details(): Record<string, unknown> {
    return { grid_id: this.context.gridId ?? null, month: this.context.month ?? null };
  }
}

export interface SchemaViolation {
  /** Position of the record in the validated batch */
  index: number;
  grid_id: number | null;
  month: string | null;
  field: string;
  message: string;
}

/** Post-summarization validation failure; lists every violation. */
export class SchemaError extends ForecastApiError {
  readonly code = 'schema_error';
  readonly status = 422;

  constructor(readonly violations: SchemaViolation[]) {
    super(
      `Forecast batch failed validation with ${violations.length} violation(s): ` +
        violations
          .slice(0, 5)
          .map((v) => `#${v.index} ${v.field}: ${v.message}`)
          .join('; ') +
        (violations.length > 5 ? '; ...' : '')
    );
  }

  override details(): Record<string, unknown> {
    return { violations: this.violations };
  }
}

/** Transient backend I/O failure that outlasted its retry budget. */
export class BackendUnavailableError extends ForecastApiError {
  readonly code = 'backend_unavailable';
  readonly status = 503;

  constructor(
    readonly backendId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${backendId}] ${message}`, options);
  }
}

export function isForecastApiError(err: unknown): err is ForecastApiError {
  return err instanceof ForecastApiError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
