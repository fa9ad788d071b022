/**
 * Bounded retry with exponential backoff for backend I/O.
 *
 * Each attempt runs under its own timeout; the attempt receives an
 * AbortSignal that fires when the timeout elapses so clients that accept a
 * signal (the S3 client, fetch) can cancel the underlying request. Once the
 * retry budget is spent the last failure is wrapped in a
 * BackendUnavailableError.
 */

import type { RetryPolicy } from '../config';
import { BackendUnavailableError, ForecastApiError, errorMessage } from '../errors';

const MAX_BACKOFF_MS = 30_000;

export class AttemptTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

export interface RetryOptions {
  backendId: string;
  operation: string;
  policy: RetryPolicy;
  /** Errors for which this returns false fail immediately without retrying. */
  isRetryable?: (err: unknown) => boolean;
  /**
   * Race each attempt against `policy.timeoutMs` (default true). Pass false
   * for work that bounds itself and must not overlap a retry, such as a
   * write transaction the server times out on its own.
   */
  raceTimeout?: boolean;
}

/** Failures raised on purpose (bad data, failed validation) are never retried. */
function defaultIsRetryable(err: unknown): boolean {
  return !(err instanceof ForecastApiError);
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), MAX_BACKOFF_MS);
}

async function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  operation: string,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new AttemptTimeoutError(operation, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { backendId, operation, policy } = options;
  const isRetryable = options.isRetryable ?? defaultIsRetryable;
  const maxAttempts = policy.maxRetries + 1;
  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return options.raceTimeout === false
        ? await fn(new AbortController().signal)
        : await runWithTimeout(fn, operation, policy.timeoutMs);
    } catch (err) {
      if (!isRetryable(err)) throw err;
      lastError = err;

      if (attempt + 1 < maxAttempts) {
        const delay = backoffDelay(policy, attempt);
        console.warn(
          `[${backendId}] ${operation} attempt ${attempt + 1}/${maxAttempts} failed: ${errorMessage(err)}; retrying in ${delay}ms`
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  throw new BackendUnavailableError(
    backendId,
    `${operation} failed after ${maxAttempts} attempt(s): ${errorMessage(lastError)}`,
    { cause: lastError }
  );
}
