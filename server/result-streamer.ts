/**
 * Result Streamer
 *
 * Shapes query results for the wire: a single aggregate JSON document, or
 * newline-delimited JSON written one record at a time.
 */

import type { ServerResponse } from 'node:http';
import type { ProjectedForecastRecord } from '@shared/forecast-types';
import type { QueryEcho } from './forecast-query';

export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';

export interface AggregateResponse {
  data: ProjectedForecastRecord[];
  count: number;
  query: QueryEcho;
}

export function buildAggregateResponse(
  records: ProjectedForecastRecord[],
  echo: QueryEcho
): AggregateResponse {
  return { data: records, count: records.length, query: echo };
}

/** One JSON line per record; stops as soon as `signal` aborts. */
export async function* streamNdjson(
  records: Iterable<ProjectedForecastRecord>,
  signal?: AbortSignal
): AsyncGenerator<string> {
  for (const record of records) {
    if (signal?.aborted) return;
    yield `${JSON.stringify(record)}\n`;
  }
}

/** Resolves once `res` can take more data or has gone away. */
function waitForDrain(res: ServerResponse): Promise<void> {
  if (res.destroyed) return Promise.resolve();
  return new Promise<void>((resolve) => {
    const done = () => {
      res.off('drain', done);
      res.off('close', done);
      resolve();
    };
    res.on('drain', done);
    res.on('close', done);
  });
}

/**
 * Write `records` as NDJSON, honouring backpressure. A client that
 * disconnects, before or during the stream, ends the write quietly; returns
 * the number of lines written.
 */
export async function writeNdjson(
  res: ServerResponse,
  records: ProjectedForecastRecord[]
): Promise<number> {
  // The client may have left while the snapshot was loading; its 'close'
  // event has already fired.
  if (res.destroyed || res.writableEnded) return 0;

  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableFinished) controller.abort();
  };
  res.on('close', onClose);

  res.statusCode = 200;
  res.setHeader('Content-Type', NDJSON_CONTENT_TYPE);
  res.setHeader('X-Total-Count', String(records.length));

  let written = 0;
  try {
    for await (const line of streamNdjson(records, controller.signal)) {
      if (res.destroyed) {
        controller.abort();
        break;
      }
      const flushed = res.write(line);
      written++;
      if (!flushed) await waitForDrain(res);
    }
    if (!controller.signal.aborted && !res.destroyed) res.end();
  } finally {
    res.off('close', onClose);
  }
  return written;
}
