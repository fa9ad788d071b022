import { Router } from 'express';
import { parseQuerySpec, describeQuery } from './forecast-query';
import type { ForecastQueryEngine } from './forecast-query-engine';
import { buildAggregateResponse, writeNdjson } from './result-streamer';

export interface ForecastRouteOptions {
  allowFullScan: boolean;
}

/**
 * GET /forecasts and GET /forecasts/summary.
 *
 * Query parameters are validated before the snapshot is touched, so a
 * malformed request never triggers a backend load.
 */
export function createForecastRouter(
  engine: ForecastQueryEngine,
  options: ForecastRouteOptions
): Router {
  const router = Router();

  router.get('/', async (req, res, next) => {
    try {
      const spec = parseQuerySpec(req.query, options);
      const records = await engine.execute(spec);

      if (spec.format === 'ndjson') {
        await writeNdjson(res, records);
        return;
      }
      res.setHeader('X-Total-Count', String(records.length));
      res.json(buildAggregateResponse(records, describeQuery(spec)));
    } catch (error) {
      next(error);
    }
  });

  // Same row filters as GET /forecasts; metrics, metric_filters and format
  // are accepted but have no effect on the summary.
  router.get('/summary', async (req, res, next) => {
    try {
      const spec = parseQuerySpec(req.query, options);
      const summary = await engine.summarize({
        country: spec.country,
        gridIds: spec.gridIds,
        months: spec.months,
        monthRange: spec.monthRange,
      });
      res.json(summary);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
