import { Router } from 'express';
import { SERVICE_NAME, SERVICE_VERSION } from './config';
import { errorMessage } from './errors';
import type { ForecastQueryEngine } from './forecast-query-engine';

export interface HealthRouteOptions {
  environment: string;
  apiPrefix: string;
}

/** Liveness, readiness and service info; mounted outside the API key check. */
export function createHealthRouter(
  engine: ForecastQueryEngine,
  options: HealthRouteOptions
): Router {
  const router = Router();
  const prefix = options.apiPrefix === '/' ? '' : options.apiPrefix;

  router.get('/', (_req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        health: '/health',
        ready: '/ready',
        forecasts: `${prefix}/forecasts`,
        summary: `${prefix}/forecasts/summary`,
        months: `${prefix}/metadata/months`,
        grid_cells: `${prefix}/metadata/grid-cells`,
        countries: `${prefix}/metadata/countries`,
      },
    });
  });

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy', version: SERVICE_VERSION, environment: options.environment });
  });

  // Ready once a snapshot can be served; the first readiness check triggers the load.
  router.get('/ready', async (_req, res) => {
    try {
      const entry = await engine.snapshot();
      res.json({ status: 'ready', generation: entry.generation, records: entry.records.length });
    } catch (error) {
      console.error('[health] Readiness check failed:', error);
      res.status(503).json({ status: 'unavailable', message: errorMessage(error) });
    }
  });

  return router;
}
