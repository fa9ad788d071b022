import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import { requireApiKey } from './api-key';
import type { AppConfig } from './config';
import { errorMessage, isForecastApiError } from './errors';
import { createForecastRouter } from './forecast-routes';
import type { ForecastQueryEngine } from './forecast-query-engine';
import { createHealthRouter } from './health-routes';
import { requestLogger } from './logger';
import { createMetadataRouter } from './metadata-routes';

export type RouteConfig = Pick<AppConfig, 'env' | 'apiPrefix' | 'apiKey' | 'allowFullScan'>;

export interface RouteDeps {
  engine: ForecastQueryEngine;
  config: RouteConfig;
}

/** Maps ForecastApiError to its status and code; anything else is a 500. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (res.headersSent) {
    // Mid-stream failure: the status line is gone, so just cut the response.
    console.error('[api] Error after response started:', err);
    res.destroy();
    return;
  }
  if (isForecastApiError(err)) {
    if (err.status >= 500) console.error(`[api] ${err.code}: ${err.message}`);
    const details = err.details();
    res.status(err.status).json({
      error: err.code,
      message: err.message,
      ...(details !== undefined ? { details } : {}),
    });
    return;
  }
  // Body parser errors carry their own 4xx status.
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json({ error: 'bad_request', message: err.message });
    return;
  }
  console.error('[api] Unhandled error:', err);
  res.status(500).json({ error: 'internal_error', message: errorMessage(err) });
}

function configureApp(app: Express, deps: RouteDeps): void {
  const { engine, config } = deps;
  const prefix = config.apiPrefix === '/' ? '' : config.apiPrefix;

  app.use(express.json());

  // Disable caching for all API routes so clients always see the live snapshot
  app.use(prefix || '/', (_req, res, next) => {
    res.set({
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      Pragma: 'no-cache',
      Expires: '0',
    });
    next();
  });
  app.use(requestLogger(prefix || '/'));

  app.use(createHealthRouter(engine, { environment: config.env, apiPrefix: config.apiPrefix }));

  const api = express.Router();
  api.use(requireApiKey(config.apiKey));
  api.use('/forecasts', createForecastRouter(engine, { allowFullScan: config.allowFullScan }));
  api.use('/metadata', createMetadataRouter(engine));
  app.use(prefix || '/', api);

  app.use((req, res) => {
    res.status(404).json({ error: 'not_found', message: `No route for ${req.method} ${req.path}` });
  });
  app.use(errorHandler);
}

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  configureApp(app, deps);
  return createServer(app);
}

/** Fully wired Express app, without binding a port. */
export function createApp(deps: RouteDeps): Express {
  const app = express();
  app.set('etag', false);
  configureApp(app, deps);
  return app;
}
