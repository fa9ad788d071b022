// Load environment variables from .env file FIRST before any other imports
import { config as loadEnv } from 'dotenv';
loadEnv();

import express from 'express';
import { createBackend } from './backends/backend-factory';
import { loadConfig } from './config';
import { ForecastQueryEngine } from './forecast-query-engine';
import { log } from './logger';
import { registerRoutes } from './routes';
import { SnapshotCache } from './snapshot-cache';

const config = loadConfig();

const backend = createBackend(config);
const cache = new SnapshotCache({
  ttlMs: config.cache.ttlMs,
  maxEntries: config.cache.maxEntries,
});
const engine = new ForecastQueryEngine(backend, cache);

const app = express();
app.set('etag', false);
const server = registerRoutes(app, { engine, config });

log(`Using ${config.dataBackend} backend (${backend.id})`);
if (!config.apiKey) {
  log('API_KEY not set - API key authentication disabled');
}

// Warm the cache so the first request does not pay for the load. A failure
// here is not fatal: /ready reports it and the next request retries.
engine.snapshot().then(
  (entry) => log(`Loaded ${entry.records.length} forecast records (generation ${entry.generation})`),
  (error) => console.error('[startup] Initial snapshot load failed:', error)
);

server.listen(config.port, '0.0.0.0', () => {
  log(`serving on port ${config.port}`);
});

let shuttingDown = false;
function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  log(`${signal} received, shutting down gracefully`);

  server.close(async () => {
    try {
      await backend.close?.();
    } catch (error) {
      console.error('[shutdown] Failed to close backend:', error);
    }
    log('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
