import { Router } from 'express';
import { normalizeCountryId } from '@shared/forecast-types';
import { InvalidFilterError } from './errors';
import type { ForecastQueryEngine } from './forecast-query-engine';

function parseCountryParam(value: unknown): string | undefined {
  if (value === undefined || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new InvalidFilterError('country must be a single value');
  }
  const normalized = normalizeCountryId(value);
  if (normalized === null || !/^\d{3}$/.test(normalized)) {
    throw new InvalidFilterError(`country must be a numeric UN M49 code, got "${value}"`, value);
  }
  return normalized;
}

/** Discovery endpoints: available months, grid cells and countries. */
export function createMetadataRouter(engine: ForecastQueryEngine): Router {
  const router = Router();

  router.get('/months', async (_req, res, next) => {
    try {
      const months = await engine.listMonths();
      res.json({ data: months, count: months.length });
    } catch (error) {
      next(error);
    }
  });

  router.get('/grid-cells', async (req, res, next) => {
    try {
      const country = parseCountryParam(req.query.country);
      const cells = await engine.listGridCells(country);
      if (country !== undefined) {
        res.json({ data: cells, count: cells.length });
        return;
      }
      res.json({ data: cells, count: cells.length, countries: await engine.listCountries() });
    } catch (error) {
      next(error);
    }
  });

  router.get('/countries', async (_req, res, next) => {
    try {
      const countries = await engine.listCountries();
      res.json({ countries, count: countries.length });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
