import {
  pgTable,
  integer,
  varchar,
  text,
  doublePrecision,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Forecasts Table
 * One row per grid cell and month, carrying the 13 published metrics.
 * Replaced wholesale on every ingestion (see RelationalBackend).
 */
export const forecasts = pgTable(
  'forecasts',
  {
    gridId: integer('grid_id').notNull(),
    month: varchar('month', { length: 7 }).notNull(),
    latitude: doublePrecision('latitude').notNull(),
    longitude: doublePrecision('longitude').notNull(),
    countryId: varchar('country_id', { length: 3 }),
    admin1Id: text('admin_1_id'),
    admin2Id: text('admin_2_id'),
    map: doublePrecision('map').notNull(),
    ci50Low: doublePrecision('ci_50_low').notNull(),
    ci50High: doublePrecision('ci_50_high').notNull(),
    ci90Low: doublePrecision('ci_90_low').notNull(),
    ci90High: doublePrecision('ci_90_high').notNull(),
    ci99Low: doublePrecision('ci_99_low').notNull(),
    ci99High: doublePrecision('ci_99_high').notNull(),
    prob0: doublePrecision('prob_0').notNull(),
    prob1: doublePrecision('prob_1').notNull(),
    prob10: doublePrecision('prob_10').notNull(),
    prob100: doublePrecision('prob_100').notNull(),
    prob1000: doublePrecision('prob_1000').notNull(),
    prob10000: doublePrecision('prob_10000').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.gridId, table.month] }),
    index('idx_forecasts_month').on(table.month),
    index('idx_forecasts_country').on(table.countryId),
    index('idx_forecasts_grid').on(table.gridId),
  ]
);

export type ForecastRowSelect = typeof forecasts.$inferSelect;
export type ForecastRowInsert = typeof forecasts.$inferInsert;
