// PostgreSQL connection for the relational backend.
// The pool is created lazily on first use so that parquet and cloud
// deployments never open a database connection.

import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pkg from 'pg';
const { Pool } = pkg;

let pool: pkg.Pool | null = null;
let forecastDb: NodePgDatabase | null = null;

export function getForecastDb(connectionString: string | undefined): NodePgDatabase {
  if (forecastDb) return forecastDb;

  if (!connectionString) {
    throw new Error(
      'Database connection requires either DATABASE_URL or POSTGRES_PASSWORD environment variable to be set. ' +
        'See .env.example for required configuration.'
    );
  }

  pool = new Pool({ connectionString });
  pool.on('error', (err) => {
    // Idle client errors are reported here instead of crashing the process;
    // the next query gets a fresh client.
    console.error('[storage] Idle PostgreSQL client error:', err);
  });
  forecastDb = drizzle(pool);
  return forecastDb;
}

export async function closeForecastDb(): Promise<void> {
  const current = pool;
  pool = null;
  forecastDb = null;
  if (current) await current.end();
}
