/* eslint-disable no-console */
/**
 * Run forecast database migrations.
 *
 * Executes SQL files from migrations/ in name order against the database
 * configured by DATABASE_URL or POSTGRES_*. Applied files are recorded in
 * schema_migrations and skipped on later runs.
 *
 * Usage:
 *   npm run db:migrate
 */

import { config } from 'dotenv';
config();

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import pkg from 'pg';
import { loadConfig } from '../server/config';
const { Pool } = pkg;

async function main(): Promise<void> {
  const connectionString = loadConfig().databaseUrl;
  if (!connectionString) {
    throw new Error('Database not configured. Set DATABASE_URL or POSTGRES_PASSWORD (plus POSTGRES_* vars).');
  }

  // Mask password in log output
  const safeUrl = connectionString.replace(/:([^@/]+)@/, ':****@');
  console.log(`[migrate] Connecting to: ${safeUrl}`);

  const pool = new Pool({ connectionString });
  const client = await pool.connect();

  try {
    console.log('[migrate] Connected successfully');

    const migrationsDir = fileURLToPath(new URL('../migrations', import.meta.url));
    const files = fs
      .readdirSync(migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    console.log(`[migrate] Found ${files.length} migration files`);

    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        filename TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    for (const file of files) {
      const { rowCount } = await client.query(
        'SELECT 1 FROM schema_migrations WHERE filename = $1',
        [file]
      );
      if (rowCount && rowCount > 0) {
        console.log(`[migrate] Skipping (already applied): ${file}`);
        continue;
      }

      const sqlContent = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
      console.log(`[migrate] Running: ${file}`);
      try {
        await client.query('BEGIN');
        await client.query(sqlContent);
        await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
        await client.query('COMMIT');
        console.log(`[migrate] OK: ${file}`);
      } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          console.error('[migrate] ROLLBACK failed:', rollbackErr);
        });
        console.error(`[migrate] FAILED: ${file}`, err instanceof Error ? err.message : err);
        throw err;
      }
    }

    console.log('[migrate] All migrations completed successfully');
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((err) => {
  console.error('[migrate] Fatal error:', err);
  process.exit(1);
});
