import 'dotenv/config';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { Pool, PoolClient } from 'pg';
import { loadConfig } from '../config.js';
import { getPool } from './client.js';

const MIGRATIONS_DIR = join(process.cwd(), 'drizzle');
const MIGRATIONS_TABLE = '__progression_migrations';

const ensureTableSQL = `
CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const connectWithRetry = async (pool: Pool, attempts: number, delayMs: number): Promise<PoolClient> => {
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await pool.connect();
    } catch (err) {
      lastError = err;
      if (attempt === attempts) break;
      const delay = delayMs * attempt;
      console.warn('db_connect_retry', {
        attempt,
        attempts,
        delayMs: delay,
        message: err instanceof Error ? err.message : String(err),
      });
      await sleep(delay);
    }
  }
  throw lastError instanceof Error ? lastError : new Error('Failed to acquire database connection');
};

async function main() {
  const config = loadConfig();
  const pool = getPool();
  const client = await connectWithRetry(pool, config.migrateRetries, config.migrateRetryDelayMs);
  try {
    await client.query(ensureTableSQL);

    const applied = new Set<string>();
    const result = await client.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE} ORDER BY name`);
    for (const row of result.rows) applied.add(row.name);

    const migrations = readdirSync(MIGRATIONS_DIR)
      .filter((file) => file.endsWith('.sql'))
      .sort();

    for (const file of migrations) {
      if (applied.has(file)) continue;

      const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf8');
      console.log(`Applying migration ${file}`);
      await client.query(sql);
      await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [file]);
    }

    console.log('Migrations up to date');
  } finally {
    client.release();
    await pool.end().catch((err: unknown) => {
      console.warn('db_pool_close_failed', { message: err instanceof Error ? err.message : String(err) });
    });
  }
}

main().catch((err) => {
  console.error('migrate_failed', err);
  process.exit(1);
});
