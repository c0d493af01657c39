/**
 * Applies pending SQL files from migrations/ in file-name order.
 * Applied names are recorded in schema_migrations.
 *
 * Run: npm run db:migrate
 */

import { readdirSync, readFileSync } from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { config } from '../config/environment';
import { logError, logger } from '../shared/services/logger.service';

const MIGRATIONS_DIR = path.resolve(__dirname, '../../migrations');

async function main(): Promise<void> {
  const pool = new Pool({ connectionString: config.database.url, max: 1 });
  const client = await pool.connect();

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name text PRIMARY KEY,
        applied_at timestamptz NOT NULL DEFAULT now()
      )
    `);

    const applied = new Set(
      (await client.query<{ name: string }>('SELECT name FROM schema_migrations')).rows.map(row => row.name)
    );
    const pending = readdirSync(MIGRATIONS_DIR)
      .filter(file => file.endsWith('.sql') && !applied.has(file))
      .sort();

    for (const file of pending) {
      const sql = readFileSync(path.join(MIGRATIONS_DIR, file), 'utf8');
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
        logger.info('Migration applied', { file });
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    }

    logger.info('Migrations complete', { applied: pending.length });
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logError('Migration failed', error);
  process.exit(1);
});
