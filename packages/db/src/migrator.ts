import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Pool } from 'pg';
import { createLogger, loadConfig, DatabaseConfigSchema } from '@tasknest/shared';

const logger = createLogger({ name: 'db:migrate' });

const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

async function migrate() {
  const config = loadConfig(DatabaseConfigSchema);

  const pool = new Pool({ connectionString: config.DATABASE_URL });
  const client = await pool.connect();

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const applied = await client.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name');
    const appliedSet = new Set(applied.rows.map((r) => r.name));

    const files = (await readdir(MIGRATIONS_DIR))
      .filter((f) => f.endsWith('.sql'))
      .sort();

    for (const file of files) {
      if (appliedSet.has(file)) continue;

      const sql = await readFile(join(MIGRATIONS_DIR, file), 'utf-8');

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
        logger.info({ migration: file }, 'Applied migration');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }

    logger.info({ count: files.length }, 'All migrations applied');
  } finally {
    client.release();
    await pool.end();
  }
}

migrate().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Migration failed');
  process.exit(1);
});
