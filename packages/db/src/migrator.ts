import { readdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { Pool } from 'pg';
import { createLogger, loadConfig, BaseConfigSchema, DatabaseConfigSchema } from '@giftpair/shared';

const logger = createLogger({ name: 'migrator' });

function defaultMigrationsDir(): string {
  return join(dirname(require.resolve('@giftpair/db/package.json')), 'migrations');
}

/** Applies every `.sql` file not yet recorded in `_migrations`, in name order. */
export async function runMigrations(pool: Pool, dir = defaultMigrationsDir()): Promise<string[]> {
  const client = await pool.connect();
  const appliedNow: string[] = [];

  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS _migrations (
        name VARCHAR(255) PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const applied = await client.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name');
    const appliedSet = new Set(applied.rows.map((r) => r.name));

    const files = (await readdir(dir))
      .filter((f) => f.endsWith('.sql'))
      .sort();

    for (const file of files) {
      if (appliedSet.has(file)) continue;

      const sql = await readFile(join(dir, file), 'utf-8');

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
        logger.info({ file }, 'Migration applied');
        appliedNow.push(file);
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }
  } finally {
    client.release();
  }

  return appliedNow;
}

async function main() {
  const config = loadConfig(BaseConfigSchema.merge(DatabaseConfigSchema));
  const pool = new Pool({ connectionString: config.DATABASE_URL });

  try {
    const applied = await runMigrations(pool);
    logger.info({ count: applied.length }, 'All migrations applied');
  } finally {
    await pool.end();
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Migration failed');
    process.exit(1);
  });
}
