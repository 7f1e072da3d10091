import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { createLogger } from '@giftpair/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  const options: PoolConfig = { max: 10, idleTimeoutMillis: 30_000, ...config };
  pool = new Pool(options);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({ max: options.max }, 'Database pool initialized');
  return pool;
}

/** Fails fast at startup when the database is unreachable. */
export async function checkConnection(): Promise<void> {
  await getPool().query('SELECT 1');
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

/**
 * Runs `fn` inside BEGIN/COMMIT on one pooled client. A failed ROLLBACK is
 * logged and the original error is the one rethrown.
 */
export async function withTransaction<T>(
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      logger.error(
        { err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) },
        'Rollback failed',
      );
    }
    throw err;
  } finally {
    client.release();
  }
}
