import pg from 'pg';
import { logger } from '@latchkey/observability';

// Global singleton so hot reloads reuse one pool
const globalForPg = globalThis as unknown as {
  latchkeyPool: pg.Pool | undefined;
};

function createPool(): pg.Pool {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }

  const pool = new pg.Pool({ connectionString });
  pool.on('error', (error) => {
    logger.error({ err: error }, 'PostgreSQL pool error');
  });
  return pool;
}

/**
 * Lazily created pool; nothing connects until the first call.
 */
export function getPool(): pg.Pool {
  globalForPg.latchkeyPool ??= createPool();
  return globalForPg.latchkeyPool;
}

export async function closePool(): Promise<void> {
  const pool = globalForPg.latchkeyPool;
  globalForPg.latchkeyPool = undefined;
  if (pool) {
    await pool.end();
  }
}
