import { Pool, PoolClient } from 'pg';
import { debugLogger } from './debug-logger';

export function createPool(databaseUrl: string): Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  // Idle clients that lose their connection emit here instead of on a query
  pool.on('error', error => {
    console.error('❌ Postgres pool error:', error.message);
    debugLogger.warn('STORE', 'Idle client error', { error: error.message });
  });

  return pool;
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on any error.
 */
export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      debugLogger.warn('STORE', 'Rollback failed', {
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
      });
    });
    throw error;
  } finally {
    client.release();
  }
}
