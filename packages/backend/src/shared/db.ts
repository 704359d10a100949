import Pool from 'pg-pool';
import { type Client, type PoolClient, type QueryResultRow, type QueryResult } from 'pg';
import { describeError, logger } from './logger';

let pool: Pool<Client> | null = null;

export interface DbConfig {
  connectionString: string;
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

/**
 * Initializes the singleton pool. Called once from server.ts with validated env values.
 */
export function initPool(config: DbConfig): Pool<Client> {
  if (!pool) {
    pool = new Pool({
      connectionString: config.connectionString,
      max: config.max ?? 10,
      idleTimeoutMillis: config.idleTimeoutMillis ?? 30_000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 5_000,
    });
  }

  return pool;
}

/**
 * Returns the current pool. Throws if neither initPool() nor setPool() ran.
 */
export function getPool(): Pool<Client> {
  if (!pool) {
    throw new Error('Database pool not initialized. Call initPool() or setPool() first.');
  }
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  return getPool().query<T>(text, params);
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on any error.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/** Replaces the pool instance, for tests. */
export function setPool(customPool: Pool<Client>): void {
  pool = customPool;
}

export async function databaseHealthCheck(): Promise<boolean> {
  if (!pool) return false;
  try {
    await pool.query('SELECT 1');
    return true;
  } catch (err) {
    logger.warn('Database health check failed', { error: describeError(err) });
    return false;
  }
}
