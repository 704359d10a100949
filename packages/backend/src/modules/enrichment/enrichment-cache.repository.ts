import type { CacheStore } from '../../cache/cache';
import { query } from '../../shared/db';

export async function getEntry(key: string): Promise<string | null> {
  const result = await query<{ payload: string }>(
    `SELECT payload FROM enrichment_cache WHERE cache_key = $1 AND expires_at > NOW()`,
    [key],
  );
  return result.rows[0]?.payload ?? null;
}

export async function setEntry(key: string, payload: string, ttlSeconds: number): Promise<void> {
  await query(
    `INSERT INTO enrichment_cache (cache_key, payload, expires_at)
     VALUES ($1, $2, NOW() + make_interval(secs => $3))
     ON CONFLICT (cache_key) DO UPDATE SET payload = EXCLUDED.payload, expires_at = EXCLUDED.expires_at`,
    [key, payload, ttlSeconds],
  );
}

/** Deletes expired rows; returns how many were removed. */
export async function purgeExpired(): Promise<number> {
  const result = await query(`DELETE FROM enrichment_cache WHERE expires_at <= NOW()`);
  return result.rowCount ?? 0;
}

export const pgCacheStore: CacheStore = {
  name: 'postgres',
  get: getEntry,
  set: setEntry,
};
