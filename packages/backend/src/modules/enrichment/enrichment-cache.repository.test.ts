import { describe, it, expect, vi, beforeEach } from 'vitest';
import { getEntry, purgeExpired, setEntry } from './enrichment-cache.repository';

const mockQuery = vi.fn();
vi.mock('../../shared/db', () => ({
  query: (...args: unknown[]) => mockQuery(...args),
}));

describe('enrichment-cache.repository', () => {
  beforeEach(() => {
    mockQuery.mockReset();
  });

  it('reads only unexpired payloads', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ payload: '{"placeId":"place-1"}' }] });

    await expect(getEntry('domain:acme.org')).resolves.toBe('{"placeId":"place-1"}');

    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('expires_at > NOW()');
    expect(params).toEqual(['domain:acme.org']);
  });

  it('returns null on a miss', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [] });

    await expect(getEntry('place:place-9')).resolves.toBeNull();
  });

  it('upserts with an expiry TTL seconds from now', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 1 });

    await setEntry('domain:acme.org', '{}', 2592000);

    const [sql, params] = mockQuery.mock.calls[0];
    expect(sql).toContain('make_interval(secs => $3)');
    expect(sql).toContain('ON CONFLICT (cache_key) DO UPDATE');
    expect(params).toEqual(['domain:acme.org', '{}', 2592000]);
  });

  it('reports how many expired rows were purged', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 4 });

    await expect(purgeExpired()).resolves.toBe(4);
    expect(mockQuery.mock.calls[0][0]).toContain('DELETE FROM enrichment_cache WHERE expires_at <= NOW()');
  });
});
