import { z } from 'zod';
import type { CacheStore } from '../../cache/cache';
import { describeError, logger } from '../../shared/logger';
import type { BusinessRecord } from '../search/search.types';
import type { EnrichmentResult } from './enrichment.types';
import { extractDomain } from './strategies/email';

const cachedResultSchema = z.object({
  placeId: z.string(),
  emails: z
    .array(z.object({ email: z.string(), confidence: z.number().min(0).max(1), source: z.string() }))
    .max(3),
  contactName: z.string().nullable(),
  enrichmentFailed: z.boolean(),
  enrichedAt: z.coerce.date(),
});

/**
 * `domain:<host>` for businesses with a website, so branches of one company
 * share a result, otherwise `place:<placeId>`.
 */
export function cacheKeyFor(business: Pick<BusinessRecord, 'placeId' | 'website'>): string {
  const domain = extractDomain(business.website);
  return domain ? `domain:${domain}` : `place:${business.placeId}`;
}

/**
 * Prior enrichment outcomes with a TTL. Store failures degrade to a miss so
 * a cache outage only costs extra strategy calls.
 */
export class EnrichmentCache {
  constructor(
    private readonly backend: CacheStore,
    private readonly defaultTtlSeconds: number,
  ) {}

  async lookup(key: string): Promise<EnrichmentResult | null> {
    let raw: string | null;
    try {
      raw = await this.backend.get(key);
    } catch (err) {
      logger.warn('Enrichment cache read failed', { key, store: this.backend.name, error: describeError(err) });
      return null;
    }
    if (raw === null) return null;

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      logger.warn('Discarding unparseable cache entry', { key });
      return null;
    }
    const parsed = cachedResultSchema.safeParse(payload);
    if (!parsed.success) {
      logger.warn('Discarding malformed cache entry', { key });
      return null;
    }
    return parsed.data;
  }

  async store(key: string, result: EnrichmentResult, ttlSeconds = this.defaultTtlSeconds): Promise<void> {
    try {
      await this.backend.set(key, JSON.stringify(result), ttlSeconds);
    } catch (err) {
      logger.warn('Enrichment cache write failed', { key, store: this.backend.name, error: describeError(err) });
    }
  }
}
