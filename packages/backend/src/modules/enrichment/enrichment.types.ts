import type { BusinessRecord } from '../search/search.types';
import type { EmailCandidate } from './strategies/types';

export type EnrichedEmail = EmailCandidate;

export interface EnrichmentResult {
  placeId: string;
  /** Up to three accepted emails, best first. */
  emails: EnrichedEmail[];
  contactName: string | null;
  enrichmentFailed: boolean;
  enrichedAt: Date;
}

/** Persisted current results, with older versions kept for audit. */
export interface EnrichmentResultStore {
  saveCurrent(result: EnrichmentResult): Promise<void>;
  findCurrent(placeId: string): Promise<EnrichmentResult | null>;
}

/** Business plus its enrichment, as exported to callers. */
export interface OutputRecord {
  placeId: string;
  name: string;
  address: string | null;
  phone: string | null;
  website: string | null;
  rating: number | null;
  reviewCount: number | null;
  categories: string[];
  latitude: number | null;
  longitude: number | null;
  hours: Record<string, unknown>;
  emails: EnrichedEmail[];
  contactName: string | null;
  confidence: number | null;
  source: string | null;
  enrichmentFailed: boolean | null;
  enrichedAt: Date | null;
}

export function toOutputRecord(business: BusinessRecord, result: EnrichmentResult | null): OutputRecord {
  const best = result?.emails[0];
  return {
    placeId: business.placeId,
    name: business.name,
    address: business.address,
    phone: business.phone,
    website: business.website,
    rating: business.rating,
    reviewCount: business.reviewCount,
    categories: business.categories,
    latitude: business.latitude,
    longitude: business.longitude,
    hours: business.hours,
    emails: result?.emails ?? [],
    contactName: result?.contactName ?? null,
    confidence: best?.confidence ?? null,
    source: best?.source ?? null,
    enrichmentFailed: result ? result.enrichmentFailed : null,
    enrichedAt: result?.enrichedAt ?? null,
  };
}

export interface PageOptions {
  page: number;
  limit: number;
}

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
}

/** Read side used to export a job's records. */
export interface JobOutputReader {
  listOutputForJob(jobId: string, options: PageOptions): Promise<PaginatedResult<OutputRecord>>;
}
