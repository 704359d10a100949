import { query } from '../../shared/db';
import type { BusinessRecord, BusinessStore } from './search.types';

export interface BusinessRow {
  place_id: string;
  name: string;
  address: string | null;
  phone: string | null;
  website: string | null;
  latitude: string | number | null;
  longitude: string | number | null;
  rating: string | number | null;
  review_count: number | null;
  categories: string[];
  hours: Record<string, unknown>;
  source_search: string | null;
}

function numeric(value: string | number | null): number | null {
  return value === null ? null : Number(value);
}

export function toBusinessRecord(row: BusinessRow): BusinessRecord {
  return {
    placeId: row.place_id,
    name: row.name,
    address: row.address,
    phone: row.phone,
    website: row.website,
    latitude: numeric(row.latitude),
    longitude: numeric(row.longitude),
    rating: numeric(row.rating),
    reviewCount: row.review_count,
    categories: row.categories,
    hours: row.hours,
    sourceSearch: row.source_search,
  };
}

const BUSINESS_COLUMNS =
  'place_id, name, address, phone, website, latitude, longitude, rating, review_count, categories, hours, source_search';

/**
 * Merges a fresh sighting into the stored business. Non-null incoming values
 * win; `source_search` and `created_at` keep their first values.
 */
export async function upsert(record: BusinessRecord): Promise<void> {
  await query(
    `INSERT INTO businesses (${BUSINESS_COLUMNS}, created_at, updated_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, NOW(), NOW())
     ON CONFLICT (place_id) DO UPDATE SET
       name = EXCLUDED.name,
       address = COALESCE(EXCLUDED.address, businesses.address),
       phone = COALESCE(EXCLUDED.phone, businesses.phone),
       website = COALESCE(EXCLUDED.website, businesses.website),
       latitude = COALESCE(EXCLUDED.latitude, businesses.latitude),
       longitude = COALESCE(EXCLUDED.longitude, businesses.longitude),
       rating = COALESCE(EXCLUDED.rating, businesses.rating),
       review_count = COALESCE(EXCLUDED.review_count, businesses.review_count),
       categories = EXCLUDED.categories,
       hours = EXCLUDED.hours,
       updated_at = NOW()`,
    [
      record.placeId,
      record.name,
      record.address,
      record.phone,
      record.website,
      record.latitude,
      record.longitude,
      record.rating,
      record.reviewCount,
      record.categories,
      JSON.stringify(record.hours),
      record.sourceSearch,
    ],
  );
}

export async function findByPlaceIds(placeIds: string[]): Promise<BusinessRecord[]> {
  if (placeIds.length === 0) return [];
  const result = await query<BusinessRow>(
    `SELECT ${BUSINESS_COLUMNS} FROM businesses WHERE place_id = ANY($1::text[])`,
    [placeIds],
  );
  const byId = new Map(result.rows.map((row) => [row.place_id, toBusinessRecord(row)]));
  return placeIds.flatMap((id) => {
    const record = byId.get(id);
    return record ? [record] : [];
  });
}

export const pgBusinessStore: BusinessStore = { upsert, findByPlaceIds };
