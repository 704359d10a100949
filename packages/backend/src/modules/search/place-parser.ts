import { ValidationError } from '../../shared/errors';
import type { BusinessRecord } from './search.types';

const CATEGORY_FIELDS = ['type', 'category', 'categories', 'business_type'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstText(source: Record<string, unknown>, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (typeof value === 'number') return String(value);
  }
  return null;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function parseGps(value: unknown): { latitude: number | null; longitude: number | null } {
  if (typeof value === 'string') {
    const parts = value.split(',');
    if (parts.length === 2) {
      const latitude = toNumber(parts[0]);
      const longitude = toNumber(parts[1]);
      if (latitude !== null && longitude !== null) return { latitude, longitude };
    }
    return { latitude: null, longitude: null };
  }
  if (isRecord(value)) {
    return {
      latitude: toNumber(value.latitude ?? value.lat),
      longitude: toNumber(value.longitude ?? value.lng),
    };
  }
  return { latitude: null, longitude: null };
}

// "1,234 reviews" → 1234
function parseReviewCount(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : Math.trunc(value);
  if (typeof value === 'string') {
    const match = value.replace(/,/g, '').match(/(\d+)/);
    return match ? parseInt(match[1], 10) : null;
  }
  return null;
}

function parseCategories(source: Record<string, unknown>): string[] {
  const categories: string[] = [];
  for (const field of CATEGORY_FIELDS) {
    const value = source[field];
    if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item === 'string' && item.trim()) categories.push(item.trim());
      }
    } else if (typeof value === 'string' && value.trim()) {
      categories.push(value.trim());
    }
  }
  return [...new Set(categories)];
}

function parseHours(value: unknown): Record<string, unknown> {
  if (typeof value === 'string') return { raw: value };
  if (isRecord(value)) return value;
  if (Array.isArray(value)) return { raw: value };
  return {};
}

/**
 * Normalizes one raw provider listing. Throws ValidationError when the
 * listing has no place id or no name, since neither dedup nor output can
 * work without them.
 */
export function parsePlace(raw: unknown, sourceSearch: string | null): BusinessRecord {
  if (!isRecord(raw)) {
    throw new ValidationError('Listing is not an object');
  }

  const name = firstText(raw, 'title', 'name', 'business_name');
  const placeId = firstText(raw, 'place_id', 'id');
  if (!placeId) throw new ValidationError(`Listing "${name ?? 'unnamed'}" has no place id`);
  if (!name) throw new ValidationError(`Listing ${placeId} has no name`);

  const contact = isRecord(raw.contact) ? raw.contact : {};
  const { latitude, longitude } = parseGps(raw.gps ?? raw.gps_coordinates);

  return {
    placeId,
    name,
    address: firstText(raw, 'address', 'full_address', 'location'),
    phone: firstText(raw, 'phone', 'phone_number') ?? firstText(contact, 'phone'),
    website: firstText(raw, 'website', 'url', 'link'),
    latitude,
    longitude,
    rating: toNumber(raw.rating),
    reviewCount: parseReviewCount(raw.reviews ?? raw.reviews_count),
    categories: parseCategories(raw),
    hours: parseHours(raw.hours),
    sourceSearch,
  };
}
