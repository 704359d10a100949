import { z } from 'zod';
import cityTable from '../../data/city-coordinates.json';
import { withTimeout } from '../../shared/async';
import { describeError, logger } from '../../shared/logger';
import type { Coordinates, Geocoder } from './search.types';

const cityCoordinates = z.record(z.tuple([z.number(), z.number()])).parse(cityTable);

const nominatimResponseSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
  }),
);

const GEOCODER_TIMEOUT_MS = 10_000;
const USER_AGENT = 'leadsmith/1.0';

export function formatCoordinates(coords: Coordinates, zoom = 12): string {
  return `@${coords.latitude},${coords.longitude},${zoom}z`;
}

export function lookupCity(location: string): Coordinates | null {
  const entry = cityCoordinates[location.trim().toLowerCase()];
  return entry ? { latitude: entry[0], longitude: entry[1] } : null;
}

/**
 * Resolves free text to coordinates from the static city table, falling back
 * to a Nominatim-compatible endpoint. Failures resolve to null.
 */
export function createGeocoder(geocoderUrl: string): Geocoder {
  return {
    async resolve(location: string): Promise<Coordinates | null> {
      if (!location.trim()) return null;

      const known = lookupCity(location);
      if (known) {
        logger.debug('Geocoded from city table', { location });
        return known;
      }

      const params = new URLSearchParams({ q: location, format: 'json', limit: '1' });
      try {
        return await withTimeout(GEOCODER_TIMEOUT_MS, 'Geocoder request', async (signal) => {
          const response = await fetch(`${geocoderUrl}?${params.toString()}`, {
            headers: { 'User-Agent': USER_AGENT },
            signal,
          });
          if (!response.ok) {
            logger.warn('Geocoder returned an error status', { location, status: response.status });
            return null;
          }
          const parsed = nominatimResponseSchema.safeParse(await response.json());
          if (!parsed.success || parsed.data.length === 0) {
            logger.warn('Geocoder found no match', { location });
            return null;
          }
          return { latitude: parsed.data[0].lat, longitude: parsed.data[0].lon };
        });
      } catch (err) {
        logger.warn('Geocoding failed', { location, error: describeError(err) });
        return null;
      }
    },
  };
}
