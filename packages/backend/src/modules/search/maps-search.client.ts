import { z } from 'zod';
import { withTimeout } from '../../shared/async';
import { AuthError, TimeoutError, TransientProviderError } from '../../shared/errors';
import type { MapsSearchTransport, SearchPage, SearchPageRequest } from './search.types';

export const MAPS_SEARCH_PROVIDER = 'maps_search';

/** The provider returns at most this many listings per page. */
export const SEARCH_PAGE_SIZE = 20;

const LISTING_KEYS = [
  'results',
  'data',
  'search_results',
  'places',
  'listings',
  'businesses',
  'local_results',
  'organic_results',
] as const;

const responseSchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

export interface MapsSearchClientConfig {
  apiUrl: string;
  apiKey: string;
  timeoutMs?: number;
}

/**
 * Pulls the listing array out of a response body. Providers have been seen
 * to use a bare array or any of several wrapper keys.
 */
export function extractListings(body: unknown): unknown[] {
  const parsed = responseSchema.safeParse(body);
  if (!parsed.success) return [];
  if (Array.isArray(parsed.data)) return parsed.data;

  for (const key of LISTING_KEYS) {
    const value = parsed.data[key];
    if (Array.isArray(value)) return value;
  }
  return [];
}

/**
 * HTTP binding of the maps-search contract. Pages are addressed by number;
 * a full page implies another may follow.
 */
export function createMapsSearchClient(config: MapsSearchClientConfig): MapsSearchTransport {
  const timeoutMs = config.timeoutMs ?? 30_000;

  return {
    provider: MAPS_SEARCH_PROVIDER,

    async fetchPage(request: SearchPageRequest): Promise<SearchPage> {
      if (!config.apiKey) {
        throw new AuthError(MAPS_SEARCH_PROVIDER, 'Maps search API key is not configured');
      }

      const params = new URLSearchParams({
        api_key: config.apiKey,
        query: request.query,
        page: String(request.pageIndex),
      });
      if (request.coordinates) {
        params.set('ll', request.coordinates);
      } else if (request.location) {
        params.set('location', request.location);
      }

      let response: Response;
      try {
        response = await withTimeout(timeoutMs, 'Maps search request', (signal) =>
          fetch(`${config.apiUrl}?${params.toString()}`, { method: 'GET', signal }),
        );
      } catch (err) {
        if (err instanceof TimeoutError) {
          throw new TransientProviderError(MAPS_SEARCH_PROVIDER, err.message);
        }
        const message = err instanceof Error ? err.message : 'Unknown network error';
        throw new TransientProviderError(MAPS_SEARCH_PROVIDER, `Maps search network error: ${message}`);
      }

      if (response.status === 401 || response.status === 403) {
        throw new AuthError(MAPS_SEARCH_PROVIDER, `Maps search rejected credentials (HTTP ${response.status})`);
      }
      if (response.status === 429 || response.status >= 500) {
        throw new TransientProviderError(MAPS_SEARCH_PROVIDER, `Maps search HTTP ${response.status}`);
      }
      if (!response.ok) {
        const text = await response.text().catch(() => 'Unknown error');
        throw new TransientProviderError(
          MAPS_SEARCH_PROVIDER,
          `Maps search HTTP ${response.status}: ${text}`,
          false,
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch {
        throw new TransientProviderError(MAPS_SEARCH_PROVIDER, 'Maps search returned a malformed body');
      }

      const records = extractListings(body);
      return {
        records,
        nextPageToken: records.length >= SEARCH_PAGE_SIZE ? String(request.pageIndex + 1) : null,
      };
    },
  };
}
