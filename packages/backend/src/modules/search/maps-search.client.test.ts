import { describe, it, expect, vi, afterEach } from 'vitest';
import { AuthError, TransientProviderError } from '../../shared/errors';
import { createMapsSearchClient, extractListings } from './maps-search.client';

const API_URL = 'https://maps.test/search';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('extractListings', () => {
  it('accepts a bare array', () => {
    expect(extractListings([{ a: 1 }])).toEqual([{ a: 1 }]);
  });

  it('finds listings under a wrapper key', () => {
    expect(extractListings({ search_results: [{ a: 1 }] })).toEqual([{ a: 1 }]);
    expect(extractListings({ local_results: [{ b: 2 }] })).toEqual([{ b: 2 }]);
  });

  it('returns an empty list for unknown shapes', () => {
    expect(extractListings({ message: 'nothing' })).toEqual([]);
    expect(extractListings('text')).toEqual([]);
  });
});

describe('createMapsSearchClient', () => {
  const request = { query: 'coffee', location: 'Austin', coordinates: '@30.2672,-97.7431,12z', pageIndex: 1, pageToken: '1' };

  it('sends the query, page number and coordinates', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ results: [] }));
    vi.stubGlobal('fetch', fetchMock);

    await createMapsSearchClient({ apiUrl: API_URL, apiKey: 'test-key' }).fetchPage(request);

    const url = new URL(fetchMock.mock.calls[0][0]);
    expect(url.searchParams.get('api_key')).toBe('test-key');
    expect(url.searchParams.get('query')).toBe('coffee');
    expect(url.searchParams.get('page')).toBe('1');
    expect(url.searchParams.get('ll')).toBe('@30.2672,-97.7431,12z');
    expect(url.searchParams.has('location')).toBe(false);
  });

  it('falls back to the text location without coordinates', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse([]));
    vi.stubGlobal('fetch', fetchMock);

    await createMapsSearchClient({ apiUrl: API_URL, apiKey: 'test-key' }).fetchPage({ ...request, coordinates: null });

    const url = new URL(fetchMock.mock.calls[0][0]);
    expect(url.searchParams.get('location')).toBe('Austin');
    expect(url.searchParams.has('ll')).toBe(false);
  });

  it('offers a next page only after a full page', async () => {
    const full = Array.from({ length: 20 }, (_, i) => ({ place_id: `p${i}` }));
    vi.stubGlobal('fetch', vi.fn().mockResolvedValueOnce(jsonResponse(full)).mockResolvedValueOnce(jsonResponse(full.slice(0, 7))));
    const client = createMapsSearchClient({ apiUrl: API_URL, apiKey: 'test-key' });

    const first = await client.fetchPage(request);
    const second = await client.fetchPage({ ...request, pageIndex: 2 });

    expect(first.records).toHaveLength(20);
    expect(first.nextPageToken).toBe('2');
    expect(second.records).toHaveLength(7);
    expect(second.nextPageToken).toBeNull();
  });

  it.each([401, 403])('raises AuthError on HTTP %i', async (status) => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ error: 'denied' }, status)));

    await expect(createMapsSearchClient({ apiUrl: API_URL, apiKey: 'test-key' }).fetchPage(request)).rejects.toThrow(
      AuthError,
    );
  });

  it('raises AuthError without calling out when the key is missing', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await expect(createMapsSearchClient({ apiUrl: API_URL, apiKey: '' }).fetchPage(request)).rejects.toThrow(AuthError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it.each([429, 500, 503])('raises a retryable error on HTTP %i', async (status) => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({}, status)));

    const error = await createMapsSearchClient({ apiUrl: API_URL, apiKey: 'test-key' })
      .fetchPage(request)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientProviderError);
    if (error instanceof TransientProviderError) expect(error.retryable).toBe(true);
  });

  it('raises a final error on other client errors', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('bad query', { status: 400 })));

    const error = await createMapsSearchClient({ apiUrl: API_URL, apiKey: 'test-key' })
      .fetchPage(request)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientProviderError);
    if (error instanceof TransientProviderError) {
      expect(error.retryable).toBe(false);
      expect(error.message).toBe('Maps search HTTP 400: bad query');
    }
  });

  it('treats a network failure as retryable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

    await expect(createMapsSearchClient({ apiUrl: API_URL, apiKey: 'test-key' }).fetchPage(request)).rejects.toThrow(
      'Maps search network error: fetch failed',
    );
  });
});
