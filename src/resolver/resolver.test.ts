/**
 * Resolver Tests
 *
 * Covers the HERE client (request shape, response mapping, error
 * classification, call tracking), the offline resolver and the factory.
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import {
  HereClient,
  HereApiError,
  isHereApiError,
  isTimeoutError,
  UnavailableResolver,
  createPlaceResolver,
} from './index.js';
import { createMockResponse } from '../testing/fakes.js';
import { parseConfig } from '../config/index.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const mockFetch = jest.fn<typeof fetch>();
const originalFetch = global.fetch;

const DALLAS = { lat: 32.7767, lon: -96.797 };
const AUSTIN = { lat: 30.2672, lon: -97.7431 };

function requestedUrl(callIndex = 0): URL {
  return new URL(String(mockFetch.mock.calls[callIndex][0]));
}

beforeEach(() => {
  mockFetch.mockReset();
  global.fetch = mockFetch as unknown as typeof fetch;
});

afterEach(() => {
  global.fetch = originalFetch;
});

// ============================================================================
// HereClient
// ============================================================================

describe('HereClient', () => {
  describe('geocode', () => {
    it('requests one item and maps position and country', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse({
          items: [
            {
              title: 'Austin, TX, United States',
              position: { lat: 30.2672, lng: -97.7431 },
              address: { label: 'Austin, TX, United States', countryCode: 'USA' },
            },
          ],
        })
      );

      const client = new HereClient({ apiKey: 'test-key' });
      const result = await client.geocode('Austin');

      expect(result).toEqual({ coordinates: AUSTIN, countryCode: 'USA' });

      const url = requestedUrl();
      expect(url.origin + url.pathname).toBe('https://geocode.search.hereapi.com/v1/geocode');
      expect(url.searchParams.get('q')).toBe('Austin');
      expect(url.searchParams.get('limit')).toBe('1');
      expect(url.searchParams.get('apiKey')).toBe('test-key');
      expect(url.searchParams.has('in')).toBe(false);
    });

    it('restricts the search to the hinted country', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ items: [] }));

      const client = new HereClient({ apiKey: 'test-key' });
      await client.geocode('Austin', { countryHint: 'USA' });

      expect(requestedUrl().searchParams.get('in')).toBe('countryCode:USA');
    });

    it('returns null when nothing matches', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ items: [] }));

      const client = new HereClient({ apiKey: 'test-key' });

      await expect(client.geocode('Nowhere')).resolves.toBeNull();
    });

    it('skips items without a position', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse({
          items: [
            { title: 'No position' },
            { title: 'Dallas', position: { lat: 32.7767, lng: -96.797 } },
          ],
        })
      );

      const client = new HereClient({ apiKey: 'test-key' });
      const result = await client.geocode('Dallas');

      expect(result).toEqual({ coordinates: DALLAS, countryCode: undefined });
    });
  });

  describe('search', () => {
    it('anchors discovery at the given position and maps candidates', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse({
          items: [
            {
              title: 'Walmart Supercenter',
              position: { lat: 32.81, lng: -96.82 },
              address: { label: '123 Main St, Dallas, TX' },
              openingHours: [{ isOpen: true }],
            },
            {
              title: 'Walmart Neighborhood Market',
              position: { lat: 32.7, lng: -96.9 },
              address: { label: '9 Elm St, Dallas, TX' },
            },
            { title: 'No position', address: { label: 'Somewhere' } },
          ],
        })
      );

      const client = new HereClient({ apiKey: 'test-key' });
      const candidates = await client.search('a walmart', DALLAS, 10);

      expect(candidates).toEqual([
        {
          title: 'Walmart Supercenter',
          address: '123 Main St, Dallas, TX',
          coordinates: { lat: 32.81, lon: -96.82 },
          isOpen: true,
        },
        {
          title: 'Walmart Neighborhood Market',
          address: '9 Elm St, Dallas, TX',
          coordinates: { lat: 32.7, lon: -96.9 },
          isOpen: false,
        },
      ]);

      const url = requestedUrl();
      expect(url.origin + url.pathname).toBe('https://discover.search.hereapi.com/v1/discover');
      expect(url.searchParams.get('q')).toBe('a walmart');
      expect(url.searchParams.get('at')).toBe('32.7767,-96.797');
      expect(url.searchParams.get('limit')).toBe('10');
    });
  });

  describe('route', () => {
    it('sums section summaries and keeps the first polyline', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse({
          routes: [
            {
              sections: [
                { polyline: 'BFoz5xJ67i1B', summary: { length: 1000, duration: 60 } },
                { polyline: 'BFxyz', summary: { length: 500, duration: 30 } },
              ],
            },
          ],
        })
      );

      const client = new HereClient({ apiKey: 'test-key' });
      const route = await client.route(DALLAS, AUSTIN);

      expect(route).toEqual({ distanceMeters: 1500, durationSeconds: 90, encodedPath: 'BFoz5xJ67i1B' });

      const url = requestedUrl();
      expect(url.origin + url.pathname).toBe('https://router.hereapi.com/v8/routes');
      expect(url.searchParams.get('transportMode')).toBe('car');
      expect(url.searchParams.get('origin')).toBe('32.7767,-96.797');
      expect(url.searchParams.get('destination')).toBe('30.2672,-97.7431');
      expect(url.searchParams.get('return')).toBe('summary,polyline');
    });

    it('returns null when no route is found', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ routes: [] }));

      const client = new HereClient({ apiKey: 'test-key' });

      await expect(client.route(DALLAS, AUSTIN)).resolves.toBeNull();
    });
  });

  describe('error handling', () => {
    it('classifies rate limits as retryable', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ error: 'slow down' }, { ok: false, status: 429 }));

      const client = new HereClient({ apiKey: 'test-key' });
      const error = await client.geocode('Dallas').catch((e: unknown) => e);

      expect(isHereApiError(error)).toBe(true);
      expect(error).toMatchObject({ statusCode: 429, status: 'HTTP_ERROR', isRetryable: true });
    });

    it('reports authentication failures as not retryable', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({}, { ok: false, status: 401 }));

      const client = new HereClient({ apiKey: 'test-key' });

      await expect(client.geocode('Dallas')).rejects.toMatchObject({
        message: 'Authentication failed: Invalid or unauthorized API key',
        isRetryable: false,
      });
    });

    it('rejects payloads that do not match the schema', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({ items: 'not-a-list' }));

      const client = new HereClient({ apiKey: 'test-key' });

      await expect(client.geocode('Dallas')).rejects.toMatchObject({
        status: 'INVALID_RESPONSE',
        statusCode: 502,
      });
    });

    it('aborts slow requests with a timeout error', async () => {
      mockFetch.mockImplementation(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const abort = new Error('The operation was aborted');
              abort.name = 'AbortError';
              reject(abort);
            });
          })
      );

      const client = new HereClient({ apiKey: 'test-key', timeoutMs: 10 });
      const error = await client.geocode('Dallas').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HereApiError);
      expect(isTimeoutError(error)).toBe(true);
      expect(error).toMatchObject({ statusCode: 408, message: 'Request timed out after 10ms' });
    });
  });

  describe('call tracking', () => {
    it('counts successful calls', async () => {
      mockFetch.mockImplementation(async () => createMockResponse({ items: [] }));

      const client = new HereClient({ apiKey: 'test-key' });
      await client.geocode('Dallas');
      await client.search('coffee', DALLAS, 5);

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(client.getCallCount()).toBe(2);
    });

    it('does not count failed calls', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse({}, { ok: false, status: 500 }));

      const client = new HereClient({ apiKey: 'test-key' });
      await expect(client.geocode('Dallas')).rejects.toThrow('Server error (500)');

      expect(client.getCallCount()).toBe(0);
    });
  });
});

// ============================================================================
// UnavailableResolver & factory
// ============================================================================

describe('UnavailableResolver', () => {
  it('resolves nothing without touching the network', async () => {
    const resolver = new UnavailableResolver();

    await expect(resolver.geocode('Dallas')).resolves.toBeNull();
    await expect(resolver.search('coffee', DALLAS, 10)).resolves.toEqual([]);
    await expect(resolver.route(DALLAS, AUSTIN)).resolves.toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('createPlaceResolver', () => {
  it('uses HERE when a key is configured', () => {
    const cfg = parseConfig({ HERE_API_KEY: 'test-key' });

    expect(createPlaceResolver(cfg)).toBeInstanceOf(HereClient);
  });

  it('falls back to the offline resolver without a key', () => {
    const cfg = parseConfig({});

    expect(createPlaceResolver(cfg)).toBeInstanceOf(UnavailableResolver);
  });
});
