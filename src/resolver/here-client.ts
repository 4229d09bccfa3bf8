/**
 * HERE API Client
 *
 * Low-level client for HERE Geocoding & Search (geocode, discover) and
 * HERE Routing v8. Handles authentication, request formatting, timeouts,
 * error classification and call counting.
 *
 * @module resolver/here-client
 */

import type { z } from 'zod';
import { requireApiKey } from '../config/index.js';
import type { Coordinates } from '../schemas/common.js';
import type { RouteSummary } from '../schemas/trip.js';
import {
  HereDiscoverResponseSchema,
  HereGeocodeResponseSchema,
  HereRouteResponseSchema,
} from '../schemas/here.js';
import type {
  GeocodeOptions,
  GeocodeResult,
  PlaceCandidate,
  PlaceResolver,
  RouteProvider,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface HereClientOptions {
  /** API key (default: HERE_API_KEY from config) */
  apiKey?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

/**
 * HERE API error with additional context
 */
export class HereApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly status: string,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'HereApiError';
  }
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * Default configuration values
 */
const DEFAULTS = {
  timeoutMs: 10000,
  transportMode: 'car',
} as const;

const ENDPOINTS = {
  geocode: 'https://geocode.search.hereapi.com/v1/geocode',
  discover: 'https://discover.search.hereapi.com/v1/discover',
  routes: 'https://router.hereapi.com/v8/routes',
} as const;

/**
 * HereClient resolves places and routes through the HERE REST APIs.
 *
 * Features:
 * - Geocoding with an optional country restriction
 * - Nearby discovery anchored at a position
 * - Route summary (length, duration, flexible polyline)
 * - API call counting
 * - Request timeout via AbortController
 *
 * @example
 * ```typescript
 * const client = new HereClient({ apiKey: process.env.HERE_API_KEY });
 *
 * const dallas = await client.geocode('Dallas');
 * const cafes = await client.search('coffee shop', dallas!.coordinates, 10);
 * console.log(`Calls made: ${client.getCallCount()}`);
 * ```
 */
export class HereClient implements PlaceResolver, RouteProvider {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private callCount = 0;

  /**
   * Create a new HERE client.
   *
   * @throws Error if no API key is given and HERE_API_KEY is not set
   */
  constructor(options: HereClientOptions = {}) {
    this.apiKey = options.apiKey ?? requireApiKey('here');
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
  }

  /**
   * Geocode a free-form place name.
   *
   * @param name - Place name (e.g. "Austin")
   * @param options - Optional country restriction
   * @returns Position and country of the best match, or null
   * @throws HereApiError on API errors
   */
  async geocode(name: string, options: GeocodeOptions = {}): Promise<GeocodeResult | null> {
    const params = new URLSearchParams({ q: name, limit: '1' });
    if (options.countryHint) {
      params.set('in', `countryCode:${options.countryHint}`);
    }

    const data = await this.getJson(ENDPOINTS.geocode, params, HereGeocodeResponseSchema);

    const best = data.items.find((item) => item.position !== undefined);
    if (!best?.position) {
      return null;
    }

    return {
      coordinates: { lat: best.position.lat, lon: best.position.lng },
      countryCode: best.address?.countryCode,
    };
  }

  /**
   * Discover places matching a query around a position.
   *
   * Results are returned unfiltered; items without a position are skipped.
   *
   * @throws HereApiError on API errors
   */
  async search(query: string, at: Coordinates, limit: number): Promise<PlaceCandidate[]> {
    const params = new URLSearchParams({
      q: query,
      at: `${at.lat},${at.lon}`,
      limit: String(limit),
    });

    const data = await this.getJson(ENDPOINTS.discover, params, HereDiscoverResponseSchema);

    const candidates: PlaceCandidate[] = [];
    for (const item of data.items) {
      if (!item.position) {
        continue;
      }
      candidates.push({
        title: item.title,
        address: item.address.label,
        coordinates: { lat: item.position.lat, lon: item.position.lng },
        isOpen: item.openingHours?.[0]?.isOpen === true,
      });
    }
    return candidates;
  }

  /**
   * Summarize the car route between two positions.
   *
   * Lengths and durations are summed over the route's sections; the encoded
   * path is the first section's flexible polyline (an origin-destination
   * request has a single section).
   *
   * @returns Route summary, or null when HERE finds no route
   * @throws HereApiError on API errors
   */
  async route(start: Coordinates, end: Coordinates): Promise<RouteSummary | null> {
    const params = new URLSearchParams({
      transportMode: DEFAULTS.transportMode,
      origin: `${start.lat},${start.lon}`,
      destination: `${end.lat},${end.lon}`,
      return: 'summary,polyline',
    });

    const data = await this.getJson(ENDPOINTS.routes, params, HereRouteResponseSchema);

    const route = data.routes[0];
    if (!route || route.sections.length === 0) {
      return null;
    }

    let distanceMeters = 0;
    let durationSeconds = 0;
    for (const section of route.sections) {
      distanceMeters += section.summary?.length ?? 0;
      durationSeconds += section.summary?.duration ?? 0;
    }

    return {
      distanceMeters,
      durationSeconds,
      encodedPath: route.sections[0].polyline ?? '',
    };
  }

  /**
   * Get the total number of API calls made by this client.
   */
  getCallCount(): number {
    return this.callCount;
  }

  /**
   * GET an endpoint and validate the JSON body.
   */
  private async getJson<T extends z.ZodTypeAny>(
    endpoint: string,
    params: URLSearchParams,
    schema: T
  ): Promise<z.output<T>> {
    params.set('apiKey', this.apiKey);

    const response = await this.fetchWithTimeout(`${endpoint}?${params.toString()}`);
    if (!response.ok) {
      await this.handleHttpError(response);
    }

    const body: unknown = await response.json();
    this.callCount++;

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new HereApiError(
        `Unexpected response from ${endpoint}: ${parsed.error.message}`,
        502,
        'INVALID_RESPONSE',
        false
      );
    }
    return parsed.data;
  }

  /**
   * Execute fetch with timeout using AbortController.
   *
   * @throws HereApiError with status 'TIMEOUT' when the deadline passes
   */
  private async fetchWithTimeout(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(url, { signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new HereApiError(
          `Request timed out after ${this.timeoutMs}ms`,
          408,
          'TIMEOUT',
          true
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Handle HTTP-level errors.
   *
   * @throws HereApiError with appropriate message and retryable flag
   */
  private async handleHttpError(response: Response): Promise<never> {
    const text = await response.text().catch(() => 'Unknown error');

    const isRetryable = response.status === 429 || response.status >= 500;

    let message: string;
    if (response.status === 429) {
      message = `Rate limit exceeded: ${text}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${text}`;
    } else if (response.status === 401 || response.status === 403) {
      message = 'Authentication failed: Invalid or unauthorized API key';
    } else {
      message = `API error (${response.status}): ${text}`;
    }

    throw new HereApiError(message, response.status, 'HTTP_ERROR', isRetryable);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a HERE API error
 */
export function isHereApiError(error: unknown): error is HereApiError {
  return error instanceof HereApiError;
}

/**
 * Check if an error is a request timeout
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof HereApiError && error.status === 'TIMEOUT';
}
