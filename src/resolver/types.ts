/**
 * Place Resolver Types
 *
 * Narrow contracts for the geocoding, nearby-search and routing
 * collaborators. Implementations return raw results; filtering and limiting
 * are the caller's job.
 *
 * @module resolver/types
 */

import type { Coordinates } from '../schemas/common.js';
import type { RouteSummary } from '../schemas/trip.js';

export interface GeocodeOptions {
  /** Country code to restrict the lookup to (e.g. 'USA') */
  countryHint?: string;
}

export interface GeocodeResult {
  coordinates: Coordinates;
  countryCode?: string;
}

/**
 * A nearby-search hit, unfiltered.
 */
export interface PlaceCandidate {
  title: string;
  address: string;
  coordinates: Coordinates;
  /** Whether the place reports itself open right now */
  isOpen: boolean;
}

export interface PlaceResolver {
  /**
   * Geocode a place name.
   *
   * @returns null when nothing matches
   */
  geocode(name: string, options?: GeocodeOptions): Promise<GeocodeResult | null>;

  /**
   * Search for places matching a query near a position.
   *
   * May return closed places and duplicates.
   */
  search(query: string, at: Coordinates, limit: number): Promise<PlaceCandidate[]>;
}

export interface RouteProvider {
  /**
   * Summarize the route between two positions.
   *
   * @returns null when no route is available
   */
  route(start: Coordinates, end: Coordinates): Promise<RouteSummary | null>;
}
