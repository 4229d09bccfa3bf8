/**
 * Offline resolver used when no HERE_API_KEY is configured.
 *
 * Every lookup yields nothing, so the assembler applies its fallbacks.
 *
 * @module resolver/unavailable
 */

import type { Coordinates } from '../schemas/common.js';
import type { RouteSummary } from '../schemas/trip.js';
import type { GeocodeResult, PlaceCandidate, PlaceResolver, RouteProvider } from './types.js';

export class UnavailableResolver implements PlaceResolver, RouteProvider {
  async geocode(_name: string): Promise<GeocodeResult | null> {
    return null;
  }

  async search(_query: string, _at: Coordinates, _limit: number): Promise<PlaceCandidate[]> {
    return [];
  }

  async route(_start: Coordinates, _end: Coordinates): Promise<RouteSummary | null> {
    return null;
  }
}
