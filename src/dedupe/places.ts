/**
 * Candidate Place Selection
 *
 * Applies the open/dedupe/limit policy to raw nearby-search results.
 *
 * @module dedupe/places
 */

import type { Place } from '../schemas/trip.js';
import type { PlaceCandidate } from '../resolver/types.js';

/**
 * Identity of a candidate for deduplication.
 */
export function placeSignature(place: Pick<PlaceCandidate, 'title' | 'address'>): string {
  return `${place.title}|${place.address}`;
}

/**
 * Select the best places for a waypoint.
 *
 * Closed candidates are dropped, then repeated (title, address) pairs, then
 * the first `limit` survivors are kept in collaborator order.
 *
 * @example
 * ```typescript
 * selectPlaces([
 *   { title: 'Walmart', address: '1 Main St', isOpen: true, coordinates },
 *   { title: 'Walmart', address: '1 Main St', isOpen: true, coordinates },
 *   { title: 'Walmart', address: '9 Elm St', isOpen: false, coordinates },
 * ], 2);
 * // [{ title: 'Walmart', address: '1 Main St', coordinates }]
 * ```
 */
export function selectPlaces(candidates: readonly PlaceCandidate[], limit: number): Place[] {
  const seen = new Set<string>();
  const selected: Place[] = [];

  for (const candidate of candidates) {
    if (selected.length >= limit) {
      break;
    }
    if (!candidate.isOpen) {
      continue;
    }

    const signature = placeSignature(candidate);
    if (seen.has(signature)) {
      continue;
    }
    seen.add(signature);

    selected.push({
      title: candidate.title,
      address: candidate.address,
      coordinates: { ...candidate.coordinates },
    });
  }

  return selected;
}
