/**
 * Deduplication Module Exports
 *
 * @module dedupe
 */

export { normalizeWaypoints } from './waypoints.js';
export { selectPlaces, placeSignature } from './places.js';
