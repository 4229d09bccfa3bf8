/**
 * Span Extractors Module Exports
 *
 * @module extract
 */

export {
  CURRENT_LOCATION,
  extractStartEnd,
  type StartEndMentions,
  type StartMention,
} from './start-end.js';
export { extractWaypoints, splitWaypointList } from './waypoints.js';
export {
  extractDistanceConstraints,
  extractDurations,
  extractTimeConstraints,
  parseDistanceConstraint,
  parseDuration,
} from './constraints.js';
export { extractGenericLocations } from './locations.js';
