/**
 * CLI Formatters Module Exports
 *
 * @module cli/formatters
 */

export {
  ProgressSpinner,
  createSpinner,
  formatDuration,
  type SpinnerOptions,
} from './progress.js';
export {
  buildDirectionsUrl,
  formatBatchSummary,
  formatCoordinates,
  formatExtraction,
  formatLocation,
  formatRouteDistance,
  formatTravelTime,
  formatTripSummary,
} from './trip-summary.js';
