/**
 * Pipeline Module Exports
 *
 * @module pipeline
 */

export { assembleTrip } from './assembler.js';
export { planTrips, type PlanTripsOptions } from './batch.js';
export { extractQuery } from './extract.js';
export { ConcurrencyLimiter } from './concurrency.js';
export { ResolutionTimeoutError, withTimeout, isResolutionTimeout } from './timeout.js';
export {
  DEFAULT_ASSEMBLE_OPTIONS,
  assembleOptionsFromConfig,
  silentLogger,
  type AssembleOptions,
  type ExtractedQuery,
  type PipelineLogger,
  type PlanOutcome,
  type TripDependencies,
} from './types.js';
