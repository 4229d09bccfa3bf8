/**
 * Pipeline Type Definitions
 *
 * Contracts between the trip assembler, its collaborators and its callers.
 *
 * @module pipeline/types
 */

import type { Config } from '../config/index.js';
import type { Coordinates, TextMention } from '../schemas/common.js';
import type { DistanceConstraint, Intent, TimeConstraints, TripResult } from '../schemas/trip.js';
import type { EntityTagger } from '../tagger/types.js';
import type { PlaceResolver, RouteProvider } from '../resolver/types.js';
import type { StartMention } from '../extract/start-end.js';

// ============================================================================
// Logging
// ============================================================================

/**
 * Minimal logger the pipeline reports through.
 *
 * The CLI's BaseCommand implements it; library callers may pass console.
 */
export interface PipelineLogger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything.
 */
export const silentLogger: PipelineLogger = {
  debug: () => undefined,
  warn: () => undefined,
};

// ============================================================================
// Assembly
// ============================================================================

/**
 * External collaborators used to resolve a trip.
 */
export interface TripDependencies {
  tagger: EntityTagger;
  resolver: PlaceResolver;
  router: RouteProvider;
  logger?: PipelineLogger;
}

/**
 * Tuning for a single assembly.
 */
export interface AssembleOptions {
  /** Substituted when the start cannot be geocoded */
  defaultLocation: {
    coordinates: Coordinates;
    countryCode: string;
  };
  /** Deadline for each collaborator call */
  timeoutMs: number;
  /** Places kept per waypoint (K) */
  waypointLimit: number;
  /** Candidates requested per waypoint search */
  searchFetchLimit: number;
  /** Concurrent waypoint searches (and concurrent queries in a batch) */
  concurrency: number;
}

export const DEFAULT_ASSEMBLE_OPTIONS: AssembleOptions = {
  defaultLocation: {
    coordinates: { lat: 32.7767, lon: -96.797 },
    countryCode: 'USA',
  },
  timeoutMs: 5000,
  waypointLimit: 2,
  searchFetchLimit: 10,
  concurrency: 3,
};

/**
 * Derive assembly options from application configuration.
 */
export function assembleOptionsFromConfig(
  cfg: Pick<Config, 'defaultLocation' | 'resolver' | 'concurrency'>
): AssembleOptions {
  return {
    defaultLocation: {
      coordinates: { ...cfg.defaultLocation.coordinates },
      countryCode: cfg.defaultLocation.countryCode,
    },
    timeoutMs: cfg.resolver.timeoutMs,
    waypointLimit: cfg.resolver.waypointLimit,
    searchFetchLimit: cfg.resolver.searchFetchLimit,
    concurrency: cfg.concurrency,
  };
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Everything that can be read from the query text alone.
 */
export interface ExtractedQuery {
  query: string;
  intents: Intent[];
  start: StartMention;
  end: TextMention | null;
  /** Normalized: disjoint from locations, start and end */
  waypoints: TextMention[];
  locations: TextMention[];
  constraints: {
    distance: DistanceConstraint[];
    time: TimeConstraints;
  };
}

// ============================================================================
// Batch
// ============================================================================

export type PlanOutcome =
  | { query: string; ok: true; result: TripResult }
  | { query: string; ok: false; error: string };
