/**
 * Trip Schemas
 *
 * Shapes produced by the query-understanding pipeline: intents, locations with
 * their resolution status, waypoints with candidate places, constraints and
 * the assembled TripResult.
 *
 * @module schemas/trip
 */

import { z } from 'zod';
import { CoordinatesSchema, TextMentionSchema } from './common.js';

// ============================================
// Intent Schema
// ============================================

/**
 * Closed set of routing intents a query can carry.
 */
export const INTENTS = [
  'Basic Navigation',
  'Multi-Stop',
  'Time-Constrained',
  'Traffic-Aware',
  'Scenic Routing',
  'Fuel-Efficient',
  'Avoiding Tolls',
  'Avoiding Highways',
  'Weather-Based',
  'EV Charging',
  'Emergency Routing',
  'Parking Availability',
  'Shortest',
  'Rest Stop',
  'Night Stay',
] as const;

export const IntentSchema = z.enum(INTENTS);

export type Intent = z.infer<typeof IntentSchema>;

// ============================================
// Resolution Schemas
// ============================================

/**
 * Why a location did not resolve to a geocoded position.
 * - 'not-found': the collaborator answered with no match
 * - 'timeout': the call exceeded its deadline
 * - 'error': the call failed (HTTP, network, malformed response)
 * - 'current-location': the query named no start, so none was looked up
 */
export const FailureReasonSchema = z.enum(['not-found', 'timeout', 'error', 'current-location']);

export type FailureReason = z.infer<typeof FailureReasonSchema>;

/**
 * Resolution outcome for a start or end location.
 *
 * 'fallback' carries the configured default position, so consumers can always
 * tell a substituted coordinate from a geocoded one.
 */
export const LocationResolutionSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('resolved'),
    coordinates: CoordinatesSchema,
    countryCode: z.string().optional(),
  }),
  z.object({
    status: z.literal('fallback'),
    coordinates: CoordinatesSchema,
    countryCode: z.string(),
    reason: FailureReasonSchema,
  }),
  z.object({
    status: z.literal('unresolved'),
    reason: FailureReasonSchema,
  }),
]);

export type LocationResolution = z.infer<typeof LocationResolutionSchema>;

/**
 * Where a location's text came from.
 */
export const LocationSourceSchema = z.enum(['query', 'default']);

export type LocationSource = z.infer<typeof LocationSourceSchema>;

export const TripLocationSchema = TextMentionSchema.extend({
  source: LocationSourceSchema,
  resolution: LocationResolutionSchema,
});

export type TripLocation = z.infer<typeof TripLocationSchema>;

// ============================================
// Place & Waypoint Schemas
// ============================================

/**
 * A real-world place proposed for a waypoint.
 */
export const PlaceSchema = z.object({
  title: z.string(),
  address: z.string(),
  coordinates: CoordinatesSchema,
});

export type Place = z.infer<typeof PlaceSchema>;

export const WaypointSchema = TextMentionSchema.extend({
  places: z.array(PlaceSchema),
});

export type Waypoint = z.infer<typeof WaypointSchema>;

// ============================================
// Constraint Schemas
// ============================================

export const DistanceConstraintSchema = z.object({
  /** Verbatim match, e.g. "300 miles" */
  text: z.string(),
  value: z.number().nonnegative(),
  unit: z.enum(['mi', 'km']),
});

export type DistanceConstraint = z.infer<typeof DistanceConstraintSchema>;

export const DurationConstraintSchema = z.object({
  /** Verbatim match, e.g. "30 mins" */
  text: z.string(),
  value: z.number().nonnegative(),
  unit: z.enum(['minutes', 'hours']),
});

export type DurationConstraint = z.infer<typeof DurationConstraintSchema>;

export const TimeConstraintsSchema = z.object({
  /** Calendar/clock mentions reported by the entity tagger */
  times: z.array(z.string()),
  durations: z.array(DurationConstraintSchema),
});

export type TimeConstraints = z.infer<typeof TimeConstraintsSchema>;

export const TripConstraintsSchema = z.object({
  distance: z.array(DistanceConstraintSchema),
  time: TimeConstraintsSchema,
});

export type TripConstraints = z.infer<typeof TripConstraintsSchema>;

// ============================================
// Route Summary Schema
// ============================================

export const RouteSummarySchema = z.object({
  distanceMeters: z.number().nonnegative(),
  durationSeconds: z.number().nonnegative(),
  /** Encoded path as returned by the routing provider (not decoded here) */
  encodedPath: z.string(),
});

export type RouteSummary = z.infer<typeof RouteSummarySchema>;

// ============================================
// Trip Result Schema
// ============================================

export const TripResultSchema = z.object({
  query: z.string(),
  intents: z.array(IntentSchema),
  start: TripLocationSchema,
  end: TripLocationSchema.nullable(),
  waypoints: z.array(WaypointSchema),
  /** Named places from the entity tagger that are neither start, end nor waypoint */
  locations: z.array(TextMentionSchema),
  constraints: TripConstraintsSchema,
  route: RouteSummarySchema.nullable(),
  /** Human-readable diagnostics for every fallback that was applied */
  notices: z.array(z.string()),
});

export type TripResult = z.infer<typeof TripResultSchema>;
