/**
 * Trip Summary Formatters
 *
 * Terminal output for assembled trips, extraction-only views and batch
 * outcomes, plus a Google Maps directions link for resolved trips.
 *
 * @module cli/formatters/trip-summary
 */

import chalk from 'chalk';
import type { Coordinates, TextMention } from '../../schemas/common.js';
import type { TripConstraints, TripLocation, TripResult } from '../../schemas/trip.js';
import type { ExtractedQuery, PlanOutcome } from '../../pipeline/types.js';

const GOOGLE_MAPS_DIRECTIONS_URL = 'https://www.google.com/maps/dir/';

// Width of the label column
const LABEL_WIDTH = 12;

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : chalk.dim('none');
}

// ============================================================================
// Value Formatters
// ============================================================================

/**
 * Format coordinates to four decimals (about 10 m).
 */
export function formatCoordinates(coordinates: Coordinates): string {
  return `${coordinates.lat.toFixed(4)},${coordinates.lon.toFixed(4)}`;
}

/**
 * Format a location with its resolution state.
 *
 * @example
 * ```typescript
 * formatLocation(start);
 * // 'Dallas (32.7767,-96.7970 USA)'
 * // 'Atlantis [default 32.7767,-96.7970 USA: not-found]'
 * // 'Nowhere [unresolved: timeout]'
 * ```
 */
export function formatLocation(location: TripLocation): string {
  const { resolution } = location;
  switch (resolution.status) {
    case 'resolved': {
      const country = resolution.countryCode ? ` ${resolution.countryCode}` : '';
      return `${location.text} ${chalk.dim(`(${formatCoordinates(resolution.coordinates)}${country})`)}`;
    }
    case 'fallback':
      return `${location.text} ${chalk.yellow(
        `[default ${formatCoordinates(resolution.coordinates)} ${resolution.countryCode}: ${resolution.reason}]`
      )}`;
    case 'unresolved':
      return `${location.text} ${chalk.red(`[unresolved: ${resolution.reason}]`)}`;
  }
}

/**
 * Format a route length in kilometres and miles.
 */
export function formatRouteDistance(meters: number): string {
  const km = meters / 1000;
  const miles = meters / 1609.344;
  return `${km.toFixed(1)} km (${miles.toFixed(1)} mi)`;
}

/**
 * Format a driving time in hours and minutes.
 *
 * @example
 * ```typescript
 * formatTravelTime(11400); // '3h 10m'
 * formatTravelTime(600);   // '10m'
 * ```
 */
export function formatTravelTime(seconds: number): string {
  const totalMinutes = Math.round(seconds / 60);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

function formatConstraints(constraints: TripConstraints): string[] {
  return [
    row('Rest every', list(constraints.distance.map((d) => d.text))),
    row('Times', list(constraints.time.times)),
    row('Durations', list(constraints.time.durations.map((d) => d.text))),
  ];
}

// ============================================================================
// Directions Link
// ============================================================================

/**
 * Build a Google Maps directions URL for a trip.
 *
 * The origin is the start's coordinates (geocoded or default); each waypoint
 * contributes its first selected place. Returns null unless the end resolved.
 */
export function buildDirectionsUrl(result: TripResult): string | null {
  const origin = result.start.resolution;
  const destination = result.end?.resolution;
  if (origin.status === 'unresolved' || destination?.status !== 'resolved') {
    return null;
  }

  const params = new URLSearchParams({
    api: '1',
    origin: `${origin.coordinates.lat},${origin.coordinates.lon}`,
    destination: `${destination.coordinates.lat},${destination.coordinates.lon}`,
    travelmode: 'driving',
  });

  const stops = result.waypoints
    .map((waypoint) => waypoint.places[0])
    .filter((place) => place !== undefined)
    .map((place) => `${place.coordinates.lat},${place.coordinates.lon}`);
  if (stops.length > 0) {
    params.set('waypoints', stops.join('|'));
  }

  return `${GOOGLE_MAPS_DIRECTIONS_URL}?${params.toString()}`;
}

// ============================================================================
// Summaries
// ============================================================================

/**
 * Format an assembled trip for the terminal.
 */
export function formatTripSummary(result: TripResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Trip ==='));
  lines.push(row('Query', result.query));
  lines.push(row('Intents', list(result.intents)));
  lines.push(row('Start', formatLocation(result.start)));
  lines.push(row('End', result.end ? formatLocation(result.end) : chalk.dim('none')));

  if (result.waypoints.length === 0) {
    lines.push(row('Waypoints', chalk.dim('none')));
  } else {
    lines.push('Waypoints:');
    for (const waypoint of result.waypoints) {
      lines.push(`  - ${waypoint.text}`);
      if (waypoint.places.length === 0) {
        lines.push(chalk.dim('      no open places found'));
      }
      for (const place of waypoint.places) {
        lines.push(`      ${place.title}, ${chalk.dim(place.address)}`);
      }
    }
  }

  lines.push(row('Locations', list(result.locations.map((l) => l.text))));
  lines.push(...formatConstraints(result.constraints));

  if (result.route) {
    lines.push(
      row(
        'Route',
        `${formatRouteDistance(result.route.distanceMeters)}, ${formatTravelTime(result.route.durationSeconds)}`
      )
    );
  }

  const url = buildDirectionsUrl(result);
  if (url) {
    lines.push(row('Directions', chalk.cyan(url)));
  }

  return lines.join('\n');
}

/**
 * Format the extraction-only view of a query.
 */
export function formatExtraction(extracted: ExtractedQuery): string {
  const mentions = (values: readonly TextMention[]): string => list(values.map((v) => v.text));
  const start =
    extracted.start.source === 'default'
      ? `${extracted.start.text} ${chalk.dim('(default)')}`
      : extracted.start.text;

  return [
    chalk.bold('=== Extraction ==='),
    row('Query', extracted.query),
    row('Intents', list(extracted.intents)),
    row('Start', start),
    row('End', extracted.end ? extracted.end.text : chalk.dim('none')),
    row('Waypoints', mentions(extracted.waypoints)),
    row('Locations', mentions(extracted.locations)),
    ...formatConstraints(extracted.constraints),
  ].join('\n');
}

/**
 * Format the closing line of a batch run.
 *
 * @example
 * ```typescript
 * formatBatchSummary(outcomes); // 'Planned 3/4 trips (1 failed)'
 * ```
 */
export function formatBatchSummary(outcomes: readonly PlanOutcome[]): string {
  const failed = outcomes.filter((outcome) => !outcome.ok).length;
  const planned = outcomes.length - failed;
  const suffix = failed > 0 ? chalk.red(` (${failed} failed)`) : '';
  return `Planned ${planned}/${outcomes.length} trips${suffix}`;
}
