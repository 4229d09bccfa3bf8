/**
 * Trip Assembler
 *
 * Turns a natural-language trip request into a resolved TripResult:
 *
 * 1. Extracting: tag the query once, classify intents, run the extractors
 *    and normalize waypoints.
 * 2. Resolving start: geocode the start, or fall back to the default location.
 * 3. Resolving end and waypoints, concurrently: geocode the end within the
 *    start's country; search places for each waypoint around the start.
 * 4. Routing: when both ends resolved, summarize the route between them.
 *
 * Collaborator failures never escape: each one is recorded on the affected
 * location (or as a missing route / empty place list), added to `notices`
 * and logged at warn level.
 *
 * @module pipeline/assembler
 */

import { selectPlaces } from '../dedupe/index.js';
import type { Coordinates, TextMention } from '../schemas/common.js';
import type { StartMention } from '../extract/index.js';
import type {
  FailureReason,
  LocationResolution,
  RouteSummary,
  TripLocation,
  TripResult,
  Waypoint,
} from '../schemas/trip.js';
import type { TaggedSpan } from '../tagger/types.js';
import { ConcurrencyLimiter } from './concurrency.js';
import { extractQuery } from './extract.js';
import { isResolutionTimeout, withTimeout } from './timeout.js';
import {
  DEFAULT_ASSEMBLE_OPTIONS,
  silentLogger,
  type AssembleOptions,
  type PipelineLogger,
  type TripDependencies,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

type CallFailure = Exclude<FailureReason, 'current-location'>;

type Attempt<T> =
  | { ok: true; value: T }
  | { ok: false; reason: Exclude<CallFailure, 'not-found'>; message: string };

interface AssemblyContext {
  deps: TripDependencies;
  options: AssembleOptions;
  logger: PipelineLogger;
  notices: string[];
}

interface ResolvedStart {
  location: TripLocation;
  /** Anchor for waypoint searches (geocoded or default) */
  coordinates: Coordinates;
  countryCode?: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Run a collaborator call under the per-call deadline, capturing failures.
 */
async function attempt<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operationName: string
): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await withTimeout(fn(), timeoutMs, operationName) };
  } catch (error) {
    return {
      ok: false,
      reason: isResolutionTimeout(error) ? 'timeout' : 'error',
      message: error instanceof Error ? error.message : String(error),
    };
  }
}

function describeFailure(reason: CallFailure, timeoutMs: number, message?: string): string {
  switch (reason) {
    case 'not-found':
      return 'found no match';
    case 'timeout':
      return `timed out after ${timeoutMs}ms`;
    case 'error':
      return `failed: ${message ?? 'unknown error'}`;
  }
}

function report(ctx: AssemblyContext, notice: string): void {
  ctx.notices.push(notice);
  ctx.logger.warn(notice);
}

function formatDefault(options: AssembleOptions): string {
  const { coordinates, countryCode } = options.defaultLocation;
  return `${coordinates.lat},${coordinates.lon} (${countryCode})`;
}

/**
 * Recursively freeze a plain data structure.
 */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

// ============================================================================
// Stages
// ============================================================================

async function tagQuery(query: string, ctx: AssemblyContext): Promise<TaggedSpan[]> {
  const tagged = await attempt(
    () => ctx.deps.tagger.tag(query),
    ctx.options.timeoutMs,
    'Entity tagging'
  );
  if (tagged.ok) {
    return tagged.value;
  }

  report(
    ctx,
    `Entity tagging ${describeFailure(tagged.reason, ctx.options.timeoutMs, tagged.message)}; ` +
      'continuing without tagged entities'
  );
  return [];
}

async function resolveStart(start: StartMention, ctx: AssemblyContext): Promise<ResolvedStart> {
  const { source, ...mention } = start;
  const { defaultLocation, timeoutMs } = ctx.options;

  const fallback = (reason: FailureReason): ResolvedStart => ({
    location: {
      ...mention,
      source,
      resolution: {
        status: 'fallback',
        coordinates: { ...defaultLocation.coordinates },
        countryCode: defaultLocation.countryCode,
        reason,
      },
    },
    coordinates: { ...defaultLocation.coordinates },
    countryCode: defaultLocation.countryCode,
  });

  // The sentinel start is never sent to the geocoder
  if (source === 'default') {
    const notice = `No start location in query; using default location ${formatDefault(ctx.options)}`;
    ctx.notices.push(notice);
    ctx.logger.debug(notice);
    return fallback('current-location');
  }

  const geocoded = await attempt(
    () => ctx.deps.resolver.geocode(mention.text),
    timeoutMs,
    `Geocoding start "${mention.text}"`
  );

  if (geocoded.ok && geocoded.value) {
    const { coordinates, countryCode } = geocoded.value;
    return {
      location: {
        ...mention,
        source,
        resolution: { status: 'resolved', coordinates: { ...coordinates }, countryCode },
      },
      coordinates: { ...coordinates },
      countryCode,
    };
  }

  const reason: CallFailure = geocoded.ok ? 'not-found' : geocoded.reason;
  report(
    ctx,
    `Geocoding start "${mention.text}" ${describeFailure(
      reason,
      timeoutMs,
      geocoded.ok ? undefined : geocoded.message
    )}; using default location ${formatDefault(ctx.options)}`
  );
  return fallback(reason);
}

async function resolveEnd(
  mention: TextMention | null,
  countryHint: string | undefined,
  ctx: AssemblyContext
): Promise<TripLocation | null> {
  if (!mention) {
    return null;
  }

  const { timeoutMs } = ctx.options;
  const geocoded = await attempt(
    () => ctx.deps.resolver.geocode(mention.text, { countryHint }),
    timeoutMs,
    `Geocoding end "${mention.text}"`
  );

  let resolution: LocationResolution;
  if (geocoded.ok && geocoded.value) {
    resolution = {
      status: 'resolved',
      coordinates: { ...geocoded.value.coordinates },
      countryCode: geocoded.value.countryCode,
    };
  } else {
    const reason: CallFailure = geocoded.ok ? 'not-found' : geocoded.reason;
    report(
      ctx,
      `Geocoding end "${mention.text}" ${describeFailure(
        reason,
        timeoutMs,
        geocoded.ok ? undefined : geocoded.message
      )}`
    );
    resolution = { status: 'unresolved', reason };
  }

  return { ...mention, source: 'query', resolution };
}

async function resolveWaypoints(
  waypoints: readonly TextMention[],
  anchor: Coordinates,
  ctx: AssemblyContext
): Promise<Waypoint[]> {
  const { concurrency, searchFetchLimit, timeoutMs, waypointLimit } = ctx.options;
  const limiter = new ConcurrencyLimiter(concurrency);
  const fetchLimit = Math.max(searchFetchLimit, waypointLimit);

  return Promise.all(
    waypoints.map(async (waypoint): Promise<Waypoint> => {
      const searched = await limiter.run(() =>
        attempt(
          () => ctx.deps.resolver.search(waypoint.text, anchor, fetchLimit),
          timeoutMs,
          `Place search for "${waypoint.text}"`
        )
      );

      if (!searched.ok) {
        report(
          ctx,
          `Place search for "${waypoint.text}" ${describeFailure(
            searched.reason,
            timeoutMs,
            searched.message
          )}`
        );
        return { ...waypoint, places: [] };
      }

      return { ...waypoint, places: selectPlaces(searched.value, waypointLimit) };
    })
  );
}

async function resolveRoute(
  start: TripLocation,
  end: TripLocation | null,
  ctx: AssemblyContext
): Promise<RouteSummary | null> {
  if (!end) {
    return null;
  }
  const origin = start.resolution;
  const destination = end.resolution;
  if (origin.status !== 'resolved' || destination.status !== 'resolved') {
    return null;
  }

  const { timeoutMs } = ctx.options;
  const from = origin.coordinates;
  const to = destination.coordinates;
  const label = `Routing from "${start.text}" to "${end.text}"`;

  const routed = await attempt(() => ctx.deps.router.route(from, to), timeoutMs, label);
  if (routed.ok && routed.value) {
    return { ...routed.value };
  }

  report(
    ctx,
    `${label} ${describeFailure(
      routed.ok ? 'not-found' : routed.reason,
      timeoutMs,
      routed.ok ? undefined : routed.message
    )}`
  );
  return null;
}

// ============================================================================
// Assembly
// ============================================================================

/**
 * Assemble a resolved trip from a natural-language request.
 *
 * Never rejects because of a collaborator failure; the returned result is
 * deeply frozen.
 *
 * @param query - Raw request text
 * @param deps - Tagger, resolver, router and optional logger
 * @param options - Overrides for {@link DEFAULT_ASSEMBLE_OPTIONS}
 *
 * @example
 * ```typescript
 * const result = await assembleTrip(
 *   'Plan a trip from Dallas to Austin with a stop at a Walmart and a coffee shop.',
 *   { tagger: new PatternEntityTagger(), resolver: here, router: here }
 * );
 * result.waypoints.map((w) => w.places.length);
 * ```
 */
export async function assembleTrip(
  query: string,
  deps: TripDependencies,
  options: Partial<AssembleOptions> = {}
): Promise<TripResult> {
  const ctx: AssemblyContext = {
    deps,
    options: { ...DEFAULT_ASSEMBLE_OPTIONS, ...options },
    logger: deps.logger ?? silentLogger,
    notices: [],
  };

  ctx.logger.debug(`Assembling trip: ${query}`);

  const spans = await tagQuery(query, ctx);
  const extracted = extractQuery(query, spans);

  const start = await resolveStart(extracted.start, ctx);

  const [end, waypoints] = await Promise.all([
    resolveEnd(extracted.end, start.countryCode, ctx),
    resolveWaypoints(extracted.waypoints, start.coordinates, ctx),
  ]);

  const route = await resolveRoute(start.location, end, ctx);

  return deepFreeze({
    query,
    intents: extracted.intents,
    start: start.location,
    end,
    waypoints,
    locations: extracted.locations,
    constraints: extracted.constraints,
    route,
    notices: ctx.notices,
  });
}
