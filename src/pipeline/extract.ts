/**
 * Extraction Stage
 *
 * Runs the classifier and every span extractor over a query and its tagged
 * spans, then normalizes the waypoints. No collaborator is called here.
 *
 * @module pipeline/extract
 */

import { classifyIntents } from '../intent/index.js';
import {
  extractDistanceConstraints,
  extractGenericLocations,
  extractStartEnd,
  extractTimeConstraints,
  extractWaypoints,
  parseDistanceConstraint,
} from '../extract/index.js';
import { normalizeWaypoints } from '../dedupe/index.js';
import type { DistanceConstraint } from '../schemas/trip.js';
import type { TaggedSpan } from '../tagger/types.js';
import type { ExtractedQuery } from './types.js';

/**
 * Build the unresolved view of a trip request.
 *
 * @param query - Raw request text
 * @param spans - Entity tagger output for the same text
 *
 * @example
 * ```typescript
 * const spans = await new PatternEntityTagger().tag(query);
 * const extracted = extractQuery(query, spans);
 * extracted.waypoints.map((w) => w.normalized);
 * ```
 */
export function extractQuery(query: string, spans: readonly TaggedSpan[]): ExtractedQuery {
  const { start, end } = extractStartEnd(query);
  const startEnd = [start, end];

  const locations = extractGenericLocations(spans, startEnd);
  const waypoints = normalizeWaypoints(extractWaypoints(query), locations, startEnd);

  const distance: DistanceConstraint[] = [];
  for (const match of extractDistanceConstraints(query)) {
    const parsed = parseDistanceConstraint(match);
    if (parsed) {
      distance.push(parsed);
    }
  }

  return {
    query,
    intents: [...classifyIntents(query)],
    start,
    end,
    waypoints,
    locations,
    constraints: {
      distance,
      time: extractTimeConstraints(query, spans),
    },
  };
}
