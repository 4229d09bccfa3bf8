/**
 * Generic Location Extraction
 *
 * Named places reported by the entity tagger, other than the trip's start
 * and end.
 *
 * @module extract/locations
 */

import { createMention, type TextMention } from '../schemas/common.js';
import { LOCATION_CATEGORIES, type TaggedSpan } from '../tagger/types.js';

/**
 * Keep place/facility spans whose text is not an excluded location.
 *
 * Comparison uses the normalized text; repeats keep their first occurrence.
 *
 * @param spans - Tagger output for the query
 * @param exclude - Start/end mentions (null entries are ignored)
 */
export function extractGenericLocations(
  spans: readonly TaggedSpan[],
  exclude: ReadonlyArray<TextMention | null> = []
): TextMention[] {
  const seen = new Set<string>();
  for (const mention of exclude) {
    if (mention) {
      seen.add(mention.normalized);
    }
  }

  const locations: TextMention[] = [];
  for (const span of spans) {
    if (!LOCATION_CATEGORIES.has(span.category) || !span.text.trim()) {
      continue;
    }

    const mention = createMention(span.text);
    if (seen.has(mention.normalized)) {
      continue;
    }

    seen.add(mention.normalized);
    locations.push(mention);
  }

  return locations;
}
