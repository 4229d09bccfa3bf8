/**
 * Waypoint Normalization
 *
 * Reconciles extracted waypoints with the tagger's generic locations so the
 * same place is never reported twice under different extraction paths.
 *
 * @module dedupe/waypoints
 */

import type { TextMention } from '../schemas/common.js';

/**
 * Drop waypoints already reported elsewhere.
 *
 * A waypoint is removed when its normalized text matches a generic location,
 * the start or end, or an earlier waypoint. Order is preserved.
 *
 * @param waypoints - Waypoint extractor output
 * @param locations - Generic-location extractor output
 * @param exclude - Start/end mentions (null entries are ignored)
 *
 * @example
 * ```typescript
 * normalizeWaypoints(
 *   [createMention('Chicago'), createMention('a diner'), createMention('chicago')],
 *   [createMention('Chicago')]
 * ).map((w) => w.text);
 * // ['a diner']
 * ```
 */
export function normalizeWaypoints(
  waypoints: readonly TextMention[],
  locations: readonly TextMention[],
  exclude: ReadonlyArray<TextMention | null> = []
): TextMention[] {
  const taken = new Set<string>(locations.map((location) => location.normalized));
  for (const mention of exclude) {
    if (mention) {
      taken.add(mention.normalized);
    }
  }

  const unique: TextMention[] = [];
  for (const waypoint of waypoints) {
    if (taken.has(waypoint.normalized)) {
      continue;
    }
    taken.add(waypoint.normalized);
    unique.push(waypoint);
  }

  return unique;
}
