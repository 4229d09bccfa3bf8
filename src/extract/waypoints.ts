/**
 * Waypoint Extraction
 *
 * Pulls intermediate stops out of phrases such as "stop at", "via" and
 * "night stay in". Each capture may list several stops separated by commas
 * or "and".
 *
 * @module extract/waypoints
 */

import { createMention, type TextMention } from '../schemas/common.js';

/**
 * Trigger patterns, applied in order. "stop at" captures end at punctuation;
 * the list-style triggers may span commas.
 */
const WAYPOINT_PATTERNS: readonly RegExp[] = [
  /\bstop at ([\w\s]+)/gi,
  /\bnight stay (?:at|in) ([\w\s,]+)/gi,
  /\bvia ([\w\s,]+)/gi,
  /\bquick stop at ([\w\s]+)/gi,
];

const LIST_SEPARATOR = /,|\band\b/i;

/**
 * Split a captured list into individual stop descriptions.
 *
 * @example
 * ```typescript
 * splitWaypointList('a gas station and pharmacy, an ATM');
 * // ['a gas station', 'pharmacy', 'an ATM']
 * ```
 */
export function splitWaypointList(capture: string): string[] {
  return capture
    .split(LIST_SEPARATOR)
    .map((part) => part.replace(/\s+/g, ' ').trim())
    .filter((part) => part.length > 0);
}

/**
 * Extract waypoint mentions in pattern order, then match order.
 *
 * Repeats are kept here (e.g. "quick stop at" also matches "stop at");
 * the normalizer removes them.
 *
 * @example
 * ```typescript
 * extractWaypoints('with a stop at a Walmart and a coffee shop.').map((w) => w.normalized);
 * // ['a walmart', 'a coffee shop']
 * ```
 */
export function extractWaypoints(text: string): TextMention[] {
  const waypoints: TextMention[] = [];

  for (const pattern of WAYPOINT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      for (const part of splitWaypointList(match[1])) {
        waypoints.push(createMention(part));
      }
    }
  }

  return waypoints;
}
