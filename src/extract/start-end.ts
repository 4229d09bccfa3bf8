/**
 * Start/End Extraction
 *
 * Finds an explicit "from <X> to <Y>" pair in a trip request.
 *
 * @module extract/start-end
 */

import { createMention, type TextMention } from '../schemas/common.js';
import type { LocationSource } from '../schemas/trip.js';

/**
 * Start text used when the query names no origin.
 */
export const CURRENT_LOCATION = 'current location';

/**
 * `<X>` runs from "from" to the next whole-word "to"; `<Y>` runs up to the first
 * punctuation stop, a joining word (with, without, but, and) or end of text.
 */
const START_END_PATTERN =
  /\bfrom\s+(.+?)\s+to\s+(.+?)(?=\s*[,.;!?]|\s+(?:with|without|but|and)\b|\s*$)/i;

export interface StartMention extends TextMention {
  /** 'default' when the query named no origin and the sentinel is used */
  source: LocationSource;
}

export interface StartEndMentions {
  start: StartMention;
  /** null when the query has no "from ... to" pair */
  end: TextMention | null;
}

/**
 * Extract the start and end locations of a trip request.
 *
 * Matching is case-insensitive; the returned text keeps the query's casing.
 *
 * @example
 * ```typescript
 * extractStartEnd('Plan a trip from Dallas to Austin with a stop at a Walmart.');
 * // { start: { text: 'Dallas', normalized: 'dallas', source: 'query' },
 * //   end: { text: 'Austin', normalized: 'austin' } }
 *
 * extractStartEnd('Find a gas station nearby');
 * // { start: { text: 'current location', ..., source: 'default' }, end: null }
 * ```
 */
export function extractStartEnd(text: string): StartEndMentions {
  const match = START_END_PATTERN.exec(text);

  if (!match) {
    return {
      start: { ...createMention(CURRENT_LOCATION), source: 'default' },
      end: null,
    };
  }

  return {
    start: { ...createMention(match[1]), source: 'query' },
    end: createMention(match[2]),
  };
}
