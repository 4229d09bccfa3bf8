/**
 * Constraint Extraction
 *
 * Distance constraints ("rest stops every 300 miles") and time constraints
 * (tagged calendar mentions plus "<N> minutes/hours" durations).
 *
 * @module extract/constraints
 */

import type { TaggedSpan } from '../tagger/types.js';
import type {
  DistanceConstraint,
  DurationConstraint,
  TimeConstraints,
} from '../schemas/trip.js';

const DISTANCE_PATTERN = /\brest stops every (\d+ ?(?:miles|mile|km|kilometers|kilometres))\b/gi;

const DURATION_PATTERN = /\b(\d+\s?(?:minutes|minute|mins|min|hours|hour|hrs|hr))\b/gi;

const QUANTITY_PATTERN = /^(\d+)\s?([a-z]+)$/i;

// ============================================================================
// Distance
// ============================================================================

/**
 * Find rest-stop distance constraints, verbatim.
 *
 * @example
 * ```typescript
 * extractDistanceConstraints('rest stops every 300 miles');
 * // ['300 miles']
 * ```
 */
export function extractDistanceConstraints(text: string): string[] {
  return [...text.matchAll(DISTANCE_PATTERN)].map((match) => match[1]);
}

/**
 * Turn a verbatim distance match into a structured constraint.
 *
 * @returns null when the text is not "<number> <unit>"
 */
export function parseDistanceConstraint(text: string): DistanceConstraint | null {
  const match = QUANTITY_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  return {
    text,
    value: Number(match[1]),
    unit: match[2].toLowerCase().startsWith('k') ? 'km' : 'mi',
  };
}

// ============================================================================
// Time
// ============================================================================

/**
 * Turn a verbatim duration match into a structured constraint.
 */
export function parseDuration(text: string): DurationConstraint | null {
  const match = QUANTITY_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  return {
    text,
    value: Number(match[1]),
    unit: match[2].toLowerCase().startsWith('h') ? 'hours' : 'minutes',
  };
}

/**
 * Find duration mentions ("30 mins", "2 hours"), verbatim.
 */
export function extractDurations(text: string): string[] {
  return [...text.matchAll(DURATION_PATTERN)].map((match) => match[1]);
}

/**
 * Collect time constraints from tagged calendar spans and duration patterns.
 *
 * The two lists are independent; a mention may appear in both.
 */
export function extractTimeConstraints(text: string, spans: readonly TaggedSpan[]): TimeConstraints {
  const times = spans.filter((span) => span.category === 'calendar-time').map((span) => span.text);

  const durations: DurationConstraint[] = [];
  for (const raw of extractDurations(text)) {
    const parsed = parseDuration(raw);
    if (parsed) {
      durations.push(parsed);
    }
  }

  return { times, durations };
}
