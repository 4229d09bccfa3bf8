/**
 * Pattern Entity Tagger
 *
 * Offline tagger built from capitalization and calendar patterns. It needs no
 * model download or network access and is the default backend.
 *
 * - Runs of capitalized words become 'place' spans, or 'facility' spans when
 *   the run ends in a facility noun ("Love Field Airport").
 * - Clock times, weekdays, months and relative days become 'calendar-time'.
 *
 * @module tagger/pattern
 */

import type { EntityTagger, TaggedSpan } from './types.js';

// ============================================================================
// Constants
// ============================================================================

const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

/**
 * Calendar patterns, most specific first. Overlapping matches keep the
 * earliest, then longest, span.
 */
const TIME_PATTERNS: readonly RegExp[] = [
  /\b\d{1,2}(?::\d{2})?\s?(?:(?:am|pm)\b|[ap]\.m\.)/gi,
  /\b\d{1,2}:\d{2}\b/g,
  new RegExp(
    `\\b(?:this|next|last)\\s+(?:morning|afternoon|evening|night|weekend|week|${WEEKDAYS.join('|')})\\b`,
    'gi'
  ),
  // Month names only when capitalized ("may", "march" are also verbs)
  new RegExp(`\\b(?:${MONTHS.map(capitalize).join('|')})(?:\\s+\\d{1,2}(?:st|nd|rd|th)?)?\\b`, 'g'),
  new RegExp(`\\b(?:${WEEKDAYS.join('|')})s?\\b`, 'gi'),
  /\b(?:noon|midnight|tonight|today|tomorrow)\b/gi,
];

/**
 * Capitalized words that do not start a place name when they open a sentence.
 */
const SENTENCE_STARTERS: ReadonlySet<string> = new Set([
  'a', 'an', 'the', 'i', 'we', 'my', 'our', 'me', 'please', 'can', 'could', 'would',
  'plan', 'navigate', 'drive', 'find', 'show', 'take', 'get', 'go', 'give', 'route',
  'need', 'want', 'help', 'book', 'head', 'travel', 'start', 'make', 'let', "let's",
  'what', 'where', 'how', 'when', 'is', 'are', 'from', 'to', 'with', 'and', 'hey', 'hi',
  'stop', 'meet', 'leave', 'visit', 'avoid', 'show', 'i\'m', 'i\'d',
]);

/**
 * Words that are never part of a place name.
 */
const NEVER_PLACE: ReadonlySet<string> = new Set(['i', ...WEEKDAYS, ...MONTHS]);

/**
 * Trailing nouns that mark a facility rather than a settlement or region.
 */
const FACILITY_NOUNS: ReadonlySet<string> = new Set([
  'airport', 'station', 'terminal', 'hospital', 'clinic', 'mall', 'center', 'centre',
  'stadium', 'arena', 'museum', 'bridge', 'park', 'hotel', 'university', 'college',
  'market', 'pier', 'plaza', 'tower', 'zoo',
]);

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

const WORD_PATTERN = /[A-Za-z][A-Za-z'’-]*/g;

// ============================================================================
// Calendar Spans
// ============================================================================

interface Match {
  index: number;
  text: string;
}

/**
 * Find calendar/clock mentions in a text, in order of appearance.
 *
 * @example
 * ```typescript
 * tagCalendarTimes('Leave next Friday at 7:30 am');
 * // [{ text: 'next Friday', ... }, { text: '7:30 am', ... }]
 * ```
 */
export function tagCalendarTimes(text: string): TaggedSpan[] {
  const matches: Match[] = [];

  for (const pattern of TIME_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      matches.push({ index: match.index ?? 0, text: match[0].trim() });
    }
  }

  matches.sort((a, b) => a.index - b.index || b.text.length - a.text.length);

  const spans: TaggedSpan[] = [];
  let coveredUntil = -1;
  for (const match of matches) {
    if (match.index < coveredUntil) {
      continue;
    }
    spans.push({ text: match.text, category: 'calendar-time' });
    coveredUntil = match.index + match.text.length;
  }

  return spans;
}

// ============================================================================
// Place Spans
// ============================================================================

/**
 * Find runs of capitalized words that look like place names.
 */
export function tagPlaceNames(text: string): TaggedSpan[] {
  const spans: TaggedSpan[] = [];
  let run: string[] = [];
  let previousEnd = 0;

  const flush = (): void => {
    if (run.length === 0) {
      return;
    }
    const last = run[run.length - 1].toLowerCase();
    spans.push({
      text: run.join(' '),
      category: run.length > 1 && FACILITY_NOUNS.has(last) ? 'facility' : 'place',
    });
    run = [];
  };

  for (const match of text.matchAll(WORD_PATTERN)) {
    const word = match[0];
    const index = match.index ?? 0;
    const gap = text.slice(previousEnd, index);
    previousEnd = index + word.length;

    const sentenceStart = index === 0 || /[.!?]\s*$/.test(text.slice(0, index));
    const lower = word.toLowerCase();
    const capitalized = /^[A-Z]/.test(word) && !isShortAcronym(word);

    // A run continues only across plain whitespace
    if (run.length > 0 && !/^\s+$/.test(gap)) {
      flush();
    }

    if (
      !capitalized ||
      NEVER_PLACE.has(lower) ||
      (sentenceStart && SENTENCE_STARTERS.has(lower))
    ) {
      flush();
      continue;
    }

    run.push(word);
  }

  flush();
  return spans;
}

/**
 * Short all-caps tokens (ATM, EV, GPS) are not place names.
 */
function isShortAcronym(word: string): boolean {
  return word.length <= 3 && word === word.toUpperCase();
}

// ============================================================================
// Tagger
// ============================================================================

/**
 * PatternEntityTagger implements EntityTagger without any external service.
 *
 * @example
 * ```typescript
 * const tagger = new PatternEntityTagger();
 * await tagger.tag('Drive from San Francisco to Napa Valley tomorrow');
 * // [{ text: 'San Francisco', category: 'place' },
 * //  { text: 'Napa Valley', category: 'place' },
 * //  { text: 'tomorrow', category: 'calendar-time' }]
 * ```
 */
export class PatternEntityTagger implements EntityTagger {
  readonly name = 'pattern';

  async tag(text: string): Promise<TaggedSpan[]> {
    return [...tagPlaceNames(text), ...tagCalendarTimes(text)];
  }
}
