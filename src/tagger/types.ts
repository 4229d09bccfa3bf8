/**
 * Entity Tagger Types
 *
 * Named-entity recognition is an external capability: the pipeline only
 * consumes typed spans over the query text.
 *
 * @module tagger/types
 */

/**
 * Entity categories the pipeline cares about.
 * - 'place': cities, regions, named geographic locations
 * - 'facility': airports, stations, venues, businesses
 * - 'calendar-time': dates, weekdays, clock times
 * - 'other': anything else a backend reports
 */
export type EntityCategory = 'place' | 'facility' | 'calendar-time' | 'other';

/**
 * A typed span reported by a tagger.
 */
export interface TaggedSpan {
  /** Span text as it appears in the query */
  text: string;
  category: EntityCategory;
}

/**
 * Entity tagger contract.
 *
 * Implementations must not throw for ordinary inputs; an empty array means
 * nothing was recognised.
 */
export interface EntityTagger {
  /** Identifier used in diagnostics */
  readonly name: string;

  tag(text: string): Promise<TaggedSpan[]>;
}

/**
 * Categories that denote a location.
 */
export const LOCATION_CATEGORIES: ReadonlySet<EntityCategory> = new Set(['place', 'facility']);
