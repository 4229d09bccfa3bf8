/**
 * Common Zod Schemas - Shared types used across the pipeline
 */

import { z } from 'zod';

// ============================================
// Coordinates Schema
// ============================================

/**
 * Geographic coordinates (latitude/longitude).
 */
export const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export type Coordinates = z.infer<typeof CoordinatesSchema>;

// ============================================
// Text Mention Schema
// ============================================

/**
 * A span of the query text.
 *
 * `text` keeps the casing of the query; `normalized` is the comparison key
 * (lower-cased, whitespace collapsed). Two mentions with the same `normalized`
 * value refer to the same place.
 */
export const TextMentionSchema = z.object({
  text: z.string().min(1),
  normalized: z.string().min(1),
});

export type TextMention = z.infer<typeof TextMentionSchema>;

// ============================================
// Helper Functions
// ============================================

/**
 * Build the comparison key for a piece of query text.
 *
 * @example
 * ```typescript
 * normalizeMention('  A   Walmart ');
 * // Returns: 'a walmart'
 * ```
 */
export function normalizeMention(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Create a TextMention from raw query text.
 */
export function createMention(text: string): TextMention {
  const trimmed = text.replace(/\s+/g, ' ').trim();
  return { text: trimmed, normalized: normalizeMention(trimmed) };
}
