/**
 * Intent Classifier
 *
 * Maps a free-form trip request to the set of routing intents it mentions.
 * Each intent owns a list of trigger phrases (see ./triggers.json); an intent
 * is detected when any of its triggers occurs in the lower-cased query as a
 * whole word or phrase.
 *
 * @module intent/classifier
 */

import { z } from 'zod';
import { INTENTS, IntentSchema, type Intent } from '../schemas/trip.js';
import triggerTable from './triggers.json';

// ============================================================================
// Trigger Table
// ============================================================================

const TriggerTableSchema = z.record(IntentSchema, z.array(z.string().min(1)).min(1));

/**
 * Compiled trigger for one phrase.
 */
interface CompiledTrigger {
  phrase: string;
  pattern: RegExp;
}

/**
 * Escape a phrase for use inside a RegExp.
 */
function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a trigger phrase into a whole-word matcher, so that "by" does not
 * fire inside "Albany".
 */
function compileTrigger(phrase: string): CompiledTrigger {
  const lowered = phrase.toLowerCase();
  return { phrase: lowered, pattern: new RegExp(`\\b${escapeRegExp(lowered)}\\b`) };
}

/**
 * Intent → compiled triggers, in INTENTS order. Built once at module load.
 */
const INTENT_TRIGGERS: ReadonlyArray<readonly [Intent, readonly CompiledTrigger[]]> = (() => {
  const table = TriggerTableSchema.parse(triggerTable);
  return INTENTS.map((intent) => [intent, (table[intent] ?? []).map(compileTrigger)] as const);
})();

// ============================================================================
// Classification
// ============================================================================

/**
 * Detect the routing intents mentioned in a query.
 *
 * The result is a set: iteration follows the intent table order and carries
 * no ranking. Unmatched queries yield an empty set.
 *
 * @example
 * ```typescript
 * classifyIntents('Find the shortest route and avoid tolls');
 * // Set { 'Basic Navigation', 'Avoiding Tolls', 'Shortest' }
 * ```
 */
export function classifyIntents(text: string): ReadonlySet<Intent> {
  const lowered = text.toLowerCase();
  const detected = new Set<Intent>();

  for (const [intent, triggers] of INTENT_TRIGGERS) {
    if (triggers.some((trigger) => trigger.pattern.test(lowered))) {
      detected.add(intent);
    }
  }

  return detected;
}

/**
 * Find the first trigger phrase that fired for each detected intent.
 *
 * Used by `trip extract --verbose` to explain a classification.
 */
export function explainIntents(text: string): Array<{ intent: Intent; trigger: string }> {
  const lowered = text.toLowerCase();
  const explanations: Array<{ intent: Intent; trigger: string }> = [];

  for (const [intent, triggers] of INTENT_TRIGGERS) {
    const match = triggers.find((trigger) => trigger.pattern.test(lowered));
    if (match) {
      explanations.push({ intent, trigger: match.phrase });
    }
  }

  return explanations;
}
