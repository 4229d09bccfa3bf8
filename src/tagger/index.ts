/**
 * Entity Tagger Module Exports
 *
 * @module tagger
 */

import type { Config } from '../config/index.js';
import type { PipelineLogger } from '../pipeline/types.js';
import type { EntityTagger } from './types.js';
import { PatternEntityTagger } from './pattern.js';
import { HuggingFaceEntityTagger } from './huggingface.js';

export type { EntityCategory, EntityTagger, TaggedSpan } from './types.js';
export { LOCATION_CATEGORIES } from './types.js';
export { PatternEntityTagger, tagCalendarTimes, tagPlaceNames } from './pattern.js';
export { HuggingFaceEntityTagger, type HuggingFaceTaggerOptions } from './huggingface.js';

/**
 * Create the tagger selected by NER_MODE.
 *
 * @param cfg - Application configuration
 * @param logger - Optional logger for remote diagnostics
 */
export function createEntityTagger(
  cfg: Pick<Config, 'ner' | 'apiKeys' | 'resolver'>,
  logger?: PipelineLogger
): EntityTagger {
  if (cfg.ner.mode === 'remote') {
    return new HuggingFaceEntityTagger({
      token: cfg.apiKeys.huggingFace,
      model: cfg.ner.model,
      timeoutMs: cfg.resolver.timeoutMs,
      logger,
    });
  }
  return new PatternEntityTagger();
}
