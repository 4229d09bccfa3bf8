/**
 * Hugging Face Entity Tagger
 *
 * Token-classification through the Hugging Face Inference API. Location and
 * facility spans come from the remote model; calendar spans come from the
 * pattern tagger, since general NER models do not label times.
 *
 * Environment variables:
 * - HF_TOKEN: optional bearer token
 * - NER_MODEL: model id (default: dslim/bert-base-NER)
 *
 * @module tagger/huggingface
 */

import { z } from 'zod';
import type { EntityCategory, EntityTagger, TaggedSpan } from './types.js';
import { PatternEntityTagger, tagCalendarTimes } from './pattern.js';
import type { PipelineLogger } from '../pipeline/types.js';

// ============================================================================
// Constants
// ============================================================================

const HF_INFERENCE_URL = 'https://router.huggingface.co/hf-inference/models';

const DEFAULTS = {
  model: 'dslim/bert-base-NER',
  timeoutMs: 5000,
  minScore: 0.5,
} as const;

/** Longest input sent to the model */
const MAX_TEXT_LENGTH = 512;

/**
 * Model entity groups → pipeline categories.
 */
const GROUP_CATEGORIES: Record<string, EntityCategory> = {
  LOC: 'place',
  GPE: 'place',
  FAC: 'facility',
  ORG: 'facility',
};

const InferenceResponseSchema = z.array(
  z.object({
    entity_group: z.string().optional(),
    entity: z.string().optional(),
    score: z.number().default(0),
    word: z.string().optional(),
    text: z.string().optional(),
  })
);

// ============================================================================
// Tagger
// ============================================================================

export interface HuggingFaceTaggerOptions {
  /** Bearer token (HF_TOKEN) */
  token?: string;
  /** Model id (default: dslim/bert-base-NER) */
  model?: string;
  /** Request timeout in milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Minimum entity score to keep (default: 0.5) */
  minScore?: number;
  logger?: PipelineLogger;
}

/**
 * HuggingFaceEntityTagger implements EntityTagger on the HF Inference API.
 *
 * Any remote failure (HTTP error, model loading, timeout, unexpected payload)
 * falls back to the PatternEntityTagger for that call.
 *
 * @example
 * ```typescript
 * const tagger = new HuggingFaceEntityTagger({ token: process.env.HF_TOKEN });
 * const spans = await tagger.tag('Drive from Seattle to Portland');
 * ```
 */
export class HuggingFaceEntityTagger implements EntityTagger {
  readonly name = 'huggingface';

  private readonly token?: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly minScore: number;
  private readonly logger?: PipelineLogger;
  private readonly fallback = new PatternEntityTagger();

  constructor(options: HuggingFaceTaggerOptions = {}) {
    this.token = options.token;
    this.model = options.model ?? DEFAULTS.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.minScore = options.minScore ?? DEFAULTS.minScore;
    this.logger = options.logger;
  }

  async tag(text: string): Promise<TaggedSpan[]> {
    if (!text.trim()) {
      return [];
    }

    try {
      const entities = await this.callRemote(text.slice(0, MAX_TEXT_LENGTH));
      return [...entities, ...tagCalendarTimes(text)];
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.debug(`NER: remote tagging failed (${message}), using pattern tagger`);
      return this.fallback.tag(text);
    }
  }

  /**
   * Call the inference endpoint and map entity groups to categories.
   *
   * @throws Error on HTTP failure, timeout or malformed payload
   */
  private async callRemote(text: string): Promise<TaggedSpan[]> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(`${HF_INFERENCE_URL}/${this.model}`, {
        method: 'POST',
        headers,
        body: JSON.stringify({ inputs: text, parameters: { aggregation_strategy: 'simple' } }),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`request timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      // 503 means the model is still loading
      throw new Error(`HF API failed: ${response.status} ${response.statusText}`);
    }

    const parsed = InferenceResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('unexpected response format');
    }

    const spans: TaggedSpan[] = [];
    for (const item of parsed.data) {
      const group = (item.entity_group ?? item.entity ?? '').replace(/^[BI]-/, '');
      const spanText = (item.word ?? item.text ?? '').trim();
      if (!spanText || item.score < this.minScore) {
        continue;
      }
      spans.push({ text: spanText, category: GROUP_CATEGORIES[group] ?? 'other' });
    }

    this.logger?.debug(`NER: remote extraction returned ${spans.length} entities`);
    return spans;
  }
}
