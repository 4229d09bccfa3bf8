/**
 * Configuration Module
 *
 * Loads and validates environment variables for the trip query parser.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import type { Coordinates } from '../schemas/common.js';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // API keys (optional - the pipeline degrades to offline collaborators)
  HERE_API_KEY: z.string().optional(),
  HF_TOKEN: z.string().optional(),

  // Entity tagging
  NER_MODE: z.enum(['pattern', 'remote']).default('pattern'),
  NER_MODEL: z.string().default('dslim/bert-base-NER'),

  // Fallback origin (Dallas, TX)
  TRIP_DEFAULT_LAT: z.coerce.number().min(-90).max(90).default(32.7767),
  TRIP_DEFAULT_LON: z.coerce.number().min(-180).max(180).default(-96.797),
  TRIP_DEFAULT_COUNTRY: z.string().min(2).default('USA'),

  // Resolution tuning
  TRIP_RESOLVER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  TRIP_WAYPOINT_LIMIT: z.coerce.number().int().min(1).max(10).default(2),
  TRIP_SEARCH_FETCH_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
  TRIP_CONCURRENCY: z.coerce.number().int().min(1).default(3),
});

type Env = z.infer<typeof envSchema>;

/**
 * Build the configuration object from a validated environment.
 */
function buildConfig(env: Env) {
  return {
    // API Keys
    apiKeys: {
      here: env.HERE_API_KEY || undefined,
      huggingFace: env.HF_TOKEN || undefined,
    },

    ner: {
      mode: env.NER_MODE,
      model: env.NER_MODEL,
    },

    // Substituted when the start location cannot be geocoded
    defaultLocation: {
      coordinates: { lat: env.TRIP_DEFAULT_LAT, lon: env.TRIP_DEFAULT_LON } satisfies Coordinates,
      countryCode: env.TRIP_DEFAULT_COUNTRY,
    },

    resolver: {
      timeoutMs: env.TRIP_RESOLVER_TIMEOUT_MS,
      waypointLimit: env.TRIP_WAYPOINT_LIMIT,
      searchFetchLimit: env.TRIP_SEARCH_FETCH_LIMIT,
    },

    concurrency: env.TRIP_CONCURRENCY,
  } as const;
}

/**
 * Parse an environment into a configuration object.
 *
 * @param source - Environment variables (defaults to process.env)
 * @returns Validated configuration
 * @throws ZodError when a variable is present but invalid
 *
 * @example
 * ```typescript
 * const cfg = parseConfig({ TRIP_WAYPOINT_LIMIT: '3' });
 * cfg.resolver.waypointLimit; // 3
 * ```
 */
export function parseConfig(source: NodeJS.ProcessEnv = process.env): Config {
  return buildConfig(envSchema.parse(source));
}

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * Application configuration singleton
 */
export const config = buildConfig(parseResult.data);

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(api: ApiKeyName): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new Error(
      `Missing required API key: ${API_KEY_VARIABLES[api]}. ` +
        `Please set it in your .env file.`
    );
  }
  return key;
}

const API_KEY_VARIABLES: Record<ApiKeyName, string> = {
  here: 'HERE_API_KEY',
  huggingFace: 'HF_TOKEN',
};

// Re-export types
export type Config = ReturnType<typeof buildConfig>;
export type ApiKeyName = keyof Config['apiKeys'];
