/**
 * Resolver Module Exports
 *
 * @module resolver
 */

import type { Config } from '../config/index.js';
import type { PlaceResolver, RouteProvider } from './types.js';
import { HereClient } from './here-client.js';
import { UnavailableResolver } from './unavailable.js';

export type {
  GeocodeOptions,
  GeocodeResult,
  PlaceCandidate,
  PlaceResolver,
  RouteProvider,
} from './types.js';
export { HereClient, HereApiError, isHereApiError, isTimeoutError, type HereClientOptions } from './here-client.js';
export { UnavailableResolver } from './unavailable.js';

/**
 * Create the resolver for the current configuration: the HERE client when
 * HERE_API_KEY is set, the offline resolver otherwise.
 */
export function createPlaceResolver(
  cfg: Pick<Config, 'apiKeys' | 'resolver'>
): PlaceResolver & RouteProvider {
  if (cfg.apiKeys.here) {
    return new HereClient({ apiKey: cfg.apiKeys.here, timeoutMs: cfg.resolver.timeoutMs });
  }
  return new UnavailableResolver();
}
