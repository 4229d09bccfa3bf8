/**
 * Batch Runner
 *
 * Plans many trip requests concurrently. Each query is isolated: one
 * failure never aborts the others.
 *
 * @module pipeline/batch
 */

import { assembleTrip } from './assembler.js';
import { ConcurrencyLimiter } from './concurrency.js';
import {
  DEFAULT_ASSEMBLE_OPTIONS,
  type AssembleOptions,
  type PlanOutcome,
  type TripDependencies,
} from './types.js';

export interface PlanTripsOptions extends Partial<AssembleOptions> {
  /** Called after each query settles, with the number settled so far */
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Plan every query, bounded by `options.concurrency`.
 *
 * Outcomes are returned in input order.
 *
 * @example
 * ```typescript
 * const outcomes = await planTrips(queries, deps, { concurrency: 2 });
 * for (const outcome of outcomes) {
 *   if (!outcome.ok) console.error(outcome.query, outcome.error);
 * }
 * ```
 */
export async function planTrips(
  queries: readonly string[],
  deps: TripDependencies,
  options: PlanTripsOptions = {}
): Promise<PlanOutcome[]> {
  const { onProgress, ...assembleOptions } = options;
  const limiter = new ConcurrencyLimiter(
    assembleOptions.concurrency ?? DEFAULT_ASSEMBLE_OPTIONS.concurrency
  );

  let completed = 0;
  const settled = await Promise.allSettled(
    queries.map((query) =>
      limiter
        .run(() => assembleTrip(query, deps, assembleOptions))
        .finally(() => {
          completed++;
          onProgress?.(completed, queries.length);
        })
    )
  );

  return settled.map((outcome, index): PlanOutcome => {
    const query = queries[index];
    if (outcome.status === 'fulfilled') {
      return { query, ok: true, result: outcome.value };
    }
    const reason: unknown = outcome.reason;
    return {
      query,
      ok: false,
      error: reason instanceof Error ? reason.message : String(reason),
    };
  });
}
