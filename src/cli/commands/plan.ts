/**
 * Plan Command
 *
 * Resolves a single trip request: start, end, waypoint places and route.
 *
 * Usage:
 *   trip plan "from Dallas to Austin with a stop at a Walmart"
 *   trip plan from Dallas to Austin --json
 *
 * @module cli/commands/plan
 */

import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';
import { formatTripSummary } from '../formatters/trip-summary.js';
import { assembleTrip, type AssembleOptions } from '../../pipeline/index.js';
import { HereClient } from '../../resolver/index.js';
import type { TripResult } from '../../schemas/trip.js';
import { createCommandContext, parsePositiveInt, type CommandContext } from './context.js';

// ============================================================================
// Types
// ============================================================================

export interface PlanOptions {
  /** Print the TripResult as JSON */
  json?: boolean;
  /** Places kept per waypoint */
  limit?: number;
  /** Per-call timeout in milliseconds */
  timeout?: number;
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Map plan flags onto assembly options.
 */
export function toAssembleOverrides(options: PlanOptions): Partial<AssembleOptions> {
  const overrides: Partial<AssembleOptions> = {};
  if (options.limit !== undefined) {
    overrides.waypointLimit = options.limit;
  }
  if (options.timeout !== undefined) {
    overrides.timeoutMs = options.timeout;
  }
  return overrides;
}

/**
 * Plan a trip and print it.
 *
 * @returns The assembled trip
 */
export async function executePlan(
  query: string,
  options: PlanOptions,
  context: CommandContext
): Promise<TripResult> {
  const { base, deps } = context;
  const spinner = createSpinner('Resolving trip...', {
    silent: options.json === true || base.isQuiet(),
  });

  const assembleOptions: AssembleOptions = { ...context.options, ...toAssembleOverrides(options) };

  spinner.start();
  let result: TripResult;
  try {
    result = await assembleTrip(query, deps, assembleOptions);
  } finally {
    spinner.stop();
  }

  if (deps.resolver instanceof HereClient) {
    base.debug(`HERE requests: ${deps.resolver.getCallCount()}`);
  }

  if (options.json) {
    base.json(result);
  } else {
    base.info(formatTripSummary(result));
  }
  return result;
}

// ============================================================================
// Registration
// ============================================================================

export function registerPlanCommand(program: Command): void {
  program
    .command('plan <query...>')
    .description('Resolve a natural-language trip request')
    .option('--json', 'Print the result as JSON')
    .option('-k, --limit <count>', 'Places kept per waypoint', parsePositiveInt)
    .option('-t, --timeout <ms>', 'Timeout for each lookup in milliseconds', parsePositiveInt)
    .action(async (words: string[], options: PlanOptions, cmd: Command) => {
      const base: BaseCommand = getBaseCommand(cmd.parent ?? cmd);
      const query = words.join(' ').trim();
      if (!query) {
        base.error('A trip request is required', EXIT_CODES.USAGE_ERROR);
      }

      try {
        await executePlan(query, options, createCommandContext(base, toAssembleOverrides(options)));
      } catch (error) {
        base.error(error instanceof Error ? error.message : String(error), EXIT_CODES.ERROR);
      }
    });
}
