/**
 * Batch Command
 *
 * Plans every request in a text file, one per line. Blank lines and lines
 * starting with '#' are skipped.
 *
 * Usage:
 *   trip batch queries.txt
 *   trip batch queries.txt --json --concurrency 5
 *
 * @module cli/commands/batch
 */

import type { Command } from 'commander';
import * as fs from 'node:fs/promises';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';
import { formatBatchSummary, formatTripSummary } from '../formatters/trip-summary.js';
import { planTrips, type PlanOutcome, type PlanTripsOptions } from '../../pipeline/index.js';
import { createCommandContext, parsePositiveInt, type CommandContext } from './context.js';

export interface BatchOptions {
  json?: boolean;
  /** Queries planned at once */
  concurrency?: number;
}

/**
 * Split a query file into requests.
 */
export function parseQueryFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Plan every query and print the outcomes.
 */
export async function executeBatch(
  queries: readonly string[],
  options: BatchOptions,
  context: CommandContext
): Promise<PlanOutcome[]> {
  const { base, deps } = context;
  const spinner = createSpinner(`Planning ${queries.length} trips...`, {
    silent: options.json === true || base.isQuiet(),
  });

  const planOptions: PlanTripsOptions = {
    ...context.options,
    onProgress: (completed, total) => spinner.update(`Planning trips... ${completed}/${total}`),
  };
  if (options.concurrency !== undefined) {
    planOptions.concurrency = options.concurrency;
  }

  spinner.start();
  let outcomes: PlanOutcome[];
  try {
    outcomes = await planTrips(queries, deps, planOptions);
  } finally {
    spinner.stop();
  }

  if (options.json) {
    base.json(outcomes);
    return outcomes;
  }

  for (const outcome of outcomes) {
    if (outcome.ok) {
      base.info(formatTripSummary(outcome.result));
      base.info('');
    } else {
      base.fail(`${outcome.query}: ${outcome.error}`);
    }
  }
  base.info(formatBatchSummary(outcomes));
  return outcomes;
}

export function registerBatchCommand(program: Command): void {
  program
    .command('batch <file>')
    .description('Plan every trip request in a file (one per line)')
    .option('--json', 'Print the outcomes as JSON')
    .option('-c, --concurrency <count>', 'Queries planned at once', parsePositiveInt)
    .action(async (file: string, options: BatchOptions, cmd: Command) => {
      const base: BaseCommand = getBaseCommand(cmd.parent ?? cmd);

      let content: string;
      try {
        content = await fs.readFile(file, 'utf-8');
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        base.error(`Cannot read query file: ${message}`, EXIT_CODES.NOT_FOUND);
      }

      const queries = parseQueryFile(content);
      if (queries.length === 0) {
        base.error(`No queries found in ${file}`, EXIT_CODES.USAGE_ERROR);
      }

      try {
        const outcomes = await executeBatch(queries, options, createCommandContext(base));
        if (outcomes.some((outcome) => !outcome.ok)) {
          process.exitCode = EXIT_CODES.ERROR;
        }
      } catch (error) {
        base.error(error instanceof Error ? error.message : String(error), EXIT_CODES.ERROR);
      }
    });
}
