/**
 * Extract Command
 *
 * Shows what the parser reads from a request without resolving anything.
 *
 * Usage:
 *   trip extract "Drive from San Francisco to Napa Valley with a night stay in Sonoma"
 *
 * @module cli/commands/extract
 */

import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { formatExtraction } from '../formatters/trip-summary.js';
import { extractQuery, type ExtractedQuery } from '../../pipeline/index.js';
import { explainIntents } from '../../intent/index.js';
import { createEntityTagger, type EntityTagger } from '../../tagger/index.js';
import { config } from '../../config/index.js';

export interface ExtractOptions {
  json?: boolean;
}

/**
 * Tag and extract a query, then print the result.
 */
export async function executeExtract(
  query: string,
  options: ExtractOptions,
  base: BaseCommand,
  tagger: EntityTagger
): Promise<ExtractedQuery> {
  base.debug(`Tagging with ${tagger.name} tagger`);
  const extracted = extractQuery(query, await tagger.tag(query));

  if (base.isVerbose()) {
    for (const { intent, trigger } of explainIntents(query)) {
      base.debug(`${intent}: matched "${trigger}"`);
    }
  }

  if (options.json) {
    base.json(extracted);
  } else {
    base.info(formatExtraction(extracted));
  }
  return extracted;
}

export function registerExtractCommand(program: Command): void {
  program
    .command('extract <query...>')
    .description('Show intents, locations and constraints read from a request')
    .option('--json', 'Print the result as JSON')
    .action(async (words: string[], options: ExtractOptions, cmd: Command) => {
      const base: BaseCommand = getBaseCommand(cmd.parent ?? cmd);
      const query = words.join(' ').trim();
      if (!query) {
        base.error('A trip request is required', EXIT_CODES.USAGE_ERROR);
      }

      try {
        await executeExtract(query, options, base, createEntityTagger(config, base));
      } catch (error) {
        base.error(error instanceof Error ? error.message : String(error), EXIT_CODES.ERROR);
      }
    });
}
