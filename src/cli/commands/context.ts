/**
 * Command Context
 *
 * Wires configuration, collaborators and the CLI logger together for the
 * trip commands. Tests build a CommandContext with fakes instead.
 *
 * @module cli/commands/context
 */

import { InvalidArgumentError } from 'commander';
import { config } from '../../config/index.js';
import { createEntityTagger } from '../../tagger/index.js';
import { createPlaceResolver } from '../../resolver/index.js';
import {
  assembleOptionsFromConfig,
  type AssembleOptions,
  type TripDependencies,
} from '../../pipeline/index.js';
import type { BaseCommand } from '../base-command.js';

export interface CommandContext {
  base: BaseCommand;
  deps: TripDependencies;
  options: AssembleOptions;
}

/**
 * Build the context for a command from the environment configuration.
 *
 * @param overrides - Command-line options that take precedence over the
 *   environment; the timeout also bounds the HTTP clients' requests
 */
export function createCommandContext(
  base: BaseCommand,
  overrides: Partial<AssembleOptions> = {}
): CommandContext {
  if (!config.apiKeys.here) {
    base.warn('HERE_API_KEY is not set; locations will use defaults and no places will be found');
  }
  if (config.ner.mode === 'remote' && !config.apiKeys.huggingFace) {
    base.debug('HF_TOKEN is not set; remote entity tagging may be rate limited');
  }

  const options: AssembleOptions = { ...assembleOptionsFromConfig(config), ...overrides };
  const effective = { ...config, resolver: { ...config.resolver, timeoutMs: options.timeoutMs } };

  const resolver = createPlaceResolver(effective);
  return {
    base,
    deps: {
      tagger: createEntityTagger(effective, base),
      resolver,
      router: resolver,
      logger: base,
    },
    options,
  };
}

/**
 * Commander argument parser for positive integers.
 *
 * @throws InvalidArgumentError for anything else
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
