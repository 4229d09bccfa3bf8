/**
 * CLI Commands Registry
 *
 * Available commands:
 * - plan: Resolve a trip request
 * - extract: Show what is read from a request, without resolving
 * - batch: Plan every request in a file
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerPlanCommand } from './plan.js';
import { registerExtractCommand } from './extract.js';
import { registerBatchCommand } from './batch.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerPlanCommand(program);
  registerExtractCommand(program);
  registerBatchCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'plan <query...>', description: 'Resolve a natural-language trip request' },
    { name: 'extract <query...>', description: 'Show intents, locations and constraints read from a request' },
    { name: 'batch <file>', description: 'Plan every trip request in a file (one per line)' },
  ];
}
