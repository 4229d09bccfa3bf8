/**
 * Progress Formatters
 *
 * Spinner for long-running operations and duration formatting.
 * Uses the ora library for terminal spinners.
 *
 * Spinners write to stderr so that `--json` output on stdout stays clean.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Disable the spinner entirely (quiet or JSON output) */
  silent?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Resolving trip...');
 * spinner.start();
 *
 * try {
 *   const result = await assembleTrip(query, deps);
 *   spinner.succeed('Trip resolved');
 * } catch (err) {
 *   spinner.fail('Trip failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: ReturnType<typeof ora>;
  private startTime: number = 0;

  /**
   * Create a new progress spinner.
   *
   * @param text - Initial spinner text
   * @param options - Spinner options
   */
  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.silent !== true && process.stderr.isTTY === true,
      isSilent: options.silent === true,
      stream: process.stderr,
    });
  }

  /**
   * Start the spinner.
   *
   * @param text - Optional text to display
   */
  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  /**
   * Update spinner text.
   */
  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  /**
   * Stop spinner with failure state.
   */
  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  /**
   * Stop spinner without any symbol.
   */
  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a duration in milliseconds for display.
 *
 * @example
 * ```typescript
 * formatDuration(500);    // '500ms'
 * formatDuration(5500);   // '5.5s'
 * formatDuration(90000);  // '1m 30s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
