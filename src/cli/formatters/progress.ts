/**
 * Progress Formatters
 *
 * Spinner for the long-running recommendation call and a duration
 * formatter. Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
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
  /** Render the spinner (default: stdout is a TTY) */
  enabled?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Finding a new song...');
 * spinner.start();
 *
 * const result = await pipeline.recommend(request);
 * if (result.recommendation) {
 *   spinner.succeed('Recommendation ready');
 * } else {
 *   spinner.fail(result.details.error);
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.enabled ?? process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  /**
   * Start the spinner.
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
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Format a duration in milliseconds for display.
 *
 * @example
 * ```typescript
 * formatDuration(450); // '450ms'
 * formatDuration(2500); // '2.5s'
 * formatDuration(125000); // '2m 5s'
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
