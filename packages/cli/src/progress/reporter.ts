/**
 * Progress reporter with ora spinners
 */

import ora, { type Ora, type Color } from 'ora';

import { createColorFns } from './colors.js';
import type { ColorFunctions, ProgressReporterOptions } from './types.js';

/**
 * Progress reporter for CLI output
 *
 * Spinners go to stderr; results are printed to stdout so they can be piped.
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private readonly useColor: boolean;

  /** Color functions matching the color setting */
  readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Start a spinner for a step
   */
  start(text: string): void {
    if (this.spinner) {
      this.spinner.stop();
    }

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; color?: Color } = { text };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Mark the current step as failed
   */
  fail(text?: string): void {
    if (!this.spinner) return;
    this.spinner.fail(text);
    this.spinner = null;
  }

  /**
   * Stop the spinner without a status symbol
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Print a result line to stdout
   */
  print(text: string): void {
    this.stop();
    console.log(text);
  }
}
