/**
 * Progress reporter with ora spinners
 */

import type { BoardPoolStats, Explanation } from '@tactica/core';
import chalk from 'chalk';
import ora, { type Color, type Ora } from 'ora';

import { PLAIN, formatDiagnostics, formatDuration, formatExplanation, formatSee } from './formatters.js';
import type { ColorFunctions, ProgressReporterOptions } from './types.js';

export type { ProgressReporterOptions } from './types.js';

// Helper function for colorized output
function createColorFns(useColor: boolean): ColorFunctions {
  if (!useColor) return PLAIN;
  return {
    bold: (text: string) => chalk.bold(text),
    dim: (text: string) => chalk.dim(text),
    green: (text: string) => chalk.green(text),
    red: (text: string) => chalk.red(text),
    yellow: (text: string) => chalk.yellow(text),
    cyan: (text: string) => chalk.cyan(text),
    magenta: (text: string) => chalk.magenta(text),
  };
}

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private startTime = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verbose: boolean;
  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`tactica v${version}`));
    console.log('');
  }

  /**
   * Display a warning message
   */
  warn(message: string): void {
    if (this.silent) return;
    console.error(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Print plain text, e.g. a rendered board
   */
  print(text: string): void {
    if (this.silent) return;
    console.log(text);
  }

  /**
   * Print one explanation, with diagnostics in verbose mode
   */
  reportExplanation(label: string, explanation: Explanation, stats?: BoardPoolStats): void {
    if (this.silent) return;
    console.log(formatExplanation(label, explanation, this.c));
    if (this.verbose && stats) {
      console.log(formatDiagnostics(explanation, stats, this.c));
    }
  }

  /**
   * Print a static exchange value
   */
  reportSee(label: string, value: number): void {
    if (this.silent) return;
    const shown = value > 0 ? this.c.green(formatSee(value)) : value < 0 ? this.c.red(formatSee(value)) : '0';
    console.log(`${this.c.bold(label)}: SEE ${shown}`);
  }

  /**
   * Start a spinner for a batch of moves
   */
  startBatch(total: number): void {
    this.startTime = Date.now();
    if (this.silent) return;

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; color?: Color } = {
      text: `Explaining ${total} moves`,
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update the batch spinner
   */
  updateBatch(current: number, total: number, label: string): void {
    if (this.silent || !this.spinner) return;
    this.spinner.text = `Explaining ${this.c.cyan(label)} (${current}/${total})`;
  }

  /**
   * Finish the batch spinner with a summary
   */
  completeBatch(explained: number, problems: number): void {
    const duration = formatDuration(Date.now() - this.startTime);
    const detail = problems > 0 ? this.c.yellow(`, ${problems} not explained`) : '';
    const message = `Explained ${explained} moves${detail} ${this.c.dim(`(${duration})`)}`;

    if (this.silent) return;
    if (this.spinner) {
      this.spinner.succeed(message);
      this.spinner = null;
    } else {
      console.error(`${this.c.green('✓')} ${message}`);
    }
  }

  /**
   * Stop the batch spinner on an error
   */
  failBatch(error: string): void {
    if (this.silent) return;
    if (this.spinner) {
      this.spinner.fail(this.c.red(error));
      this.spinner = null;
    } else {
      console.error(`${this.c.red('✗')} ${error}`);
    }
  }

  /**
   * Check if verbose mode is enabled
   */
  isVerbose(): boolean {
    return this.verbose;
  }
}
