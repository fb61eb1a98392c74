/**
 * Reporter for CLI output
 *
 * Results go to stdout. Diagnostics (verbose messages and warnings) go to
 * stderr so that piped output holds only the board.
 */

import chalk from 'chalk';

import type { ColorFunctions, LineWriter } from './types.js';

export interface ReporterOptions {
  /** Colorize diagnostics (default: true) */
  color?: boolean;
  /** Print debug messages (default: false) */
  verbose?: boolean;
  stdout?: LineWriter | undefined;
  stderr?: LineWriter | undefined;
}

function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      yellow: (text: string) => chalk.yellow(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    yellow: identity,
  };
}

export class Reporter {
  private readonly verbose: boolean;
  private readonly out: LineWriter;
  private readonly err: LineWriter;
  private readonly c: ColorFunctions;

  constructor(options: ReporterOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.out = options.stdout ?? ((line) => console.log(line));
    this.err = options.stderr ?? ((line) => console.error(line));
    this.c = createColorFns(options.color ?? true);
  }

  /**
   * Write a result line to stdout
   */
  print(line: string): void {
    this.out(line);
  }

  printLines(lines: readonly string[]): void {
    for (const line of lines) {
      this.out(line);
    }
  }

  /**
   * Print the version header (verbose only)
   */
  printHeader(version: string): void {
    if (!this.verbose) return;
    this.err(this.c.bold(`sentinel v${version}`));
  }

  debug(message: string): void {
    if (!this.verbose) return;
    this.err(this.c.dim(message));
  }

  warn(message: string): void {
    this.err(this.c.yellow(`⚠ ${message}`));
  }
}
