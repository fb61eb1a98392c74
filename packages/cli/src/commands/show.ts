/**
 * show and fen command implementations
 */

import { COLORS, InvalidFenError, Position, parseFen, toFen } from '@sentinel-chess/board';
import chalk, { Chalk, type ChalkInstance } from 'chalk';

import { parseCliOptions, VERSION } from '../cli.js';
import { formatConfig, loadConfig } from '../config/index.js';
import { FEN_SUGGESTION, InputError } from '../errors/index.js';
import { formatConfigDisplay, formatMaterial, formatStatus } from '../output/formatters.js';
import { Reporter } from '../output/reporter.js';
import { renderTerminalBoard } from '../output/terminal-board.js';
import type { LineWriter } from '../output/types.js';

/**
 * Process context a command runs in
 */
export interface CommandContext {
  stdout?: LineWriter | undefined;
  stderr?: LineWriter | undefined;
  /** Source of SENTINEL_* variables (default: process.env) */
  env?: NodeJS.ProcessEnv | undefined;
  /** Directory to search for a config file (default: current directory) */
  searchFrom?: string | undefined;
  /** Chalk instance used when color is on (default: auto-detected) */
  chalk?: ChalkInstance | undefined;
}

/**
 * Position named on the command line, or the standard start
 * @throws InputError if the FEN is malformed
 */
export function loadPosition(fen: string | undefined): Position {
  if (fen === undefined) {
    return Position.standardStart();
  }

  try {
    return parseFen(fen);
  } catch (error) {
    if (error instanceof InvalidFenError) {
      throw new InputError(error.message, FEN_SUGGESTION);
    }
    throw error;
  }
}

/**
 * Main show command handler
 */
export async function showCommand(
  rawOptions: Record<string, unknown>,
  context: CommandContext = {},
): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const config = await loadConfig(options, { env: context.env, searchFrom: context.searchFrom });

  const paint = config.display.color ? (context.chalk ?? chalk) : new Chalk({ level: 0 });
  const reporter = new Reporter({
    color: config.display.color,
    verbose: config.output.verbose,
    stdout: context.stdout,
    stderr: context.stderr,
  });

  // Show config and exit if requested
  if (options.showConfig) {
    reporter.print(formatConfigDisplay(config, paint));
    reporter.print('');
    reporter.print('Raw configuration:');
    reporter.print(formatConfig(config));
    return;
  }

  reporter.printHeader(VERSION);

  const position = loadPosition(options.fen);
  reporter.debug(`Position: ${toFen(position)}`);
  if (config.display.color && paint.level === 0) {
    reporter.debug('Terminal reports no color support, drawing a plain board');
  }

  for (const color of COLORS) {
    if (position.kingSquare(color) === null) {
      reporter.warn(`Position has no ${color} king`);
    }
  }

  reporter.printLines(renderTerminalBoard(position, config.display, paint));

  if (config.output.status) {
    reporter.print('');
    reporter.printLines(formatStatus(position));
    reporter.printLines(formatMaterial(position));
  }
}

/**
 * Print the FEN of a position
 */
export function fenCommand(rawOptions: Record<string, unknown>, context: CommandContext = {}): void {
  const options = parseCliOptions(rawOptions);
  const reporter = new Reporter({ stdout: context.stdout, stderr: context.stderr });
  reporter.print(toFen(loadPosition(options.fen)));
}
