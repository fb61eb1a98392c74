/**
 * CLI definition using Commander.js
 */

import { GLYPH_STYLES, isGlyphStyle, isPerspective } from '@sentinel-chess/board';
import { Command, Option } from 'commander';

import type { CliOptions } from './config/schema.js';
import { ConfigError, withErrorHandling } from './errors/index.js';

export const VERSION = '0.1.0';

/**
 * Glyph style descriptions for help text
 */
const GLYPHS_HELP = `Piece glyphs:
    unicode - Filled chess symbols for both sides [default]
    outline - Outlined symbols for White, filled for Black
    ascii   - FEN letters (uppercase White, lowercase Black)`;

/**
 * Perspective descriptions for help text
 */
const PERSPECTIVE_HELP = `Side shown at the bottom of the board:
    white - Rank 1 at the bottom [default]
    black - Rank 8 at the bottom, files reversed`;

const FEN_HELP = 'FEN of the position (default: standard starting position)';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('sentinel')
    .description('Mailbox chess board - print positions as text diagrams and FEN')
    .version(VERSION);

  // Show command
  program
    .command('show')
    .description('Print a position as a board diagram')
    .option('-f, --fen <fen>', FEN_HELP)
    .option('-c, --config <file>', 'Path to config file')
    .addOption(new Option('-g, --glyphs <style>', GLYPHS_HELP).choices(GLYPH_STYLES))
    .addOption(new Option('--perspective <side>', PERSPECTIVE_HELP).choices(['white', 'black']))
    .option('--no-coordinates', 'Hide rank labels and the file footer')
    .option('--status', 'Print side to move, castling, en passant, clocks, FEN and material')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--verbose', 'Print diagnostic messages to stderr')
    .action(
      withErrorHandling(async (options: Record<string, unknown>) => {
        // Import dynamically to avoid circular dependencies
        const { showCommand } = await import('./commands/show.js');
        await showCommand(options);
      }),
    );

  // FEN command
  program
    .command('fen')
    .description('Print the FEN of a position')
    .option('-f, --fen <fen>', FEN_HELP)
    .action(
      withErrorHandling(async (options: Record<string, unknown>) => {
        const { fenCommand } = await import('./commands/show.js');
        fenCommand(options);
      }),
    );

  return program;
}

/**
 * Parse CLI options from command options object
 * @throws ConfigError if an option holds a value outside its choices
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const fen = options['fen'];
  if (typeof fen === 'string') result.fen = fen;

  const config = options['config'];
  if (typeof config === 'string') result.config = config;

  const glyphs = options['glyphs'];
  if (glyphs !== undefined) {
    if (!isGlyphStyle(glyphs)) {
      throw new ConfigError(
        `Invalid glyph style: ${String(glyphs)}`,
        `Use one of: ${GLYPH_STYLES.join(', ')}`,
      );
    }
    result.glyphs = glyphs;
  }

  const perspective = options['perspective'];
  if (perspective !== undefined) {
    if (!isPerspective(perspective)) {
      throw new ConfigError(`Invalid perspective: ${String(perspective)}`, 'Use white or black');
    }
    result.perspective = perspective;
  }

  // Note: Commander.js uses 'coordinates' and 'color' (negated) for --no-* flags
  if (options['coordinates'] === false) result.noCoordinates = true;
  if (options['color'] === false) result.noColor = true;

  const { status, verbose, showConfig } = options;
  if (typeof status === 'boolean') result.status = status;
  if (typeof verbose === 'boolean') result.verbose = verbose;
  if (typeof showConfig === 'boolean') result.showConfig = showConfig;

  return result;
}
