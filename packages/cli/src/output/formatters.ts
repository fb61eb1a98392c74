/**
 * Text formatters for CLI output
 */

import { toFen, type Position } from '@sentinel-chess/board';
import chalk, { type ChalkInstance } from 'chalk';

import type { SentinelConfig } from '../config/schema.js';

/**
 * Format configuration for human-readable display
 */
export function formatConfigDisplay(config: SentinelConfig, c: ChalkInstance = chalk): string {
  const { display, output } = config;
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Display:'));
  lines.push(`  Glyphs: ${display.glyphs}`);
  lines.push(`  Perspective: ${display.perspective}`);
  lines.push(`  Coordinates: ${display.coordinates ? 'on' : 'off'}`);
  lines.push(`  Color: ${display.color ? 'on' : 'off'}`);
  if (display.color) {
    lines.push(`  Squares: light ${display.lightSquare}, dark ${display.darkSquare}`);
  } else {
    lines.push(`  Empty marker: ${display.emptyMarker}`);
  }
  lines.push('');

  lines.push(c.dim('Output:'));
  lines.push(`  Status: ${output.status ? 'on' : 'off'}`);
  lines.push(`  Verbose: ${output.verbose ? 'on' : 'off'}`);

  return lines.join('\n');
}

/**
 * Describe the state that is not visible on the board
 *
 * ```
 * Side to move: White
 * Castling: KQkq
 * En passant: -
 * Halfmove clock: 0
 * Fullmove number: 1
 * FEN: rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1
 * ```
 */
export function formatStatus(position: Position): string[] {
  const fen = toFen(position);
  const [, , castling = '-', enPassant = '-'] = fen.split(' ');

  return [
    `Side to move: ${position.sideToMove === 'white' ? 'White' : 'Black'}`,
    `Castling: ${castling}`,
    `En passant: ${enPassant}`,
    `Halfmove clock: ${position.halfmoveClock}`,
    `Fullmove number: ${position.fullmoveNumber}`,
    `FEN: ${fen}`,
  ];
}

/**
 * Summarize piece counts, e.g. "White: 8P 2N 2B 2R 1Q 1K (16)"
 */
export function formatMaterial(position: Position): string[] {
  const counts = position.pieceCounts();
  const line = (label: string, side: typeof counts.white): string => {
    const total = Object.values(side).reduce((sum, n) => sum + n, 0);
    return (
      `${label}: ${side.pawn}P ${side.knight}N ${side.bishop}B ` +
      `${side.rook}R ${side.queen}Q ${side.king}K (${total})`
    );
  };
  return [line('White', counts.white), line('Black', counts.black)];
}
