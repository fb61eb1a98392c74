/**
 * Configuration schema types for the sentinel CLI
 */

import type { GlyphStyle, Perspective } from '@sentinel-chess/board';

export type { GlyphStyle, Perspective };

/**
 * Board display configuration
 */
export interface DisplayConfigSchema {
  /** Piece glyphs */
  glyphs: GlyphStyle;
  /** Side shown at the bottom of the diagram */
  perspective: Perspective;
  /** Print rank labels and the file footer */
  coordinates: boolean;
  /** Colored terminal output */
  color: boolean;
  /** Single character drawn on empty squares when color is off */
  emptyMarker: string;
  /** Background of light squares (#rrggbb) */
  lightSquare: string;
  /** Background of dark squares (#rrggbb) */
  darkSquare: string;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Print side to move, castling, en passant, clocks and FEN below the board */
  status: boolean;
  /** Print diagnostic messages to stderr */
  verbose: boolean;
}

/**
 * Complete configuration
 */
export interface SentinelConfig {
  display: DisplayConfigSchema;
  output: OutputConfigSchema;
}

/**
 * CLI options as parsed from the command line
 */
export interface CliOptions {
  /** FEN of the position to show (default: standard start) */
  fen?: string;
  /** Path to config file */
  config?: string;
  glyphs?: GlyphStyle;
  perspective?: Perspective;
  /** Set when --no-coordinates is given */
  noCoordinates?: boolean;
  /** Set when --no-color is given */
  noColor?: boolean;
  status?: boolean;
  verbose?: boolean;
  /** Print resolved configuration and exit */
  showConfig?: boolean;
}
