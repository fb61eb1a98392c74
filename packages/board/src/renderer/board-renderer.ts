/**
 * Text rendering of a position
 *
 * Both renderers walk the 64 playing squares by file and rank. They never touch
 * raw mailbox indices, so sentinel columns cannot leak into the output.
 */

import { FILES, RANKS, square, type File, type Rank, type Square } from '../coordinates/index.js';
import { asciiGlyph, displayGlyph, isPiece, outlineGlyph } from '../pieces/index.js';
import type { Piece, PlacedCell } from '../pieces/index.js';
import type { Position } from '../position/index.js';

export const GLYPH_STYLES = ['unicode', 'outline', 'ascii'] as const;

/**
 * How pieces are drawn:
 * - unicode: filled symbols for both colors (♜)
 * - outline: outlined symbols for White (♖), filled for Black (♜)
 * - ascii: FEN letters (R / r)
 */
export type GlyphStyle = (typeof GLYPH_STYLES)[number];

/**
 * Board orientation
 */
export type Perspective = 'white' | 'black';

export const DEFAULT_EMPTY_MARKER = '·';

export interface RenderOptions {
  /** Piece glyphs (default: 'unicode') */
  glyphs?: GlyphStyle;
  /** Text for an empty square (default: '·') */
  emptyMarker?: string;
}

/**
 * Hook for styling a single diagram cell (e.g., terminal colors)
 */
export type CellDecorator = (text: string, sq: Square, cell: PlacedCell) => string;

export interface DiagramOptions extends RenderOptions {
  /** Side shown at the bottom (default: 'white') */
  perspective?: Perspective;
  /** Rank labels and file footer (default: true) */
  coordinates?: boolean;
  /** Applied to each padded cell before it is joined into its line */
  decorate?: CellDecorator;
}

export function isGlyphStyle(value: unknown): value is GlyphStyle {
  return GLYPH_STYLES.some((style) => style === value);
}

export function isPerspective(value: unknown): value is Perspective {
  return value === 'white' || value === 'black';
}

const GLYPH_FUNCTIONS: Record<GlyphStyle, (p: Piece) => string> = {
  unicode: displayGlyph,
  outline: outlineGlyph,
  ascii: asciiGlyph,
};

function cellText(cell: PlacedCell, options: RenderOptions): string {
  if (isPiece(cell)) {
    return GLYPH_FUNCTIONS[options.glyphs ?? 'unicode'](cell);
  }
  return options.emptyMarker ?? DEFAULT_EMPTY_MARKER;
}

function orderedRanks(perspective: Perspective): Rank[] {
  return perspective === 'white' ? [...RANKS].reverse() : [...RANKS];
}

function orderedFiles(perspective: Perspective): File[] {
  return perspective === 'white' ? [...FILES] : [...FILES].reverse();
}

/**
 * Render a position as 8 lines, rank 8 first
 *
 * Each line holds the cells for files a-h separated by single spaces:
 * ```
 * ♜ ♞ ♝ ♛ ♚ ♝ ♞ ♜
 * ♟ ♟ ♟ ♟ ♟ ♟ ♟ ♟
 * · · · · · · · ·
 * ```
 */
export function render(position: Position, options: RenderOptions = {}): string[] {
  return orderedRanks('white').map((rank) =>
    FILES.map((file) => cellText(position.pieceAt(square(file, rank)), options)).join(' '),
  );
}

/**
 * Render a position as a labeled diagram with three-character cells
 *
 * ```
 * 8  r  n  b  q  k  b  n  r
 * ...
 * 1  R  N  B  Q  K  B  N  R
 *    a  b  c  d  e  f  g  h
 * ```
 */
export function renderDiagram(position: Position, options: DiagramOptions = {}): string[] {
  const perspective = options.perspective ?? 'white';
  const coordinates = options.coordinates ?? true;
  const files = orderedFiles(perspective);

  const lines = orderedRanks(perspective).map((rank) => {
    const cells = files.map((file) => {
      const sq = square(file, rank);
      const cell = position.pieceAt(sq);
      const text = ` ${cellText(cell, options)} `;
      return options.decorate ? options.decorate(text, sq, cell) : text;
    });
    return coordinates ? `${rank} ${cells.join('')}` : cells.join('');
  });

  if (coordinates) {
    lines.push(`   ${files.join('  ')}`);
  }
  return lines;
}
