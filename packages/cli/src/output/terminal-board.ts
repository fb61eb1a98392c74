/**
 * Colored terminal board
 */

import { isLightSquare, isPiece, renderDiagram, type Position } from '@sentinel-chess/board';
import chalk, { type ChalkInstance } from 'chalk';

import type { DisplayConfigSchema } from '../config/schema.js';

export const WHITE_PIECE_COLOR = '#ffffff';
export const BLACK_PIECE_COLOR = '#000000';

/**
 * Render a position for the terminal
 *
 * With color on (and a terminal that supports it) each cell gets the light or
 * dark square background and pieces are drawn bold in white or black, so empty
 * squares are left blank. Otherwise the plain diagram is returned with the
 * configured empty marker.
 */
export function renderTerminalBoard(
  position: Position,
  display: DisplayConfigSchema,
  c: ChalkInstance = chalk,
): string[] {
  const base = {
    glyphs: display.glyphs,
    perspective: display.perspective,
    coordinates: display.coordinates,
  };

  if (!display.color || c.level === 0) {
    return renderDiagram(position, { ...base, emptyMarker: display.emptyMarker });
  }

  return renderDiagram(position, {
    ...base,
    emptyMarker: ' ',
    decorate: (text, sq, cell) => {
      const background = isLightSquare(sq) ? display.lightSquare : display.darkSquare;
      const content = isPiece(cell)
        ? c.bold.hex(cell.color === 'white' ? WHITE_PIECE_COLOR : BLACK_PIECE_COLOR)(text)
        : text;
      return c.bgHex(background)(content);
    },
  });
}
