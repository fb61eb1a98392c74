/**
 * @sentinel-chess/board - Board representation core
 *
 * This package handles:
 * - Files, ranks, squares and the 10x12 mailbox index mapping
 * - Pieces and cell states, with ASCII and Unicode glyphs
 * - The sentinel-bordered mailbox board
 * - Positions (board plus side to move, castling, en passant, clocks) and FEN
 * - Plain-text rendering
 */

export const VERSION = '0.1.0';

// Coordinates
export {
  FILES,
  RANKS,
  BOARD_WIDTH,
  MAILBOX_SIZE,
  FIRST_SQUARE_INDEX,
  LAST_SQUARE_INDEX,
  ALL_SQUARES,
  square,
  fileIndex,
  rankIndex,
  toMailboxIndex,
  fromMailboxIndex,
  isFile,
  isRank,
  squareName,
  parseSquare,
  isLightSquare,
} from './coordinates/index.js';
export type { File, Rank, Square } from './coordinates/index.js';

// Pieces
export {
  COLORS,
  PIECE_KINDS,
  EMPTY,
  OFF_BOARD,
  piece,
  isPiece,
  pieceColor,
  oppositeColor,
  asciiGlyph,
  displayGlyph,
  outlineGlyph,
  pieceFromAscii,
} from './pieces/index.js';
export type { Color, PieceKind, Piece, Empty, OffBoard, PlacedCell, CellState } from './pieces/index.js';

// Board
export { MailboxBoard } from './board/index.js';
export type { ReadonlyBoard } from './board/index.js';

// Position and FEN
export {
  Position,
  NO_CASTLING,
  ALL_CASTLING,
  STARTING_FEN,
  parseFen,
  toFen,
} from './position/index.js';
export type { CastlingRights, KindCounts, PieceCounts } from './position/index.js';

// Rendering
export {
  GLYPH_STYLES,
  DEFAULT_EMPTY_MARKER,
  isGlyphStyle,
  isPerspective,
  render,
  renderDiagram,
} from './renderer/index.js';
export type {
  GlyphStyle,
  Perspective,
  RenderOptions,
  DiagramOptions,
  CellDecorator,
} from './renderer/index.js';

// Errors
export { InvalidFenError, PositionError, BoardInvariantError } from './errors.js';
