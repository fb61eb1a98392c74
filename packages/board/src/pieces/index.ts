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
} from './piece.js';
export type { Color, PieceKind, Piece, Empty, OffBoard, PlacedCell, CellState } from './piece.js';
