/**
 * Piece Model
 *
 * Pieces are inert data: a kind and a color, plus glyph lookups. Anything
 * kind-specific (offset tables, values) belongs in tables keyed by `PieceKind`.
 */

export const COLORS = ['white', 'black'] as const;

export const PIECE_KINDS = ['pawn', 'knight', 'bishop', 'rook', 'queen', 'king'] as const;

export type Color = (typeof COLORS)[number];
export type PieceKind = (typeof PIECE_KINDS)[number];

/**
 * A colored piece. Values are interned per kind and color.
 */
export interface Piece {
  readonly kind: PieceKind;
  readonly color: Color;
}

/** Playing square with nothing on it */
export const EMPTY = 'empty';

/** Sentinel cell outside the 8x8 playing area */
export const OFF_BOARD = 'offBoard';

export type Empty = typeof EMPTY;
export type OffBoard = typeof OFF_BOARD;

/**
 * Contents of a playing square
 */
export type PlacedCell = Piece | Empty;

/**
 * Contents of any mailbox cell
 */
export type CellState = PlacedCell | OffBoard;

function freezePiece(kind: PieceKind, color: Color): Piece {
  return Object.freeze({ kind, color });
}

function piecesOfColor(color: Color): Record<PieceKind, Piece> {
  return {
    pawn: freezePiece('pawn', color),
    knight: freezePiece('knight', color),
    bishop: freezePiece('bishop', color),
    rook: freezePiece('rook', color),
    queen: freezePiece('queen', color),
    king: freezePiece('king', color),
  };
}

const PIECES: Record<Color, Record<PieceKind, Piece>> = {
  white: piecesOfColor('white'),
  black: piecesOfColor('black'),
};

/**
 * Get the piece of a kind and color
 */
export function piece(kind: PieceKind, color: Color): Piece {
  return PIECES[color][kind];
}

/**
 * Check whether a cell holds a piece
 */
export function isPiece(cell: CellState): cell is Piece {
  return typeof cell === 'object';
}

export function pieceColor(p: Piece): Color {
  return p.color;
}

export function oppositeColor(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

/**
 * Algebraic letters (black / lowercase form)
 */
const LETTERS: Record<PieceKind, string> = {
  pawn: 'p',
  knight: 'n',
  bishop: 'b',
  rook: 'r',
  queen: 'q',
  king: 'k',
};

const KIND_BY_LETTER: ReadonlyMap<string, PieceKind> = new Map(
  PIECE_KINDS.map((kind) => [LETTERS[kind], kind]),
);

const FILLED_SYMBOLS: Record<PieceKind, string> = {
  pawn: '♟',
  knight: '♞',
  bishop: '♝',
  rook: '♜',
  queen: '♛',
  king: '♚',
};

const OUTLINE_SYMBOLS: Record<PieceKind, string> = {
  pawn: '♙',
  knight: '♘',
  bishop: '♗',
  rook: '♖',
  queen: '♕',
  king: '♔',
};

/**
 * ASCII letter of a piece: uppercase for White, lowercase for Black (FEN convention)
 */
export function asciiGlyph(p: Piece): string {
  const letter = LETTERS[p.kind];
  return p.color === 'white' ? letter.toUpperCase() : letter;
}

/**
 * Filled Unicode symbol of a piece's kind.
 * Both colors share the symbol; color is left to the presentation layer.
 */
export function displayGlyph(p: Piece): string {
  return FILLED_SYMBOLS[p.kind];
}

/**
 * Outlined symbol for White and filled symbol for Black, for monochrome output
 */
export function outlineGlyph(p: Piece): string {
  return p.color === 'white' ? OUTLINE_SYMBOLS[p.kind] : FILLED_SYMBOLS[p.kind];
}

/**
 * Piece for a FEN letter (e.g., "N" = white knight)
 * @returns The piece, or null if the character is not a piece letter
 */
export function pieceFromAscii(char: string): Piece | null {
  const kind = KIND_BY_LETTER.get(char.toLowerCase());
  if (kind === undefined || char.length !== 1) {
    return null;
  }
  return piece(kind, char === char.toUpperCase() ? 'white' : 'black');
}
