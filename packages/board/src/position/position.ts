/**
 * Position
 *
 * Board contents plus the game state that is not visible on the board.
 * Only storage and direct manipulation live here; making moves is left to
 * a move applier built on top of these primitives.
 */

import { MailboxBoard, type ReadonlyBoard } from '../board/index.js';
import { FILES, square, type File, type Rank, type Square } from '../coordinates/index.js';
import { PositionError } from '../errors.js';
import { piece } from '../pieces/index.js';
import type { Color, PieceKind, PlacedCell } from '../pieces/index.js';

/**
 * Castling availability for each side and wing
 */
export interface CastlingRights {
  whiteKingside: boolean;
  whiteQueenside: boolean;
  blackKingside: boolean;
  blackQueenside: boolean;
}

export const NO_CASTLING: Readonly<CastlingRights> = Object.freeze({
  whiteKingside: false,
  whiteQueenside: false,
  blackKingside: false,
  blackQueenside: false,
});

export const ALL_CASTLING: Readonly<CastlingRights> = Object.freeze({
  whiteKingside: true,
  whiteQueenside: true,
  blackKingside: true,
  blackQueenside: true,
});

/**
 * Number of pieces of each kind
 */
export type KindCounts = Record<PieceKind, number>;

/**
 * Piece counts per side and for both sides together
 */
export interface PieceCounts {
  white: KindCounts;
  black: KindCounts;
  both: KindCounts;
}

interface PositionState {
  sideToMove: Color;
  castling: CastlingRights;
  enPassantTarget: Square | null;
  halfmoveClock: number;
  fullmoveNumber: number;
}

const BACK_RANK: Record<File, PieceKind> = {
  a: 'rook',
  b: 'knight',
  c: 'bishop',
  d: 'queen',
  e: 'king',
  f: 'bishop',
  g: 'knight',
  h: 'rook',
};

function zeroCounts(): KindCounts {
  return { pawn: 0, knight: 0, bishop: 0, rook: 0, queen: 0, king: 0 };
}

export class Position {
  private readonly squares: MailboxBoard;
  private state: PositionState;

  private constructor(squares: MailboxBoard, state: PositionState) {
    this.squares = squares;
    this.state = state;
  }

  /**
   * Empty board, White to move, no castling rights, no en passant, clocks 0 and 1
   */
  static empty(): Position {
    return new Position(MailboxBoard.empty(), {
      sideToMove: 'white',
      castling: { ...NO_CASTLING },
      enPassantTarget: null,
      halfmoveClock: 0,
      fullmoveNumber: 1,
    });
  }

  /**
   * The initial position of a standard game
   */
  static standardStart(): Position {
    const position = Position.empty();
    const homeRanks: Array<[Color, Rank, Rank]> = [
      ['white', 1, 2],
      ['black', 8, 7],
    ];

    for (const [color, backRank, pawnRank] of homeRanks) {
      for (const file of FILES) {
        position.place(square(file, backRank), piece(BACK_RANK[file], color));
        position.place(square(file, pawnRank), piece('pawn', color));
      }
    }

    position.setCastlingRights(ALL_CASTLING);
    return position;
  }

  get board(): ReadonlyBoard {
    return this.squares;
  }

  get sideToMove(): Color {
    return this.state.sideToMove;
  }

  get castlingRights(): Readonly<CastlingRights> {
    return { ...this.state.castling };
  }

  get enPassantTarget(): Square | null {
    return this.state.enPassantTarget;
  }

  get halfmoveClock(): number {
    return this.state.halfmoveClock;
  }

  get fullmoveNumber(): number {
    return this.state.fullmoveNumber;
  }

  pieceAt(sq: Square): PlacedCell {
    return this.squares.get(sq);
  }

  /**
   * Put a piece on a square or empty it
   */
  place(sq: Square, cell: PlacedCell): void {
    this.squares.set(sq, cell);
  }

  setSideToMove(color: Color): void {
    this.state.sideToMove = color;
  }

  /**
   * Update some or all castling rights; rights not named keep their value
   */
  setCastlingRights(rights: Partial<CastlingRights>): void {
    this.state.castling = { ...this.state.castling, ...rights };
  }

  /**
   * Stored as the interned square, so `equals` can compare by identity
   */
  setEnPassantTarget(sq: Square | null): void {
    this.state.enPassantTarget = sq === null ? null : square(sq.file, sq.rank);
  }

  /**
   * @throws PositionError if the value is not a non-negative integer
   */
  setHalfmoveClock(value: number): void {
    if (!Number.isInteger(value) || value < 0) {
      throw new PositionError(`Halfmove clock must be a non-negative integer, got ${value}`);
    }
    this.state.halfmoveClock = value;
  }

  /**
   * @throws PositionError if the value is not a positive integer
   */
  setFullmoveNumber(value: number): void {
    if (!Number.isInteger(value) || value < 1) {
      throw new PositionError(`Fullmove number must be a positive integer, got ${value}`);
    }
    this.state.fullmoveNumber = value;
  }

  /**
   * Square of the first king of a color found scanning a1..h8
   */
  kingSquare(color: Color): Square | null {
    for (const [sq, p] of this.squares.pieces()) {
      if (p.kind === 'king' && p.color === color) {
        return sq;
      }
    }
    return null;
  }

  pieceCounts(): PieceCounts {
    const counts: PieceCounts = { white: zeroCounts(), black: zeroCounts(), both: zeroCounts() };
    for (const [, p] of this.squares.pieces()) {
      counts[p.color][p.kind] += 1;
      counts.both[p.kind] += 1;
    }
    return counts;
  }

  /**
   * Independent copy; mutating the copy leaves this position untouched
   */
  clone(): Position {
    return new Position(this.squares.clone(), {
      ...this.state,
      castling: { ...this.state.castling },
    });
  }

  /**
   * Check whether two positions agree on the board and every state field
   */
  equals(other: Position): boolean {
    const a = this.state;
    const b = other.state;
    return (
      this.squares.equals(other.squares) &&
      a.sideToMove === b.sideToMove &&
      a.enPassantTarget === b.enPassantTarget &&
      a.halfmoveClock === b.halfmoveClock &&
      a.fullmoveNumber === b.fullmoveNumber &&
      a.castling.whiteKingside === b.castling.whiteKingside &&
      a.castling.whiteQueenside === b.castling.whiteQueenside &&
      a.castling.blackKingside === b.castling.blackKingside &&
      a.castling.blackQueenside === b.castling.blackQueenside
    );
  }
}
