/**
 * FEN (Forsyth-Edwards Notation) reading and writing
 */

import { FILES, RANKS, parseSquare, square, squareName } from '../coordinates/index.js';
import { InvalidFenError } from '../errors.js';
import { asciiGlyph, isPiece, pieceFromAscii } from '../pieces/index.js';

import { Position, type CastlingRights } from './position.js';

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const CASTLING_LETTERS: Record<string, keyof CastlingRights> = {
  K: 'whiteKingside',
  Q: 'whiteQueenside',
  k: 'blackKingside',
  q: 'blackQueenside',
};

const COUNTER_PATTERN = /^\d+$/;

function parsePlacement(fen: string, placement: string, position: Position): void {
  const rows = placement.split('/');
  if (rows.length !== 8) {
    throw new InvalidFenError(fen, `expected 8 ranks, found ${rows.length}`);
  }

  // Rows run from rank 8 down to rank 1
  rows.forEach((row, rowIndex) => {
    const rank = RANKS[7 - rowIndex];
    if (rank === undefined) {
      throw new InvalidFenError(fen, `unexpected rank row ${rowIndex + 1}`);
    }

    let fileIdx = 0;
    let afterDigit = false;
    for (const char of row) {
      if (char >= '1' && char <= '8') {
        if (afterDigit) {
          throw new InvalidFenError(fen, `consecutive digits in rank ${rank}`);
        }
        fileIdx += Number(char);
        afterDigit = true;
        continue;
      }
      afterDigit = false;

      const p = pieceFromAscii(char);
      if (!p) {
        throw new InvalidFenError(fen, `unknown piece "${char}" on rank ${rank}`);
      }
      const file = FILES[fileIdx];
      if (file === undefined) {
        throw new InvalidFenError(fen, `rank ${rank} has more than 8 squares`);
      }
      position.place(square(file, rank), p);
      fileIdx += 1;
    }

    if (fileIdx !== 8) {
      throw new InvalidFenError(fen, `rank ${rank} has ${fileIdx} squares, expected 8`);
    }
  });
}

function parseCastling(fen: string, field: string): Partial<CastlingRights> {
  const rights: Partial<CastlingRights> = {};
  if (field === '-') {
    return rights;
  }

  for (const char of field) {
    const right = CASTLING_LETTERS[char];
    if (right === undefined) {
      throw new InvalidFenError(fen, `invalid castling field "${field}"`);
    }
    if (rights[right]) {
      throw new InvalidFenError(fen, `castling right "${char}" listed twice`);
    }
    rights[right] = true;
  }
  return rights;
}

function parseCounter(fen: string, field: string, name: string): number {
  if (!COUNTER_PATTERN.test(field)) {
    throw new InvalidFenError(fen, `${name} "${field}" is not a number`);
  }
  return Number(field);
}

/**
 * Parse a FEN string into a position
 *
 * Accepts the full six-field form and the four-field form without clocks
 * (halfmove clock 0, fullmove number 1). Ranks must use single run-length
 * digits, and an en passant square must be on rank 6 with White to move or
 * rank 3 with Black to move.
 *
 * @throws InvalidFenError if the string is not a well-formed FEN
 */
export function parseFen(fen: string): Position {
  const fields = fen.trim().split(/\s+/);
  if (fields.length !== 4 && fields.length !== 6) {
    throw new InvalidFenError(fen, `expected 4 or 6 fields, found ${fields.length}`);
  }

  const [placement = '', side = '', castling = '', enPassant = '', halfmove = '0', fullmove = '1'] =
    fields;
  const position = Position.empty();

  parsePlacement(fen, placement, position);

  if (side === 'w') {
    position.setSideToMove('white');
  } else if (side === 'b') {
    position.setSideToMove('black');
  } else {
    throw new InvalidFenError(fen, `side to move must be "w" or "b", got "${side}"`);
  }

  position.setCastlingRights(parseCastling(fen, castling));

  if (enPassant !== '-') {
    const target = parseSquare(enPassant);
    if (!target) {
      throw new InvalidFenError(fen, `invalid en passant square "${enPassant}"`);
    }
    const expectedRank = position.sideToMove === 'white' ? 6 : 3;
    if (target.rank !== expectedRank) {
      throw new InvalidFenError(
        fen,
        `en passant square "${enPassant}" must be on rank ${expectedRank} ` +
          `with ${position.sideToMove} to move`,
      );
    }
    position.setEnPassantTarget(target);
  }

  position.setHalfmoveClock(parseCounter(fen, halfmove, 'halfmove clock'));

  const fullmoveNumber = parseCounter(fen, fullmove, 'fullmove number');
  if (fullmoveNumber < 1) {
    throw new InvalidFenError(fen, 'fullmove number must be at least 1');
  }
  position.setFullmoveNumber(fullmoveNumber);

  return position;
}

/**
 * Serialize a position as a six-field FEN string
 */
export function toFen(position: Position): string {
  const rows: string[] = [];

  for (const rank of [...RANKS].reverse()) {
    let row = '';
    let emptyRun = 0;
    for (const file of FILES) {
      const cell = position.pieceAt(square(file, rank));
      if (isPiece(cell)) {
        if (emptyRun > 0) {
          row += String(emptyRun);
          emptyRun = 0;
        }
        row += asciiGlyph(cell);
      } else {
        emptyRun += 1;
      }
    }
    if (emptyRun > 0) {
      row += String(emptyRun);
    }
    rows.push(row);
  }

  const rights = position.castlingRights;
  const castling =
    Object.entries(CASTLING_LETTERS)
      .filter(([, right]) => rights[right])
      .map(([letter]) => letter)
      .join('') || '-';

  const enPassant = position.enPassantTarget ? squareName(position.enPassantTarget) : '-';

  return [
    rows.join('/'),
    position.sideToMove === 'white' ? 'w' : 'b',
    castling,
    enPassant,
    String(position.halfmoveClock),
    String(position.fullmoveNumber),
  ].join(' ');
}
