/**
 * Mailbox Board
 *
 * A 10x12 array of cells: the 8x8 playing area surrounded by a sentinel border
 * two rows deep above and below and one column wide on each side. Any piece
 * offset applied to a playing square lands either on another playing square or
 * on an `offBoard` cell, so offset walkers never need bounds checks.
 *
 * ```
 *   0   1   2   3   4   5   6   7   8   9
 *  10  11  12  13  14  15  16  17  18  19
 *  20 [a1  b1  c1  d1  e1  f1  g1  h1] 29
 *  ...
 *  90 [a8  b8  c8  d8  e8  f8  g8  h8] 99
 * 100 101 102 103 104 105 106 107 108 109
 * 110 111 112 113 114 115 116 117 118 119
 * ```
 */

import { ALL_SQUARES, MAILBOX_SIZE, squareName, toMailboxIndex } from '../coordinates/index.js';
import type { Square } from '../coordinates/index.js';
import { BoardInvariantError } from '../errors.js';
import { EMPTY, OFF_BOARD, isPiece, piece } from '../pieces/index.js';
import type { CellState, Piece, PlacedCell } from '../pieces/index.js';

/**
 * Read-only view of a board
 */
export interface ReadonlyBoard {
  /** Contents of a playing square */
  get(square: Square): PlacedCell;
  /** Contents of any mailbox index; `offBoard` for sentinels and out-of-array indices */
  getRaw(index: number): CellState;
  /** All 64 playing squares with their contents, a1..h8 */
  squares(): IterableIterator<[Square, PlacedCell]>;
  /** Occupied squares with their pieces, a1..h8 */
  pieces(): IterableIterator<[Square, Piece]>;
}

export class MailboxBoard implements ReadonlyBoard {
  private readonly cells: CellState[];

  private constructor(cells: CellState[]) {
    this.cells = cells;
  }

  /**
   * Board with every playing square empty and every border cell off-board
   */
  static empty(): MailboxBoard {
    const cells = new Array<CellState>(MAILBOX_SIZE).fill(OFF_BOARD);
    for (const sq of ALL_SQUARES) {
      cells[toMailboxIndex(sq)] = EMPTY;
    }
    return new MailboxBoard(cells);
  }

  get(square: Square): PlacedCell {
    const cell = this.cells[toMailboxIndex(square)];
    if (cell === undefined || cell === OFF_BOARD) {
      throw new BoardInvariantError(`Playing square ${squareName(square)} holds a sentinel`);
    }
    return cell;
  }

  /**
   * Put a piece on a square, or empty it. No chess legality is checked.
   */
  set(square: Square, cell: PlacedCell): void {
    this.cells[toMailboxIndex(square)] = isPiece(cell) ? piece(cell.kind, cell.color) : EMPTY;
  }

  clear(square: Square): void {
    this.set(square, EMPTY);
  }

  getRaw(index: number): CellState {
    if (!Number.isInteger(index)) {
      return OFF_BOARD;
    }
    return this.cells[index] ?? OFF_BOARD;
  }

  *squares(): IterableIterator<[Square, PlacedCell]> {
    for (const sq of ALL_SQUARES) {
      yield [sq, this.get(sq)];
    }
  }

  *pieces(): IterableIterator<[Square, Piece]> {
    for (const [sq, cell] of this.squares()) {
      if (isPiece(cell)) {
        yield [sq, cell];
      }
    }
  }

  clone(): MailboxBoard {
    return new MailboxBoard(this.cells.slice());
  }

  /**
   * Check whether two boards hold the same contents on every cell
   */
  equals(other: MailboxBoard): boolean {
    return this.cells.every((cell, index) => cell === other.cells[index]);
  }
}
