/**
 * Coordinate Model
 *
 * Files, ranks and squares of the 8x8 playing area, and their mapping onto the
 * 10x12 mailbox array. This module is the only place that knows the index
 * formula; every other module addresses cells through it.
 */

/**
 * Files a-h, in board order
 */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/**
 * Ranks 1-8, in board order
 */
export const RANKS = [1, 2, 3, 4, 5, 6, 7, 8] as const;

export type File = (typeof FILES)[number];
export type Rank = (typeof RANKS)[number];

/**
 * A playing square. Values are interned: `square('e', 4) === square('e', 4)`.
 */
export interface Square {
  readonly file: File;
  readonly rank: Rank;
}

/** Cells per mailbox row (8 files plus one sentinel column on each side) */
export const BOARD_WIDTH = 10;

/** Total mailbox cells (12 rows: two sentinel rows above and below the board) */
export const MAILBOX_SIZE = 120;

/** Lowest and highest mailbox index of a playing square (a1 and h8) */
export const FIRST_SQUARE_INDEX = 21;
export const LAST_SQUARE_INDEX = 98;

const FILE_INDEX: Record<File, number> = {
  a: 0,
  b: 1,
  c: 2,
  d: 3,
  e: 4,
  f: 5,
  g: 6,
  h: 7,
};

function freezeSquare(file: File, rank: Rank): Square {
  return Object.freeze({ file, rank });
}

function squaresOnFile(file: File): Record<Rank, Square> {
  return {
    1: freezeSquare(file, 1),
    2: freezeSquare(file, 2),
    3: freezeSquare(file, 3),
    4: freezeSquare(file, 4),
    5: freezeSquare(file, 5),
    6: freezeSquare(file, 6),
    7: freezeSquare(file, 7),
    8: freezeSquare(file, 8),
  };
}

const SQUARES: Record<File, Record<Rank, Square>> = {
  a: squaresOnFile('a'),
  b: squaresOnFile('b'),
  c: squaresOnFile('c'),
  d: squaresOnFile('d'),
  e: squaresOnFile('e'),
  f: squaresOnFile('f'),
  g: squaresOnFile('g'),
  h: squaresOnFile('h'),
};

/**
 * Get the square at a file and rank
 */
export function square(file: File, rank: Rank): Square {
  return SQUARES[file][rank];
}

/**
 * All 64 squares: a1..h1, a2..h2, ..., a8..h8
 */
export const ALL_SQUARES: readonly Square[] = Object.freeze(
  RANKS.flatMap((rank) => FILES.map((file) => square(file, rank))),
);

/**
 * 0-based position of a file (a = 0)
 */
export function fileIndex(file: File): number {
  return FILE_INDEX[file];
}

/**
 * 0-based position of a rank (1 = 0)
 */
export function rankIndex(rank: Rank): number {
  return rank - 1;
}

/**
 * Mailbox index of a square, always in [21, 98]
 */
export function toMailboxIndex(sq: Square): number {
  return (rankIndex(sq.rank) + 2) * BOARD_WIDTH + (fileIndex(sq.file) + 1);
}

const SQUARE_BY_INDEX: ReadonlyArray<Square | null> = (() => {
  const table = new Array<Square | null>(MAILBOX_SIZE).fill(null);
  for (const sq of ALL_SQUARES) {
    table[toMailboxIndex(sq)] = sq;
  }
  return table;
})();

/**
 * Square at a mailbox index
 *
 * Returns null for sentinel cells and for anything outside [0, 119]; move
 * generation probes those routinely, so this is not an error path.
 */
export function fromMailboxIndex(index: number): Square | null {
  if (!Number.isInteger(index) || index < 0 || index >= MAILBOX_SIZE) {
    return null;
  }
  return SQUARE_BY_INDEX[index] ?? null;
}

/**
 * Check whether a value is one of the files a-h
 */
export function isFile(value: unknown): value is File {
  return FILES.some((file) => file === value);
}

/**
 * Check whether a value is one of the ranks 1-8
 */
export function isRank(value: unknown): value is Rank {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 8;
}

/**
 * Algebraic name of a square (e.g., "e4")
 */
export function squareName(sq: Square): string {
  return `${sq.file}${sq.rank}`;
}

/**
 * Parse an algebraic square name
 * @returns The square, or null if the text is not a square name
 */
export function parseSquare(text: string): Square | null {
  if (text.length !== 2) {
    return null;
  }
  const file = text[0];
  const rank = Number(text[1]);
  if (!isFile(file) || !isRank(rank)) {
    return null;
  }
  return square(file, rank);
}

/**
 * Check if a square is a light square (a1 is dark, h1 is light)
 */
export function isLightSquare(sq: Square): boolean {
  return (fileIndex(sq.file) + rankIndex(sq.rank)) % 2 === 1;
}
