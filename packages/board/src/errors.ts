/**
 * Error thrown when a FEN string cannot be parsed
 */
export class InvalidFenError extends Error {
  constructor(
    public readonly fen: string,
    public readonly reason: string,
  ) {
    super(`Invalid FEN "${fen}": ${reason}`);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when a position field is set to a value outside its domain
 */
export class PositionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PositionError';
  }
}

/**
 * Error thrown when the board finds a sentinel cell where a playing square
 * should be. Reaching this is a bug in the board, not a caller error.
 */
export class BoardInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BoardInvariantError';
  }
}
