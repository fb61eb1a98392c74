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
} from './square.js';
export type { File, Rank, Square } from './square.js';
