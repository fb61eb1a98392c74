export { Position, NO_CASTLING, ALL_CASTLING } from './position.js';
export type { CastlingRights, KindCounts, PieceCounts } from './position.js';
export { STARTING_FEN, parseFen, toFen } from './fen.js';
