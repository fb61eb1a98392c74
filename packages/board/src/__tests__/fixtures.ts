/**
 * Test Position Fixtures
 */

export interface FenFixture {
  fen: string;
  description: string;
}

export const ROUND_TRIP_POSITIONS: FenFixture[] = [
  {
    fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1',
    description: 'starting position',
  },
  {
    fen: 'r1bqkb1r/pppp1ppp/2n2n2/4p3/2B1P3/5N2/PPPP1PPP/RNBQK2R w KQkq - 4 4',
    description: 'Two Knights Defense',
  },
  {
    fen: 'r3k2r/p1ppqpb1/bn2pnp1/3PN3/1p2P3/2N2Q1p/PPPBBPPP/R3K2R w KQkq - 0 1',
    description: 'busy middlegame with all castling rights',
  },
  {
    fen: 'rnbqkbnr/ppp1p1pp/8/3pPp2/8/8/PPPP1PPP/RNBQKBNR w KQkq f6 0 3',
    description: 'en passant available on f6',
  },
  {
    fen: 'r3k2r/8/8/8/8/8/8/R3K2R b Kq - 12 30',
    description: 'partial castling rights, Black to move',
  },
  {
    fen: '8/8/8/8/8/8/8/4K2k w - - 0 1',
    description: 'bare kings',
  },
];

export const INVALID_FENS: FenFixture[] = [
  { fen: '', description: 'empty string' },
  { fen: 'invalid', description: 'single field' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0', description: 'five fields' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1', description: 'seven ranks' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBN w KQkq - 0 1', description: 'short rank' },
  { fen: 'rnbqkbnr/pppppppp/9/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1', description: 'digit 9' },
  { fen: 'rnbqkbnr/pppppppp/8p/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1', description: 'long rank' },
  { fen: 'rnbqkbnr/ppppxppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1', description: 'unknown piece' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR x KQkq - 0 1', description: 'bad side' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KX - 0 1', description: 'bad castling' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KKq - 0 1', description: 'repeated right' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq e4 0 1', description: 'en passant rank' },
  { fen: '4k3/8/8/8/4P3/8/8/4K3 w - e3 0 1', description: 'en passant rank for the side to move' },
  { fen: '8/8/8/8/8/8/8/44 w - - 0 1', description: 'consecutive digits' },
  { fen: '8/8/8/8/8/8/8/K16 w - - 0 1', description: 'consecutive digits after a piece' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq z9 0 1', description: 'en passant name' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - x 1', description: 'halfmove text' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - -1 1', description: 'negative clock' },
  { fen: 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 0', description: 'fullmove zero' },
];
