/**
 * Renderer Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { Position, piece, render, renderDiagram, square, squareName } from '../index.js';
import type { Square } from '../index.js';

const EMPTY_RANK = '· · · · · · · ·';

describe('Renderer', () => {
  describe('render', () => {
    it('renders the start position with filled glyphs', () => {
      expect(render(Position.standardStart())).toEqual([
        '♜ ♞ ♝ ♛ ♚ ♝ ♞ ♜',
        '♟ ♟ ♟ ♟ ♟ ♟ ♟ ♟',
        EMPTY_RANK,
        EMPTY_RANK,
        EMPTY_RANK,
        EMPTY_RANK,
        '♟ ♟ ♟ ♟ ♟ ♟ ♟ ♟',
        '♜ ♞ ♝ ♛ ♚ ♝ ♞ ♜',
      ]);
    });

    it('produces 8 lines of 8 cells', () => {
      const lines = render(Position.standardStart());
      expect(lines).toHaveLength(8);
      for (const line of lines) {
        expect(line.split(' ')).toHaveLength(8);
      }
    });

    it('renders rank 8 first and rank 1 last', () => {
      const lines = render(Position.standardStart(), { glyphs: 'ascii' });
      expect(lines[0]).toBe('r n b q k b n r');
      expect(lines[1]).toBe('p p p p p p p p');
      expect(lines[6]).toBe('P P P P P P P P');
      expect(lines[7]).toBe('R N B Q K B N R');
    });

    it('renders files a to h left to right', () => {
      const position = Position.empty();
      position.place(square('a', 1), piece('king', 'white'));
      position.place(square('h', 8), piece('king', 'black'));
      const lines = render(position, { glyphs: 'ascii', emptyMarker: '.' });
      expect(lines[0]).toBe('. . . . . . . k');
      expect(lines[7]).toBe('K . . . . . . .');
    });

    it('uses outlined glyphs for White in outline style', () => {
      const lines = render(Position.standardStart(), { glyphs: 'outline' });
      expect(lines[0]).toBe('♜ ♞ ♝ ♛ ♚ ♝ ♞ ♜');
      expect(lines[7]).toBe('♖ ♘ ♗ ♕ ♔ ♗ ♘ ♖');
    });

    it('returns identical output on repeated calls', () => {
      const position = Position.standardStart();
      expect(render(position)).toEqual(render(position));
    });

    it('reads only playing squares', () => {
      const position = Position.standardStart();
      const getRaw = vi.spyOn(position.board, 'getRaw');
      render(position);
      renderDiagram(position);
      expect(getRaw).not.toHaveBeenCalled();
    });

    it('ignores state that is not on the board', () => {
      const position = Position.standardStart();
      const before = render(position);
      position.setSideToMove('black');
      position.setCastlingRights({ whiteKingside: false });
      position.setHalfmoveClock(9);
      expect(render(position)).toEqual(before);
    });
  });

  describe('renderDiagram', () => {
    it('labels ranks and files', () => {
      const lines = renderDiagram(Position.standardStart(), { glyphs: 'ascii' });
      expect(lines).toHaveLength(9);
      expect(lines[0]).toBe('8  r  n  b  q  k  b  n  r ');
      expect(lines[2]).toBe('6  ·  ·  ·  ·  ·  ·  ·  · ');
      expect(lines[7]).toBe('1  R  N  B  Q  K  B  N  R ');
      expect(lines[8]).toBe('   a  b  c  d  e  f  g  h');
    });

    it('flips the board for Black', () => {
      const lines = renderDiagram(Position.standardStart(), {
        glyphs: 'ascii',
        perspective: 'black',
      });
      expect(lines[0]).toBe('1  R  N  B  K  Q  B  N  R ');
      expect(lines[7]).toBe('8  r  n  b  k  q  b  n  r ');
      expect(lines[8]).toBe('   h  g  f  e  d  c  b  a');
    });

    it('drops labels without coordinates', () => {
      const lines = renderDiagram(Position.standardStart(), {
        glyphs: 'ascii',
        coordinates: false,
      });
      expect(lines).toHaveLength(8);
      expect(lines[0]).toBe(' r  n  b  q  k  b  n  r ');
    });

    it('passes every cell through the decorator', () => {
      const decorate = vi.fn((_text: string, sq: Square) => `[${squareName(sq)}]`);
      const lines = renderDiagram(Position.empty(), { coordinates: false, decorate });
      expect(decorate).toHaveBeenCalledTimes(64);
      expect(lines[7]).toBe('[a1][b1][c1][d1][e1][f1][g1][h1]');
      expect(decorate).toHaveBeenCalledWith(' · ', square('a', 8), 'empty');
    });
  });
});
