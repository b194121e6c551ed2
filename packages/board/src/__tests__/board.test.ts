import { describe, it, expect } from 'vitest';

import {
  Board,
  InvalidFenError,
  tryParseBoard,
  parseMove,
  formatMove,
  toCoords,
  fromCoords,
  getDirection,
  getSurroundingSquares,
  isValidSquare,
  pieceName,
  pieceValue,
  pieceFromFenChar,
  isSlidingPiece,
  isMajorPiece,
  isMinorPiece,
  type PieceType,
} from '../index.js';

const PIECE_TYPES: PieceType[] = ['p', 'n', 'b', 'r', 'q', 'k'];

describe('Board', () => {
  describe('fromFen', () => {
    it('parses a full FEN and ignores the trailing fields', () => {
      const board = Board.fromFen('4k3/8/8/3b4/8/8/8/3RK3 w - - 0 1');

      expect(board.get('e8')).toEqual({ type: 'k', color: 'b' });
      expect(board.get('d5')).toEqual({ type: 'b', color: 'b' });
      expect(board.get('d1')).toEqual({ type: 'r', color: 'w' });
      expect(board.get('e4')).toBeNull();
    });

    it('accepts a bare placement field', () => {
      expect(Board.fromFen('8/8/8/8/8/8/8/K6k').get('h1')).toEqual({ type: 'k', color: 'b' });
    });

    it('accepts illegal placements', () => {
      const board = Board.fromFen('P7/8/8/8/8/8/8/8');
      expect(board.get('a8')).toEqual({ type: 'p', color: 'w' });
    });

    it('throws InvalidFenError for malformed placements', () => {
      expect(() => Board.fromFen('8/8/8')).toThrow(InvalidFenError);
      expect(() => Board.fromFen('9/8/8/8/8/8/8/8')).toThrow(InvalidFenError);
      expect(() => Board.fromFen('x7/8/8/8/8/8/8/8')).toThrow(InvalidFenError);
      expect(() => Board.fromFen('7/8/8/8/8/8/8/8')).toThrow(InvalidFenError);
    });

    it('tryParseBoard returns null instead of throwing', () => {
      expect(tryParseBoard('not a fen')).toBeNull();
      expect(tryParseBoard('8/8/8/8/8/8/8/8')).not.toBeNull();
    });
  });

  describe('toFen', () => {
    it('round-trips the placement', () => {
      const placement = 'r1bqkb1r/pppp1ppp/2n2n2/4p3/2B1P3/5N2/PPPP1PPP/RNBQK2R';
      expect(Board.fromFen(placement).toFen()).toBe(placement);
    });
  });

  describe('mutation', () => {
    it('set ignores off-board squares', () => {
      const board = new Board();
      board.set('i9', { type: 'q', color: 'w' });
      expect(board.pieces()).toEqual([]);
      expect(board.get('i9')).toBeNull();
    });

    it('clone is independent of the source', () => {
      const board = Board.fromFen('4k3/8/8/8/8/8/8/4K3');
      const copy = board.clone();
      copy.set('e1', null);

      expect(board.get('e1')).toEqual({ type: 'k', color: 'w' });
      expect(copy.get('e1')).toBeNull();
      expect(board.equals(copy)).toBe(false);
    });

    it('copyFrom and clear', () => {
      const source = Board.fromFen('4k3/8/8/8/8/8/8/4K3');
      const target = new Board();
      target.copyFrom(source);
      expect(target.equals(source)).toBe(true);

      target.clear();
      expect(target.pieces()).toEqual([]);
    });

    it('lists pieces by color in FEN order', () => {
      const board = Board.fromFen('4k3/8/8/8/8/8/8/R3K3');
      expect(board.pieces('w')).toEqual([
        { square: 'a1', type: 'r', color: 'w' },
        { square: 'e1', type: 'k', color: 'w' },
      ]);
    });

    it('fromPieces places each piece', () => {
      const board = Board.fromPieces({ c3: { type: 'n', color: 'w' } });
      expect(board.toFen()).toBe('8/8/8/8/8/2N5/8/8');
    });
  });
});

describe('squares', () => {
  it('maps squares to grid coordinates with row 0 = rank 8', () => {
    expect(toCoords('a8')).toEqual({ row: 0, col: 0 });
    expect(toCoords('h1')).toEqual({ row: 7, col: 7 });
    expect(toCoords('e9')).toBeNull();
    expect(fromCoords(4, 4)).toBe('e4');
    expect(fromCoords(8, 0)).toBeNull();
  });

  it('validates square names', () => {
    expect(isValidSquare('e4')).toBe(true);
    expect(isValidSquare('e0')).toBe(false);
    expect(isValidSquare('z1')).toBe(false);
    expect(isValidSquare('e44')).toBe(false);
  });

  it('finds line directions', () => {
    expect(getDirection('a1', 'h8')).toBe('ne');
    expect(getDirection('e4', 'e1')).toBe('s');
    expect(getDirection('e4', 'f6')).toBeNull();
  });

  it('lists surrounding squares, clipped at the edge', () => {
    expect(getSurroundingSquares('a1').sort()).toEqual(['a2', 'b1', 'b2']);
    expect(getSurroundingSquares('e4')).toHaveLength(8);
  });
});

describe('pieces', () => {
  it('names and values', () => {
    expect(pieceName('n')).toBe('knight');
    expect(pieceValue('q')).toBe(9);
    expect(pieceValue('k')).toBe(100);
  });

  it('parses FEN letters', () => {
    expect(pieceFromFenChar('Q')).toEqual({ type: 'q', color: 'w' });
    expect(pieceFromFenChar('n')).toEqual({ type: 'n', color: 'b' });
    expect(pieceFromFenChar('x')).toBeNull();
  });

  it('groups piece types', () => {
    expect(PIECE_TYPES.filter(isSlidingPiece)).toEqual(['b', 'r', 'q']);
    expect(PIECE_TYPES.filter(isMajorPiece)).toEqual(['r', 'q']);
    expect(PIECE_TYPES.filter(isMinorPiece)).toEqual(['n', 'b']);
  });
});

describe('parseMove', () => {
  it('parses plain and promotion codes', () => {
    expect(parseMove('e2e4')).toEqual({ from: 'e2', to: 'e4' });
    expect(parseMove('E7E8Q')).toEqual({ from: 'e7', to: 'e8', promotion: 'q' });
  });

  it('rejects malformed codes', () => {
    expect(parseMove('e2e9')).toBeNull();
    expect(parseMove('Nf3')).toBeNull();
    expect(parseMove('e7e8k')).toBeNull();
    expect(parseMove('e2e2')).toBeNull();
    expect(parseMove('')).toBeNull();
  });

  it('formats back to a code', () => {
    expect(formatMove({ from: 'a7', to: 'a8', promotion: 'n' })).toBe('a7a8n');
  });
});
