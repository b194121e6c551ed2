/**
 * Piece Utilities
 *
 * Piece values, naming and classification. Values are in pawns; the king
 * carries a large sentinel so it always outranks material in comparisons.
 */

import type { Piece, PieceType, PromotionType } from './types.js';

/**
 * Material value of each piece type in pawns
 */
export const PIECE_VALUES: Readonly<Record<PieceType, number>> = {
  p: 1,
  n: 3,
  b: 3,
  r: 5,
  q: 9,
  k: 100,
};

/**
 * Get piece value in pawns
 */
export function pieceValue(type: PieceType): number {
  return PIECE_VALUES[type];
}

/**
 * Get human-readable piece name
 */
export function pieceName(type: PieceType): string {
  switch (type) {
    case 'p':
      return 'pawn';
    case 'n':
      return 'knight';
    case 'b':
      return 'bishop';
    case 'r':
      return 'rook';
    case 'q':
      return 'queen';
    case 'k':
      return 'king';
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}

/**
 * Type guard for piece type letters
 */
export function isPieceType(value: string): value is PieceType {
  return (
    value === 'p' ||
    value === 'n' ||
    value === 'b' ||
    value === 'r' ||
    value === 'q' ||
    value === 'k'
  );
}

/**
 * Type guard for promotion letters
 */
export function isPromotionType(value: string): value is PromotionType {
  return value === 'q' || value === 'r' || value === 'b' || value === 'n';
}

/**
 * Parse a FEN piece letter (uppercase = white)
 */
export function pieceFromFenChar(char: string): Piece | null {
  const lower = char.toLowerCase();
  if (!isPieceType(lower)) return null;
  return { type: lower, color: char === lower ? 'b' : 'w' };
}

/**
 * FEN piece letter (uppercase = white)
 */
export function pieceToFenChar(piece: Piece): string {
  return piece.color === 'w' ? piece.type.toUpperCase() : piece.type;
}

/**
 * Check if piece is a sliding piece (bishop, rook, queen)
 */
export function isSlidingPiece(type: PieceType): boolean {
  return type === 'b' || type === 'r' || type === 'q';
}

/**
 * Check if piece is a major piece (rook, queen)
 */
export function isMajorPiece(type: PieceType): boolean {
  return type === 'r' || type === 'q';
}

/**
 * Check if piece is a minor piece (knight, bishop)
 */
export function isMinorPiece(type: PieceType): boolean {
  return type === 'n' || type === 'b';
}
