/**
 * Board Types
 *
 * Core value types shared by every package: colors, pieces and squares.
 */

/**
 * Side color, FEN convention
 */
export type Color = 'w' | 'b';

/**
 * Piece type, lowercase FEN letter
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/**
 * Promotion targets accepted in a move code
 */
export type PromotionType = 'q' | 'r' | 'b' | 'n';

/**
 * A piece occupying a square
 */
export interface Piece {
  color: Color;
  type: PieceType;
}

/**
 * Square in algebraic notation (e.g. "e4")
 */
export type Square = string;

/**
 * Grid coordinates; row 0 is rank 8, col 0 is the a-file
 */
export interface Coords {
  row: number;
  col: number;
}

/**
 * A piece together with the square it stands on
 */
export interface LocatedPiece extends Piece {
  square: Square;
}

/**
 * Ray direction on the board (compass, white at the bottom)
 */
export type Direction = 'n' | 's' | 'e' | 'w' | 'ne' | 'nw' | 'se' | 'sw';

/**
 * Get the opposing color
 */
export function opponent(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}
