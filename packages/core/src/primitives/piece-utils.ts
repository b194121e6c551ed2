/**
 * Piece Utilities
 */

import type { Board, Color, Square } from '@tactica/board';

/**
 * Find king location for a color
 */
export function findKing(board: Board, color: Color): Square | null {
  return board.pieces(color).find((p) => p.type === 'k')?.square ?? null;
}
