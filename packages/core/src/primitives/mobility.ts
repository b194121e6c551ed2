/**
 * Mobility
 *
 * Pseudo-legal destination squares and safety checks for single pieces.
 * Safety is tested on a scratch board with the piece actually relocated,
 * so sliders that were blocked by the piece itself are accounted for.
 */

import {
  ALL_SQUARES,
  fileIndex,
  getSurroundingSquares,
  isValidSquare,
  opponent,
  rankIndex,
  squareFromIndices,
  type Board,
  type Color,
  type Square,
} from '@tactica/board';

import type { BoardPool } from '../pool/board-pool.js';

import { canAttack, isAttackedBy } from './attacks.js';
import { findKing } from './piece-utils.js';

/**
 * Squares the piece on `from` could move to, ignoring pins and checks
 */
export function getMoveSquares(board: Board, from: Square): Square[] {
  const piece = board.get(from);
  if (!piece) return [];

  if (piece.type !== 'p') {
    return ALL_SQUARES.filter((to) => {
      const occupant = board.get(to);
      return (!occupant || occupant.color !== piece.color) && canAttack(board, from, piece, to);
    });
  }

  const squares: Square[] = [];
  const forward = piece.color === 'w' ? 1 : -1;
  const f = fileIndex(from);
  const r = rankIndex(from);

  const one = squareFromIndices(f, r + forward);
  if (one && board.isEmpty(one)) {
    squares.push(one);
    const startRank = piece.color === 'w' ? 1 : 6;
    const two = squareFromIndices(f, r + 2 * forward);
    if (r === startRank && two && board.isEmpty(two)) {
      squares.push(two);
    }
  }

  for (const df of [-1, 1]) {
    const diag = squareFromIndices(f + df, r + forward);
    const target = diag ? board.get(diag) : null;
    if (diag && target && target.color !== piece.color) {
      squares.push(diag);
    }
  }

  return squares;
}

/**
 * Would the piece on `from` be unattacked after moving to `to`?
 */
export function isSafeDestination(board: Board, from: Square, to: Square, pool: BoardPool): boolean {
  const piece = board.get(from);
  if (!piece || !isValidSquare(to)) return false;

  return pool.use(board, (scratch) => {
    scratch.set(from, null);
    scratch.set(to, piece);
    return !isAttackedBy(scratch, to, opponent(piece.color));
  });
}

/**
 * Destination squares where the piece on `from` would not be attacked
 */
export function getSafeMoveSquares(board: Board, from: Square, pool: BoardPool): Square[] {
  return getMoveSquares(board, from).filter((to) => isSafeDestination(board, from, to, pool));
}

/**
 * Count the safe destination squares of the piece on `square`
 */
export function countSafeSquaresForPiece(board: Board, square: Square, pool: BoardPool): number {
  return getSafeMoveSquares(board, square, pool).length;
}

/**
 * Squares the king of `color` could step to without being attacked
 */
export function getKingSafeSquares(board: Board, color: Color, pool: BoardPool): Square[] {
  const king = findKing(board, color);
  return king ? getSafeMoveSquares(board, king, pool) : [];
}

/**
 * Count squares around the king of `color` that the enemy attacks
 */
export function countAttackedKingSquares(board: Board, color: Color): number {
  const king = findKing(board, color);
  if (!king) return 0;
  const enemy = opponent(color);
  return getSurroundingSquares(king).filter((sq) => isAttackedBy(board, sq, enemy)).length;
}
