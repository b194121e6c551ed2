/**
 * Pin and king-legality checks
 */

import { getDirection, oppositeDirection, type Board, type Square } from '@tactica/board';

import { isKingInCheck } from './attacks.js';
import { findKing } from './piece-utils.js';
import { canPieceMoveInDirection, getFirstPieceOnRay, isClearPath } from './ray-casting.js';

/**
 * Is the piece on `square` absolutely pinned to its own king?
 */
export function isPiecePinned(board: Board, square: Square): boolean {
  const piece = board.get(square);
  if (!piece || piece.type === 'k') return false;

  const king = findKing(board, piece.color);
  if (!king) return false;

  const dir = getDirection(king, square);
  if (!dir || !isClearPath(board, king, square)) return false;

  const beyond = getFirstPieceOnRay(board, square, dir);
  return (
    beyond !== null &&
    beyond.color !== piece.color &&
    canPieceMoveInDirection(beyond.type, oppositeDirection(dir))
  );
}

/**
 * Does moving the piece on `from` to `to` keep it on the line to its king?
 * Pinned pieces may still capture along the pin.
 */
export function staysOnKingLine(board: Board, from: Square, to: Square): boolean {
  const piece = board.get(from);
  if (!piece) return false;
  const king = findKing(board, piece.color);
  if (!king) return false;
  const pinDir = getDirection(king, from);
  return pinDir !== null && pinDir === getDirection(king, to);
}

/**
 * Would the mover's king be safe after `from` to `to` is played on `scratch`?
 * Mutates `scratch`; callers pass a rented copy.
 */
export function leavesKingSafe(scratch: Board, from: Square, to: Square): boolean {
  const piece = scratch.get(from);
  if (!piece) return false;
  scratch.set(from, null);
  scratch.set(to, piece);
  return !isKingInCheck(scratch, piece.color);
}
