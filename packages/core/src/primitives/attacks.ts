/**
 * Attack Primitives
 *
 * Movement-rule attack checks. These ignore whose turn it is and whether
 * the attacking piece is pinned; legality is layered on top where it
 * matters (the exchange evaluator).
 */

import {
  fileIndex,
  getDirection,
  isValidSquare,
  opponent,
  pieceValue,
  rankIndex,
  type Board,
  type Color,
  type LocatedPiece,
  type Piece,
  type Square,
} from '@tactica/board';

import { findKing } from './piece-utils.js';
import { canPieceMoveInDirection, isClearPath } from './ray-casting.js';

/**
 * Can `piece` standing on `from` attack `to`?
 *
 * Pawns attack one rank forward diagonally, forward depending on color.
 * Knights and kings use fixed offsets. Sliders need a clear line.
 */
export function canAttack(board: Board, from: Square, piece: Piece, to: Square): boolean {
  if (!isValidSquare(from) || !isValidSquare(to) || from === to) return false;

  const df = fileIndex(to) - fileIndex(from);
  const dr = rankIndex(to) - rankIndex(from);

  switch (piece.type) {
    case 'p': {
      const forward = piece.color === 'w' ? 1 : -1;
      return dr === forward && Math.abs(df) === 1;
    }
    case 'n':
      return (
        (Math.abs(df) === 1 && Math.abs(dr) === 2) || (Math.abs(df) === 2 && Math.abs(dr) === 1)
      );
    case 'k':
      return Math.max(Math.abs(df), Math.abs(dr)) === 1;
    case 'b':
    case 'r':
    case 'q': {
      const dir = getDirection(from, to);
      return dir !== null && canPieceMoveInDirection(piece.type, dir) && isClearPath(board, from, to);
    }
    default: {
      const unreachable: never = piece.type;
      return unreachable;
    }
  }
}

/**
 * All pieces of `color` attacking `square`, cheapest first
 */
export function getAttackers(board: Board, square: Square, color: Color): LocatedPiece[] {
  if (!isValidSquare(square)) return [];

  return board
    .pieces(color)
    .filter((p) => canAttack(board, p.square, p, square))
    .sort((a, b) => pieceValue(a.type) - pieceValue(b.type));
}

/**
 * Is `square` attacked by any piece of `color`?
 */
export function isAttackedBy(board: Board, square: Square, color: Color): boolean {
  if (!isValidSquare(square)) return false;
  return board.pieces(color).some((p) => canAttack(board, p.square, p, square));
}

/**
 * Count pieces of `color` attacking `square`
 */
export function countAttackers(board: Board, square: Square, color: Color): number {
  return getAttackers(board, square, color).length;
}

/**
 * Count pieces of `color` defending `square` (same geometry as attacking)
 */
export function countDefenders(board: Board, square: Square, color: Color): number {
  return countAttackers(board, square, color);
}

/**
 * Value of the cheapest attacker of `color`, 0 when there is none
 */
export function lowestAttackerValue(board: Board, square: Square, color: Color): number {
  const cheapest = getAttackers(board, square, color)[0];
  return cheapest ? pieceValue(cheapest.type) : 0;
}

/**
 * Value of the cheapest defender of `color`, 0 when there is none
 */
export function lowestDefenderValue(board: Board, square: Square, color: Color): number {
  return lowestAttackerValue(board, square, color);
}

/**
 * Is the king of `color` attacked? False when it has no king.
 */
export function isKingInCheck(board: Board, color: Color): boolean {
  const king = findKing(board, color);
  return king !== null && isAttackedBy(board, king, opponent(color));
}

/**
 * Pieces giving check to the king of `color`
 */
export function getCheckers(board: Board, color: Color): LocatedPiece[] {
  const king = findKing(board, color);
  return king ? getAttackers(board, king, opponent(color)) : [];
}

/**
 * Does the piece on `square` attack the enemy king?
 */
export function isGivingCheck(board: Board, square: Square): boolean {
  const piece = board.get(square);
  if (!piece) return false;
  const king = findKing(board, opponent(piece.color));
  return king !== null && canAttack(board, square, piece, king);
}

/**
 * Enemy pieces attacked by the piece on `square`
 */
export function getAttackedEnemies(board: Board, square: Square): LocatedPiece[] {
  const piece = board.get(square);
  if (!piece) return [];
  return board
    .pieces(opponent(piece.color))
    .filter((target) => canAttack(board, square, piece, target.square));
}
