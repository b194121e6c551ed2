/**
 * Fork Detection
 *
 * The moved piece attacks two or more enemy pieces at once:
 * - Royal knight fork: king plus queen, rook or a loose minor piece
 * - Family fork: king, queen and rook together
 * - General fork: the two most valuable targets, when one of them can
 *   actually be won
 */

import {
  isMinorPiece,
  opponent,
  pieceName,
  pieceValue,
  type LocatedPiece,
  type PieceType,
} from '@tactica/board';

import {
  canAttack,
  countSafeSquaresForPiece,
  getAttackedEnemies,
  isAttackedBy,
} from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

export function detectFork(ctx: TacticContext): Finding | null {
  const targets = getAttackedEnemies(ctx.after, ctx.move.to);
  if (targets.length < 2) return null;

  const has = (type: PieceType): LocatedPiece | undefined => targets.find((t) => t.type === type);
  const king = has('k');

  if (ctx.piece.type === 'n' && king) {
    const royal = detectRoyalKnightFork(ctx, targets, king);
    if (royal) return royal;
  }

  const queen = has('q');
  const rook = has('r');
  if (targets.length >= 3 && king && queen && rook) {
    return createFinding('fork', 'family fork (king, queen, and rook)', [
      ctx.move.to,
      king.square,
      queen.square,
      rook.square,
    ]);
  }

  return detectGeneralFork(ctx, targets);
}

function detectRoyalKnightFork(
  ctx: TacticContext,
  targets: LocatedPiece[],
  king: LocatedPiece,
): Finding | null {
  const queen = targets.find((t) => t.type === 'q');
  if (queen) {
    return createFinding('fork', 'royal fork (king and queen)', [ctx.move.to, king.square, queen.square]);
  }

  const rook = targets.find((t) => t.type === 'r');
  if (rook) {
    return createFinding('fork', 'forks king and rook', [ctx.move.to, king.square, rook.square]);
  }

  const enemy = opponent(ctx.color);
  const minor = targets.find(
    (t) =>
      isMinorPiece(t.type) &&
      (!isAttackedBy(ctx.after, t.square, enemy) ||
        countSafeSquaresForPiece(ctx.after, t.square, ctx.pool) === 0),
  );
  if (minor) {
    return createFinding('fork', `forks king and ${pieceName(minor.type)}`, [
      ctx.move.to,
      king.square,
      minor.square,
    ]);
  }

  return null;
}

function detectGeneralFork(ctx: TacticContext, targets: LocatedPiece[]): Finding | null {
  const [first, second] = targets
    .filter((t) => pieceValue(t.type) >= 3)
    .sort((a, b) => pieceValue(b.type) - pieceValue(a.type));
  if (!first || !second) return null;

  if (!canWinTarget(ctx, first, second) && !canWinTarget(ctx, second, first)) return null;

  return createFinding('fork', `forks ${pieceName(first.type)} and ${pieceName(second.type)}`, [
    ctx.move.to,
    first.square,
    second.square,
  ]);
}

/**
 * Can `target` be won, given that `other` is attacked at the same time?
 */
function canWinTarget(ctx: TacticContext, target: LocatedPiece, other: LocatedPiece): boolean {
  if (target.type === 'k') return true;

  const forkerValue = pieceValue(ctx.piece.type);
  const targetValue = pieceValue(target.type);
  const targetRecaptures = canAttack(ctx.after, target.square, target, ctx.move.to);

  if (!targetRecaptures) {
    const undefended = !isAttackedBy(ctx.after, target.square, opponent(ctx.color));
    return undefended || targetValue > forkerValue;
  }

  const otherRecaptures = canAttack(ctx.after, other.square, other, ctx.move.to);
  return targetValue > forkerValue && !otherRecaptures;
}
