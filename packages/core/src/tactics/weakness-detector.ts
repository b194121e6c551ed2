/**
 * Weakness Detection
 *
 * Trapped and hanging pieces among the enemies the moved piece attacks,
 * plus back-rank threats against a king boxed in by its own pawns.
 */

import {
  backRank,
  fileIndex,
  opponent,
  pieceName,
  pieceValue,
  rank,
  squareFromIndices,
  type LocatedPiece,
} from '@tactica/board';

import {
  canAttack,
  countSafeSquaresForPiece,
  findKing,
  getAttackedEnemies,
  getMoveSquares,
  isAttackedBy,
  isSafeDestination,
} from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

/**
 * Count escapes that are safe, or captures of something at least as valuable
 */
function countEscapes(ctx: TacticContext, target: LocatedPiece): number {
  const value = pieceValue(target.type);
  return getMoveSquares(ctx.after, target.square).filter((dest) => {
    if (isSafeDestination(ctx.after, target.square, dest, ctx.pool)) return true;
    const prey = ctx.after.get(dest);
    return prey !== null && pieceValue(prey.type) >= value;
  }).length;
}

export function detectTrappedPiece(ctx: TacticContext): Finding | null {
  const trapped = getAttackedEnemies(ctx.after, ctx.move.to)
    .filter((t) => t.type !== 'p' && t.type !== 'k' && pieceValue(t.type) >= 3)
    .find((t) => countEscapes(ctx, t) === 0);
  if (!trapped) return null;

  return createFinding('trapped-piece', `traps ${pieceName(trapped.type)}`, [
    ctx.move.to,
    trapped.square,
  ]);
}

export function detectHangingPiece(ctx: TacticContext): Finding | null {
  const enemy = opponent(ctx.color);
  const attackerValue = pieceValue(ctx.piece.type);
  const recapturable = isAttackedBy(ctx.after, ctx.move.to, enemy);

  for (const target of getAttackedEnemies(ctx.after, ctx.move.to)) {
    if (target.type === 'k') continue;
    const value = pieceValue(target.type);
    if (value < 3 && value < attackerValue) continue;
    if (isAttackedBy(ctx.after, target.square, enemy)) continue;
    if (countSafeSquaresForPiece(ctx.after, target.square, ctx.pool) > 0) continue;
    if (recapturable && value <= attackerValue) continue;

    return createFinding('hanging-piece', `wins undefended ${pieceName(target.type)}`, [
      ctx.move.to,
      target.square,
    ]);
  }

  return null;
}

export function detectBackRankThreat(ctx: TacticContext): Finding | null {
  if (ctx.piece.type !== 'r' && ctx.piece.type !== 'q') return null;

  const enemy = opponent(ctx.color);
  const enemyRank = backRank(enemy);
  if (rank(ctx.move.to) !== enemyRank) return null;

  const king = findKing(ctx.after, enemy);
  if (!king || rank(king) !== enemyRank) return null;

  // Rank index (0-7) of the rank in front of the king
  const escapeRank = enemy === 'w' ? 1 : 6;
  const kingFile = fileIndex(king);
  let safeEscapes = 0;

  for (let df = -1; df <= 1; df++) {
    const sq = squareFromIndices(kingFile + df, escapeRank);
    if (!sq) continue;
    const occupant = ctx.after.get(sq);
    if (occupant?.color === enemy) continue;
    if (!isAttackedBy(ctx.after, sq, ctx.color)) safeEscapes++;
  }

  if (safeEscapes > 0) return null;

  if (canAttack(ctx.after, ctx.move.to, ctx.piece, king)) {
    return createFinding('back-rank', 'back rank mate threat', [ctx.move.to, king]);
  }
  return createFinding('back-rank', 'threatens back rank', [ctx.move.to, king]);
}
