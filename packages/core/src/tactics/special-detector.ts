/**
 * Special Tactics Detection
 *
 * Narrow patterns that only count when the threatened gain is real:
 * - Promotion threats and passed-pawn advances
 * - Smothered mate
 * - X-ray attacks through a piece
 * - Decoy sacrifices next to the king
 * - Double attacks (check plus material, or two loose targets)
 */

import {
  fileIndex,
  getSurroundingSquares,
  isSlidingPiece,
  opponent,
  pieceValue,
  rank,
  rankIndex,
  squareFromIndices,
  type LocatedPiece,
} from '@tactica/board';

import {
  countAttackers,
  countDefenders,
  findKing,
  getAttackedEnemies,
  getDirectionsForPiece,
  getKingSafeSquares,
  getPiecesOnRay,
  isAttackedBy,
  isGivingCheck,
} from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

export function detectPromotionThreat(ctx: TacticContext): Finding | null {
  if (ctx.piece.type !== 'p') return null;

  const forward = ctx.color === 'w' ? 1 : -1;
  const distance = ctx.color === 'w' ? 8 - rank(ctx.move.to) : rank(ctx.move.to) - 1;
  const ahead = squareFromIndices(fileIndex(ctx.move.to), rankIndex(ctx.move.to) + forward);
  if (!ahead || !ctx.after.isEmpty(ahead)) return null;

  if (distance === 1) {
    return createFinding('promotion', 'threatens promotion', [ctx.move.to, ahead]);
  }
  if (distance === 2) {
    return createFinding('promotion', 'advances passed pawn', [ctx.move.to, ahead]);
  }
  return null;
}

export function detectSmotheredMate(ctx: TacticContext): Finding | null {
  if (ctx.piece.type !== 'n' || !isGivingCheck(ctx.after, ctx.move.to)) return null;

  const enemy = opponent(ctx.color);
  const king = findKing(ctx.after, enemy);
  if (!king) return null;
  if (getKingSafeSquares(ctx.after, enemy, ctx.pool).length > 0) return null;

  const neighbours = getSurroundingSquares(king);
  const ownBlockers = neighbours.filter((sq) => ctx.after.get(sq)?.color === enemy).length;

  // Six blockers, or every neighbour when the king sits on the edge
  if (ownBlockers < Math.min(6, neighbours.length)) return null;

  return createFinding('smothered-mate', 'smothered mate', [ctx.move.to, king]);
}

export function detectXRayAttack(ctx: TacticContext): Finding | null {
  if (!isSlidingPiece(ctx.piece.type)) return null;

  const enemy = opponent(ctx.color);
  const sliderValue = pieceValue(ctx.piece.type);

  for (const dir of getDirectionsForPiece(ctx.piece.type)) {
    const [first, second] = getPiecesOnRay(ctx.after, ctx.move.to, dir);
    if (!first || !second || second.color !== enemy) continue;

    const value = pieceValue(second.type);
    if (value < 3) continue;
    if (isAttackedBy(ctx.after, second.square, enemy) && value <= sliderValue) continue;

    return createFinding('x-ray', 'x-ray attack', [ctx.move.to, first.square, second.square]);
  }

  return null;
}

export function detectDecoy(ctx: TacticContext): Finding | null {
  const value = pieceValue(ctx.piece.type);
  if (value < 3) return null;
  // Taking something at least as valuable is a trade, not a lure
  if (ctx.captured && pieceValue(ctx.captured.type) >= value) return null;

  const enemy = opponent(ctx.color);
  const defenders = countDefenders(ctx.after, ctx.move.to, ctx.color);
  const attackers = countAttackers(ctx.after, ctx.move.to, enemy);

  if (attackers === 0) return null;
  if (defenders >= 2 && defenders >= attackers) return null;
  if (!isGivingCheck(ctx.after, ctx.move.to)) return null;
  if (getKingSafeSquares(ctx.after, enemy, ctx.pool).length > 2) return null;

  return createFinding('decoy', 'decoy sacrifice', [ctx.move.to]);
}

/**
 * Worth at least a minor piece and loose, or worth more than the attacker
 */
function isWinnable(ctx: TacticContext, target: LocatedPiece): boolean {
  if (target.type === 'k') return false;
  const value = pieceValue(target.type);
  if (value < 3) return false;
  return (
    !isAttackedBy(ctx.after, target.square, opponent(ctx.color)) ||
    value > pieceValue(ctx.piece.type)
  );
}

export function detectDoubleAttack(ctx: TacticContext): Finding | null {
  const targets = getAttackedEnemies(ctx.after, ctx.move.to);
  if (targets.length < 2) return null;

  const winnable = targets.filter((t) => isWinnable(ctx, t));
  const king = targets.find((t) => t.type === 'k');

  if (king && winnable[0]) {
    return createFinding('double-attack', 'double attack: check and wins material', [
      ctx.move.to,
      king.square,
      winnable[0].square,
    ]);
  }

  if (winnable.length >= 2) {
    return createFinding('double-attack', 'double attack on multiple pieces', [
      ctx.move.to,
      ...winnable.map((t) => t.square),
    ]);
  }

  return null;
}
