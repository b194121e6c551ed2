/**
 * Defender Tactics Detection
 *
 * - Removal of defender: the captured piece was the last guard of another piece
 * - Overloading: one enemy piece guards two attacked pieces
 * - Deflection: the captured piece was the only guard of a square next to
 *   its king that another of our pieces now hits
 */

import {
  getSurroundingSquares,
  opponent,
  pieceName,
  pieceValue,
  type LocatedPiece,
} from '@tactica/board';

import { canAttack, findKing, getAttackers, isAttackedBy } from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

function isValuable(piece: LocatedPiece): boolean {
  return piece.type !== 'k' && pieceValue(piece.type) >= 3;
}

export function detectRemovalOfDefender(ctx: TacticContext): Finding | null {
  const { captured, capturedOn } = ctx;
  if (!captured || !capturedOn) return null;

  const enemy = opponent(ctx.color);

  for (const guarded of ctx.before.pieces(enemy)) {
    if (guarded.square === capturedOn || !isValuable(guarded)) continue;
    if (!canAttack(ctx.before, capturedOn, captured, guarded.square)) continue;

    const stillThere = ctx.after.get(guarded.square);
    if (stillThere?.color !== enemy) continue;
    if (isAttackedBy(ctx.after, guarded.square, enemy)) continue;
    if (!isAttackedBy(ctx.after, guarded.square, ctx.color)) continue;

    return createFinding('removal-of-defender', `removes defender of ${pieceName(guarded.type)}`, [
      ctx.move.to,
      guarded.square,
    ]);
  }

  return null;
}

export function detectOverloading(ctx: TacticContext): Finding | null {
  const enemy = opponent(ctx.color);
  const enemies = ctx.after.pieces(enemy);

  for (const defender of enemies) {
    const duties = enemies
      .filter((p) => p.square !== defender.square && isValuable(p))
      .filter((p) => canAttack(ctx.after, defender.square, defender, p.square))
      .filter((p) => isAttackedBy(ctx.after, p.square, ctx.color))
      .sort((a, b) => pieceValue(b.type) - pieceValue(a.type));

    if (duties.length < 2) continue;
    if (!duties.some((p) => canAttack(ctx.after, ctx.move.to, ctx.piece, p.square))) continue;

    const [a, b] = duties;
    if (!a || !b) continue;

    return createFinding(
      'overloading',
      `overloads defender of ${pieceName(a.type)} and ${pieceName(b.type)}`,
      [defender.square, a.square, b.square],
    );
  }

  return null;
}

export function detectDeflection(ctx: TacticContext): Finding | null {
  const { captured, capturedOn } = ctx;
  if (!captured || !capturedOn) return null;

  const king = findKing(ctx.before, captured.color);
  if (!king) return null;

  const covered = getSurroundingSquares(king).find((sq) => {
    if (sq === capturedOn || !canAttack(ctx.before, capturedOn, captured, sq)) return false;
    const ours = getAttackers(ctx.after, sq, ctx.color).filter((a) => a.square !== ctx.move.to);
    const theirs = getAttackers(ctx.after, sq, captured.color).filter((a) => a.type !== 'k');
    return ours.length > 0 && theirs.length === 0;
  });
  if (!covered) return null;

  return createFinding('deflection', 'deflects key defender', [ctx.move.to, covered, king]);
}
