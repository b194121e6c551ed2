/**
 * Skewer Detection
 *
 * A skewer is a pin the other way round: the front piece is worth more and
 * has to step aside, exposing the piece behind it.
 */

import { isSlidingPiece, opponent, pieceName, pieceValue } from '@tactica/board';

import { findPinsFromSquare, isAttackedBy } from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

export function detectSkewer(ctx: TacticContext): Finding | null {
  if (!isSlidingPiece(ctx.piece.type)) return null;

  const enemy = opponent(ctx.color);

  for (const line of findPinsFromSquare(ctx.after, ctx.move.to, ctx.piece.type, ctx.color)) {
    const front = line.pinnedPiece;
    const behind = line.protectedPiece;
    const squares = [ctx.move.to, front.square, behind.square];

    // King in front: reported even when the piece behind is defended
    if (front.type === 'k') {
      return createFinding('skewer', `skewers king, winning ${pieceName(behind.type)}`, squares);
    }

    if (
      pieceValue(front.type) > pieceValue(behind.type) &&
      !isAttackedBy(ctx.after, behind.square, enemy)
    ) {
      return createFinding(
        'skewer',
        `skewers ${pieceName(front.type)}, winning ${pieceName(behind.type)}`,
        squares,
      );
    }
  }

  return null;
}
