/**
 * Pin Detection
 *
 * Only a moved bishop, rook or queen can pin. Along each of its lines the
 * first piece must be an enemy with a second enemy behind it:
 * - Absolute pin: the piece behind is the king
 * - Relative pin: the piece behind is worth more, and is either undefended
 *   or worth enough more than the pinner that trading into it pays
 */

import { isSlidingPiece, opponent, pieceName, pieceValue } from '@tactica/board';

import { findPinsFromSquare, isAttackedBy } from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

export function detectPin(ctx: TacticContext): Finding | null {
  if (!isSlidingPiece(ctx.piece.type)) return null;

  const enemy = opponent(ctx.color);
  const lines = findPinsFromSquare(ctx.after, ctx.move.to, ctx.piece.type, ctx.color);

  const absolute = lines.find((l) => l.protectedPiece.type === 'k');
  if (absolute) {
    return createFinding('pin', `pins ${pieceName(absolute.pinnedPiece.type)} to king (absolute)`, [
      ctx.move.to,
      absolute.pinnedPiece.square,
      absolute.protectedPiece.square,
    ]);
  }

  const pinnerValue = pieceValue(ctx.piece.type);
  for (const line of lines) {
    const front = line.pinnedPiece;
    const behind = line.protectedPiece;
    const behindValue = pieceValue(behind.type);
    if (behindValue <= pieceValue(front.type)) continue;

    const undefended = !isAttackedBy(ctx.after, behind.square, enemy);
    if (!undefended && behindValue - pinnerValue < ctx.thresholds.relativePinGain) continue;

    return createFinding('pin', `pins ${pieceName(front.type)} to ${pieceName(behind.type)}`, [
      ctx.move.to,
      front.square,
      behind.square,
    ]);
  }

  return null;
}
