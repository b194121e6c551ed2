/**
 * Threat Detection
 *
 * - Threat creation: the moved piece newly attacks a more valuable enemy
 * - Lower-value threat: a piece is attacked by something cheaper than itself
 */

import { opponent, pieceName, pieceValue, type Board, type Square } from '@tactica/board';

import { getAttackedEnemies, getAttackers, isAttackedBy } from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

export function detectThreatCreation(ctx: TacticContext): Finding | null {
  const moverValue = pieceValue(ctx.piece.type);

  const targets = getAttackedEnemies(ctx.after, ctx.move.to)
    .filter((t) => t.type !== 'k')
    .filter((t) => pieceValue(t.type) > moverValue)
    .filter((t) => !isAttackedBy(ctx.before, t.square, ctx.color))
    .sort((a, b) => pieceValue(b.type) - pieceValue(a.type));

  const target = targets[0];
  if (!target) return null;

  return createFinding('threat', `creates threat on ${pieceName(target.type)}`, [
    ctx.move.to,
    target.square,
  ]);
}

/**
 * Is the piece on `square` attacked by a cheaper enemy piece?
 */
export function findLowerValueThreat(board: Board, square: Square): Finding | null {
  const piece = board.get(square);
  if (!piece) return null;

  const cheapest = getAttackers(board, square, opponent(piece.color))[0];
  if (!cheapest || pieceValue(cheapest.type) >= pieceValue(piece.type)) return null;

  return createFinding(
    'lower-value-threat',
    `${pieceName(piece.type)} attacked by ${pieceName(cheapest.type)}`,
    [square, cheapest.square],
  );
}
