/**
 * Discovery Detection
 *
 * Detects tactics unleashed by the moved piece getting out of the way:
 * - Double check: the moved piece and a second piece both check the king
 * - Discovered check / attack: a friendly slider behind the source square
 *   now reaches an enemy it could not reach before
 */

import { isSlidingPiece, opponent, pieceName, pieceValue, type LocatedPiece } from '@tactica/board';

import {
  canAttack,
  getAttackedEnemies,
  getCheckers,
  getSquaresBetween,
  isGivingCheck,
} from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

export function detectDoubleCheck(ctx: TacticContext): Finding | null {
  if (!isGivingCheck(ctx.after, ctx.move.to)) return null;

  const checkers = getCheckers(ctx.after, opponent(ctx.color));
  if (checkers.length < 2) return null;

  return createFinding('double-check', 'double check!', checkers.map((c) => c.square));
}

interface Discovery {
  slider: LocatedPiece;
  target: LocatedPiece;
}

function findDiscoveries(ctx: TacticContext): Discovery[] {
  // The castled rook's new line is not uncovered by the king
  if (ctx.castling) return [];

  const discoveries: Discovery[] = [];
  const sliders = ctx.after
    .pieces(ctx.color)
    .filter((p) => p.square !== ctx.move.to && isSlidingPiece(p.type));

  for (const slider of sliders) {
    for (const target of ctx.after.pieces(opponent(ctx.color))) {
      if (!canAttack(ctx.after, slider.square, slider, target.square)) continue;
      if (canAttack(ctx.before, slider.square, slider, target.square)) continue;
      if (!getSquaresBetween(slider.square, target.square).includes(ctx.move.from)) continue;
      discoveries.push({ slider, target });
    }
  }

  return discoveries;
}

export function detectDiscoveredAttack(ctx: TacticContext): Finding | null {
  const discoveries = findDiscoveries(ctx);
  if (discoveries.length === 0) return null;

  const onKing = discoveries.find((d) => d.target.type === 'k');
  if (onKing) {
    const squares = [onKing.slider.square, onKing.target.square];
    const prize = getAttackedEnemies(ctx.after, ctx.move.to)
      .filter((t) => t.type !== 'k' && pieceValue(t.type) >= 5)
      .sort((a, b) => pieceValue(b.type) - pieceValue(a.type))[0];

    if (prize) {
      return createFinding('discovered-check', `discovered check, wins ${pieceName(prize.type)}`, [
        ...squares,
        prize.square,
      ]);
    }
    return createFinding('discovered-check', 'discovered check', squares);
  }

  const heavy = discoveries
    .filter((d) => pieceValue(d.target.type) >= 5)
    .sort((a, b) => pieceValue(b.target.type) - pieceValue(a.target.type))[0];
  if (!heavy) return null;

  return createFinding('discovered-attack', `discovered attack on ${pieceName(heavy.target.type)}`, [
    heavy.slider.square,
    heavy.target.square,
  ]);
}
