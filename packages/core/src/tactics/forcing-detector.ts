/**
 * Forcing Lines
 *
 * - Perpetual check, read off the main PV
 * - Plain check, the lowest-priority finding
 */

import { opponent } from '@tactica/board';

import { findKing, getAttackedEnemies, isGivingCheck, isKingInCheck } from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

const PERPETUAL_MIN_MOVES = 8;
const PERPETUAL_CHECK_RATIO = 0.6;
const PERPETUAL_WINDOW = 12;

/**
 * Does a PV look like a perpetual: mostly checks, with a move pair repeating?
 */
export function isPerpetualCheckLine(moves: readonly string[]): boolean {
  if (moves.length < PERPETUAL_MIN_MOVES) return false;

  const checks = moves.filter((m) => m.includes('+')).length;
  if (checks < moves.length * PERPETUAL_CHECK_RATIO) return false;

  const seen = new Set<string>();
  const end = Math.min(moves.length, PERPETUAL_WINDOW);
  for (let i = 0; i + 1 < end; i += 2) {
    const pair = `${moves[i]} ${moves[i + 1]}`;
    if (seen.has(pair)) return true;
    seen.add(pair);
  }
  return false;
}

export function detectPerpetualCheck(ctx: TacticContext): Finding | null {
  const main = ctx.pv[0];
  if (!main || !isPerpetualCheckLine(main.moves)) return null;

  return createFinding('perpetual-check', 'perpetual check', [ctx.move.from, ctx.move.to]);
}

export function detectCheck(ctx: TacticContext): Finding | null {
  const enemy = opponent(ctx.color);
  if (!isKingInCheck(ctx.after, enemy)) return null;

  const king = findKing(ctx.after, enemy);
  const squares = king ? [ctx.move.to, king] : [ctx.move.to];

  const others = getAttackedEnemies(ctx.after, ctx.move.to).filter((t) => t.type !== 'k');
  if (isGivingCheck(ctx.after, ctx.move.to) && others.length > 0) {
    return createFinding('check', 'check with attack', [...squares, ...others.map((t) => t.square)]);
  }
  return createFinding('check', 'gives check', squares);
}
