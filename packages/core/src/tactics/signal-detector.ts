/**
 * Signals taken from supplied engine data rather than the board:
 * - Singular move: the best line is far ahead of the second-best
 * - Forced move: in check with a single safe king square
 */

import { getKingSafeSquares, isKingInCheck } from '../primitives/index.js';

import { createFinding } from './runner.js';
import type { Finding, TacticContext } from './types.js';

export function detectSingularMove(ctx: TacticContext): Finding | null {
  if (ctx.evaluation === null || ctx.secondEvaluation === null) return null;

  const gap = Math.abs(ctx.evaluation - ctx.secondEvaluation);
  if (gap < ctx.thresholds.singularGap) return null;

  return createFinding('singular', 'only good move', [ctx.move.from, ctx.move.to]);
}

export function detectForcedMove(ctx: TacticContext): Finding | null {
  if (!isKingInCheck(ctx.before, ctx.color)) return null;
  if (getKingSafeSquares(ctx.before, ctx.color, ctx.pool).length !== 1) return null;

  return createFinding('forced', 'forced move', [ctx.move.from, ctx.move.to]);
}
