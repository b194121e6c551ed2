/**
 * Positional notes for moves with no tactical reason
 */

import { backRank, isExtendedCenter, isMinorPiece, rank } from '@tactica/board';

import type { AppliedMove } from '../tactics/context.js';
import { createFinding } from '../tactics/runner.js';
import type { Finding, TacticContext } from '../tactics/types.js';

/**
 * Notes in reporting order: pawn push, promotion, centralization,
 * development, castling
 */
export function positionalNotes(ctx: TacticContext, applied: AppliedMove): Finding[] {
  const { move } = ctx;
  const { moved, placed } = applied;
  const squares = [move.to, move.from];
  const notes: Finding[] = [];

  if (moved.type === 'p') {
    if (Math.abs(rank(move.to) - rank(move.from)) === 2) {
      notes.push(createFinding('positional', 'aggressive pawn push', squares));
    }
    if (placed.type !== 'p') {
      notes.push(createFinding('positional', `promotes to ${placed.type.toUpperCase()}`, squares));
    }
  }

  if (isMinorPiece(moved.type)) {
    if (isExtendedCenter(move.to)) {
      notes.push(createFinding('positional', 'centralizes piece', squares));
    }
    if (rank(move.from) === backRank(ctx.color)) {
      notes.push(createFinding('positional', 'develops piece', squares));
    }
  }

  if (applied.castling === 'kingside') {
    notes.push(createFinding('positional', 'castles kingside for safety', squares));
  } else if (applied.castling === 'queenside') {
    notes.push(createFinding('positional', 'castles queenside', squares));
  }

  return notes;
}
