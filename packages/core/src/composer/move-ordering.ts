/**
 * Move Ordering
 *
 * Ranks candidate moves the way a search orders them: checks first, then
 * captures by most-valuable-victim/least-valuable-attacker adjusted by SEE,
 * promotions, and a few small positional bonuses.
 */

import { opponent, pieceValue, rank, type Board, type Move } from '@tactica/board';

import { seeAfterMove } from '../exchange/see.js';
import { BoardPool } from '../pool/board-pool.js';
import { isKingInCheck } from '../primitives/index.js';
import { applyMove } from '../tactics/context.js';

export type MoveCategory = 'forcing' | 'quiet';

export const INTERESTINGNESS_WEIGHTS = {
  check: 10000,
  promotion: 8000,
  goodCapture: 1000,
  badCapture: -5000,
  castling: 100,
  center: 50,
  development: 30,
} as const;

const CENTER = new Set(['d4', 'e4', 'd5', 'e5']);

interface MoveFacts {
  check: boolean;
  promotion: boolean;
  castling: boolean;
}

function moveFacts(board: Board, move: Move, pool: BoardPool): MoveFacts | null {
  return pool.use(board, (after) => {
    const applied = applyMove(after, move);
    if (!applied) return null;
    return {
      check: isKingInCheck(after, opponent(applied.moved.color)),
      promotion: applied.moved.type === 'p' && applied.placed.type !== 'p',
      castling: applied.castling !== null,
    };
  });
}

/**
 * Forcing (capture, promotion or check) or quiet; null when the source
 * square is empty
 */
export function categorizeMove(
  board: Board,
  move: Move,
  pool: BoardPool = new BoardPool({ maxSize: 4 }),
): MoveCategory | null {
  const facts = moveFacts(board, move, pool);
  if (!facts) return null;
  const capture = board.get(move.to) !== null;
  return capture || facts.promotion || facts.check ? 'forcing' : 'quiet';
}

/**
 * Higher is more forcing; 0 when the source square is empty
 */
export function scoreMoveInterestingness(
  board: Board,
  move: Move,
  pool: BoardPool = new BoardPool({ maxSize: 4 }),
): number {
  const mover = board.get(move.from);
  const facts = moveFacts(board, move, pool);
  if (!mover || !facts) return 0;

  const w = INTERESTINGNESS_WEIGHTS;
  let score = 0;

  if (facts.check) score += w.check;

  const victim = board.get(move.to);
  if (victim && victim.color !== mover.color) {
    score += pieceValue(victim.type) * 10 - pieceValue(mover.type);
    const see = seeAfterMove(board, move, pool);
    if (see > 0) score += w.goodCapture;
    else if (see < 0) score += w.badCapture;
  }

  if (facts.promotion) score += w.promotion;
  if (CENTER.has(move.to)) score += w.center;

  const fromBackRank = rank(move.from) === 1 || rank(move.from) === 8;
  if (fromBackRank && (mover.type === 'n' || mover.type === 'b')) score += w.development;

  if (facts.castling) score += w.castling;

  return score;
}

/**
 * Sort moves most interesting first; ties keep their input order
 */
export function orderMoves(board: Board, moves: readonly Move[], pool?: BoardPool): Move[] {
  const scored = moves.map((move, index) => ({
    move,
    index,
    score: scoreMoveInterestingness(board, move, pool),
  }));
  scored.sort((a, b) => b.score - a.score || a.index - b.index);
  return scored.map((s) => s.move);
}
