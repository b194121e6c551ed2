/**
 * Tactic Context
 *
 * Plays a candidate move on a pooled scratch board and hands detectors the
 * before/after pair. Castling moves the rook too, a pawn moving diagonally
 * onto an empty square captures en passant, and a pawn reaching the last
 * rank promotes (to a queen unless the move says otherwise).
 */

import { fileIndex, rank, rankIndex, squareFromIndices } from '@tactica/board';
import type { Board, Color, Move, Piece, Square } from '@tactica/board';

import type { PvLine } from '../classifier/evaluation.js';
import { TACTIC_THRESHOLDS, type TacticThresholds } from '../classifier/thresholds.js';
import { BoardPool } from '../pool/board-pool.js';

import type { TacticContext } from './types.js';

/**
 * What a move did to the board
 */
export interface AppliedMove {
  /** Piece that left the source square */
  moved: Piece;
  /** Piece that arrived on the destination square */
  placed: Piece;
  captured: Piece | null;
  capturedOn: Square | null;
  castling: 'kingside' | 'queenside' | null;
  enPassant: boolean;
}

/**
 * Play `move` on `board` in place. Returns null (leaving the board
 * untouched) when the source square is empty.
 */
export function applyMove(board: Board, move: Move): AppliedMove | null {
  const moved = board.get(move.from);
  if (!moved) return null;

  let captured = board.get(move.to);
  let capturedOn: Square | null = captured ? move.to : null;
  let castling: AppliedMove['castling'] = null;
  let enPassant = false;

  const fileDelta = fileIndex(move.to) - fileIndex(move.from);

  if (moved.type === 'k' && Math.abs(fileDelta) === 2 && rankIndex(move.to) === rankIndex(move.from)) {
    castling = fileDelta > 0 ? 'kingside' : 'queenside';
    const r = rankIndex(move.from);
    const rookFrom = squareFromIndices(castling === 'kingside' ? 7 : 0, r);
    const rookTo = squareFromIndices(castling === 'kingside' ? 5 : 3, r);
    const rook = rookFrom ? board.get(rookFrom) : null;
    if (rookFrom && rookTo && rook?.type === 'r' && rook.color === moved.color) {
      board.set(rookFrom, null);
      board.set(rookTo, rook);
    }
  }

  if (moved.type === 'p' && !captured && fileDelta !== 0) {
    const passedSquare = squareFromIndices(fileIndex(move.to), rankIndex(move.from));
    const passed = passedSquare ? board.get(passedSquare) : null;
    if (passedSquare && passed?.type === 'p' && passed.color !== moved.color) {
      board.set(passedSquare, null);
      captured = passed;
      capturedOn = passedSquare;
      enPassant = true;
    }
  }

  const placed: Piece = isPromotionRank(move.to, moved)
    ? { color: moved.color, type: move.promotion ?? 'q' }
    : moved;

  board.set(move.from, null);
  board.set(move.to, placed);

  return { moved, placed, captured, capturedOn, castling, enPassant };
}

function isPromotionRank(to: Square, piece: Piece): boolean {
  return piece.type === 'p' && rank(to) === (piece.color === 'w' ? 8 : 1);
}

/**
 * Optional inputs for building a context
 */
export interface TacticContextOptions {
  pool?: BoardPool;
  pv?: PvLine[];
  /** Mover-relative evaluation of the move, in pawns */
  evaluation?: number | null;
  /** Mover-relative evaluation of the second-best line, in pawns */
  secondEvaluation?: number | null;
  thresholds?: Partial<TacticThresholds>;
}

/**
 * Build the context for `move` and run `fn` with it. The after board is
 * released when `fn` returns. Returns null when the source square is empty.
 */
export function withTacticContext<T>(
  before: Board,
  move: Move,
  options: TacticContextOptions,
  fn: (ctx: TacticContext, applied: AppliedMove) => T,
): T | null {
  const pool = options.pool ?? new BoardPool({ maxSize: 8 });

  return pool.use(before, (after) => {
    const applied = applyMove(after, move);
    if (!applied) return null;

    const color: Color = applied.moved.color;
    const ctx: TacticContext = {
      before,
      after,
      move,
      piece: applied.placed,
      color,
      captured: applied.captured,
      capturedOn: applied.capturedOn,
      castling: applied.castling,
      pool,
      pv: options.pv ?? [],
      evaluation: options.evaluation ?? null,
      secondEvaluation: options.secondEvaluation ?? null,
      thresholds: { ...TACTIC_THRESHOLDS, ...options.thresholds },
    };
    return fn(ctx, applied);
  });
}
