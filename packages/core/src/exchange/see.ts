/**
 * Static Exchange Evaluation
 *
 * Simulates the full capture sequence on one square and returns the net
 * material swing for the side making the first capture. Example: a knight
 * takes a rook (+5) and is recaptured (-3), so the exchange is worth +2.
 *
 * Each recapture uses the side's least valuable legal attacker. Attackers
 * are recomputed after every capture so pieces lined up behind a capturer
 * join in. A recapture is legal when:
 * - an absolutely pinned piece only captures along its pin line
 * - a side in check only plays recaptures that leave its king safe
 * - a king never recaptures onto a defended square
 */

import {
  opponent,
  pieceValue,
  type Board,
  type Color,
  type LocatedPiece,
  type Move,
  type Piece,
  type Square,
} from '@tactica/board';

import { BoardPool } from '../pool/board-pool.js';
import {
  getAttackers,
  isAttackedBy,
  isKingInCheck,
  isPiecePinned,
  leavesKingSafe,
  staysOnKingLine,
} from '../primitives/index.js';

/**
 * Net material swing of capturing on `target` with `attackerPiece` from `source`.
 * Returns 0 for an empty target or an inconsistent board.
 */
export function evaluateExchange(
  board: Board,
  target: Square,
  attackerPiece: Piece,
  attackerColor: Color,
  source: Square,
  pool: BoardPool = new BoardPool({ maxSize: 4 }),
): number {
  try {
    const victim = board.get(target);
    if (!victim) return 0;

    return pool.use(board, (scratch) => {
      scratch.set(source, null);
      scratch.set(target, { type: attackerPiece.type, color: attackerColor });
      return runSwapList(scratch, target, victim, attackerColor, pool);
    });
  } catch {
    return 0;
  }
}

/**
 * SEE for a capturing move given on the pre-move board
 */
export function seeAfterMove(board: Board, move: Move, pool?: BoardPool): number {
  const mover = board.get(move.from);
  if (!mover) return 0;
  return evaluateExchange(board, move.to, mover, mover.color, move.from, pool);
}

function runSwapList(
  scratch: Board,
  target: Square,
  victim: Piece,
  firstColor: Color,
  pool: BoardPool,
): number {
  const gains: number[] = [pieceValue(victim.type)];
  let side = opponent(firstColor);

  for (;;) {
    const recapturer = leastValuableLegalAttacker(scratch, target, side, pool);
    if (!recapturer) break;

    const onTarget = scratch.get(target);
    if (!onTarget) break;

    const previous = gains[gains.length - 1] ?? 0;
    gains.push(pieceValue(onTarget.type) - previous);
    scratch.set(recapturer.square, null);
    scratch.set(target, { type: recapturer.type, color: recapturer.color });
    side = opponent(side);
  }

  // Either side may stand pat instead of recapturing
  for (let d = gains.length - 1; d > 0; d--) {
    const deeper = gains[d] ?? 0;
    const shallower = gains[d - 1] ?? 0;
    gains[d - 1] = -Math.max(-shallower, deeper);
  }

  return gains[0] ?? 0;
}

function leastValuableLegalAttacker(
  scratch: Board,
  target: Square,
  side: Color,
  pool: BoardPool,
): LocatedPiece | null {
  const inCheck = isKingInCheck(scratch, side);

  for (const attacker of getAttackers(scratch, target, side)) {
    if (attacker.type === 'k') {
      const kingSafe = pool.use(scratch, (probe) => {
        probe.set(attacker.square, null);
        probe.set(target, attacker);
        return !isAttackedBy(probe, target, opponent(side));
      });
      if (kingSafe) return attacker;
      continue;
    }

    if (isPiecePinned(scratch, attacker.square) && !staysOnKingLine(scratch, attacker.square, target)) {
      continue;
    }

    if (inCheck && !pool.use(scratch, (probe) => leavesKingSafe(probe, attacker.square, target))) {
      continue;
    }

    return attacker;
  }

  return null;
}
