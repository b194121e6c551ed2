/**
 * Sacrifice and Brilliancy Classification
 *
 * Turns a capture's SEE value into a verdict: a fair trade, a winning or
 * losing capture, or a sacrifice the evaluation says is compensated. A
 * sound sacrifice of a minor piece or better that the opponent cannot
 * simply take back with a pawn is brilliant.
 */

import {
  isMinorPiece,
  opponent,
  pieceName,
  pieceValue,
  type Board,
  type Move,
  type PieceType,
} from '@tactica/board';

import { seeAfterMove } from '../exchange/see.js';
import { BoardPool } from '../pool/board-pool.js';
import { countDefenders, getAttackers, isAttackedBy } from '../primitives/index.js';
import { applyMove } from '../tactics/context.js';

import { SACRIFICE_THRESHOLDS, type SacrificeThresholds } from './thresholds.js';

export type SacrificeKind =
  | 'none'
  | 'fair-trade'
  | 'winning-capture'
  | 'losing-capture'
  | 'capture'
  | 'exchange-sacrifice'
  | 'sacrifice';

export interface SacrificeVerdict {
  kind: SacrificeKind;
  isSacrifice: boolean;
  isBrilliant: boolean;
  /** Reason text, null when the move is not a capture */
  text: string | null;
  /** SEE of the capture, null when the move is not a capture */
  see: number | null;
}

export interface SacrificeInput {
  before: Board;
  move: Move;
  /** Mover-relative evaluation before the move, in pawns */
  evalBefore: number | null;
  /** Mover-relative evaluation after the move, in pawns */
  evalAfter: number | null;
  /** SEE of the capture; computed when omitted */
  see?: number;
  /** Append "(SEE +n)" to winning captures */
  showSee: boolean;
  pool?: BoardPool;
}

const NO_VERDICT: SacrificeVerdict = {
  kind: 'none',
  isSacrifice: false,
  isBrilliant: false,
  text: null,
  see: null,
};

function sacrificeText(type: PieceType): string {
  switch (type) {
    case 'q':
      return 'queen sacrifice';
    case 'r':
      return 'rook sacrifice';
    case 'p':
    case 'n':
    case 'b':
    case 'k':
      return 'piece sacrifice';
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}

export function classifySacrifice(
  input: SacrificeInput,
  thresholds: SacrificeThresholds = SACRIFICE_THRESHOLDS,
): SacrificeVerdict {
  const { before, move, evalBefore, evalAfter, showSee } = input;
  const mover = before.get(move.from);
  const target = before.get(move.to);
  if (!mover || !target || target.color === mover.color) return NO_VERDICT;

  const pool = input.pool ?? new BoardPool({ maxSize: 8 });
  const see = input.see ?? seeAfterMove(before, move, pool);
  const enemy = opponent(mover.color);
  const victim = pieceName(target.type);
  const moverValue = pieceValue(mover.type);
  const targetValue = pieceValue(target.type);

  const arrival = pool.use(before, (after) => {
    applyMove(after, move);
    return {
      defended: isAttackedBy(after, move.to, enemy),
      pawnGuard: getAttackers(after, move.to, enemy).some((p) => p.type === 'p'),
      supported: countDefenders(after, move.to, mover.color) > 0,
    };
  });

  const verdict = (kind: SacrificeKind, text: string, isSacrifice = false): SacrificeVerdict => ({
    kind,
    isSacrifice,
    isBrilliant:
      isSacrifice &&
      moverValue >= 3 &&
      evalBefore !== null &&
      evalBefore < thresholds.decisive &&
      evalAfter !== null &&
      evalAfter > -thresholds.badPosition &&
      targetValue < moverValue &&
      !arrival.pawnGuard &&
      !arrival.supported,
    text,
    see,
  });

  if (
    mover.type === 'r' &&
    isMinorPiece(target.type) &&
    arrival.defended &&
    see < -1 &&
    evalAfter !== null &&
    evalAfter > thresholds.exchangeSacrificeFloor
  ) {
    return verdict('exchange-sacrifice', 'exchange sacrifice (rook for minor piece)', true);
  }

  if (
    see <= -thresholds.sacrificeMaterial &&
    arrival.defended &&
    evalAfter !== null &&
    evalAfter > thresholds.compensation
  ) {
    return verdict('sacrifice', sacrificeText(mover.type), true);
  }

  if (arrival.defended && (see === 0 || (see > 0 && moverValue === targetValue))) {
    return verdict('fair-trade', `trades ${victim}`);
  }

  if (see > 0) {
    return verdict('winning-capture', showSee ? `wins ${victim} (SEE +${see})` : `wins ${victim}`);
  }

  if (see === 0) {
    return verdict('capture', `captures ${victim}`);
  }

  return verdict(
    'losing-capture',
    showSee ? `captures ${victim} (loses exchange)` : `captures ${victim}`,
  );
}
