/**
 * Tactic Detection Types
 *
 * A detector looks at one candidate move (the board before and after it)
 * and reports at most one finding. Findings are plain data so that the
 * composer can rank, supersede and dedupe them.
 */

import type { Board, Color, Move, Piece, Square } from '@tactica/board';

import type { PvLine } from '../classifier/evaluation.js';
import type { TacticThresholds } from '../classifier/thresholds.js';
import type { BoardPool } from '../pool/board-pool.js';

/**
 * Tactic identifiers
 */
export type TacticCategory =
  // Signals from supplied engine data
  | 'singular'
  | 'forced'
  // Threats
  | 'threat'
  | 'lower-value-threat'
  // Checks and discoveries
  | 'double-check'
  | 'discovered-check'
  | 'discovered-attack'
  // Line tactics
  | 'pin'
  | 'skewer'
  | 'x-ray'
  // Multi-target
  | 'fork'
  | 'double-attack'
  // Defender tactics
  | 'removal-of-defender'
  | 'overloading'
  | 'deflection'
  | 'decoy'
  // Weaknesses
  | 'trapped-piece'
  | 'hanging-piece'
  | 'back-rank'
  | 'promotion'
  | 'smothered-mate'
  // Material verdicts
  | 'capture'
  | 'sacrifice'
  // Forcing lines
  | 'perpetual-check'
  | 'check'
  // Non-tactical reasons
  | 'defense'
  | 'positional'
  | 'evaluation';

/**
 * One reason a move is good
 */
export interface Finding {
  /** Human-readable reason, e.g. "pins bishop to queen" */
  text: string;
  category: TacticCategory;
  /** Higher is more important */
  importance: number;
  /** Squares involved, moved piece first where there is one */
  squares: Square[];
}

/**
 * A detector failure recovered at the detector boundary
 */
export class DetectionError extends Error {
  readonly detector: string;
  override readonly cause: unknown;

  constructor(detector: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${detector} failed: ${reason}`);
    this.name = 'DetectionError';
    this.detector = detector;
    this.cause = cause;
  }
}

export type DetectionResult =
  | { ok: true; finding: Finding | null }
  | { ok: false; error: DetectionError };

/**
 * Everything a detector may look at for one candidate move
 */
export interface TacticContext {
  /** Position before the move */
  before: Board;
  /** Position after the move (a pooled scratch board; do not keep it) */
  after: Board;
  move: Move;
  /** The piece standing on `move.to` after the move (promoted piece for promotions) */
  piece: Piece;
  color: Color;
  /** Piece removed by the move, including an en-passant pawn */
  captured: Piece | null;
  /** Square the captured piece stood on */
  capturedOn: Square | null;
  /** Set when the king castled; the rook has moved as well */
  castling: 'kingside' | 'queenside' | null;
  pool: BoardPool;
  pv: PvLine[];
  /** Mover-relative evaluation of the move, in pawns */
  evaluation: number | null;
  /** Mover-relative evaluation of the second-best line */
  secondEvaluation: number | null;
  thresholds: TacticThresholds;
}

export type Detector = (ctx: TacticContext) => Finding | null;

/**
 * A detector with the name it reports errors under
 */
export interface NamedDetector {
  name: string;
  detect: Detector;
}
