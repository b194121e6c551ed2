/**
 * Classification thresholds
 *
 * Evaluation thresholds are in pawns from the mover's point of view.
 * Move-quality thresholds are in centipawns (cp).
 */

/**
 * Thresholds for sacrifice and brilliancy classification
 */
export interface SacrificeThresholds {
  /** Evaluation at or above which the mover is already winning; brilliancies need less */
  decisive: number;
  /** A brilliant move may not leave the mover worse than minus this */
  badPosition: number;
  /** Minimum material given up (SEE <= -n) for a general sacrifice */
  sacrificeMaterial: number;
  /** Evaluation after the move above which the sacrifice is compensated */
  compensation: number;
  /** Evaluation after an exchange sacrifice must stay above this */
  exchangeSacrificeFloor: number;
}

export const SACRIFICE_THRESHOLDS: SacrificeThresholds = {
  decisive: 2.0,
  badPosition: 0.7,
  sacrificeMaterial: 2,
  compensation: 0.5,
  exchangeSacrificeFloor: -0.5,
};

/**
 * Thresholds used by the tactical detector battery
 */
export interface TacticThresholds {
  /** Gap between best and second-best line that makes a move the only good one */
  singularGap: number;
  /** Minimum value(behind) - value(attacker) for a relative pin on a defended piece */
  relativePinGain: number;
}

export const TACTIC_THRESHOLDS: TacticThresholds = {
  singularGap: 1.5,
  relativePinGain: 4,
};

/**
 * Centipawn-loss thresholds for move quality, before aggressiveness scaling
 */
export const MOVE_QUALITY_THRESHOLDS = {
  blunder: 300,
  mistake: 100,
  inaccuracy: 30,
  excellent: 10,
  /** Book moves keep their label only while they lose less than this */
  book: 30,
  /** Evaluations beyond this (cp) encode a forced mate */
  mateScore: 9000,
} as const;

/**
 * Evaluation drops (pawns) for blunder detection from an evaluation swing
 */
export const BLUNDER_THRESHOLDS = {
  blunder: 3.0,
  mistake: 1.5,
  inaccuracy: 0.75,
} as const;

/**
 * Aggressiveness in [0, 100] scales move-quality thresholds by
 * 1 + (aggressiveness - 50) / 200, so 0 gives 0.75x and 100 gives 1.25x.
 */
export function aggressivenessMultiplier(aggressiveness: number): number {
  const clamped = Math.max(0, Math.min(aggressiveness, 100));
  return 1 + (clamped - 50) / 200;
}

export const DEFAULT_AGGRESSIVENESS = 50;
