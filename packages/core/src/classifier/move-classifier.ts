/**
 * Move Quality Classification
 *
 * Classifies a move from the centipawn loss against the engine's best move,
 * with special cases for forced, book and mate-related moves. The
 * inaccuracy/mistake/blunder thresholds scale with the player's
 * aggressiveness setting.
 */

import {
  DEFAULT_AGGRESSIVENESS,
  MOVE_QUALITY_THRESHOLDS,
  aggressivenessMultiplier,
} from './thresholds.js';

export type MoveQuality =
  | 'brilliant'
  | 'best'
  | 'excellent'
  | 'good'
  | 'book'
  | 'inaccuracy'
  | 'mistake'
  | 'blunder'
  | 'forced';

/**
 * Inputs for move classification
 */
export interface MoveQualityInput {
  /** Evaluation before the move, mover-relative, in centipawns */
  evalBefore: number;
  /** Evaluation after the move, mover-relative, in centipawns */
  evalAfter: number;
  /** Was this the engine's best move? */
  isBestMove: boolean;
  /** Was this the only legal move? */
  isOnlyLegalMove?: boolean;
  /** Is this an opening book move? */
  isBookMove?: boolean;
  /** Does the move sacrifice material? */
  isSacrifice?: boolean;
  /** Does the move win significant material? */
  winsSignificantMaterial?: boolean;
  /** 0 (solid) to 100 (sharp) */
  aggressiveness?: number;
}

/**
 * Result of move classification
 */
export interface MoveQualityResult {
  quality: MoveQuality;
  /** Annotation symbol ("!!", "??", "?", "?!" or "") */
  symbol: string;
  description: string;
  /** Centipawn loss; 9999 for a missed or allowed mate */
  cpLoss: number;
}

/** cpLoss reported when a mate is missed or allowed */
export const MATE_LOSS = 9999;

/**
 * Annotation symbol for a quality
 */
export function qualitySymbol(quality: MoveQuality): string {
  switch (quality) {
    case 'brilliant':
      return '!!';
    case 'blunder':
      return '??';
    case 'mistake':
      return '?';
    case 'inaccuracy':
      return '?!';
    case 'best':
    case 'excellent':
    case 'good':
    case 'book':
    case 'forced':
      return '';
    default: {
      const unreachable: never = quality;
      return unreachable;
    }
  }
}

function result(quality: MoveQuality, description: string, cpLoss: number): MoveQualityResult {
  return { quality, symbol: qualitySymbol(quality), description, cpLoss };
}

/**
 * Classify a move
 */
export function classifyMoveQuality(input: MoveQualityInput): MoveQualityResult {
  const {
    evalBefore,
    evalAfter,
    isBestMove,
    isOnlyLegalMove = false,
    isBookMove = false,
    isSacrifice = false,
    winsSignificantMaterial = false,
    aggressiveness = DEFAULT_AGGRESSIVENESS,
  } = input;

  const t = MOVE_QUALITY_THRESHOLDS;
  const cpLoss = evalBefore - evalAfter;

  const wasMateForUs = evalBefore > t.mateScore;
  const wasMateAgainstUs = evalBefore < -t.mateScore;
  const isMateForUs = evalAfter > t.mateScore;
  const isMateAgainstUs = evalAfter < -t.mateScore;

  if (isOnlyLegalMove) {
    return result('forced', 'Forced', cpLoss);
  }

  if (isBookMove && cpLoss < t.book) {
    return result('book', 'Book', cpLoss);
  }

  if (wasMateForUs && !isMateForUs) {
    return result('blunder', 'Blunder - missed checkmate', MATE_LOSS);
  }

  if (!wasMateAgainstUs && isMateAgainstUs) {
    return result('blunder', 'Blunder - allows checkmate', MATE_LOSS);
  }

  if (isBestMove && (isSacrifice || winsSignificantMaterial) && cpLoss <= 0) {
    return result('brilliant', 'Brilliant', cpLoss);
  }

  const scale = aggressivenessMultiplier(aggressiveness);

  if (cpLoss >= t.blunder * scale) {
    return result('blunder', 'Blunder', cpLoss);
  }
  if (cpLoss >= t.mistake * scale) {
    return result('mistake', 'Mistake', cpLoss);
  }
  if (cpLoss >= t.inaccuracy * scale) {
    return result('inaccuracy', 'Inaccuracy', cpLoss);
  }
  if (isBestMove) {
    return result('best', 'Best', cpLoss);
  }
  if (cpLoss <= t.excellent) {
    return result('excellent', 'Excellent', cpLoss);
  }
  return result('good', 'Good', cpLoss);
}

/**
 * Get NAG (Numeric Annotation Glyph) code for a quality
 */
export function qualityToNag(quality: MoveQuality): string | undefined {
  switch (quality) {
    case 'excellent':
      return '$1'; // !
    case 'brilliant':
      return '$3'; // !!
    case 'inaccuracy':
      return '$6'; // ?!
    case 'mistake':
      return '$2'; // ?
    case 'blunder':
      return '$4'; // ??
    case 'forced':
      return '$8'; // only move
    case 'best':
    case 'good':
    case 'book':
      return undefined;
    default: {
      const unreachable: never = quality;
      return unreachable;
    }
  }
}
