/**
 * Blunder detection from an evaluation swing between consecutive positions
 */

import { BLUNDER_THRESHOLDS } from './thresholds.js';

export type BlunderType = 'Blunder' | 'Mistake' | 'Inaccuracy';

export interface BlunderResult {
  isBlunder: boolean;
  type: BlunderType | null;
  /** How far the evaluation moved against the side that moved, in pawns */
  evalDrop: number;
  whiteBlundered: boolean;
}

/**
 * Compare White-relative evaluations (pawns) before and after a move.
 * Only a swing against the side that moved counts.
 */
export function detectBlunder(
  current: number | null,
  previous: number | null,
  whiteMoved: boolean,
): BlunderResult {
  if (current === null || previous === null) {
    return { isBlunder: false, type: null, evalDrop: 0, whiteBlundered: false };
  }

  const change = current - previous;
  const againstMover = whiteMoved ? change < 0 : change > 0;
  const evalDrop = againstMover ? Math.abs(change) : 0;
  const whiteBlundered = whiteMoved && againstMover;

  const type: BlunderType | null =
    evalDrop >= BLUNDER_THRESHOLDS.blunder
      ? 'Blunder'
      : evalDrop >= BLUNDER_THRESHOLDS.mistake
        ? 'Mistake'
        : evalDrop >= BLUNDER_THRESHOLDS.inaccuracy
          ? 'Inaccuracy'
          : null;

  return { isBlunder: type !== null, type, evalDrop, whiteBlundered };
}
