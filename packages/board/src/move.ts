/**
 * Move codes
 *
 * Moves enter the system as coordinate codes ("e2e4", "e7e8q").
 */

import { isPromotionType } from './piece.js';
import type { PromotionType, Square } from './types.js';

/**
 * A parsed coordinate move
 */
export interface Move {
  from: Square;
  to: Square;
  promotion?: PromotionType;
}

const MOVE_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

/**
 * Parse a coordinate move code, null when malformed
 */
export function parseMove(code: string): Move | null {
  const match = MOVE_PATTERN.exec(code.trim().toLowerCase());
  if (!match) return null;

  const from = match[1];
  const to = match[2];
  const promotion = match[3];
  if (from === undefined || to === undefined || from === to) return null;

  if (promotion !== undefined && isPromotionType(promotion)) {
    return { from, to, promotion };
  }
  return { from, to };
}

/**
 * Format a move back into its coordinate code
 */
export function formatMove(move: Move): string {
  return `${move.from}${move.to}${move.promotion ?? ''}`;
}
