/**
 * Evaluation strings
 *
 * Engines report evaluations as "+1.50" / "-0.75" (pawns, White's point of
 * view) or "Mate in 3" / "Mate in -2" (positive when the side that just
 * moved delivers the mate).
 */

import type { Color } from '@tactica/board';

export type Evaluation =
  | { kind: 'pawns'; value: number }
  | { kind: 'mate'; moves: number };

/**
 * A principal variation with its trailing evaluation, if any
 */
export interface PvLine {
  moves: string[];
  evaluation: string | null;
}

/** Mover-relative score used for a forced mate */
export const MATE_SCORE = 100;

const MATE_PATTERN = /^mate\s+in\s+([+-]?\d+)$/i;
const PAWNS_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const TRAILING_EVAL = /\(([^()]*)\)\s*$/;

/**
 * Parse an engine evaluation string; null when it is not one
 */
export function parseEvaluation(text: string | null | undefined): Evaluation | null {
  if (!text) return null;
  const trimmed = text.trim();

  const mate = MATE_PATTERN.exec(trimmed);
  if (mate?.[1] !== undefined) {
    return { kind: 'mate', moves: Number.parseInt(mate[1], 10) };
  }

  if (PAWNS_PATTERN.test(trimmed)) {
    const value = Number.parseFloat(trimmed);
    return Number.isFinite(value) ? { kind: 'pawns', value } : null;
  }

  return null;
}

/**
 * Score in pawns from the point of view of `mover`. A mate counts as
 * +/-100; "Mate in 0" means the mover has already mated.
 */
export function evaluationForMover(evaluation: Evaluation | null, mover: Color): number | null {
  if (!evaluation) return null;
  if (evaluation.kind === 'mate') {
    return evaluation.moves >= 0 ? MATE_SCORE : -MATE_SCORE;
  }
  return mover === 'w' ? evaluation.value : -evaluation.value;
}

/**
 * Parse and convert in one step
 */
export function moverScore(text: string | null | undefined, mover: Color): number | null {
  return evaluationForMover(parseEvaluation(text), mover);
}

/**
 * Split a PV line such as "e2e4 e7e5 (+0.35)" into moves and evaluation
 */
export function parsePvLine(line: string): PvLine {
  const match = TRAILING_EVAL.exec(line);
  const evaluation = match?.[1]?.trim() || null;
  const body = match ? line.slice(0, match.index) : line;
  const moves = body.split(/\s+/).filter((m) => m.length > 0);
  return { moves, evaluation };
}

/**
 * Format an evaluation the way engines print it
 */
export function formatEvaluation(evaluation: Evaluation): string {
  if (evaluation.kind === 'mate') {
    return `Mate in ${evaluation.moves}`;
  }
  const sign = evaluation.value > 0 ? '+' : '';
  return `${sign}${evaluation.value.toFixed(2)}`;
}
