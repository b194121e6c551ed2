/**
 * Detector boundary: anything a detector throws becomes a DetectionError value
 */

import {
  DetectionError,
  type DetectionResult,
  type Detector,
  type Finding,
  type TacticCategory,
  type TacticContext,
} from './types.js';

export function runDetector(name: string, detect: Detector, ctx: TacticContext): DetectionResult {
  try {
    return { ok: true, finding: detect(ctx) };
  } catch (err) {
    return { ok: false, error: new DetectionError(name, err) };
  }
}

/**
 * Default importance per category
 */
export const TACTIC_IMPORTANCE: Readonly<Record<TacticCategory, number>> = {
  'smothered-mate': 10,
  'perpetual-check': 9,
  'double-check': 9,
  'discovered-check': 8,
  fork: 8,
  sacrifice: 8,
  skewer: 7,
  'discovered-attack': 7,
  'back-rank': 7,
  pin: 6,
  'removal-of-defender': 6,
  'trapped-piece': 6,
  'hanging-piece': 6,
  overloading: 5,
  deflection: 5,
  decoy: 5,
  'double-attack': 5,
  singular: 5,
  forced: 4,
  capture: 4,
  promotion: 4,
  threat: 3,
  'lower-value-threat': 3,
  'x-ray': 3,
  defense: 3,
  check: 2,
  positional: 1,
  evaluation: 0,
};

/**
 * Build a finding with the category's default importance
 */
export function createFinding(category: TacticCategory, text: string, squares: string[]): Finding {
  return { text, category, importance: TACTIC_IMPORTANCE[category], squares };
}
