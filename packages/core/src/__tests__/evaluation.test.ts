import { describe, it, expect } from 'vitest';

import {
  MATE_SCORE,
  evaluationForMover,
  formatEvaluation,
  moverScore,
  parseEvaluation,
  parsePvLine,
} from '../classifier/evaluation.js';
import { aggressivenessMultiplier } from '../classifier/thresholds.js';

describe('aggressivenessMultiplier', () => {
  it('is 1 at the default', () => {
    expect(aggressivenessMultiplier(50)).toBe(1);
  });

  it('spans 0.75 to 1.25', () => {
    expect(aggressivenessMultiplier(0)).toBe(0.75);
    expect(aggressivenessMultiplier(100)).toBe(1.25);
  });

  it('clamps out-of-range values', () => {
    expect(aggressivenessMultiplier(150)).toBe(1.25);
    expect(aggressivenessMultiplier(-20)).toBe(0.75);
  });
});

describe('parseEvaluation', () => {
  it('reads pawn scores', () => {
    expect(parseEvaluation('+1.50')).toEqual({ kind: 'pawns', value: 1.5 });
    expect(parseEvaluation('-0.75')).toEqual({ kind: 'pawns', value: -0.75 });
  });

  it('reads mate scores', () => {
    expect(parseEvaluation('Mate in 3')).toEqual({ kind: 'mate', moves: 3 });
    expect(parseEvaluation('Mate in -2')).toEqual({ kind: 'mate', moves: -2 });
  });

  it('rejects anything else', () => {
    expect(parseEvaluation('abc')).toBeNull();
    expect(parseEvaluation('')).toBeNull();
    expect(parseEvaluation(null)).toBeNull();
  });
});

describe('evaluationForMover', () => {
  it('flips pawn scores for Black', () => {
    expect(moverScore('+1.50', 'w')).toBe(1.5);
    expect(moverScore('+1.50', 'b')).toBe(-1.5);
  });

  it('counts mates as a large score', () => {
    expect(evaluationForMover({ kind: 'mate', moves: 2 }, 'b')).toBe(MATE_SCORE);
    expect(evaluationForMover({ kind: 'mate', moves: -2 }, 'w')).toBe(-MATE_SCORE);
  });

  it('passes a missing evaluation through', () => {
    expect(moverScore(undefined, 'w')).toBeNull();
  });
});

describe('parsePvLine', () => {
  it('splits moves from the trailing evaluation', () => {
    expect(parsePvLine('e2e4 e7e5 (+0.35)')).toEqual({ moves: ['e2e4', 'e7e5'], evaluation: '+0.35' });
  });

  it('allows a line without an evaluation', () => {
    expect(parsePvLine('  e2e4   e7e5 ')).toEqual({ moves: ['e2e4', 'e7e5'], evaluation: null });
  });
});

describe('formatEvaluation', () => {
  it('prints engines’ notation', () => {
    expect(formatEvaluation({ kind: 'pawns', value: 1.5 })).toBe('+1.50');
    expect(formatEvaluation({ kind: 'pawns', value: -0.75 })).toBe('-0.75');
    expect(formatEvaluation({ kind: 'mate', moves: 3 })).toBe('Mate in 3');
  });
});
