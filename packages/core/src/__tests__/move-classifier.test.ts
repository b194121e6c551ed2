import { describe, it, expect } from 'vitest';

import { detectBlunder } from '../classifier/blunder.js';
import {
  MATE_LOSS,
  classifyMoveQuality,
  qualitySymbol,
  qualityToNag,
  type MoveQualityInput,
} from '../classifier/move-classifier.js';

function classify(evalBefore: number, evalAfter: number, extra: Partial<MoveQualityInput> = {}) {
  return classifyMoveQuality({ evalBefore, evalAfter, isBestMove: false, ...extra });
}

describe('classifyMoveQuality', () => {
  describe('centipawn loss', () => {
    it('calls a 350cp loss a blunder', () => {
      const result = classify(100, -250);
      expect(result.quality).toBe('blunder');
      expect(result.symbol).toBe('??');
      expect(result.cpLoss).toBe(350);
    });

    it('calls a 150cp loss a mistake', () => {
      expect(classify(100, -50).quality).toBe('mistake');
    });

    it('calls a 40cp loss an inaccuracy', () => {
      const result = classify(40, 0);
      expect(result.quality).toBe('inaccuracy');
      expect(result.symbol).toBe('?!');
    });

    it('calls a near-perfect move excellent', () => {
      expect(classify(25, 20).quality).toBe('excellent');
    });

    it('calls a small loss good', () => {
      expect(classify(40, 20).quality).toBe('good');
    });

    it('calls the engine move best', () => {
      const result = classify(30, 30, { isBestMove: true });
      expect(result.quality).toBe('best');
      expect(result.symbol).toBe('');
    });
  });

  describe('aggressiveness', () => {
    it('is more lenient when sharp', () => {
      expect(classify(120, 0, { aggressiveness: 100 }).quality).toBe('inaccuracy');
      expect(classify(120, 0).quality).toBe('mistake');
    });

    it('is stricter when solid', () => {
      expect(classify(80, 0, { aggressiveness: 0 }).quality).toBe('mistake');
      expect(classify(80, 0).quality).toBe('inaccuracy');
    });
  });

  describe('special cases', () => {
    it('labels the only legal move forced', () => {
      expect(classify(0, -500, { isOnlyLegalMove: true }).quality).toBe('forced');
    });

    it('keeps a book move that loses little', () => {
      expect(classify(30, 20, { isBookMove: true }).quality).toBe('book');
      expect(classify(80, 30, { isBookMove: true }).quality).toBe('inaccuracy');
    });

    it('reports a missed mate', () => {
      const result = classify(9500, 200);
      expect(result.quality).toBe('blunder');
      expect(result.description).toBe('Blunder - missed checkmate');
      expect(result.cpLoss).toBe(MATE_LOSS);
    });

    it('reports an allowed mate', () => {
      const result = classify(0, -9500);
      expect(result.description).toBe('Blunder - allows checkmate');
      expect(result.cpLoss).toBe(9999);
    });

    it('marks a sound sacrifice by the engine as brilliant', () => {
      const result = classify(30, 100, { isBestMove: true, isSacrifice: true });
      expect(result.quality).toBe('brilliant');
      expect(result.symbol).toBe('!!');
      expect(result.cpLoss).toBe(-70);
    });

    it('does not call a sacrifice brilliant when the engine preferred another move', () => {
      expect(classify(30, 100, { isSacrifice: true }).quality).toBe('excellent');
    });
  });
});

describe('qualityToNag', () => {
  it('maps qualities to NAG codes', () => {
    expect(qualityToNag('blunder')).toBe('$4');
    expect(qualityToNag('brilliant')).toBe('$3');
    expect(qualityToNag('forced')).toBe('$8');
    expect(qualityToNag('best')).toBeUndefined();
  });

  it('agrees with the symbols', () => {
    expect(qualitySymbol('mistake')).toBe('?');
    expect(qualityToNag('mistake')).toBe('$2');
  });
});

describe('detectBlunder', () => {
  it('flags a large swing against White', () => {
    expect(detectBlunder(-1.0, 2.5, true)).toEqual({
      isBlunder: true,
      type: 'Blunder',
      evalDrop: 3.5,
      whiteBlundered: true,
    });
  });

  it('flags a swing against Black as a mistake', () => {
    const result = detectBlunder(0.5, -1.0, false);
    expect(result.type).toBe('Mistake');
    expect(result.evalDrop).toBe(1.5);
    expect(result.whiteBlundered).toBe(false);
  });

  it('ignores a swing in the mover’s favour', () => {
    expect(detectBlunder(1.0, 0.5, true).type).toBeNull();
  });

  it('needs both evaluations', () => {
    expect(detectBlunder(null, 1.0, true).isBlunder).toBe(false);
  });
});
