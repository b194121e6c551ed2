import { describe, it, expect } from 'vitest';

import { classifySacrifice, type SacrificeInput } from '../classifier/sacrifice.js';
import { SACRIFICE_THRESHOLDS } from '../classifier/thresholds.js';

import { SEE_POSITIONS, TACTIC_POSITIONS, boardOf, moveOf, type TestPosition } from './fixtures.js';

function input(
  position: TestPosition,
  evalBefore: number | null = null,
  evalAfter: number | null = null,
  showSee = true,
): SacrificeInput {
  return { before: boardOf(position), move: moveOf(position), evalBefore, evalAfter, showSee };
}

describe('classifySacrifice', () => {
  it('reports a winning capture with its SEE value', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.undefendedBishop));

    expect(verdict).toEqual({
      kind: 'winning-capture',
      isSacrifice: false,
      isBrilliant: false,
      text: 'wins bishop (SEE +3)',
      see: 3,
    });
  });

  it('nets the recapture out of a defended winning capture', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.knightTakesGuardedRook));

    expect(verdict.kind).toBe('winning-capture');
    expect(verdict.text).toBe('wins rook (SEE +2)');
  });

  it('omits the SEE value when display is off', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.undefendedBishop, null, null, false));
    expect(verdict.text).toBe('wins bishop');
  });

  it('calls an even defended capture a trade', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.queenTrade));

    expect(verdict.kind).toBe('fair-trade');
    expect(verdict.text).toBe('trades queen');
    expect(verdict.see).toBe(0);
  });

  it('reports a losing capture without compensation', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.pawnDefendedPawn, 0, -1));

    expect(verdict.kind).toBe('losing-capture');
    expect(verdict.text).toBe('captures pawn (loses exchange)');
    expect(verdict.see).toBe(-4);
  });

  it('turns a compensated loss into a sacrifice named after the piece', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.pawnDefendedPawn, 0.5, 1.0));

    expect(verdict.kind).toBe('sacrifice');
    expect(verdict.text).toBe('rook sacrifice');
    expect(verdict.isSacrifice).toBe(true);
    // The pawn on e6 simply takes back
    expect(verdict.isBrilliant).toBe(false);
  });

  it('marks an unsupported minor-piece sacrifice as brilliant', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.knightSacrifice, 0.3, 1.0));

    expect(verdict).toEqual({
      kind: 'sacrifice',
      isSacrifice: true,
      isBrilliant: true,
      text: 'piece sacrifice',
      see: -2,
    });
  });

  it('is not brilliant when the mover was already winning', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.knightSacrifice, 2.5, 3.0));

    expect(verdict.isSacrifice).toBe(true);
    expect(verdict.isBrilliant).toBe(false);
  });

  it('is not brilliant without an evaluation before the move', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.knightSacrifice, null, 1.0));
    expect(verdict.isBrilliant).toBe(false);
  });

  it('recognises an exchange sacrifice', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.rookForKnight, 0, 0));

    expect(verdict.kind).toBe('exchange-sacrifice');
    expect(verdict.text).toBe('exchange sacrifice (rook for minor piece)');
    expect(verdict.see).toBe(-2);
  });

  it('drops the exchange sacrifice when the evaluation collapses', () => {
    const verdict = classifySacrifice(input(SEE_POSITIONS.rookForKnight, 0, -1));

    expect(verdict.kind).toBe('losing-capture');
    expect(verdict.text).toBe('captures knight (loses exchange)');
  });

  it('honours overridden thresholds', () => {
    const strict = { ...SACRIFICE_THRESHOLDS, compensation: 2 };
    const verdict = classifySacrifice(input(SEE_POSITIONS.knightSacrifice, 0.3, 1.0), strict);

    expect(verdict.kind).toBe('losing-capture');
    expect(verdict.text).toBe('captures pawn (loses exchange)');
  });

  it('gives no verdict for a quiet move', () => {
    const verdict = classifySacrifice(input(TACTIC_POSITIONS.quietKingMove));

    expect(verdict).toEqual({
      kind: 'none',
      isSacrifice: false,
      isBrilliant: false,
      text: null,
      see: null,
    });
  });
});
