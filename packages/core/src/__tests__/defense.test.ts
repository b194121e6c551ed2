import { describe, it, expect } from 'vitest';

import { DEFENSE_DETECTORS, analyzeDefenses, hasMateThreat } from '../defense/index.js';
import { BoardPool } from '../pool/board-pool.js';

import { DEFENSE_POSITIONS, TACTIC_POSITIONS, boardOf, moveOf, type TestPosition } from './fixtures.js';

function defensesOf(position: TestPosition, pool = new BoardPool()) {
  return analyzeDefenses(boardOf(position), moveOf(position), 'w', pool).defenses;
}

describe('analyzeDefenses', () => {
  it.each(Object.entries(DEFENSE_POSITIONS))('%s', (_name, position) => {
    expect(defensesOf(position).map((f) => f.text)).toEqual([position.expected]);
  });

  it('ranks an escape by the value saved', () => {
    const [escape] = defensesOf(DEFENSE_POSITIONS.escapeKnight);
    expect(escape?.category).toBe('defense');
    expect(escape?.importance).toBe(2);
  });

  it('ranks a block by the value shielded', () => {
    const [block] = defensesOf(DEFENSE_POSITIONS.blockBishop);
    expect(block?.importance).toBe(3.5);
  });

  it('returns nothing when asked about the other side', () => {
    const position = DEFENSE_POSITIONS.escapeKnight;
    expect(analyzeDefenses(boardOf(position), moveOf(position), 'b')).toEqual({ defenses: [], errors: [] });
  });

  it('returns nothing for an empty source square', () => {
    const result = analyzeDefenses(boardOf(TACTIC_POSITIONS.quietKingMove), moveOf({ move: 'e2e4' }), 'w');
    expect(result).toEqual({ defenses: [], errors: [] });
  });

  it('recovers from a defense detector that throws', () => {
    const position = DEFENSE_POSITIONS.escapeKnight;
    const pool = new BoardPool();
    const detectors = [
      {
        name: 'broken',
        detect: () => {
          throw new Error('boom');
        },
      },
      ...DEFENSE_DETECTORS,
    ];

    const result = analyzeDefenses(boardOf(position), moveOf(position), 'w', pool, detectors);

    expect(result.defenses.map((f) => f.text)).toEqual(['saves knight']);
    expect(result.errors.map((e) => e.message)).toEqual(['broken failed: boom']);
    expect(pool.stats().outstanding).toBe(0);
  });

  it('returns every scratch board to the pool', () => {
    const pool = new BoardPool();
    defensesOf(DEFENSE_POSITIONS.stopBackRankMate, pool);
    expect(pool.stats().outstanding).toBe(0);
  });
});

describe('hasMateThreat', () => {
  const pool = new BoardPool();

  it('sees the back-rank mate before luft is made', () => {
    expect(hasMateThreat(boardOf(DEFENSE_POSITIONS.stopBackRankMate), 'w', pool)).toBe(true);
  });

  it('is false once the king has a flight square', () => {
    const afterLuft = boardOf({ fen: 'r5k1/8/8/8/8/7P/5PP1/6K1 w - - 0 1' });
    expect(hasMateThreat(afterLuft, 'w', pool)).toBe(false);
  });
});
