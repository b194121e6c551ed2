import { describe, it, expect } from 'vitest';

import {
  FORCING_DETECTORS,
  PRIMARY_DETECTORS,
  createFinding,
  mergeFinding,
  runBattery,
  supersedes,
  withTacticContext,
  type Finding,
} from '../tactics/index.js';

import { TACTIC_POSITIONS, boardOf, moveOf } from './fixtures.js';

const fork = createFinding('fork', 'royal fork (king and queen)', ['e5']);
const check = createFinding('check', 'gives check', ['e5', 'g6']);
const threat = createFinding('threat', 'creates threat on queen', ['e5', 'd7']);
const sacrifice = createFinding('sacrifice', 'piece sacrifice', ['f7']);
const capture = createFinding('capture', 'captures pawn', ['f7']);

describe('supersedes', () => {
  it('lets a fork hide the check it gives', () => {
    expect(supersedes(fork, check)).toBe(true);
    expect(supersedes(check, fork)).toBe(false);
  });

  it('lets a sacrifice hide the plain capture', () => {
    expect(supersedes(sacrifice, capture)).toBe(true);
  });

  it('is false for unrelated categories', () => {
    expect(supersedes(threat, sacrifice)).toBe(false);
  });
});

describe('mergeFinding', () => {
  it('drops a finding a kept one supersedes', () => {
    expect(mergeFinding([fork], check)).toEqual([fork]);
  });

  it('evicts kept findings the new one supersedes', () => {
    expect(mergeFinding([threat, check], fork)).toEqual([fork]);
  });

  it('drops a repeated text', () => {
    const again = createFinding('double-attack', fork.text, ['e5']);
    expect(mergeFinding([fork], again)).toEqual([fork]);
  });

  it('keeps independent findings in arrival order', () => {
    const merged = [threat, sacrifice].reduce<Finding[]>(mergeFinding, []);
    expect(merged.map((f) => f.category)).toEqual(['threat', 'sacrifice']);
  });
});

describe('runBattery', () => {
  it('keeps going after a detector throws', () => {
    const position = TACTIC_POSITIONS.royalFork;
    const result = withTacticContext(boardOf(position), moveOf(position), {}, (ctx) =>
      runBattery(ctx, [
        {
          name: 'broken',
          detect: () => {
            throw new Error('boom');
          },
        },
        ...PRIMARY_DETECTORS,
      ]),
    );

    expect(result?.errors.map((e) => e.detector)).toEqual(['broken']);
    expect(result?.findings.map((f) => f.text)).toContain('royal fork (king and queen)');
  });

  it('reports the check after the fork in the forcing battery', () => {
    const position = TACTIC_POSITIONS.royalFork;
    const result = withTacticContext(boardOf(position), moveOf(position), {}, (ctx) =>
      runBattery(ctx, FORCING_DETECTORS),
    );

    expect(result?.findings.map((f) => f.category)).toEqual(['check']);
    expect(result?.errors).toEqual([]);
  });
});
