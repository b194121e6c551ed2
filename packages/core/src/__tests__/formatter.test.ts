import { describe, it, expect } from 'vitest';

import { formatForComplexity, isComplexityLevel, parseComplexity } from '../composer/formatter.js';

describe('formatForComplexity', () => {
  it('spells out SEE values for a beginner', () => {
    expect(formatForComplexity('wins bishop (SEE +3)', 'beginner')).toBe('wins bishop (wins 3)');
    expect(formatForComplexity('only good move', 'beginner')).toBe('best move');
  });

  it('leaves the text alone at other levels', () => {
    expect(formatForComplexity('wins bishop (SEE +3)', 'intermediate')).toBe('wins bishop (SEE +3)');
    expect(formatForComplexity('only good move', 'master')).toBe('only good move');
  });
});

describe('parseComplexity', () => {
  it('ignores case and whitespace', () => {
    expect(parseComplexity(' Beginner ')).toBe('beginner');
    expect(parseComplexity('MASTER')).toBe('master');
  });

  it('falls back to intermediate', () => {
    expect(parseComplexity('grandmaster')).toBe('intermediate');
    expect(parseComplexity(undefined)).toBe('intermediate');
  });

  it('guards level names', () => {
    expect(isComplexityLevel('advanced')).toBe(true);
    expect(isComplexityLevel('Advanced')).toBe(false);
  });
});
