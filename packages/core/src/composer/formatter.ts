/**
 * Complexity-level wording
 */

export const COMPLEXITY_LEVELS = ['beginner', 'intermediate', 'advanced', 'master'] as const;

export type ComplexityLevel = (typeof COMPLEXITY_LEVELS)[number];

export const DEFAULT_COMPLEXITY: ComplexityLevel = 'intermediate';

// Applied in order: "(SEE +3)" reads "(wins 3)" for a beginner
const BEGINNER_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['SEE +', 'wins '],
  ['SEE -', 'loses '],
  ['(SEE ', '('],
  ['only good move', 'best move'],
];

export function isComplexityLevel(value: string): value is ComplexityLevel {
  return COMPLEXITY_LEVELS.some((level) => level === value);
}

/**
 * Case-insensitive level name; unknown names fall back to intermediate
 */
export function parseComplexity(value: string | undefined): ComplexityLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isComplexityLevel(normalized) ? normalized : DEFAULT_COMPLEXITY;
}

export function formatForComplexity(text: string, level: ComplexityLevel): string {
  switch (level) {
    case 'beginner':
      return BEGINNER_REPLACEMENTS.reduce((out, [from, to]) => out.split(from).join(to), text);
    case 'intermediate':
    case 'advanced':
    case 'master':
      return text;
    default: {
      const unreachable: never = level;
      return unreachable;
    }
  }
}
