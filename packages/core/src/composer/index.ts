export {
  explainMove,
  createAnalysisContext,
  DEFAULT_MAX_REASONS,
  DEFAULT_THRESHOLDS,
  FALLBACK_TEXT,
} from './explain.js';
export type {
  AnalysisContext,
  AnalysisContextOptions,
  AnalysisThresholds,
  ExplainOptions,
  ExplainRequest,
  Explanation,
  ExplanationKind,
} from './explain.js';

export {
  COMPLEXITY_LEVELS,
  DEFAULT_COMPLEXITY,
  formatForComplexity,
  isComplexityLevel,
  parseComplexity,
} from './formatter.js';
export type { ComplexityLevel } from './formatter.js';

export { positionalNotes } from './positional-notes.js';

export {
  INTERESTINGNESS_WEIGHTS,
  categorizeMove,
  scoreMoveInterestingness,
  orderMoves,
} from './move-ordering.js';
export type { MoveCategory } from './move-ordering.js';
