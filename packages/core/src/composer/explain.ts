/**
 * Explanation Composer
 *
 * Turns a candidate move plus whatever the engine said about it into at
 * most two short reasons:
 * 1. Tactical findings in battery order, with the capture/sacrifice
 *    verdict between the primary and forcing detectors
 * 2. Positional notes while fewer reasons than the limit are kept
 * 3. An evaluation-derived fallback when nothing else applies
 *
 * Defensive findings are reported alongside, not as reasons. Nothing
 * thrown inside the composer escapes explainMove.
 */

import {
  parseMove,
  tryConvertPvToSan,
  tryParseBoard,
  type Board,
  type Color,
  type Move,
} from '@tactica/board';

import { moverScore, parsePvLine, type PvLine } from '../classifier/evaluation.js';
import { classifyMoveQuality, type MoveQualityResult } from '../classifier/move-classifier.js';
import { classifySacrifice, type SacrificeVerdict } from '../classifier/sacrifice.js';
import {
  DEFAULT_AGGRESSIVENESS,
  SACRIFICE_THRESHOLDS,
  TACTIC_THRESHOLDS,
  type SacrificeThresholds,
  type TacticThresholds,
} from '../classifier/thresholds.js';
import { DEFENSE_DETECTORS, rankDefenses } from '../defense/defense-analyzer.js';
import { seeAfterMove } from '../exchange/see.js';
import { BoardPool, DEFAULT_POOL_SIZE, type BoardPoolStats } from '../pool/board-pool.js';
import { FORCING_DETECTORS, PRIMARY_DETECTORS, mergeFinding, runBattery } from '../tactics/battery.js';
import { withTacticContext } from '../tactics/context.js';
import { createFinding } from '../tactics/runner.js';
import { DetectionError, type Finding } from '../tactics/types.js';

import { DEFAULT_COMPLEXITY, formatForComplexity, type ComplexityLevel } from './formatter.js';
import { positionalNotes } from './positional-notes.js';

export const DEFAULT_MAX_REASONS = 2;

function reasonLimit(requested: number | undefined): number {
  if (requested === undefined || !Number.isFinite(requested)) return DEFAULT_MAX_REASONS;
  return Math.min(DEFAULT_MAX_REASONS, Math.max(1, Math.floor(requested)));
}
export const FALLBACK_TEXT = 'best move by engine';

/** Every threshold the composer passes down, in one flat record */
export type AnalysisThresholds = SacrificeThresholds & TacticThresholds;

export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  ...SACRIFICE_THRESHOLDS,
  ...TACTIC_THRESHOLDS,
};

/**
 * A move to explain and what the engine reported about it
 */
export interface ExplainRequest {
  /** Position before the move; `fen` is used when absent */
  board?: Board;
  /** FEN (placement field alone is enough) */
  fen?: string;
  /** Coordinate code such as "e2e4" or "e7e8q" */
  move: string | Move;
  /** Engine evaluation after the move, e.g. "+1.50" or "Mate in 3" */
  evaluation?: string | null;
  /** Evaluation of the second-best line */
  secondEvaluation?: string | null;
  /** Evaluation of the position before the move */
  evaluationBefore?: string | null;
  /** PV lines such as "e2e4 e7e5 (+0.35)"; the first is the main line */
  pv?: readonly string[];
  /** Was this the engine's first choice? Defaults to true */
  isBestMove?: boolean;
}

export interface ExplainOptions {
  /** Scratch boards; a private pool is created when omitted */
  pool?: BoardPool;
  /** Append "(SEE +n)" to winning captures. Default true */
  showSeeValues?: boolean;
  complexity?: ComplexityLevel;
  /** 1 or 2 */
  maxReasons?: number;
  thresholds?: Partial<AnalysisThresholds>;
  /** 0 (solid) to 100 (sharp), scales move-quality thresholds */
  aggressiveness?: number;
}

export type ExplanationKind = 'explained' | 'invalid' | 'failed';

export interface Explanation {
  kind: ExplanationKind;
  /** Formatted reasons, most important first */
  reasons: string[];
  /** Reasons joined by ", " */
  text: string;
  /** Findings behind the reasons, unformatted */
  findings: Finding[];
  /** SEE of the capture, null when the move captures nothing */
  see: number | null;
  sacrifice: SacrificeVerdict | null;
  defenses: Finding[];
  /** Detector failures recovered along the way */
  errors: DetectionError[];
  /** Present when both evaluations were supplied */
  quality: MoveQualityResult | null;
}

function emptyExplanation(kind: ExplanationKind, reasons: string[], errors: DetectionError[] = []): Explanation {
  return {
    kind,
    reasons,
    text: reasons.join(', '),
    findings: [],
    see: null,
    sacrifice: null,
    defenses: [],
    errors,
    quality: null,
  };
}

function resolveBoard(request: ExplainRequest): Board | null {
  if (request.board) return request.board;
  return request.fen ? tryParseBoard(request.fen) : null;
}

function resolveMove(move: string | Move): Move | null {
  return typeof move === 'string' ? parseMove(move) : move;
}

/**
 * Parse PV lines and bring UCI moves into SAN so that check marks are visible
 */
function preparePv(lines: readonly string[], board: Board, mover: Color): PvLine[] {
  const fen = `${board.toFen()} ${mover} - - 0 1`;
  return lines.map((line) => {
    const parsed = parsePvLine(line);
    return { ...parsed, moves: tryConvertPvToSan(parsed.moves, fen) };
  });
}

function evaluationFallback(evaluation: number | null, squares: string[]): Finding {
  if (evaluation !== null && Math.abs(evaluation) > 3) {
    const text = evaluation > 0 ? 'maintains winning advantage' : 'fights back in difficult position';
    return createFinding('evaluation', text, squares);
  }
  if (evaluation !== null && Math.abs(evaluation) < 0.3) {
    return createFinding('evaluation', 'maintains balance', squares);
  }
  return createFinding('evaluation', 'improves position', squares);
}

function compose(request: ExplainRequest, options: ExplainOptions, pool: BoardPool): Explanation {
  const board = resolveBoard(request);
  const move = resolveMove(request.move);
  const mover = move ? board?.get(move.from) : null;
  if (!board || !move || !mover) {
    return emptyExplanation('invalid', []);
  }

  const color = mover.color;
  const pv = preparePv(request.pv ?? [], board, color);
  const evaluation = moverScore(request.evaluation ?? pv[0]?.evaluation, color);
  const secondEvaluation = moverScore(request.secondEvaluation ?? pv[1]?.evaluation, color);
  const evaluationBefore = moverScore(request.evaluationBefore, color);

  const thresholds: AnalysisThresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
  const maxReasons = reasonLimit(options.maxReasons);
  const level = options.complexity ?? DEFAULT_COMPLEXITY;

  const composed = withTacticContext(
    board,
    move,
    { pool, pv, evaluation, secondEvaluation, thresholds },
    (ctx, applied) => {
      const primary = runBattery(ctx, PRIMARY_DETECTORS);
      const sacrifice = classifySacrifice(
        {
          before: board,
          move,
          evalBefore: evaluationBefore,
          evalAfter: evaluation,
          showSee: options.showSeeValues ?? true,
          pool,
        },
        thresholds,
      );
      const forcing = runBattery(ctx, FORCING_DETECTORS);
      const defense = runBattery(ctx, DEFENSE_DETECTORS);

      const verdictFindings = sacrifice.text
        ? [createFinding(sacrifice.isSacrifice ? 'sacrifice' : 'capture', sacrifice.text, [move.to])]
        : [];

      let kept = [...primary.findings, ...verdictFindings, ...forcing.findings]
        .reduce<Finding[]>(mergeFinding, [])
        .slice(0, maxReasons);

      for (const note of positionalNotes(ctx, applied)) {
        if (kept.length >= maxReasons) break;
        kept = mergeFinding(kept, note);
      }

      if (kept.length === 0) {
        kept = [evaluationFallback(evaluation, [move.to])];
      }

      return {
        kept,
        sacrifice,
        defenses: rankDefenses(defense.findings),
        errors: [...primary.errors, ...forcing.errors, ...defense.errors],
      };
    },
  );

  if (!composed) {
    return emptyExplanation('invalid', []);
  }

  const { kept, sacrifice, defenses, errors } = composed;

  const quality =
    evaluation !== null && evaluationBefore !== null
      ? classifyMoveQuality({
          evalBefore: Math.round(evaluationBefore * 100),
          evalAfter: Math.round(evaluation * 100),
          isBestMove: request.isBestMove ?? true,
          isSacrifice: sacrifice.isSacrifice,
          aggressiveness: options.aggressiveness ?? DEFAULT_AGGRESSIVENESS,
        })
      : null;

  const reasons = kept.map((f) => formatForComplexity(f.text, level));

  return {
    kind: 'explained',
    reasons,
    text: reasons.join(', '),
    findings: kept,
    see: sacrifice.see,
    sacrifice: sacrifice.kind === 'none' ? null : sacrifice,
    defenses,
    errors,
    quality,
  };
}

/**
 * Explain why `request.move` is good. Malformed input gives an empty
 * 'invalid' explanation; an internal failure gives "best move by engine".
 */
export function explainMove(request: ExplainRequest, options: ExplainOptions = {}): Explanation {
  const pool = options.pool ?? new BoardPool({ maxSize: 8 });
  try {
    return compose(request, options, pool);
  } catch (err) {
    return emptyExplanation('failed', [FALLBACK_TEXT], [new DetectionError('composer', err)]);
  }
}

/**
 * Options for a long-lived analysis context
 */
export interface AnalysisContextOptions extends Omit<ExplainOptions, 'pool'> {
  /** Idle boards kept by the context's pool */
  poolSize?: number;
}

/**
 * One pool and one set of options shared by every call made through it
 */
export interface AnalysisContext {
  readonly pool: BoardPool;
  explain(request: ExplainRequest): Explanation;
  /** SEE of a capture; 0 for a malformed move or empty source square */
  see(board: Board, move: string | Move): number;
  stats(): BoardPoolStats;
}

export function createAnalysisContext(options: AnalysisContextOptions = {}): AnalysisContext {
  const { poolSize = DEFAULT_POOL_SIZE, ...explainOptions } = options;
  const pool = new BoardPool({ maxSize: poolSize });

  return {
    pool,
    explain: (request) => explainMove(request, { ...explainOptions, pool }),
    see: (board, move) => {
      const parsed = resolveMove(move);
      return parsed ? seeAfterMove(board, parsed, pool) : 0;
    },
    stats: () => pool.stats(),
  };
}
