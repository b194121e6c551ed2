/**
 * Defense Analysis
 *
 * What a move newly protects: a piece it now guards, the moved piece
 * getting out of danger, a line it blocks, and the mover's own king.
 */

import {
  isSlidingPiece,
  opponent,
  pieceName,
  pieceValue,
  type Board,
  type Color,
  type Move,
} from '@tactica/board';

import { BoardPool } from '../pool/board-pool.js';
import {
  canAttack,
  countAttackedKingSquares,
  countAttackers,
  countDefenders,
  findKing,
  getKingSafeSquares,
  getMoveSquares,
  getSquaresBetween,
  isAttackedBy,
  isKingInCheck,
} from '../primitives/index.js';
import { runBattery } from '../tactics/battery.js';
import { withTacticContext } from '../tactics/context.js';
import { createFinding } from '../tactics/runner.js';
import { findLowerValueThreat } from '../tactics/threat-detector.js';
import type { DetectionError, Finding, NamedDetector, TacticContext } from '../tactics/types.js';

const MAX_DEFENSES = 2;

export function detectProtection(ctx: TacticContext): Finding | null {
  const enemy = opponent(ctx.color);

  const protectedPieces = ctx.before
    .pieces(ctx.color)
    .filter((p) => p.type !== 'k' && p.square !== ctx.move.from)
    .filter((p) => {
      const attackersBefore = countAttackers(ctx.before, p.square, enemy);
      const defendersBefore = countDefenders(ctx.before, p.square, ctx.color);
      if (attackersBefore === 0 || defendersBefore >= attackersBefore) return false;

      const attackersAfter = countAttackers(ctx.after, p.square, enemy);
      const defendersAfter = countDefenders(ctx.after, p.square, ctx.color);
      return defendersAfter > defendersBefore && attackersAfter <= defendersAfter;
    })
    .sort((a, b) => pieceValue(b.type) - pieceValue(a.type));

  const guarded = protectedPieces[0];
  if (!guarded) return null;

  return {
    ...createFinding('defense', `defends ${pieceName(guarded.type)} on ${guarded.square}`, [
      ctx.move.to,
      guarded.square,
    ]),
    importance: Math.min(pieceValue(guarded.type), 5),
  };
}

export function detectEscape(ctx: TacticContext): Finding | null {
  const moved = ctx.before.get(ctx.move.from);
  if (!moved || moved.type === 'k') return null;

  const value = pieceValue(moved.type);
  if (value < 3) return null;

  const enemy = opponent(ctx.color);
  const inDanger =
    findLowerValueThreat(ctx.before, ctx.move.from) !== null ||
    countAttackers(ctx.before, ctx.move.from, enemy) > countDefenders(ctx.before, ctx.move.from, ctx.color);

  if (!inDanger || isAttackedBy(ctx.after, ctx.move.to, enemy)) return null;

  return {
    ...createFinding('defense', `saves ${pieceName(moved.type)}`, [ctx.move.from, ctx.move.to]),
    importance: Math.min(value - 1, 4),
  };
}

export function detectBlock(ctx: TacticContext): Finding | null {
  const enemy = opponent(ctx.color);
  const sliders = ctx.before
    .pieces(enemy)
    .filter((s) => isSlidingPiece(s.type) && ctx.after.get(s.square)?.color === enemy);

  for (const slider of sliders) {
    for (const friend of ctx.after.pieces(ctx.color)) {
      if (friend.type === 'k' || friend.square === ctx.move.to) continue;
      const value = pieceValue(friend.type);
      if (value < 3) continue;
      if (!getSquaresBetween(slider.square, friend.square).includes(ctx.move.to)) continue;
      if (!canAttack(ctx.before, slider.square, slider, friend.square)) continue;
      if (canAttack(ctx.after, slider.square, slider, friend.square)) continue;

      return {
        ...createFinding('defense', `blocks attack on ${pieceName(friend.type)}`, [
          ctx.move.to,
          slider.square,
          friend.square,
        ]),
        importance: Math.min(value / 2 + 1, 4),
      };
    }
  }

  return null;
}

/**
 * Could an enemy queen or rook land next to or in line with the king of
 * `color`, giving a check the king cannot step out of and we cannot
 * capture?
 */
export function hasMateThreat(board: Board, color: Color, pool: BoardPool): boolean {
  const king = findKing(board, color);
  if (!king) return false;
  const enemy = opponent(color);

  const heavies = board.pieces(enemy).filter((p) => p.type === 'q' || p.type === 'r');

  return heavies.some((heavy) =>
    getMoveSquares(board, heavy.square).some((landing) => {
      if (landing === king) return false;
      return pool.use(board, (scratch) => {
        scratch.set(heavy.square, null);
        scratch.set(landing, heavy);
        if (!canAttack(scratch, landing, heavy, king)) return false;
        if (getKingSafeSquares(scratch, color, pool).length > 0) return false;
        const catchers = scratch
          .pieces(color)
          .filter((p) => p.type !== 'k' && canAttack(scratch, p.square, p, landing));
        return catchers.length === 0;
      });
    }),
  );
}

export function detectKingSafety(ctx: TacticContext): Finding | null {
  const squares = [ctx.move.from, ctx.move.to];

  if (isKingInCheck(ctx.before, ctx.color) && !isKingInCheck(ctx.after, ctx.color)) {
    return { ...createFinding('defense', 'gets out of check', squares), importance: 5 };
  }

  if (hasMateThreat(ctx.before, ctx.color, ctx.pool) && !hasMateThreat(ctx.after, ctx.color, ctx.pool)) {
    return { ...createFinding('defense', 'stops mate threat', squares), importance: 5 };
  }

  const attackedBefore = countAttackedKingSquares(ctx.before, ctx.color);
  const attackedAfter = countAttackedKingSquares(ctx.after, ctx.color);
  if (attackedBefore >= 2 && attackedAfter < attackedBefore) {
    return { ...createFinding('defense', 'improves king safety', squares), importance: 3 };
  }

  return null;
}

export const DEFENSE_DETECTORS: readonly NamedDetector[] = [
  { name: 'protect-piece', detect: detectProtection },
  { name: 'escape', detect: detectEscape },
  { name: 'block', detect: detectBlock },
  { name: 'king-safety', detect: detectKingSafety },
];

/**
 * Dedupe by text, most important first, at most two
 */
export function rankDefenses(findings: readonly Finding[]): Finding[] {
  const unique = findings.filter((f, i) => findings.findIndex((g) => g.text === f.text) === i);
  return [...unique].sort((a, b) => b.importance - a.importance).slice(0, MAX_DEFENSES);
}

export interface DefenseAnalysis {
  defenses: Finding[];
  /** Defense detectors that threw, recovered */
  errors: DetectionError[];
}

/**
 * Defensive findings for `move`, played by `color` from `before`
 */
export function analyzeDefenses(
  before: Board,
  move: Move,
  color: Color,
  pool: BoardPool = new BoardPool({ maxSize: 8 }),
  detectors: readonly NamedDetector[] = DEFENSE_DETECTORS,
): DefenseAnalysis {
  const result = withTacticContext(before, move, { pool }, (ctx) =>
    ctx.color === color ? runBattery(ctx, detectors) : null,
  );
  return {
    defenses: rankDefenses(result?.findings ?? []),
    errors: result?.errors ?? [],
  };
}
