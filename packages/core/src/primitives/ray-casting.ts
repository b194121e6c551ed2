/**
 * Ray Casting Utilities
 *
 * Functions for tracing rays along files, ranks, and diagonals.
 * Every line-based detector (pins, skewers, x-rays, discoveries) and the
 * sliding-piece branch of canAttack walk the board through these helpers.
 */

import {
  fileIndex,
  getDirection,
  isValidSquare,
  rankIndex,
  squareFromIndices,
  type Board,
  type Color,
  type Direction,
  type LocatedPiece,
  type PieceType,
  type Square,
} from '@tactica/board';

/**
 * Direction vectors for each direction as [file delta, rank delta]
 */
export const DIRECTION_VECTORS: Readonly<Record<Direction, readonly [number, number]>> = {
  n: [0, 1],
  s: [0, -1],
  e: [1, 0],
  w: [-1, 0],
  ne: [1, 1],
  nw: [-1, 1],
  se: [1, -1],
  sw: [-1, -1],
};

export const ORTHOGONAL_DIRECTIONS: readonly Direction[] = ['n', 's', 'e', 'w'];
export const DIAGONAL_DIRECTIONS: readonly Direction[] = ['ne', 'nw', 'se', 'sw'];
export const ALL_DIRECTIONS: readonly Direction[] = [
  ...ORTHOGONAL_DIRECTIONS,
  ...DIAGONAL_DIRECTIONS,
];

/**
 * Get all squares in a direction from a starting square (exclusive)
 */
export function getSquaresInDirection(from: Square, dir: Direction): Square[] {
  if (!isValidSquare(from)) return [];

  const squares: Square[] = [];
  const [df, dr] = DIRECTION_VECTORS[dir];
  let f = fileIndex(from) + df;
  let r = rankIndex(from) + dr;

  let sq = squareFromIndices(f, r);
  while (sq) {
    squares.push(sq);
    f += df;
    r += dr;
    sq = squareFromIndices(f, r);
  }

  return squares;
}

/**
 * Get squares between two squares (exclusive of both endpoints)
 * Returns empty array if squares are not on a straight line
 */
export function getSquaresBetween(from: Square, to: Square): Square[] {
  if (!isValidSquare(from) || !isValidSquare(to)) return [];
  const dir = getDirection(from, to);
  if (!dir) return [];

  const squares: Square[] = [];
  for (const sq of getSquaresInDirection(from, dir)) {
    if (sq === to) break;
    squares.push(sq);
  }
  return squares;
}

/**
 * Get all pieces along a ray from a starting square
 */
export function getPiecesOnRay(board: Board, from: Square, dir: Direction): LocatedPiece[] {
  const pieces: LocatedPiece[] = [];

  for (const sq of getSquaresInDirection(from, dir)) {
    const piece = board.get(sq);
    if (piece) {
      pieces.push({ type: piece.type, color: piece.color, square: sq });
    }
  }

  return pieces;
}

/**
 * Get the first piece encountered along a ray
 */
export function getFirstPieceOnRay(
  board: Board,
  from: Square,
  dir: Direction,
): LocatedPiece | null {
  for (const sq of getSquaresInDirection(from, dir)) {
    const piece = board.get(sq);
    if (piece) {
      return { type: piece.type, color: piece.color, square: sq };
    }
  }

  return null;
}

/**
 * Check if there's a clear line between two squares
 */
export function isClearPath(board: Board, from: Square, to: Square): boolean {
  return getSquaresBetween(from, to).every((sq) => board.isEmpty(sq));
}

/**
 * Get directions a piece slides in; empty for non-sliders
 */
export function getDirectionsForPiece(type: PieceType): readonly Direction[] {
  switch (type) {
    case 'r':
      return ORTHOGONAL_DIRECTIONS;
    case 'b':
      return DIAGONAL_DIRECTIONS;
    case 'q':
      return ALL_DIRECTIONS;
    case 'p':
    case 'n':
    case 'k':
      return [];
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}

/**
 * Check if a piece type can slide in a given direction
 */
export function canPieceMoveInDirection(type: PieceType, dir: Direction): boolean {
  return getDirectionsForPiece(type).includes(dir);
}

/**
 * A pin (or skewer) line: an attacker with two enemy pieces behind each other
 */
export interface PinInfo {
  /** The piece directly in front of the attacker */
  pinnedPiece: LocatedPiece;
  /** The piece behind it on the same ray */
  protectedPiece: LocatedPiece;
  /** The attacking slider */
  attacker: LocatedPiece;
  /** Direction of the ray from the attacker */
  direction: Direction;
}

/**
 * Find lines where the first two pieces seen from a slider are both
 * enemies. Used for pins (front piece worth less) and skewers (front
 * piece worth more).
 */
export function findPinsFromSquare(
  board: Board,
  attackerSquare: Square,
  attackerType: PieceType,
  attackerColor: Color,
): PinInfo[] {
  const pins: PinInfo[] = [];

  for (const dir of getDirectionsForPiece(attackerType)) {
    const pieces = getPiecesOnRay(board, attackerSquare, dir);
    const first = pieces[0];
    const second = pieces[1];
    if (!first || !second) continue;
    if (first.color === attackerColor || second.color === attackerColor) continue;

    pins.push({
      pinnedPiece: first,
      protectedPiece: second,
      attacker: { type: attackerType, color: attackerColor, square: attackerSquare },
      direction: dir,
    });
  }

  return pins;
}
