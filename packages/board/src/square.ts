/**
 * Square Utilities
 *
 * Helper functions for working with chess squares and coordinates.
 * Squares are algebraic names at every public seam; off-board names
 * map to null rather than throwing.
 */

import type { Coords, Direction, Square } from './types.js';

/**
 * File letters a-h mapped to indices 0-7
 */
const FILE_TO_INDEX: Record<string, number> = {
  a: 0,
  b: 1,
  c: 2,
  d: 3,
  e: 4,
  f: 5,
  g: 6,
  h: 7,
};

/**
 * Index 0-7 mapped to file letters
 */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/**
 * Check if square is valid
 */
export function isValidSquare(square: string): boolean {
  if (square.length !== 2) return false;
  const f = square[0];
  const r = square[1];
  return (
    f !== undefined && r !== undefined && FILE_TO_INDEX[f] !== undefined && r >= '1' && r <= '8'
  );
}

/**
 * Get file index (0-7) from square, -1 when off-board
 */
export function fileIndex(square: Square): number {
  const f = square[0];
  return f === undefined ? -1 : (FILE_TO_INDEX[f] ?? -1);
}

/**
 * Get rank index (0-7) from square, -1 when off-board
 */
export function rankIndex(square: Square): number {
  const r = square[1];
  if (r === undefined || r < '1' || r > '8') return -1;
  return r.charCodeAt(0) - '1'.charCodeAt(0);
}

/**
 * Get rank number (1-8) from square
 */
export function rank(square: Square): number {
  return rankIndex(square) + 1;
}

/**
 * Create square from file and rank indices (0-7)
 */
export function squareFromIndices(fileIdx: number, rankIdx: number): Square | null {
  if (fileIdx < 0 || fileIdx > 7 || rankIdx < 0 || rankIdx > 7) {
    return null;
  }
  return `${FILES[fileIdx]}${rankIdx + 1}`;
}

/**
 * Convert a square to grid coordinates (row 0 = rank 8)
 */
export function toCoords(square: Square): Coords | null {
  if (!isValidSquare(square)) return null;
  return { row: 7 - rankIndex(square), col: fileIndex(square) };
}

/**
 * Convert grid coordinates back to a square name
 */
export function fromCoords(row: number, col: number): Square | null {
  return squareFromIndices(col, 7 - row);
}

/**
 * Get direction from one square to another (if on same line)
 * Returns null if squares are not on a straight line
 */
export function getDirection(from: Square, to: Square): Direction | null {
  const fileDiff = fileIndex(to) - fileIndex(from);
  const rankDiff = rankIndex(to) - rankIndex(from);

  if (fileDiff === 0 && rankDiff === 0) return null;

  if (fileDiff === 0) {
    return rankDiff > 0 ? 'n' : 's';
  }

  if (rankDiff === 0) {
    return fileDiff > 0 ? 'e' : 'w';
  }

  if (Math.abs(fileDiff) === Math.abs(rankDiff)) {
    if (fileDiff > 0 && rankDiff > 0) return 'ne';
    if (fileDiff > 0 && rankDiff < 0) return 'se';
    if (fileDiff < 0 && rankDiff > 0) return 'nw';
    return 'sw';
  }

  return null;
}

/**
 * Get the opposite direction
 */
export function oppositeDirection(dir: Direction): Direction {
  const opposites: Record<Direction, Direction> = {
    n: 's',
    s: 'n',
    e: 'w',
    w: 'e',
    ne: 'sw',
    sw: 'ne',
    nw: 'se',
    se: 'nw',
  };
  return opposites[dir];
}

/**
 * Get all squares surrounding a square (king's movement squares)
 */
export function getSurroundingSquares(square: Square): Square[] {
  if (!isValidSquare(square)) return [];
  const f = fileIndex(square);
  const r = rankIndex(square);
  const result: Square[] = [];

  for (let df = -1; df <= 1; df++) {
    for (let dr = -1; dr <= 1; dr++) {
      if (df === 0 && dr === 0) continue;
      const sq = squareFromIndices(f + df, r + dr);
      if (sq) result.push(sq);
    }
  }

  return result;
}

/**
 * Check if a square is in the central 4x4 block (c3-f6)
 */
export function isExtendedCenter(square: Square): boolean {
  const f = fileIndex(square);
  const r = rankIndex(square);
  return f >= 2 && f <= 5 && r >= 2 && r <= 5;
}

/**
 * Back rank (1 or 8) for a color
 */
export function backRank(color: 'w' | 'b'): number {
  return color === 'w' ? 1 : 8;
}

/**
 * All 64 squares, a8 first (FEN order)
 */
export const ALL_SQUARES: readonly Square[] = Array.from({ length: 64 }, (_, i) => {
  const row = Math.floor(i / 8);
  const col = i % 8;
  return `${FILES[col] ?? 'a'}${8 - row}`;
});
