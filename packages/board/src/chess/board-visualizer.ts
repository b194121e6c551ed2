/**
 * Board Visualization
 *
 * Renders boards as ASCII diagrams for terminal output.
 * Uses brackets to distinguish pieces from empty squares.
 */

import { Board } from '../board.js';
import { pieceToFenChar } from '../piece.js';
import { FILES } from '../square.js';
import type { Square } from '../types.js';

/**
 * Board orientation perspective
 */
export type Perspective = 'white' | 'black';

/**
 * Options for board rendering
 */
export interface BoardRenderOptions {
  /** Board orientation (default: 'white') */
  perspective?: Perspective;
  /** Squares to mark, e.g. the from/to squares of the move being explained */
  highlight?: Square[];
}

/**
 * Render a board as ASCII
 *
 * Example output:
 * ```
 *    a   b   c   d   e   f   g   h
 * 8 [r] [n] [b] [q] [k] [b] [n] [r]  8
 * 7 [p] [p] [p] [p] [p] [p] [p] [p]  7
 * 6  .   .   .   .   .   .   .   .   6
 * 5  .   .   .   .   .   .   .   .   5
 * 4  .   .   .   .  [P]  .   .   .   4
 * 3  .   .   .   .   .   .   .   .   3
 * 2 [P] [P] [P] [P]  *  [P] [P] [P]  2
 * 1 [R] [N] [B] [Q] [K] [B] [N] [R]  1
 *    a   b   c   d   e   f   g   h
 * ```
 *
 * Uppercase is White. Highlighted pieces render as `<P>`, highlighted
 * empty squares as ` * `.
 *
 * @param position - Board or FEN to render
 */
export function renderBoard(position: Board | string, options?: BoardRenderOptions): string {
  const perspective = options?.perspective ?? 'white';
  const highlight = new Set(options?.highlight ?? []);
  const board = typeof position === 'string' ? Board.fromFen(position) : position;

  const files = perspective === 'white' ? [...FILES] : [...FILES].reverse();
  const ranks = perspective === 'white' ? [8, 7, 6, 5, 4, 3, 2, 1] : [1, 2, 3, 4, 5, 6, 7, 8];

  const lines: string[] = [];
  lines.push(`   ${files.join('   ')}`);

  for (const rankNum of ranks) {
    const squares = files.map((file) => {
      const square = `${file}${rankNum}`;
      const piece = board.get(square);
      const marked = highlight.has(square);
      if (piece) {
        const symbol = pieceToFenChar(piece);
        return marked ? `<${symbol}>` : `[${symbol}]`;
      }
      return marked ? ' * ' : ' . ';
    });
    lines.push(`${rankNum} ${squares.join(' ')}  ${rankNum}`);
  }

  lines.push(`   ${files.join('   ')}`);

  return lines.join('\n');
}
