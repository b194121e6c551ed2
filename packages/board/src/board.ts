/**
 * Board
 *
 * Mutable 8x8 grid of pieces. Positions need not be legal: a board may
 * lack kings or hold pawns on the back rank, and analysis code is expected
 * to cope. Only the piece placement is modelled; side to move and castling
 * rights travel separately.
 */

import { InvalidFenError } from './errors.js';
import { pieceFromFenChar, pieceToFenChar } from './piece.js';
import { ALL_SQUARES, toCoords } from './square.js';
import type { Color, LocatedPiece, Piece, Square } from './types.js';

const SIZE = 64;

/**
 * 8x8 piece grid, row 0 = rank 8
 */
export class Board {
  private readonly cells: Array<Piece | null>;

  constructor() {
    this.cells = new Array<Piece | null>(SIZE).fill(null);
  }

  /**
   * Parse the placement field of a FEN (the remaining fields are ignored)
   * @throws InvalidFenError if the placement is malformed
   */
  static fromFen(fen: string): Board {
    const placement = fen.trim().split(/\s+/)[0] ?? '';
    const rows = placement.split('/');
    if (rows.length !== 8) {
      throw new InvalidFenError(`Invalid FEN: expected 8 ranks in "${placement}"`);
    }

    const board = new Board();
    rows.forEach((rowText, row) => {
      let col = 0;
      for (const char of rowText) {
        if (char >= '1' && char <= '8') {
          col += Number(char);
          continue;
        }
        const piece = pieceFromFenChar(char);
        if (!piece || col > 7) {
          throw new InvalidFenError(`Invalid FEN: bad rank "${rowText}"`);
        }
        board.cells[row * 8 + col] = piece;
        col++;
      }
      if (col !== 8) {
        throw new InvalidFenError(`Invalid FEN: rank "${rowText}" does not cover 8 files`);
      }
    });

    return board;
  }

  /**
   * Build a board from a piece map, e.g. `{ e1: { type: 'k', color: 'w' } }`
   */
  static fromPieces(pieces: Record<Square, Piece>): Board {
    const board = new Board();
    for (const [square, piece] of Object.entries(pieces)) {
      board.set(square, piece);
    }
    return board;
  }

  /**
   * Get the piece on a square, null when empty or off-board
   */
  get(square: Square): Piece | null {
    const index = indexOf(square);
    return index === null ? null : (this.cells[index] ?? null);
  }

  /**
   * Place (or clear, with null) a piece; off-board squares are ignored
   */
  set(square: Square, piece: Piece | null): void {
    const index = indexOf(square);
    if (index === null) return;
    this.cells[index] = piece ? { color: piece.color, type: piece.type } : null;
  }

  /**
   * Check whether a square is empty (off-board counts as empty)
   */
  isEmpty(square: Square): boolean {
    return this.get(square) === null;
  }

  /**
   * Remove every piece
   */
  clear(): void {
    this.cells.fill(null);
  }

  /**
   * Overwrite this board with another board's placement
   */
  copyFrom(source: Board): void {
    for (let i = 0; i < SIZE; i++) {
      const piece = source.cells[i] ?? null;
      this.cells[i] = piece ? { color: piece.color, type: piece.type } : null;
    }
  }

  /**
   * Deep copy
   */
  clone(): Board {
    const copy = new Board();
    copy.copyFrom(this);
    return copy;
  }

  /**
   * All pieces on the board in FEN order, optionally filtered by color
   */
  pieces(color?: Color): LocatedPiece[] {
    const result: LocatedPiece[] = [];
    for (let i = 0; i < SIZE; i++) {
      const piece = this.cells[i];
      const square = ALL_SQUARES[i];
      if (!piece || square === undefined) continue;
      if (color && piece.color !== color) continue;
      result.push({ square, type: piece.type, color: piece.color });
    }
    return result;
  }

  /**
   * Placement field of a FEN
   */
  toFen(): string {
    const ranks: string[] = [];
    for (let row = 0; row < 8; row++) {
      let text = '';
      let empty = 0;
      for (let col = 0; col < 8; col++) {
        const piece = this.cells[row * 8 + col];
        if (!piece) {
          empty++;
          continue;
        }
        if (empty > 0) {
          text += String(empty);
          empty = 0;
        }
        text += pieceToFenChar(piece);
      }
      if (empty > 0) text += String(empty);
      ranks.push(text);
    }
    return ranks.join('/');
  }

  /**
   * Structural equality of placement
   */
  equals(other: Board): boolean {
    for (let i = 0; i < SIZE; i++) {
      const a = this.cells[i];
      const b = other.cells[i];
      if (a?.type !== b?.type || a?.color !== b?.color) return false;
    }
    return true;
  }
}

function indexOf(square: Square): number | null {
  const coords = toCoords(square);
  return coords ? coords.row * 8 + coords.col : null;
}

/**
 * Parse a FEN placement, returning null instead of throwing
 */
export function tryParseBoard(fen: string): Board | null {
  try {
    return Board.fromFen(fen);
  } catch (err) {
    if (err instanceof InvalidFenError) return null;
    throw err;
  }
}
