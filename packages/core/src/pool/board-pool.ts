/**
 * Scratch Board Pool
 *
 * Reusable boards for the temporary copies that detectors and the
 * exchange evaluator mutate while simulating moves:
 * - rent() copies a source board into a free buffer
 * - release() clears the buffer and returns it to the free list
 * - use() wraps both with guaranteed release
 *
 * A pool is an ordinary object owned by whoever runs the analysis.
 * Rent and release are synchronous, so one pool can be shared by every
 * analysis running on the same event loop.
 */

import { Board } from '@tactica/board';

/**
 * Pool statistics
 */
export interface BoardPoolStats {
  /** Boards sitting in the free list */
  available: number;

  /** Boards currently rented and not yet released */
  outstanding: number;

  /** Boards allocated over the pool's lifetime */
  created: number;

  /** Maximum size of the free list */
  maxSize: number;
}

/**
 * Pool options
 */
export interface BoardPoolOptions {
  /** Maximum number of idle boards kept for reuse */
  maxSize: number;
}

export const DEFAULT_POOL_SIZE = 50;

export class BoardPool {
  private readonly free: Board[] = [];
  private readonly rented = new Set<Board>();
  private readonly maxSize: number;
  private created = 0;

  constructor(options: Partial<BoardPoolOptions> = {}) {
    this.maxSize = Math.max(0, options.maxSize ?? DEFAULT_POOL_SIZE);
  }

  /**
   * Rent a board holding a copy of `source`
   */
  rent(source?: Board): Board {
    let board = this.free.pop();
    if (!board) {
      board = new Board();
      this.created++;
    }
    if (source) {
      board.copyFrom(source);
    }
    this.rented.add(board);
    return board;
  }

  /**
   * Return a rented board. Boards not rented from this pool, or already
   * released, are ignored.
   */
  release(board: Board): void {
    if (!this.rented.delete(board)) return;
    board.clear();
    if (this.free.length < this.maxSize) {
      this.free.push(board);
    }
  }

  /**
   * Rent a copy of `source`, run `fn` on it and release it on every exit path
   */
  use<T>(source: Board, fn: (scratch: Board) => T): T {
    const scratch = this.rent(source);
    try {
      return fn(scratch);
    } finally {
      this.release(scratch);
    }
  }

  stats(): BoardPoolStats {
    return {
      available: this.free.length,
      outstanding: this.rented.size,
      created: this.created,
      maxSize: this.maxSize,
    };
  }
}
