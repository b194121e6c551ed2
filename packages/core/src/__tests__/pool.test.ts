import { Board } from '@tactica/board';
import { describe, it, expect } from 'vitest';

import { BoardPool, DEFAULT_POOL_SIZE } from '../pool/board-pool.js';

const START = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR';

describe('BoardPool', () => {
  it('rents a copy of the source board', () => {
    const pool = new BoardPool();
    const source = Board.fromFen(START);
    const copy = pool.rent(source);

    expect(copy).not.toBe(source);
    expect(copy.equals(source)).toBe(true);
    expect(pool.stats()).toEqual({
      available: 0,
      outstanding: 1,
      created: 1,
      maxSize: DEFAULT_POOL_SIZE,
    });
  });

  it('clears released boards and reuses them', () => {
    const pool = new BoardPool();
    const first = pool.rent(Board.fromFen(START));
    pool.release(first);

    expect(first.pieces()).toHaveLength(0);

    const second = pool.rent();
    expect(second).toBe(first);
    expect(pool.stats().created).toBe(1);
  });

  it('ignores a second release of the same board', () => {
    const pool = new BoardPool();
    const board = pool.rent();
    pool.release(board);
    pool.release(board);

    expect(pool.stats()).toMatchObject({ available: 1, outstanding: 0 });
  });

  it('ignores boards it did not rent', () => {
    const pool = new BoardPool();
    pool.release(new Board());

    expect(pool.stats().available).toBe(0);
  });

  it('keeps at most maxSize idle boards', () => {
    const pool = new BoardPool({ maxSize: 1 });
    const a = pool.rent();
    const b = pool.rent();
    pool.release(a);
    pool.release(b);

    expect(pool.stats()).toEqual({ available: 1, outstanding: 0, created: 2, maxSize: 1 });
  });

  describe('use', () => {
    it('returns the callback result and releases the board', () => {
      const pool = new BoardPool();
      const count = pool.use(Board.fromFen(START), (scratch) => scratch.pieces('w').length);

      expect(count).toBe(16);
      expect(pool.stats().outstanding).toBe(0);
    });

    it('releases the board when the callback throws', () => {
      const pool = new BoardPool();
      expect(() =>
        pool.use(new Board(), () => {
          throw new Error('boom');
        }),
      ).toThrow('boom');
      expect(pool.stats().outstanding).toBe(0);
    });

    it('does not touch the source board', () => {
      const pool = new BoardPool();
      const source = Board.fromFen(START);
      pool.use(source, (scratch) => scratch.set('e2', null));

      expect(source.get('e2')).toEqual({ color: 'w', type: 'p' });
    });
  });
});
