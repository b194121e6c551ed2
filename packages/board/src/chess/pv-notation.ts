/**
 * PV notation
 *
 * Engines report principal variations as coordinate moves. Detectors that
 * read check marks (perpetual check) need SAN, which depends on the
 * position each move is played from, so the line is replayed on chess.js.
 */

import { Chess } from 'chess.js';

import { InvalidFenError, IllegalMoveError } from '../errors.js';

const UCI_PATTERN = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

export function isUciMove(text: string): boolean {
  return UCI_PATTERN.test(text);
}

/**
 * Replay coordinate moves from `fen` and return their SAN
 * @throws InvalidFenError when chess.js rejects the FEN
 * @throws IllegalMoveError at the first move that is not legal in context
 */
export function convertPvToSan(moves: readonly string[], fen: string): string[] {
  let chess: Chess;
  try {
    chess = new Chess(fen);
  } catch {
    throw new InvalidFenError(`Invalid FEN: ${fen}`);
  }

  return moves.map((uci) => {
    const fenBefore = chess.fen();
    const promotion = uci[4];
    try {
      const played = chess.move({ from: uci.slice(0, 2), to: uci.slice(2, 4), ...(promotion ? { promotion } : {}) });
      return played.san;
    } catch {
      throw new IllegalMoveError(uci, fenBefore);
    }
  });
}

/**
 * Like convertPvToSan, but a line that is already SAN, or that does not
 * replay from `fen` (a stale engine line), comes back unchanged
 */
export function tryConvertPvToSan(moves: readonly string[], fen: string): string[] {
  if (!moves.every(isUciMove)) return [...moves];
  try {
    return convertPvToSan(moves, fen);
  } catch (err) {
    if (err instanceof IllegalMoveError || err instanceof InvalidFenError) return [...moves];
    throw err;
  }
}
