/**
 * @tactica/board - Board model and chess helpers
 *
 * This package handles:
 * - The 8x8 piece grid and FEN placement parsing
 * - Square, piece and move-code utilities
 * - SAN/UCI conversion through chess.js
 * - ASCII board rendering
 */

export const VERSION = '0.1.0';

export type {
  Color,
  PieceType,
  PromotionType,
  Piece,
  Square,
  Coords,
  LocatedPiece,
  Direction,
} from './types.js';
export { opponent } from './types.js';

export { Board, tryParseBoard } from './board.js';

export {
  FILES,
  ALL_SQUARES,
  isValidSquare,
  fileIndex,
  rankIndex,
  rank,
  squareFromIndices,
  toCoords,
  fromCoords,
  getDirection,
  oppositeDirection,
  getSurroundingSquares,
  isExtendedCenter,
  backRank,
} from './square.js';

export {
  PIECE_VALUES,
  pieceValue,
  pieceName,
  isPieceType,
  isPromotionType,
  pieceFromFenChar,
  pieceToFenChar,
  isSlidingPiece,
  isMajorPiece,
  isMinorPiece,
} from './piece.js';

export { parseMove, formatMove } from './move.js';
export type { Move } from './move.js';

export { convertPvToSan, tryConvertPvToSan, isUciMove, renderBoard } from './chess/index.js';
export type { Perspective, BoardRenderOptions } from './chess/index.js';

export { InvalidFenError, IllegalMoveError } from './errors.js';
