export {
  canAttack,
  getAttackers,
  isAttackedBy,
  countAttackers,
  countDefenders,
  lowestAttackerValue,
  lowestDefenderValue,
  isKingInCheck,
  getCheckers,
  isGivingCheck,
  getAttackedEnemies,
} from './attacks.js';

export {
  DIRECTION_VECTORS,
  ORTHOGONAL_DIRECTIONS,
  DIAGONAL_DIRECTIONS,
  ALL_DIRECTIONS,
  getSquaresInDirection,
  getSquaresBetween,
  getPiecesOnRay,
  getFirstPieceOnRay,
  isClearPath,
  getDirectionsForPiece,
  canPieceMoveInDirection,
  findPinsFromSquare,
} from './ray-casting.js';
export type { PinInfo } from './ray-casting.js';

export { findKing } from './piece-utils.js';

export {
  getMoveSquares,
  isSafeDestination,
  getSafeMoveSquares,
  countSafeSquaresForPiece,
  getKingSafeSquares,
  countAttackedKingSquares,
} from './mobility.js';

export { isPiecePinned, staysOnKingLine, leavesKingSafe } from './pins.js';
