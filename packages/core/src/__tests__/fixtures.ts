/**
 * Test Position Fixtures
 *
 * Each position has a FEN, the move under test, a description and the
 * expected reason text (null when nothing should be reported).
 */

import { Board, parseMove, type Move } from '@tactica/board';

import { BoardPool } from '../pool/board-pool.js';
import { withTacticContext } from '../tactics/context.js';
import type { Detector, Finding } from '../tactics/types.js';

export interface TestPosition {
  fen: string;
  move: string;
  description: string;
  expected: string | null;
}

export function boardOf(position: Pick<TestPosition, 'fen'>): Board {
  return Board.fromFen(position.fen);
}

export function moveOf(position: Pick<TestPosition, 'move'>): Move {
  const move = parseMove(position.move);
  if (!move) throw new Error(`bad fixture move: ${position.move}`);
  return move;
}

/**
 * Run a single detector on a fixture position
 */
export function detectOn(position: TestPosition, detector: Detector, pool = new BoardPool()): Finding | null {
  return withTacticContext(boardOf(position), moveOf(position), { pool }, detector);
}

// ============================================================================
// EXCHANGES
// ============================================================================

export const SEE_POSITIONS = {
  undefendedBishop: {
    fen: '3b4/8/8/7k/8/8/8/3R2K1 w - - 0 1',
    move: 'd1d8',
    description: 'Rook takes an undefended bishop',
    expected: 'wins bishop (SEE +3)',
  },
  undefendedQueen: {
    fen: 'k7/8/8/3q4/8/8/8/3R2K1 w - - 0 1',
    move: 'd1d5',
    description: 'Rook takes an undefended queen',
    expected: null,
  },
  pawnDefendedPawn: {
    fen: 'k7/8/4p3/3p4/8/8/8/3R2K1 w - - 0 1',
    move: 'd1d5',
    description: 'Rook takes a pawn guarded by a pawn',
    expected: 'captures pawn (loses exchange)',
  },
  pawnDefendedPawnRelocated: {
    fen: '1k6/8/4p3/3p4/8/8/7K/3R4 w - - 0 1',
    move: 'd1d5',
    description: 'Same exchange with both kings elsewhere',
    expected: null,
  },
  pinnedRecapturer: {
    fen: '4k3/8/4p3/3n4/8/8/8/3RR1K1 w - - 0 1',
    move: 'd1d5',
    description: 'The e6 pawn is pinned to its king by the e1 rook and cannot recapture',
    expected: null,
  },
  unpinnedRecapturer: {
    fen: '4k3/8/4p3/3n4/8/8/8/3R2K1 w - - 0 1',
    move: 'd1d5',
    description: 'Without the e1 rook the pawn recaptures',
    expected: null,
  },
  kingCannotRecapture: {
    fen: '4k3/3p4/8/8/8/8/3Q4/3R2K1 w - - 0 1',
    move: 'd2d7',
    description: 'The king may not take back on a square the rook covers',
    expected: null,
  },
  kingRecaptures: {
    fen: '4k3/3p4/8/8/8/8/3Q4/6K1 w - - 0 1',
    move: 'd2d7',
    description: 'The king takes back an unsupported queen',
    expected: null,
  },
  queenTrade: {
    fen: '3qk3/8/8/8/8/8/8/3Q2K1 w - - 0 1',
    move: 'd1d8',
    description: 'Queen takes queen, king recaptures',
    expected: 'trades queen',
  },
  knightSacrifice: {
    fen: '6k1/5p2/8/4N3/8/8/8/6K1 w - - 0 1',
    move: 'e5f7',
    description: 'Knight takes the f7 pawn and the king can take back',
    expected: 'piece sacrifice',
  },
  rookForKnight: {
    fen: 'k7/8/2p5/3n4/8/8/8/3R2K1 w - - 0 1',
    move: 'd1d5',
    description: 'Rook takes a pawn-guarded knight',
    expected: 'exchange sacrifice (rook for minor piece)',
  },
  knightTakesGuardedRook: {
    fen: '2q1k3/8/8/2r5/4N3/8/8/3R2K1 w - - 0 1',
    move: 'e4c5',
    description: 'Knight takes a rook the queen guards',
    expected: 'wins rook (SEE +2)',
  },
  guardedRookWithBackup: {
    fen: '2q1k3/8/8/2r5/4N3/8/8/2R3K1 w - - 0 1',
    move: 'e4c5',
    description: 'Same capture, but the c1 rook would win the recapturing queen',
    expected: 'wins rook (SEE +5)',
  },
  discoveredCheckCapture: {
    fen: '4k3/8/2p5/3p4/4B3/8/8/4R1K1 w - - 0 1',
    move: 'e4d5',
    description: 'Bishop takes with discovered check, so the c6 pawn may not recapture',
    expected: null,
  },
  plainBishopCapture: {
    fen: '4k3/8/2p5/3p4/4B3/8/8/3R2K1 w - - 0 1',
    move: 'e4d5',
    description: 'Same capture without the check: pawn and rook both join in',
    expected: null,
  },
} satisfies Record<string, TestPosition>;

// ============================================================================
// TACTICS
// ============================================================================

export const TACTIC_POSITIONS = {
  royalFork: {
    fen: '8/3q4/6k1/8/8/3N4/8/6K1 w - - 0 1',
    move: 'd3e5',
    description: 'Knight forks king on g6 and queen on d7',
    expected: 'royal fork (king and queen)',
  },
  forkKingAndRook: {
    fen: '3r3k/8/8/6N1/8/8/8/6K1 w - - 0 1',
    move: 'g5f7',
    description: 'Knight checks from f7 and hits the d8 rook',
    expected: 'forks king and rook',
  },
  familyFork: {
    fen: '4k2r/8/8/q7/8/8/8/4Q1K1 w - - 0 1',
    move: 'e1e5',
    description: 'Queen on e5 hits king, queen and rook',
    expected: 'family fork (king, queen, and rook)',
  },
  generalFork: {
    fen: '7k/2r5/5b2/8/8/2N5/8/6K1 w - - 0 1',
    move: 'c3d5',
    description: 'Knight hits an undefended rook and bishop',
    expected: 'forks rook and bishop',
  },
  absolutePin: {
    fen: '4k3/8/8/8/4n3/8/8/R6K w - - 0 1',
    move: 'a1e1',
    description: 'Rook pins the knight to the king on the e-file',
    expected: 'pins knight to king (absolute)',
  },
  relativePin: {
    fen: 'k2q4/8/5n2/8/8/4B3/8/6K1 w - - 0 1',
    move: 'e3g5',
    description: 'Bishop pins the knight to an undefended queen',
    expected: 'pins knight to queen',
  },
  defendedRelativePin: {
    fen: '3rk3/8/5n2/8/8/4B3/8/6K1 w - - 0 1',
    move: 'e3g5',
    description: 'Knight in front of a king-defended rook: too little to gain',
    expected: null,
  },
  skewerKing: {
    fen: '6r1/8/8/3k4/8/8/8/3B2K1 w - - 0 1',
    move: 'd1b3',
    description: 'Bishop checks the king with the g8 rook behind it',
    expected: 'skewers king, winning rook',
  },
  skewerRook: {
    fen: '8/8/5n2/k7/3r4/8/8/2B3K1 w - - 0 1',
    move: 'c1b2',
    description: 'Bishop hits the rook with a loose knight behind',
    expected: 'skewers rook, winning knight',
  },
  doubleCheck: {
    fen: '4k3/8/8/8/4N3/8/8/4R1K1 w - - 0 1',
    move: 'e4f6',
    description: 'Knight checks and uncovers the rook on the e-file',
    expected: 'double check!',
  },
  discoveredAttack: {
    fen: 'k7/4q3/8/8/4B3/8/8/4R1K1 w - - 0 1',
    move: 'e4d3',
    description: 'Bishop steps aside and the rook hits the queen',
    expected: 'discovered attack on queen',
  },
  removalOfDefender: {
    fen: '7k/8/3n4/8/4b3/2N5/8/3R2K1 w - - 0 1',
    move: 'd1d6',
    description: 'Rook takes the knight guarding the bishop the c3 knight attacks',
    expected: 'removes defender of bishop',
  },
  overloading: {
    fen: 'k7/3q4/8/3n4/6b1/8/8/3R1BK1 w - - 0 1',
    move: 'f1e2',
    description: 'The queen alone guards the knight and the bishop',
    expected: 'overloads defender of knight and bishop',
  },
  deflection: {
    fen: '6k1/8/5n2/7Q/8/8/1B6/6K1 w - - 0 1',
    move: 'b2f6',
    description: 'Bishop removes the knight covering h7',
    expected: 'deflects key defender',
  },
  trappedKnight: {
    fen: '7n/8/4P3/7P/8/k7/8/3R2K1 w - - 0 1',
    move: 'd1d8',
    description: 'Knight on h8 attacked with both escapes covered by pawns',
    expected: 'traps knight',
  },
  backRankMate: {
    fen: '7k/6pp/8/8/8/8/8/3R2K1 w - - 0 1',
    move: 'd1d8',
    description: 'Rook checks on the back rank, king boxed in by its pawns',
    expected: 'back rank mate threat',
  },
  backRankLuft: {
    fen: '7k/6p1/7p/8/8/8/8/3R2K1 w - - 0 1',
    move: 'd1d8',
    description: 'Same check, but h7 is free',
    expected: 'gives check',
  },
  backRankBlocked: {
    fen: '5b1k/6pp/8/8/8/8/8/3R2K1 w - - 0 1',
    move: 'd1d8',
    description: 'Rook reaches the back rank but the bishop shields the king',
    expected: 'threatens back rank',
  },
  promotionThreat: {
    fen: 'k7/8/4P3/8/8/8/8/6K1 w - - 0 1',
    move: 'e6e7',
    description: 'Pawn one step from promotion',
    expected: 'threatens promotion',
  },
  passedPawn: {
    fen: 'k7/8/8/4P3/8/8/8/6K1 w - - 0 1',
    move: 'e5e6',
    description: 'Pawn two steps from promotion',
    expected: 'advances passed pawn',
  },
  smotheredMate: {
    fen: '6rk/6pp/8/6N1/8/8/8/6K1 w - - 0 1',
    move: 'g5f7',
    description: 'Knight checks a king surrounded by its own pieces',
    expected: 'smothered mate',
  },
  xRay: {
    fen: 'k7/6r1/8/8/3N4/8/8/2B3K1 w - - 0 1',
    move: 'c1b2',
    description: 'Bishop lines up behind its own knight against the g7 rook',
    expected: 'x-ray attack',
  },
  threatCreation: {
    fen: 'k7/8/8/4n3/8/8/3P4/6K1 w - - 0 1',
    move: 'd2d4',
    description: 'Pawn push attacks the knight',
    expected: 'creates threat on knight',
  },
  forcedMove: {
    fen: 'k7/8/8/8/8/8/1r4P1/r6K w - - 0 1',
    move: 'h1h2',
    description: 'King in check with h2 its only safe square',
    expected: 'forced move',
  },
  quietKingMove: {
    fen: 'k7/8/8/8/8/8/8/6K1 w - - 0 1',
    move: 'g1h1',
    description: 'Nothing happens',
    expected: null,
  },
  castlingKingside: {
    fen: 'k7/8/8/8/8/8/8/4K2R w K - 0 1',
    move: 'e1g1',
    description: 'White castles short',
    expected: 'castles kingside for safety',
  },
} satisfies Record<string, TestPosition>;

// ============================================================================
// DEFENSES
// ============================================================================

export const DEFENSE_POSITIONS = {
  protectBishop: {
    fen: 'k2r4/8/8/8/3B4/8/8/R5K1 w - - 0 1',
    move: 'a1a4',
    description: 'Rook lift guards the attacked bishop',
    expected: 'defends bishop on d4',
  },
  escapeKnight: {
    fen: 'k7/8/8/2p5/3N4/8/8/6K1 w - - 0 1',
    move: 'd4f3',
    description: 'Knight attacked by a pawn retreats',
    expected: 'saves knight',
  },
  blockBishop: {
    fen: 'k7/8/8/8/1b6/8/8/1N2R2K w - - 0 1',
    move: 'b1d2',
    description: 'Knight interposes between bishop and rook',
    expected: 'blocks attack on rook',
  },
  outOfCheck: {
    fen: 'k7/8/8/8/8/8/1r4P1/r6K w - - 0 1',
    move: 'h1h2',
    description: 'King steps out of check',
    expected: 'gets out of check',
  },
  stopBackRankMate: {
    fen: 'r5k1/8/8/8/8/8/5PPP/6K1 w - - 0 1',
    move: 'h2h3',
    description: 'Making luft against Ra1 mate',
    expected: 'stops mate threat',
  },
} satisfies Record<string, TestPosition>;
