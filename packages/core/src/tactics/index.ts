export type {
  TacticCategory,
  Finding,
  DetectionResult,
  TacticContext,
  Detector,
  NamedDetector,
} from './types.js';
export { DetectionError } from './types.js';

export { applyMove, withTacticContext } from './context.js';
export type { AppliedMove, TacticContextOptions } from './context.js';

export { runDetector, createFinding, TACTIC_IMPORTANCE } from './runner.js';

export { detectSingularMove, detectForcedMove } from './signal-detector.js';
export {
  detectThreatCreation,
  findLowerValueThreat,
} from './threat-detector.js';
export { detectDoubleCheck, detectDiscoveredAttack } from './discovery-detector.js';
export { detectPin } from './pin-detector.js';
export { detectSkewer } from './skewer-detector.js';
export { detectFork } from './fork-detector.js';
export {
  detectRemovalOfDefender,
  detectOverloading,
  detectDeflection,
} from './defender-detector.js';
export {
  detectTrappedPiece,
  detectHangingPiece,
  detectBackRankThreat,
} from './weakness-detector.js';
export {
  detectPromotionThreat,
  detectSmotheredMate,
  detectXRayAttack,
  detectDecoy,
  detectDoubleAttack,
} from './special-detector.js';
export { detectPerpetualCheck, detectCheck, isPerpetualCheckLine } from './forcing-detector.js';

export {
  PRIMARY_DETECTORS,
  FORCING_DETECTORS,
  runBattery,
  supersedes,
  mergeFinding,
} from './battery.js';
export type { BatteryResult } from './battery.js';
